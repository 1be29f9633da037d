/**
 * Recursive Dependency Resolver
 *
 * Breadth-first traversal of declared dependency edges:
 * - direct dependencies (apm.yml) are depth 1, in declaration order
 * - each fetched package's own declarations are queued at depth + 1
 * - a unique key is visited once; the first discovery wins
 * - a package that cannot be fetched or has no usable apm.yml becomes a
 *   leaf, with the reason recorded
 *
 * There is no version solving: every edge names a repository (and optional
 * ref), not a range.
 */

import { type HostOptions, sanitizeMessage } from "./host";
import {
	compareStrings,
	type LockedDependency,
	type LockFile,
	listDependencies,
} from "./lockfile";
import {
	type DependencyReference,
	getInstallPath,
	getUniqueKey,
	parseReference,
} from "./reference";

// =============================================================================
// Constants
// =============================================================================

/** Maximum depth for transitive dependency resolution */
export const MAX_DEPENDENCY_DEPTH = 50;

// =============================================================================
// Types
// =============================================================================

export type GitReferenceType = "branch" | "tag" | "commit";

/**
 * Outcome of pinning a reference against the remote
 */
export interface ResolvedReference {
	originalRef: string;
	refType: GitReferenceType;
	resolvedCommit: string;
	refName: string;
}

/**
 * Metadata of a fetched package (from its apm.yml)
 */
export interface ApmPackage {
	name: string;
	version: string;
	description?: string;
	author?: string;
	/** Absolute local path of the materialized package */
	packagePath: string;
	/** Declared dependency specifications */
	dependencies: string[];
}

/**
 * What a {@link PackageLoader} returns for one dependency
 */
export interface LoadedPackage {
	/** Absolute install path */
	installPath: string;
	/** Parsed metadata; undefined when apm.yml is missing or invalid */
	package?: ApmPackage;
	/** Set when apm.yml exists but could not be used */
	manifestError?: string;
	resolvedReference?: ResolvedReference;
	/** Package has a SKILL.md at its root */
	hasSkill: boolean;
}

export interface LoadContext {
	key: string;
	depth: number;
	resolvedBy?: string;
}

/**
 * Fetches and materializes one dependency. Throws when it cannot be fetched.
 */
export type PackageLoader = (
	ref: DependencyReference,
	context: LoadContext,
) => Promise<LoadedPackage>;

/**
 * Why a dependency contributed no transitive edges
 */
export type LeafReason =
	| "fetch_error"
	| "manifest_missing"
	| "manifest_invalid"
	| "max_depth_exceeded";

export interface LeafRecord {
	key: string;
	depth: number;
	reason: LeafReason;
	message: string;
}

export type ResolutionErrorType =
	| "invalid_reference"
	| "fetch_error"
	| "manifest_invalid";

export interface ResolutionError {
	type: ResolutionErrorType;
	/** Unique key, or the raw specification when it could not be parsed */
	package: string;
	message: string;
	depth: number;
	/** Failure on a package the caller asked for explicitly */
	fatal: boolean;
}

/**
 * One installed node of the resolution
 */
export interface ResolvedDependency {
	/** Specification as declared */
	spec: string;
	ref: DependencyReference;
	key: string;
	/** Install path relative to apm_modules/ */
	installPath: string;
	depth: number;
	/** repoUrl of the declaring package (depth > 1) */
	resolvedBy?: string;
	resolvedCommit?: string;
	resolvedRef?: string;
	version?: string;
	loaded: LoadedPackage;
	leafReason?: LeafReason;
}

export interface ResolutionResult {
	/** Whether every explicitly requested package resolved */
	success: boolean;
	/** Installed packages: depth ascending, direct in declaration order */
	dependencies: ResolvedDependency[];
	leaves: LeafRecord[];
	errors: ResolutionError[];
}

export interface ResolverOptions extends HostOptions {
	/** Maximum depth (default: 50) */
	maxDepth?: number;
	/** Unique keys whose failure makes the resolution unsuccessful */
	explicit?: ReadonlySet<string>;
}

// =============================================================================
// Internal Types
// =============================================================================

interface QueueItem {
	spec: string;
	ref: DependencyReference;
	key: string;
	depth: number;
	resolvedBy?: string;
}

// =============================================================================
// Main Resolution Function
// =============================================================================

/**
 * Resolve dependencies using BFS.
 *
 * @param directSpecs - Direct dependency specifications, in declaration order
 * @param loader - Fetches one package; called once per unique key
 */
export async function resolveDependencies(
	directSpecs: string[],
	loader: PackageLoader,
	options: ResolverOptions = {},
): Promise<ResolutionResult> {
	const maxDepth = options.maxDepth ?? MAX_DEPENDENCY_DEPTH;
	const explicit = options.explicit ?? new Set<string>();

	const result: ResolutionResult = {
		success: true,
		dependencies: [],
		leaves: [],
		errors: [],
	};

	const visited = new Set<string>();
	const queue: QueueItem[] = [];

	const enqueue = (spec: string, depth: number, resolvedBy?: string) => {
		let ref: DependencyReference;
		try {
			ref = parseReference(spec, options);
		} catch (error) {
			result.errors.push({
				type: "invalid_reference",
				package: spec,
				message: error instanceof Error ? error.message : String(error),
				depth,
				fatal: depth === 1 && explicit.has(spec),
			});
			return;
		}

		const key = getUniqueKey(ref);
		if (visited.has(key)) return;
		visited.add(key);
		queue.push({ spec, ref, key, depth, resolvedBy });
	};

	for (const spec of directSpecs) {
		enqueue(spec, 1);
	}

	while (queue.length > 0) {
		const item = queue.shift();
		if (!item) continue;
		const { spec, ref, key, depth, resolvedBy } = item;

		if (process.env.APM_DEBUG) {
			console.log(
				`[resolve] ${key} (depth ${depth}${resolvedBy ? `, via ${resolvedBy}` : ""})`,
			);
		}

		let loaded: LoadedPackage;
		try {
			loaded = await loader(ref, { key, depth, resolvedBy });
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			result.errors.push({
				type: "fetch_error",
				package: key,
				message,
				depth,
				fatal: explicit.has(key),
			});
			result.leaves.push({ key, depth, reason: "fetch_error", message });
			continue;
		}

		const node: ResolvedDependency = {
			spec,
			ref,
			key,
			installPath: getInstallPath(ref),
			depth,
			resolvedBy: depth > 1 ? resolvedBy : undefined,
			resolvedCommit: loaded.resolvedReference?.resolvedCommit,
			resolvedRef: loaded.resolvedReference?.refName ?? ref.reference,
			version: loaded.package?.version,
			loaded,
		};
		result.dependencies.push(node);

		if (!loaded.package) {
			if (loaded.manifestError) {
				node.leafReason = "manifest_invalid";
				result.leaves.push({
					key,
					depth,
					reason: "manifest_invalid",
					message: loaded.manifestError,
				});
				result.errors.push({
					type: "manifest_invalid",
					package: key,
					message: loaded.manifestError,
					depth,
					fatal: explicit.has(key) && !loaded.hasSkill,
				});
			} else {
				node.leafReason = "manifest_missing";
				result.leaves.push({
					key,
					depth,
					reason: "manifest_missing",
					message: `${key} has no apm.yml; no transitive dependencies read`,
				});
			}
			continue;
		}

		const declared = loaded.package.dependencies;
		if (declared.length === 0) continue;

		if (depth >= maxDepth) {
			node.leafReason = "max_depth_exceeded";
			result.leaves.push({
				key,
				depth,
				reason: "max_depth_exceeded",
				message: `Maximum dependency depth (${maxDepth}) reached at ${key}; ${declared.length} declared dependency(ies) not followed`,
			});
			continue;
		}

		for (const childSpec of declared) {
			enqueue(childSpec, depth + 1, ref.repoUrl);
		}
	}

	result.dependencies = orderResolved(result.dependencies);
	result.success = !result.errors.some((error) => error.fatal);
	return result;
}

/**
 * Order resolved dependencies: depth ascending; direct dependencies keep
 * declaration order, deeper tiers sort by unique key.
 */
export function orderResolved<T extends { depth: number; key: string }>(
	dependencies: T[],
): T[] {
	return [...dependencies].sort((a, b) => {
		if (a.depth !== b.depth) return a.depth - b.depth;
		if (a.depth === 1) return 0;
		return compareStrings(a.key, b.key);
	});
}

// =============================================================================
// Lock-based Queries
// =============================================================================

function manifestInstallPaths(
	manifestSpecs: string[],
	options: HostOptions,
): string[] {
	const paths: string[] = [];
	for (const spec of manifestSpecs) {
		try {
			paths.push(getInstallPath(parseReference(spec, options)));
		} catch {
			// Unparseable entries are reported by install, not here
		}
	}
	return paths;
}

/**
 * Find installed packages that neither apm.yml nor the lockfile account for.
 * Lockfile membership is enough to keep a transitive dependency.
 *
 * @param installedPaths - Package paths found under apm_modules/
 * @param lockedPaths - Install paths recorded in apm.lock
 */
export function findOrphans(
	installedPaths: string[],
	manifestSpecs: string[],
	lockedPaths: string[],
	options: HostOptions = {},
): string[] {
	const declared = new Set([...manifestInstallPaths(manifestSpecs, options), ...lockedPaths]);
	return installedPaths.filter((path) => !declared.has(path));
}

/**
 * Node of the lock-derived dependency tree
 */
export interface DependencyTreeNode {
	dependency: LockedDependency;
	children: DependencyTreeNode[];
}

/**
 * Build the dependency tree from lock provenance (resolvedBy).
 * Entries whose parent is missing from the lock are shown as roots.
 */
export function buildDependencyTree(lock: LockFile): DependencyTreeNode[] {
	const entries = listDependencies(lock);
	const byRepo = new Map<string, DependencyTreeNode>();
	const nodes: DependencyTreeNode[] = entries.map((dependency) => ({
		dependency,
		children: [],
	}));

	for (const node of nodes) {
		if (!node.dependency.isVirtual && !byRepo.has(node.dependency.repoUrl)) {
			byRepo.set(node.dependency.repoUrl, node);
		}
	}

	const roots: DependencyTreeNode[] = [];
	for (const node of nodes) {
		const parentRepo = node.dependency.resolvedBy;
		const parent =
			node.dependency.depth > 1 && parentRepo ? byRepo.get(parentRepo) : undefined;
		if (parent && parent !== node) {
			parent.children.push(node);
		} else {
			roots.push(node);
		}
	}

	return roots;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Format resolution errors for display.
 */
export function formatResolutionErrors(errors: ResolutionError[]): string[] {
	return errors.map((error) => {
		switch (error.type) {
			case "invalid_reference":
				return error.message;
			case "fetch_error":
				return `Failed to fetch ${error.package}: ${error.message}`;
			case "manifest_invalid":
				return `${error.package}: ${error.message}`;
			default:
				return error.message;
		}
	});
}

/**
 * Print resolution errors to console.
 */
export function printResolutionErrors(errors: ResolutionError[]): void {
	if (errors.length === 0) return;

	console.error("\nResolution errors:");
	for (const msg of formatResolutionErrors(errors)) {
		console.error(`  - ${sanitizeMessage(msg)}`);
	}
}
