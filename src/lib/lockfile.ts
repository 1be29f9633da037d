/**
 * Lockfile model and YAML codec (apm.lock)
 *
 * Records, for every installed package, the exact commit it resolved to,
 * the host it came from, and how it entered the tree:
 * - depth 1 entries are direct dependencies (resolvedBy empty)
 * - depth N entries were declared by the package named in resolvedBy
 *
 * @example
 * ```yaml
 * lockfile_version: "1"
 * generated_at: "2025-01-01T00:00:00.000Z"
 * apm_version: 0.4.0
 * dependencies:
 *   - repo_url: owner/direct
 *     resolved_commit: 0123456789abcdef0123456789abcdef01234567
 *     resolved_ref: main
 *   - repo_url: owner/transitive
 *     depth: 2
 *     resolved_by: owner/direct
 * ```
 */

import * as yaml from "js-yaml";
import { getInstallPath, getUniqueKey } from "./reference";

export const LOCKFILE_VERSION = "1";

/**
 * A single locked package
 */
export interface LockedDependency {
	repoUrl: string;
	/** Omitted when the package came from the default host */
	host?: string;
	resolvedCommit?: string;
	resolvedRef?: string;
	version?: string;
	virtualPath?: string;
	isVirtual?: boolean;
	/** 1 = direct dependency */
	depth: number;
	/** repoUrl of the package that declared this one (depth > 1) */
	resolvedBy?: string;
}

export interface LockFile {
	lockfileVersion: string;
	generatedAt: string;
	apmVersion?: string;
	/** Entries keyed by unique key, in insertion order */
	dependencies: Map<string, LockedDependency>;
}

/**
 * On-disk record shape (snake_case keys)
 */
interface LockedDependencyRecord {
	repo_url: string;
	host?: string;
	resolved_commit?: string;
	resolved_ref?: string;
	version?: string;
	virtual_path?: string;
	is_virtual?: boolean;
	depth?: number;
	resolved_by?: string;
}

// =============================================================================
// Construction
// =============================================================================

export function createLockfile(apmVersion?: string): LockFile {
	return {
		lockfileVersion: LOCKFILE_VERSION,
		generatedAt: new Date().toISOString(),
		apmVersion,
		dependencies: new Map(),
	};
}

/**
 * Unique key of a locked entry (repoUrl, or repoUrl/virtualPath)
 */
export function getLockKey(dep: LockedDependency): string {
	return getUniqueKey({
		repoUrl: dep.repoUrl,
		virtualPath: dep.isVirtual ? dep.virtualPath : undefined,
	});
}

/**
 * Install path of a locked entry relative to apm_modules/
 */
export function getLockInstallPath(dep: LockedDependency): string {
	return getInstallPath({
		repoUrl: dep.repoUrl,
		virtualPath: dep.isVirtual ? dep.virtualPath : undefined,
	});
}

// =============================================================================
// Mutation & Lookup
// =============================================================================

/**
 * Insert or replace an entry. A replaced entry keeps its position.
 */
export function addDependency(lock: LockFile, dep: LockedDependency): void {
	lock.dependencies.set(getLockKey(dep), dep);
}

export function hasDependency(lock: LockFile, key: string): boolean {
	return lock.dependencies.has(key);
}

export function getDependency(
	lock: LockFile,
	key: string,
): LockedDependency | undefined {
	return lock.dependencies.get(key);
}

export function removeDependency(lock: LockFile, key: string): boolean {
	return lock.dependencies.delete(key);
}

/**
 * Entries in lock (file) order
 */
export function listDependencies(lock: LockFile): LockedDependency[] {
	return [...lock.dependencies.values()];
}

/**
 * Entries ordered by depth, then repository path
 */
export function sortedDependencies(lock: LockFile): LockedDependency[] {
	return listDependencies(lock).sort(
		(a, b) =>
			a.depth - b.depth ||
			compareStrings(a.repoUrl, b.repoUrl) ||
			compareStrings(a.virtualPath ?? "", b.virtualPath ?? ""),
	);
}

/**
 * Deduplicated install paths in depth-then-path order
 */
export function getInstalledPaths(lock: LockFile): string[] {
	const seen = new Set<string>();
	const paths: string[] = [];
	for (const dep of sortedDependencies(lock)) {
		const path = getLockInstallPath(dep);
		if (!seen.has(path)) {
			seen.add(path);
			paths.push(path);
		}
	}
	return paths;
}

export function compareStrings(a: string, b: string): number {
	if (a < b) return -1;
	if (a > b) return 1;
	return 0;
}

// =============================================================================
// Serialization
// =============================================================================

function toRecord(dep: LockedDependency): LockedDependencyRecord {
	const record: LockedDependencyRecord = { repo_url: dep.repoUrl };
	if (dep.host) record.host = dep.host;
	if (dep.resolvedCommit) record.resolved_commit = dep.resolvedCommit;
	if (dep.resolvedRef) record.resolved_ref = dep.resolvedRef;
	if (dep.version) record.version = dep.version;
	if (dep.virtualPath) record.virtual_path = dep.virtualPath;
	if (dep.isVirtual) record.is_virtual = true;
	if (dep.depth !== 1) record.depth = dep.depth;
	if (dep.resolvedBy) record.resolved_by = dep.resolvedBy;
	return record;
}

function optionalString(value: unknown): string | undefined {
	if (typeof value === "string" && value.length > 0) return value;
	if (typeof value === "number") return String(value);
	if (value instanceof Date) return value.toISOString();
	return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read one dependency record; returns null when repo_url is missing.
 * `reference` is accepted as an alias of `resolved_ref`.
 */
export function dependencyFromRecord(value: unknown): LockedDependency | null {
	if (!isRecord(value)) return null;
	const repoUrl = optionalString(value.repo_url);
	if (!repoUrl) return null;

	const depth =
		typeof value.depth === "number" && Number.isInteger(value.depth) && value.depth > 0
			? value.depth
			: 1;
	const virtualPath = optionalString(value.virtual_path);

	return {
		repoUrl,
		host: optionalString(value.host),
		resolvedCommit: optionalString(value.resolved_commit),
		resolvedRef:
			optionalString(value.resolved_ref) ?? optionalString(value.reference),
		version: optionalString(value.version),
		virtualPath,
		isVirtual: value.is_virtual === true || virtualPath !== undefined,
		depth,
		resolvedBy: depth > 1 ? optionalString(value.resolved_by) : undefined,
	};
}

/**
 * Serialize a lockfile to YAML. Default-valued fields are omitted.
 */
export function lockfileToYaml(lock: LockFile): string {
	const document: Record<string, unknown> = {
		lockfile_version: lock.lockfileVersion,
		generated_at: lock.generatedAt,
	};
	if (lock.apmVersion) {
		document.apm_version = lock.apmVersion;
	}
	document.dependencies = listDependencies(lock).map(toRecord);

	return yaml.dump(document, {
		indent: 2,
		noArrayIndent: false,
		sortKeys: false,
		lineWidth: -1,
		quotingType: '"',
	});
}

/**
 * Parse a lockfile from YAML. Empty or non-mapping documents give an
 * empty lockfile; records without repo_url are skipped.
 *
 * @throws yaml.YAMLException on invalid YAML syntax
 */
export function lockfileFromYaml(content: string): LockFile {
	const data: unknown = yaml.load(content);
	const lock = createLockfile();
	if (!isRecord(data)) {
		return lock;
	}

	lock.lockfileVersion = optionalString(data.lockfile_version) ?? LOCKFILE_VERSION;
	lock.generatedAt = optionalString(data.generated_at) ?? lock.generatedAt;
	lock.apmVersion = optionalString(data.apm_version);

	if (Array.isArray(data.dependencies)) {
		for (const item of data.dependencies) {
			const dep = dependencyFromRecord(item);
			if (dep) addDependency(lock, dep);
		}
	}

	return lock;
}
