/**
 * Project install and uninstall.
 *
 * Install resolves apm.yml (plus any newly requested packages) into
 * apm_modules/, writes apm.lock once resolution finishes, then integrates
 * the installed artifacts into the active targets. Uninstall reverses that
 * for the named packages and whatever only they pulled in.
 */

import { join } from "node:path";
import { getModulesDir, type ResolvedConfig } from "./config";
import { DeclarationConflictError, ManifestError } from "./errors";
import { downloadPackage, type FetchContext } from "./fetcher";
import {
	integrateSkills,
	type IntegrationResult,
	mergeResults,
	packagesFromLock,
	pruneSkills,
	syncIntegration,
} from "./integration/index";
import type { HostOptions } from "./lib/host";
import { ensureGitignore } from "./lib/ignore";
import {
	addDependency,
	getDependency,
	getLockInstallPath,
	getLockKey,
	hasDependency,
	type LockedDependency,
	type LockFile,
	listDependencies,
	removeDependency,
} from "./lib/lockfile";
import {
	type DependencyReference,
	getCanonicalString,
	getInstallPath,
	getUniqueKey,
	parseReference,
} from "./lib/reference";
import {
	findOrphans,
	type LoadedPackage,
	type PackageLoader,
	type ResolutionResult,
	type ResolvedReference,
	resolveDependencies,
} from "./lib/resolver";
import {
	buildLockfile,
	installedPathsForProject,
	readLockfile,
	writeLockfile,
} from "./lockfile";
import {
	addDependencies,
	getApmDependencies,
	readManifest,
	removeDependencies,
} from "./manifest";
import {
	pathExists,
	readPackageMetadata,
	removeInstalledPackage,
	scanInstalledPackages,
} from "./modules";
import { detectTargets, type IntegrationTarget } from "./targets";

// =============================================================================
// Types
// =============================================================================

export interface InstallRequest {
	projectRoot: string;
	/** Packages to add to apm.yml; empty installs what apm.yml declares */
	packages: string[];
	/** Re-fetch everything instead of reusing installed packages */
	update?: boolean;
	/** Set to false to skip integration */
	integrate?: boolean;
	/** Written to apm.lock */
	apmVersion?: string;
}

export interface InstallPlanEntry {
	spec: string;
	installPath: string;
	installed: boolean;
}

export interface InstallSummary {
	resolution: ResolutionResult;
	/** The lock that was written; null when resolution failed */
	lock: LockFile | null;
	/** Specifications added to apm.yml */
	added: string[];
	/** Install paths removed because nothing requires them any more */
	pruned: string[];
	/** Lock keys carried over from the previous lock because their fetch failed */
	kept: string[];
	targets: IntegrationTarget[];
	skills?: IntegrationResult;
	integration?: IntegrationResult;
	gitignoreUpdated: boolean;
}

export interface UninstallSummary {
	/** apm.yml entries removed */
	removed: string[];
	/** Requested packages that apm.yml does not declare */
	notFound: string[];
	/** Install paths deleted from apm_modules/ */
	uninstalled: string[];
	targets: IntegrationTarget[];
	integration?: IntegrationResult;
	skills?: IntegrationResult;
}

// =============================================================================
// Helpers
// =============================================================================

export function getHostOptions(config: ResolvedConfig): HostOptions {
	return { overrideHost: config.overrideHost, extraHosts: config.extraHosts };
}

function modulesPath(projectRoot: string, config: ResolvedConfig, installPath: string): string {
	return join(getModulesDir(projectRoot, config), ...installPath.split("/"));
}

function refMatchesLock(ref: DependencyReference, locked: LockedDependency): boolean {
	return (
		ref.reference === undefined ||
		ref.reference === locked.resolvedRef ||
		ref.reference === locked.resolvedCommit
	);
}

/**
 * Loader used by install.
 *
 * Without `update`, a package already on disk whose lock entry still
 * matches its declared ref is reused as is, and a missing one is fetched
 * at the commit the lock pinned. Everything else is fetched fresh.
 */
export function createInstallLoader(
	projectRoot: string,
	ctx: FetchContext,
	previousLock: LockFile | null,
	update = false,
): PackageLoader {
	return async (ref, context): Promise<LoadedPackage> => {
		const target = modulesPath(projectRoot, ctx.config, getInstallPath(ref));
		const locked =
			!update && previousLock ? getDependency(previousLock, context.key) : undefined;
		const lockUsable = locked !== undefined && refMatchesLock(ref, locked);

		const lockedCommit = lockUsable ? locked?.resolvedCommit : undefined;
		const lockedReference = (commit: string): ResolvedReference => ({
			originalRef: ref.reference ?? locked?.resolvedRef ?? commit,
			refType: "commit",
			resolvedCommit: commit,
			refName: locked?.resolvedRef ?? commit,
		});

		if (!update && (locked === undefined || lockUsable) && (await pathExists(target))) {
			const metadata = await readPackageMetadata(target);
			if (metadata.hasManifest || metadata.hasSkill) {
				if (process.env.APM_DEBUG) {
					console.log(`[resolve] reusing ${context.key} at ${target}`);
				}
				return {
					installPath: target,
					package: metadata.package,
					manifestError: metadata.manifestError,
					hasSkill: metadata.hasSkill,
					resolvedReference: lockedCommit ? lockedReference(lockedCommit) : undefined,
				};
			}
		}

		if (lockedCommit && !ref.isVirtual) {
			const loaded = await downloadPackage({ ...ref, reference: lockedCommit }, target, ctx);
			return { ...loaded, resolvedReference: lockedReference(lockedCommit) };
		}

		return downloadPackage(ref, target, ctx);
	};
}

/**
 * Requested packages whose canonical string apm.yml already declares.
 *
 * @throws InvalidReferenceError when a requested package cannot be parsed
 */
export function findDeclarationConflicts(
	requested: string[],
	declared: string[],
	options: HostOptions,
): string[] {
	const existing = new Set<string>();
	for (const spec of declared) {
		try {
			existing.add(getCanonicalString(parseReference(spec, options)));
		} catch {
			// Reported when the manifest is resolved
		}
	}
	return requested.filter((spec) =>
		existing.has(getCanonicalString(parseReference(spec, options))),
	);
}

/**
 * Copy into `lock` the previous entries of packages that failed to fetch,
 * along with the entries they pulled in, so that neither is pruned.
 *
 * @returns Keys carried over, in previous lock order
 */
export function keepFailedEntries(
	lock: LockFile,
	previousLock: LockFile,
	resolution: ResolutionResult,
): string[] {
	const failed = new Set(
		resolution.errors.filter((e) => e.type === "fetch_error").map((e) => e.package),
	);
	const keptRepos = new Set<string>();
	const kept: string[] = [];

	let changed = true;
	while (changed) {
		changed = false;
		for (const dep of listDependencies(previousLock)) {
			const key = getLockKey(dep);
			if (hasDependency(lock, key)) continue;
			const viaKept = dep.resolvedBy !== undefined && keptRepos.has(dep.resolvedBy);
			if (!failed.has(key) && !viaKept) continue;
			addDependency(lock, dep);
			keptRepos.add(dep.repoUrl);
			kept.push(key);
			changed = true;
		}
	}

	const order = listDependencies(previousLock).map(getLockKey);
	return kept.sort((a, b) => order.indexOf(a) - order.indexOf(b));
}

// =============================================================================
// Install
// =============================================================================

/**
 * What an install would do, without fetching or writing anything.
 */
export async function planInstall(
	request: Pick<InstallRequest, "projectRoot" | "packages">,
	config: ResolvedConfig,
): Promise<InstallPlanEntry[]> {
	const hostOptions = getHostOptions(config);
	const declared = await getApmDependencies(request.projectRoot);

	const conflicts = findDeclarationConflicts(request.packages, declared, hostOptions);
	if (conflicts.length > 0) {
		throw new DeclarationConflictError(conflicts);
	}

	const plan: InstallPlanEntry[] = [];
	for (const spec of [...declared, ...request.packages]) {
		const installPath = getInstallPath(parseReference(spec, hostOptions));
		plan.push({
			spec,
			installPath,
			installed: await pathExists(modulesPath(request.projectRoot, config, installPath)),
		});
	}
	return plan;
}

/**
 * Resolve, materialize, lock and integrate a project's dependencies.
 *
 * A declaration conflict aborts before anything is written. When an
 * explicitly requested package fails, apm.yml and apm.lock are left alone
 * and `lock` is null.
 */
export async function installProject(
	request: InstallRequest,
	ctx: FetchContext,
): Promise<InstallSummary> {
	const { projectRoot, packages } = request;
	const config = ctx.config;
	const hostOptions = getHostOptions(config);

	const declared = await getApmDependencies(projectRoot);

	const conflicts = findDeclarationConflicts(packages, declared, hostOptions);
	if (conflicts.length > 0) {
		throw new DeclarationConflictError(conflicts);
	}

	const requested = [...new Set(packages)];
	const explicit = new Set(
		requested.map((spec) => getUniqueKey(parseReference(spec, hostOptions))),
	);

	const previousLock = await readLockfile(projectRoot);
	const loader = createInstallLoader(projectRoot, ctx, previousLock, request.update);
	const resolution = await resolveDependencies([...declared, ...requested], loader, {
		...hostOptions,
		explicit,
	});

	const summary: InstallSummary = {
		resolution,
		lock: null,
		added: [],
		pruned: [],
		kept: [],
		targets: [],
		gitignoreUpdated: false,
	};
	if (!resolution.success) {
		return summary;
	}

	if (requested.length > 0) {
		await addDependencies(projectRoot, requested);
		summary.added = requested;
	}

	const lock = buildLockfile(resolution.dependencies, request.apmVersion);
	if (previousLock) {
		summary.kept = keepFailedEntries(lock, previousLock, resolution);
	}
	await writeLockfile(projectRoot, lock);
	summary.lock = lock;

	// Packages the previous lock installed that nothing requires any more
	if (previousLock) {
		for (const dep of listDependencies(previousLock)) {
			if (lock.dependencies.has(getLockKey(dep))) continue;
			const installPath = getLockInstallPath(dep);
			if (await removeInstalledPackage(getModulesDir(projectRoot, config), installPath)) {
				summary.pruned.push(installPath);
			}
		}
	}

	const integrate = request.integrate !== false && config.integrate;
	if (integrate) {
		const modulesDir = getModulesDir(projectRoot, config);
		summary.targets = await detectTargets(projectRoot);
		summary.skills = await integrateSkills(
			await packagesFromLock(lock, modulesDir),
			projectRoot,
			summary.targets,
		);
		if (summary.pruned.length > 0) {
			mergeResults(
				summary.skills,
				await pruneSkills(lock, modulesDir, projectRoot, summary.targets),
			);
		}
		summary.integration = await syncIntegration(
			lock,
			modulesDir,
			projectRoot,
			summary.targets,
		);
	}

	summary.gitignoreUpdated = await ensureGitignore(projectRoot, config.modulesDir);
	return summary;
}

// =============================================================================
// Uninstall
// =============================================================================

/**
 * Unique keys reachable from the given specifications, following the
 * dependencies declared by packages already on disk.
 */
export async function findReachableKeys(
	specs: string[],
	modulesDir: string,
	options: HostOptions,
): Promise<Set<string>> {
	const reached = new Set<string>();
	const queue = [...specs];

	while (queue.length > 0) {
		const spec = queue.shift();
		if (spec === undefined) continue;

		let ref: DependencyReference;
		try {
			ref = parseReference(spec, options);
		} catch {
			continue;
		}
		const key = getUniqueKey(ref);
		if (reached.has(key)) continue;
		reached.add(key);

		const metadata = await readPackageMetadata(
			join(modulesDir, ...getInstallPath(ref).split("/")),
		);
		queue.push(...(metadata.package?.dependencies ?? []));
	}
	return reached;
}

/**
 * Remove packages from apm.yml, apm.lock and apm_modules/, together with
 * transitive packages nothing else requires, then re-sync integration.
 *
 * @throws ManifestError when there is no apm.yml
 * @throws Error when none of the packages is declared
 */
export async function uninstallPackages(
	projectRoot: string,
	packages: string[],
	config: ResolvedConfig,
	options: { integrate?: boolean } = {},
): Promise<UninstallSummary> {
	const hostOptions = getHostOptions(config);
	const modulesDir = getModulesDir(projectRoot, config);

	const manifest = await readManifest(projectRoot);
	if (!manifest) {
		throw new ManifestError("No apm.yml found in the current directory");
	}
	const declared = manifest.dependencies.apm;

	const declaredKeys = new Map<string, string>();
	for (const spec of declared) {
		try {
			declaredKeys.set(spec, getUniqueKey(parseReference(spec, hostOptions)));
		} catch {
			// Unparseable entries can only be removed by their exact text
			declaredKeys.set(spec, spec);
		}
	}

	const removed: string[] = [];
	const notFound: string[] = [];
	const removedKeys = new Set<string>();
	for (const requestedSpec of packages) {
		let key: string;
		try {
			key = getUniqueKey(parseReference(requestedSpec, hostOptions));
		} catch {
			key = requestedSpec;
		}
		const matches = declared.filter(
			(spec) => spec === requestedSpec || declaredKeys.get(spec) === key,
		);
		if (matches.length === 0) {
			notFound.push(requestedSpec);
			continue;
		}
		for (const spec of matches) {
			if (!removed.includes(spec)) removed.push(spec);
		}
		removedKeys.add(key);
	}

	if (removed.length === 0) {
		throw new Error(`No matching packages declared in apm.yml: ${notFound.join(", ")}`);
	}

	await removeDependencies(projectRoot, removed);

	const remaining = declared.filter((spec) => !removed.includes(spec));
	const reachable = await findReachableKeys(remaining, modulesDir, hostOptions);

	const summary: UninstallSummary = {
		removed,
		notFound,
		uninstalled: [],
		targets: [],
	};

	const lock = await readLockfile(projectRoot);
	const toDelete = new Set<string>();
	if (lock) {
		for (const dep of listDependencies(lock)) {
			const key = getLockKey(dep);
			if (reachable.has(key)) continue;
			removeDependency(lock, key);
			toDelete.add(getLockInstallPath(dep));
		}
		await writeLockfile(projectRoot, lock);
	}
	for (const spec of removed) {
		try {
			const ref = parseReference(spec, hostOptions);
			if (!reachable.has(getUniqueKey(ref))) {
				toDelete.add(getInstallPath(ref));
			}
		} catch {
			// Nothing was ever installed for it
		}
	}

	for (const installPath of toDelete) {
		if (await removeInstalledPackage(modulesDir, installPath)) {
			summary.uninstalled.push(installPath);
		}
	}

	if (options.integrate !== false && config.integrate) {
		summary.targets = await detectTargets(projectRoot);
		summary.integration = await syncIntegration(
			lock,
			modulesDir,
			projectRoot,
			summary.targets,
		);
		summary.skills = await pruneSkills(lock, modulesDir, projectRoot, summary.targets);
	}
	return summary;
}

// =============================================================================
// Orphans
// =============================================================================

/**
 * Installed package paths neither apm.yml nor apm.lock account for.
 */
export async function findProjectOrphans(
	projectRoot: string,
	config: ResolvedConfig,
): Promise<string[]> {
	const declared = await getApmDependencies(projectRoot);
	const installed = await scanInstalledPackages(getModulesDir(projectRoot, config));
	return findOrphans(
		installed,
		declared,
		await installedPathsForProject(projectRoot),
		getHostOptions(config),
	);
}

/**
 * Delete the given orphaned install paths.
 *
 * @returns Paths actually removed
 */
export async function removeOrphans(
	projectRoot: string,
	config: ResolvedConfig,
	orphans: string[],
): Promise<string[]> {
	const modulesDir = getModulesDir(projectRoot, config);
	const removed: string[] = [];
	for (const installPath of orphans) {
		if (await removeInstalledPackage(modulesDir, installPath)) {
			removed.push(installPath);
		}
	}
	return removed;
}
