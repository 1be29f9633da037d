import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { getLockfilePath } from "./config";
import {
	addDependency,
	createLockfile,
	getInstalledPaths,
	type LockedDependency,
	type LockFile,
	lockfileFromYaml,
	lockfileToYaml,
} from "./lib/lockfile";
import type { ResolvedDependency } from "./lib/resolver";

// Re-export types for command modules
export type { LockedDependency, LockFile };

/**
 * Read the project lockfile (apm.lock).
 * A missing, unreadable or corrupt file is treated as no lockfile.
 */
export async function readLockfile(
	projectRoot: string,
): Promise<LockFile | null> {
	const lockfilePath = getLockfilePath(projectRoot);

	let content: string;
	try {
		content = await readFile(lockfilePath, "utf-8");
	} catch {
		return null;
	}

	try {
		return lockfileFromYaml(content);
	} catch (error) {
		if (process.env.APM_DEBUG) {
			console.log(
				`[lockfile] Ignoring unreadable ${lockfilePath}: ${
					error instanceof Error ? error.message : String(error)
				}`,
			);
		}
		return null;
	}
}

/**
 * Install paths the project's lockfile records, deduplicated, in
 * depth-then-path order. No lockfile gives [].
 */
export async function installedPathsForProject(projectRoot: string): Promise<string[]> {
	const lock = await readLockfile(projectRoot);
	return lock ? getInstalledPaths(lock) : [];
}

/**
 * Write the lockfile atomically (temp file + rename)
 */
export async function writeLockfile(
	projectRoot: string,
	lock: LockFile,
): Promise<void> {
	const lockfilePath = getLockfilePath(projectRoot);
	await mkdir(dirname(lockfilePath), { recursive: true });

	const tempPath = `${lockfilePath}.${process.pid}.tmp`;
	try {
		await writeFile(tempPath, lockfileToYaml(lock));
		await rename(tempPath, lockfilePath);
	} catch (error) {
		await rm(tempPath, { force: true });
		throw error;
	}
}

/**
 * Convert one resolved dependency into its lock entry
 */
export function toLockedDependency(dep: ResolvedDependency): LockedDependency {
	return {
		repoUrl: dep.ref.repoUrl,
		host: dep.ref.host,
		resolvedCommit: dep.resolvedCommit,
		resolvedRef: dep.resolvedRef,
		version: dep.version,
		virtualPath: dep.ref.virtualPath,
		isVirtual: dep.ref.isVirtual,
		depth: dep.depth,
		resolvedBy: dep.depth > 1 ? dep.resolvedBy : undefined,
	};
}

/**
 * Build a lockfile from an ordered resolution. Entries keep resolution
 * order; the resolver only reports packages it materialized.
 */
export function buildLockfile(
	resolved: ResolvedDependency[],
	apmVersion?: string,
): LockFile {
	const lock = createLockfile(apmVersion);
	for (const dep of resolved) {
		addDependency(lock, toLockedDependency(dep));
	}
	return lock;
}
