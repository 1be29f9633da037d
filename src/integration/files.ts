import { readdir, rm } from "node:fs/promises";
import { join } from "node:path";

/**
 * Outcome of one integration pass. Individual file failures are collected
 * in `errors` and never abort the pass.
 */
export interface IntegrationResult {
	filesIntegrated: number;
	filesRemoved: number;
	errors: string[];
}

export function emptyResult(): IntegrationResult {
	return { filesIntegrated: 0, filesRemoved: 0, errors: [] };
}

export function mergeResults(
	target: IntegrationResult,
	source: IntegrationResult,
): IntegrationResult {
	target.filesIntegrated += source.filesIntegrated;
	target.filesRemoved += source.filesRemoved;
	target.errors.push(...source.errors);
	return target;
}

/**
 * A package as the integrators see it
 */
export interface IntegrationPackage {
	/** Unique key (repoUrl or repoUrl/virtualPath) */
	key: string;
	/** Absolute path of the installed package */
	path: string;
	isVirtual: boolean;
}

/**
 * List files directly inside `dir` whose names end with one of `suffixes`.
 * A missing directory yields [].
 */
export async function listFiles(dir: string, suffixes: string[]): Promise<string[]> {
	try {
		const entries = await readdir(dir, { withFileTypes: true });
		return entries
			.filter((e) => e.isFile() && suffixes.some((s) => e.name.endsWith(s)))
			.map((e) => join(dir, e.name))
			.sort();
	} catch {
		return [];
	}
}

/**
 * Find source files in a package root and in the given subdirectories.
 */
export async function findPackageFiles(
	packagePath: string,
	subdirs: string[],
	suffixes: string[],
): Promise<string[]> {
	const found = await listFiles(packagePath, suffixes);
	for (const subdir of subdirs) {
		found.push(...(await listFiles(join(packagePath, subdir), suffixes)));
	}
	return found;
}

/**
 * Delete managed files (those ending in `suffix`) from a directory.
 * Anything else in the directory is left alone.
 */
export async function removeManagedFiles(
	dir: string,
	suffix: string,
): Promise<IntegrationResult> {
	const result = emptyResult();
	for (const file of await listFiles(dir, [suffix])) {
		try {
			await rm(file, { force: true });
			result.filesRemoved++;
		} catch (error) {
			result.errors.push(
				`Failed to remove ${file}: ${error instanceof Error ? error.message : String(error)}`,
			);
		}
	}
	return result;
}

/**
 * Strip a known suffix from a file name.
 */
export function stemOf(fileName: string, suffixes: string[]): string {
	const suffix = suffixes.find((s) => fileName.endsWith(s));
	return suffix ? fileName.slice(0, -suffix.length) : fileName;
}
