/**
 * Operations on the package install root (apm_modules/).
 */

import type { Dirent } from "node:fs";
import { readdir, readFile, rm, stat } from "node:fs/promises";
import { dirname, join, relative, sep } from "node:path";
import { MANIFEST_FILENAME } from "./config";
import { getErrorMessage } from "./errors";
import { parseManifest } from "./lib/manifest";
import type { ApmPackage } from "./lib/resolver";

export const SKILL_FILENAME = "SKILL.md";

export async function pathExists(path: string): Promise<boolean> {
	try {
		await stat(path);
		return true;
	} catch {
		return false;
	}
}

/**
 * What a materialized package directory declares about itself
 */
export interface PackageMetadata {
	package?: ApmPackage;
	manifestError?: string;
	hasManifest: boolean;
	hasSkill: boolean;
}

/**
 * Read apm.yml (if any) and check for SKILL.md in a package directory.
 * An invalid apm.yml is reported, not thrown.
 */
export async function readPackageMetadata(
	packagePath: string,
): Promise<PackageMetadata> {
	const manifestPath = join(packagePath, MANIFEST_FILENAME);
	const hasSkill = await pathExists(join(packagePath, SKILL_FILENAME));

	let content: string;
	try {
		content = await readFile(manifestPath, "utf-8");
	} catch {
		return { hasManifest: false, hasSkill };
	}

	try {
		const manifest = parseManifest(content, manifestPath);
		return {
			hasManifest: true,
			hasSkill,
			package: {
				name: manifest.name,
				version: manifest.version,
				description: manifest.description,
				author: manifest.author,
				packagePath,
				dependencies: manifest.dependencies.apm,
			},
		};
	} catch (error) {
		return { hasManifest: true, hasSkill, manifestError: getErrorMessage(error) };
	}
}

/**
 * Find installed package directories under the install root.
 * A directory counts when it holds apm.yml or SKILL.md and sits at least
 * two levels deep; the scan does not descend into a package once found.
 *
 * @returns Install paths relative to the install root, `/`-separated, sorted
 */
export async function scanInstalledPackages(modulesDir: string): Promise<string[]> {
	const found: string[] = [];

	const walk = async (dir: string, level: number): Promise<void> => {
		let entries: Dirent[];
		try {
			entries = await readdir(dir, { withFileTypes: true });
		} catch {
			return;
		}

		if (level >= 2) {
			const names = new Set(entries.filter((e) => e.isFile()).map((e) => e.name));
			if (names.has(MANIFEST_FILENAME) || names.has(SKILL_FILENAME)) {
				found.push(relative(modulesDir, dir).split(sep).join("/"));
				return;
			}
		}

		for (const entry of entries) {
			if (!entry.isDirectory() || entry.name.startsWith(".")) continue;
			await walk(join(dir, entry.name), level + 1);
		}
	};

	await walk(modulesDir, 0);
	return found.sort();
}

/**
 * Remove an installed package and any parent directories it leaves empty,
 * stopping at the install root.
 *
 * @returns false when nothing was installed at the path
 */
export async function removeInstalledPackage(
	modulesDir: string,
	installPath: string,
): Promise<boolean> {
	const target = join(modulesDir, ...installPath.split("/"));
	if (!(await pathExists(target))) return false;

	await rm(target, { recursive: true, force: true });

	let parent = dirname(target);
	while (parent !== modulesDir && parent.startsWith(modulesDir)) {
		const remaining = await readdir(parent).catch(() => null);
		if (!remaining || remaining.length > 0) break;
		await rm(parent, { recursive: true, force: true });
		parent = dirname(parent);
	}
	return true;
}
