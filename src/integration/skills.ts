/**
 * Skill integration.
 *
 * A package with SKILL.md at its root is a skill: its directory is copied
 * to `skills/{name}/` under every active target. Sub-skills shipped under
 * `.apm/skills/{name}/SKILL.md` are promoted to top-level entries, since
 * agents only discover direct children of `skills/`.
 */

import { cp, mkdir, readdir, rm } from "node:fs/promises";
import { basename, join, relative, sep } from "node:path";
import { pathExists, SKILL_FILENAME } from "../modules";
import { getTargetDir, type IntegrationTarget } from "../targets";
import { emptyResult, type IntegrationPackage, type IntegrationResult } from "./files";

const MAX_SKILL_NAME_LENGTH = 64;
const SKILL_NAME_PATTERN = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/;
const EXCLUDED_DIRS = new Set([".apm", ".git"]);

export type SkillNameValidation = { valid: true } | { valid: false; error: string };

/**
 * Convert any package or folder name to hyphen-case.
 *
 * @example
 * ```typescript
 * toHyphenCase("owner/MyRepo_Name")  // => "my-repo-name"
 * toHyphenCase("Brand Guidelines")   // => "brand-guidelines"
 * toHyphenCase("my@package!name")    // => "mypackagename"
 * ```
 */
export function toHyphenCase(name: string): string {
	const last = name.split("/").at(-1) ?? name;
	return last
		.replace(/[_ ]/g, "-")
		.replace(/([a-z])([A-Z])/g, "$1-$2")
		.toLowerCase()
		.replace(/[^a-z0-9-]/g, "")
		.replace(/-+/g, "-")
		.replace(/^-+|-+$/g, "")
		.slice(0, MAX_SKILL_NAME_LENGTH)
		.replace(/-+$/, "");
}

/**
 * Check a skill name: 1-64 lowercase letters, digits and single inner
 * hyphens.
 */
export function validateSkillName(name: string): SkillNameValidation {
	if (name.length === 0) {
		return { valid: false, error: "Skill name cannot be empty" };
	}
	if (name.length > MAX_SKILL_NAME_LENGTH) {
		return {
			valid: false,
			error: `Skill name must be 1-${MAX_SKILL_NAME_LENGTH} characters (got ${name.length})`,
		};
	}
	if (name.includes("--")) {
		return { valid: false, error: "Skill name cannot contain consecutive hyphens" };
	}
	if (!SKILL_NAME_PATTERN.test(name)) {
		return {
			valid: false,
			error:
				"Skill name must use lowercase letters, digits and hyphens, and start and end with a letter or digit",
		};
	}
	return { valid: true };
}

/**
 * Name a skill directory is installed under: the folder name when valid,
 * its hyphen-case form otherwise.
 */
export function resolveSkillName(rawName: string): string {
	return validateSkillName(rawName).valid ? rawName : toHyphenCase(rawName);
}

function skillsRoot(projectRoot: string, target: IntegrationTarget): string {
	return getTargetDir(projectRoot, target, "skills");
}

async function listSubSkills(packagePath: string): Promise<string[]> {
	const dir = join(packagePath, ".apm", "skills");
	try {
		const entries = await readdir(dir, { withFileTypes: true });
		const found: string[] = [];
		for (const entry of entries) {
			if (!entry.isDirectory()) continue;
			const path = join(dir, entry.name);
			if (await pathExists(join(path, SKILL_FILENAME))) {
				found.push(path);
			}
		}
		return found.sort();
	} catch {
		return [];
	}
}

async function copySkillDirectory(source: string, destination: string): Promise<void> {
	await rm(destination, { recursive: true, force: true });
	await mkdir(destination, { recursive: true });
	await cp(source, destination, {
		recursive: true,
		filter: (path) => {
			const first = relative(source, path).split(sep)[0] ?? "";
			return !EXCLUDED_DIRS.has(first);
		},
	});
}

/**
 * Install a package's skill (and sub-skills) into every active target.
 * Virtual packages are single files, not skills, and are skipped.
 *
 * @returns Counts in `filesIntegrated` are skill directories written
 */
export async function integrateSkill(
	pkg: IntegrationPackage,
	projectRoot: string,
	targets: IntegrationTarget[],
): Promise<IntegrationResult> {
	const result = emptyResult();
	if (pkg.isVirtual) return result;

	const isSkill = await pathExists(join(pkg.path, SKILL_FILENAME));
	const subSkills = await listSubSkills(pkg.path);
	if (!isSkill && subSkills.length === 0) return result;

	let skillName: string | undefined;
	if (isSkill) {
		const rawName = basename(pkg.path);
		const validation = validateSkillName(rawName);
		skillName = resolveSkillName(rawName);
		if (!validation.valid) {
			console.warn(
				`Warning: Skill name '${rawName}' normalized to '${skillName}' (${validation.error})`,
			);
		}
	}

	for (const target of targets) {
		const root = skillsRoot(projectRoot, target);
		try {
			if (skillName) {
				await copySkillDirectory(pkg.path, join(root, skillName));
				result.filesIntegrated++;
			}
			for (const subSkill of subSkills) {
				const name = resolveSkillName(basename(subSkill));
				const destination = join(root, name);
				if (target === "vscode" && (await pathExists(destination))) {
					console.warn(
						`Warning: Sub-skill '${name}' from '${skillName ?? basename(pkg.path)}' overwrites existing skill at skills/${name}/`,
					);
				}
				await copySkillDirectory(subSkill, destination);
				result.filesIntegrated++;
			}
		} catch (error) {
			result.errors.push(
				`${pkg.key}: failed to install skill: ${error instanceof Error ? error.message : String(error)}`,
			);
		}
	}
	return result;
}

/**
 * Skill directory names the installed packages account for.
 */
export async function expectedSkillNames(
	packages: IntegrationPackage[],
): Promise<Set<string>> {
	const names = new Set<string>();
	for (const pkg of packages) {
		if (pkg.isVirtual) continue;
		names.add(resolveSkillName(basename(pkg.path)));
		for (const subSkill of await listSubSkills(pkg.path)) {
			names.add(resolveSkillName(basename(subSkill)));
		}
	}
	return names;
}

/**
 * Remove skill directories that no installed package accounts for.
 */
export async function syncSkills(
	packages: IntegrationPackage[],
	projectRoot: string,
	targets: IntegrationTarget[],
): Promise<IntegrationResult> {
	const result = emptyResult();
	const expected = await expectedSkillNames(packages);

	for (const target of targets) {
		const root = skillsRoot(projectRoot, target);
		let entries: string[];
		try {
			entries = (await readdir(root, { withFileTypes: true }))
				.filter((e) => e.isDirectory())
				.map((e) => e.name);
		} catch {
			continue;
		}

		for (const name of entries) {
			if (expected.has(name)) continue;
			try {
				await rm(join(root, name), { recursive: true, force: true });
				result.filesRemoved++;
			} catch (error) {
				result.errors.push(
					`Failed to remove skill ${name}: ${error instanceof Error ? error.message : String(error)}`,
				);
			}
		}
	}
	return result;
}
