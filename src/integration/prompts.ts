import { copyFile, mkdir } from "node:fs/promises";
import { basename, join } from "node:path";
import { getTargetDir } from "../targets";
import {
	emptyResult,
	findPackageFiles,
	type IntegrationPackage,
	type IntegrationResult,
	removeManagedFiles,
	stemOf,
} from "./files";

export const PROMPT_SUFFIX = ".prompt.md";
/** Suffix marking a prompt as managed by the package manager */
export const MANAGED_PROMPT_SUFFIX = "-apm.prompt.md";

/**
 * Target file name for a prompt: `design-review.prompt.md` becomes
 * `design-review-apm.prompt.md`.
 */
export function getPromptTargetName(sourceFile: string): string {
	return `${stemOf(basename(sourceFile), [PROMPT_SUFFIX])}${MANAGED_PROMPT_SUFFIX}`;
}

/**
 * Prompt files of a package: `*.prompt.md` in its root and `.apm/prompts/`.
 */
export function findPromptFiles(packagePath: string): Promise<string[]> {
	return findPackageFiles(packagePath, [join(".apm", "prompts")], [PROMPT_SUFFIX]);
}

/**
 * Copy a package's prompts verbatim into `.github/prompts/`.
 */
export async function integratePrompts(
	pkg: IntegrationPackage,
	projectRoot: string,
): Promise<IntegrationResult> {
	const result = emptyResult();
	const files = await findPromptFiles(pkg.path);
	if (files.length === 0) return result;

	const targetDir = getTargetDir(projectRoot, "vscode", "prompts");
	await mkdir(targetDir, { recursive: true });

	for (const file of files) {
		try {
			await copyFile(file, join(targetDir, getPromptTargetName(file)));
			result.filesIntegrated++;
		} catch (error) {
			result.errors.push(
				`${pkg.key}: failed to integrate ${basename(file)}: ${error instanceof Error ? error.message : String(error)}`,
			);
		}
	}
	return result;
}

/**
 * Remove every managed prompt from `.github/prompts/`.
 */
export function cleanPrompts(projectRoot: string): Promise<IntegrationResult> {
	return removeManagedFiles(
		getTargetDir(projectRoot, "vscode", "prompts"),
		MANAGED_PROMPT_SUFFIX,
	);
}
