/**
 * .gitignore maintenance
 *
 * Installed packages are reproducible from apm.yml and apm.lock, so the
 * install root belongs in the project's .gitignore. Existing patterns are
 * matched with the same rules git uses before anything is appended.
 */

import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import ignore from "ignore";

export const GITIGNORE_FILENAME = ".gitignore";

const IGNORE_COMMENT = "# Agent packages (apm)";

/**
 * Parse ignore file content into patterns, dropping comments and blank lines
 */
export function parseIgnorePatterns(content: string): string[] {
	return content
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter((line) => line && !line.startsWith("#"));
}

/**
 * Whether a directory is already ignored by the given .gitignore content
 *
 * @example
 * ```typescript
 * isDirectoryIgnored("apm_modules\n", "apm_modules")   // => true
 * isDirectoryIgnored("/apm_*\n", "apm_modules")        // => true
 * isDirectoryIgnored("dist/\n", "apm_modules")         // => false
 * ```
 */
export function isDirectoryIgnored(content: string, directory: string): boolean {
	const ig = ignore().add(parseIgnorePatterns(content));
	return ig.ignores(`${directory.replace(/\/+$/, "")}/`);
}

/**
 * Content with an entry for the directory appended
 */
export function appendIgnoreEntry(content: string, directory: string): string {
	const entry = `${directory.replace(/\/+$/, "")}/`;
	const prefix = content.length === 0 || content.endsWith("\n") ? content : `${content}\n`;
	const separator = prefix.length > 0 ? "\n" : "";
	return `${prefix}${separator}${IGNORE_COMMENT}\n${entry}\n`;
}

/**
 * Make sure the project's .gitignore ignores the install root, creating
 * the file when needed.
 *
 * @param directory - Install root relative to the project, `/`-separated
 * @returns true when .gitignore was written
 */
export async function ensureGitignore(
	projectRoot: string,
	directory: string,
): Promise<boolean> {
	const path = join(projectRoot, GITIGNORE_FILENAME);

	let content = "";
	try {
		content = await readFile(path, "utf-8");
	} catch {
		// Created below
	}

	if (isDirectoryIgnored(content, directory)) {
		return false;
	}

	await writeFile(path, appendIgnoreEntry(content, directory));
	return true;
}
