import { mkdir, readFile, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import { renderFrontmatter, splitFrontmatter } from "../lib/frontmatter";
import { getTargetDir, type IntegrationTarget } from "../targets";
import {
	emptyResult,
	type IntegrationPackage,
	type IntegrationResult,
	removeManagedFiles,
	stemOf,
} from "./files";
import { findPromptFiles, PROMPT_SUFFIX } from "./prompts";

export const MANAGED_COMMAND_SUFFIX = "-apm.md";

/**
 * Frontmatter keys a Claude command keeps, with the aliases accepted for
 * each (first match wins).
 */
const COMMAND_FIELDS: ReadonlyArray<[string, string[]]> = [
	["description", ["description"]],
	["allowed-tools", ["allowed-tools", "allowedTools"]],
	["model", ["model"]],
	["argument-hint", ["argument-hint", "argumentHint"]],
];

/**
 * Convert prompt content to a Claude command: the frontmatter is reduced to
 * the fields Claude reads, and the body is kept as is.
 */
export function transformPromptToCommand(content: string): string {
	const { frontmatter, body } = splitFrontmatter(content);

	const metadata: Record<string, unknown> = {};
	for (const [key, aliases] of COMMAND_FIELDS) {
		const alias = aliases.find((a) => frontmatter?.[a] !== undefined);
		if (alias && frontmatter) {
			metadata[key] = frontmatter[alias];
		}
	}

	if (Object.keys(metadata).length === 0) {
		return body;
	}
	return renderFrontmatter(metadata, body);
}

export function getCommandTargetName(sourceFile: string): string {
	return `${stemOf(basename(sourceFile), [PROMPT_SUFFIX])}${MANAGED_COMMAND_SUFFIX}`;
}

/**
 * Write a package's prompts as `.claude/commands/{stem}-apm.md`.
 * Does nothing unless the Claude target is active.
 */
export async function integrateCommands(
	pkg: IntegrationPackage,
	projectRoot: string,
	targets: IntegrationTarget[],
): Promise<IntegrationResult> {
	const result = emptyResult();
	if (!targets.includes("claude")) return result;

	const files = await findPromptFiles(pkg.path);
	if (files.length === 0) return result;

	const targetDir = getTargetDir(projectRoot, "claude", "commands");
	await mkdir(targetDir, { recursive: true });

	for (const file of files) {
		try {
			const content = await readFile(file, "utf-8");
			await writeFile(
				join(targetDir, getCommandTargetName(file)),
				transformPromptToCommand(content),
			);
			result.filesIntegrated++;
		} catch (error) {
			result.errors.push(
				`${pkg.key}: failed to integrate command ${basename(file)}: ${error instanceof Error ? error.message : String(error)}`,
			);
		}
	}
	return result;
}

export async function cleanCommands(
	projectRoot: string,
	targets: IntegrationTarget[],
): Promise<IntegrationResult> {
	if (!targets.includes("claude")) return emptyResult();
	return removeManagedFiles(
		getTargetDir(projectRoot, "claude", "commands"),
		MANAGED_COMMAND_SUFFIX,
	);
}
