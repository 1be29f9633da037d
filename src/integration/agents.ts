import { copyFile, mkdir } from "node:fs/promises";
import { basename, join } from "node:path";
import { getTargetDir, type IntegrationTarget } from "../targets";
import {
	emptyResult,
	findPackageFiles,
	type IntegrationPackage,
	type IntegrationResult,
	mergeResults,
	removeManagedFiles,
	stemOf,
} from "./files";

export const AGENT_SUFFIXES = [".agent.md", ".chatmode.md"];
export const MANAGED_AGENT_SUFFIX = "-apm.agent.md";
export const MANAGED_CLAUDE_AGENT_SUFFIX = "-apm.md";

/**
 * Target file name for an agent. Chat modes are renamed to agents:
 * `security.agent.md` and `security.chatmode.md` both become
 * `security-apm.agent.md` (or `security-apm.md` for Claude).
 */
export function getAgentTargetName(
	sourceFile: string,
	target: IntegrationTarget,
): string {
	const stem = stemOf(basename(sourceFile), AGENT_SUFFIXES);
	return target === "claude"
		? `${stem}${MANAGED_CLAUDE_AGENT_SUFFIX}`
		: `${stem}${MANAGED_AGENT_SUFFIX}`;
}

/**
 * Agent files of a package: root, `.apm/agents/` and `.apm/chatmodes/`.
 */
export function findAgentFiles(packagePath: string): Promise<string[]> {
	return findPackageFiles(
		packagePath,
		[join(".apm", "agents"), join(".apm", "chatmodes")],
		AGENT_SUFFIXES,
	);
}

/**
 * Copy a package's agents into each active target's `agents/` directory.
 */
export async function integrateAgents(
	pkg: IntegrationPackage,
	projectRoot: string,
	targets: IntegrationTarget[],
): Promise<IntegrationResult> {
	const result = emptyResult();
	const files = await findAgentFiles(pkg.path);
	if (files.length === 0) return result;

	for (const target of targets) {
		const targetDir = getTargetDir(projectRoot, target, "agents");
		await mkdir(targetDir, { recursive: true });

		for (const file of files) {
			try {
				await copyFile(file, join(targetDir, getAgentTargetName(file, target)));
				result.filesIntegrated++;
			} catch (error) {
				result.errors.push(
					`${pkg.key}: failed to integrate ${basename(file)}: ${error instanceof Error ? error.message : String(error)}`,
				);
			}
		}
	}
	return result;
}

/**
 * Remove managed agents from each active target.
 */
export async function cleanAgents(
	projectRoot: string,
	targets: IntegrationTarget[],
): Promise<IntegrationResult> {
	const result = emptyResult();
	for (const target of targets) {
		const suffix =
			target === "claude" ? MANAGED_CLAUDE_AGENT_SUFFIX : MANAGED_AGENT_SUFFIX;
		mergeResults(
			result,
			await removeManagedFiles(getTargetDir(projectRoot, target, "agents"), suffix),
		);
	}
	return result;
}
