/**
 * Integration synchronizer.
 *
 * Copies prompts, agents, Claude commands and hooks out of installed
 * packages into the directories coding agents read. Every managed output
 * carries an `-apm` suffix; a sync deletes all suffixed files first and then
 * re-integrates each installed package, so removed packages leave nothing
 * behind and files a user wrote are never touched.
 */

import { join } from "node:path";
import { getLockInstallPath, getLockKey, type LockFile, listDependencies } from "../lib/lockfile";
import { pathExists } from "../modules";
import type { IntegrationTarget } from "../targets";
import { cleanAgents, integrateAgents } from "./agents";
import { cleanCommands, integrateCommands } from "./commands";
import { cleanHooks, integrateHooks } from "./hooks";
import {
	emptyResult,
	type IntegrationPackage,
	type IntegrationResult,
	mergeResults,
} from "./files";
import { cleanPrompts, integratePrompts } from "./prompts";
import { integrateSkill, syncSkills } from "./skills";

export { type IntegrationPackage, type IntegrationResult, mergeResults } from "./files";
export { toHyphenCase, validateSkillName } from "./skills";
export { type SkillAgentSyncResult, syncSkillAgents } from "./transformer";

/**
 * Installed packages named in the lock, in lock order. Entries whose
 * directory is missing are skipped.
 */
export async function packagesFromLock(
	lock: LockFile | null,
	modulesDir: string,
): Promise<IntegrationPackage[]> {
	if (!lock) return [];
	const packages: IntegrationPackage[] = [];
	for (const dep of listDependencies(lock)) {
		const path = join(modulesDir, ...getLockInstallPath(dep).split("/"));
		if (!(await pathExists(path))) continue;
		packages.push({ key: getLockKey(dep), path, isVirtual: dep.isVirtual === true });
	}
	return packages;
}

/**
 * Integrate one package's prompts, agents, commands and hooks.
 */
export async function integratePackage(
	pkg: IntegrationPackage,
	projectRoot: string,
	targets: IntegrationTarget[],
): Promise<IntegrationResult> {
	const result = emptyResult();
	if (targets.includes("vscode")) {
		mergeResults(result, await integratePrompts(pkg, projectRoot));
	}
	mergeResults(result, await integrateAgents(pkg, projectRoot, targets));
	mergeResults(result, await integrateCommands(pkg, projectRoot, targets));
	mergeResults(result, await integrateHooks(pkg, projectRoot, targets));
	return result;
}

/**
 * Remove all managed files, then re-integrate every package the lock names.
 */
export async function syncIntegration(
	lock: LockFile | null,
	modulesDir: string,
	projectRoot: string,
	targets: IntegrationTarget[],
): Promise<IntegrationResult> {
	const result = emptyResult();

	if (targets.includes("vscode")) {
		mergeResults(result, await cleanPrompts(projectRoot));
	}
	mergeResults(result, await cleanAgents(projectRoot, targets));
	mergeResults(result, await cleanCommands(projectRoot, targets));
	mergeResults(result, await cleanHooks(projectRoot, targets));

	for (const pkg of await packagesFromLock(lock, modulesDir)) {
		mergeResults(result, await integratePackage(pkg, projectRoot, targets));
	}

	if (process.env.APM_DEBUG) {
		console.log(
			`[integrate] removed ${result.filesRemoved}, integrated ${result.filesIntegrated}, errors ${result.errors.length}`,
		);
	}
	return result;
}

/**
 * Install skills for the given packages.
 */
export async function integrateSkills(
	packages: IntegrationPackage[],
	projectRoot: string,
	targets: IntegrationTarget[],
): Promise<IntegrationResult> {
	const result = emptyResult();
	for (const pkg of packages) {
		mergeResults(result, await integrateSkill(pkg, projectRoot, targets));
	}
	return result;
}

/**
 * Drop skill directories the lock's packages no longer account for.
 */
export async function pruneSkills(
	lock: LockFile | null,
	modulesDir: string,
	projectRoot: string,
	targets: IntegrationTarget[],
): Promise<IntegrationResult> {
	return syncSkills(await packagesFromLock(lock, modulesDir), projectRoot, targets);
}
