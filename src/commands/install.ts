import { resolveConfig } from "../config";
import type { IntegrationResult } from "../integration/index";
import { installProject, planInstall } from "../installer";
import { sanitizeMessage } from "../lib/host";
import { getDisplayName } from "../lib/reference";
import { printResolutionErrors } from "../lib/resolver";
import { TARGET_INFO } from "../targets";

export interface InstallOptions {
	update?: boolean;
	/** commander sets this to false for --no-integrate */
	integrate?: boolean;
	dryRun?: boolean;
	/** CLI version recorded in apm.lock */
	apmVersion?: string;
}

function printIntegration(label: string, result: IntegrationResult | undefined): void {
	if (!result) return;
	if (result.filesIntegrated > 0 || result.filesRemoved > 0) {
		console.log(
			`  ${label}: ${result.filesIntegrated} integrated, ${result.filesRemoved} removed`,
		);
	}
	for (const error of result.errors) {
		console.warn(`Warning: ${sanitizeMessage(error)}`);
	}
}

function printKept(kept: string[]): void {
	if (kept.length === 0) return;
	console.warn(
		`Warning: kept the previously installed ${kept.join(", ")} in apm.lock after the fetch failed`,
	);
}

export async function install(
	packages: string[],
	options: InstallOptions = {},
): Promise<void> {
	try {
		const projectRoot = process.cwd();
		const config = await resolveConfig({ cwd: projectRoot });

		if (options.dryRun) {
			const plan = await planInstall({ projectRoot, packages }, config);
			if (plan.length === 0) {
				console.log("No dependencies to install.");
				return;
			}
			console.log(`Would install ${plan.length} direct dependency(ies):\n`);
			for (const entry of plan) {
				const state = entry.installed ? (options.update ? "update" : "installed") : "new";
				console.log(`  ${entry.spec} -> ${config.modulesDir}/${entry.installPath} (${state})`);
			}
			console.log("\nTransitive dependencies are resolved on a real install.");
			return;
		}

		const summary = await installProject(
			{
				projectRoot,
				packages,
				update: options.update,
				integrate: options.integrate,
				apmVersion: options.apmVersion,
			},
			{ config },
		);
		const { resolution } = summary;

		if (!summary.lock) {
			printResolutionErrors(resolution.errors);
			console.error("\nError: Installation failed; apm.yml and apm.lock were not changed.");
			process.exit(1);
		}

		if (resolution.dependencies.length === 0) {
			printResolutionErrors(resolution.errors);
			printKept(summary.kept);
			if (resolution.errors.length === 0 && summary.kept.length === 0) {
				console.log("No dependencies to install.");
			}
			return;
		}

		console.log(`Installed ${resolution.dependencies.length} package(s):\n`);
		for (const dep of resolution.dependencies) {
			const indent = "  ".repeat(dep.depth);
			const via = dep.resolvedBy ? ` (via ${dep.resolvedBy})` : "";
			console.log(`${indent}${getDisplayName(dep.ref, dep.resolvedCommit)}${via}`);
		}

		for (const leaf of resolution.leaves) {
			if (leaf.reason === "manifest_invalid" || leaf.reason === "max_depth_exceeded") {
				console.warn(`Warning: ${sanitizeMessage(leaf.message)}`);
			}
		}
		printResolutionErrors(resolution.errors.filter((e) => e.type !== "manifest_invalid"));
		printKept(summary.kept);

		if (summary.added.length > 0) {
			console.log(`\nAdded to apm.yml: ${summary.added.join(", ")}`);
		}
		if (summary.pruned.length > 0) {
			console.log(`Removed ${summary.pruned.length} package(s) no longer required.`);
		}

		if (summary.targets.length > 0) {
			const names = summary.targets.map((t) => TARGET_INFO[t].displayName);
			console.log(`\nIntegrating for ${names.join(", ")}...`);
			printIntegration("Skills", summary.skills);
			printIntegration("Prompts, agents and commands", summary.integration);
		}

		if (summary.gitignoreUpdated) {
			console.log(`Added ${config.modulesDir}/ to .gitignore`);
		}
		console.log("\nLockfile written to apm.lock");
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${sanitizeMessage(message)}`);
		process.exit(1);
	}
}
