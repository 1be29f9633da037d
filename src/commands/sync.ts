import { getModulesDir, resolveConfig } from "../config";
import { packagesFromLock, syncIntegration, syncSkillAgents } from "../integration/index";
import { sanitizeMessage } from "../lib/host";
import { readLockfile } from "../lockfile";
import { detectTargets, TARGET_INFO } from "../targets";

export interface SyncOptions {
	/** Also write legacy `.github/agents/{skill}.agent.md` files */
	skillAgents?: boolean;
	dryRun?: boolean;
}

/**
 * Regenerate integrated prompts, agents, commands and hooks from apm.lock
 * without fetching anything.
 */
export async function sync(options: SyncOptions = {}): Promise<void> {
	try {
		const projectRoot = process.cwd();
		const config = await resolveConfig({ cwd: projectRoot });
		const modulesDir = getModulesDir(projectRoot, config);
		const lock = await readLockfile(projectRoot);
		const targets = await detectTargets(projectRoot);

		if (options.dryRun) {
			const packages = await packagesFromLock(lock, modulesDir);
			console.log(
				`Would integrate ${packages.length} package(s) for ${targets.map((t) => TARGET_INFO[t].displayName).join(", ")}`,
			);
			for (const pkg of packages) {
				console.log(`  - ${pkg.key}`);
			}
		} else {
			const result = await syncIntegration(lock, modulesDir, projectRoot, targets);
			console.log(
				`Synced: ${result.filesIntegrated} file(s) integrated, ${result.filesRemoved} stale file(s) removed`,
			);
			for (const error of result.errors) {
				console.warn(`Warning: ${sanitizeMessage(error)}`);
			}
		}

		if (options.skillAgents) {
			const agents = await syncSkillAgents(
				await packagesFromLock(lock, modulesDir),
				projectRoot,
				{ dryRun: options.dryRun },
			);
			const verb = options.dryRun ? "Would write" : "Wrote";
			for (const path of agents.written) {
				console.log(`  ${verb} ${path}`);
			}
			console.log(
				`Skill agents: ${agents.written.length} written, ${agents.current.length} up to date`,
			);
		}
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${sanitizeMessage(message)}`);
		process.exit(1);
	}
}
