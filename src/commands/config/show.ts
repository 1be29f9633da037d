import {
	CONFIG_FILENAME,
	findProjectConfig,
	getConfigPath,
	resolveConfig,
} from "../../config";
import { sanitizeMessage } from "../../lib/host";

/**
 * Show resolved configuration
 */
export async function configShow(): Promise<void> {
	try {
		const resolved = await resolveConfig();
		const projectConfig = await findProjectConfig();
		const configPath = getConfigPath();

		console.log("Resolved Configuration:\n");
		console.log(`  Default host:   ${resolved.defaultHost}`);
		console.log(`  Extra hosts:    ${resolved.extraHosts.join(", ") || "(none)"}`);
		console.log(`  GitHub token:   ${resolved.githubToken ? "***" : "(not set)"}`);
		console.log(`  ADO token:      ${resolved.adoToken ? "***" : "(not set)"}`);
		console.log(`  Modules dir:    ${resolved.modulesDir}`);
		console.log(`  Integrate:      ${resolved.integrate}`);
		console.log(`  Timeout:        ${resolved.timeoutMs}ms`);
		console.log("");
		console.log("Config Locations:");
		console.log(`  User config:    ${configPath}`);
		console.log(`  Project config: ${projectConfig ? CONFIG_FILENAME : "(none)"}`);
		console.log("");
		console.log("Environment Variables:");
		console.log(`  GITHUB_HOST:      ${process.env.GITHUB_HOST || "(not set)"}`);
		console.log(`  APM_GITHUB_HOSTS: ${process.env.APM_GITHUB_HOSTS || "(not set)"}`);
		console.log(`  GITHUB_APM_PAT:   ${process.env.GITHUB_APM_PAT ? "***" : "(not set)"}`);
		console.log(`  ADO_APM_PAT:      ${process.env.ADO_APM_PAT ? "***" : "(not set)"}`);
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${sanitizeMessage(message)}`);
		process.exit(1);
	}
}
