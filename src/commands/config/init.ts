import { stat } from "node:fs/promises";
import { join } from "node:path";
import { CONFIG_FILENAME, parseHostList, writeProjectConfig } from "../../config";
import { sanitizeMessage } from "../../lib/host";

export interface ConfigInitOptions {
	host?: string;
	hosts?: string;
}

/**
 * Create a .apmrc file in the current directory (INI format)
 */
export async function configInit(options: ConfigInitOptions = {}): Promise<void> {
	try {
		const projectRoot = process.cwd();
		const configPath = join(projectRoot, CONFIG_FILENAME);

		let exists = false;
		try {
			await stat(configPath);
			exists = true;
		} catch {
			// File doesn't exist, good
		}
		if (exists) {
			console.error(`Error: ${CONFIG_FILENAME} already exists in this directory.`);
			process.exit(1);
		}

		const hosts = parseHostList(options.hosts);
		await writeProjectConfig(projectRoot, {
			host: options.host?.trim().toLowerCase() || undefined,
			hosts: hosts.length > 0 ? hosts : undefined,
		});

		console.log(`Created ${CONFIG_FILENAME}`);
		console.log("Note: .apmrc should be committed to version control.");
		console.log("Tokens should NOT be stored here - use GITHUB_APM_PAT or ADO_APM_PAT instead.");
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${sanitizeMessage(message)}`);
		process.exit(1);
	}
}
