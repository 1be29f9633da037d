/**
 * Uninstall command - remove packages from apm.yml, apm.lock and
 * apm_modules/, along with transitive packages nothing else requires.
 */

import { resolveConfig } from "../config";
import { uninstallPackages } from "../installer";
import { sanitizeMessage } from "../lib/host";

export async function uninstall(packages: string[]): Promise<void> {
	try {
		const projectRoot = process.cwd();
		const config = await resolveConfig({ cwd: projectRoot });

		const summary = await uninstallPackages(projectRoot, packages, config);

		for (const spec of summary.notFound) {
			console.warn(`Warning: ${spec} is not declared in apm.yml`);
		}
		for (const spec of summary.removed) {
			console.log(`Removed ${spec} from apm.yml`);
		}

		if (summary.uninstalled.length > 0) {
			console.log(`\nDeleted from ${config.modulesDir}/:`);
			for (const path of summary.uninstalled) {
				console.log(`  - ${path}`);
			}
		}

		if (summary.integration || summary.skills) {
			console.log(
				`\nRe-synced integration: ${summary.integration?.filesIntegrated ?? 0} file(s) kept, ${summary.skills?.filesRemoved ?? 0} skill(s) removed`,
			);
			for (const error of [
				...(summary.integration?.errors ?? []),
				...(summary.skills?.errors ?? []),
			]) {
				console.warn(`Warning: ${sanitizeMessage(error)}`);
			}
		}
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${sanitizeMessage(message)}`);
		process.exit(1);
	}
}
