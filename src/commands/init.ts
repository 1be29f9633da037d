import { stat } from "node:fs/promises";
import { basename } from "node:path";
import { confirm, input } from "@inquirer/prompts";
import * as semver from "semver";
import { sanitizeMessage } from "../lib/host";
import { createMinimalManifest, manifestToYaml } from "../lib/manifest";
import { getManifestPath, writeManifest } from "../manifest";

export interface InitOptions {
	name?: string;
	description?: string;
	author?: string;
	yes?: boolean;
	force?: boolean;
}

/**
 * Turn a directory name into a package name
 */
export function sanitizeName(name: string): string {
	return name
		.toLowerCase()
		.replace(/[^a-z0-9._-]/g, "-")
		.replace(/-+/g, "-")
		.replace(/^-+|-+$/g, "");
}

/**
 * Create apm.yml in the current directory
 */
export async function init(options: InitOptions = {}): Promise<void> {
	try {
		const projectRoot = process.cwd();
		const manifestPath = getManifestPath(projectRoot);

		let exists = false;
		try {
			await stat(manifestPath);
			exists = true;
		} catch {
			// File doesn't exist, good
		}

		if (exists && !options.force) {
			console.error("Error: apm.yml already exists in this directory.");
			console.error("Use --force to overwrite.");
			process.exit(1);
		}

		const defaultName = sanitizeName(options.name || basename(projectRoot)) || "project";
		const manifest = createMinimalManifest(defaultName);
		manifest.description = options.description;
		manifest.author = options.author;

		if (!options.yes) {
			manifest.name = await input({
				message: "package name:",
				default: defaultName,
				validate: (value) =>
					(value.length > 0 && sanitizeName(value) === value) ||
					"Use lowercase letters, digits, '.', '_' and '-'",
			});
			manifest.version = await input({
				message: "version:",
				default: manifest.version,
				validate: (value) =>
					semver.valid(value) !== null || "Version must be valid semver (e.g., 1.0.0)",
			});
			manifest.description =
				(await input({ message: "description:", default: options.description ?? "" })) ||
				undefined;
			manifest.author =
				(await input({ message: "author:", default: options.author ?? "" })) || undefined;
		}

		console.log("");
		console.log(`About to write to ${manifestPath}:`);
		console.log("");
		console.log(manifestToYaml(manifest));

		if (!options.yes) {
			const ok = await confirm({ message: "Is this OK?", default: true });
			if (!ok) {
				console.log("Aborted.");
				return;
			}
		}

		await writeManifest(projectRoot, manifest);
		console.log("Created apm.yml");
		console.log("Add dependencies with: apm install owner/repo");
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${sanitizeMessage(message)}`);
		process.exit(1);
	}
}
