#!/usr/bin/env node

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import {
	configInit,
	configShow,
	depsClean,
	depsInfo,
	depsList,
	depsTree,
	init,
	install,
	sync,
	uninstall,
} from "./commands/index";

function readVersion(): string {
	const __dirname = dirname(fileURLToPath(import.meta.url));
	const packageJson: unknown = JSON.parse(
		readFileSync(join(__dirname, "..", "package.json"), "utf-8"),
	);
	if (
		typeof packageJson === "object" &&
		packageJson !== null &&
		"version" in packageJson &&
		typeof packageJson.version === "string"
	) {
		return packageJson.version;
	}
	return "0.0.0";
}

const version = readVersion();

const program = new Command();

program
	.name("apm")
	.description("Package manager for agent prompts, agents and skills")
	.version(version);

// =============================================================================
// Config commands
// =============================================================================

const configCmd = program.command("config").description("Manage apm configuration");

configCmd
	.command("show")
	.description("Show resolved configuration")
	.action(async () => {
		await configShow();
	});

configCmd
	.command("init")
	.description("Create a .apmrc file in the current directory")
	.option("--host <host>", "Default git host for owner/repo specifications")
	.option("--hosts <hosts>", "Comma-separated additional git hosts")
	.action(async (options) => {
		await configInit({ host: options.host, hosts: options.hosts });
	});

// =============================================================================
// Project commands
// =============================================================================

program
	.command("init")
	.description("Create a new apm.yml manifest in the current directory")
	.option("-n, --name <name>", "Package name")
	.option("-d, --description <desc>", "Package description")
	.option("-a, --author <author>", "Author name")
	.option("-y, --yes", "Skip prompts and use defaults")
	.option("-f, --force", "Overwrite existing apm.yml")
	.action(async (options) => {
		await init({
			name: options.name,
			description: options.description,
			author: options.author,
			yes: options.yes,
			force: options.force,
		});
	});

// =============================================================================
// Dependency commands
// =============================================================================

program
	.command("install [packages...]")
	.alias("i")
	.description(
		"Install apm.yml dependencies, or add and install packages (e.g., owner/repo#v1.0.0)",
	)
	.option("--update", "Re-fetch packages instead of reusing installed ones")
	.option("--no-integrate", "Skip integrating prompts, agents and skills")
	.option("--dry-run", "Show what would be installed without changing anything")
	.action(async (packages: string[], options) => {
		await install(packages, {
			update: options.update,
			integrate: options.integrate,
			dryRun: options.dryRun,
			apmVersion: version,
		});
	});

program
	.command("uninstall <packages...>")
	.alias("remove")
	.description("Remove packages and the dependencies only they required")
	.action(async (packages: string[]) => {
		await uninstall(packages);
	});

const depsCmd = program.command("deps").description("Inspect installed dependencies");

depsCmd
	.command("list")
	.alias("ls")
	.description("List locked dependencies")
	.option("--json", "Output as JSON")
	.action(async (options) => {
		await depsList({ json: options.json });
	});

depsCmd
	.command("tree")
	.description("Show the dependency tree recorded in apm.lock")
	.action(async () => {
		await depsTree();
	});

depsCmd
	.command("info <package>")
	.description("Show details of an installed package")
	.action(async (name: string) => {
		await depsInfo(name);
	});

depsCmd
	.command("clean")
	.description("Remove installed packages that apm.yml and apm.lock no longer reference")
	.option("-y, --yes", "Skip the confirmation prompt")
	.action(async (options) => {
		await depsClean({ yes: options.yes });
	});

program
	.command("sync")
	.description("Regenerate integrated prompts, agents, commands and hooks from apm.lock")
	.option("--skill-agents", "Also write .github/agents/{skill}.agent.md for each skill")
	.option("--dry-run", "Show what would be integrated without writing")
	.action(async (options) => {
		await sync({ skillAgents: options.skillAgents, dryRun: options.dryRun });
	});

program.parse();
