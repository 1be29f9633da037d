/**
 * Dependency inspection commands: list, tree, info and clean.
 */

import { join } from "node:path";
import { confirm } from "@inquirer/prompts";
import { getModulesDir, resolveConfig } from "../config";
import { findProjectOrphans, removeOrphans } from "../installer";
import { findAgentFiles } from "../integration/agents";
import { findHookFiles } from "../integration/hooks";
import { findPromptFiles } from "../integration/prompts";
import { sanitizeMessage } from "../lib/host";
import {
	getLockInstallPath,
	getLockKey,
	type LockedDependency,
	type LockFile,
	listDependencies,
} from "../lib/lockfile";
import type { ApmManifest } from "../lib/manifest";
import { getPackageName } from "../lib/reference";
import { buildDependencyTree, type DependencyTreeNode } from "../lib/resolver";
import { readLockfile } from "../lockfile";
import { readManifest } from "../manifest";
import { pathExists, SKILL_FILENAME } from "../modules";

export interface DepsListOptions {
	json?: boolean;
}

export interface DepsCleanOptions {
	yes?: boolean;
}

interface DepsListRow {
	key: string;
	dependency: LockedDependency;
	installPath: string;
	installed: boolean;
}

function describeLocked(dep: LockedDependency): string {
	const host = dep.host ? `${dep.host}/` : "";
	const ref = dep.resolvedRef ?? "HEAD";
	const commit = dep.resolvedCommit ? `@${dep.resolvedCommit.slice(0, 7)}` : "";
	const version = dep.version ? ` v${dep.version}` : "";
	return `${host}${getLockKey(dep)} (${ref}${commit})${version}`;
}

/**
 * List locked packages with their install state.
 */
export async function depsList(options: DepsListOptions = {}): Promise<void> {
	try {
		const projectRoot = process.cwd();
		const config = await resolveConfig({ cwd: projectRoot });
		const lock = await readLockfile(projectRoot);

		if (!lock || lock.dependencies.size === 0) {
			console.log("No dependencies installed. Run 'apm install' first.");
			return;
		}

		const modulesDir = getModulesDir(projectRoot, config);
		const rows: DepsListRow[] = [];
		for (const dep of listDependencies(lock)) {
			const installPath = getLockInstallPath(dep);
			rows.push({
				key: getLockKey(dep),
				dependency: dep,
				installPath,
				installed: await pathExists(join(modulesDir, ...installPath.split("/"))),
			});
		}

		if (options.json) {
			console.log(JSON.stringify(rows, null, 2));
			return;
		}

		console.log("Installed dependencies:\n");
		for (const row of rows) {
			const source =
				row.dependency.depth > 1 ? `via ${row.dependency.resolvedBy ?? "?"}` : "direct";
			console.log(`  ${describeLocked(row.dependency)} [${source}]`);
			if (!row.installed) {
				console.log("    Status: MISSING (run 'apm install' to restore)");
			}
		}

		const direct = rows.filter((r) => r.dependency.depth === 1).length;
		console.log(
			`\nTotal: ${rows.length} package(s) (${direct} direct, ${rows.length - direct} transitive)`,
		);
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${sanitizeMessage(message)}`);
		process.exit(1);
	}
}

/**
 * Render the dependency tree as indented lines.
 */
export function formatDependencyTree(nodes: DependencyTreeNode[], prefix = ""): string[] {
	const lines: string[] = [];
	nodes.forEach((node, index) => {
		const last = index === nodes.length - 1;
		lines.push(`${prefix}${last ? "└── " : "├── "}${describeLocked(node.dependency)}`);
		lines.push(...formatDependencyTree(node.children, `${prefix}${last ? "    " : "│   "}`));
	});
	return lines;
}

/**
 * Print the dependency tree recorded in apm.lock.
 */
export async function depsTree(): Promise<void> {
	try {
		const lock = await readLockfile(process.cwd());
		if (!lock || lock.dependencies.size === 0) {
			console.log("No dependencies installed. Run 'apm install' first.");
			return;
		}

		console.log(".");
		for (const line of formatDependencyTree(buildDependencyTree(lock))) {
			console.log(line);
		}
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${sanitizeMessage(message)}`);
		process.exit(1);
	}
}

/**
 * What `deps info` shows about one locked package
 */
export interface PackageInfo {
	dependency: LockedDependency;
	/** Relative to the install root */
	installPath: string;
	installed: boolean;
	manifest?: ApmManifest;
	manifestError?: string;
	prompts: number;
	agents: number;
	hooks: number;
	hasSkill: boolean;
}

/**
 * Find a locked package by unique key, install path or short name.
 */
export function findLockedPackage(
	lock: LockFile,
	name: string,
): LockedDependency | undefined {
	const deps = listDependencies(lock);
	return (
		deps.find((dep) => getLockKey(dep) === name || getLockInstallPath(dep) === name) ??
		deps.find(
			(dep) =>
				getPackageName({
					repoUrl: dep.repoUrl,
					virtualPath: dep.isVirtual ? dep.virtualPath : undefined,
				}) === name,
		)
	);
}

export async function readPackageInfo(
	modulesDir: string,
	dependency: LockedDependency,
): Promise<PackageInfo> {
	const installPath = getLockInstallPath(dependency);
	const path = join(modulesDir, ...installPath.split("/"));
	const info: PackageInfo = {
		dependency,
		installPath,
		installed: await pathExists(path),
		prompts: 0,
		agents: 0,
		hooks: 0,
		hasSkill: false,
	};
	if (!info.installed) return info;

	try {
		info.manifest = (await readManifest(path)) ?? undefined;
	} catch (error) {
		info.manifestError = error instanceof Error ? error.message : String(error);
	}
	info.prompts = (await findPromptFiles(path)).length;
	info.agents = (await findAgentFiles(path)).length;
	info.hooks = (await findHookFiles(path)).length;
	info.hasSkill = await pathExists(join(path, SKILL_FILENAME));
	return info;
}

/**
 * Render package details as lines; fields without a value are omitted.
 */
export function formatPackageInfo(info: PackageInfo, modulesDir = "apm_modules"): string[] {
	const dep = info.dependency;
	const lines = [`Package: ${getLockKey(dep)}`];
	const field = (label: string, value: string | undefined): void => {
		if (value) lines.push(`  ${label}: ${value}`);
	};

	field("Name", info.manifest?.name);
	field("Version", info.manifest?.version);
	field("Description", info.manifest?.description);
	field("Author", info.manifest?.author);
	field("Type", info.manifest?.type);
	field("Source", describeLocked(dep));
	field("Depth", dep.depth > 1 ? `${dep.depth} (via ${dep.resolvedBy ?? "?"})` : "1 (direct)");
	field("Install path", `${modulesDir}/${info.installPath}`);
	field("Status", info.installed ? "installed" : "MISSING (run 'apm install' to restore)");
	field("Manifest", info.manifestError && `invalid (${info.manifestError})`);

	if (!info.installed) return lines;

	lines.push("", "Content:");
	const counts: Array<[number, string]> = [
		[info.prompts, "prompt(s)"],
		[info.agents, "agent(s)"],
		[info.hooks, "hook file(s)"],
	];
	for (const [count, label] of counts) {
		if (count > 0) lines.push(`  - ${count} ${label}`);
	}
	if (info.hasSkill) lines.push("  - skill (SKILL.md)");
	if (lines.at(-1) === "Content:") lines.push("  - No integrable content found");
	return lines;
}

/**
 * Show details of one locked package.
 */
export async function depsInfo(name: string): Promise<void> {
	try {
		const projectRoot = process.cwd();
		const config = await resolveConfig({ cwd: projectRoot });
		const lock = await readLockfile(projectRoot);
		const dependency = lock ? findLockedPackage(lock, name) : undefined;

		if (!lock || !dependency) {
			console.error(`Error: ${sanitizeMessage(`Package '${name}' is not in apm.lock`)}`);
			const keys = lock ? listDependencies(lock).map(getLockKey) : [];
			if (keys.length > 0) {
				console.log("Available packages:");
				for (const key of keys) {
					console.log(`  - ${key}`);
				}
			}
			process.exit(1);
		}

		const info = await readPackageInfo(getModulesDir(projectRoot, config), dependency);
		for (const line of formatPackageInfo(info, config.modulesDir)) {
			console.log(line);
		}
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${sanitizeMessage(message)}`);
		process.exit(1);
	}
}

/**
 * Remove installed packages that neither apm.yml nor apm.lock account for.
 */
export async function depsClean(options: DepsCleanOptions = {}): Promise<void> {
	try {
		const projectRoot = process.cwd();
		const config = await resolveConfig({ cwd: projectRoot });
		const orphans = await findProjectOrphans(projectRoot, config);

		if (orphans.length === 0) {
			console.log("No orphaned packages found.");
			return;
		}

		console.log(`Found ${orphans.length} orphaned package(s):`);
		for (const path of orphans) {
			console.log(`  - ${config.modulesDir}/${path}`);
		}

		if (!options.yes) {
			const proceed = await confirm({
				message: `Remove ${orphans.length} orphaned package(s)?`,
				default: false,
			});
			if (!proceed) {
				console.log("Aborted.");
				return;
			}
		}

		const removed = await removeOrphans(projectRoot, config, orphans);
		console.log(`Removed ${removed.length} orphaned package(s).`);
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${sanitizeMessage(message)}`);
		process.exit(1);
	}
}
