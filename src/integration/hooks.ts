/**
 * Hook integration.
 *
 * A hook file maps event names to matcher lists:
 *
 * ```json
 * { "hooks": { "PreToolUse": [{ "hooks": [{ "type": "command", "command": "./scripts/check.sh" }] }] } }
 * ```
 *
 * VS Code reads one file per hook set from `.github/hooks/`; Claude reads the
 * `hooks` key of `.claude/settings.json`. Scripts a command points at are
 * copied beside the integrated hooks and the command is rewritten to them.
 */

import { copyFile, mkdir, readdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from "node:path";
import type { IntegrationTarget } from "../targets";
import {
	emptyResult,
	type IntegrationPackage,
	type IntegrationResult,
	listFiles,
	mergeResults,
	removeManagedFiles,
} from "./files";

/** Package directories searched for hook files */
export const HOOK_DIRS = [".apm/hooks", "hooks"];

export const MANAGED_HOOK_SUFFIX = "-apm.json";
const MANAGED_SCRIPTS_SUFFIX = "-apm";

/** Marks settings.json matchers written by integration */
export const APM_SOURCE_KEY = "_apm_source";

const PLUGIN_ROOT_PATTERN = /\$\{CLAUDE_PLUGIN_ROOT\}\/(\S+)/g;
const RELATIVE_PATTERN = /(^|\s)\.\/(\S+)/g;

type JsonObject = Record<string, unknown>;

/**
 * A script to copy; `target` is relative to the project root.
 */
export interface ScriptCopy {
	source: string;
	target: string;
}

export interface RewrittenCommand {
	command: string;
	scripts: ScriptCopy[];
}

function isRecord(value: unknown): value is JsonObject {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function isFile(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isFile();
	} catch {
		return false;
	}
}

function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export async function findHookFiles(packagePath: string): Promise<string[]> {
	const files: string[] = [];
	for (const dir of HOOK_DIRS) {
		files.push(...(await listFiles(join(packagePath, ...dir.split("/")), [".json"])));
	}
	return files;
}

/**
 * Where a package's scripts are copied for a target, relative to the
 * project root.
 */
export function getScriptsDir(target: IntegrationTarget, packageName: string): string {
	const dir = `${packageName}${MANAGED_SCRIPTS_SUFFIX}`;
	return target === "vscode" ? `.github/hooks/scripts/${dir}` : `.claude/hooks/${dir}`;
}

async function toScriptCopy(
	packagePath: string,
	path: string,
	scriptsDir: string,
): Promise<ScriptCopy | null> {
	const source = resolve(packagePath, path);
	const inside = relative(packagePath, source);
	if (inside === "" || inside.startsWith("..") || isAbsolute(inside)) return null;
	if (!(await isFile(source))) return null;
	return { source, target: `${scriptsDir}/${inside.split(sep).join("/")}` };
}

/**
 * Point `${CLAUDE_PLUGIN_ROOT}/...` and `./...` references at the copied
 * scripts. References to files the package does not contain, and system
 * commands, are left as written.
 *
 * @example
 * ```typescript
 * await rewriteHookCommand("./scripts/check.sh --strict", pkgPath, ".github/hooks/scripts/guard-apm")
 * // => { command: ".github/hooks/scripts/guard-apm/scripts/check.sh --strict", scripts: [...] }
 * ```
 */
export async function rewriteHookCommand(
	command: string,
	packagePath: string,
	scriptsDir: string,
): Promise<RewrittenCommand> {
	const copies = new Map<string, ScriptCopy>();
	for (const match of command.matchAll(PLUGIN_ROOT_PATTERN)) {
		const copy = await toScriptCopy(packagePath, match[1], scriptsDir);
		if (copy) copies.set(match[0], copy);
	}
	for (const match of command.matchAll(RELATIVE_PATTERN)) {
		const copy = await toScriptCopy(packagePath, match[2], scriptsDir);
		if (copy) copies.set(`./${match[2]}`, copy);
	}

	const rewritten = command
		.replace(PLUGIN_ROOT_PATTERN, (ref: string) => copies.get(ref)?.target ?? ref)
		.replace(RELATIVE_PATTERN, (whole: string, lead: string, path: string) => {
			const copy = copies.get(`./${path}`);
			return copy ? `${lead}${copy.target}` : whole;
		});
	return { command: rewritten, scripts: [...copies.values()] };
}

/**
 * Copy of a hook file's `hooks` map with every command rewritten.
 */
async function rewriteHooks(
	hooks: JsonObject,
	packagePath: string,
	scriptsDir: string,
): Promise<{ hooks: JsonObject; scripts: ScriptCopy[] }> {
	const copy = structuredClone(hooks);
	const scripts: ScriptCopy[] = [];
	for (const matchers of Object.values(copy)) {
		if (!Array.isArray(matchers)) continue;
		const list: unknown[] = matchers;
		for (const matcher of list) {
			if (!isRecord(matcher) || !Array.isArray(matcher.hooks)) continue;
			const entries: unknown[] = matcher.hooks;
			for (const hook of entries) {
				if (!isRecord(hook) || typeof hook.command !== "string") continue;
				const rewritten = await rewriteHookCommand(hook.command, packagePath, scriptsDir);
				hook.command = rewritten.command;
				scripts.push(...rewritten.scripts);
			}
		}
	}
	return { hooks: copy, scripts };
}

/**
 * The `hooks` map of a hook file, or null when the file is not a JSON
 * object with one.
 */
async function readHookFile(file: string): Promise<JsonObject | null> {
	try {
		const data: unknown = JSON.parse(await readFile(file, "utf-8"));
		return isRecord(data) && isRecord(data.hooks) ? data.hooks : null;
	} catch (error) {
		if (process.env.APM_DEBUG) {
			console.log(`[integrate] Skipping hook file ${file}: ${describeError(error)}`);
		}
		return null;
	}
}

async function copyScripts(projectRoot: string, scripts: ScriptCopy[]): Promise<void> {
	for (const script of scripts) {
		const target = join(projectRoot, ...script.target.split("/"));
		await mkdir(dirname(target), { recursive: true });
		await copyFile(script.source, target);
	}
}

/**
 * Append matchers to the event lists of a settings object, tagging each
 * with the package that contributed it.
 */
export function mergeSettingsHooks(
	settings: JsonObject,
	hooks: JsonObject,
	source: string,
): void {
	const merged: JsonObject = isRecord(settings.hooks) ? settings.hooks : {};
	for (const [event, matchers] of Object.entries(hooks)) {
		if (!Array.isArray(matchers)) continue;
		const incoming: unknown[] = matchers;
		const existing = merged[event];
		const list: unknown[] = Array.isArray(existing) ? existing : [];
		for (const matcher of incoming) {
			if (isRecord(matcher)) {
				list.push({ ...matcher, [APM_SOURCE_KEY]: source });
			}
		}
		merged[event] = list;
	}
	settings.hooks = merged;
}

/**
 * Drop tagged matchers, and events they leave empty, from a settings object.
 *
 * @returns Whether anything was removed
 */
export function removeTaggedHooks(settings: JsonObject): boolean {
	const hooks = settings.hooks;
	if (!isRecord(hooks)) return false;

	let modified = false;
	for (const [event, matchers] of Object.entries(hooks)) {
		if (!Array.isArray(matchers)) continue;
		const list: unknown[] = matchers;
		const kept = list.filter((m) => !(isRecord(m) && APM_SOURCE_KEY in m));
		if (kept.length === list.length) continue;
		modified = true;
		if (kept.length > 0) {
			hooks[event] = kept;
		} else {
			delete hooks[event];
		}
	}
	if (modified && Object.keys(hooks).length === 0) {
		delete settings.hooks;
	}
	return modified;
}

function getSettingsPath(projectRoot: string): string {
	return join(projectRoot, ".claude", "settings.json");
}

/**
 * Read `.claude/settings.json`. A missing file is an empty object; one
 * that does not hold a JSON object is an error.
 */
async function readSettings(path: string): Promise<JsonObject> {
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch {
		return {};
	}
	const parsed: unknown = JSON.parse(content);
	if (!isRecord(parsed)) {
		throw new Error(`${path} does not contain a JSON object`);
	}
	return parsed;
}

async function writeJson(path: string, value: unknown): Promise<void> {
	await mkdir(dirname(path), { recursive: true });
	await writeFile(path, `${JSON.stringify(value, null, 2)}\n`);
}

/**
 * Integrate a package's hooks: `.github/hooks/{pkg}-{stem}-apm.json` for
 * VS Code, and tagged entries in `.claude/settings.json` for Claude.
 */
export async function integrateHooks(
	pkg: IntegrationPackage,
	projectRoot: string,
	targets: IntegrationTarget[],
): Promise<IntegrationResult> {
	const result = emptyResult();
	const files = await findHookFiles(pkg.path);
	if (files.length === 0) return result;

	const packageName = basename(pkg.path);
	const claudeHooks: JsonObject[] = [];

	for (const file of files) {
		const hooks = await readHookFile(file);
		if (!hooks) continue;

		try {
			if (targets.includes("vscode")) {
				const rewritten = await rewriteHooks(
					hooks,
					pkg.path,
					getScriptsDir("vscode", packageName),
				);
				await writeJson(
					join(
						projectRoot,
						".github",
						"hooks",
						`${packageName}-${basename(file, ".json")}${MANAGED_HOOK_SUFFIX}`,
					),
					{ hooks: rewritten.hooks },
				);
				await copyScripts(projectRoot, rewritten.scripts);
				result.filesIntegrated++;
			}
			if (targets.includes("claude")) {
				const rewritten = await rewriteHooks(
					hooks,
					pkg.path,
					getScriptsDir("claude", packageName),
				);
				await copyScripts(projectRoot, rewritten.scripts);
				claudeHooks.push(rewritten.hooks);
			}
		} catch (error) {
			result.errors.push(
				`${pkg.key}: failed to integrate hooks ${basename(file)}: ${describeError(error)}`,
			);
		}
	}

	if (claudeHooks.length > 0) {
		const settingsPath = getSettingsPath(projectRoot);
		try {
			const settings = await readSettings(settingsPath);
			for (const hooks of claudeHooks) {
				mergeSettingsHooks(settings, hooks, packageName);
			}
			await writeJson(settingsPath, settings);
			result.filesIntegrated += claudeHooks.length;
		} catch (error) {
			result.errors.push(
				`${pkg.key}: failed to update ${settingsPath}: ${describeError(error)}`,
			);
		}
	}
	return result;
}

/**
 * Delete `*-apm` directories directly inside `dir`.
 */
async function removeManagedDirs(dir: string): Promise<IntegrationResult> {
	const result = emptyResult();
	let names: string[];
	try {
		const entries = await readdir(dir, { withFileTypes: true });
		names = entries
			.filter((e) => e.isDirectory() && e.name.endsWith(MANAGED_SCRIPTS_SUFFIX))
			.map((e) => e.name);
	} catch {
		return result;
	}
	for (const name of names) {
		try {
			await rm(join(dir, name), { recursive: true, force: true });
			result.filesRemoved++;
		} catch (error) {
			result.errors.push(`Failed to remove ${join(dir, name)}: ${describeError(error)}`);
		}
	}
	return result;
}

/**
 * Remove managed hook files, copied scripts and tagged settings entries.
 */
export async function cleanHooks(
	projectRoot: string,
	targets: IntegrationTarget[],
): Promise<IntegrationResult> {
	const result = emptyResult();

	if (targets.includes("vscode")) {
		const hooksDir = join(projectRoot, ".github", "hooks");
		mergeResults(result, await removeManagedFiles(hooksDir, MANAGED_HOOK_SUFFIX));
		mergeResults(result, await removeManagedDirs(join(hooksDir, "scripts")));
	}

	if (targets.includes("claude")) {
		mergeResults(result, await removeManagedDirs(join(projectRoot, ".claude", "hooks")));

		const settingsPath = getSettingsPath(projectRoot);
		try {
			const settings = await readSettings(settingsPath);
			if (removeTaggedHooks(settings)) {
				await writeJson(settingsPath, settings);
				result.filesRemoved++;
			}
		} catch (error) {
			result.errors.push(`Failed to clean ${settingsPath}: ${describeError(error)}`);
		}
	}
	return result;
}
