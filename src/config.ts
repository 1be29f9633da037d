import { readFile, stat, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join, parse as parsePath } from "node:path";
import * as ini from "ini";
import { ConfigError } from "./errors";

// =============================================================================
// Types
// =============================================================================

/**
 * Settings read from an .apmrc file (INI format)
 *
 * ```ini
 * ; Host used for bare owner/repo specifications
 * host = github.company.com
 * ; Additional git hosts to accept
 * hosts = git.internal.corp, code.enterprise.io
 * timeout = 30000
 * integrate = true
 * modulesDir = apm_modules
 * ```
 */
export interface ApmrcConfig {
	host?: string;
	hosts?: string[];
	timeout?: number;
	integrate?: boolean;
	modulesDir?: string;
}

/**
 * Fully resolved configuration (after cascade)
 */
export interface ResolvedConfig {
	/** Host used when a specification names none */
	defaultHost: string;
	/** Operator-configured host; set only when explicitly configured */
	overrideHost?: string;
	/** Additional supported hosts */
	extraHosts: string[];
	/** Token for GitHub-family hosts */
	githubToken?: string;
	/** Token for Azure DevOps hosts */
	adoToken?: string;
	/** Package install root, relative to the project */
	modulesDir: string;
	/** Run the integration synchronizer after install */
	integrate: boolean;
	/** Network timeout for content API calls (ms) */
	timeoutMs: number;
}

export interface ResolveConfigOptions {
	/** Directory to start the project .apmrc search from */
	cwd?: string;
	/** Environment to read (defaults to process.env) */
	env?: NodeJS.ProcessEnv;
	/** Override the user config location */
	userConfigPath?: string;
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_HOST = "github.com";
export const DEFAULT_MODULES_DIR = "apm_modules";
export const DEFAULT_TIMEOUT_MS = 30_000;
export const MANIFEST_FILENAME = "apm.yml";
export const LOCKFILE_FILENAME = "apm.lock";
export const CONFIG_FILENAME = ".apmrc";

/**
 * Get the user config file path (~/.apmrc)
 */
export function getConfigPath(): string {
	return join(homedir(), CONFIG_FILENAME);
}

/**
 * Get the package install root for a project
 */
export function getModulesDir(
	projectRoot: string,
	config?: Pick<ResolvedConfig, "modulesDir">,
): string {
	return join(projectRoot, config?.modulesDir ?? DEFAULT_MODULES_DIR);
}

/**
 * Get the lockfile path for a project (apm.lock)
 */
export function getLockfilePath(projectRoot: string): string {
	return join(projectRoot, LOCKFILE_FILENAME);
}

function isDebug(env: NodeJS.ProcessEnv = process.env): boolean {
	return Boolean(env.APM_DEBUG);
}

// =============================================================================
// INI Config Functions
// =============================================================================

function readString(value: unknown): string | undefined {
	if (typeof value !== "string") return undefined;
	const trimmed = value.trim();
	return trimmed.length > 0 ? trimmed : undefined;
}

function readBoolean(value: unknown): boolean | undefined {
	if (typeof value === "boolean") return value;
	if (typeof value === "string") {
		const lowered = value.trim().toLowerCase();
		if (["true", "1", "yes", "on"].includes(lowered)) return true;
		if (["false", "0", "no", "off"].includes(lowered)) return false;
	}
	return undefined;
}

/**
 * Split a comma-separated host list, dropping blanks and duplicates
 */
export function parseHostList(value: string | undefined): string[] {
	if (!value) return [];
	const hosts = value
		.split(",")
		.map((h) => h.trim().toLowerCase())
		.filter(Boolean);
	return [...new Set(hosts)];
}

/**
 * Parse .apmrc content.
 *
 * @throws ConfigError when a value has the wrong shape
 */
export function parseApmrc(content: string, source = CONFIG_FILENAME): ApmrcConfig {
	const parsed = ini.parse(content);
	const config: ApmrcConfig = {};

	const host = readString(parsed.host);
	if (host) config.host = host.toLowerCase();

	const hosts = readString(parsed.hosts);
	if (hosts) config.hosts = parseHostList(hosts);

	if (parsed.timeout !== undefined) {
		const timeout = Number(parsed.timeout);
		if (!Number.isInteger(timeout) || timeout <= 0) {
			throw new ConfigError(
				`Invalid timeout in ${source}: expected a positive integer (ms), got "${String(parsed.timeout)}"`,
			);
		}
		config.timeout = timeout;
	}

	if (parsed.integrate !== undefined) {
		const integrate = readBoolean(parsed.integrate);
		if (integrate === undefined) {
			throw new ConfigError(
				`Invalid integrate value in ${source}: expected true or false`,
			);
		}
		config.integrate = integrate;
	}

	const modulesDir = readString(parsed.modulesDir);
	if (modulesDir) config.modulesDir = modulesDir;

	return config;
}

/**
 * Read the user config file (~/.apmrc). Missing file yields an empty config.
 */
export async function readUserConfig(
	configPath: string = getConfigPath(),
	env: NodeJS.ProcessEnv = process.env,
): Promise<ApmrcConfig> {
	if (isDebug(env)) {
		console.log(`[config] Reading config from: ${configPath}`);
	}

	let content: string;
	try {
		content = await readFile(configPath, "utf-8");
	} catch {
		return {};
	}
	return parseApmrc(content, configPath);
}

/**
 * Find and read project config (.apmrc) by searching up the directory tree
 */
export async function findProjectConfig(
	startDir: string = process.cwd(),
	env: NodeJS.ProcessEnv = process.env,
): Promise<ApmrcConfig | null> {
	const { root } = parsePath(startDir);
	let currentDir = startDir;
	const userConfigPath = getConfigPath();

	while (true) {
		const configPath = join(currentDir, CONFIG_FILENAME);
		if (configPath !== userConfigPath && (await isFile(configPath))) {
			const content = await readFile(configPath, "utf-8");
			const parsed = parseApmrc(content, configPath);
			if (isDebug(env)) {
				console.log(
					`[config] Found project config at ${configPath}:`,
					JSON.stringify(parsed, null, 2),
				);
			}
			return parsed;
		}
		if (currentDir === root) break;
		currentDir = dirname(currentDir);
	}

	return null;
}

async function isFile(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isFile();
	} catch {
		return false;
	}
}

/**
 * Resolve the full configuration using cascade priority:
 * 1. Environment variables (GITHUB_HOST, APM_GITHUB_HOSTS, tokens, APM_NO_INTEGRATE)
 * 2. Project config (.apmrc in the project or a parent directory)
 * 3. User config (~/.apmrc)
 * 4. Defaults
 *
 * Tokens are only ever read from the environment.
 */
export async function resolveConfig(
	options: ResolveConfigOptions = {},
): Promise<ResolvedConfig> {
	const env = options.env ?? process.env;
	const userConfig = await readUserConfig(
		options.userConfigPath ?? getConfigPath(),
		env,
	);
	const projectConfig = (await findProjectConfig(options.cwd, env)) ?? {};
	const merged: ApmrcConfig = { ...userConfig, ...projectConfig };

	const envHost = readString(env.GITHUB_HOST)?.toLowerCase();
	const overrideHost = envHost ?? merged.host;

	const extraHosts = [
		...new Set([
			...(merged.hosts ?? []),
			...parseHostList(env.APM_GITHUB_HOSTS),
		]),
	];

	let integrate = merged.integrate ?? true;
	if (readBoolean(env.APM_NO_INTEGRATE) === true) {
		integrate = false;
	}

	const resolved: ResolvedConfig = {
		defaultHost: overrideHost ?? DEFAULT_HOST,
		overrideHost,
		extraHosts,
		githubToken:
			readString(env.GITHUB_APM_PAT) ??
			readString(env.GITHUB_TOKEN) ??
			readString(env.GH_TOKEN),
		adoToken: readString(env.ADO_APM_PAT),
		modulesDir: merged.modulesDir ?? DEFAULT_MODULES_DIR,
		integrate,
		timeoutMs: merged.timeout ?? DEFAULT_TIMEOUT_MS,
	};

	if (isDebug(env)) {
		console.log("[config] Resolved config:");
		console.log(`[config]   defaultHost: ${resolved.defaultHost}`);
		console.log(
			`[config]   extraHosts: ${resolved.extraHosts.join(", ") || "(none)"}`,
		);
		console.log(
			`[config]   githubToken: ${resolved.githubToken ? "***" : "(not set)"}`,
		);
		console.log(`[config]   adoToken: ${resolved.adoToken ? "***" : "(not set)"}`);
		console.log(`[config]   modulesDir: ${resolved.modulesDir}`);
		console.log(`[config]   integrate: ${resolved.integrate}`);
	}

	return resolved;
}

/**
 * Write a project .apmrc file
 */
export async function writeProjectConfig(
	projectRoot: string,
	config: ApmrcConfig,
): Promise<string> {
	const lines: string[] = ["; agent-pm project configuration", ""];

	if (config.host) lines.push(`host = ${config.host}`);
	if (config.hosts && config.hosts.length > 0) {
		lines.push(`hosts = ${config.hosts.join(", ")}`);
	}
	if (config.timeout !== undefined) lines.push(`timeout = ${config.timeout}`);
	if (config.integrate !== undefined) {
		lines.push(`integrate = ${config.integrate}`);
	}
	if (config.modulesDir) lines.push(`modulesDir = ${config.modulesDir}`);

	lines.push("");

	const configPath = join(projectRoot, CONFIG_FILENAME);
	await writeFile(configPath, lines.join("\n"));
	return configPath;
}
