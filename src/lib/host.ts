/**
 * Git host classification and URL building.
 *
 * Supported platforms:
 * - github.com
 * - GitHub Enterprise Cloud (*.ghe.com)
 * - GitHub Enterprise Server / custom git servers (any FQDN the operator configured)
 * - Azure DevOps cloud (dev.azure.com, *.visualstudio.com)
 * - Azure DevOps Server (custom host with an org/project/repo layout)
 */

// =============================================================================
// Types
// =============================================================================

export type HostFamily =
	| "github"
	| "ghe-cloud"
	| "ghes"
	| "ado-cloud"
	| "ado-server";

/**
 * The subset of resolved configuration the host rules depend on
 */
export interface HostOptions {
	/** Operator-configured host (GITHUB_HOST) */
	overrideHost?: string;
	/** Additional accepted hosts (APM_GITHUB_HOSTS) */
	extraHosts?: string[];
}

/**
 * Azure DevOps repository coordinates
 */
export interface AdoCoordinates {
	organization: string;
	project: string;
	repo: string;
}

// =============================================================================
// Constants
// =============================================================================

const GITHUB_HOST = "github.com";
const ADO_CLOUD_HOST = "dev.azure.com";

const FQDN_LABEL = /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/i;

export const SUPPORTED_HOST_PATTERNS = [
	"github.com",
	"*.ghe.com (GitHub Enterprise Cloud)",
	"dev.azure.com",
	"*.visualstudio.com (Azure DevOps)",
	"the host set in GITHUB_HOST (GitHub Enterprise Server or another git server)",
	"hosts listed in APM_GITHUB_HOSTS",
];

// =============================================================================
// Classification
// =============================================================================

/**
 * Check whether a string is a fully-qualified domain name: at least two
 * dot-separated labels of letters, digits and inner hyphens.
 *
 * @example
 * ```typescript
 * isValidFqdn("github.company.com") // => true
 * isValidFqdn("localhost")          // => false
 * isValidFqdn("bad-.example.com")   // => false
 * ```
 */
export function isValidFqdn(host: string | null | undefined): boolean {
	if (!host) return false;
	if (host.length > 253) return false;

	const labels = host.split(".");
	if (labels.length < 2) return false;

	return labels.every((label) => FQDN_LABEL.test(label));
}

export function isGitHubCom(host: string): boolean {
	return host.toLowerCase() === GITHUB_HOST;
}

export function isGheCloudHost(host: string): boolean {
	return host.toLowerCase().endsWith(".ghe.com");
}

export function isAzureDevOpsHost(host: string): boolean {
	const h = host.toLowerCase();
	return h === ADO_CLOUD_HOST || h.endsWith(".visualstudio.com");
}

/**
 * Check whether a host is a platform this tool can fetch from.
 */
export function isSupportedGitHost(
	host: string | null | undefined,
	options: HostOptions = {},
): boolean {
	if (!host) return false;
	const h = host.toLowerCase();

	if (isGitHubCom(h) || isGheCloudHost(h) || isAzureDevOpsHost(h)) {
		return true;
	}

	if (!isValidFqdn(h)) return false;

	if (options.overrideHost && h === options.overrideHost.toLowerCase()) {
		return true;
	}

	return (options.extraHosts ?? []).some((extra) => extra.toLowerCase() === h);
}

/**
 * Classify a supported host into the URL-building family.
 *
 * @param ado - Whether the reference uses the org/project/repo layout
 */
export function getHostFamily(host: string, ado = false): HostFamily {
	const h = host.toLowerCase();
	if (isAzureDevOpsHost(h)) return "ado-cloud";
	if (ado) return "ado-server";
	if (isGitHubCom(h)) return "github";
	if (isGheCloudHost(h)) return "ghe-cloud";
	return "ghes";
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Build the guidance shown when a host is rejected.
 */
export function formatUnsupportedHostMessage(
	host: string,
	options: HostOptions = {},
): string {
	const lines = [
		`Unsupported git host: "${host}"`,
		"",
		"Supported hosts:",
		...SUPPORTED_HOST_PATTERNS.map((pattern) => `  - ${pattern}`),
	];

	if (options.overrideHost && options.overrideHost.toLowerCase() !== host.toLowerCase()) {
		lines.push(
			"",
			`GITHUB_HOST is currently set to "${options.overrideHost}", which does not match "${host}".`,
		);
	}

	lines.push(
		"",
		"To use this host, set GITHUB_HOST:",
		`  bash/zsh:    export GITHUB_HOST=${host}`,
		`  PowerShell:  $env:GITHUB_HOST = "${host}"`,
		`  cmd.exe:     set GITHUB_HOST=${host}`,
	);

	return lines.join("\n");
}

/**
 * Error thrown when a specification names a host that is not supported
 */
export class UnsupportedHostError extends Error {
	constructor(
		public readonly host: string,
		options: HostOptions = {},
	) {
		super(formatUnsupportedHostMessage(host, options));
		this.name = "UnsupportedHostError";
	}
}

// =============================================================================
// URL Builders
// =============================================================================

function encodePath(path: string): string {
	return path.split("/").map(encodeURIComponent).join("/");
}

/**
 * Build the content API URL for a single file.
 *
 * @example
 * ```typescript
 * buildContentsApiUrl("github.com", "owner/repo", "apm.yml", "main")
 * // => "https://api.github.com/repos/owner/repo/contents/apm.yml?ref=main"
 *
 * buildContentsApiUrl("github.company.com", "team/repo", "apm.yml", "main")
 * // => "https://github.company.com/api/v3/repos/team/repo/contents/apm.yml?ref=main"
 * ```
 */
export function buildContentsApiUrl(
	host: string,
	repoUrl: string,
	filePath: string,
	ref: string,
	ado?: AdoCoordinates,
): string {
	const family = getHostFamily(host, Boolean(ado));
	const query = `ref=${encodeURIComponent(ref)}`;
	const path = encodePath(filePath);

	switch (family) {
		case "github":
			return `https://api.github.com/repos/${repoUrl}/contents/${path}?${query}`;
		case "ghe-cloud":
			return `https://api.${host}/repos/${repoUrl}/contents/${path}?${query}`;
		case "ghes":
			return `https://${host}/api/v3/repos/${repoUrl}/contents/${path}?${query}`;
		case "ado-cloud":
		case "ado-server": {
			const coords = ado ?? adoCoordinatesFromRepoUrl(repoUrl);
			const base =
				family === "ado-cloud"
					? `https://${ADO_CLOUD_HOST}`
					: `https://${host}`;
			return `${base}/${coords.organization}/${coords.project}/_apis/git/repositories/${coords.repo}/items?path=${encodeURIComponent(filePath)}&versionDescriptor.version=${encodeURIComponent(ref)}&api-version=7.0`;
		}
	}
}

/**
 * Build an HTTPS clone URL, embedding the token as `https://{token}@host/...`
 * when one is provided. Callers must pass any message containing the result
 * through {@link sanitizeMessage}.
 */
export function buildHttpsCloneUrl(
	host: string,
	repoUrl: string,
	token?: string,
	ado?: AdoCoordinates,
): string {
	const family = getHostFamily(host, Boolean(ado));
	const auth = token ? `${token}@` : "";

	if (family === "ado-cloud" || family === "ado-server") {
		const coords = ado ?? adoCoordinatesFromRepoUrl(repoUrl);
		const h = family === "ado-cloud" ? ADO_CLOUD_HOST : host;
		return `https://${auth}${h}/${coords.organization}/${coords.project}/_git/${coords.repo}`;
	}

	return `https://${auth}${host}/${repoUrl}.git`;
}

/**
 * Build an SSH clone URL.
 *
 * @example
 * ```typescript
 * buildSshCloneUrl("github.com", "owner/repo")
 * // => "git@github.com:owner/repo.git"
 *
 * buildSshCloneUrl("dev.azure.com", "org/proj/repo")
 * // => "git@ssh.dev.azure.com:v3/org/proj/repo"
 * ```
 */
export function buildSshCloneUrl(
	host: string,
	repoUrl: string,
	ado?: AdoCoordinates,
): string {
	const family = getHostFamily(host, Boolean(ado));

	if (family === "ado-cloud") {
		const coords = ado ?? adoCoordinatesFromRepoUrl(repoUrl);
		return `git@ssh.${ADO_CLOUD_HOST}:v3/${coords.organization}/${coords.project}/${coords.repo}`;
	}
	if (family === "ado-server") {
		const coords = ado ?? adoCoordinatesFromRepoUrl(repoUrl);
		return `ssh://git@${host}/${coords.organization}/${coords.project}/_git/${coords.repo}`;
	}

	return `git@${host}:${repoUrl}.git`;
}

function adoCoordinatesFromRepoUrl(repoUrl: string): AdoCoordinates {
	const [organization = "", project = "", repo = ""] = repoUrl.split("/");
	return { organization, project, repo };
}

// =============================================================================
// Credential Masking
// =============================================================================

const TOKEN_URL_PATTERN = /https:\/\/[^@\s/]+@/g;
const TOKEN_LITERAL_PATTERN =
	/\b(?:ghp_|gho_|ghu_|ghs_|ghr_|github_pat_)[A-Za-z0-9_]+/g;
const TOKEN_ENV_PATTERN =
	/\b(GITHUB_TOKEN|GITHUB_APM_PAT|GH_TOKEN|ADO_APM_PAT)=\S+/g;

/**
 * Mask credentials before a message reaches any output.
 *
 * @example
 * ```typescript
 * sanitizeMessage("fatal: https://abc123@github.com/o/r.git not found")
 * // => "fatal: https://***@github.com/o/r.git not found"
 * ```
 */
export function sanitizeMessage(message: string): string {
	return message
		.replace(TOKEN_URL_PATTERN, "https://***@")
		.replace(TOKEN_LITERAL_PATTERN, "***")
		.replace(TOKEN_ENV_PATTERN, "$1=***");
}
