import { InvalidReferenceError } from "../errors";
import {
	type AdoCoordinates,
	type HostOptions,
	isAzureDevOpsHost,
	isSupportedGitHost,
	isValidFqdn,
	UnsupportedHostError,
} from "./host";

/**
 * Parsed package specification (from apm.yml or CLI input)
 *
 * Formats:
 * - owner/repo[#ref][@alias]
 * - host/owner/repo
 * - https://host/owner/repo(.git), git@host:owner/repo.git
 * - dev.azure.com/org/project/_git/repo, dev.azure.com/org/project/repo
 * - owner/repo/path/to/file.prompt.md (virtual file package)
 * - owner/repo/collections/name (virtual collection package)
 */
export interface DependencyReference {
	/** Explicit host; undefined means the configured default host */
	readonly host?: string;
	/** Repository path: owner/repo, or org/project/repo on Azure DevOps */
	readonly repoUrl: string;
	/** Branch, tag or commit from the #ref suffix */
	readonly reference?: string;
	/** Local alias from the @alias suffix */
	readonly alias?: string;
	/** Repository-relative path of a single file or collection */
	readonly virtualPath?: string;
	readonly isVirtual: boolean;
	/** Azure DevOps coordinates */
	readonly ado?: AdoCoordinates;
}

export type VirtualKind = "file" | "collection";

/** Ref used when a specification pins none */
export const DEFAULT_REF = "main";

/**
 * File extensions that make a sub-path a single-file virtual package,
 * mapped to the .apm/ subdirectory they are placed in.
 */
export const VIRTUAL_FILE_EXTENSIONS: Record<string, string> = {
	".prompt.md": "prompts",
	".instructions.md": "instructions",
	".chatmode.md": "chatmodes",
	".agent.md": "agents",
};

const SEGMENT_PATTERN = /^[A-Za-z0-9._-]+$/;
const ALIAS_PATTERN = /@([A-Za-z0-9._-]+)$/;
const SSH_PATTERN = /^(?:ssh:\/\/)?git@([^:/]+)[:/](.+)$/;
const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

// =============================================================================
// Parsing
// =============================================================================

function stripRepoSuffix(path: string): string {
	return path.replace(/\/+$/, "").replace(/\.git$/, "").replace(/\/+$/, "");
}

/**
 * Parse a package specification string.
 *
 * @throws InvalidReferenceError when the string is malformed
 * @throws UnsupportedHostError when it names a host that is not supported
 *
 * @example
 * ```typescript
 * parseReference("owner/repo#v1.0.0")
 * // => { repoUrl: "owner/repo", reference: "v1.0.0", isVirtual: false }
 *
 * parseReference("dev.azure.com/org/proj/_git/repo")
 * // => { host: "dev.azure.com", repoUrl: "org/proj/repo", ado: {...}, isVirtual: false }
 * ```
 */
export function parseReference(
	spec: string,
	options: HostOptions = {},
): DependencyReference {
	let rest = spec.trim();
	if (!rest) {
		throw new InvalidReferenceError(spec, "empty specification");
	}

	let host: string | undefined;

	const ssh = rest.match(SSH_PATTERN);
	if (ssh?.[1] && ssh[2]) {
		host = ssh[1].toLowerCase();
		rest = ssh[2];
	}

	let alias: string | undefined;
	const aliasMatch = rest.match(ALIAS_PATTERN);
	if (aliasMatch?.[1] && !rest.slice(0, aliasMatch.index).endsWith("/")) {
		alias = aliasMatch[1];
		rest = rest.slice(0, aliasMatch.index);
	}

	let reference: string | undefined;
	const hashIndex = rest.indexOf("#");
	if (hashIndex !== -1) {
		reference = rest.slice(hashIndex + 1).trim() || undefined;
		rest = rest.slice(0, hashIndex);
	}

	if (!host && SCHEME_PATTERN.test(rest)) {
		let url: URL;
		try {
			url = new URL(rest);
		} catch {
			throw new InvalidReferenceError(spec, "not a valid URL");
		}
		host = url.hostname.toLowerCase();
		rest = decodeURIComponent(url.pathname);
	}

	const segments = stripRepoSuffix(rest).split("/").filter(Boolean);

	if (!host && segments.length > 0 && segments[0]?.includes(".")) {
		if (isValidFqdn(segments[0])) {
			host = segments[0].toLowerCase();
			segments.shift();
		}
	}

	if (host && !isSupportedGitHost(host, options)) {
		throw new UnsupportedHostError(host, options);
	}

	for (const segment of segments) {
		if (!SEGMENT_PATTERN.test(segment) || segment === "." || segment === "..") {
			throw new InvalidReferenceError(spec, `invalid path segment "${segment}"`);
		}
	}

	const isAdoLayout =
		host !== undefined &&
		(isAzureDevOpsHost(host) || segments[2] === "_git");

	let repoSegments: string[];
	let virtualSegments: string[];
	let ado: AdoCoordinates | undefined;

	if (isAdoLayout) {
		const hasGitMarker = segments[2] === "_git";
		const repoIndex = hasGitMarker ? 3 : 2;
		const organization = segments[0];
		const project = segments[1];
		const repo = segments[repoIndex];
		if (!organization || !project || !repo) {
			throw new InvalidReferenceError(
				spec,
				"Azure DevOps references need org/project/repo",
			);
		}
		ado = { organization, project, repo };
		repoSegments = [organization, project, repo];
		virtualSegments = segments.slice(repoIndex + 1);
	} else {
		if (segments.length < 2) {
			throw new InvalidReferenceError(spec, "expected owner/repo");
		}
		repoSegments = segments.slice(0, 2);
		virtualSegments = segments.slice(2);
	}

	const virtualPath =
		virtualSegments.length > 0 ? virtualSegments.join("/") : undefined;

	return {
		host,
		repoUrl: repoSegments.join("/"),
		reference,
		alias,
		virtualPath,
		isVirtual: virtualPath !== undefined,
		ado,
	};
}

/**
 * Normalize a repository URL to its path form: scheme, host, trailing
 * `.git` and trailing slash are removed; case and nested segments kept.
 *
 * @example
 * ```typescript
 * normalizeRepoUrl("https://github.com/Owner/Repo.git") // => "Owner/Repo"
 * normalizeRepoUrl("https://dev.azure.com/org/proj/_git/repo") // => "org/proj/_git/repo"
 * normalizeRepoUrl("owner/repo") // => "owner/repo"
 * ```
 */
export function normalizeRepoUrl(url: string): string {
	const trimmed = url.trim();
	const match = trimmed.match(/^[a-z][a-z0-9+.-]*:\/\/[^/]+\/(.+)$/i);
	if (!match?.[1]) {
		return SCHEME_PATTERN.test(trimmed) ? trimmed : stripRepoSuffix(trimmed);
	}
	return stripRepoSuffix(match[1]);
}

// =============================================================================
// Identity
// =============================================================================

type Identity = Pick<DependencyReference, "repoUrl" | "virtualPath">;

/**
 * Unique key used for deduplication across a resolution and in the lock:
 * repoUrl for regular packages, repoUrl/virtualPath for virtual ones.
 */
export function getUniqueKey(ref: Identity): string {
	return ref.virtualPath ? `${ref.repoUrl}/${ref.virtualPath}` : ref.repoUrl;
}

/**
 * Canonical dependency string, as matched against apm.yml entries.
 * Ref and alias suffixes never change it.
 */
export function getCanonicalString(ref: Identity): string {
	return getUniqueKey(ref);
}

/**
 * Classify a virtual path, or return undefined when it is neither a
 * known file type nor a collection.
 */
export function getVirtualKind(ref: Identity): VirtualKind | undefined {
	const path = ref.virtualPath;
	if (!path) return undefined;
	if (getVirtualFileExtension(path)) return "file";
	if (/^(.+\/)?collections\/[^/]+$/.test(path)) return "collection";
	return undefined;
}

export function getVirtualFileExtension(path: string): string | undefined {
	return Object.keys(VIRTUAL_FILE_EXTENSIONS).find((ext) => path.endsWith(ext));
}

/**
 * Name of a virtual package: `{repo}-{stem}`.
 *
 * @example
 * ```typescript
 * getVirtualPackageName(parseReference("owner/repo/prompts/code-review.prompt.md"))
 * // => "repo-code-review"
 * ```
 */
export function getVirtualPackageName(ref: Identity): string {
	const repoName = ref.repoUrl.split("/").at(-1) ?? ref.repoUrl;
	const path = ref.virtualPath ?? "";
	const fileName = path.split("/").at(-1) ?? path;
	const ext = getVirtualFileExtension(fileName);
	const stem = ext ? fileName.slice(0, -ext.length) : fileName;
	return `${repoName}-${stem}`;
}

/**
 * Install path relative to the package root (apm_modules/).
 * Virtual packages are flattened one level beside their repository.
 *
 * @example
 * ```typescript
 * getInstallPath({ repoUrl: "owner/repo" })                    // => "owner/repo"
 * getInstallPath({ repoUrl: "owner/repo", virtualPath: "prompts/x.prompt.md" }) // => "owner/repo-x"
 * ```
 */
export function getInstallPath(ref: Identity): string {
	if (!ref.virtualPath) return ref.repoUrl;
	const parents = ref.repoUrl.split("/").slice(0, -1);
	return [...parents, getVirtualPackageName(ref)].join("/");
}

/**
 * Get the package name shown for a dependency (last install path segment).
 */
export function getPackageName(ref: Identity): string {
	return getInstallPath(ref).split("/").at(-1) ?? ref.repoUrl;
}

/**
 * Get a short display name for a dependency.
 *
 * @param commit - Resolved commit SHA (first 7 chars will be shown)
 * @returns Display string like "owner/repo (main@abc1234)"
 */
export function getDisplayName(
	ref: Identity & Pick<DependencyReference, "host" | "reference">,
	commit?: string,
): string {
	let name = getUniqueKey(ref);
	if (ref.host) {
		name = `${ref.host}/${name}`;
	}

	if (ref.reference || commit) {
		const gitRef = ref.reference ?? "HEAD";
		const shortCommit = commit ? commit.slice(0, 7) : "";
		name += ` (${gitRef}${shortCommit ? `@${shortCommit}` : ""})`;
	}

	return name;
}

/**
 * Resolve the effective host of a reference.
 */
export function resolveHost(
	ref: Pick<DependencyReference, "host">,
	defaultHost: string,
): string {
	return ref.host ?? defaultHost;
}
