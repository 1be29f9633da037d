/**
 * Package fetcher.
 *
 * Materializes one dependency under the install root:
 * - single files and collections are read through the host's content API
 *   and wrapped into a synthesized package
 * - full packages are cloned with git, trying token HTTPS, SSH, then plain
 *   HTTPS
 */

import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { ResolvedConfig } from "./config";
import { MANIFEST_FILENAME } from "./config";
import { getErrorMessage, PackageFetchError } from "./errors";
import {
	cloneRepository,
	type GitRunner,
	isCommitLike,
	listRemoteRefs,
	readHeadCommit,
	runGit,
} from "./git";
import {
	COLLECTION_KIND_DIRS,
	type CollectionManifest,
	parseCollectionManifest,
} from "./lib/collection";
import { frontmatterString, splitFrontmatter } from "./lib/frontmatter";
import {
	buildContentsApiUrl,
	buildHttpsCloneUrl,
	buildSshCloneUrl,
	isAzureDevOpsHost,
	sanitizeMessage,
} from "./lib/host";
import { createMinimalManifest, manifestToYaml } from "./lib/manifest";
import {
	DEFAULT_REF,
	type DependencyReference,
	getVirtualFileExtension,
	getVirtualKind,
	getVirtualPackageName,
	resolveHost,
	VIRTUAL_FILE_EXTENSIONS,
} from "./lib/reference";
import type { LoadedPackage, ResolvedReference } from "./lib/resolver";
import { readPackageMetadata } from "./modules";

export type FetchFunction = typeof fetch;

/**
 * Everything a fetch needs; no process-global state is read here.
 */
export interface FetchContext {
	config: ResolvedConfig;
	/** HTTP implementation (defaults to global fetch) */
	fetch?: FetchFunction;
	/** git implementation (defaults to the git executable) */
	git?: GitRunner;
}

const USER_AGENT = "agent-pm";
const BRANCH_FALLBACKS: Record<string, string> = { main: "master", master: "main" };

function debug(message: string): void {
	if (process.env.APM_DEBUG) {
		console.log(`[fetch] ${sanitizeMessage(message)}`);
	}
}

// =============================================================================
// Credentials & Headers
// =============================================================================

function isAdoReference(ref: DependencyReference, host: string): boolean {
	return ref.ado !== undefined || isAzureDevOpsHost(host);
}

function getToken(
	ref: DependencyReference,
	host: string,
	config: ResolvedConfig,
): string | undefined {
	return isAdoReference(ref, host) ? config.adoToken : config.githubToken;
}

function tokenHint(ado: boolean): string {
	return ado ? "ADO_APM_PAT" : "GITHUB_APM_PAT or GITHUB_TOKEN";
}

/**
 * Build content API request headers, with authentication when a token
 * is available.
 */
export function getRequestHeaders(
	ado: boolean,
	token?: string,
): Record<string, string> {
	const headers: Record<string, string> = { "User-Agent": USER_AGENT };

	if (ado) {
		if (token) {
			headers.Authorization = `Basic ${Buffer.from(`:${token}`).toString("base64")}`;
		}
		return headers;
	}

	headers.Accept = "application/vnd.github.raw";
	headers["X-GitHub-Api-Version"] = "2022-11-28";
	if (token) {
		headers.Authorization = `Bearer ${token}`;
	}
	return headers;
}

// =============================================================================
// Raw File Download
// =============================================================================

async function requestFile(
	ref: DependencyReference,
	filePath: string,
	gitRef: string,
	ctx: FetchContext,
): Promise<Response> {
	const host = resolveHost(ref, ctx.config.defaultHost);
	const ado = isAdoReference(ref, host);
	const url = buildContentsApiUrl(host, ref.repoUrl, filePath, gitRef, ref.ado);
	const doFetch = ctx.fetch ?? fetch;

	debug(`GET ${url}`);
	try {
		return await doFetch(url, {
			headers: getRequestHeaders(ado, getToken(ref, host, ctx.config)),
			signal: AbortSignal.timeout(ctx.config.timeoutMs),
		});
	} catch (error) {
		throw new PackageFetchError(
			"network",
			sanitizeMessage(`Network error downloading ${filePath}: ${getErrorMessage(error)}`),
		);
	}
}

function failureFor(
	response: Response,
	ref: DependencyReference,
	filePath: string,
	ctx: FetchContext,
): PackageFetchError {
	const host = resolveHost(ref, ctx.config.defaultHost);
	const ado = isAdoReference(ref, host);

	if (
		response.status === 403 &&
		response.headers.get("x-ratelimit-remaining") === "0"
	) {
		return new PackageFetchError(
			"rate_limit",
			`API rate limit exceeded for ${host}. Set ${tokenHint(ado)} for higher limits.`,
			response.status,
		);
	}

	if (response.status === 401 || response.status === 403) {
		const hint = getToken(ref, host, ctx.config)
			? "Please check your token permissions."
			: `This might be a private repository. Please set ${tokenHint(ado)}.`;
		return new PackageFetchError(
			"auth",
			`Authentication failed for ${ref.repoUrl}. ${hint}`,
			response.status,
		);
	}

	return new PackageFetchError(
		"http",
		`Failed to download ${filePath}: HTTP ${response.status}`,
		response.status,
	);
}

/**
 * Download one file from a repository through the content API.
 * A 404 on main or master retries once on the other branch; a 404 on any
 * other ref fails immediately.
 */
export async function downloadRawFile(
	ref: DependencyReference,
	filePath: string,
	gitRef: string,
	ctx: FetchContext,
): Promise<Buffer> {
	const response = await requestFile(ref, filePath, gitRef, ctx);
	if (response.ok) {
		return Buffer.from(await response.arrayBuffer());
	}

	if (response.status !== 404) {
		throw failureFor(response, ref, filePath, ctx);
	}

	const fallbackRef = BRANCH_FALLBACKS[gitRef];
	if (!fallbackRef) {
		throw new PackageFetchError(
			"not_found",
			`File not found: ${filePath} at ref '${gitRef}' in ${ref.repoUrl}`,
			404,
		);
	}

	debug(`${filePath} not found at ${gitRef}, trying ${fallbackRef}`);
	const fallback = await requestFile(ref, filePath, fallbackRef, ctx);
	if (fallback.ok) {
		return Buffer.from(await fallback.arrayBuffer());
	}
	if (fallback.status === 404) {
		throw new PackageFetchError(
			"not_found",
			`File not found: ${filePath} in ${ref.repoUrl} (tried refs: ${gitRef}, ${fallbackRef})`,
			404,
		);
	}
	throw failureFor(fallback, ref, filePath, ctx);
}

// =============================================================================
// Git Access
// =============================================================================

/**
 * Clone URLs in attempt order: token HTTPS (when a token exists), SSH,
 * plain HTTPS.
 */
export function getCloneUrls(ref: DependencyReference, config: ResolvedConfig): string[] {
	const host = resolveHost(ref, config.defaultHost);
	const token = getToken(ref, host, config);
	const urls: string[] = [];
	if (token) {
		urls.push(buildHttpsCloneUrl(host, ref.repoUrl, token, ref.ado));
	}
	urls.push(buildSshCloneUrl(host, ref.repoUrl, ref.ado));
	urls.push(buildHttpsCloneUrl(host, ref.repoUrl, undefined, ref.ado));
	return urls;
}

function classifyGitFailure(
	ref: DependencyReference,
	message: string,
	ctx: FetchContext,
): PackageFetchError {
	const host = resolveHost(ref, ctx.config.defaultHost);
	const ado = isAdoReference(ref, host);

	if (/Authentication failed|Repository not found|could not read Username/i.test(message)) {
		const hint = getToken(ref, host, ctx.config)
			? "Authentication failed. Please check your token permissions."
			: `This might be a private repository that requires authentication. Please set ${tokenHint(ado)}.`;
		return new PackageFetchError(
			"auth",
			`Failed to clone repository ${ref.repoUrl}. ${hint}`,
		);
	}
	return new PackageFetchError(
		"network",
		sanitizeMessage(`Failed to clone repository ${ref.repoUrl}: ${message}`),
	);
}

async function withCloneFallback<T>(
	ref: DependencyReference,
	ctx: FetchContext,
	attempt: (url: string) => Promise<T>,
): Promise<T> {
	let lastError = "no clone URL available";
	for (const url of getCloneUrls(ref, ctx.config)) {
		try {
			return await attempt(url);
		} catch (error) {
			lastError = sanitizeMessage(getErrorMessage(error));
			debug(`attempt failed for ${url}: ${lastError}`);
		}
	}
	throw classifyGitFailure(ref, lastError, ctx);
}

/**
 * Pin a reference to a commit. Commit-like refs are taken as given and
 * expanded to the full SHA at checkout; branches and tags are looked up
 * with ls-remote.
 */
export async function resolveGitReference(
	ref: DependencyReference,
	ctx: FetchContext,
): Promise<ResolvedReference> {
	const git = ctx.git ?? runGit;
	const gitRef = ref.reference ?? DEFAULT_REF;

	if (isCommitLike(gitRef)) {
		return {
			originalRef: gitRef,
			refType: "commit",
			resolvedCommit: gitRef,
			refName: gitRef,
		};
	}

	const refs = await withCloneFallback(ref, ctx, (url) =>
		listRemoteRefs(git, url, ctx.config.timeoutMs),
	);

	const candidates = [gitRef];
	const fallbackRef = BRANCH_FALLBACKS[gitRef];
	if (fallbackRef) candidates.push(fallbackRef);

	for (const name of candidates) {
		const branch = refs.get(`refs/heads/${name}`);
		if (branch) {
			return { originalRef: gitRef, refType: "branch", resolvedCommit: branch, refName: name };
		}
		const tag = refs.get(`refs/tags/${name}^{}`) ?? refs.get(`refs/tags/${name}`);
		if (tag) {
			return { originalRef: gitRef, refType: "tag", resolvedCommit: tag, refName: name };
		}
	}

	throw new PackageFetchError(
		"not_found",
		`Reference '${gitRef}' not found in repository ${ref.repoUrl}`,
	);
}

// =============================================================================
// Package Materialization
// =============================================================================

async function resetDirectory(path: string): Promise<void> {
	await rm(path, { recursive: true, force: true });
	await mkdir(path, { recursive: true });
}

function ownerOf(ref: DependencyReference): string {
	return ref.repoUrl.split("/")[0] ?? ref.repoUrl;
}

async function writeSynthesizedManifest(
	targetPath: string,
	ref: DependencyReference,
	description: string,
	tags: string[] = [],
): Promise<LoadedPackage> {
	const name = getVirtualPackageName(ref);
	const manifest = {
		...createMinimalManifest(name),
		description,
		author: ownerOf(ref),
		tags,
	};
	await writeFile(join(targetPath, MANIFEST_FILENAME), manifestToYaml(manifest));

	return {
		installPath: targetPath,
		hasSkill: false,
		package: {
			name,
			version: manifest.version,
			description,
			author: manifest.author,
			packagePath: targetPath,
			dependencies: [],
		},
	};
}

/**
 * Materialize a single-file virtual package: the file goes under
 * `.apm/{kind}/` and an apm.yml is synthesized around it.
 */
export async function downloadVirtualFilePackage(
	ref: DependencyReference,
	targetPath: string,
	ctx: FetchContext,
): Promise<LoadedPackage> {
	const virtualPath = ref.virtualPath ?? "";
	const ext = getVirtualFileExtension(virtualPath);
	const subdir = ext ? VIRTUAL_FILE_EXTENSIONS[ext] : undefined;
	if (!subdir) {
		throw new PackageFetchError(
			"invalid_package",
			`Path '${virtualPath}' is not a valid individual file. Must end with one of: ${Object.keys(VIRTUAL_FILE_EXTENSIONS).join(", ")}`,
		);
	}

	const content = await downloadRawFile(
		ref,
		virtualPath,
		ref.reference ?? DEFAULT_REF,
		ctx,
	);

	const fileName = virtualPath.split("/").at(-1) ?? virtualPath;
	await resetDirectory(targetPath);
	const filePath = join(targetPath, ".apm", subdir, fileName);
	await mkdir(dirname(filePath), { recursive: true });
	await writeFile(filePath, content);

	const { frontmatter } = splitFrontmatter(content.toString("utf-8"));
	const description =
		frontmatterString(frontmatter, "description") ??
		`Virtual package containing ${fileName}`;

	return writeSynthesizedManifest(targetPath, ref, description);
}

async function downloadCollectionManifest(
	ref: DependencyReference,
	gitRef: string,
	ctx: FetchContext,
): Promise<Buffer> {
	const base = ref.virtualPath ?? "";
	try {
		return await downloadRawFile(ref, `${base}.collection.yml`, gitRef, ctx);
	} catch (error) {
		if (!(error instanceof PackageFetchError) || error.kind !== "not_found") {
			throw error;
		}
	}

	try {
		return await downloadRawFile(ref, `${base}.collection.yaml`, gitRef, ctx);
	} catch (error) {
		if (error instanceof PackageFetchError && error.kind === "not_found") {
			throw new PackageFetchError(
				"not_found",
				`Collection manifest not found: ${base}.collection.yml (also tried .yaml)`,
				404,
			);
		}
		throw error;
	}
}

/**
 * Materialize a collection: every listed item is downloaded into
 * `.apm/{kind}/`. Individual item failures are reported and skipped.
 */
export async function downloadCollectionPackage(
	ref: DependencyReference,
	targetPath: string,
	ctx: FetchContext,
): Promise<LoadedPackage> {
	const gitRef = ref.reference ?? DEFAULT_REF;
	const collectionName = ref.virtualPath?.split("/").at(-1) ?? "";

	const raw = await downloadCollectionManifest(ref, gitRef, ctx);
	let manifest: CollectionManifest;
	try {
		manifest = parseCollectionManifest(raw.toString("utf-8"));
	} catch (error) {
		throw new PackageFetchError(
			"invalid_package",
			`Invalid collection manifest '${collectionName}': ${getErrorMessage(error)}`,
		);
	}

	await resetDirectory(targetPath);

	let downloaded = 0;
	const failed: string[] = [];
	for (const item of manifest.items) {
		try {
			const content = await downloadRawFile(ref, item.path, gitRef, ctx);
			const fileName = item.path.split("/").at(-1) ?? item.path;
			const filePath = join(targetPath, ".apm", COLLECTION_KIND_DIRS[item.kind], fileName);
			await mkdir(dirname(filePath), { recursive: true });
			await writeFile(filePath, content);
			downloaded++;
		} catch (error) {
			failed.push(`${item.path} (${getErrorMessage(error)})`);
		}
	}

	if (downloaded === 0) {
		await rm(targetPath, { recursive: true, force: true });
		throw new PackageFetchError(
			"invalid_package",
			`Failed to download any items from collection '${collectionName}'. Failures:\n  - ${failed.join("\n  - ")}`,
		);
	}

	if (failed.length > 0) {
		console.warn(
			`Warning: Collection '${collectionName}' installed with ${downloaded}/${manifest.items.length} items. Failed items:\n  - ${sanitizeMessage(failed.join("\n  - "))}`,
		);
	}

	return writeSynthesizedManifest(targetPath, ref, manifest.description, manifest.tags);
}

/**
 * Clone a full repository package, drop its git metadata and read what it
 * declares. A package must carry apm.yml or SKILL.md.
 */
export async function downloadRepositoryPackage(
	ref: DependencyReference,
	targetPath: string,
	ctx: FetchContext,
): Promise<LoadedPackage> {
	const git = ctx.git ?? runGit;
	let resolved = await resolveGitReference(ref, ctx);

	// Cloned beside the target; the installed copy stays until the clone succeeds
	const stagingPath = `${targetPath}.partial`;
	await mkdir(dirname(targetPath), { recursive: true });
	try {
		await withCloneFallback(ref, ctx, async (url) => {
			await rm(stagingPath, { recursive: true, force: true });
			await cloneRepository(git, url, stagingPath, resolved, ctx.config.timeoutMs);
		});
		if (resolved.refType === "commit") {
			resolved = {
				...resolved,
				resolvedCommit: await readHeadCommit(git, stagingPath, ctx.config.timeoutMs),
			};
		}
		await rm(join(stagingPath, ".git"), { recursive: true, force: true });
	} catch (error) {
		await rm(stagingPath, { recursive: true, force: true });
		throw error;
	}
	await rm(targetPath, { recursive: true, force: true });
	await rename(stagingPath, targetPath);

	const metadata = await readPackageMetadata(targetPath);
	if (!metadata.hasManifest && !metadata.hasSkill) {
		await rm(targetPath, { recursive: true, force: true });
		throw new PackageFetchError(
			"invalid_package",
			`Invalid package ${ref.repoUrl}: missing ${MANIFEST_FILENAME} or SKILL.md`,
		);
	}

	return {
		installPath: targetPath,
		package: metadata.package,
		manifestError: metadata.manifestError,
		resolvedReference: resolved,
		hasSkill: metadata.hasSkill,
	};
}

/**
 * Materialize any dependency at `targetPath`.
 */
export async function downloadPackage(
	ref: DependencyReference,
	targetPath: string,
	ctx: FetchContext,
): Promise<LoadedPackage> {
	if (!ref.isVirtual) {
		return downloadRepositoryPackage(ref, targetPath, ctx);
	}

	switch (getVirtualKind(ref)) {
		case "file":
			return downloadVirtualFilePackage(ref, targetPath, ctx);
		case "collection":
			return downloadCollectionPackage(ref, targetPath, ctx);
		default:
			throw new PackageFetchError(
				"invalid_package",
				`Unknown virtual package type for ${ref.virtualPath}`,
			);
	}
}
