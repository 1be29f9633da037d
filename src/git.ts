/**
 * Thin wrapper around the git executable.
 *
 * All errors leave here sanitized: clone URLs may carry a token.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { sanitizeMessage } from "./lib/host";
import type { ResolvedReference } from "./lib/resolver";

const execFileAsync = promisify(execFile);

export interface GitRunOptions {
	cwd?: string;
	timeoutMs?: number;
}

/**
 * Runs one git command and resolves with its stdout.
 * Injected into the fetcher so tests can stand in for git.
 */
export type GitRunner = (args: string[], options?: GitRunOptions) => Promise<string>;

/**
 * Error from a failed git invocation; message is already sanitized
 */
class GitCommandError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "GitCommandError";
	}
}

function gitEnv(): NodeJS.ProcessEnv {
	return {
		...process.env,
		GIT_TERMINAL_PROMPT: "0",
		GIT_SSH_COMMAND: process.env.GIT_SSH_COMMAND ?? "ssh -o BatchMode=yes",
	};
}

function describeFailure(error: unknown): string {
	if (typeof error === "object" && error !== null && "stderr" in error) {
		const stderr = String(error.stderr).trim();
		if (stderr) return stderr;
	}
	return error instanceof Error ? error.message : String(error);
}

/**
 * Default runner: spawns `git` without a shell.
 */
export const runGit: GitRunner = async (args, options = {}) => {
	if (process.env.APM_DEBUG) {
		console.log(`[git] git ${sanitizeMessage(args.join(" "))}`);
	}
	try {
		const { stdout } = await execFileAsync("git", args, {
			cwd: options.cwd,
			timeout: options.timeoutMs,
			env: gitEnv(),
			maxBuffer: 16 * 1024 * 1024,
		});
		return stdout;
	} catch (error) {
		throw new GitCommandError(
			`Git command failed: ${sanitizeMessage(describeFailure(error))}`,
		);
	}
};

export function isCommitLike(ref: string): boolean {
	return /^[a-f0-9]{7,40}$/.test(ref.toLowerCase());
}

/**
 * Clone `url` into `targetPath` at a resolved reference.
 * Branches and tags are cloned shallow; commits need history to check out.
 */
export async function cloneRepository(
	git: GitRunner,
	url: string,
	targetPath: string,
	resolved: ResolvedReference,
	timeoutMs?: number,
): Promise<void> {
	if (resolved.refType === "commit") {
		await git(["clone", "--quiet", url, targetPath], { timeoutMs });
		await git(["checkout", "--quiet", resolved.resolvedCommit], {
			cwd: targetPath,
			timeoutMs,
		});
		return;
	}

	await git(
		["clone", "--quiet", "--depth", "1", "--branch", resolved.refName, url, targetPath],
		{ timeoutMs },
	);
}

/**
 * Full SHA of the commit checked out in `cwd`.
 */
export async function readHeadCommit(
	git: GitRunner,
	cwd: string,
	timeoutMs?: number,
): Promise<string> {
	const sha = (await git(["rev-parse", "HEAD"], { cwd, timeoutMs })).trim().toLowerCase();
	if (!/^[a-f0-9]{40}$/.test(sha)) {
		throw new GitCommandError(`Unexpected output from git rev-parse: ${sha}`);
	}
	return sha;
}

/**
 * List remote refs: ref name -> commit SHA.
 */
export async function listRemoteRefs(
	git: GitRunner,
	url: string,
	timeoutMs?: number,
): Promise<Map<string, string>> {
	const output = await git(["ls-remote", "--heads", "--tags", url], { timeoutMs });
	return parseLsRemote(output);
}

export function parseLsRemote(output: string): Map<string, string> {
	const refs = new Map<string, string>();
	for (const line of output.split("\n")) {
		const [sha, name] = line.trim().split(/\s+/);
		if (sha && name) {
			refs.set(name, sha);
		}
	}
	return refs;
}
