import { describe, expect, it } from "vitest";
import {
	cloneRepository,
	type GitRunOptions,
	isCommitLike,
	listRemoteRefs,
	parseLsRemote,
} from "./git";

const COMMIT = "0123456789abcdef0123456789abcdef01234567";

function recordingRunner(output = "") {
	const calls: Array<{ args: string[]; options?: GitRunOptions }> = [];
	const run = async (args: string[], options?: GitRunOptions) => {
		calls.push({ args, options });
		return output;
	};
	return { calls, run };
}

describe("isCommitLike", () => {
	it("should accept 7 to 40 hex characters", () => {
		expect(isCommitLike("abc1234")).toBe(true);
		expect(isCommitLike(COMMIT)).toBe(true);
		expect(isCommitLike("ABC1234")).toBe(true);
	});

	it("should reject branch and tag names", () => {
		expect(isCommitLike("main")).toBe(false);
		expect(isCommitLike("abc123")).toBe(false);
		expect(isCommitLike("v1.0.0")).toBe(false);
	});
});

describe("parseLsRemote", () => {
	it("should map ref names to commits", () => {
		const refs = parseLsRemote(
			`${COMMIT}\trefs/heads/main\nfedcba9876543210fedcba9876543210fedcba98\trefs/tags/v1.0.0\n\n`,
		);

		expect([...refs.entries()]).toEqual([
			["refs/heads/main", COMMIT],
			["refs/tags/v1.0.0", "fedcba9876543210fedcba9876543210fedcba98"],
		]);
	});
});

describe("listRemoteRefs", () => {
	it("should ask for heads and tags", async () => {
		const { calls, run } = recordingRunner(`${COMMIT}\trefs/heads/main\n`);

		const refs = await listRemoteRefs(run, "https://github.com/owner/repo.git", 5000);

		expect(refs.get("refs/heads/main")).toBe(COMMIT);
		expect(calls).toEqual([
			{
				args: ["ls-remote", "--heads", "--tags", "https://github.com/owner/repo.git"],
				options: { timeoutMs: 5000 },
			},
		]);
	});
});

describe("cloneRepository", () => {
	it("should clone branches shallow", async () => {
		const { calls, run } = recordingRunner();

		await cloneRepository(run, "https://github.com/owner/repo.git", "/tmp/target", {
			originalRef: "main",
			refType: "branch",
			resolvedCommit: COMMIT,
			refName: "main",
		});

		expect(calls.map((call) => call.args)).toEqual([
			[
				"clone",
				"--quiet",
				"--depth",
				"1",
				"--branch",
				"main",
				"https://github.com/owner/repo.git",
				"/tmp/target",
			],
		]);
	});

	it("should clone full history and check out commits", async () => {
		const { calls, run } = recordingRunner();

		await cloneRepository(run, "https://github.com/owner/repo.git", "/tmp/target", {
			originalRef: COMMIT,
			refType: "commit",
			resolvedCommit: COMMIT,
			refName: COMMIT,
		});

		expect(calls).toEqual([
			{
				args: ["clone", "--quiet", "https://github.com/owner/repo.git", "/tmp/target"],
				options: { timeoutMs: undefined },
			},
			{
				args: ["checkout", "--quiet", COMMIT],
				options: { cwd: "/tmp/target", timeoutMs: undefined },
			},
		]);
	});
});
