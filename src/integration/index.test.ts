import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { addDependency, createLockfile, type LockFile } from "../lib/lockfile";
import { packagesFromLock, syncIntegration } from "./index";

async function write(path: string, content: string): Promise<void> {
	await mkdir(dirname(path), { recursive: true });
	await writeFile(path, content);
}

describe("syncIntegration", () => {
	let projectRoot: string;
	let modulesDir: string;
	let lock: LockFile;

	beforeEach(async () => {
		projectRoot = await mkdtemp(join(tmpdir(), "agent-pm-sync-"));
		modulesDir = join(projectRoot, "apm_modules");

		const pkg = join(modulesDir, "owner", "repo");
		await write(join(pkg, "apm.yml"), "name: repo\nversion: 1.0.0\n");
		await write(
			join(pkg, "review.prompt.md"),
			"---\ndescription: Review code\nmode: agent\n---\n\nReview.\n",
		);
		await write(join(pkg, ".apm", "agents", "security.agent.md"), "Security.\n");
		await write(join(pkg, ".apm", "chatmodes", "planner.chatmode.md"), "Plan.\n");

		lock = createLockfile();
		addDependency(lock, { repoUrl: "owner/repo", depth: 1 });
	});

	afterEach(async () => {
		await rm(projectRoot, { recursive: true, force: true });
	});

	it("should replace managed files and leave user files alone", async () => {
		await write(join(projectRoot, ".github", "prompts", "mine.prompt.md"), "Mine.\n");
		await write(join(projectRoot, ".github", "prompts", "old-apm.prompt.md"), "Old.\n");

		const result = await syncIntegration(lock, modulesDir, projectRoot, ["vscode"]);

		expect(result).toEqual({ filesRemoved: 1, filesIntegrated: 3, errors: [] });
		expect((await readdir(join(projectRoot, ".github", "prompts"))).sort()).toEqual([
			"mine.prompt.md",
			"review-apm.prompt.md",
		]);
		expect((await readdir(join(projectRoot, ".github", "agents"))).sort()).toEqual([
			"planner-apm.agent.md",
			"security-apm.agent.md",
		]);
		expect(
			await readFile(join(projectRoot, ".github", "prompts", "review-apm.prompt.md"), "utf-8"),
		).toBe("---\ndescription: Review code\nmode: agent\n---\n\nReview.\n");
	});

	it("should also write Claude agents and commands for the Claude target", async () => {
		await mkdir(join(projectRoot, ".claude"));

		const result = await syncIntegration(lock, modulesDir, projectRoot, [
			"vscode",
			"claude",
		]);

		expect(result.filesIntegrated).toBe(6);
		expect((await readdir(join(projectRoot, ".claude", "agents"))).sort()).toEqual([
			"planner-apm.md",
			"security-apm.md",
		]);
		expect(
			await readFile(join(projectRoot, ".claude", "commands", "review-apm.md"), "utf-8"),
		).toBe("---\ndescription: Review code\n---\n\nReview.\n");
	});

	it("should remove everything managed when the lock is empty", async () => {
		await syncIntegration(lock, modulesDir, projectRoot, ["vscode"]);

		const result = await syncIntegration(createLockfile(), modulesDir, projectRoot, [
			"vscode",
		]);

		expect(result.filesRemoved).toBe(3);
		expect(await readdir(join(projectRoot, ".github", "prompts"))).toEqual([]);
	});
});

describe("packagesFromLock", () => {
	it("should skip entries that are not on disk", async () => {
		const lock = createLockfile();
		addDependency(lock, { repoUrl: "owner/missing", depth: 1 });

		expect(await packagesFromLock(lock, join(tmpdir(), "agent-pm-none"))).toEqual([]);
	});

	it("should return nothing without a lock", async () => {
		expect(await packagesFromLock(null, "/unused")).toEqual([]);
	});
});
