import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createLockfile, listDependencies } from "./lib/lockfile";
import { parseReference } from "./lib/reference";
import type { ResolvedDependency } from "./lib/resolver";
import {
	buildLockfile,
	installedPathsForProject,
	readLockfile,
	writeLockfile,
} from "./lockfile";

const COMMIT = "0123456789abcdef0123456789abcdef01234567";

describe("lockfile on disk", () => {
	let projectRoot: string;

	beforeEach(async () => {
		projectRoot = await mkdtemp(join(tmpdir(), "agent-pm-lock-"));
	});

	afterEach(async () => {
		await rm(projectRoot, { recursive: true, force: true });
	});

	it("should treat a missing lockfile as absent", async () => {
		expect(await readLockfile(projectRoot)).toBeNull();
	});

	it("should treat a corrupt lockfile as absent", async () => {
		await writeFile(join(projectRoot, "apm.lock"), "dependencies: [\n  - repo_url: owner/a\n");

		expect(await readLockfile(projectRoot)).toBeNull();
		expect(await installedPathsForProject(projectRoot)).toEqual([]);
	});

	it("should list a dependency chain in depth order", async () => {
		await writeFile(
			join(projectRoot, "apm.lock"),
			[
				"lockfile_version: '1'",
				"dependencies:",
				"  - repo_url: owner/c",
				"    depth: 3",
				"    resolved_by: owner/b",
				"  - repo_url: owner/b",
				"    depth: 2",
				"    resolved_by: owner/a",
				"  - repo_url: owner/a",
				"",
			].join("\n"),
		);

		expect(await installedPathsForProject(projectRoot)).toEqual([
			"owner/a",
			"owner/b",
			"owner/c",
		]);
	});

	it("should list a repository recorded twice once", async () => {
		await writeFile(
			join(projectRoot, "apm.lock"),
			[
				"dependencies:",
				"  - repo_url: owner/shared",
				"  - repo_url: owner/shared",
				"    depth: 2",
				"    resolved_by: owner/other",
				"",
			].join("\n"),
		);

		const lock = await readLockfile(projectRoot);

		expect(await installedPathsForProject(projectRoot)).toEqual(["owner/shared"]);
		expect(lock && listDependencies(lock).map((d) => d.depth)).toEqual([2]);
	});

	it("should write without leaving a temp file behind", async () => {
		const lock = createLockfile("0.4.0");
		await writeLockfile(projectRoot, lock);

		expect(await readdir(projectRoot)).toEqual(["apm.lock"]);
		expect((await readLockfile(projectRoot))?.apmVersion).toBe("0.4.0");
	});
});

describe("buildLockfile", () => {
	it("should record resolution order and provenance", () => {
		const resolved = (spec: string, depth: number, resolvedBy?: string): ResolvedDependency => {
			const ref = parseReference(spec);
			return {
				spec,
				ref,
				key: ref.repoUrl,
				installPath: ref.repoUrl,
				depth,
				resolvedBy,
				resolvedCommit: COMMIT,
				resolvedRef: "main",
				loaded: { installPath: ref.repoUrl, hasSkill: false },
			};
		};

		const lock = buildLockfile(
			[resolved("owner/a", 1), resolved("owner/b", 2, "owner/a")],
			"0.4.0",
		);

		expect(listDependencies(lock)).toEqual([
			{
				repoUrl: "owner/a",
				host: undefined,
				resolvedCommit: COMMIT,
				resolvedRef: "main",
				version: undefined,
				virtualPath: undefined,
				isVirtual: false,
				depth: 1,
				resolvedBy: undefined,
			},
			{
				repoUrl: "owner/b",
				host: undefined,
				resolvedCommit: COMMIT,
				resolvedRef: "main",
				version: undefined,
				virtualPath: undefined,
				isVirtual: false,
				depth: 2,
				resolvedBy: "owner/a",
			},
		]);
	});
});
