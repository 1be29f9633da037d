import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ManifestError } from "./errors";
import {
	addDependencies,
	ensureManifest,
	getApmDependencies,
	readManifest,
	removeDependencies,
} from "./manifest";

describe("project manifest", () => {
	let projectRoot: string;

	beforeEach(async () => {
		projectRoot = await mkdtemp(join(tmpdir(), "agent-pm-manifest-"));
	});

	afterEach(async () => {
		await rm(projectRoot, { recursive: true, force: true });
	});

	it("should return null when apm.yml is missing", async () => {
		expect(await readManifest(projectRoot)).toBeNull();
		expect(await getApmDependencies(projectRoot)).toEqual([]);
	});

	it("should throw on an invalid apm.yml", async () => {
		await writeFile(join(projectRoot, "apm.yml"), "name: demo\n");

		await expect(readManifest(projectRoot)).rejects.toThrow(ManifestError);
	});

	it("should create a manifest named after the directory", async () => {
		const manifest = await ensureManifest(projectRoot);

		expect(manifest.name).toBe(basename(projectRoot));
		expect(await readManifest(projectRoot)).toEqual(manifest);
	});

	it("should add and remove dependencies keeping other keys", async () => {
		await writeFile(
			join(projectRoot, "apm.yml"),
			"name: demo\nversion: 1.0.0\nscripts:\n  start: run\ndependencies:\n  apm:\n    - owner/a\n",
		);

		await addDependencies(projectRoot, ["owner/b", "owner/c#v1"]);
		expect(await getApmDependencies(projectRoot)).toEqual(["owner/a", "owner/b", "owner/c#v1"]);

		await removeDependencies(projectRoot, ["owner/a", "owner/c#v1"]);
		expect(await getApmDependencies(projectRoot)).toEqual(["owner/b"]);

		const content = await readFile(join(projectRoot, "apm.yml"), "utf-8");
		expect(content.split("\n")).toContain("  start: run");
	});
});
