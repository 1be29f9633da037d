import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { detectTargets, getTargetDir } from "./targets";

describe("targets", () => {
	let projectRoot: string;

	beforeEach(async () => {
		projectRoot = await mkdtemp(join(tmpdir(), "agent-pm-targets-"));
	});

	afterEach(async () => {
		await rm(projectRoot, { recursive: true, force: true });
	});

	it("should always include the VS Code target", async () => {
		expect(await detectTargets(projectRoot)).toEqual(["vscode"]);
	});

	it("should include Claude when .claude/ exists", async () => {
		await mkdir(join(projectRoot, ".claude"));

		expect(await detectTargets(projectRoot)).toEqual(["vscode", "claude"]);
	});

	it("should not treat a .claude file as the Claude directory", async () => {
		await writeFile(join(projectRoot, ".claude"), "");

		expect(await detectTargets(projectRoot)).toEqual(["vscode"]);
	});

	it("should build target directories", () => {
		expect(getTargetDir("/work", "vscode", "prompts")).toBe(
			join("/work", ".github", "prompts"),
		);
		expect(getTargetDir("/work", "claude", "commands")).toBe(
			join("/work", ".claude", "commands"),
		);
	});
});
