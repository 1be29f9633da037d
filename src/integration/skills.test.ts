import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { IntegrationPackage } from "./files";
import { integrateSkill, syncSkills, toHyphenCase, validateSkillName } from "./skills";

async function write(path: string, content: string): Promise<void> {
	await mkdir(dirname(path), { recursive: true });
	await writeFile(path, content);
}

describe("toHyphenCase", () => {
	it("should convert names to hyphen-case", () => {
		expect(toHyphenCase("my_AwesomePackage")).toBe("my-awesome-package");
		expect(toHyphenCase("Brand Guidelines")).toBe("brand-guidelines");
		expect(toHyphenCase("owner/MyRepo_Name")).toBe("my-repo-name");
		expect(toHyphenCase("my@package!name")).toBe("mypackagename");
		expect(toHyphenCase("--a__b--")).toBe("a-b");
	});

	it("should cap the length at 64 characters", () => {
		const result = toHyphenCase("a".repeat(70));
		expect(result).toBe("a".repeat(64));
	});
});

describe("validateSkillName", () => {
	it("should accept lowercase hyphenated names", () => {
		expect(validateSkillName("code-review")).toEqual({ valid: true });
		expect(validateSkillName("a1")).toEqual({ valid: true });
	});

	it("should reject empty, long and malformed names", () => {
		expect(validateSkillName("")).toEqual({
			valid: false,
			error: "Skill name cannot be empty",
		});
		expect(validateSkillName("a".repeat(65))).toEqual({
			valid: false,
			error: "Skill name must be 1-64 characters (got 65)",
		});
		expect(validateSkillName("a--b")).toEqual({
			valid: false,
			error: "Skill name cannot contain consecutive hyphens",
		});
		expect(validateSkillName("Code-Review").valid).toBe(false);
		expect(validateSkillName("-review").valid).toBe(false);
	});
});

describe("skill integration", () => {
	let projectRoot: string;
	let pkg: IntegrationPackage;

	beforeEach(async () => {
		projectRoot = await mkdtemp(join(tmpdir(), "agent-pm-skills-"));
		const path = join(projectRoot, "apm_modules", "owner", "code-review");
		await write(join(path, "SKILL.md"), "---\nname: code-review\n---\nReview.\n");
		await write(join(path, "notes.md"), "Notes.\n");
		await write(join(path, ".git", "HEAD"), "ref: refs/heads/main\n");
		await write(join(path, ".apm", "skills", "helper", "SKILL.md"), "Help.\n");
		pkg = { key: "owner/code-review", path, isVirtual: false };
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await rm(projectRoot, { recursive: true, force: true });
	});

	it("should copy the skill and promote sub-skills", async () => {
		const result = await integrateSkill(pkg, projectRoot, ["vscode"]);

		expect(result).toEqual({ filesIntegrated: 2, filesRemoved: 0, errors: [] });
		const skills = join(projectRoot, ".github", "skills");
		expect((await readdir(skills)).sort()).toEqual(["code-review", "helper"]);
		expect((await readdir(join(skills, "code-review"))).sort()).toEqual([
			"SKILL.md",
			"notes.md",
		]);
		expect(await readdir(join(skills, "helper"))).toEqual(["SKILL.md"]);
	});

	it("should skip virtual packages", async () => {
		const result = await integrateSkill({ ...pkg, isVirtual: true }, projectRoot, [
			"vscode",
		]);

		expect(result.filesIntegrated).toBe(0);
	});

	it("should normalize an invalid directory name and warn", async () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		const path = join(projectRoot, "apm_modules", "owner", "My_Skill");
		await write(join(path, "SKILL.md"), "Skill.\n");

		await integrateSkill({ key: "owner/My_Skill", path, isVirtual: false }, projectRoot, [
			"vscode",
		]);

		expect(await readdir(join(projectRoot, ".github", "skills"))).toEqual(["my-skill"]);
		expect(warn).toHaveBeenCalledWith(
			"Warning: Skill name 'My_Skill' normalized to 'my-skill' (Skill name must use lowercase letters, digits and hyphens, and start and end with a letter or digit)",
		);
	});

	it("should remove skill directories no package accounts for", async () => {
		await integrateSkill(pkg, projectRoot, ["vscode"]);
		await mkdir(join(projectRoot, ".github", "skills", "stale"), { recursive: true });

		const result = await syncSkills([pkg], projectRoot, ["vscode"]);

		expect(result.filesRemoved).toBe(1);
		expect((await readdir(join(projectRoot, ".github", "skills"))).sort()).toEqual([
			"code-review",
			"helper",
		]);
	});

	it("should ignore targets without a skills directory", async () => {
		const result = await syncSkills([], projectRoot, ["vscode", "claude"]);

		expect(result).toEqual({ filesIntegrated: 0, filesRemoved: 0, errors: [] });
	});
});
