import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	pathExists,
	readPackageMetadata,
	removeInstalledPackage,
	scanInstalledPackages,
} from "./modules";

async function write(path: string, content: string): Promise<void> {
	await mkdir(dirname(path), { recursive: true });
	await writeFile(path, content);
}

describe("modules", () => {
	let modulesDir: string;

	beforeEach(async () => {
		modulesDir = await mkdtemp(join(tmpdir(), "agent-pm-modules-"));
	});

	afterEach(async () => {
		await rm(modulesDir, { recursive: true, force: true });
	});

	describe("readPackageMetadata", () => {
		it("should read apm.yml into a package", async () => {
			const path = join(modulesDir, "owner", "rules");
			await write(
				join(path, "apm.yml"),
				"name: rules\nversion: 1.2.0\ndependencies:\n  apm:\n    - owner/base\n",
			);

			expect(await readPackageMetadata(path)).toEqual({
				hasManifest: true,
				hasSkill: false,
				package: {
					name: "rules",
					version: "1.2.0",
					description: undefined,
					author: undefined,
					packagePath: path,
					dependencies: ["owner/base"],
				},
			});
		});

		it("should report an invalid manifest instead of throwing", async () => {
			const path = join(modulesDir, "owner", "broken");
			await write(join(path, "apm.yml"), "name: broken\n");
			await write(join(path, "SKILL.md"), "Skill.\n");

			const metadata = await readPackageMetadata(path);

			expect(metadata.hasSkill).toBe(true);
			expect(metadata.package).toBeUndefined();
			expect(metadata.manifestError).toBe(
				`Invalid ${join(path, "apm.yml")}: Manifest must have a 'version' field`,
			);
		});

		it("should handle a directory with neither file", async () => {
			expect(await readPackageMetadata(join(modulesDir, "nothing"))).toEqual({
				hasManifest: false,
				hasSkill: false,
			});
		});
	});

	describe("scanInstalledPackages", () => {
		it("should find packages at any depth below the owner level", async () => {
			await write(join(modulesDir, "owner", "a", "apm.yml"), "");
			await write(join(modulesDir, "owner", "a", "nested", "inner", "apm.yml"), "");
			await write(join(modulesDir, "org", "project", "repo", "SKILL.md"), "");
			await write(join(modulesDir, "toplevel", "apm.yml"), "");
			await write(join(modulesDir, ".cache", "x", "apm.yml"), "");

			expect(await scanInstalledPackages(modulesDir)).toEqual([
				"org/project/repo",
				"owner/a",
			]);
		});

		it("should return nothing for a missing install root", async () => {
			expect(await scanInstalledPackages(join(modulesDir, "absent"))).toEqual([]);
		});
	});

	describe("removeInstalledPackage", () => {
		it("should remove the package and empty parents", async () => {
			await write(join(modulesDir, "owner", "a", "apm.yml"), "");
			await write(join(modulesDir, "keep", "b", "apm.yml"), "");

			expect(await removeInstalledPackage(modulesDir, "owner/a")).toBe(true);

			expect(await pathExists(join(modulesDir, "owner"))).toBe(false);
			expect(await readdir(modulesDir)).toEqual(["keep"]);
		});

		it("should keep parents that still hold other packages", async () => {
			await write(join(modulesDir, "owner", "a", "apm.yml"), "");
			await write(join(modulesDir, "owner", "b", "apm.yml"), "");

			await removeInstalledPackage(modulesDir, "owner/a");

			expect(await readdir(join(modulesDir, "owner"))).toEqual(["b"]);
		});

		it("should report when nothing was installed", async () => {
			expect(await removeInstalledPackage(modulesDir, "owner/none")).toBe(false);
		});
	});
});
