import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	findProjectConfig,
	parseApmrc,
	parseHostList,
	resolveConfig,
	writeProjectConfig,
} from "./config";
import { ConfigError } from "./errors";

describe("parseHostList", () => {
	it("should split, lowercase and deduplicate", () => {
		expect(parseHostList(" Git.Corp.io, ,code.corp.io,git.corp.io")).toEqual([
			"git.corp.io",
			"code.corp.io",
		]);
		expect(parseHostList(undefined)).toEqual([]);
	});
});

describe("parseApmrc", () => {
	it("should read every setting", () => {
		expect(
			parseApmrc(
				"host = GIT.Company.com\nhosts = a.corp.io, b.corp.io\ntimeout = 5000\nintegrate = false\nmodulesDir = vendor/apm\n",
			),
		).toEqual({
			host: "git.company.com",
			hosts: ["a.corp.io", "b.corp.io"],
			timeout: 5000,
			integrate: false,
			modulesDir: "vendor/apm",
		});
	});

	it("should reject invalid values", () => {
		expect(() => parseApmrc("timeout = soon\n", "/p/.apmrc")).toThrow(
			'Invalid timeout in /p/.apmrc: expected a positive integer (ms), got "soon"',
		);
		expect(() => parseApmrc("integrate = maybe\n")).toThrow(ConfigError);
	});
});

describe("config files", () => {
	let tempDir: string;

	beforeEach(async () => {
		tempDir = await mkdtemp(join(tmpdir(), "agent-pm-config-"));
	});

	afterEach(async () => {
		await rm(tempDir, { recursive: true, force: true });
	});

	it("should find project config in a parent directory", async () => {
		await writeFile(join(tempDir, ".apmrc"), "host = git.company.com\n");
		const nested = join(tempDir, "a", "b");
		await mkdir(nested, { recursive: true });

		expect(await findProjectConfig(nested, {})).toEqual({ host: "git.company.com" });
	});

	it("should resolve defaults", async () => {
		const config = await resolveConfig({
			cwd: tempDir,
			env: {},
			userConfigPath: join(tempDir, "missing-user-config"),
		});

		expect(config).toEqual({
			defaultHost: "github.com",
			overrideHost: undefined,
			extraHosts: [],
			githubToken: undefined,
			adoToken: undefined,
			modulesDir: "apm_modules",
			integrate: true,
			timeoutMs: 30000,
		});
	});

	it("should let project config override user config and env override both", async () => {
		const userConfigPath = join(tempDir, "user.apmrc");
		await writeFile(userConfigPath, "host = user.corp.io\ntimeout = 1000\nhosts = a.corp.io\n");
		const projectRoot = join(tempDir, "project");
		await mkdir(projectRoot);
		await writeFile(join(projectRoot, ".apmrc"), "timeout = 2000\nmodulesDir = deps\n");

		const config = await resolveConfig({
			cwd: projectRoot,
			userConfigPath,
			env: {
				GITHUB_HOST: "Env.Corp.io",
				APM_GITHUB_HOSTS: "b.corp.io",
				GITHUB_TOKEN: "test-token",
				GITHUB_APM_PAT: "test-pat",
				ADO_APM_PAT: "test-ado-token",
				APM_NO_INTEGRATE: "1",
			},
		});

		expect(config).toEqual({
			defaultHost: "env.corp.io",
			overrideHost: "env.corp.io",
			extraHosts: ["a.corp.io", "b.corp.io"],
			githubToken: "test-pat",
			adoToken: "test-ado-token",
			modulesDir: "deps",
			integrate: false,
			timeoutMs: 2000,
		});
	});

	it("should write a project config that reads back", async () => {
		const path = await writeProjectConfig(tempDir, {
			host: "git.company.com",
			hosts: ["a.corp.io", "b.corp.io"],
		});

		const content = await readFile(path, "utf-8");
		expect(content).toBe(
			"; agent-pm project configuration\n\nhost = git.company.com\nhosts = a.corp.io, b.corp.io\n",
		);
		expect(parseApmrc(content)).toEqual({
			host: "git.company.com",
			hosts: ["a.corp.io", "b.corp.io"],
		});
	});
});
