import { describe, expect, it } from "vitest";
import { InvalidReferenceError } from "../errors";
import { UnsupportedHostError } from "./host";
import {
	getDisplayName,
	getInstallPath,
	getPackageName,
	getUniqueKey,
	getVirtualKind,
	normalizeRepoUrl,
	parseReference,
} from "./reference";

describe("parseReference", () => {
	it("should parse owner/repo", () => {
		expect(parseReference("owner/repo")).toEqual({
			host: undefined,
			repoUrl: "owner/repo",
			reference: undefined,
			alias: undefined,
			virtualPath: undefined,
			isVirtual: false,
			ado: undefined,
		});
	});

	it("should parse ref and alias suffixes", () => {
		const ref = parseReference("owner/repo#v1.0.0@tools");

		expect(ref.repoUrl).toBe("owner/repo");
		expect(ref.reference).toBe("v1.0.0");
		expect(ref.alias).toBe("tools");
	});

	it("should treat an empty ref as none", () => {
		expect(parseReference("owner/repo#").reference).toBeUndefined();
	});

	it("should parse HTTPS and SSH URLs", () => {
		const https = parseReference("https://github.com/Owner/Repo.git");
		expect(https.host).toBe("github.com");
		expect(https.repoUrl).toBe("Owner/Repo");

		const ssh = parseReference("git@github.com:owner/repo.git#main");
		expect(ssh.host).toBe("github.com");
		expect(ssh.repoUrl).toBe("owner/repo");
		expect(ssh.reference).toBe("main");
	});

	it("should parse Azure DevOps references with and without _git", () => {
		expect(parseReference("dev.azure.com/org/proj/_git/repo")).toMatchObject({
			host: "dev.azure.com",
			repoUrl: "org/proj/repo",
			ado: { organization: "org", project: "proj", repo: "repo" },
			isVirtual: false,
		});

		expect(parseReference("dev.azure.com/org/proj/repo/prompts/x.prompt.md")).toMatchObject({
			repoUrl: "org/proj/repo",
			virtualPath: "prompts/x.prompt.md",
			isVirtual: true,
		});
	});

	it("should parse virtual file and collection packages", () => {
		const file = parseReference("owner/repo/prompts/review.prompt.md");
		expect(file.virtualPath).toBe("prompts/review.prompt.md");
		expect(getVirtualKind(file)).toBe("file");

		const collection = parseReference("owner/repo/collections/web");
		expect(getVirtualKind(collection)).toBe("collection");

		expect(getVirtualKind(parseReference("owner/repo/docs/readme.md"))).toBeUndefined();
	});

	it("should accept the configured host", () => {
		const ref = parseReference("git.company.com/team/repo", {
			overrideHost: "git.company.com",
		});

		expect(ref.host).toBe("git.company.com");
		expect(ref.repoUrl).toBe("team/repo");
	});

	it("should reject unsupported hosts", () => {
		expect(() => parseReference("git.example.org/owner/repo")).toThrow(UnsupportedHostError);
	});

	it("should reject malformed specifications", () => {
		expect(() => parseReference("owner")).toThrow(
			'Invalid package reference "owner": expected owner/repo',
		);
		expect(() => parseReference("owner/../x")).toThrow('invalid path segment ".."');
		expect(() => parseReference("  ")).toThrow(InvalidReferenceError);
	});
});

describe("identity", () => {
	it("should key virtual packages by their path", () => {
		expect(getUniqueKey(parseReference("owner/repo#v2"))).toBe("owner/repo");
		expect(getUniqueKey(parseReference("owner/repo/prompts/review.prompt.md"))).toBe(
			"owner/repo/prompts/review.prompt.md",
		);
	});

	it("should compute install paths", () => {
		expect(getInstallPath(parseReference("owner/repo"))).toBe("owner/repo");
		expect(getInstallPath(parseReference("owner/repo/prompts/review.prompt.md"))).toBe(
			"owner/repo-review",
		);
		expect(getInstallPath(parseReference("owner/repo/collections/web"))).toBe(
			"owner/repo-web",
		);
		expect(getInstallPath(parseReference("dev.azure.com/org/proj/_git/repo"))).toBe(
			"org/proj/repo",
		);
		expect(getPackageName(parseReference("owner/repo/agents/sec.agent.md"))).toBe("repo-sec");
	});

	it("should format display names", () => {
		expect(
			getDisplayName(
				{ repoUrl: "owner/repo", reference: "main" },
				"0123456789abcdef0123456789abcdef01234567",
			),
		).toBe("owner/repo (main@0123456)");
		expect(getDisplayName({ host: "acme.ghe.com", repoUrl: "owner/repo" })).toBe(
			"acme.ghe.com/owner/repo",
		);
	});
});

describe("normalizeRepoUrl", () => {
	it("should strip scheme, host and .git", () => {
		expect(normalizeRepoUrl("https://github.com/Owner/Repo.git")).toBe("Owner/Repo");
		expect(normalizeRepoUrl("owner/repo/")).toBe("owner/repo");
	});
});
