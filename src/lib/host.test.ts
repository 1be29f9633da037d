import { describe, expect, it } from "vitest";
import {
	buildContentsApiUrl,
	buildHttpsCloneUrl,
	buildSshCloneUrl,
	getHostFamily,
	isSupportedGitHost,
	isValidFqdn,
	sanitizeMessage,
	UnsupportedHostError,
} from "./host";

describe("isValidFqdn", () => {
	it("should accept dotted host names", () => {
		expect(isValidFqdn("github.com")).toBe(true);
		expect(isValidFqdn("git.internal.corp")).toBe(true);
	});

	it("should reject single labels and malformed labels", () => {
		expect(isValidFqdn("localhost")).toBe(false);
		expect(isValidFqdn("bad-.example.com")).toBe(false);
		expect(isValidFqdn("")).toBe(false);
		expect(isValidFqdn(undefined)).toBe(false);
	});
});

describe("isSupportedGitHost", () => {
	it("should accept known platforms", () => {
		expect(isSupportedGitHost("github.com")).toBe(true);
		expect(isSupportedGitHost("acme.ghe.com")).toBe(true);
		expect(isSupportedGitHost("dev.azure.com")).toBe(true);
		expect(isSupportedGitHost("acme.visualstudio.com")).toBe(true);
	});

	it("should accept the override host and extra hosts only", () => {
		expect(isSupportedGitHost("git.company.com")).toBe(false);
		expect(isSupportedGitHost("git.company.com", { overrideHost: "GIT.company.com" })).toBe(
			true,
		);
		expect(isSupportedGitHost("code.corp.io", { extraHosts: ["code.corp.io"] })).toBe(true);
	});
});

describe("getHostFamily", () => {
	it("should classify hosts", () => {
		expect(getHostFamily("github.com")).toBe("github");
		expect(getHostFamily("acme.ghe.com")).toBe("ghe-cloud");
		expect(getHostFamily("git.company.com")).toBe("ghes");
		expect(getHostFamily("dev.azure.com")).toBe("ado-cloud");
		expect(getHostFamily("tfs.company.com", true)).toBe("ado-server");
	});
});

describe("URL builders", () => {
	it("should build content API URLs per family", () => {
		expect(buildContentsApiUrl("github.com", "owner/repo", "docs/a b.md", "main")).toBe(
			"https://api.github.com/repos/owner/repo/contents/docs/a%20b.md?ref=main",
		);
		expect(buildContentsApiUrl("acme.ghe.com", "owner/repo", "apm.yml", "v1")).toBe(
			"https://api.acme.ghe.com/repos/owner/repo/contents/apm.yml?ref=v1",
		);
		expect(buildContentsApiUrl("git.company.com", "team/repo", "apm.yml", "main")).toBe(
			"https://git.company.com/api/v3/repos/team/repo/contents/apm.yml?ref=main",
		);
		expect(
			buildContentsApiUrl("dev.azure.com", "org/proj/repo", "apm.yml", "main", {
				organization: "org",
				project: "proj",
				repo: "repo",
			}),
		).toBe(
			"https://dev.azure.com/org/proj/_apis/git/repositories/repo/items?path=apm.yml&versionDescriptor.version=main&api-version=7.0",
		);
	});

	it("should build HTTPS clone URLs with and without a token", () => {
		expect(buildHttpsCloneUrl("github.com", "owner/repo")).toBe(
			"https://github.com/owner/repo.git",
		);
		expect(buildHttpsCloneUrl("github.com", "owner/repo", "test-token")).toBe(
			"https://test-token@github.com/owner/repo.git",
		);
		expect(buildHttpsCloneUrl("dev.azure.com", "org/proj/repo")).toBe(
			"https://dev.azure.com/org/proj/_git/repo",
		);
	});

	it("should build SSH clone URLs", () => {
		expect(buildSshCloneUrl("github.com", "owner/repo")).toBe("git@github.com:owner/repo.git");
		expect(buildSshCloneUrl("dev.azure.com", "org/proj/repo")).toBe(
			"git@ssh.dev.azure.com:v3/org/proj/repo",
		);
		expect(
			buildSshCloneUrl("tfs.company.com", "org/proj/repo", {
				organization: "org",
				project: "proj",
				repo: "repo",
			}),
		).toBe("ssh://git@tfs.company.com/org/proj/_git/repo");
	});
});

describe("UnsupportedHostError", () => {
	it("should explain how to enable the host", () => {
		const error = new UnsupportedHostError("git.example.org", {
			overrideHost: "git.company.com",
		});

		expect(error.name).toBe("UnsupportedHostError");
		expect(error.message.split("\n")[0]).toBe('Unsupported git host: "git.example.org"');
		expect(error.message).toContain(
			'GITHUB_HOST is currently set to "git.company.com", which does not match "git.example.org".',
		);
		expect(error.message).toContain("  bash/zsh:    export GITHUB_HOST=git.example.org");
	});
});

describe("sanitizeMessage", () => {
	it("should mask tokens in URLs and environment assignments", () => {
		expect(sanitizeMessage("fatal: https://test-token@github.com/o/r.git not found")).toBe(
			"fatal: https://***@github.com/o/r.git not found",
		);
		expect(sanitizeMessage("GITHUB_TOKEN=test-token failed")).toBe("GITHUB_TOKEN=*** failed");
	});

	it("should leave other text alone", () => {
		expect(sanitizeMessage("https://github.com/o/r.git")).toBe("https://github.com/o/r.git");
	});
});
