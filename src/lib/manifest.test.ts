import { describe, expect, it } from "vitest";
import { ManifestError } from "../errors";
import {
	createMinimalManifest,
	manifestToYaml,
	parseManifest,
	validateManifest,
} from "./manifest";

describe("validateManifest", () => {
	it("should fill in defaults", () => {
		const result = validateManifest({ name: "demo", version: "1.0.0" });

		expect(result).toEqual({
			valid: true,
			manifest: {
				name: "demo",
				version: "1.0.0",
				description: undefined,
				author: undefined,
				license: undefined,
				repository: undefined,
				homepage: undefined,
				tags: [],
				type: undefined,
				dependencies: { apm: [], mcp: [] },
			},
		});
	});

	it("should require name and version", () => {
		expect(validateManifest({ version: "1.0.0" })).toEqual({
			valid: false,
			error: "Manifest must have a 'name' field",
		});
		expect(validateManifest({ name: "demo" })).toEqual({
			valid: false,
			error: "Manifest must have a 'version' field",
		});
		expect(validateManifest(["demo"])).toEqual({
			valid: false,
			error: "Manifest must be a YAML mapping",
		});
	});

	it("should reject unknown package types", () => {
		const result = validateManifest({ name: "demo", version: "1.0.0", type: "plugin" });

		expect(result).toEqual({
			valid: false,
			error: "'type' must be one of: instructions, skill, hybrid, prompts",
		});
	});

	it("should trim and drop empty dependency entries", () => {
		const result = validateManifest({
			name: "demo",
			version: "1.0.0",
			dependencies: { apm: [" owner/a ", "", "owner/b"], mcp: [{ name: "server" }] },
		});

		expect(result.valid && result.manifest.dependencies).toEqual({
			apm: ["owner/a", "owner/b"],
			mcp: [{ name: "server" }],
		});
	});

	it("should reject non-string dependency lists", () => {
		expect(
			validateManifest({ name: "demo", version: "1.0.0", dependencies: { apm: [1] } }),
		).toEqual({
			valid: false,
			error: "'dependencies.apm' must be a list of package specifications",
		});
	});
});

describe("parseManifest", () => {
	it("should report versions that are not semver", () => {
		expect(() => parseManifest("name: demo\nversion: 1.0\n")).toThrow(
			'Invalid apm.yml: Version must be a valid semantic version (e.g., 1.0.0), got "1"',
		);
	});

	it("should report YAML syntax errors", () => {
		expect(() => parseManifest("name: [demo\n", "pkg/apm.yml")).toThrow(ManifestError);
		expect(() => parseManifest("name: [demo\n", "pkg/apm.yml")).toThrow(
			/^Invalid YAML in pkg\/apm\.yml: /,
		);
	});
});

describe("manifestToYaml", () => {
	it("should write a minimal manifest", () => {
		expect(manifestToYaml(createMinimalManifest("demo"))).toBe(
			"name: demo\nversion: 1.0.0\ndependencies:\n  apm: []\n",
		);
	});

	it("should omit empty optional fields", () => {
		const manifest = createMinimalManifest("demo");
		manifest.author = "platform-team";
		manifest.dependencies.apm = ["owner/a"];

		expect(manifestToYaml(manifest)).toBe(
			"name: demo\nversion: 1.0.0\nauthor: platform-team\ndependencies:\n  apm:\n    - owner/a\n",
		);
	});
});
