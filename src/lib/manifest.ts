/**
 * Package manifest format (apm.yml)
 *
 * Every project and every installable package may carry one. Fields that
 * are absent take the defaults documented on {@link ApmManifest}.
 *
 * @example
 * ```yaml
 * name: my-project
 * version: 1.0.0
 * description: Shared prompts for the platform team
 * author: platform-team
 * dependencies:
 *   apm:
 *     - owner/design-guidelines
 *     - owner/prompts/prompts/code-review.prompt.md
 *     - dev.azure.com/org/project/_git/compliance-rules#v2.0.0
 * ```
 */

import * as yaml from "js-yaml";
import * as semver from "semver";
import { ManifestError } from "../errors";

/**
 * How a package's content is integrated
 */
export type PackageContentType = "instructions" | "skill" | "hybrid" | "prompts";

const PACKAGE_TYPES: readonly PackageContentType[] = [
	"instructions",
	"skill",
	"hybrid",
	"prompts",
];

export interface ManifestDependencies {
	/** Package specifications, in declaration order (default: []) */
	apm: string[];
	/** MCP server declarations; kept as written (default: []) */
	mcp: unknown[];
}

export interface ApmManifest {
	name: string;
	/** Semantic version */
	version: string;
	description?: string;
	author?: string;
	license?: string;
	repository?: string;
	homepage?: string;
	/** Discovery tags (default: []) */
	tags: string[];
	/** Declared content type; shown by `deps info` */
	type?: PackageContentType;
	dependencies: ManifestDependencies;
}

export type ManifestValidationResult =
	| { valid: true; manifest: ApmManifest }
	| { valid: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalText(value: unknown): string | undefined {
	if (typeof value === "string") return value.trim() || undefined;
	if (typeof value === "number") return String(value);
	return undefined;
}

function isStringList(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Validate a parsed apm.yml document and produce the typed manifest
 */
export function validateManifest(data: unknown): ManifestValidationResult {
	if (!isRecord(data)) {
		return { valid: false, error: "Manifest must be a YAML mapping" };
	}

	const name = optionalText(data.name);
	if (!name) {
		return { valid: false, error: "Manifest must have a 'name' field" };
	}

	const version = optionalText(data.version);
	if (!version) {
		return { valid: false, error: "Manifest must have a 'version' field" };
	}

	if (!semver.valid(version)) {
		return {
			valid: false,
			error: `Version must be a valid semantic version (e.g., 1.0.0), got "${version}"`,
		};
	}

	let tags: string[] = [];
	if (data.tags !== undefined && data.tags !== null) {
		if (!isStringList(data.tags)) {
			return { valid: false, error: "'tags' must be a list of strings" };
		}
		tags = data.tags;
	}

	let type: PackageContentType | undefined;
	if (data.type !== undefined && data.type !== null) {
		const found = PACKAGE_TYPES.find((t) => t === data.type);
		if (!found) {
			return {
				valid: false,
				error: `'type' must be one of: ${PACKAGE_TYPES.join(", ")}`,
			};
		}
		type = found;
	}

	const dependencies: ManifestDependencies = { apm: [], mcp: [] };
	if (data.dependencies !== undefined && data.dependencies !== null) {
		if (!isRecord(data.dependencies)) {
			return { valid: false, error: "'dependencies' must be a mapping" };
		}
		const { apm, mcp } = data.dependencies;
		if (apm !== undefined && apm !== null) {
			if (!isStringList(apm)) {
				return {
					valid: false,
					error: "'dependencies.apm' must be a list of package specifications",
				};
			}
			dependencies.apm = apm.map((spec) => spec.trim()).filter(Boolean);
		}
		if (mcp !== undefined && mcp !== null) {
			if (!Array.isArray(mcp)) {
				return { valid: false, error: "'dependencies.mcp' must be a list" };
			}
			dependencies.mcp = mcp;
		}
	}

	return {
		valid: true,
		manifest: {
			name,
			version,
			description: optionalText(data.description),
			author: optionalText(data.author),
			license: optionalText(data.license),
			repository: optionalText(data.repository),
			homepage: optionalText(data.homepage),
			tags,
			type,
			dependencies,
		},
	};
}

/**
 * Parse apm.yml content.
 *
 * @throws ManifestError on YAML syntax errors or missing required fields
 */
export function parseManifest(content: string, source = "apm.yml"): ApmManifest {
	let data: unknown;
	try {
		data = yaml.load(content);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		throw new ManifestError(`Invalid YAML in ${source}: ${reason}`);
	}

	const result = validateManifest(data);
	if (!result.valid) {
		throw new ManifestError(`Invalid ${source}: ${result.error}`);
	}
	return result.manifest;
}

/**
 * Serialize a manifest back to YAML, omitting empty optional fields
 */
export function manifestToYaml(manifest: ApmManifest): string {
	const document: Record<string, unknown> = {
		name: manifest.name,
		version: manifest.version,
	};
	if (manifest.description) document.description = manifest.description;
	if (manifest.author) document.author = manifest.author;
	if (manifest.license) document.license = manifest.license;
	if (manifest.repository) document.repository = manifest.repository;
	if (manifest.homepage) document.homepage = manifest.homepage;
	if (manifest.type) document.type = manifest.type;
	if (manifest.tags.length > 0) document.tags = manifest.tags;

	const dependencies: Record<string, unknown> = { apm: manifest.dependencies.apm };
	if (manifest.dependencies.mcp.length > 0) {
		dependencies.mcp = manifest.dependencies.mcp;
	}
	document.dependencies = dependencies;

	return yaml.dump(document, {
		indent: 2,
		sortKeys: false,
		lineWidth: -1,
	});
}

/**
 * Create a minimal manifest for a project that has none
 */
export function createMinimalManifest(name: string): ApmManifest {
	return {
		name,
		version: "1.0.0",
		tags: [],
		dependencies: { apm: [], mcp: [] },
	};
}
