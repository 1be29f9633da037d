import { readFile, writeFile } from "node:fs/promises";
import { basename, join } from "node:path";
import * as yaml from "js-yaml";
import { MANIFEST_FILENAME } from "./config";
import { ManifestError } from "./errors";
import {
	type ApmManifest,
	createMinimalManifest,
	manifestToYaml,
	parseManifest,
} from "./lib/manifest";

/**
 * Get the manifest file path (apm.yml in the project root)
 */
export function getManifestPath(projectRoot: string): string {
	return join(projectRoot, MANIFEST_FILENAME);
}

async function readManifestText(projectRoot: string): Promise<string | null> {
	try {
		return await readFile(getManifestPath(projectRoot), "utf-8");
	} catch {
		return null;
	}
}

/**
 * Read the project manifest (apm.yml).
 * Returns null if the file doesn't exist.
 *
 * @throws ManifestError when the file exists but is invalid
 */
export async function readManifest(
	projectRoot: string,
): Promise<ApmManifest | null> {
	const content = await readManifestText(projectRoot);
	if (content === null) return null;
	return parseManifest(content, getManifestPath(projectRoot));
}

/**
 * Write a manifest from scratch
 */
export async function writeManifest(
	projectRoot: string,
	manifest: ApmManifest,
): Promise<void> {
	await writeFile(getManifestPath(projectRoot), manifestToYaml(manifest));
}

/**
 * Ensure a manifest exists, creating a minimal one named after the
 * project directory if needed
 */
export async function ensureManifest(projectRoot: string): Promise<ApmManifest> {
	const existing = await readManifest(projectRoot);
	if (existing) return existing;

	const manifest = createMinimalManifest(basename(projectRoot) || "project");
	await writeManifest(projectRoot, manifest);
	return manifest;
}

/**
 * Get the direct dependency specifications, in declaration order.
 * Returns [] if the manifest doesn't exist.
 */
export async function getApmDependencies(projectRoot: string): Promise<string[]> {
	const manifest = await readManifest(projectRoot);
	return manifest?.dependencies.apm ?? [];
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Rewrite `dependencies.apm` in place, leaving every other key of the
 * document (scripts, custom fields) as it was.
 */
async function updateApmDependencies(
	projectRoot: string,
	update: (current: string[]) => string[],
): Promise<void> {
	await ensureManifest(projectRoot);
	const content = (await readManifestText(projectRoot)) ?? "";
	const document: unknown = yaml.load(content);
	if (!isRecord(document)) {
		throw new ManifestError(`${MANIFEST_FILENAME} must be a YAML mapping`);
	}

	const raw: Record<string, unknown> = { ...document };
	const deps: Record<string, unknown> = isRecord(raw.dependencies)
		? { ...raw.dependencies }
		: {};
	const current = Array.isArray(deps.apm)
		? deps.apm.filter((item): item is string => typeof item === "string")
		: [];

	deps.apm = update(current);
	raw.dependencies = deps;

	await writeFile(
		getManifestPath(projectRoot),
		yaml.dump(raw, { indent: 2, sortKeys: false, lineWidth: -1 }),
	);
}

/**
 * Append dependency specifications to apm.yml, creating it if needed
 */
export async function addDependencies(
	projectRoot: string,
	specs: string[],
): Promise<void> {
	await updateApmDependencies(projectRoot, (current) => [...current, ...specs]);
}

/**
 * Remove dependency specifications from apm.yml
 *
 * @param specs - Entries exactly as they appear in the manifest
 */
export async function removeDependencies(
	projectRoot: string,
	specs: string[],
): Promise<void> {
	const toRemove = new Set(specs);
	await updateApmDependencies(projectRoot, (current) =>
		current.filter((spec) => !toRemove.has(spec)),
	);
}
