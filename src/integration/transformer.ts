/**
 * Legacy skill-to-agent conversion.
 *
 * Older agent hosts cannot read SKILL.md, so a skill can also be written
 * as `.github/agents/{name}.agent.md`. The generated file records where it
 * came from and a hash of the body it was built from.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import {
	frontmatterString,
	renderFrontmatter,
	splitFrontmatter,
	stripFrontmatter,
} from "../lib/frontmatter";
import { calculateContentHash, verifyContentHash } from "../lib/integrity";
import { pathExists, SKILL_FILENAME } from "../modules";
import { getTargetDir } from "../targets";
import type { IntegrationPackage } from "./files";
import { toHyphenCase } from "./skills";

const DEPENDENCY_SOURCE_PREFIX = "dependency:";

/**
 * A skill read from SKILL.md
 */
export interface SkillDocument {
	name: string;
	description: string;
	/** Full SKILL.md content, frontmatter included */
	content: string;
	/** `local`, or `dependency:{repoUrl}` */
	source: string;
}

export interface TransformOptions {
	/** Compute the target path without writing */
	dryRun?: boolean;
}

/**
 * Read a SKILL.md file. The name falls back to the containing directory.
 */
export async function loadSkillDocument(
	skillFile: string,
	source = "local",
): Promise<SkillDocument> {
	const content = await readFile(skillFile, "utf-8");
	const { frontmatter } = splitFrontmatter(content);
	return {
		name: frontmatterString(frontmatter, "name") ?? basename(dirname(skillFile)),
		description: frontmatterString(frontmatter, "description") ?? "",
		content,
		source,
	};
}

export function getAgentFileName(skill: Pick<SkillDocument, "name">): string {
	return `${toHyphenCase(skill.name)}.agent.md`;
}

/**
 * Render the agent file for a skill.
 */
export function renderSkillAgent(skill: SkillDocument): string {
	const body = stripFrontmatter(skill.content);

	const apm: Record<string, string> = { source_type: "skill" };
	if (skill.source.startsWith(DEPENDENCY_SOURCE_PREFIX)) {
		apm.source_dependency = skill.source.slice(DEPENDENCY_SOURCE_PREFIX.length);
	}
	apm.content_hash = calculateContentHash(body);

	const attribution = skill.source.startsWith(DEPENDENCY_SOURCE_PREFIX)
		? `<!-- Source: ${skill.source} -->\n\n`
		: "";

	return renderFrontmatter(
		{ name: skill.name, description: skill.description, apm },
		`${attribution}${body}`,
	);
}

/**
 * Write a skill as `.github/agents/{hyphen-name}.agent.md`.
 *
 * @returns Path of the agent file
 */
export async function transformSkillToAgent(
	skill: SkillDocument,
	projectRoot: string,
	options: TransformOptions = {},
): Promise<string> {
	const agentsDir = getTargetDir(projectRoot, "vscode", "agents");
	const target = join(agentsDir, getAgentFileName(skill));
	if (options.dryRun) return target;

	await mkdir(agentsDir, { recursive: true });
	await writeFile(target, renderSkillAgent(skill));
	return target;
}

/**
 * Whether a generated agent file still matches the skill it came from.
 */
export async function isAgentCurrent(
	agentFile: string,
	skill: SkillDocument,
): Promise<boolean> {
	let content: string;
	try {
		content = await readFile(agentFile, "utf-8");
	} catch {
		return false;
	}
	const apm = splitFrontmatter(content).frontmatter?.apm;
	if (typeof apm !== "object" || apm === null || !("content_hash" in apm)) {
		return false;
	}
	const hash = apm.content_hash;
	return (
		typeof hash === "string" &&
		verifyContentHash(stripFrontmatter(skill.content), hash)
	);
}

export interface SkillAgentSyncResult {
	/** Agent files written (or that would be, on a dry run) */
	written: string[];
	/** Agent files already matching their skill */
	current: string[];
}

/**
 * Write legacy agent files for every skill package, and for the project's
 * own SKILL.md when it has one. Files that still match are left untouched.
 */
export async function syncSkillAgents(
	packages: IntegrationPackage[],
	projectRoot: string,
	options: TransformOptions = {},
): Promise<SkillAgentSyncResult> {
	const sources: Array<{ file: string; source: string }> = [
		{ file: join(projectRoot, SKILL_FILENAME), source: "local" },
		...packages
			.filter((pkg) => !pkg.isVirtual)
			.map((pkg) => ({
				file: join(pkg.path, SKILL_FILENAME),
				source: `${DEPENDENCY_SOURCE_PREFIX}${pkg.key}`,
			})),
	];

	const result: SkillAgentSyncResult = { written: [], current: [] };
	for (const { file, source } of sources) {
		if (!(await pathExists(file))) continue;
		const skill = await loadSkillDocument(file, source);
		const target = join(getTargetDir(projectRoot, "vscode", "agents"), getAgentFileName(skill));
		if (await isAgentCurrent(target, skill)) {
			result.current.push(target);
			continue;
		}
		result.written.push(await transformSkillToAgent(skill, projectRoot, options));
	}
	return result;
}
