/**
 * Collection manifests (`{name}.collection.yml`)
 *
 * A collection groups files from one repository into a single installable
 * virtual package.
 *
 * @example
 * ```yaml
 * id: project-planning
 * name: Project Planning
 * description: Prompts and agents for planning work
 * tags: [planning, agile]
 * items:
 *   - path: prompts/breakdown.prompt.md
 *     kind: prompt
 *   - path: agents/planner.agent.md
 *     kind: agent
 * ```
 */

import * as yaml from "js-yaml";

export type CollectionItemKind =
	| "prompt"
	| "instruction"
	| "chat-mode"
	| "agent"
	| "context";

/** .apm/ subdirectory each item kind is placed in */
export const COLLECTION_KIND_DIRS: Record<CollectionItemKind, string> = {
	prompt: "prompts",
	instruction: "instructions",
	"chat-mode": "chatmodes",
	agent: "agents",
	context: "contexts",
};

export interface CollectionItem {
	/** Repository-relative file path */
	path: string;
	kind: CollectionItemKind;
}

export interface CollectionManifest {
	id: string;
	name: string;
	description: string;
	tags: string[];
	items: CollectionItem[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isItemKind(value: unknown): value is CollectionItemKind {
	return typeof value === "string" && Object.hasOwn(COLLECTION_KIND_DIRS, value);
}

function requiredText(data: Record<string, unknown>, key: string): string {
	const value = data[key];
	if (typeof value !== "string" || !value.trim()) {
		throw new Error(`missing required field '${key}'`);
	}
	return value.trim();
}

/**
 * Parse and validate collection manifest content.
 *
 * @throws Error naming the first problem found
 */
export function parseCollectionManifest(content: string): CollectionManifest {
	let data: unknown;
	try {
		data = yaml.load(content);
	} catch (error) {
		throw new Error(
			`invalid YAML: ${error instanceof Error ? error.message : String(error)}`,
		);
	}

	if (!isRecord(data)) {
		throw new Error("collection manifest must be a YAML mapping");
	}

	const id = requiredText(data, "id");
	const name = requiredText(data, "name");
	const description = requiredText(data, "description");

	if (!Array.isArray(data.items) || data.items.length === 0) {
		throw new Error("collection must list at least one item");
	}

	const items: CollectionItem[] = data.items.map((raw, index) => {
		if (!isRecord(raw)) {
			throw new Error(`item ${index + 1} must be a mapping`);
		}
		if (typeof raw.path !== "string" || !raw.path.trim()) {
			throw new Error(`item ${index + 1} is missing 'path'`);
		}
		if (raw.kind === undefined || raw.kind === null) {
			throw new Error(`item ${index + 1} is missing 'kind'`);
		}
		if (!isItemKind(raw.kind)) {
			throw new Error(
				`item ${index + 1} has unknown kind '${String(raw.kind)}' (expected one of: ${Object.keys(COLLECTION_KIND_DIRS).join(", ")})`,
			);
		}
		return { path: raw.path.trim(), kind: raw.kind };
	});

	const tags = Array.isArray(data.tags)
		? data.tags.filter((tag): tag is string => typeof tag === "string")
		: [];

	return { id, name, description, tags, items };
}
