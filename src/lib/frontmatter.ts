import * as yaml from "js-yaml";

export interface FrontmatterSplit {
	/** Parsed mapping; null when absent or not a YAML mapping */
	frontmatter: Record<string, unknown> | null;
	body: string;
	rawFrontmatter?: string;
}

const BOUNDARY = "---";

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Split markdown content into parsed frontmatter (if present) and body.
 */
export function splitFrontmatter(content: string): FrontmatterSplit {
	const normalized = content.replace(/\r\n/g, "\n");
	if (!normalized.startsWith(BOUNDARY)) {
		return { frontmatter: null, body: content };
	}

	const firstLineBreak = normalized.indexOf("\n");
	if (firstLineBreak === -1) {
		return { frontmatter: null, body: content };
	}

	const endMarker = normalized.indexOf(`\n${BOUNDARY}`, firstLineBreak);
	if (endMarker === -1) {
		return { frontmatter: null, body: content };
	}

	const rawFrontmatter = normalized.slice(firstLineBreak + 1, endMarker).trim();

	let frontmatter: Record<string, unknown> | null = null;
	if (rawFrontmatter.length > 0) {
		try {
			const parsed: unknown = yaml.load(rawFrontmatter);
			frontmatter = isRecord(parsed) ? parsed : null;
		} catch {
			// Unparseable frontmatter reads as none
			frontmatter = null;
		}
	}

	const afterMarker = normalized.indexOf("\n", endMarker + 1);
	const body = afterMarker === -1 ? "" : normalized.slice(afterMarker + 1);

	return {
		frontmatter,
		body: body.startsWith("\n") ? body.slice(1) : body,
		rawFrontmatter,
	};
}

/**
 * Remove frontmatter from markdown content (if any) and return the body.
 */
export function stripFrontmatter(content: string): string {
	return splitFrontmatter(content).body;
}

/**
 * Read a string field from parsed frontmatter.
 */
export function frontmatterString(
	frontmatter: Record<string, unknown> | null,
	key: string,
): string | undefined {
	const value = frontmatter?.[key];
	if (typeof value === "string") return value.trim() || undefined;
	if (typeof value === "number" || typeof value === "boolean") {
		return String(value);
	}
	return undefined;
}

/**
 * Render a frontmatter block followed by a body.
 */
export function renderFrontmatter(
	data: Record<string, unknown>,
	body: string,
): string {
	const header = yaml
		.dump(data, { indent: 2, sortKeys: false, lineWidth: -1, quotingType: '"' })
		.trimEnd();
	return `${BOUNDARY}\n${header}\n${BOUNDARY}\n\n${body}`;
}
