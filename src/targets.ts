/**
 * Integration targets.
 *
 * Defines where each supported coding agent expects integrated content.
 */

import { stat } from "node:fs/promises";
import { join } from "node:path";

export type IntegrationTarget = "vscode" | "claude";

/**
 * Target metadata for display and path building.
 */
export interface TargetInfo {
	/** Human-readable name for display */
	displayName: string;
	/** Root directory inside the project */
	rootDir: string;
	/** Written only when the root directory already exists */
	optIn: boolean;
}

export const TARGET_INFO: Record<IntegrationTarget, TargetInfo> = {
	vscode: {
		displayName: "VS Code / GitHub Copilot",
		rootDir: ".github",
		optIn: false,
	},
	claude: {
		displayName: "Claude",
		rootDir: ".claude",
		optIn: true,
	},
};

/**
 * All targets in display order.
 */
export const ALL_TARGETS: IntegrationTarget[] = ["vscode", "claude"];

async function isDirectory(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isDirectory();
	} catch {
		return false;
	}
}

/**
 * Detect active targets for a project. Opt-in targets are active only when
 * their root directory exists; integration never creates it.
 *
 * @example
 * ```typescript
 * await detectTargets("/work/project")
 * // => ["vscode"]              (no .claude/ directory)
 * // => ["vscode", "claude"]    (.claude/ present)
 * ```
 */
export async function detectTargets(projectRoot: string): Promise<IntegrationTarget[]> {
	const active: IntegrationTarget[] = [];
	for (const target of ALL_TARGETS) {
		const info = TARGET_INFO[target];
		if (!info.optIn || (await isDirectory(join(projectRoot, info.rootDir)))) {
			active.push(target);
		}
	}
	return active;
}

/**
 * Directory for one kind of integrated content under a target,
 * e.g. `.github/prompts` or `.claude/commands`.
 */
export function getTargetDir(
	projectRoot: string,
	target: IntegrationTarget,
	kind: string,
): string {
	return join(projectRoot, TARGET_INFO[target].rootDir, kind);
}
