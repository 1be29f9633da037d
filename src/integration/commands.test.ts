import { describe, expect, it } from "vitest";
import { getCommandTargetName, transformPromptToCommand } from "./commands";

describe("transformPromptToCommand", () => {
	it("should keep only the fields Claude reads and map aliases", () => {
		const content = [
			"---",
			"description: Review",
			"allowedTools: [Read, Grep]",
			"argumentHint: path",
			"mode: agent",
			"---",
			"",
			"Do it.",
			"",
		].join("\n");

		expect(transformPromptToCommand(content)).toBe(
			'---\ndescription: Review\nallowed-tools:\n  - Read\n  - Grep\nargument-hint: path\n---\n\nDo it.\n',
		);
	});

	it("should prefer the hyphenated key over its alias", () => {
		const content = "---\nallowed-tools: Bash\nallowedTools: Read\n---\nBody\n";

		expect(transformPromptToCommand(content)).toBe(
			"---\nallowed-tools: Bash\n---\n\nBody\n",
		);
	});

	it("should return the body when no field survives", () => {
		expect(transformPromptToCommand("---\nmode: agent\n---\nBody\n")).toBe("Body\n");
		expect(transformPromptToCommand("Plain\n")).toBe("Plain\n");
	});
});

describe("getCommandTargetName", () => {
	it("should add the managed suffix", () => {
		expect(getCommandTargetName("/pkg/.apm/prompts/design-review.prompt.md")).toBe(
			"design-review-apm.md",
		);
	});
});
