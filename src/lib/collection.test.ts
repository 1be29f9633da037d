import { describe, expect, it } from "vitest";
import { parseCollectionManifest } from "./collection";

const VALID = `id: planning
name: Planning
description: Planning helpers
tags:
  - planning
items:
  - path: prompts/breakdown.prompt.md
    kind: prompt
  - path: agents/planner.agent.md
    kind: agent
`;

describe("parseCollectionManifest", () => {
	it("should parse a valid manifest", () => {
		const manifest = parseCollectionManifest(VALID);

		expect(manifest.id).toBe("planning");
		expect(manifest.tags).toEqual(["planning"]);
		expect(manifest.items).toEqual([
			{ path: "prompts/breakdown.prompt.md", kind: "prompt" },
			{ path: "agents/planner.agent.md", kind: "agent" },
		]);
	});

	it("should default tags to an empty list", () => {
		const manifest = parseCollectionManifest(
			"id: x\nname: X\ndescription: d\nitems:\n  - path: a.prompt.md\n    kind: prompt\n",
		);
		expect(manifest.tags).toEqual([]);
	});

	it("should reject a manifest without items", () => {
		expect(() =>
			parseCollectionManifest("id: x\nname: X\ndescription: d\nitems: []\n"),
		).toThrow("collection must list at least one item");
	});

	it("should reject a missing required field", () => {
		expect(() =>
			parseCollectionManifest("id: x\nname: X\nitems:\n  - path: a\n    kind: prompt\n"),
		).toThrow("missing required field 'description'");
	});

	it("should reject an item without a kind", () => {
		expect(() =>
			parseCollectionManifest(
				"id: x\nname: X\ndescription: d\nitems:\n  - path: a.prompt.md\n",
			),
		).toThrow("item 1 is missing 'kind'");
	});

	it("should reject an unknown kind", () => {
		expect(() =>
			parseCollectionManifest(
				"id: x\nname: X\ndescription: d\nitems:\n  - path: a.md\n    kind: widget\n",
			),
		).toThrow("item 1 has unknown kind 'widget'");
	});
});
