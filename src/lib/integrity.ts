import { createHash } from "node:crypto";

/**
 * SHA-256 of text content, hex encoded.
 *
 * @example
 * ```typescript
 * calculateContentHash("") // => "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855"
 * ```
 */
export function calculateContentHash(content: string): string {
	return createHash("sha256").update(content, "utf-8").digest("hex");
}

/**
 * Check text content against a recorded hash.
 */
export function verifyContentHash(content: string, expectedHash: string): boolean {
	return calculateContentHash(content) === expectedHash.toLowerCase();
}
