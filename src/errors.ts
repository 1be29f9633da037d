/**
 * Base error class for configuration errors (.apmrc, environment)
 */
export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

/**
 * Error thrown when a package specification cannot be parsed
 */
export class InvalidReferenceError extends Error {
	constructor(
		public readonly spec: string,
		reason: string,
	) {
		super(`Invalid package reference "${spec}": ${reason}`);
		this.name = "InvalidReferenceError";
	}
}

/**
 * Error thrown when apm.yml is missing required fields or is not valid YAML
 */
export class ManifestError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ManifestError";
	}
}

/**
 * Error thrown when `install <pkg>` names a package that is already a
 * direct dependency
 */
export class DeclarationConflictError extends Error {
	constructor(public readonly packages: string[]) {
		const list = packages.map((p) => `  - ${p}`).join("\n");
		super(
			`Already declared in apm.yml:\n${list}\nRun 'apm install --update' to refresh installed dependencies.`,
		);
		this.name = "DeclarationConflictError";
	}
}

export type FetchErrorKind =
	| "not_found"
	| "auth"
	| "rate_limit"
	| "network"
	| "http"
	| "invalid_package";

/**
 * Error thrown by the package fetcher. `kind` tells callers whether a
 * branch fallback or a credential hint applies.
 */
export class PackageFetchError extends Error {
	constructor(
		public readonly kind: FetchErrorKind,
		message: string,
		public readonly status?: number,
	) {
		super(message);
		this.name = "PackageFetchError";
	}
}

/**
 * Get a human-readable message from any thrown value
 */
export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
