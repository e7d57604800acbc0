/**
 * Base error class for typkg configuration errors
 * (cache root unset or invalid, unreadable settings).
 */
export class ConfigurationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigurationError";
	}
}

/**
 * Error thrown when a command needs a token and none is configured
 */
export class NotLoggedInError extends ConfigurationError {
	constructor() {
		super(
			"Not logged in. Run 'typkg login --token <token>' first, or set TYPKG_TOKEN env var.",
		);
		this.name = "NotLoggedInError";
	}
}

/**
 * Transport failure or non-success HTTP status
 */
export class NetworkError extends Error {
	constructor(
		message: string,
		public readonly status?: number,
	) {
		super(message);
		this.name = "NetworkError";
	}
}

/**
 * The number of bytes written differs from the announced size
 */
export class SizeMismatchError extends Error {
	constructor(
		public readonly expected: number,
		public readonly actual: number,
	) {
		super(`Download size mismatch: expected ${expected} bytes, got ${actual}`);
		this.name = "SizeMismatchError";
	}
}

/**
 * Unrecognized archive, malformed archive entry, or malformed/incomplete manifest
 */
export class FormatError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "FormatError";
	}
}

/**
 * Empty or invalid semantic version string
 */
export class VersionError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "VersionError";
	}
}

/**
 * An operation was called before the state it depends on exists
 */
export class PreconditionError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "PreconditionError";
	}
}

/**
 * Zero or several release assets match the current platform
 */
export class PlatformAssetNotFoundError extends Error {
	constructor(
		public readonly os: string,
		public readonly arch: string,
		public readonly matches: string[] = [],
	) {
		const detail =
			matches.length > 1 ? ` (ambiguous: ${matches.join(", ")})` : "";
		super(`No matching release asset for ${os}-${arch}${detail}`);
		this.name = "PlatformAssetNotFoundError";
	}
}

/**
 * Filesystem failure on the package cache path
 */
export class CacheError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "CacheError";
	}
}

/**
 * Error body returned by the registry
 */
interface ApiErrorResponse {
	error?: string;
	description?: string;
	report?: string[];
}

/**
 * Get a human-readable description for common HTTP status codes
 */
function getHttpStatusDescription(status: number): string {
	const descriptions: Record<number, string> = {
		400: "Bad Request - The request was malformed",
		401: "Unauthorized - Please run 'typkg login' first",
		403: "Forbidden - You don't have permission for this action",
		404: "Not Found - The package or endpoint doesn't exist",
		409: "Conflict - This version has already been published",
		413: "Payload Too Large - The package archive is too big",
		422: "Validation Error - The package failed validation",
		429: "Too Many Requests - Please slow down and try again",
		500: "Internal Server Error - Something went wrong on the server",
		502: "Bad Gateway - The server is temporarily unavailable",
		503: "Service Unavailable - The server is temporarily unavailable",
	};
	return descriptions[status] || `HTTP Error ${status}`;
}

function isApiErrorResponse(value: unknown): value is ApiErrorResponse {
	return value !== null && typeof value === "object";
}

/**
 * Extract a human-readable error message from a registry response
 */
export function extractApiErrorMessage(
	response: { status: number; data: unknown },
	fallbackMessage: string,
): string {
	const errorData = response.data;

	if (process.env.TYPKG_DEBUG) {
		console.log(`[debug] API response status: ${response.status}`);
		console.log(
			"[debug] API response data:",
			JSON.stringify(errorData, null, 2),
		);
	}

	// Plain-text bodies ("404 page not found")
	if (typeof errorData === "string" && errorData.trim() !== "") {
		return `${fallbackMessage}: ${errorData.trim()} (HTTP ${response.status})`;
	}

	if (!isApiErrorResponse(errorData)) {
		return `${fallbackMessage}: ${getHttpStatusDescription(response.status)}`;
	}

	let errorMessage = errorData.error || fallbackMessage;
	if (errorData.description) {
		errorMessage += `: ${errorData.description}`;
	}

	if (errorData.report && errorData.report.length > 0) {
		const lines = errorData.report.map((line) => `  - ${line}`).join("\n");
		errorMessage += `\nValidation report:\n${lines}`;
	}

	if (response.status >= 400) {
		errorMessage += ` (HTTP ${response.status})`;
	}

	return errorMessage;
}
