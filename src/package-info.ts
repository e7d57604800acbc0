import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

// Read version from package.json (one level above both src/ and dist/)
const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Load package.json, or undefined when it is missing or unreadable
 * (a standalone binary ships without one).
 */
export function loadPackageJson(path: string): unknown {
	try {
		return JSON.parse(readFileSync(path, "utf-8"));
	} catch (error) {
		if (process.env.TYPKG_DEBUG) {
			console.log(
				`[version] cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`,
			);
		}
		return undefined;
	}
}

export function readVersion(value: unknown): string {
	if (
		value !== null &&
		typeof value === "object" &&
		"version" in value &&
		typeof value.version === "string"
	) {
		return value.version;
	}
	return "0.0.0";
}

/** Version of the running CLI build */
export const CLI_VERSION = readVersion(
	loadPackageJson(join(__dirname, "..", "package.json")),
);

/** User-Agent sent with every registry and release request */
export const USER_AGENT = `typkg-cli/${CLI_VERSION}`;
