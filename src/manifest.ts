import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { FormatError } from "./errors";
import { MANIFEST_FILE, parseManifest, type TypstManifest } from "./lib/index";

/**
 * Get the manifest file path (typst.toml in a package directory)
 */
export function getManifestPath(packageDir: string): string {
	return join(packageDir, MANIFEST_FILE);
}

/**
 * Read and validate a package's typst.toml.
 *
 * @throws FormatError if the file is missing, malformed or incomplete
 */
export async function readManifest(packageDir: string): Promise<TypstManifest> {
	const manifestPath = getManifestPath(packageDir);

	let content: string;
	try {
		content = await readFile(manifestPath, "utf-8");
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new FormatError(`Failed to read ${MANIFEST_FILE}: ${message}`, {
			cause: error,
		});
	}

	if (process.env.TYPKG_DEBUG) {
		console.log(`[manifest] Read ${manifestPath}`);
	}

	return parseManifest(content);
}
