/**
 * Archive codec for package and release payloads.
 *
 * Reads gzip-compressed tar and zip archives, writes gzip-compressed tar.
 * Only directories and regular files are ever extracted or stored;
 * symlinks, devices and other entry types are skipped.
 */

import { mkdir, readdir, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, join, relative, resolve } from "node:path";
import AdmZip from "adm-zip";
import * as tar from "tar";
import { FormatError } from "../errors";
import { isExcluded, toPosixPath } from "./exclude";

export type ArchiveFormat = "tar.gz" | "zip" | "unknown";

const S_IFMT = 0o170000;
const S_IFLNK = 0o120000;

/**
 * Detect an archive format from its file name.
 *
 * @example
 * ```typescript
 * detectFormat("typkg-linux-amd64.tar.gz") // => "tar.gz"
 * detectFormat("typkg-windows-amd64.zip")  // => "zip"
 * ```
 */
export function detectFormat(name: string): ArchiveFormat {
	const lower = name.toLowerCase();
	if (lower.endsWith(".tar.gz") || lower.endsWith(".tgz")) {
		return "tar.gz";
	}
	if (lower.endsWith(".zip")) {
		return "zip";
	}
	return "unknown";
}

/**
 * Resolve an entry path under `destDir`, or null if it would land outside.
 */
function resolveEntryPath(destDir: string, entryPath: string): string | null {
	const normalized = toPosixPath(entryPath);
	if (isAbsolute(normalized) || /^[A-Za-z]:/.test(normalized)) {
		return null;
	}
	const target = resolve(destDir, normalized);
	const rel = relative(destDir, target);
	if (rel.startsWith("..") || isAbsolute(rel)) {
		return null;
	}
	return target;
}

/**
 * Filesystem failures pass through; anything the decoders raise becomes a
 * FormatError.
 */
function wrapExtractError(source: string, error: unknown): Error {
	if (error instanceof FormatError) {
		return error;
	}
	if (error instanceof Error && "syscall" in error) {
		return error;
	}
	const message = error instanceof Error ? error.message : String(error);
	return new FormatError(`Failed to extract ${source}: ${message}`, {
		cause: error,
	});
}

async function extractTarGz(source: string, destDir: string): Promise<void> {
	let escapedPath: string | undefined;

	await tar.x({
		file: source,
		cwd: destDir,
		strict: true,
		filter: (path, entry) => {
			if (resolveEntryPath(destDir, path) === null) {
				escapedPath ??= path;
				return false;
			}
			if (!("type" in entry)) {
				return false;
			}
			return (
				entry.type === "File" ||
				entry.type === "OldFile" ||
				entry.type === "ContiguousFile" ||
				entry.type === "Directory"
			);
		},
	});

	if (escapedPath !== undefined) {
		throw new FormatError(
			`Archive entry escapes the destination directory: ${escapedPath}`,
		);
	}
}

async function extractZip(source: string, destDir: string): Promise<void> {
	const zip = new AdmZip(source);

	for (const entry of zip.getEntries()) {
		const target = resolveEntryPath(destDir, entry.entryName);
		if (target === null) {
			throw new FormatError(
				`Archive entry escapes the destination directory: ${entry.entryName}`,
			);
		}

		if (entry.isDirectory) {
			await mkdir(target, { recursive: true });
			continue;
		}

		// Unix mode lives in the high 16 bits of the external attributes
		if (((entry.attr >>> 16) & S_IFMT) === S_IFLNK) {
			continue;
		}

		await mkdir(dirname(target), { recursive: true });
		await writeFile(target, entry.getData());
	}
}

/**
 * Extract an archive into `destDir`, creating it if needed.
 *
 * @throws FormatError for an unknown format, a corrupt archive, or an
 * entry whose path leaves `destDir`
 */
export async function extractArchive(
	format: ArchiveFormat,
	source: string,
	destDir: string,
): Promise<void> {
	if (format === "unknown") {
		throw new FormatError(`Unsupported archive format: ${source}`);
	}

	await mkdir(destDir, { recursive: true });

	try {
		if (format === "tar.gz") {
			await extractTarGz(source, destDir);
		} else {
			await extractZip(source, destDir);
		}
	} catch (error) {
		throw wrapExtractError(source, error);
	}
}

/**
 * List the entries to store for `sourceDir`, sorted by name at each level.
 * Excluded directories are pruned along with everything beneath them.
 */
export async function collectEntries(
	sourceDir: string,
	excludePatterns: readonly string[],
): Promise<string[]> {
	const entries: string[] = [];

	async function walk(dir: string, prefix: string): Promise<void> {
		const dirents = await readdir(dir, { withFileTypes: true });
		dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

		for (const dirent of dirents) {
			const relPath = prefix ? `${prefix}/${dirent.name}` : dirent.name;
			if (isExcluded(relPath, excludePatterns)) {
				continue;
			}

			if (dirent.isDirectory()) {
				entries.push(relPath);
				await walk(join(dir, dirent.name), relPath);
			} else if (dirent.isFile()) {
				entries.push(relPath);
			}
		}
	}

	await walk(sourceDir, "");
	return entries;
}

/**
 * Write a gzip-compressed tar of `sourceDir` to `outputPath`.
 *
 * Paths are stored relative to `sourceDir` with forward slashes. When the
 * output file lies inside `sourceDir` it is left out of the archive.
 *
 * @returns The stored entry paths, in archive order
 */
export async function createTarGz(
	sourceDir: string,
	excludePatterns: readonly string[],
	outputPath: string,
): Promise<string[]> {
	const root = resolve(sourceDir);
	const output = resolve(outputPath);
	const patterns = [...excludePatterns];

	const outputRel = relative(root, output);
	if (!outputRel.startsWith("..") && !isAbsolute(outputRel)) {
		patterns.push(toPosixPath(outputRel));
	}

	const entries = await collectEntries(root, patterns);
	if (entries.length === 0) {
		throw new FormatError(`Nothing to archive in ${sourceDir}`);
	}

	await mkdir(dirname(output), { recursive: true });
	await tar.c(
		{
			gzip: true,
			file: output,
			cwd: root,
			portable: true,
			noDirRecurse: true,
		},
		entries,
	);

	return entries;
}
