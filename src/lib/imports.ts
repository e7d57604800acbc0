/**
 * Package import scanner for Typst sources.
 *
 * Finds `#import "@namespace/name:version"` references so a local project's
 * registry dependencies can be fetched ahead of compilation.
 */

import { readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import { createPackageRef, type PackageRef, packageKey } from "./package-ref";

const IMPORT_PATTERN = /#import\s+"@([^/"\s]+)\/([^:"\s]+):([^"\s]+)"/g;

/**
 * Remove `//` line comments and `/* *\/` block comments, keeping line breaks.
 * An unterminated block comment runs to the end of the source.
 */
export function stripComments(source: string): string {
	let result = "";
	let i = 0;

	while (i < source.length) {
		if (source.startsWith("/*", i)) {
			const end = source.indexOf("*/", i + 2);
			const stop = end === -1 ? source.length : end + 2;
			result += source.slice(i, stop).replace(/[^\n]/g, "");
			i = stop;
		} else if (source.startsWith("//", i)) {
			const end = source.indexOf("\n", i);
			i = end === -1 ? source.length : end;
		} else {
			result += source[i];
			i++;
		}
	}

	return result;
}

function addUnique(
	target: PackageRef[],
	seen: Set<string>,
	refs: Iterable<PackageRef>,
): void {
	for (const ref of refs) {
		const key = packageKey(ref);
		if (!seen.has(key)) {
			seen.add(key);
			target.push(ref);
		}
	}
}

/**
 * Extract package imports from one source file, in order of appearance and
 * without duplicates.
 *
 * @example
 * ```typescript
 * extractImports('#import "@preview/cetz:0.3.0": canvas')
 * // => [{ namespace: "preview", name: "cetz", version: "0.3.0" }]
 * ```
 */
export function extractImports(source: string): PackageRef[] {
	const code = stripComments(source);
	const refs: PackageRef[] = [];

	for (const match of code.matchAll(IMPORT_PATTERN)) {
		const [, namespace, name, version] = match;
		if (namespace && name && version) {
			refs.push(createPackageRef(namespace, name, version));
		}
	}

	const unique: PackageRef[] = [];
	addUnique(unique, new Set(), refs);
	return unique;
}

/**
 * Scan every `.typ` file below `dir` (any case), deduplicating across files.
 * Files are visited in sorted order.
 */
export async function extractImportsFromDirectory(
	dir: string,
): Promise<PackageRef[]> {
	const refs: PackageRef[] = [];
	const seen = new Set<string>();

	async function walk(current: string): Promise<void> {
		const dirents = await readdir(current, { withFileTypes: true });
		dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

		for (const dirent of dirents) {
			const path = join(current, dirent.name);
			if (dirent.isDirectory()) {
				await walk(path);
			} else if (dirent.isFile() && dirent.name.toLowerCase().endsWith(".typ")) {
				const content = await readFile(path, "utf-8");
				addUnique(refs, seen, extractImports(content));
			}
		}
	}

	await walk(dir);
	return refs;
}
