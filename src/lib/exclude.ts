import { minimatch } from "minimatch";

/**
 * Exclusion rules for bundling.
 *
 * Paths are relative to the package root and use forward slashes. Each
 * pattern is tried in order and the first one that matches wins:
 *
 * 1. exact path ("README.draft.md")
 * 2. directory prefix, pattern ends with "/" ("build/")
 * 3. prefix wildcard, pattern ends with "*" ("tmp*")
 * 4. shell glob within one path segment ("*.pdf", ".*")
 */

/**
 * Convert an OS path to the forward-slash form used by exclusion rules.
 */
export function toPosixPath(path: string): string {
	return path.replace(/\\/g, "/");
}

function matchesPattern(path: string, rule: string): boolean {
	const pattern = toPosixPath(rule);
	if (pattern === "") {
		return false;
	}

	if (path === pattern) {
		return true;
	}

	if (pattern.endsWith("/")) {
		return path === pattern.slice(0, -1) || path.startsWith(pattern);
	}

	if (pattern.endsWith("*") && path.startsWith(pattern.slice(0, -1))) {
		return true;
	}

	// "!", "#", braces and extglobs are literal characters here
	return minimatch(path, pattern, {
		dot: true,
		nonegate: true,
		nocomment: true,
		nobrace: true,
		noext: true,
	});
}

/**
 * Find the first rule that excludes a path.
 *
 * @returns The matching pattern, or undefined if the path is kept
 */
export function findExclusion(
	path: string,
	patterns: readonly string[],
): string | undefined {
	const normalized = toPosixPath(path);
	return patterns.find((pattern) => matchesPattern(normalized, pattern));
}

/**
 * Check whether a relative path is excluded by any rule.
 */
export function isExcluded(path: string, patterns: readonly string[]): boolean {
	return findExclusion(path, patterns) !== undefined;
}
