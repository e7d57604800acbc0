import * as semver from "semver";
import { VersionError } from "../errors";

/**
 * Normalize a version string into canonical "vMAJOR.MINOR.PATCH[-pre][+build]" form.
 *
 * A missing "v" marker is added and the "1" / "1.2" shorthands are padded
 * with zeros, so release tags ("v0.4.0") and build versions ("0.4.0")
 * compare on equal terms.
 *
 * @throws VersionError if the input is empty or not a semantic version
 *
 * @example
 * ```typescript
 * normalizeVersion("1.2.0")  // => "v1.2.0"
 * normalizeVersion("v1.2")   // => "v1.2.0"
 * ```
 */
export function normalizeVersion(version: string): string {
	const trimmed = version.trim();
	if (trimmed === "") {
		throw new VersionError("version cannot be empty");
	}

	let body = trimmed.startsWith("v") ? trimmed.slice(1) : trimmed;
	if (/^\d+$/.test(body)) {
		body = `${body}.0.0`;
	} else if (/^\d+\.\d+$/.test(body)) {
		body = `${body}.0`;
	}

	const valid = semver.valid(body);
	if (!valid || /^[=v]/.test(body)) {
		throw new VersionError(`invalid semantic version: ${version}`);
	}

	return `v${valid}`;
}

/**
 * Check whether `latest` is strictly newer than `current`.
 *
 * @throws VersionError if either version is empty or invalid
 */
export function compareVersion(latest: string, current: string): boolean {
	const a = normalizeVersion(latest).slice(1);
	const b = normalizeVersion(current).slice(1);
	return semver.gt(a, b);
}

/**
 * Get the latest version from a list.
 * Invalid entries are ignored.
 */
export function getLatestVersion(versions: string[]): string | null {
	const valid = versions.filter((v) => semver.valid(v));
	if (valid.length === 0) return null;
	return valid.sort((a, b) => semver.rcompare(a, b))[0] ?? null;
}

/**
 * Sort versions newest first. Invalid entries go last, in their original order.
 */
export function sortVersionsDescending(versions: string[]): string[] {
	const valid = versions.filter((v) => semver.valid(v));
	const invalid = versions.filter((v) => !semver.valid(v));
	return [...valid.sort((a, b) => semver.rcompare(a, b)), ...invalid];
}
