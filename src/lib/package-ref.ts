/**
 * Identity of one distributable package version.
 * e.g., "@preview/cetz:0.2.2"
 */
export interface PackageRef {
	readonly namespace: string;
	readonly name: string;
	readonly version: string;
}

/**
 * Parsed package spec (from CLI input). The version is optional
 * because `typkg get @preview/cetz` resolves the latest one.
 */
export interface PackageSpec {
	namespace: string;
	name: string;
	version?: string;
}

/**
 * Package spec regex pattern
 * Matches: [@]{namespace}/{name}[:{version}]
 *
 * Namespaces never contain "/" and names never contain ":", which keeps
 * the key format below unambiguous.
 */
const NAME_SEGMENT = "[A-Za-z0-9][A-Za-z0-9_.-]*";
const VERSION_SEGMENT = "[A-Za-z0-9][A-Za-z0-9_.+-]*";

const PACKAGE_SPEC_PATTERN = new RegExp(
	`^@?(${NAME_SEGMENT})\\/(${NAME_SEGMENT})(?::(${VERSION_SEGMENT}))?$`,
);

const NAME_PATTERN = new RegExp(`^${NAME_SEGMENT}$`);
const VERSION_PATTERN = new RegExp(`^${VERSION_SEGMENT}$`);

/**
 * Whether every part of a ref is a single, well-formed path segment.
 * Rejects "..", empty parts and separators.
 */
export function isValidPackageRef(ref: PackageRef): boolean {
	return (
		NAME_PATTERN.test(ref.namespace) &&
		NAME_PATTERN.test(ref.name) &&
		VERSION_PATTERN.test(ref.version)
	);
}

/**
 * Create an immutable package ref.
 */
export function createPackageRef(
	namespace: string,
	name: string,
	version: string,
): PackageRef {
	return Object.freeze({ namespace, name, version });
}

/**
 * Canonical key of a package ref, used for deduplication.
 *
 * @example
 * ```typescript
 * packageKey({ namespace: "preview", name: "cetz", version: "0.2.2" })
 * // => "@preview/cetz:0.2.2"
 * ```
 */
export function packageKey(ref: PackageRef): string {
	return `@${ref.namespace}/${ref.name}:${ref.version}`;
}

/**
 * Parse a package spec string.
 *
 * @param spec - The spec string (e.g., "@preview/cetz:0.2.2")
 * @returns Parsed spec or null if invalid
 *
 * @example
 * ```typescript
 * parsePackageSpec("@preview/cetz:0.2.2")
 * // => { namespace: "preview", name: "cetz", version: "0.2.2" }
 *
 * parsePackageSpec("preview/cetz")
 * // => { namespace: "preview", name: "cetz", version: undefined }
 * ```
 */
export function parsePackageSpec(spec: string): PackageSpec | null {
	const match = spec.trim().match(PACKAGE_SPEC_PATTERN);

	if (!match) {
		return null;
	}

	const [, namespace, name, version] = match;
	if (!namespace || !name) {
		return null;
	}

	return { namespace, name, version: version || undefined };
}

/**
 * Parse a spec that must name an exact version.
 *
 * @returns The package ref, or null if the spec is invalid or has no version
 */
export function parsePackageRef(spec: string): PackageRef | null {
	const parsed = parsePackageSpec(spec);
	if (!parsed?.version) {
		return null;
	}
	return createPackageRef(parsed.namespace, parsed.name, parsed.version);
}

/**
 * Format a spec without its version (e.g., "@preview/cetz").
 */
export function formatPackageName(spec: {
	namespace: string;
	name: string;
}): string {
	return `@${spec.namespace}/${spec.name}`;
}
