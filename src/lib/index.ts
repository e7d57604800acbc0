/**
 * typkg core library
 *
 * Pure helpers and the package engine pieces that do not depend on the
 * CLI's configuration or network clients.
 */

// Archive codec
export {
	type ArchiveFormat,
	collectEntries,
	createTarGz,
	detectFormat,
	extractArchive,
} from "./archive";
// Progress channel
export { BoundedChannel, DEFAULT_CHANNEL_CAPACITY } from "./channel";
// Exclusion rules
export { findExclusion, isExcluded, toPosixPath } from "./exclude";
// Import scanning
export {
	extractImports,
	extractImportsFromDirectory,
	stripComments,
} from "./imports";
// Manifest types (typst.toml)
export {
	MANIFEST_FILE,
	type ManifestValidation,
	type PackageSection,
	parseManifest,
	type TemplateSection,
	type TypstManifest,
	validateManifest,
} from "./manifest";
// Package identity
export {
	createPackageRef,
	formatPackageName,
	isValidPackageRef,
	type PackageRef,
	type PackageSpec,
	packageKey,
	parsePackageRef,
	parsePackageSpec,
} from "./package-ref";
// Platform identifiers
export {
	assetPattern,
	BINARY_NAME,
	detectPlatform,
	type PlatformInfo,
	releaseArch,
	releaseOs,
	selectPlatformAsset,
} from "./platform";
// Dependency resolution
export {
	type ResolvedInfo,
	type ResolverContext,
	resolvePackage,
	type VisitedSet,
} from "./resolver";
// Version utilities
export {
	compareVersion,
	getLatestVersion,
	normalizeVersion,
	sortVersionsDescending,
} from "./version";
