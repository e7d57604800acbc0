import { stat } from "node:fs/promises";
import { basename, resolve } from "node:path";
import { FormatError, PreconditionError } from "./errors";
import { createTarGz, MANIFEST_FILE, type TypstManifest } from "./lib/index";
import { getManifestPath, readManifest } from "./manifest";

export interface BundleOptions {
	/** Exclusion rules checked before the manifest's `exclude` list */
	exclude?: string[];
	/** Archive path, defaults to `<directory name>.tar.gz` in the working directory */
	output?: string;
}

export interface BundleResult {
	/** Absolute path of the written archive */
	output: string;
	manifest: TypstManifest;
	/** Archived entries, in archive order */
	files: string[];
}

/**
 * Bundle a package directory into a `.tar.gz` ready for upload.
 *
 * @throws PreconditionError if `sourceDir` is not a directory
 * @throws FormatError if typst.toml is missing, malformed or incomplete
 */
export async function bundlePackage(
	sourceDir: string,
	options: BundleOptions = {},
): Promise<BundleResult> {
	const root = resolve(sourceDir);

	const isDirectory = await stat(root).then(
		(stats) => stats.isDirectory(),
		() => false,
	);
	if (!isDirectory) {
		throw new PreconditionError(`Not a directory: ${sourceDir}`);
	}

	const hasManifest = await stat(getManifestPath(root)).then(
		(stats) => stats.isFile(),
		() => false,
	);
	if (!hasManifest) {
		throw new FormatError(
			`${MANIFEST_FILE} not found in ${sourceDir} - a valid manifest is required`,
		);
	}

	const manifest = await readManifest(root);
	const patterns = [
		...(options.exclude ?? []),
		...(manifest.package.exclude ?? []),
	];
	const output = resolve(options.output ?? `${basename(root)}.tar.gz`);

	if (process.env.TYPKG_DEBUG) {
		console.log(`[bundle] Exclusion rules: ${patterns.join(", ") || "(none)"}`);
	}

	const files = await createTarGz(root, patterns, output);
	return { output, manifest, files };
}
