/**
 * Typst package cache: `<root>/<namespace>/<name>/<version>/`.
 *
 * A package is cached when its version directory exists. Fetches stage into
 * a private `.tmp-*` directory under the root and are moved into place with
 * a single rename, so a version directory is either complete or absent.
 */

import { mkdir, mkdtemp, readdir, rename, rm, stat } from "node:fs/promises";
import { dirname, isAbsolute, join, relative } from "node:path";
import type { RegistryClient } from "./api-client";
import {
	type DownloadHandle,
	Downloader,
	type FetchLike,
} from "./downloader";
import { CacheError } from "./errors";
import {
	createPackageRef,
	type PackageRef,
	packageKey,
} from "./lib/package-ref";
import type { ResolvedInfo, ResolverContext } from "./lib/resolver";

const STAGING_PREFIX = ".tmp-";

function errorCode(error: unknown): string | undefined {
	if (
		error instanceof Error &&
		"code" in error &&
		typeof error.code === "string"
	) {
		return error.code;
	}
	return undefined;
}

async function listDirectories(dir: string): Promise<string[]> {
	const entries = await readdir(dir, { withFileTypes: true });
	return entries
		.filter((entry) => entry.isDirectory() && !entry.name.startsWith("."))
		.map((entry) => entry.name)
		.sort();
}

export class PackageCache {
	constructor(readonly root: string) {}

	/**
	 * @throws CacheError if the ref would resolve outside the cache root
	 */
	packagePath(ref: PackageRef): string {
		const path = join(this.root, ref.namespace, ref.name, ref.version);
		const rel = relative(this.root, path);
		if (
			rel.split(/[\\/]/).length !== 3 ||
			rel.startsWith("..") ||
			isAbsolute(rel)
		) {
			throw new CacheError(
				`Invalid package path for ${packageKey(ref)}: ${path}`,
			);
		}
		return path;
	}

	/**
	 * Whether the package's version directory exists.
	 *
	 * @throws CacheError if the path cannot be inspected
	 */
	async has(ref: PackageRef): Promise<boolean> {
		const path = this.packagePath(ref);
		try {
			return (await stat(path)).isDirectory();
		} catch (error) {
			const code = errorCode(error);
			if (code === "ENOENT" || code === "ENOTDIR") {
				return false;
			}
			throw new CacheError(`Cannot access ${path}`, { cause: error });
		}
	}

	/**
	 * All cached packages, sorted by namespace, name and version directory.
	 * A missing root is an empty cache.
	 */
	async list(): Promise<PackageRef[]> {
		let namespaces: string[];
		try {
			namespaces = await listDirectories(this.root);
		} catch (error) {
			if (errorCode(error) === "ENOENT") {
				return [];
			}
			throw new CacheError(`Failed to read cache directory ${this.root}`, {
				cause: error,
			});
		}

		const refs: PackageRef[] = [];
		for (const namespace of namespaces) {
			for (const name of await listDirectories(join(this.root, namespace))) {
				const versions = await listDirectories(
					join(this.root, namespace, name),
				);
				for (const version of versions) {
					refs.push(createPackageRef(namespace, name, version));
				}
			}
		}
		return refs;
	}

	/**
	 * Delete a cached package.
	 *
	 * @returns false if it was not cached
	 */
	async remove(ref: PackageRef): Promise<boolean> {
		if (!(await this.has(ref))) {
			return false;
		}
		const path = this.packagePath(ref);
		try {
			await rm(path, { recursive: true, force: true });
		} catch (error) {
			throw new CacheError(`Failed to remove ${path}`, { cause: error });
		}
		return true;
	}
}

// =============================================================================
// Fetching into the cache
// =============================================================================

export interface FetchToCacheOptions {
	cache: PackageCache;
	client: Pick<RegistryClient, "packageAsset">;
	fetch?: FetchLike;
	/**
	 * Consumes the progress of each download (e.g. a spinner). The handle
	 * is drained afterwards in any case.
	 */
	onProgress?: (ref: PackageRef, handle: DownloadHandle) => Promise<void>;
}

/**
 * Download a package and move it into the cache.
 *
 * If another process installed the same version first, its copy is kept.
 *
 * @returns The package's cache path
 */
export async function fetchPackageToCache(
	ref: PackageRef,
	options: FetchToCacheOptions,
): Promise<string> {
	const { cache } = options;
	const target = cache.packagePath(ref);
	const asset = options.client.packageAsset(ref);

	await mkdir(cache.root, { recursive: true });
	const staging = await mkdtemp(join(cache.root, STAGING_PREFIX));

	const install = async (): Promise<void> => {
		await rm(join(staging, asset.name), { force: true });
		await mkdir(dirname(target), { recursive: true });
		try {
			await rename(staging, target);
		} catch (error) {
			const code = errorCode(error);
			if (code !== "EEXIST" && code !== "ENOTEMPTY" && code !== "EPERM") {
				throw error;
			}
			if (!(await cache.has(ref))) {
				throw error;
			}
			if (process.env.TYPKG_DEBUG) {
				console.log(
					`[cache] ${packageKey(ref)} was installed concurrently`,
				);
			}
		}
	};

	const downloader = new Downloader(asset, staging, {
		fetch: options.fetch,
		cleanup: () => rm(staging, { recursive: true, force: true }),
	});
	const handle = downloader.download(install);

	if (options.onProgress) {
		await options.onProgress(ref, handle);
	}
	await handle.wait();

	return target;
}

export interface CacheResolverOptions extends FetchToCacheOptions {
	client: Pick<RegistryClient, "packageAsset" | "fetchDependencies">;
	onResolved?: (ref: PackageRef, info: ResolvedInfo) => void;
}

/**
 * Resolver context backed by the package cache and the registry.
 */
export function createResolverContext(
	options: CacheResolverOptions,
): ResolverContext {
	return {
		isCached: (ref) => options.cache.has(ref),
		download: async (ref) => {
			await fetchPackageToCache(ref, options);
		},
		fetchDependencies: (ref) => options.client.fetchDependencies(ref),
		onResolved: options.onResolved,
	};
}
