/**
 * Dependency resolver for typkg
 *
 * Walks the direct-dependency graph of a package depth-first:
 * - Every ref is visited at most once per resolution (cycles terminate)
 * - Cached packages skip the download but are still walked
 * - Missing dependency metadata means "leaf package"
 * - A failed download aborts the whole walk; fetched packages stay cached
 *
 * There is no version solving: a dependency is exactly the version the
 * registry names for it.
 */

import { type PackageRef, packageKey } from "./package-ref";

// =============================================================================
// Types
// =============================================================================

export interface ResolvedInfo {
	/** True if the package was already in the cache */
	cached: boolean;
}

export interface ResolverContext {
	/** Whether the package is already extracted in the cache */
	isCached(ref: PackageRef): Promise<boolean>;

	/** Download and extract the package into the cache */
	download(ref: PackageRef): Promise<void>;

	/** Direct dependencies as named by the registry */
	fetchDependencies(ref: PackageRef): Promise<PackageRef[]>;

	/** Called once per package, after it is present in the cache */
	onResolved?(ref: PackageRef, info: ResolvedInfo): void;
}

/** Keys of the refs visited during one resolution */
export type VisitedSet = Set<string>;

// =============================================================================
// Resolution
// =============================================================================

async function directDependencies(
	ref: PackageRef,
	context: ResolverContext,
): Promise<PackageRef[]> {
	try {
		return await context.fetchDependencies(ref);
	} catch (error) {
		if (process.env.TYPKG_DEBUG) {
			const message = error instanceof Error ? error.message : String(error);
			console.log(
				`[resolver] No dependency metadata for ${packageKey(ref)}: ${message}`,
			);
		}
		return [];
	}
}

/**
 * Ensure a package and, unless `skipDeps`, its transitive dependencies are
 * in the cache.
 *
 * @param visited - Keys already handled in this resolution; share it across
 * calls to resolve several roots together
 * @param skipDeps - Skip dependency discovery for this ref only; the
 * dependencies of its dependencies are always walked
 * @returns Number of distinct packages resolved so far, cache hits included
 */
export async function resolvePackage(
	ref: PackageRef,
	context: ResolverContext,
	visited: VisitedSet = new Set(),
	skipDeps = false,
): Promise<number> {
	const key = packageKey(ref);
	if (visited.has(key)) {
		return visited.size;
	}
	visited.add(key);

	const cached = await context.isCached(ref);
	if (!cached) {
		await context.download(ref);
	}
	context.onResolved?.(ref, { cached });

	if (skipDeps) {
		return visited.size;
	}

	const dependencies = await directDependencies(ref, context);
	for (const dependency of dependencies) {
		if (!visited.has(packageKey(dependency))) {
			await resolvePackage(dependency, context, visited, false);
		}
	}

	return visited.size;
}
