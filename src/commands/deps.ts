import { createRegistryClient } from "@/api-client";
import { createResolverContext, PackageCache } from "@/cache";
import { resolveConfig } from "@/config";
import {
	extractImportsFromDirectory,
	packageKey,
	resolvePackage,
	type VisitedSet,
} from "@/lib/index";
import { showProgress } from "@/progress";

/**
 * Fetch every package a local Typst project imports, with dependencies.
 */
export async function deps(directory: string): Promise<void> {
	try {
		const imports = await extractImportsFromDirectory(directory);
		if (imports.length === 0) {
			console.log(`No package imports found in ${directory}.`);
			return;
		}

		console.log(`Found ${imports.length} imported packages:`);
		for (const ref of imports) {
			console.log(`  ${packageKey(ref)}`);
		}
		console.log("");

		const config = await resolveConfig();
		const client = createRegistryClient(config);
		const cache = new PackageCache(config.cacheRoot);
		const context = createResolverContext({
			cache,
			client,
			onProgress: (target, handle) =>
				showProgress(`Fetching ${packageKey(target)}`, handle),
			onResolved: (target, { cached }) => {
				if (cached) {
					console.log(`  ${packageKey(target)} (cached)`);
				}
			},
		});

		// One visited set across roots, so shared dependencies resolve once
		const visited: VisitedSet = new Set();
		let count = 0;
		for (const ref of imports) {
			count = await resolvePackage(ref, context, visited);
		}

		console.log(`\nResolved ${count} packages into ${cache.root}`);
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${message}`);
		process.exit(1);
	}
}
