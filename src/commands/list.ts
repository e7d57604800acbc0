import { PackageCache } from "@/cache";
import { resolveConfig } from "@/config";
import { packageKey } from "@/lib/index";

export interface ListOptions {
	json?: boolean;
}

export async function list(options: ListOptions): Promise<void> {
	try {
		const config = await resolveConfig();
		const cache = new PackageCache(config.cacheRoot);
		const packages = await cache.list();

		if (options.json) {
			console.log(JSON.stringify(packages, null, 2));
			return;
		}

		console.log(`Cached packages in ${cache.root}:\n`);
		for (const ref of packages) {
			console.log(packageKey(ref));
		}
		console.log(`\nTotal: ${packages.length} packages`);
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${message}`);
		process.exit(1);
	}
}
