import { PackageCache } from "@/cache";
import { resolveConfig } from "@/config";
import { packageKey, parsePackageRef } from "@/lib/index";

export async function remove(specifier: string): Promise<void> {
	try {
		const ref = parsePackageRef(specifier);
		if (!ref) {
			throw new Error(
				`Invalid package specifier: ${specifier}. Expected @namespace/name:version`,
			);
		}

		const config = await resolveConfig();
		const cache = new PackageCache(config.cacheRoot);

		if (!(await cache.remove(ref))) {
			console.error(`Error: package ${packageKey(ref)} not found in cache`);
			process.exit(1);
		}

		console.log(`Removed ${packageKey(ref)} from cache`);
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${message}`);
		process.exit(1);
	}
}
