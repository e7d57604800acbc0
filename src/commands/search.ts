import { createRegistryClient } from "@/api-client";
import { resolveConfig } from "@/config";
import { formatPackageName } from "@/lib/index";

export interface SearchOptions {
	namespace?: string;
	limit?: string;
}

const DEFAULT_LIMIT = 20;

export async function search(
	query: string,
	options: SearchOptions,
): Promise<void> {
	try {
		const limit = options.limit
			? Number.parseInt(options.limit, 10)
			: DEFAULT_LIMIT;
		if (!Number.isInteger(limit) || limit <= 0) {
			throw new Error(`Invalid limit: ${options.limit}`);
		}

		const config = await resolveConfig();
		const client = createRegistryClient(config);
		const result = await client.searchPackages(query, options.namespace, limit);

		if (result.results.length === 0) {
			console.log(`No packages found for '${query}'.`);
			return;
		}

		console.log(`Found ${result.count} results for '${query}':\n`);
		for (const pkg of result.results) {
			const description = pkg.description ? ` - ${pkg.description}` : "";
			console.log(`${formatPackageName(pkg)}${description}`);
		}
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${message}`);
		process.exit(1);
	}
}
