import { CACHE_PATH_ENV, resolveConfig } from "@/config";

/**
 * Show resolved configuration
 */
export async function configShow(): Promise<void> {
	try {
		const resolved = await resolveConfig();

		console.log("Resolved Configuration:\n");
		console.log(`  Registry URL:   ${resolved.registryUrl}`);
		console.log(`  Token:          ${resolved.token ? "***" : "(not set)"}`);
		console.log(`  Cache root:     ${resolved.cacheRoot}`);
		console.log(`  Release repo:   ${resolved.releaseRepo}`);
		console.log("");
		console.log("Config Locations:");
		console.log(`  User config:    ${resolved.configPath}`);
		console.log("");
		console.log("Environment Variables:");
		console.log(
			`  TYPKG_REGISTRY_URL:       ${process.env.TYPKG_REGISTRY_URL || "(not set)"}`,
		);
		console.log(
			`  TYPKG_TOKEN:              ${process.env.TYPKG_TOKEN ? "***" : "(not set)"}`,
		);
		console.log(
			`  ${CACHE_PATH_ENV}: ${process.env[CACHE_PATH_ENV] || "(not set)"}`,
		);
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${message}`);
		process.exit(1);
	}
}
