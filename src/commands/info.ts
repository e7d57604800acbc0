import { createRegistryClient } from "@/api-client";
import { resolveConfig } from "@/config";
import { formatPackageName, parsePackageSpec } from "@/lib/index";

function orNone(value: string): string {
	return value || "(none)";
}

export async function info(specifier: string): Promise<void> {
	try {
		const spec = parsePackageSpec(specifier);
		if (!spec) {
			throw new Error(
				`Invalid package specifier: ${specifier}. Expected @namespace/name`,
			);
		}

		const config = await resolveConfig();
		const client = createRegistryClient(config);
		const pkg = await client.fetchPackage(spec.namespace, spec.name);

		console.log(`Package: ${formatPackageName(spec)}\n`);
		console.log(`Description: ${orNone(pkg.description)}`);
		console.log(`Website: ${orNone(pkg.homepageUrl)}`);
		console.log(`Repository: ${orNone(pkg.repositoryUrl)}`);
		console.log(`License: ${orNone(pkg.license)}`);
		if (pkg.latestVersion) {
			console.log(`Latest: ${pkg.latestVersion.version}`);
		}

		console.log("\nVersions:");
		if (pkg.versions.length === 0) {
			console.log("  (none)");
		}
		for (const version of pkg.versions) {
			const typst = version.typstVersion || "any";
			console.log(`  ${version.version} (Typst: ${typst})`);
		}
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${message}`);
		process.exit(1);
	}
}
