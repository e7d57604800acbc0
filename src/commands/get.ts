import { createRegistryClient, type RegistryClient } from "@/api-client";
import { createResolverContext, PackageCache } from "@/cache";
import { resolveConfig } from "@/config";
import {
	createPackageRef,
	formatPackageName,
	getLatestVersion,
	type PackageSpec,
	packageKey,
	parsePackageSpec,
	resolvePackage,
} from "@/lib/index";
import { showProgress } from "@/progress";

export interface GetOptions {
	/** False with --no-deps */
	deps?: boolean;
}

/**
 * Pick the version to fetch: the one given, else the newest published.
 */
async function resolveVersionFor(
	spec: PackageSpec,
	client: RegistryClient,
): Promise<string> {
	if (spec.version) {
		return spec.version;
	}

	const pkg = await client.fetchPackage(spec.namespace, spec.name);
	const versions = pkg.versions.map((info) => info.version);
	const version = getLatestVersion(versions) ?? versions.at(-1);
	if (!version) {
		throw new Error(`No versions available for ${formatPackageName(spec)}`);
	}
	return version;
}

export async function get(
	specifier: string,
	options: GetOptions,
): Promise<void> {
	try {
		const spec = parsePackageSpec(specifier);
		if (!spec) {
			throw new Error(
				`Invalid package specifier: ${specifier}. Expected @namespace/name[:version]`,
			);
		}

		const config = await resolveConfig();
		const client = createRegistryClient(config);
		const cache = new PackageCache(config.cacheRoot);

		const version = await resolveVersionFor(spec, client);
		const ref = createPackageRef(spec.namespace, spec.name, version);

		console.log(`Downloading ${formatPackageName(ref)} version ${version}...`);

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

		const count = await resolvePackage(
			ref,
			context,
			new Set(),
			options.deps === false,
		);

		console.log(`Package extracted to: ${cache.packagePath(ref)}`);
		if (count > 1) {
			console.log(`Resolved ${count} packages (including dependencies)`);
		}
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${message}`);
		process.exit(1);
	}
}
