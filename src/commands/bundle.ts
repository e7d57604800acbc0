import { bundlePackage } from "@/bundler";

export interface BundleCommandOptions {
	output?: string;
	exclude?: string[];
}

export async function bundle(
	directory: string,
	options: BundleCommandOptions,
): Promise<void> {
	try {
		const result = await bundlePackage(directory, {
			output: options.output,
			exclude: options.exclude,
		});

		const { name, version } = result.manifest.package;
		console.log(`Bundled ${name}@${version} (${result.files.length} entries)`);
		console.log(`Package created: ${result.output}`);
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${message}`);
		process.exit(1);
	}
}
