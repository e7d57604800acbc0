import { stat } from "node:fs/promises";
import { createRegistryClient } from "@/api-client";
import { requireToken, resolveConfig } from "@/config";

export async function push(file: string, namespace: string): Promise<void> {
	try {
		const info = await stat(file).catch(() => null);
		if (!info) {
			throw new Error(`Package file not found: ${file}`);
		}
		if (info.isDirectory()) {
			throw new Error(`${file} is a directory, not a package file`);
		}

		const config = await resolveConfig();
		requireToken(config);
		const client = createRegistryClient(config);

		console.log(`Uploading ${file} to namespace ${namespace}...`);
		const result = await client.uploadPackage(file, namespace);

		if (!result.sha256) {
			console.error("Upload rejected, validation report:");
			for (const line of result.report) {
				console.error(`  - ${line}`);
			}
			process.exit(1);
		}

		console.log(
			`Successfully uploaded package: @${namespace}/${result.package}:${result.version}`,
		);
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${message}`);
		process.exit(1);
	}
}
