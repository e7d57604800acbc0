import { resolveConfig, setCredentials } from "@/config";

export interface LoginOptions {
	token?: string;
}

export async function login(options: LoginOptions): Promise<void> {
	try {
		const token = options.token?.trim();
		if (!token) {
			throw new Error(
				"A token is required. Create one on the registry website, then run 'typkg login --token <token>'.",
			);
		}

		const config = await resolveConfig();
		await setCredentials(token, config.registryUrl, config.configPath);

		console.log(`Logged in to ${config.registryUrl}`);
		console.log(`Token saved to ${config.configPath}`);
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${message}`);
		process.exit(1);
	}
}
