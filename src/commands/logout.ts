import { clearCredentials, getConfigPath, readUserConfig } from "@/config";

export async function logout(): Promise<void> {
	try {
		const configPath = getConfigPath();
		const userConfig = await readUserConfig(configPath);

		if (!userConfig.token) {
			console.log("Not logged in.");
			return;
		}

		await clearCredentials(configPath);
		console.log("Logged out successfully.");
		if (process.env.TYPKG_TOKEN) {
			console.log("Note: TYPKG_TOKEN is still set in the environment.");
		}
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${message}`);
		process.exit(1);
	}
}
