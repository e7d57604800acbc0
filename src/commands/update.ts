import { confirm } from "@inquirer/prompts";
import { resolveConfig } from "@/config";
import { fetchLatestRelease } from "@/github";
import { showProgress } from "@/progress";
import { SelfUpdater } from "@/updater";

export interface UpdateOptions {
	/** Only report whether an update exists */
	check?: boolean;
	/** Skip the confirmation prompt */
	yes?: boolean;
}

export async function update(options: UpdateOptions): Promise<void> {
	try {
		const config = await resolveConfig();
		const updater = new SelfUpdater({
			releaseProvider: () => fetchLatestRelease(config.releaseRepo),
		});

		console.log("Checking for updates...");
		const { release, updateAvailable } = await updater.check();

		if (!updateAvailable) {
			console.log(`typkg is up to date (${updater.currentVersion}).`);
			return;
		}

		console.log(
			`New version available: ${release.version} (current: ${updater.currentVersion})`,
		);
		if (release.changelog.trim()) {
			console.log(`\nChangelog:\n${release.changelog.trim()}\n`);
		}

		if (options.check) {
			console.log("Run 'typkg update' to install it.");
			return;
		}

		if (!options.yes) {
			const proceed = await confirm({
				message: `Install ${release.version} over ${updater.executablePath}?`,
				default: true,
			});
			if (!proceed) {
				console.log("Update cancelled.");
				return;
			}
		}

		const handle = await updater.update();
		await showProgress(`Downloading ${release.asset.name}`, handle);
		if (handle.error) {
			throw handle.error;
		}

		console.log(
			`Updated to ${release.version}. Restart typkg to use the new version.`,
		);
	} catch (error) {
		const message = error instanceof Error ? error.message : "Unknown error";
		console.error(`Error: ${message}`);
		process.exit(1);
	}
}
