/**
 * Self-update of the standalone typkg binary.
 *
 * Lifecycle: unchecked → known (after `check`/`latest`) → downloading →
 * installed | failed. The latest release is looked up once and memoized;
 * `refresh()` replaces the memo explicitly.
 */

import {
	chmod,
	mkdir,
	mkdtemp,
	readFile,
	rename,
	rm,
	stat,
	unlink,
	writeFile,
} from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import {
	type DownloadHandle,
	Downloader,
	type FetchLike,
	type ReleaseAsset,
} from "./downloader";
import { FormatError, PreconditionError } from "./errors";
import type { GitHubRelease } from "./github";
import {
	detectPlatform,
	type PlatformInfo,
	selectPlatformAsset,
} from "./lib/platform";
import { compareVersion } from "./lib/version";
import { CLI_VERSION } from "./package-info";

// =============================================================================
// Types
// =============================================================================

/**
 * The latest release, narrowed to the asset built for this platform.
 */
export interface Release {
	asset: ReleaseAsset;
	/** Release tag, e.g. "v0.5.0" */
	version: string;
	changelog: string;
	publishedAt?: Date;
}

export interface UpdateCheck {
	release: Release;
	/** True iff the release is strictly newer than the running build */
	updateAvailable: boolean;
}

export type ReleaseProvider = () => Promise<GitHubRelease>;

export type UpdaterState =
	| "unchecked"
	| "known"
	| "downloading"
	| "installed"
	| "failed";

export type InstallStrategy = "renameAside" | "replaceInPlace";

export interface SelfUpdaterOptions {
	releaseProvider: ReleaseProvider;
	/** Version of the running build */
	currentVersion?: string;
	fetch?: FetchLike;
	/** Binary to replace, defaults to the running executable */
	executablePath?: string;
	platform?: PlatformInfo;
	/** Parent of the temporary staging directory */
	stagingRoot?: string;
}

const EXECUTABLE_MODE = 0o755;

// =============================================================================
// Install strategies
// =============================================================================

/**
 * Move a file, copying its bytes when a rename is impossible (for
 * instance across filesystems).
 */
async function moveFile(source: string, dest: string): Promise<void> {
	try {
		await rename(source, dest);
	} catch (error) {
		if (process.env.TYPKG_DEBUG) {
			console.log(
				`[update] rename failed, copying instead: ${
					error instanceof Error ? error.message : String(error)
				}`,
			);
		}
		await writeFile(dest, await readFile(source), { mode: EXECUTABLE_MODE });
		await chmod(dest, EXECUTABLE_MODE);
		await rm(source, { force: true });
	}
}

function isMissing(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Install for platforms that lock a running executable: the current binary
 * is renamed to `<dest>.old` (replacing any stale one) and the new binary
 * takes its name.
 */
export async function renameAside(source: string, dest: string): Promise<void> {
	const aside = `${dest}.old`;
	await rm(aside, { force: true });
	try {
		await rename(dest, aside);
	} catch (error) {
		if (!isMissing(error)) {
			throw error;
		}
	}
	await moveFile(source, dest);
}

/**
 * Install for platforms that allow unlinking a running executable.
 */
export async function replaceInPlace(
	source: string,
	dest: string,
): Promise<void> {
	try {
		await unlink(dest);
	} catch (error) {
		if (!isMissing(error)) {
			throw error;
		}
	}
	await moveFile(source, dest);
}

export function installStrategy(platform: PlatformInfo): InstallStrategy {
	return platform.canOverwriteRunningExecutable
		? "replaceInPlace"
		: "renameAside";
}

/**
 * Version banner: `vX.Y.Z node<version> <os>-<arch>`
 */
export function formatVersion(
	version: string = CLI_VERSION,
	platform: Pick<PlatformInfo, "os" | "arch"> = detectPlatform(),
): string {
	const bare = version.replace(/^v/, "");
	return `v${bare} node${process.versions.node} ${platform.os}-${platform.arch}`;
}

// =============================================================================
// Updater
// =============================================================================

export class SelfUpdater {
	readonly currentVersion: string;
	readonly executablePath: string;
	readonly platform: PlatformInfo;
	private memo: Release | undefined;
	private currentState: UpdaterState = "unchecked";

	constructor(private readonly options: SelfUpdaterOptions) {
		this.currentVersion = options.currentVersion ?? CLI_VERSION;
		this.executablePath = options.executablePath ?? process.execPath;
		this.platform = options.platform ?? detectPlatform();
	}

	get state(): UpdaterState {
		return this.currentState;
	}

	/** The memoized release, if one has been looked up */
	get cachedRelease(): Release | undefined {
		return this.memo;
	}

	/**
	 * Compare the latest release against the running build.
	 *
	 * @throws VersionError if either version is not a semantic version
	 * @throws PlatformAssetNotFoundError if the release has no single asset
	 * for this platform
	 */
	async check(): Promise<UpdateCheck> {
		const release = await this.latest();
		return {
			release,
			updateAvailable: compareVersion(release.version, this.currentVersion),
		};
	}

	/** The memoized release, looked up on first use */
	async latest(): Promise<Release> {
		if (!this.memo) {
			this.memo = await this.fetchRelease();
			this.currentState = "known";
		}
		return this.memo;
	}

	/** Look the release up again and replace the memo */
	async refresh(): Promise<Release> {
		this.memo = await this.fetchRelease();
		this.currentState = "known";
		return this.memo;
	}

	/**
	 * Download the memoized release and install it over the executable.
	 *
	 * @throws PreconditionError if no release was looked up, or if the
	 * running program is not a standalone typkg binary
	 */
	async update(): Promise<DownloadHandle> {
		const release = this.memo;
		if (!release) {
			throw new PreconditionError("check for updates first");
		}
		if (basename(this.executablePath) !== this.platform.executableName) {
			throw new PreconditionError(
				`${this.executablePath} is not a standalone ${this.platform.executableName} binary; update it with your package manager`,
			);
		}

		const stagingRoot = this.options.stagingRoot ?? tmpdir();
		await mkdir(stagingRoot, { recursive: true });
		const staging = await mkdtemp(join(stagingRoot, "typkg-update-"));

		this.currentState = "downloading";
		const downloader = new Downloader(release.asset, staging, {
			fetch: this.options.fetch,
			cleanup: async () => {
				if (this.currentState === "downloading") {
					this.currentState = "failed";
				}
				await rm(staging, { recursive: true, force: true });
			},
		});

		return downloader.download(async () => {
			await this.install(join(staging, this.platform.executableName));
			this.currentState = "installed";
		});
	}

	formatVersion(): string {
		return formatVersion(this.currentVersion, this.platform);
	}

	private async install(staged: string): Promise<void> {
		try {
			await stat(staged);
		} catch (error) {
			throw new FormatError(
				`Release archive does not contain ${this.platform.executableName}`,
				{ cause: error },
			);
		}

		await chmod(staged, EXECUTABLE_MODE);

		const strategy = installStrategy(this.platform);
		if (process.env.TYPKG_DEBUG) {
			console.log(`[update] Installing ${this.executablePath} (${strategy})`);
		}

		if (strategy === "renameAside") {
			await renameAside(staged, this.executablePath);
		} else {
			await replaceInPlace(staged, this.executablePath);
		}
	}

	private async fetchRelease(): Promise<Release> {
		const release = await this.options.releaseProvider();
		return {
			asset: selectPlatformAsset(release.assets, this.platform),
			version: release.tagName,
			changelog: release.changelog,
			publishedAt: release.publishedAt,
		};
	}
}
