import { PlatformAssetNotFoundError } from "../errors";

/** Name of the CLI binary, also the prefix of every release asset */
export const BINARY_NAME = "typkg";

/**
 * Host platform as release assets name it.
 */
export interface PlatformInfo {
	/** Release OS identifier (darwin, linux, windows) */
	os: string;
	/** Release architecture identifier (amd64, arm64, 386) */
	arch: string;
	/** File name of the binary inside a release archive */
	executableName: string;
	/**
	 * Whether the running executable may be unlinked or overwritten while it
	 * runs. Windows locks the image of a running process.
	 */
	canOverwriteRunningExecutable: boolean;
}

const OS_NAMES: Partial<Record<NodeJS.Platform, string>> = {
	win32: "windows",
};

const ARCH_NAMES: Record<string, string> = {
	x64: "amd64",
	ia32: "386",
	arm64: "arm64",
};

/**
 * Map a Node.js platform name to the release OS identifier.
 */
export function releaseOs(platform: NodeJS.Platform): string {
	return OS_NAMES[platform] ?? platform;
}

/**
 * Map a Node.js architecture name to the release architecture identifier.
 */
export function releaseArch(arch: string): string {
	return ARCH_NAMES[arch] ?? arch;
}

export function detectPlatform(
	platform: NodeJS.Platform = process.platform,
	arch: string = process.arch,
): PlatformInfo {
	const isWindows = platform === "win32";
	return {
		os: releaseOs(platform),
		arch: releaseArch(arch),
		executableName: isWindows ? `${BINARY_NAME}.exe` : BINARY_NAME,
		canOverwriteRunningExecutable: !isWindows,
	};
}

function escapeRegExp(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Pattern of the release asset built for a platform, e.g.
 * "typkg-linux-amd64.tar.gz" or "typkg-windows-amd64-msvc.zip".
 */
export function assetPattern(os: string, arch: string): RegExp {
	return new RegExp(
		`^${BINARY_NAME}-${escapeRegExp(os)}-${escapeRegExp(arch)}(-\\w+)?\\.(tar\\.gz|zip)$`,
	);
}

/**
 * Pick the single release asset built for a platform.
 *
 * @throws PlatformAssetNotFoundError if no asset or more than one asset matches
 */
export function selectPlatformAsset<T extends { name: string }>(
	assets: readonly T[],
	platform: Pick<PlatformInfo, "os" | "arch">,
): T {
	const pattern = assetPattern(platform.os, platform.arch);
	const matches = assets.filter((asset) => pattern.test(asset.name));

	const [match] = matches;
	if (!match || matches.length > 1) {
		throw new PlatformAssetNotFoundError(
			platform.os,
			platform.arch,
			matches.map((asset) => asset.name),
		);
	}
	return match;
}
