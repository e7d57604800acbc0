import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import * as ini from "ini";
import { ConfigurationError, NotLoggedInError } from "./errors";

// =============================================================================
// Types
// =============================================================================

/**
 * User config stored in ~/.typkgrc (INI format)
 *
 * ```ini
 * registry = https://registry.typkg.dev
 * token = test-token
 * cachePath = /home/me/.cache/typst/packages
 * releaseRepo = typkg/typkg-cli
 * ```
 */
export interface UserConfig {
	registry?: string;
	token?: string;
	/** Typst package cache root */
	cachePath?: string;
	/** GitHub repository (owner/name) that publishes CLI releases */
	releaseRepo?: string;
}

/**
 * Fully resolved configuration (after cascade).
 *
 * Resolved once per command and passed explicitly to every operation that
 * needs it; the object is frozen.
 */
export interface ResolvedConfig {
	readonly registryUrl: string;
	readonly token?: string;
	/** Directory that holds `<namespace>/<name>/<version>` package trees */
	readonly cacheRoot: string;
	readonly releaseRepo: string;
	/** Where the user config was read from */
	readonly configPath: string;
}

/**
 * Inputs of the cascade, defaulting to the current process.
 */
export interface ConfigSources {
	env?: NodeJS.ProcessEnv;
	homeDir?: string;
	platform?: NodeJS.Platform;
	configPath?: string;
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_REGISTRY_URL = "https://registry.typkg.dev";

export const DEFAULT_RELEASE_REPO = "typkg/typkg-cli";

/** Environment variable that overrides the package cache root */
export const CACHE_PATH_ENV = "TYPST_PACKAGE_CACHE_PATH";

/**
 * Get the user config file path (~/.typkgrc)
 */
export function getConfigPath(homeDir: string = homedir()): string {
	return join(homeDir, ".typkgrc");
}

/**
 * Get the platform's per-user cache directory:
 * - macOS: ~/Library/Caches
 * - Windows: %LocalAppData%
 * - others: $XDG_CACHE_HOME, or ~/.cache
 */
export function getUserCacheDir(
	platform: NodeJS.Platform = process.platform,
	env: NodeJS.ProcessEnv = process.env,
	homeDir: string = homedir(),
): string {
	if (platform === "darwin") {
		return join(homeDir, "Library", "Caches");
	}

	if (platform === "win32") {
		if (!env.LOCALAPPDATA) {
			throw new ConfigurationError("%LocalAppData% is not defined");
		}
		return env.LOCALAPPDATA;
	}

	const xdg = env.XDG_CACHE_HOME;
	if (xdg?.startsWith("/")) {
		return xdg;
	}
	return join(homeDir, ".cache");
}

/**
 * Get the default Typst package cache root (<user cache dir>/typst/packages)
 */
export function getDefaultCacheRoot(
	platform?: NodeJS.Platform,
	env?: NodeJS.ProcessEnv,
	homeDir?: string,
): string {
	return join(getUserCacheDir(platform, env, homeDir), "typst", "packages");
}

// =============================================================================
// INI Config Functions
// =============================================================================

function stringValue(value: unknown): string | undefined {
	return typeof value === "string" && value !== "" ? value : undefined;
}

/**
 * Read the user config file (~/.typkgrc, INI format).
 * A missing or unreadable file yields an empty config.
 */
export async function readUserConfig(
	configPath: string = getConfigPath(),
): Promise<UserConfig> {
	if (process.env.TYPKG_DEBUG) {
		console.log(`[config] Reading config from: ${configPath}`);
	}

	let content: string;
	try {
		content = await readFile(configPath, "utf-8");
	} catch (error) {
		if (process.env.TYPKG_DEBUG) {
			console.log(
				`[config] Error reading config: ${
					error instanceof Error ? error.message : String(error)
				}`,
			);
		}
		return {};
	}

	const parsed: Record<string, unknown> = ini.parse(content);

	return {
		registry: stringValue(parsed.registry),
		token: stringValue(parsed.token),
		cachePath: stringValue(parsed.cachePath),
		releaseRepo: stringValue(parsed.releaseRepo),
	};
}

/**
 * Write the user config file (~/.typkgrc, INI format)
 */
export async function writeUserConfig(
	config: UserConfig,
	configPath: string = getConfigPath(),
): Promise<void> {
	const lines: string[] = ["; typkg configuration", ""];

	if (config.registry) {
		lines.push(`registry = ${config.registry}`);
	}
	if (config.token) {
		lines.push(`token = ${config.token}`);
	}
	if (config.cachePath) {
		lines.push(`cachePath = ${config.cachePath}`);
	}
	if (config.releaseRepo) {
		lines.push(`releaseRepo = ${config.releaseRepo}`);
	}

	// Always end with a newline
	lines.push("");

	await mkdir(dirname(configPath), { recursive: true });
	await writeFile(configPath, lines.join("\n"), { mode: 0o600 });

	if (process.env.TYPKG_DEBUG) {
		console.log(`[config] Wrote config to: ${configPath}`);
	}
}

/**
 * Validate the cache root given through the environment.
 */
async function resolveEnvCachePath(path: string): Promise<string> {
	let isDirectory: boolean;
	try {
		isDirectory = (await stat(path)).isDirectory();
	} catch {
		throw new ConfigurationError(`Invalid path for ${CACHE_PATH_ENV}: ${path}`);
	}
	if (!isDirectory) {
		throw new ConfigurationError(`Path is not a directory: ${path}`);
	}
	return resolve(path);
}

/**
 * Resolve the full configuration using cascade priority:
 * 1. Environment variables (TYPKG_REGISTRY_URL, TYPKG_TOKEN, TYPST_PACKAGE_CACHE_PATH)
 * 2. User config (~/.typkgrc)
 * 3. Defaults
 *
 * @throws ConfigurationError if TYPST_PACKAGE_CACHE_PATH is not an existing directory
 */
export async function resolveConfig(
	sources: ConfigSources = {},
): Promise<ResolvedConfig> {
	const env = sources.env ?? process.env;
	const configPath = sources.configPath ?? getConfigPath(sources.homeDir);
	const userConfig = await readUserConfig(configPath);

	let registryUrl = userConfig.registry ?? DEFAULT_REGISTRY_URL;
	let token = userConfig.token;
	let cacheRoot = userConfig.cachePath
		? resolve(userConfig.cachePath)
		: undefined;

	// Environment variables always win
	if (env.TYPKG_REGISTRY_URL) {
		registryUrl = env.TYPKG_REGISTRY_URL;
	}
	if (env.TYPKG_TOKEN) {
		token = env.TYPKG_TOKEN;
	}
	const envCachePath = env[CACHE_PATH_ENV];
	if (envCachePath) {
		cacheRoot = await resolveEnvCachePath(envCachePath);
	}

	const resolved: ResolvedConfig = Object.freeze({
		registryUrl: registryUrl.replace(/\/+$/, ""),
		token,
		cacheRoot:
			cacheRoot ??
			getDefaultCacheRoot(sources.platform, env, sources.homeDir),
		releaseRepo: userConfig.releaseRepo ?? DEFAULT_RELEASE_REPO,
		configPath,
	});

	if (process.env.TYPKG_DEBUG) {
		console.log("[config] Resolved config:");
		console.log(`[config]   registryUrl: ${resolved.registryUrl}`);
		console.log(`[config]   token: ${resolved.token ? "***" : "(not set)"}`);
		console.log(`[config]   cacheRoot: ${resolved.cacheRoot}`);
		console.log(`[config]   releaseRepo: ${resolved.releaseRepo}`);
	}

	return resolved;
}

// =============================================================================
// Credential Management
// =============================================================================

/**
 * Get the token, or fail if the user is not logged in.
 */
export function requireToken(config: ResolvedConfig): string {
	if (!config.token) {
		throw new NotLoggedInError();
	}
	return config.token;
}

/**
 * Store a token (and optionally the registry it belongs to)
 */
export async function setCredentials(
	token: string,
	registry?: string,
	configPath?: string,
): Promise<void> {
	const config = await readUserConfig(configPath);

	config.token = token;
	if (registry && registry !== DEFAULT_REGISTRY_URL) {
		config.registry = registry;
	}

	await writeUserConfig(config, configPath);
}

/**
 * Remove the stored token
 */
export async function clearCredentials(configPath?: string): Promise<void> {
	const config = await readUserConfig(configPath);
	config.token = undefined;
	await writeUserConfig(config, configPath);
}
