import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	clearCredentials,
	DEFAULT_REGISTRY_URL,
	DEFAULT_RELEASE_REPO,
	getUserCacheDir,
	readUserConfig,
	requireToken,
	resolveConfig,
	setCredentials,
} from "./config";
import { ConfigurationError, NotLoggedInError } from "./errors";

describe("config", () => {
	let homeDir: string;

	beforeEach(async () => {
		homeDir = await mkdtemp(join(tmpdir(), "typkg-config-"));
	});

	afterEach(async () => {
		await rm(homeDir, { recursive: true, force: true });
	});

	describe("resolveConfig", () => {
		it("should fall back to defaults", async () => {
			const config = await resolveConfig({
				env: {},
				homeDir,
				platform: "linux",
			});

			expect(config).toEqual({
				registryUrl: DEFAULT_REGISTRY_URL,
				token: undefined,
				cacheRoot: join(homeDir, ".cache", "typst", "packages"),
				releaseRepo: DEFAULT_RELEASE_REPO,
				configPath: join(homeDir, ".typkgrc"),
			});
		});

		it("should read the user config file", async () => {
			const cachePath = join(homeDir, "cache");
			await writeFile(
				join(homeDir, ".typkgrc"),
				[
					"registry = https://registry.example.test/",
					"token = test-secret",
					`cachePath = ${cachePath}`,
					"releaseRepo = example/cli",
					"",
				].join("\n"),
			);

			const config = await resolveConfig({ env: {}, homeDir, platform: "linux" });

			expect(config.registryUrl).toBe("https://registry.example.test");
			expect(config.token).toBe("test-secret");
			expect(config.cacheRoot).toBe(cachePath);
			expect(config.releaseRepo).toBe("example/cli");
		});

		it("should let environment variables win", async () => {
			await writeFile(
				join(homeDir, ".typkgrc"),
				"registry = https://registry.example.test\ntoken = file-token\n",
			);
			const envCache = join(homeDir, "env-cache");
			await mkdir(envCache);

			const config = await resolveConfig({
				env: {
					TYPKG_REGISTRY_URL: "http://localhost:8080",
					TYPKG_TOKEN: "test-secret",
					TYPST_PACKAGE_CACHE_PATH: envCache,
				},
				homeDir,
				platform: "linux",
			});

			expect(config.registryUrl).toBe("http://localhost:8080");
			expect(config.token).toBe("test-secret");
			expect(config.cacheRoot).toBe(envCache);
		});

		it("should reject a cache path that does not exist", async () => {
			const missing = join(homeDir, "missing");

			await expect(
				resolveConfig({
					env: { TYPST_PACKAGE_CACHE_PATH: missing },
					homeDir,
				}),
			).rejects.toThrow(
				new ConfigurationError(
					`Invalid path for TYPST_PACKAGE_CACHE_PATH: ${missing}`,
				),
			);
		});

		it("should reject a cache path that is a file", async () => {
			const file = join(homeDir, "file");
			await writeFile(file, "");

			await expect(
				resolveConfig({ env: { TYPST_PACKAGE_CACHE_PATH: file }, homeDir }),
			).rejects.toThrow(`Path is not a directory: ${file}`);
		});

		it("should return a frozen value", async () => {
			const config = await resolveConfig({ env: {}, homeDir, platform: "linux" });
			expect(Object.isFrozen(config)).toBe(true);
		});
	});

	describe("getUserCacheDir", () => {
		it("should follow platform conventions", () => {
			expect(getUserCacheDir("darwin", {}, "/home/me")).toBe(
				"/home/me/Library/Caches",
			);
			expect(getUserCacheDir("linux", {}, "/home/me")).toBe("/home/me/.cache");
			expect(
				getUserCacheDir("linux", { XDG_CACHE_HOME: "/var/cache/me" }, "/home/me"),
			).toBe("/var/cache/me");
			expect(
				getUserCacheDir("win32", { LOCALAPPDATA: "C:\\Users\\me\\AppData\\Local" }),
			).toBe("C:\\Users\\me\\AppData\\Local");
		});

		it("should ignore a relative XDG_CACHE_HOME", () => {
			expect(
				getUserCacheDir("linux", { XDG_CACHE_HOME: "cache" }, "/home/me"),
			).toBe("/home/me/.cache");
		});

		it("should fail on Windows without LocalAppData", () => {
			expect(() => getUserCacheDir("win32", {})).toThrow(ConfigurationError);
		});
	});

	describe("credentials", () => {
		it("should store and clear the token", async () => {
			const configPath = join(homeDir, ".typkgrc");

			await setCredentials("test-secret", "https://registry.example.test", configPath);
			expect(await readUserConfig(configPath)).toEqual({
				registry: "https://registry.example.test",
				token: "test-secret",
			});

			await clearCredentials(configPath);
			expect(await readUserConfig(configPath)).toEqual({
				registry: "https://registry.example.test",
			});
		});

		it("should require a token", async () => {
			const config = await resolveConfig({ env: {}, homeDir, platform: "linux" });
			expect(() => requireToken(config)).toThrow(NotLoggedInError);
			expect(
				requireToken({ ...config, token: "test-secret" }),
			).toBe("test-secret");
		});
	});
});
