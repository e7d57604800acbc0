import {
	access,
	mkdir,
	mkdtemp,
	readdir,
	readFile,
	rm,
	writeFile,
} from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createRegistryClient } from "./api-client";
import {
	createResolverContext,
	fetchPackageToCache,
	PackageCache,
} from "./cache";
import type { FetchLike } from "./downloader";
import { CacheError, NetworkError } from "./errors";
import { createTarGz } from "./lib/archive";
import { createPackageRef, packageKey } from "./lib/package-ref";
import { resolvePackage } from "./lib/resolver";

const REGISTRY = "https://registry.example.test";

async function exists(path: string): Promise<boolean> {
	try {
		await access(path);
		return true;
	} catch {
		return false;
	}
}

describe("PackageCache", () => {
	let workDir: string;
	let cache: PackageCache;

	beforeEach(async () => {
		workDir = await mkdtemp(join(tmpdir(), "typkg-cache-"));
		cache = new PackageCache(join(workDir, "packages"));
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await rm(workDir, { recursive: true, force: true });
	});

	describe("has / list / remove", () => {
		beforeEach(async () => {
			const root = cache.root;
			await mkdir(join(root, "preview", "cetz", "0.2.2"), { recursive: true });
			await mkdir(join(root, "preview", "cetz", "0.1.0"), { recursive: true });
			await mkdir(join(root, "local", "notes", "1.0.0"), { recursive: true });
			await mkdir(join(root, ".tmp-abc123", "leftover"), { recursive: true });
			await writeFile(join(root, "preview", "README.txt"), "not a package");
		});

		it("should report presence by directory", async () => {
			expect(await cache.has(createPackageRef("preview", "cetz", "0.2.2"))).toBe(
				true,
			);
			expect(await cache.has(createPackageRef("preview", "cetz", "9.9.9"))).toBe(
				false,
			);
			expect(
				await cache.has(createPackageRef("preview", "README.txt", "1.0.0")),
			).toBe(false);
		});

		it("should list packages in sorted order, skipping staging dirs", async () => {
			const refs = await cache.list();

			expect(refs.map(packageKey)).toEqual([
				"@local/notes:1.0.0",
				"@preview/cetz:0.1.0",
				"@preview/cetz:0.2.2",
			]);
		});

		it("should treat a missing root as empty", async () => {
			expect(await new PackageCache(join(workDir, "nowhere")).list()).toEqual(
				[],
			);
		});

		it("should refuse paths outside the cache root", () => {
			expect(() =>
				cache.packagePath(createPackageRef("..", "..", "escaped")),
			).toThrow(CacheError);
			expect(() =>
				cache.packagePath(createPackageRef("preview", "cetz/..", "0.2.2")),
			).toThrow(CacheError);
			expect(cache.packagePath(createPackageRef("preview", "cetz", "0.2.2"))).toBe(
				join(cache.root, "preview", "cetz", "0.2.2"),
			);
		});

		it("should remove a cached package", async () => {
			const ref = createPackageRef("preview", "cetz", "0.1.0");

			expect(await cache.remove(ref)).toBe(true);
			expect(await cache.has(ref)).toBe(false);
			expect(await cache.remove(ref)).toBe(false);
		});
	});

	describe("fetchPackageToCache", () => {
		let archive: Uint8Array;
		const ref = createPackageRef("preview", "cetz", "0.2.2");

		beforeEach(async () => {
			const sourceDir = join(workDir, "source");
			await mkdir(sourceDir);
			await writeFile(join(sourceDir, "lib.typ"), "#let canvas = none\n");
			await writeFile(
				join(sourceDir, "typst.toml"),
				'[package]\nname = "cetz"\nversion = "0.2.2"\nentrypoint = "lib.typ"\n',
			);
			const archivePath = join(workDir, "cetz.tar.gz");
			await createTarGz(sourceDir, [], archivePath);
			archive = new Uint8Array(await readFile(archivePath));
		});

		function serveArchive() {
			return vi.fn<FetchLike>(async () => new Response(archive));
		}

		it("should install the extracted package without its archive", async () => {
			const fetchMock = serveArchive();

			const path = await fetchPackageToCache(ref, {
				cache,
				client: createRegistryClient({ registryUrl: REGISTRY }),
				fetch: fetchMock,
			});

			expect(path).toBe(join(cache.root, "preview", "cetz", "0.2.2"));
			expect(await readFile(join(path, "lib.typ"), "utf-8")).toBe(
				"#let canvas = none\n",
			);
			expect((await readdir(path)).sort()).toEqual(["lib.typ", "typst.toml"]);
			expect(await readdir(cache.root)).toEqual(["preview"]);
			expect(fetchMock.mock.calls[0][0]).toBe(
				`${REGISTRY}/api/v1/download/preview/cetz/0.2.2`,
			);
		});

		it("should leave nothing behind when the download fails", async () => {
			await expect(
				fetchPackageToCache(ref, {
					cache,
					client: createRegistryClient({ registryUrl: REGISTRY }),
					fetch: vi.fn<FetchLike>(
						async () => new Response("gone", { status: 404 }),
					),
				}),
			).rejects.toBeInstanceOf(NetworkError);

			expect(await cache.has(ref)).toBe(false);
			expect(await readdir(cache.root)).toEqual([]);
		});

		it("should keep a copy installed concurrently", async () => {
			const target = cache.packagePath(ref);
			await mkdir(target, { recursive: true });
			await writeFile(join(target, "marker.txt"), "first");

			await fetchPackageToCache(ref, {
				cache,
				client: createRegistryClient({ registryUrl: REGISTRY }),
				fetch: serveArchive(),
			});

			expect(await readdir(target)).toEqual(["marker.txt"]);
			expect(await readdir(cache.root)).toEqual(["preview"]);
		});

		it("should hand each download to the progress consumer", async () => {
			const onProgress = vi.fn(async () => {});

			await fetchPackageToCache(ref, {
				cache,
				client: createRegistryClient({ registryUrl: REGISTRY }),
				fetch: serveArchive(),
				onProgress,
			});

			expect(onProgress).toHaveBeenCalledTimes(1);
			expect(await exists(join(cache.packagePath(ref), "lib.typ"))).toBe(true);
		});

		it("should resolve dependencies into the cache", async () => {
			const fetchMock = vi.fn<FetchLike>(async (url) => {
				const path = url.slice(REGISTRY.length);
				if (path.startsWith("/api/v1/download/")) {
					return new Response(archive);
				}
				if (path === "/api/v1/packages/preview/cetz/0.2.2/dependencies") {
					return Response.json({
						dependencies: [
							{ namespace: "preview", name: "oxifmt", version: "0.2.1" },
						],
					});
				}
				return new Response("404 page not found", { status: 404 });
			});
			const onResolved = vi.fn();
			const context = createResolverContext({
				cache,
				client: createRegistryClient({ registryUrl: REGISTRY }, fetchMock),
				fetch: fetchMock,
				onResolved,
			});

			const count = await resolvePackage(ref, context);

			expect(count).toBe(2);
			expect(onResolved.mock.calls).toEqual([
				[ref, { cached: false }],
				[createPackageRef("preview", "oxifmt", "0.2.1"), { cached: false }],
			]);
			expect(await cache.has(createPackageRef("preview", "oxifmt", "0.2.1"))).toBe(
				true,
			);

			// A second walk finds both packages cached
			onResolved.mockClear();
			await resolvePackage(ref, context);
			expect(onResolved.mock.calls.map(([, info]) => info)).toEqual([
				{ cached: true },
				{ cached: true },
			]);
		});

		it("should treat a dependency outside the cache layout as a leaf", async () => {
			const fetchMock = vi.fn<FetchLike>(async (url) => {
				const path = url.slice(REGISTRY.length);
				if (path.startsWith("/api/v1/download/")) {
					return new Response(archive);
				}
				if (path === "/api/v1/packages/preview/cetz/0.2.2/dependencies") {
					return Response.json({
						dependencies: [
							{ namespace: "..", name: "..", version: "typkg-escaped" },
						],
					});
				}
				return new Response("404 page not found", { status: 404 });
			});
			const context = createResolverContext({
				cache,
				client: createRegistryClient({ registryUrl: REGISTRY }, fetchMock),
				fetch: fetchMock,
			});

			const count = await resolvePackage(ref, context);

			expect(count).toBe(1);
			expect(fetchMock).toHaveBeenCalledTimes(2);
			expect(await exists(join(cache.root, "..", "..", "typkg-escaped"))).toBe(
				false,
			);
		});
	});
});
