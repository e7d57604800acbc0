import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { bundlePackage } from "./bundler";
import { FormatError, PreconditionError } from "./errors";
import { extractArchive } from "./lib/archive";

describe("bundlePackage", () => {
	let workDir: string;
	let sourceDir: string;

	beforeEach(async () => {
		workDir = await mkdtemp(join(tmpdir(), "typkg-bundle-"));
		sourceDir = join(workDir, "slides");
		await mkdir(join(sourceDir, "docs"), { recursive: true });
		await mkdir(join(sourceDir, ".git"));
		await writeFile(join(sourceDir, "lib.typ"), "#let slide(body) = body\n");
		await writeFile(join(sourceDir, "docs", "guide.md"), "# Guide\n");
		await writeFile(join(sourceDir, ".git", "HEAD"), "ref: refs/heads/main\n");
	});

	afterEach(async () => {
		await rm(workDir, { recursive: true, force: true });
	});

	async function writeManifest(content: string): Promise<void> {
		await writeFile(join(sourceDir, "typst.toml"), content);
	}

	it("should merge caller and manifest exclusion rules", async () => {
		await writeManifest(
			[
				"[package]",
				'name = "slides"',
				'version = "0.1.0"',
				'entrypoint = "lib.typ"',
				'exclude = ["docs/"]',
				"",
			].join("\n"),
		);
		const output = join(workDir, "out", "slides-0.1.0.tar.gz");

		const result = await bundlePackage(sourceDir, {
			exclude: [".git"],
			output,
		});

		expect(result.output).toBe(output);
		expect(result.files).toEqual(["lib.typ", "typst.toml"]);
		expect(result.manifest.package.name).toBe("slides");

		const extracted = join(workDir, "extracted");
		await extractArchive("tar.gz", output, extracted);
		expect((await readdir(extracted)).sort()).toEqual(["lib.typ", "typst.toml"]);
	});

	it("should require typst.toml", async () => {
		await expect(
			bundlePackage(sourceDir, { output: join(workDir, "out.tar.gz") }),
		).rejects.toThrow(
			new FormatError(
				`typst.toml not found in ${sourceDir} - a valid manifest is required`,
			),
		);
	});

	it("should reject an incomplete manifest", async () => {
		await writeManifest('[package]\nname = "slides"\nversion = "0.1.0"\n');

		await expect(
			bundlePackage(sourceDir, { output: join(workDir, "out.tar.gz") }),
		).rejects.toThrow("package entrypoint is required in typst.toml");
	});

	it("should reject a path that is not a directory", async () => {
		const file = join(sourceDir, "lib.typ");

		await expect(bundlePackage(file)).rejects.toThrow(
			new PreconditionError(`Not a directory: ${file}`),
		);
	});
});
