/**
 * Typst package manifest (typst.toml)
 *
 * @example
 * ```toml
 * [package]
 * name = "cetz"
 * version = "0.2.2"
 * entrypoint = "src/lib.typ"
 * authors = ["Jane Doe"]
 * license = "MIT"
 * description = "Drawing with Typst made easy"
 * exclude = ["gallery/", "*.pdf"]
 *
 * [template]
 * path = "template"
 * entrypoint = "main.typ"
 * thumbnail = "thumbnail.png"
 * ```
 */

import { parse } from "smol-toml";
import { FormatError } from "../errors";

/** File name of the manifest at a package root */
export const MANIFEST_FILE = "typst.toml";

/**
 * The [package] table
 */
export interface PackageSection {
	/** Package name, unique within its namespace */
	name: string;

	/** Semantic version string */
	version: string;

	/** Path of the main .typ file, relative to the package root */
	entrypoint: string;

	authors?: string[];

	/** SPDX license expression */
	license?: string;

	description?: string;
	homepage?: string;
	repository?: string;
	keywords?: string[];
	categories?: string[];
	disciplines?: string[];

	/** Minimum compiler version the package needs */
	compiler?: string;

	/** Exclusion rules applied when bundling */
	exclude?: string[];
}

/**
 * The [template] table, present for template packages
 */
export interface TemplateSection {
	/** Directory copied when the template is instantiated */
	path: string;
	/** Main file inside `path` */
	entrypoint: string;
	thumbnail?: string;
}

export interface TypstManifest {
	package: PackageSection;
	template?: TemplateSection;
}

export type ManifestValidation =
	| { valid: true; manifest: TypstManifest }
	| { valid: false; error: string };

function isTable(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

class FieldError extends Error {}

function readString(
	table: Record<string, unknown>,
	section: string,
	key: string,
): string | undefined {
	const value = table[key];
	if (value === undefined) {
		return undefined;
	}
	if (typeof value !== "string") {
		throw new FieldError(`${section}.${key} must be a string`);
	}
	return value;
}

function readStringArray(
	table: Record<string, unknown>,
	section: string,
	key: string,
): string[] | undefined {
	const value = table[key];
	if (value === undefined) {
		return undefined;
	}
	if (!Array.isArray(value)) {
		throw new FieldError(`${section}.${key} must be an array of strings`);
	}
	const strings: string[] = [];
	for (const item of value) {
		if (typeof item !== "string") {
			throw new FieldError(`${section}.${key} must be an array of strings`);
		}
		strings.push(item);
	}
	return strings;
}

function readRequired(
	table: Record<string, unknown>,
	section: string,
	key: string,
): string {
	const value = readString(table, section, key);
	if (!value) {
		throw new FieldError(`${section} ${key} is required in ${MANIFEST_FILE}`);
	}
	return value;
}

function readPackage(table: Record<string, unknown>): PackageSection {
	const section = "package";
	const name = readRequired(table, section, "name");
	const version = readRequired(table, section, "version");
	const entrypoint = readRequired(table, section, "entrypoint");
	if (!/^\d+\.\d+\.\d+/.test(version)) {
		throw new FieldError(
			"package version must be a semantic version (e.g., 0.1.0)",
		);
	}

	return {
		name,
		version,
		entrypoint,
		authors: readStringArray(table, section, "authors"),
		license: readString(table, section, "license"),
		description: readString(table, section, "description"),
		homepage: readString(table, section, "homepage"),
		repository: readString(table, section, "repository"),
		keywords: readStringArray(table, section, "keywords"),
		categories: readStringArray(table, section, "categories"),
		disciplines: readStringArray(table, section, "disciplines"),
		compiler: readString(table, section, "compiler"),
		exclude: readStringArray(table, section, "exclude"),
	};
}

function readTemplate(table: Record<string, unknown>): TemplateSection {
	const section = "template";
	return {
		path: readRequired(table, section, "path"),
		entrypoint: readRequired(table, section, "entrypoint"),
		thumbnail: readString(table, section, "thumbnail"),
	};
}

/**
 * Validate decoded manifest data and narrow it to a TypstManifest.
 * Unknown keys are ignored.
 */
export function validateManifest(data: unknown): ManifestValidation {
	if (!isTable(data) || !isTable(data.package)) {
		return {
			valid: false,
			error: `missing [package] section in ${MANIFEST_FILE}`,
		};
	}

	try {
		const manifest: TypstManifest = { package: readPackage(data.package) };
		if (data.template !== undefined) {
			if (!isTable(data.template)) {
				return { valid: false, error: "[template] must be a table" };
			}
			manifest.template = readTemplate(data.template);
		}
		return { valid: true, manifest };
	} catch (error) {
		if (error instanceof FieldError) {
			return { valid: false, error: error.message };
		}
		throw error;
	}
}

/**
 * Parse and validate the text of a typst.toml file.
 *
 * @throws FormatError if the TOML is malformed or a required field is missing
 */
export function parseManifest(content: string): TypstManifest {
	let data: unknown;
	try {
		data = parse(content);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new FormatError(`Failed to parse ${MANIFEST_FILE}: ${message}`, {
			cause: error,
		});
	}

	const result = validateManifest(data);
	if (!result.valid) {
		throw new FormatError(result.error);
	}
	return result.manifest;
}
