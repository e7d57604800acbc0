/**
 * Registry API client
 *
 * Thin REST client for the package registry. Every method takes its
 * configuration from the value passed to `createRegistryClient`, so the
 * client can be pointed at a fake `fetch` in tests.
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import type { ResolvedConfig } from "./config";
import type { FetchLike, ReleaseAsset } from "./downloader";
import { extractApiErrorMessage, FormatError, NetworkError } from "./errors";
import {
	createPackageRef,
	formatPackageName,
	isValidPackageRef,
	type PackageRef,
	packageKey,
} from "./lib/package-ref";
import { USER_AGENT } from "./package-info";

// =============================================================================
// Types
// =============================================================================

export interface SearchResult {
	namespace: string;
	name: string;
	description: string;
}

export interface SearchResponse {
	query: string;
	count: number;
	results: SearchResult[];
}

export interface PackageVersionInfo {
	version: string;
	/** Minimum Typst compiler version */
	typstVersion: string;
	sha256: string;
	publishedAt?: string;
}

export interface PackageDetails {
	namespace: string;
	name: string;
	description: string;
	homepageUrl: string;
	repositoryUrl: string;
	license: string;
	latestVersion?: PackageVersionInfo;
	versions: PackageVersionInfo[];
}

/**
 * Upload outcome. An empty `sha256` means the registry rejected the
 * package and `report` lists the validation problems.
 */
export interface UploadResult {
	sha256: string;
	namespace: string;
	package: string;
	version: string;
	size: number;
	report: string[];
}

/** Raw response: parsed JSON body, or the text when it is not JSON */
export interface RegistryResponse {
	status: number;
	data: unknown;
	headers: Headers;
}

export interface RegistryClient {
	searchPackages(
		query: string,
		namespace?: string,
		limit?: number,
	): Promise<SearchResponse>;
	fetchPackage(namespace: string, name: string): Promise<PackageDetails>;
	fetchDependencies(ref: PackageRef): Promise<PackageRef[]>;
	packageAsset(ref: PackageRef): ReleaseAsset;
	uploadPackage(path: string, namespace: string): Promise<UploadResult>;
}

export type RegistryClientConfig = Pick<ResolvedConfig, "registryUrl" | "token">;

// =============================================================================
// Response parsing
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string {
	const value = record[key];
	return typeof value === "string" ? value : "";
}

function arrayField(record: Record<string, unknown>, key: string): unknown[] {
	const value = record[key];
	return Array.isArray(value) ? value : [];
}

function expectRecord(data: unknown, what: string): Record<string, unknown> {
	if (!isRecord(data)) {
		throw new FormatError(`Unexpected ${what} response from registry`);
	}
	return data;
}

function parseVersionInfo(value: unknown): PackageVersionInfo | undefined {
	if (!isRecord(value) || typeof value.version !== "string") {
		return undefined;
	}
	const publishedAt = stringField(value, "published_at");
	return {
		version: value.version,
		typstVersion: stringField(value, "typst_version"),
		sha256: stringField(value, "sha256"),
		publishedAt: publishedAt || undefined,
	};
}

function parseVersionList(values: unknown[]): PackageVersionInfo[] {
	const versions: PackageVersionInfo[] = [];
	for (const value of values) {
		const info = parseVersionInfo(value);
		if (info) {
			versions.push(info);
		}
	}
	return versions;
}

function parseSearchResponse(data: unknown): SearchResponse {
	const record = expectRecord(data, "search");
	const results: SearchResult[] = [];
	for (const item of arrayField(record, "results")) {
		if (isRecord(item)) {
			results.push({
				namespace: stringField(item, "namespace"),
				name: stringField(item, "name"),
				description: stringField(item, "description"),
			});
		}
	}
	return {
		query: stringField(record, "query"),
		count: typeof record.count === "number" ? record.count : results.length,
		results,
	};
}

function parsePackageDetails(data: unknown): PackageDetails {
	const record = expectRecord(data, "package");
	return {
		namespace: stringField(record, "namespace"),
		name: stringField(record, "name"),
		description: stringField(record, "description"),
		homepageUrl: stringField(record, "homepage_url"),
		repositoryUrl: stringField(record, "repository_url"),
		license: stringField(record, "license"),
		latestVersion: parseVersionInfo(record.latest_version),
		versions: parseVersionList(arrayField(record, "versions")),
	};
}

function parseDependencies(data: unknown): PackageRef[] {
	const record = expectRecord(data, "dependencies");
	return arrayField(record, "dependencies").map((item) => {
		if (
			!isRecord(item) ||
			typeof item.namespace !== "string" ||
			typeof item.name !== "string" ||
			typeof item.version !== "string"
		) {
			throw new FormatError(
				`Invalid dependency entry: ${JSON.stringify(item)}`,
			);
		}
		const ref = createPackageRef(item.namespace, item.name, item.version);
		if (!isValidPackageRef(ref)) {
			throw new FormatError(`Invalid dependency reference: ${packageKey(ref)}`);
		}
		return ref;
	});
}

function parseUploadResult(data: unknown): UploadResult {
	const record = expectRecord(data, "upload");
	const report = arrayField(record, "report").filter(
		(line): line is string => typeof line === "string",
	);
	return {
		sha256: stringField(record, "sha256"),
		namespace: stringField(record, "namespace"),
		package: stringField(record, "package"),
		version: stringField(record, "version"),
		size: typeof record.size === "number" ? record.size : 0,
		report,
	};
}

// =============================================================================
// Client
// =============================================================================

function segment(value: string): string {
	return encodeURIComponent(value);
}

function isSuccess(status: number): boolean {
	return status >= 200 && status < 300;
}

/**
 * Create a registry client bound to a resolved configuration.
 */
export function createRegistryClient(
	config: RegistryClientConfig,
	fetchImpl: FetchLike = fetch,
): RegistryClient {
	const baseUrl = config.registryUrl.replace(/\/+$/, "");

	function authHeaders(): Record<string, string> {
		return config.token ? { Authorization: `Bearer ${config.token}` } : {};
	}

	async function request(
		path: string,
		init: RequestInit = {},
	): Promise<RegistryResponse> {
		const url = `${baseUrl}${path}`;
		if (process.env.TYPKG_DEBUG) {
			console.log(`[api] ${init.method ?? "GET"} ${url}`);
		}

		let response: Response;
		try {
			response = await fetchImpl(url, {
				...init,
				headers: {
					"User-Agent": USER_AGENT,
					Accept: "application/json",
					...authHeaders(),
				},
			});
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			throw new NetworkError(`Request to ${url} failed: ${message}`);
		}

		const text = await response.text();
		let data: unknown = null;
		if (text) {
			try {
				data = JSON.parse(text);
			} catch {
				data = text;
			}
		}

		return { status: response.status, data, headers: response.headers };
	}

	async function getJson(path: string, fallback: string): Promise<unknown> {
		const response = await request(path);
		if (!isSuccess(response.status)) {
			throw new NetworkError(
				extractApiErrorMessage(response, fallback),
				response.status,
			);
		}
		return response.data;
	}

	return {
		async searchPackages(query, namespace, limit) {
			const params = new URLSearchParams({ q: query });
			if (namespace) {
				params.set("namespace", namespace);
			}
			if (limit !== undefined && limit > 0) {
				params.set("limit", String(limit));
			}

			const data = await getJson(
				`/api/v1/search?${params.toString()}`,
				"Search failed",
			);
			return parseSearchResponse(data);
		},

		async fetchPackage(namespace, name) {
			const base = `/api/v1/packages/${segment(namespace)}/${segment(name)}`;
			const details = parsePackageDetails(
				await getJson(
					base,
					`Failed to get package ${formatPackageName({ namespace, name })}`,
				),
			);

			// The version list is a separate resource; keep the embedded one if it fails
			try {
				const data = await getJson(`${base}/versions`, "Failed to get versions");
				const versions = parseVersionList(
					arrayField(expectRecord(data, "versions"), "versions"),
				);
				if (versions.length > 0) {
					details.versions = versions;
				}
			} catch (error) {
				if (process.env.TYPKG_DEBUG) {
					console.log(
						`[api] Version list unavailable: ${
							error instanceof Error ? error.message : String(error)
						}`,
					);
				}
			}

			return details;
		},

		async fetchDependencies(ref) {
			const data = await getJson(
				`/api/v1/packages/${segment(ref.namespace)}/${segment(ref.name)}/${segment(ref.version)}/dependencies`,
				`Failed to get dependencies of ${packageKey(ref)}`,
			);
			return parseDependencies(data);
		},

		packageAsset(ref) {
			return {
				name: `${ref.name}-${ref.version}.tar.gz`,
				downloadURL: `${baseUrl}/api/v1/download/${segment(ref.namespace)}/${segment(ref.name)}/${segment(ref.version)}`,
				// The registry does not announce sizes; Content-Length is used instead
				size: 0,
				headers: authHeaders(),
			};
		},

		async uploadPackage(path, namespace) {
			const content = await readFile(path);
			const form = new FormData();
			form.append("file", new Blob([content]), basename(path));
			form.append("namespace", namespace);

			const response = await request("/api/v1/packages/upload", {
				method: "POST",
				body: form,
			});

			if (response.status !== 200 && response.status !== 201) {
				throw new NetworkError(
					extractApiErrorMessage(response, "Upload failed"),
					response.status,
				);
			}
			return parseUploadResult(response.data);
		},
	};
}
