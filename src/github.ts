/**
 * GitHub release lookup for the CLI's own builds.
 *
 * Queries the latest published release of the configured repository and
 * returns its tag, notes and downloadable assets.
 */

import type { FetchLike, ReleaseAsset } from "./downloader";
import { NetworkError } from "./errors";
import { USER_AGENT } from "./package-info";

const GITHUB_API_URL = "https://api.github.com";

/**
 * A published GitHub release with all of its assets.
 */
export interface GitHubRelease {
	tagName: string;
	/** Release notes (markdown) */
	changelog: string;
	publishedAt?: Date;
	assets: ReleaseAsset[];
}

/**
 * Error thrown when GitHub API rate limit is hit.
 */
export class GitHubRateLimitError extends Error {
	constructor() {
		super(
			"GitHub API rate limit exceeded. Set GITHUB_TOKEN environment variable for higher limits.",
		);
		this.name = "GitHubRateLimitError";
	}
}

/**
 * Error thrown when the repository has no published release.
 */
export class GitHubNotFoundError extends Error {
	constructor(repo: string) {
		super(`No published release found for ${repo}`);
		this.name = "GitHubNotFoundError";
	}
}

/**
 * Get GitHub API headers, including authentication if available.
 */
function getGitHubHeaders(): Record<string, string> {
	const headers: Record<string, string> = {
		Accept: "application/vnd.github+json",
		"X-GitHub-Api-Version": "2022-11-28",
		"User-Agent": USER_AGENT,
	};

	const token = process.env.GITHUB_TOKEN;
	if (token) {
		headers.Authorization = `Bearer ${token}`;
	}

	return headers;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function parseAsset(value: unknown): ReleaseAsset | undefined {
	if (
		!isRecord(value) ||
		typeof value.name !== "string" ||
		typeof value.browser_download_url !== "string"
	) {
		return undefined;
	}
	return {
		name: value.name,
		downloadURL: value.browser_download_url,
		size: typeof value.size === "number" ? value.size : 0,
	};
}

function parseRelease(data: unknown): GitHubRelease {
	if (!isRecord(data) || typeof data.tag_name !== "string") {
		throw new NetworkError("GitHub API returned an unexpected release payload");
	}

	const assets: ReleaseAsset[] = [];
	if (Array.isArray(data.assets)) {
		for (const item of data.assets) {
			const asset = parseAsset(item);
			if (asset) {
				assets.push(asset);
			}
		}
	}

	return {
		tagName: data.tag_name,
		changelog: typeof data.body === "string" ? data.body : "",
		publishedAt:
			typeof data.published_at === "string"
				? new Date(data.published_at)
				: undefined,
		assets,
	};
}

/**
 * Fetch the latest published release of `repo` ("owner/name").
 *
 * @throws GitHubNotFoundError if the repository has no release
 * @throws GitHubRateLimitError when the unauthenticated quota is used up
 */
export async function fetchLatestRelease(
	repo: string,
	fetchImpl: FetchLike = fetch,
): Promise<GitHubRelease> {
	const url = `${GITHUB_API_URL}/repos/${repo}/releases/latest`;

	if (process.env.TYPKG_DEBUG) {
		console.log(`[github] GET ${url}`);
	}

	let response: Response;
	try {
		response = await fetchImpl(url, { headers: getGitHubHeaders() });
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new NetworkError(`Failed to query GitHub releases: ${message}`);
	}

	if (response.status === 404) {
		throw new GitHubNotFoundError(repo);
	}

	if (response.status === 403) {
		const remaining = response.headers.get("x-ratelimit-remaining");
		if (remaining === "0") {
			throw new GitHubRateLimitError();
		}
	}

	if (!response.ok) {
		throw new NetworkError(
			`GitHub API error: ${response.status}`,
			response.status,
		);
	}

	const data: unknown = await response.json();
	return parseRelease(data);
}
