import { afterEach, describe, expect, it, vi } from "vitest";
import type { FetchLike } from "./downloader";
import { NetworkError } from "./errors";
import {
	fetchLatestRelease,
	GitHubNotFoundError,
	GitHubRateLimitError,
} from "./github";

function respondWith(response: Response) {
	return vi.fn<FetchLike>(async () => response);
}

describe("fetchLatestRelease", () => {
	afterEach(() => {
		vi.unstubAllEnvs();
	});

	it("should parse the release and its assets", async () => {
		const fetchMock = respondWith(
			Response.json({
				tag_name: "v0.5.0",
				body: "- faster downloads",
				published_at: "2024-06-01T12:00:00Z",
				assets: [
					{
						name: "typkg-linux-amd64.tar.gz",
						browser_download_url:
							"https://downloads.example.test/typkg-linux-amd64.tar.gz",
						size: 2048,
					},
					{ name: "checksums.txt" },
				],
			}),
		);

		const release = await fetchLatestRelease("example/cli", fetchMock);

		expect(release).toEqual({
			tagName: "v0.5.0",
			changelog: "- faster downloads",
			publishedAt: new Date("2024-06-01T12:00:00Z"),
			assets: [
				{
					name: "typkg-linux-amd64.tar.gz",
					downloadURL: "https://downloads.example.test/typkg-linux-amd64.tar.gz",
					size: 2048,
				},
			],
		});
		expect(fetchMock.mock.calls[0][0]).toBe(
			"https://api.github.com/repos/example/cli/releases/latest",
		);
	});

	it("should authenticate with GITHUB_TOKEN", async () => {
		vi.stubEnv("GITHUB_TOKEN", "test-secret");
		const fetchMock = respondWith(Response.json({ tag_name: "v1.0.0" }));

		await fetchLatestRelease("example/cli", fetchMock);

		expect(fetchMock.mock.calls[0][1]?.headers).toMatchObject({
			Authorization: "Bearer test-secret",
		});
	});

	it("should report a missing release", async () => {
		await expect(
			fetchLatestRelease(
				"example/cli",
				respondWith(new Response("", { status: 404 })),
			),
		).rejects.toThrow(new GitHubNotFoundError("example/cli"));
	});

	it("should detect rate limiting", async () => {
		const response = new Response("", {
			status: 403,
			headers: { "x-ratelimit-remaining": "0" },
		});

		await expect(
			fetchLatestRelease("example/cli", respondWith(response)),
		).rejects.toBeInstanceOf(GitHubRateLimitError);
	});

	it("should fail on other error statuses", async () => {
		await expect(
			fetchLatestRelease(
				"example/cli",
				respondWith(new Response("", { status: 502 })),
			),
		).rejects.toThrow(new NetworkError("GitHub API error: 502", 502));
	});
});
