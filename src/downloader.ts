/**
 * Background download of a single archive, with progress reporting.
 *
 * `Downloader.download()` starts the transfer and returns a handle at once.
 * The transfer streams the body to `<destDir>/<asset.name>`, pushes the
 * received ratio into a bounded channel after every write, extracts the
 * archive into `destDir` and finally runs the completion callback.
 *
 * The channel blocks the transfer while it is full, so the caller must
 * drain the handle (or call `wait()`). It is closed exactly once, on every
 * exit path, after which `error` holds the outcome.
 */

import { mkdir, open } from "node:fs/promises";
import { join } from "node:path";
import { NetworkError, SizeMismatchError } from "./errors";
import { BoundedChannel, DEFAULT_CHANNEL_CAPACITY } from "./lib/channel";
import { detectFormat, extractArchive } from "./lib/archive";
import { USER_AGENT } from "./package-info";

// =============================================================================
// Types
// =============================================================================

/**
 * A downloadable artifact: a package archive or a CLI release build.
 */
export interface ReleaseAsset {
	/** File name, also used to pick the archive format */
	name: string;
	downloadURL: string;
	/** Announced size in bytes; zero or less when unknown */
	size: number;
	/** Extra request headers, such as registry authorization */
	headers?: Record<string, string>;
}

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

/** Runs after a successful transfer and extraction */
export type CompletionCallback = () => Promise<void> | void;

export interface DownloaderOptions {
	fetch?: FetchLike;
	/** Overall timeout, defaults to ten minutes */
	timeoutMs?: number;
	/** Progress channel capacity */
	capacity?: number;
	/**
	 * Runs on every exit path before the channel closes. A failure here is
	 * reported as a warning and does not change the outcome.
	 */
	cleanup?: () => Promise<void>;
}

/**
 * Progress value: the received ratio, or null when the total is unknown
 */
export type ProgressValue = number | null;

interface ProgressState {
	bytesReceived: number;
	total: number | null;
	error?: Error;
}

export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 10 * 60 * 1000;

// =============================================================================
// Handle
// =============================================================================

/**
 * Observable side of a running download.
 *
 * Counters may be read at any time; `error` is meaningful once the progress
 * channel has closed.
 */
export class DownloadHandle implements AsyncIterable<ProgressValue> {
	constructor(
		private readonly state: ProgressState,
		readonly progress: BoundedChannel<ProgressValue>,
		/** Resolves once the download has settled; never rejects */
		readonly done: Promise<void>,
		/** Where the archive is written */
		readonly archivePath: string,
	) {}

	get bytesReceived(): number {
		return this.state.bytesReceived;
	}

	/** Announced size, or null if neither the asset nor the server gave one */
	get total(): number | null {
		return this.state.total;
	}

	get error(): Error | undefined {
		return this.state.error;
	}

	[Symbol.asyncIterator](): AsyncIterator<ProgressValue, undefined> {
		return this.progress[Symbol.asyncIterator]();
	}

	/**
	 * Drain the remaining progress values and wait for the download to
	 * settle.
	 *
	 * @throws The download's error, if it failed
	 */
	async wait(): Promise<void> {
		while (!(await this.progress.next()).done) {
			// discard
		}
		await this.done;
		if (this.state.error) {
			throw this.state.error;
		}
	}
}

// =============================================================================
// Downloader
// =============================================================================

function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}

function describeFailure(error: unknown): string {
	if (error instanceof Error && error.name === "TimeoutError") {
		return "request timed out";
	}
	return toError(error).message;
}

export class Downloader {
	constructor(
		readonly asset: ReleaseAsset,
		readonly destDir: string,
		private readonly options: DownloaderOptions = {},
	) {}

	/**
	 * Start the download in the background and return its handle.
	 *
	 * @param onFinished - Invoked only after the bytes were verified and the
	 * archive was extracted; a failure here becomes the handle's error
	 */
	download(onFinished?: CompletionCallback): DownloadHandle {
		const state: ProgressState = {
			bytesReceived: 0,
			total: this.asset.size > 0 ? this.asset.size : null,
		};
		const channel = new BoundedChannel<ProgressValue>(
			this.options.capacity ?? DEFAULT_CHANNEL_CAPACITY,
		);
		const archivePath = join(this.destDir, this.asset.name);

		const done = this.run(state, channel, archivePath, onFinished);
		return new DownloadHandle(state, channel, done, archivePath);
	}

	private async run(
		state: ProgressState,
		channel: BoundedChannel<ProgressValue>,
		archivePath: string,
		onFinished: CompletionCallback | undefined,
	): Promise<void> {
		try {
			await this.transfer(state, channel, archivePath);

			if (process.env.TYPKG_DEBUG) {
				console.log(
					`[download] ${this.asset.name}: ${state.bytesReceived} bytes, extracting to ${this.destDir}`,
				);
			}

			await extractArchive(
				detectFormat(this.asset.name),
				archivePath,
				this.destDir,
			);

			if (onFinished) {
				await onFinished();
			}
		} catch (error) {
			state.error = toError(error);
			if (process.env.TYPKG_DEBUG) {
				console.log(
					`[download] ${this.asset.name} failed: ${state.error.message}`,
				);
			}
		} finally {
			await this.runCleanup();
			channel.close();
		}
	}

	private async runCleanup(): Promise<void> {
		if (!this.options.cleanup) {
			return;
		}
		try {
			await this.options.cleanup();
		} catch (error) {
			console.warn(
				`Warning: cleanup after downloading ${this.asset.name} failed: ${toError(error).message}`,
			);
		}
	}

	private async request(): Promise<Response> {
		const fetchImpl = this.options.fetch ?? fetch;
		const timeoutMs = this.options.timeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS;

		try {
			return await fetchImpl(this.asset.downloadURL, {
				headers: { "User-Agent": USER_AGENT, ...this.asset.headers },
				redirect: "follow",
				signal: AbortSignal.timeout(timeoutMs),
			});
		} catch (error) {
			throw new NetworkError(
				`Failed to download ${this.asset.name}: ${describeFailure(error)}`,
			);
		}
	}

	private async transfer(
		state: ProgressState,
		channel: BoundedChannel<ProgressValue>,
		archivePath: string,
	): Promise<void> {
		const response = await this.request();

		if (!response.ok) {
			throw new NetworkError(
				`Failed to download ${this.asset.name}: HTTP ${response.status}`,
				response.status,
			);
		}

		if (state.total === null) {
			const length = Number(response.headers.get("content-length"));
			if (Number.isFinite(length) && length > 0) {
				state.total = length;
			}
		}

		await mkdir(this.destDir, { recursive: true });
		const file = await open(archivePath, "w");
		const reader = response.body?.getReader();
		let drained = false;

		try {
			for (;;) {
				if (!reader) {
					drained = true;
					break;
				}
				const chunk = await reader.read().catch((error: unknown) => {
					throw new NetworkError(
						`Failed to download ${this.asset.name}: ${describeFailure(error)}`,
					);
				});
				if (chunk.done) {
					drained = true;
					break;
				}

				let offset = 0;
				while (offset < chunk.value.byteLength) {
					const { bytesWritten } = await file.write(
						chunk.value,
						offset,
						chunk.value.byteLength - offset,
					);
					offset += bytesWritten;
				}

				state.bytesReceived += offset;
				await channel.push(
					state.total === null ? null : state.bytesReceived / state.total,
				);
			}
		} finally {
			if (reader && !drained) {
				// Release the connection
				await reader.cancel().catch((error: unknown) => {
					if (process.env.TYPKG_DEBUG) {
						console.log(
							`[download] cancelling ${this.asset.name} failed: ${describeFailure(error)}`,
						);
					}
				});
			}
			await file.close();
		}

		if (state.total !== null && state.bytesReceived !== state.total) {
			throw new SizeMismatchError(state.total, state.bytesReceived);
		}
	}
}
