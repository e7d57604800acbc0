import ora from "ora";
import type { DownloadHandle, ProgressValue } from "./downloader";

const UNITS = ["B", "KB", "MB", "GB"];

export function formatBytes(bytes: number): string {
	let value = bytes;
	let unit = 0;
	while (value >= 1024 && unit < UNITS.length - 1) {
		value /= 1024;
		unit++;
	}
	return unit === 0
		? `${value} ${UNITS[unit]}`
		: `${value.toFixed(1)} ${UNITS[unit]}`;
}

/**
 * Spinner text for one progress value: a percentage when the total is
 * known, otherwise the bytes received so far.
 */
export function formatProgress(
	label: string,
	value: ProgressValue,
	bytesReceived: number,
): string {
	if (value === null) {
		return `${label} ${formatBytes(bytesReceived)}`;
	}
	return `${label} ${Math.floor(value * 100)}%`;
}

/**
 * Render a download on a spinner until its progress channel closes.
 * The download's error, if any, is left for the caller to raise.
 */
export async function showProgress(
	label: string,
	handle: DownloadHandle,
): Promise<void> {
	const spinner = ora(label).start();

	for await (const value of handle) {
		spinner.text = formatProgress(label, value, handle.bytesReceived);
	}
	await handle.done;

	if (handle.error) {
		spinner.fail(`${label} failed`);
	} else {
		spinner.succeed(label);
	}
}
