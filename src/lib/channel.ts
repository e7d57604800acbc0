/**
 * Bounded async channel used to report download progress.
 *
 * The producer awaits `push` and is suspended while the buffer is full;
 * consumers drain it with `for await`. The iteration ends once the
 * channel is closed and the remaining buffered values have been read.
 */

/** Default buffer size for progress channels */
export const DEFAULT_CHANNEL_CAPACITY = 5;

type Receiver<T> = (result: IteratorResult<T, undefined>) => void;

export class BoundedChannel<T> implements AsyncIterable<T> {
	private readonly buffer: T[] = [];
	private readonly receivers: Receiver<T>[] = [];
	private readonly blockedSenders: Array<() => void> = [];
	private isClosed = false;

	constructor(readonly capacity: number = DEFAULT_CHANNEL_CAPACITY) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(
				`Channel capacity must be a positive integer, got ${capacity}`,
			);
		}
	}

	get closed(): boolean {
		return this.isClosed;
	}

	/** Number of values waiting to be read */
	get size(): number {
		return this.buffer.length;
	}

	/**
	 * Send a value. Resolves once the value has been buffered or handed to a
	 * waiting reader; stays pending while the buffer is full.
	 *
	 * @returns false if the channel was closed before the value could be sent
	 */
	async push(value: T): Promise<boolean> {
		while (!this.isClosed) {
			const receiver = this.receivers.shift();
			if (receiver) {
				receiver({ value, done: false });
				return true;
			}

			if (this.buffer.length < this.capacity) {
				this.buffer.push(value);
				return true;
			}

			await new Promise<void>((resolve) => {
				this.blockedSenders.push(resolve);
			});
		}
		return false;
	}

	/**
	 * Close the channel. Pending readers finish, blocked senders are released.
	 *
	 * @returns true on the first call, false on every later call
	 */
	close(): boolean {
		if (this.isClosed) {
			return false;
		}
		this.isClosed = true;

		for (const receiver of this.receivers.splice(0)) {
			receiver({ value: undefined, done: true });
		}
		for (const release of this.blockedSenders.splice(0)) {
			release();
		}
		return true;
	}

	/**
	 * Read the next value, waiting while the channel is empty and open.
	 */
	next(): Promise<IteratorResult<T, undefined>> {
		if (this.buffer.length > 0) {
			const value = this.buffer[0];
			this.buffer.shift();
			this.blockedSenders.shift()?.();
			return Promise.resolve({ value, done: false });
		}

		if (this.isClosed) {
			return Promise.resolve({ value: undefined, done: true });
		}

		return new Promise((resolve) => {
			this.receivers.push(resolve);
		});
	}

	[Symbol.asyncIterator](): AsyncIterator<T, undefined> {
		return { next: () => this.next() };
	}
}
