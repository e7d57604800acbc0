import { describe, expect, it } from "vitest";
import { BoundedChannel } from "./channel";

describe("BoundedChannel", () => {
	it("should suspend the sender while the buffer is full", async () => {
		const channel = new BoundedChannel<number>(2);
		await channel.push(1);
		await channel.push(2);

		let thirdSent = false;
		const pending = channel.push(3).then(() => {
			thirdSent = true;
		});

		await Promise.resolve();
		await Promise.resolve();
		expect(thirdSent).toBe(false);
		expect(channel.size).toBe(2);

		expect(await channel.next()).toEqual({ value: 1, done: false });
		await pending;
		expect(thirdSent).toBe(true);
		expect(channel.size).toBe(2);
	});

	it("should deliver values in order and end after close", async () => {
		const channel = new BoundedChannel<number | null>();
		const received: Array<number | null> = [];

		const consumer = (async () => {
			for await (const value of channel) {
				received.push(value);
			}
		})();

		await channel.push(0.5);
		await channel.push(null);
		await channel.push(1);
		channel.close();
		await consumer;

		expect(received).toEqual([0.5, null, 1]);
	});

	it("should close only once", async () => {
		const channel = new BoundedChannel<number>();

		expect(channel.close()).toBe(true);
		expect(channel.close()).toBe(false);
		expect(channel.closed).toBe(true);
		expect(await channel.push(1)).toBe(false);
		expect(await channel.next()).toEqual({ value: undefined, done: true });
	});

	it("should release a blocked sender on close and keep buffered values", async () => {
		const channel = new BoundedChannel<number>(1);
		await channel.push(1);
		const blocked = channel.push(2);

		channel.close();

		await expect(blocked).resolves.toBe(false);
		expect(await channel.next()).toEqual({ value: 1, done: false });
		expect(await channel.next()).toEqual({ value: undefined, done: true });
	});

	it("should wake a waiting reader on close", async () => {
		const channel = new BoundedChannel<number>();
		const reading = channel.next();

		channel.close();

		await expect(reading).resolves.toEqual({ value: undefined, done: true });
	});

	it("should reject a non-positive capacity", () => {
		expect(() => new BoundedChannel<number>(0)).toThrow(RangeError);
	});
});
