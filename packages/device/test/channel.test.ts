import { afterEach, describe, expect, it, vi } from "vitest";
import { FrameChannel } from "../src/channel.js";

const frame = (...bytes: number[]): Uint8Array => new Uint8Array(bytes);

describe("FrameChannel", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it("rejects a non-positive capacity", () => {
		expect(() => new FrameChannel(0)).toThrow(RangeError);
	});

	it("delivers items in push order", async () => {
		const channel = new FrameChannel();
		await channel.push(frame(1));
		await channel.push(frame(2));
		await channel.push(frame(3));

		expect(await channel.pop(10)).toEqual(frame(1));
		expect(await channel.pop(10)).toEqual(frame(2));
		expect(await channel.pop(10)).toEqual(frame(3));
	});

	it("hands an item directly to a waiting consumer", async () => {
		const channel = new FrameChannel();
		const pending = channel.pop(1000);

		expect(await channel.push(frame(0x62))).toBe(true);
		expect(await pending).toEqual(frame(0x62));
		expect(channel.size).toBe(0);
	});

	it("resolves null when the wait expires", async () => {
		vi.useFakeTimers();
		const channel = new FrameChannel();
		const pending = channel.pop(50);

		await vi.advanceTimersByTimeAsync(50);

		expect(await pending).toBeNull();
	});

	it("resolves null immediately for a zero timeout on an empty channel", async () => {
		const channel = new FrameChannel();
		expect(await channel.pop(0)).toBeNull();
	});

	it("resolves null when the consumer's signal aborts", async () => {
		const channel = new FrameChannel();
		const controller = new AbortController();
		const pending = channel.pop(10_000, controller.signal);

		controller.abort();

		expect(await pending).toBeNull();
	});

	it("rejects a second concurrent consumer", async () => {
		const channel = new FrameChannel();
		const controller = new AbortController();
		const first = channel.pop(10_000, controller.signal);

		await expect(channel.pop(10)).rejects.toThrow("already has a consumer");

		controller.abort();
		await first;
	});

	it("makes the producer wait while full and admits it after a pop", async () => {
		const channel = new FrameChannel(1);
		await channel.push(frame(1));

		let admitted = false;
		const blocked = channel.push(frame(2)).then((ok) => {
			admitted = ok;
		});
		await Promise.resolve();
		expect(admitted).toBe(false);
		expect(channel.size).toBe(1);

		expect(await channel.pop(10)).toEqual(frame(1));
		await blocked;

		expect(admitted).toBe(true);
		expect(await channel.pop(10)).toEqual(frame(2));
	});

	it("drops a blocked push when its signal aborts", async () => {
		const channel = new FrameChannel(1);
		await channel.push(frame(1));
		const controller = new AbortController();
		const blocked = channel.push(frame(2), controller.signal);

		controller.abort();

		expect(await blocked).toBe(false);
		expect(channel.drain()).toEqual([frame(1)]);
	});

	it("drains queued items without waiting", async () => {
		const channel = new FrameChannel();
		await channel.push(frame(1));
		await channel.push(frame(2));

		expect(channel.drain()).toEqual([frame(1), frame(2)]);
		expect(channel.size).toBe(0);
		expect(channel.drain()).toEqual([]);
	});
});
