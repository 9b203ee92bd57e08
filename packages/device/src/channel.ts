/**
 * Bounded single-producer/single-consumer channel.
 *
 * Carries received ISO-TP payloads from a connection's receive task to the
 * protocol caller. Items are delivered in the order they were pushed; a
 * waiting consumer is handed the next item directly instead of it being
 * queued.
 *
 * Both sides wait through promises that can be cancelled with an
 * AbortSignal, which is how a closing connection releases a blocked
 * producer or consumer.
 */

interface PendingPop<T> {
	finish(item: T | null): void;
}

interface PendingPush {
	admit(): void;
}

export class FrameChannel<T = Uint8Array> {
	readonly capacity: number;

	private readonly items: T[] = [];
	private consumer: PendingPop<T> | null = null;
	private producer: PendingPush | null = null;

	/**
	 * @param capacity - Maximum number of queued items before push() waits
	 */
	constructor(capacity = 256) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(
				`Channel capacity must be a positive integer (got ${capacity})`,
			);
		}
		this.capacity = capacity;
	}

	/** Number of queued items */
	get size(): number {
		return this.items.length;
	}

	/**
	 * Enqueue an item, waiting for space while the channel is full.
	 *
	 * @returns true once the item is queued or handed to the consumer,
	 *          false if the signal aborted first (the item is dropped)
	 */
	push(item: T, signal?: AbortSignal): Promise<boolean> {
		if (signal?.aborted) {
			return Promise.resolve(false);
		}

		const consumer = this.consumer;
		if (consumer) {
			consumer.finish(item);
			return Promise.resolve(true);
		}

		if (this.items.length < this.capacity) {
			this.items.push(item);
			return Promise.resolve(true);
		}

		if (this.producer) {
			return Promise.reject(
				new Error("FrameChannel already has a producer waiting for space"),
			);
		}

		return new Promise<boolean>((resolve) => {
			const onAbort = (): void => {
				if (this.producer === pending) {
					this.producer = null;
				}
				resolve(false);
			};
			const pending: PendingPush = {
				admit: () => {
					signal?.removeEventListener("abort", onAbort);
					this.producer = null;
					this.items.push(item);
					resolve(true);
				},
			};
			this.producer = pending;
			signal?.addEventListener("abort", onAbort, { once: true });
		});
	}

	/**
	 * Dequeue the next item, waiting up to timeoutMs for one to arrive.
	 *
	 * @returns The item, or null when the wait expired or the signal aborted
	 */
	pop(timeoutMs: number, signal?: AbortSignal): Promise<T | null> {
		if (this.items.length > 0) {
			return Promise.resolve(this.shift());
		}

		if (this.consumer) {
			return Promise.reject(
				new Error("FrameChannel already has a consumer waiting"),
			);
		}

		if (signal?.aborted || timeoutMs <= 0) {
			return Promise.resolve(null);
		}

		return new Promise<T | null>((resolve) => {
			const onAbort = (): void => pending.finish(null);
			const timer = setTimeout(() => pending.finish(null), timeoutMs);
			const pending: PendingPop<T> = {
				finish: (item) => {
					clearTimeout(timer);
					signal?.removeEventListener("abort", onAbort);
					if (this.consumer === pending) {
						this.consumer = null;
					}
					resolve(item);
				},
			};
			this.consumer = pending;
			signal?.addEventListener("abort", onAbort, { once: true });
		});
	}

	/**
	 * Remove every queued item without waiting.
	 *
	 * @returns The removed items, oldest first
	 */
	drain(): T[] {
		const drained = this.items.splice(0, this.items.length);
		this.producer?.admit();
		return drained;
	}

	private shift(): T | null {
		const item = this.items.shift();
		// A producer blocked on a full channel now has room
		this.producer?.admit();
		return item === undefined ? null : item;
	}
}
