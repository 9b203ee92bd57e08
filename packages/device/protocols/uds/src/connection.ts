import type { IsoTpSocket } from "@udslink/device";
import { FrameChannel } from "@udslink/device";
import {
	ConnectionNotOpenError,
	TimeoutError,
	UdsError,
} from "./errors.js";
import { UdsRequest } from "./request.js";
import { UdsResponse } from "./response.js";

export const DEFAULT_RECV_TIMEOUT_MS = 100;
export const DEFAULT_WAIT_FRAME_TIMEOUT_MS = 2000;
export const DEFAULT_RX_QUEUE_CAPACITY = 256;

export type ConnectionLogger = Pick<Console, "debug" | "warn" | "error">;

export interface ConnectionOptions {
	socket: IsoTpSocket;
	/** CAN interface name, e.g. "can0" */
	interface: string;
	/** Arbitration ID the tester receives on */
	rxid: number;
	/** Arbitration ID the tester transmits on */
	txid: number;
	/** How long each socket read waits before the receiver polls again */
	recvTimeoutMs?: number;
	/** Default wait of waitFrame() */
	waitFrameTimeoutMs?: number;
	rxQueueCapacity?: number;
	logger?: ConnectionLogger;
}

export interface WaitFrameOptions {
	timeoutMs?: number;
	/**
	 * Throw TimeoutError on expiry, and ConnectionNotOpenError if the
	 * connection was never opened, instead of returning null
	 */
	throwOnTimeout?: boolean;
}

/**
 * A UDS connection over an ISO-TP socket.
 *
 * open() starts a background receiver that reads the socket and queues
 * every payload in a bounded channel; waitFrame() takes them out in order.
 * A transport error stops the receiver for good: it is logged, kept in
 * `receiveError`, and isOpen() turns false. waitFrame() never sees it.
 *
 * @example
 * const connection = new Connection({ socket, interface: "can0", rxid: 0x7e8, txid: 0x7e0 });
 * await withConnection(connection, async (conn) => {
 *   await conn.send(new Uint8Array([0x22, 0xf1, 0x90]));
 *   const payload = await conn.waitFrame({ timeoutMs: 1000 });
 * });
 */
export class Connection {
	readonly name: string;
	readonly interface: string;
	readonly rxid: number;
	readonly txid: number;
	readonly recvTimeoutMs: number;
	readonly waitFrameTimeoutMs: number;
	readonly rxQueueCapacity: number;

	/** The error that stopped the receiver, if any */
	receiveError: unknown = undefined;

	private readonly socket: IsoTpSocket;
	private readonly logger: ConnectionLogger;
	private channel: FrameChannel;
	private abortController: AbortController | null = null;
	private receiver: Promise<void> | null = null;
	private opened = false;
	private exitRequested = false;

	constructor(options: ConnectionOptions) {
		this.socket = options.socket;
		this.interface = options.interface;
		this.rxid = options.rxid;
		this.txid = options.txid;
		this.recvTimeoutMs = options.recvTimeoutMs ?? DEFAULT_RECV_TIMEOUT_MS;
		this.waitFrameTimeoutMs =
			options.waitFrameTimeoutMs ?? DEFAULT_WAIT_FRAME_TIMEOUT_MS;
		this.rxQueueCapacity = options.rxQueueCapacity ?? DEFAULT_RX_QUEUE_CAPACITY;
		this.logger = options.logger ?? console;
		this.name = `IsoTPSocket[${this.interface}] - 0x${hex(this.rxid)}/0x${hex(this.txid)}`;
		this.channel = new FrameChannel(this.rxQueueCapacity);
	}

	/**
	 * Bind the socket and start the receiver.
	 *
	 * A connection whose receiver stopped on a transport error is closed
	 * first, then opened again.
	 *
	 * @throws UdsError if the connection is already open; transport errors
	 *         from bind() propagate unchanged
	 */
	async open(): Promise<this> {
		if (this.isOpen()) {
			throw new UdsError(`${this.name} is already open`);
		}
		if (this.opened) {
			await this.close();
		}
		await this.socket.bind(this.interface, {
			rxid: this.rxid,
			txid: this.txid,
		});

		this.exitRequested = false;
		this.receiveError = undefined;
		this.abortController = new AbortController();
		this.channel = new FrameChannel(this.rxQueueCapacity);
		this.opened = true;
		this.receiver = this.receiveLoop(this.abortController.signal);
		this.logger.debug(`[UDS] Connection opened: ${this.name}`);
		return this;
	}

	/**
	 * Stop the receiver and close the socket. Safe to call more than once.
	 *
	 * Resolves once the receiver has returned from its current read.
	 */
	async close(): Promise<void> {
		this.exitRequested = true;
		this.abortController?.abort();
		await this.socket.close();
		this.opened = false;

		const receiver = this.receiver;
		this.receiver = null;
		if (receiver) {
			await receiver;
			this.logger.debug(`[UDS] Connection closed: ${this.name}`);
		}
	}

	/** True while the socket is bound and the receiver is running */
	isOpen(): boolean {
		return this.socket.bound && !this.exitRequested;
	}

	/** Transmit a request, a response or a raw payload */
	async send(payload: UdsRequest | UdsResponse | Uint8Array): Promise<void> {
		const bytes =
			payload instanceof UdsRequest || payload instanceof UdsResponse
				? payload.getPayload()
				: payload;
		await this.socket.send(bytes);
	}

	/**
	 * Take the next received payload, waiting up to timeoutMs (the
	 * connection's waitFrameTimeoutMs by default).
	 *
	 * @returns The payload, or null on timeout (or when not opened) unless
	 *          throwOnTimeout is set
	 * @throws ConnectionNotOpenError or TimeoutError, only with throwOnTimeout
	 */
	async waitFrame(options: WaitFrameOptions = {}): Promise<Uint8Array | null> {
		const timeoutMs = options.timeoutMs ?? this.waitFrameTimeoutMs;
		const strict = options.throwOnTimeout ?? false;

		if (!this.opened) {
			if (strict) {
				throw new ConnectionNotOpenError(
					`Cannot wait for a frame: ${this.name} is not open`,
				);
			}
			return null;
		}

		const frame = await this.channel.pop(timeoutMs);
		if (frame === null && strict) {
			throw new TimeoutError(
				`Did not receive a frame within ${timeoutMs} ms on ${this.name}`,
			);
		}
		return frame;
	}

	/**
	 * Discard every queued payload without waiting.
	 *
	 * @returns The number of payloads discarded
	 */
	emptyRxQueue(): number {
		const count = this.channel.drain().length;
		if (count > 0) {
			this.logger.debug(`[UDS] Discarded ${count} queued frame(s) on ${this.name}`);
		}
		return count;
	}

	toString(): string {
		return this.name;
	}

	private async receiveLoop(signal: AbortSignal): Promise<void> {
		while (!this.exitRequested) {
			let frame: Uint8Array | null;
			try {
				frame = await this.socket.recv(this.recvTimeoutMs);
			} catch (error) {
				if (error instanceof TimeoutError) {
					continue;
				}
				// A read released by close() is not a receive error
				if (!this.exitRequested) {
					this.exitRequested = true;
					this.receiveError = error;
					this.logger.error(
						`[UDS] Receiver stopped on ${this.name}:`,
						error,
					);
				}
				return;
			}

			if (frame !== null) {
				await this.channel.push(frame, signal);
			}
		}
	}
}

/**
 * Run fn with the connection open, closing it afterwards even if fn throws.
 * A connection that is already open is used as is.
 */
export async function withConnection<T>(
	connection: Connection,
	fn: (connection: Connection) => Promise<T> | T,
): Promise<T> {
	if (!connection.isOpen()) {
		await connection.open();
	}
	try {
		return await fn(connection);
	} finally {
		await connection.close();
	}
}

function hex(id: number): string {
	return id.toString(16).toUpperCase();
}
