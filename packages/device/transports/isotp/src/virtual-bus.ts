/**
 * In-process ISO-TP bus.
 *
 * Sockets created from the same bus exchange complete ISO-TP payloads the
 * way two nodes on a virtual CAN interface would: a payload sent on
 * arbitration ID `txid` reaches every other socket bound to the same
 * interface whose `rxid` equals that ID. Segmentation is not modelled.
 *
 * Used as the transport stand-in for tests and for simulating an ECU next
 * to a tester without hardware.
 */

import type { IsoTpAddress, IsoTpSocket } from "@udslink/device";
import { FrameChannel } from "@udslink/device";

/** Largest 29-bit extended CAN identifier */
const MAX_ARBITRATION_ID = 0x1fffffff;

/** ISO-TP caps a message at 4095 bytes (classic addressing) */
const MAX_PAYLOAD_LENGTH = 4095;

export interface VirtualIsoTpSocketOptions {
	/** Receive queue depth before senders to this socket wait @default 64 */
	queueCapacity?: number;
}

export class VirtualIsoTpBus {
	private readonly sockets = new Set<VirtualIsoTpSocket>();

	/** Create a socket attached to this bus (unbound) */
	createSocket(options: VirtualIsoTpSocketOptions = {}): VirtualIsoTpSocket {
		return new VirtualIsoTpSocket(this, options);
	}

	/**
	 * Convenience for the common tester/ECU pair: two sockets bound to the
	 * same interface with mirrored IDs.
	 *
	 * @param iface - Interface name, e.g. "vcan0"
	 * @param tester - Address of the tester side; the ECU side is mirrored
	 */
	createPair(
		iface: string,
		tester: IsoTpAddress,
	): { tester: VirtualIsoTpSocket; ecu: VirtualIsoTpSocket } {
		const testerSocket = this.createSocket();
		const ecuSocket = this.createSocket();
		testerSocket.bind(iface, tester);
		ecuSocket.bind(iface, { rxid: tester.txid, txid: tester.rxid });
		return { tester: testerSocket, ecu: ecuSocket };
	}

	/** @internal */
	attach(socket: VirtualIsoTpSocket): void {
		this.sockets.add(socket);
	}

	/** @internal */
	detach(socket: VirtualIsoTpSocket): void {
		this.sockets.delete(socket);
	}

	/** @internal */
	async deliver(
		sender: VirtualIsoTpSocket,
		iface: string,
		arbitrationId: number,
		payload: Uint8Array,
	): Promise<void> {
		const receivers = Array.from(this.sockets).filter(
			(socket) =>
				socket !== sender && socket.accepts(iface, arbitrationId),
		);
		// Each receiver gets its own copy
		await Promise.all(
			receivers.map((socket) => socket.enqueue(payload.slice())),
		);
	}
}

/**
 * A socket on a {@link VirtualIsoTpBus}. Implements the IsoTpSocket contract.
 */
export class VirtualIsoTpSocket implements IsoTpSocket {
	private readonly bus: VirtualIsoTpBus;
	private readonly inbox: FrameChannel<Uint8Array>;
	private iface: string | null = null;
	private address: IsoTpAddress | null = null;
	private closeController = new AbortController();
	private fault: Error | null = null;

	constructor(bus: VirtualIsoTpBus, options: VirtualIsoTpSocketOptions = {}) {
		this.bus = bus;
		this.inbox = new FrameChannel(options.queueCapacity ?? 64);
	}

	get bound(): boolean {
		return this.iface !== null;
	}

	bind(iface: string, address: IsoTpAddress): void {
		if (this.bound) {
			throw new Error(`Socket is already bound to ${this.iface}`);
		}
		if (iface.length === 0) {
			throw new Error("Interface name cannot be empty");
		}
		for (const [label, id] of [
			["rxid", address.rxid],
			["txid", address.txid],
		] as const) {
			if (!Number.isInteger(id) || id < 0 || id > MAX_ARBITRATION_ID) {
				throw new Error(`Invalid ${label} 0x${id.toString(16)}`);
			}
		}

		this.iface = iface;
		this.address = { ...address };
		this.fault = null;
		this.closeController = new AbortController();
		this.bus.attach(this);
	}

	async send(payload: Uint8Array): Promise<void> {
		const { iface, address } = this.requireBound();
		if (payload.length === 0 || payload.length > MAX_PAYLOAD_LENGTH) {
			throw new Error(
				`ISO-TP payload must be 1-${MAX_PAYLOAD_LENGTH} bytes (got ${payload.length})`,
			);
		}
		await this.bus.deliver(this, iface, address.txid, payload);
	}

	async recv(timeoutMs: number): Promise<Uint8Array | null> {
		this.throwIfFaulted();
		this.requireBound();
		const payload = await this.inbox.pop(
			timeoutMs,
			this.closeController.signal,
		);
		// A fault injected while waiting surfaces on the pending read
		this.throwIfFaulted();
		return payload;
	}

	close(): void {
		if (!this.bound) {
			return;
		}
		this.bus.detach(this);
		this.iface = null;
		this.address = null;
		this.closeController.abort();
		this.inbox.drain();
	}

	/**
	 * Simulate a transport failure: the pending and every later recv()
	 * reject with the given error until the socket is bound again.
	 */
	fail(error: Error): void {
		this.fault = error;
		this.closeController.abort();
	}

	/** @internal */
	accepts(iface: string, arbitrationId: number): boolean {
		return this.iface === iface && this.address?.rxid === arbitrationId;
	}

	/** @internal */
	async enqueue(payload: Uint8Array): Promise<void> {
		await this.inbox.push(payload, this.closeController.signal);
	}

	private requireBound(): { iface: string; address: IsoTpAddress } {
		if (this.iface === null || this.address === null) {
			throw new Error("Socket is not bound");
		}
		return { iface: this.iface, address: this.address };
	}

	private throwIfFaulted(): void {
		if (this.fault) {
			throw this.fault;
		}
	}
}
