/** CAN arbitration IDs an ISO-TP socket is bound to */
export interface IsoTpAddress {
	/** ID the socket receives on (ECU → tester) */
	rxid: number;
	/** ID the socket transmits on (tester → ECU) */
	txid: number;
}

/**
 * An ISO-TP (ISO 15765-2) socket.
 *
 * Segmentation and flow control happen below this interface; every payload
 * passed to send() or returned from recv() is one complete ISO-TP message.
 *
 * Implementations:
 * - VirtualIsoTpSocket: in-process bus (@udslink/device-transport-isotp)
 */
export interface IsoTpSocket {
	/** True while the socket is bound to an interface */
	readonly bound: boolean;

	/**
	 * Bind the socket to a CAN interface (e.g. "can0", "vcan0").
	 */
	bind(iface: string, address: IsoTpAddress): void | Promise<void>;

	/** Transmit one complete ISO-TP payload */
	send(payload: Uint8Array): Promise<void>;

	/**
	 * Wait up to timeoutMs for the next payload.
	 * Resolves null on timeout; rejects only on a transport failure.
	 */
	recv(timeoutMs: number): Promise<Uint8Array | null>;

	close(): void | Promise<void>;
}
