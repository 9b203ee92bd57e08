/**
 * ISO-TP (ISO 15765-2) transports implementing the IsoTpSocket contract
 */

export {
	VirtualIsoTpBus,
	VirtualIsoTpSocket,
	type VirtualIsoTpSocketOptions,
} from "./virtual-bus.js";
