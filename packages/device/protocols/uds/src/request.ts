import { isByte } from "@udslink/core";
import { ConfigurationError } from "./errors.js";
import type { ServiceDescriptor, ServiceRegistry } from "./services.js";
import { parseServiceDescriptor } from "./services.js";

// Ref: ISO 14229-1 §8.2.2: suppressPosRspMsgIndicationBit
const SUPPRESS_POSITIVE_RESPONSE_BIT = 0x80;

export interface UdsRequestInit {
	service?: ServiceDescriptor;
	subfunction?: number;
	suppressPositiveResponse?: boolean;
	data?: Uint8Array;
}

/**
 * A client → server diagnostic request.
 *
 * Wire layout: `[requestId][subfunction | 0x80 if suppressed]?[data...]`.
 * The subfunction byte is only present for services that use one; frame
 * boundaries come from the transport, so there is no length field.
 */
export class UdsRequest {
	service: ServiceDescriptor | undefined;
	subfunction: number | undefined;
	suppressPositiveResponse: boolean;
	data: Uint8Array | undefined;

	constructor(init: UdsRequestInit = {}) {
		this.service = init.service;
		this.subfunction = init.subfunction;
		this.suppressPositiveResponse = init.suppressPositiveResponse ?? false;
		this.data = init.data;
	}

	/**
	 * Serialize the request.
	 *
	 * With a registry, the service must be one of its own descriptors.
	 *
	 * @throws ConfigurationError if no valid service is set, or the service
	 *         uses a subfunction and `subfunction` is not a byte
	 */
	getPayload(registry?: ServiceRegistry): Uint8Array {
		if (this.service === undefined) {
			throw new ConfigurationError(
				"Cannot generate a payload: no service is set",
			);
		}
		if (registry && !registry.has(this.service)) {
			throw new ConfigurationError(
				`Cannot generate a payload: ${this.service.name} is not registered in the given registry`,
			);
		}
		const service = parseServiceDescriptor(this.service);
		const subfunction = this.subfunction;

		const header: number[] = [service.requestId];
		if (service.usesSubfunction) {
			if (!isByte(subfunction)) {
				throw new ConfigurationError(
					`Cannot generate a payload: ${service.name} needs a subfunction byte (got ${String(subfunction)})`,
				);
			}
			header.push(
				this.suppressPositiveResponse
					? subfunction | SUPPRESS_POSITIVE_RESPONSE_BIT
					: subfunction,
			);
		}

		const data = this.data ?? new Uint8Array(0);
		const payload = new Uint8Array(header.length + data.length);
		payload.set(header, 0);
		payload.set(data, header.length);
		return payload;
	}

	/** Serialized length, or 0 if the request cannot be serialized */
	get byteLength(): number {
		try {
			return this.getPayload().length;
		} catch (error) {
			if (error instanceof ConfigurationError) {
				return 0;
			}
			throw error;
		}
	}

	toString(): string {
		const parts = [`[${this.service?.name ?? "UnknownService"}]`];
		if (this.service?.usesSubfunction && this.subfunction !== undefined) {
			parts.push(`(subfunction=${this.subfunction})`);
		}
		parts.push(`- ${this.data?.length ?? 0} data bytes`);
		if (this.suppressPositiveResponse) {
			parts.push("[SuppressPosResponse]");
		}
		return `<Request: ${parts.join(" ")}>`;
	}

	/**
	 * Rebuild a request from a received payload (server side).
	 *
	 * Never throws: an empty payload or an unknown first byte yields a request
	 * without a service and nothing else parsed.
	 */
	static fromPayload(payload: Uint8Array, registry: ServiceRegistry): UdsRequest {
		const request = new UdsRequest();
		const requestId = payload[0];
		if (requestId === undefined) {
			return request;
		}

		const service = registry.fromRequestId(requestId);
		if (service === undefined) {
			return request;
		}
		request.service = service;

		let dataStart = 1;
		if (service.usesSubfunction) {
			const subfunction = payload[1];
			if (subfunction !== undefined) {
				request.subfunction = subfunction & 0x7f;
				request.suppressPositiveResponse =
					(subfunction & SUPPRESS_POSITIVE_RESPONSE_BIT) !== 0;
			}
			dataStart = 2;
		}

		if (payload.length > dataStart) {
			request.data = payload.slice(dataStart);
		}
		return request;
	}
}
