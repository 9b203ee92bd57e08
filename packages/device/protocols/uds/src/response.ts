import { byteToHex, isByte } from "@udslink/core";
import { ConfigurationError } from "./errors.js";
import {
	describeResponseCode,
	getResponseCodeName,
	isNegativeResponseCode,
	ResponseCode,
} from "./response-code.js";
import type { ServiceDescriptor, ServiceRegistry } from "./services.js";
import { NEGATIVE_RESPONSE_MARKER, parseServiceDescriptor } from "./services.js";

export interface UdsResponseInit {
	service?: ServiceDescriptor;
	code?: number;
	data?: Uint8Array;
}

/**
 * A server → client diagnostic response.
 *
 * Wire layouts:
 * - positive: `[responseId][data...]?` (data only for services that declare it)
 * - negative: `[responseId][0x7F][code]`
 *
 * Parsed responses are never exceptions: check `valid` before trusting any
 * other field, and read `invalidReason` when it is false.
 */
export class UdsResponse {
	service: ServiceDescriptor | undefined;
	positive = false;
	/** Response code; PositiveResponse (0x00) for positive responses */
	code: number | undefined;
	codeName = "";
	data: Uint8Array | undefined;
	valid = false;
	invalidReason = "Response not initialized";

	/**
	 * Build a response to send (server side).
	 *
	 * @throws ConfigurationError if data is given for a service that declares
	 *         no response data, or code is not an integer in 0..0xFF
	 */
	constructor(init: UdsResponseInit = {}) {
		this.service = init.service;

		if (init.data !== undefined) {
			if (init.service !== undefined && !init.service.hasResponseData) {
				throw new ConfigurationError(
					`${init.service.name} does not carry data in its response`,
				);
			}
			this.data = init.data;
		}

		if (init.code !== undefined) {
			if (!isByte(init.code)) {
				throw new ConfigurationError(
					`Response code must be an integer between 0 and 0xFF (got ${init.code})`,
				);
			}
			this.setCode(init.code, !isNegativeResponseCode(init.code));
		}

		if (this.service !== undefined && this.code !== undefined) {
			this.markValid();
		}
	}

	/**
	 * Serialize the response (server side).
	 *
	 * Negative responses never carry data, whatever the service declares.
	 * With a registry, the service must be one of its own descriptors.
	 *
	 * @throws ConfigurationError unless service is a valid descriptor and code
	 *         is a byte
	 */
	getPayload(registry?: ServiceRegistry): Uint8Array {
		if (this.service === undefined) {
			throw new ConfigurationError(
				"Cannot make a payload from the response: no service is set",
			);
		}
		if (registry && !registry.has(this.service)) {
			throw new ConfigurationError(
				`Cannot make a payload from the response: ${this.service.name} is not registered in the given registry`,
			);
		}
		const service = parseServiceDescriptor(this.service);
		const code = this.code;
		if (!isByte(code)) {
			throw new ConfigurationError(
				`Cannot make a payload from the response: code ${String(code)} is not a byte`,
			);
		}

		if (!this.positive) {
			return new Uint8Array([
				service.responseId,
				NEGATIVE_RESPONSE_MARKER,
				code,
			]);
		}

		const data =
			service.hasResponseData && this.data !== undefined
				? this.data
				: new Uint8Array(0);
		const payload = new Uint8Array(1 + data.length);
		payload[0] = service.responseId;
		payload.set(data, 1);
		return payload;
	}

	/** Serialized length, or 0 if the response cannot be serialized */
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

	/** One-line, human-readable account of the response */
	describe(): string {
		if (!this.valid) {
			return `Invalid response: ${this.invalidReason}`;
		}
		const name = this.service?.name ?? "UnknownService";
		if (!this.positive && this.code !== undefined) {
			return `Negative response for ${name}: ${describeResponseCode(this.code)}`;
		}
		return `Positive response for ${name} (${this.data?.length ?? 0} data bytes)`;
	}

	toString(): string {
		const kind = this.positive
			? getResponseCodeName(ResponseCode.PositiveResponse)
			: `NegativeResponse(${this.codeName})`;
		const name = this.service?.name ?? "UnknownService";
		return `<${kind}: [${name}] - ${this.data?.length ?? 0} data bytes>`;
	}

	/**
	 * Parse a received payload (client side). Never throws.
	 *
	 * Precedence:
	 * 1. empty payload or unknown response ID → invalid
	 * 2. one byte, service without response data → positive
	 * 3. one byte, service with response data → invalid (too short)
	 * 4. byte 1 is not 0x7F → positive, data from byte 1
	 * 5. byte 1 is 0x7F → negative, code at byte 2 (invalid if missing),
	 *    trailing bytes from byte 3 kept in `data`
	 *
	 * The ISO 14229 on-wire negative layout `[0x7F][requestId][code]` is
	 * accepted as well.
	 */
	static fromPayload(
		payload: Uint8Array,
		registry: ServiceRegistry,
	): UdsResponse {
		const response = new UdsResponse();
		const first = payload[0];

		if (first === undefined) {
			return response.markInvalid("Unknown service: payload is empty");
		}

		if (first === NEGATIVE_RESPONSE_MARKER) {
			return UdsResponse.parseIsoNegative(response, payload, registry);
		}

		const service = registry.fromResponseId(first);
		if (service === undefined) {
			return response.markInvalid(
				`Unknown service: ${byteToHex(first)} is not a registered response ID`,
			);
		}
		response.service = service;

		const second = payload[1];
		if (second === undefined) {
			if (service.hasResponseData) {
				return response.markInvalid(
					`Payload too short: a ${service.name} response carries data after the response ID`,
				);
			}
			response.setCode(ResponseCode.PositiveResponse, true);
			return response.markValid();
		}

		if (second !== NEGATIVE_RESPONSE_MARKER) {
			response.setCode(ResponseCode.PositiveResponse, true);
			response.data = payload.slice(1);
			return response.markValid();
		}

		return UdsResponse.parseNegativeTail(response, payload);
	}

	/** `[0x7F][requestId][code][...]` */
	private static parseIsoNegative(
		response: UdsResponse,
		payload: Uint8Array,
		registry: ServiceRegistry,
	): UdsResponse {
		const requestId = payload[1];
		if (requestId === undefined) {
			return response.markInvalid(
				"Unknown service: no service ID after the 0x7F marker",
			);
		}
		const service = registry.fromRequestId(requestId);
		if (service === undefined) {
			return response.markInvalid(
				`Unknown service: ${byteToHex(requestId)} is not a registered request ID`,
			);
		}
		response.service = service;
		return UdsResponse.parseNegativeTail(response, payload);
	}

	/** Bytes 0-1 identify the service and mark the response negative */
	private static parseNegativeTail(
		response: UdsResponse,
		payload: Uint8Array,
	): UdsResponse {
		response.positive = false;
		const code = payload[2];
		if (code === undefined) {
			return response.markInvalid("Incomplete negative response (7Fxx)");
		}
		response.setCode(code, false);
		// Tolerated even though a negative response should end at the code
		if (payload.length > 3) {
			response.data = payload.slice(3);
		}
		return response.markValid();
	}

	private setCode(code: number, positive: boolean): void {
		this.code = code;
		this.codeName = getResponseCodeName(code);
		this.positive = positive;
	}

	private markValid(): this {
		this.valid = true;
		this.invalidReason = "";
		return this;
	}

	private markInvalid(reason: string): this {
		this.valid = false;
		this.invalidReason = reason;
		return this;
	}
}
