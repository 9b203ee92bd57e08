import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/errors.js";
import { UdsResponse } from "../src/response.js";
import { isNegativeResponseCode, ResponseCode } from "../src/response-code.js";
import type { ServiceDescriptor } from "../src/services.js";
import { createStandardServiceRegistry } from "../src/services.js";

// ── Helpers ──────────────────────────────────────────────────────────────────

const registry = createStandardServiceRegistry();

function service(requestId: number): ServiceDescriptor {
	const descriptor = registry.fromRequestId(requestId);
	if (!descriptor) {
		throw new Error(`No standard service 0x${requestId.toString(16)}`);
	}
	return descriptor;
}

function parse(...bytes: number[]): UdsResponse {
	return UdsResponse.fromPayload(new Uint8Array(bytes), registry);
}

const readDataByIdentifier = service(0x22);
const clearDiagnosticInformation = service(0x14);
const testerPresent = service(0x3e);

// ── Construction ─────────────────────────────────────────────────────────────

describe("new UdsResponse()", () => {
	it("builds a valid positive response", () => {
		const response = new UdsResponse({
			service: readDataByIdentifier,
			code: ResponseCode.PositiveResponse,
			data: new Uint8Array([0xf1, 0x90, 0x41]),
		});

		expect(response.valid).toBe(true);
		expect(response.positive).toBe(true);
		expect(response.codeName).toBe("PositiveResponse");
		expect(response.getPayload()).toEqual(
			new Uint8Array([0x62, 0xf1, 0x90, 0x41]),
		);
	});

	it("builds a negative response without data", () => {
		const response = new UdsResponse({
			service: readDataByIdentifier,
			code: ResponseCode.RequestOutOfRange,
		});

		expect(response.positive).toBe(false);
		expect(response.codeName).toBe("RequestOutOfRange");
		expect(response.getPayload()).toEqual(new Uint8Array([0x62, 0x7f, 0x31]));
	});

	it("drops data from a negative response payload", () => {
		const response = new UdsResponse({
			service: readDataByIdentifier,
			code: ResponseCode.ConditionsNotCorrect,
			data: new Uint8Array([0x01]),
		});
		expect(response.getPayload()).toEqual(new Uint8Array([0x62, 0x7f, 0x22]));
	});

	it("serializes a service without response data as its response ID", () => {
		const response = new UdsResponse({
			service: clearDiagnosticInformation,
			code: ResponseCode.PositiveResponse,
		});
		expect(response.getPayload()).toEqual(new Uint8Array([0x54]));
	});

	it("rejects data for a service without response data", () => {
		expect(
			() =>
				new UdsResponse({
					service: clearDiagnosticInformation,
					code: 0,
					data: new Uint8Array([0x01]),
				}),
		).toThrow("ClearDiagnosticInformation does not carry data in its response");
	});

	it("rejects a code that is not a byte", () => {
		expect(
			() => new UdsResponse({ service: testerPresent, code: 0x100 }),
		).toThrow("Response code must be an integer between 0 and 0xFF (got 256)");
	});

	it("is not valid until service and code are set", () => {
		const response = new UdsResponse({ service: testerPresent });
		expect(response.valid).toBe(false);
		expect(response.byteLength).toBe(0);
	});

	// Unregistered codes are not negative, so they build a positive response
	it("treats an unregistered code as positive", () => {
		const response = new UdsResponse({ service: testerPresent, code: 0xaa });
		expect(response.positive).toBe(true);
		expect(response.codeName).toBe("170");
	});
});

describe("UdsResponse.getPayload()", () => {
	it("throws without a service", () => {
		expect(() => new UdsResponse({ code: 0 }).getPayload()).toThrow(
			"Cannot make a payload from the response: no service is set",
		);
	});

	it("throws without a code", () => {
		expect(() =>
			new UdsResponse({ service: testerPresent }).getPayload(),
		).toThrow("Cannot make a payload from the response: code undefined is not a byte");
	});

	it("throws ConfigurationError for a malformed service descriptor", () => {
		const response = new UdsResponse({
			service: { ...testerPresent, name: "" },
			code: 0,
		});
		expect(() => response.getPayload()).toThrow(ConfigurationError);
	});

	it("accepts a service registered in the given registry", () => {
		const response = new UdsResponse({
			service: testerPresent,
			code: ResponseCode.PositiveResponse,
		});
		expect(response.getPayload(registry)).toEqual(new Uint8Array([0x7e]));
	});

	it("rejects a service from another registry", () => {
		const response = new UdsResponse({
			service: testerPresent,
			code: ResponseCode.PositiveResponse,
		});
		expect(() => response.getPayload(createStandardServiceRegistry())).toThrow(
			"Cannot make a payload from the response: TesterPresent is not registered in the given registry",
		);
	});
});

// ── Parsing ──────────────────────────────────────────────────────────────────

describe("UdsResponse.fromPayload()", () => {
	it("parses a positive response with data", () => {
		const response = parse(0x62, 0x01, 0x02, 0x03);

		expect(response.valid).toBe(true);
		expect(response.positive).toBe(true);
		expect(response.service).toBe(readDataByIdentifier);
		expect(response.code).toBe(ResponseCode.PositiveResponse);
		expect(response.data).toEqual(new Uint8Array([0x01, 0x02, 0x03]));
	});

	it("parses a negative response in [0x7F][requestId][code] layout", () => {
		const response = parse(0x7f, 0x22, 0x31);

		expect(response.valid).toBe(true);
		expect(response.positive).toBe(false);
		expect(response.service).toBe(readDataByIdentifier);
		expect(response.code).toBe(ResponseCode.RequestOutOfRange);
		expect(response.codeName).toBe("RequestOutOfRange");
	});

	it("parses a negative response in [responseId][0x7F][code] layout", () => {
		const response = parse(0x62, 0x7f, 0x31);

		expect(response.valid).toBe(true);
		expect(response.positive).toBe(false);
		expect(response.service).toBe(readDataByIdentifier);
		expect(response.code).toBe(0x31);
	});

	it("flags a negative response without a code as incomplete", () => {
		const response = parse(0x7f, 0x22);

		expect(response.valid).toBe(false);
		expect(response.positive).toBe(false);
		expect(response.invalidReason).toBe("Incomplete negative response (7Fxx)");
		expect(response.service).toBe(readDataByIdentifier);
	});

	it("flags [responseId][0x7F] as incomplete", () => {
		const response = parse(0x62, 0x7f);
		expect(response.valid).toBe(false);
		expect(response.invalidReason).toBe("Incomplete negative response (7Fxx)");
	});

	it("keeps bytes after a negative code in data", () => {
		const response = parse(0x62, 0x7f, 0x31, 0xaa);
		expect(response.valid).toBe(true);
		expect(response.code).toBe(0x31);
		expect(response.data).toEqual(new Uint8Array([0xaa]));
	});

	it("keeps an unregistered code after the marker negative", () => {
		const response = parse(0x62, 0x7f, 0xaa);
		expect(response.valid).toBe(true);
		expect(response.positive).toBe(false);
		expect(response.codeName).toBe("170");
	});

	it("rejects an empty payload", () => {
		const response = parse();
		expect(response.valid).toBe(false);
		expect(response.invalidReason).toBe("Unknown service: payload is empty");
	});

	it("rejects an unknown response ID", () => {
		const response = parse(0xab, 0x01);
		expect(response.valid).toBe(false);
		expect(response.invalidReason).toBe(
			"Unknown service: 0xAB is not a registered response ID",
		);
	});

	it("rejects a lone response ID of a service that sends data", () => {
		const response = parse(0x62);
		expect(response.valid).toBe(false);
		expect(response.service).toBe(readDataByIdentifier);
		expect(response.invalidReason).toBe(
			"Payload too short: a ReadDataByIdentifier response carries data after the response ID",
		);
	});

	it("accepts a lone response ID of a service without response data", () => {
		const response = parse(0x54);
		expect(response.valid).toBe(true);
		expect(response.positive).toBe(true);
		expect(response.service).toBe(clearDiagnosticInformation);
		expect(response.data).toBeUndefined();
	});

	it("rejects a lone 0x7F marker", () => {
		expect(parse(0x7f).invalidReason).toBe(
			"Unknown service: no service ID after the 0x7F marker",
		);
	});

	it("rejects an unknown request ID after the 0x7F marker", () => {
		expect(parse(0x7f, 0xaa, 0x31).invalidReason).toBe(
			"Unknown service: 0xAA is not a registered request ID",
		);
	});

	it("round-trips a positive response for every standard service", () => {
		for (const descriptor of registry) {
			const original = new UdsResponse({
				service: descriptor,
				code: ResponseCode.PositiveResponse,
				data: descriptor.hasResponseData
					? new Uint8Array([0x01, 0x02])
					: undefined,
			});

			const parsed = UdsResponse.fromPayload(original.getPayload(), registry);

			expect(parsed.valid).toBe(true);
			expect(parsed.positive).toBe(true);
			expect(parsed.service).toBe(descriptor);
			expect(parsed.data).toEqual(original.data);
		}
	});

	it("round-trips every negative response code", () => {
		const codes = Object.values(ResponseCode).filter(isNegativeResponseCode);
		expect(codes.length).toBeGreaterThan(0);

		for (const code of codes) {
			const original = new UdsResponse({ service: testerPresent, code });
			const parsed = UdsResponse.fromPayload(original.getPayload(), registry);

			expect(parsed.valid).toBe(true);
			expect(parsed.positive).toBe(false);
			expect(parsed.service).toBe(testerPresent);
			expect(parsed.code).toBe(code);
		}
	});
});

// ── Formatting ───────────────────────────────────────────────────────────────

describe("UdsResponse.describe()", () => {
	it("describes a negative response", () => {
		expect(parse(0x62, 0x7f, 0x31).describe()).toBe(
			"Negative response for ReadDataByIdentifier: Request out of range (NRC 0x31)",
		);
	});

	it("describes a positive response", () => {
		expect(parse(0x62, 0x01, 0x02, 0x03).describe()).toBe(
			"Positive response for ReadDataByIdentifier (3 data bytes)",
		);
	});

	it("describes an invalid response", () => {
		expect(parse().describe()).toBe(
			"Invalid response: Unknown service: payload is empty",
		);
	});
});

describe("UdsResponse.toString()", () => {
	it("formats a positive response", () => {
		expect(parse(0x62, 0x01, 0x02, 0x03).toString()).toBe(
			"<PositiveResponse: [ReadDataByIdentifier] - 3 data bytes>",
		);
	});

	it("formats a negative response", () => {
		expect(parse(0x62, 0x7f, 0x31).toString()).toBe(
			"<NegativeResponse(RequestOutOfRange): [ReadDataByIdentifier] - 0 data bytes>",
		);
	});
});
