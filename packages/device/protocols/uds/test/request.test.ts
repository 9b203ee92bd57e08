import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../src/errors.js";
import { UdsRequest } from "../src/request.js";
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

const readDataByIdentifier = service(0x22);
const diagnosticSessionControl = service(0x10);
const testerPresent = service(0x3e);

// ── getPayload() ─────────────────────────────────────────────────────────────

describe("UdsRequest.getPayload()", () => {
	it("serializes a service without subfunction", () => {
		const request = new UdsRequest({
			service: readDataByIdentifier,
			data: new Uint8Array([0xf1, 0x90]),
		});
		expect(request.getPayload()).toEqual(new Uint8Array([0x22, 0xf1, 0x90]));
	});

	it("serializes the subfunction byte", () => {
		const request = new UdsRequest({
			service: diagnosticSessionControl,
			subfunction: 0x03,
		});
		expect(request.getPayload()).toEqual(new Uint8Array([0x10, 0x03]));
	});

	it("sets bit 7 of the subfunction when suppressing the positive response", () => {
		const request = new UdsRequest({
			service: testerPresent,
			subfunction: 0x00,
			suppressPositiveResponse: true,
		});
		expect(request.getPayload()).toEqual(new Uint8Array([0x3e, 0x80]));
	});

	it("ignores the subfunction of a service that does not use one", () => {
		const request = new UdsRequest({
			service: readDataByIdentifier,
			subfunction: 0x05,
			data: new Uint8Array([0xf1, 0x90]),
		});
		expect(request.getPayload()).toEqual(new Uint8Array([0x22, 0xf1, 0x90]));
	});

	it("throws without a service", () => {
		expect(() => new UdsRequest().getPayload()).toThrow(
			"Cannot generate a payload: no service is set",
		);
	});

	it("throws when a required subfunction is missing", () => {
		const request = new UdsRequest({ service: diagnosticSessionControl });
		expect(() => request.getPayload()).toThrow(
			"Cannot generate a payload: DiagnosticSessionControl needs a subfunction byte (got undefined)",
		);
	});

	it("throws when the subfunction is not a byte", () => {
		const request = new UdsRequest({
			service: diagnosticSessionControl,
			subfunction: 0x100,
		});
		expect(() => request.getPayload()).toThrow(ConfigurationError);
	});

	it("throws for a malformed service descriptor", () => {
		const request = new UdsRequest({
			service: { ...readDataByIdentifier, requestId: 300 },
		});
		expect(() => request.getPayload()).toThrow(
			"Not a valid service descriptor (invalid: requestId)",
		);
	});

	it("accepts a service registered in the given registry", () => {
		const request = new UdsRequest({
			service: readDataByIdentifier,
			data: new Uint8Array([0xf1, 0x90]),
		});
		expect(request.getPayload(registry)).toEqual(
			new Uint8Array([0x22, 0xf1, 0x90]),
		);
	});

	it("rejects a service from another registry", () => {
		const request = new UdsRequest({ service: readDataByIdentifier });
		expect(() => request.getPayload(createStandardServiceRegistry())).toThrow(
			"Cannot generate a payload: ReadDataByIdentifier is not registered in the given registry",
		);
	});
});

describe("UdsRequest.byteLength", () => {
	it("is the serialized length", () => {
		const request = new UdsRequest({
			service: diagnosticSessionControl,
			subfunction: 0x01,
			data: new Uint8Array([0xaa]),
		});
		expect(request.byteLength).toBe(3);
	});

	it("is 0 when the request cannot be serialized", () => {
		expect(new UdsRequest().byteLength).toBe(0);
	});
});

describe("UdsRequest.toString()", () => {
	it("describes the request", () => {
		const request = new UdsRequest({
			service: diagnosticSessionControl,
			subfunction: 3,
			suppressPositiveResponse: true,
		});
		expect(request.toString()).toBe(
			"<Request: [DiagnosticSessionControl] (subfunction=3) - 0 data bytes [SuppressPosResponse]>",
		);
	});

	it("omits the subfunction of a service that does not use one", () => {
		const request = new UdsRequest({
			service: readDataByIdentifier,
			data: new Uint8Array([0xf1, 0x90]),
		});
		expect(request.toString()).toBe(
			"<Request: [ReadDataByIdentifier] - 2 data bytes>",
		);
	});
});

// ── fromPayload() ────────────────────────────────────────────────────────────

describe("UdsRequest.fromPayload()", () => {
	it("splits subfunction and suppress flag", () => {
		const request = UdsRequest.fromPayload(
			new Uint8Array([0x10, 0x83]),
			registry,
		);
		expect(request.service).toBe(diagnosticSessionControl);
		expect(request.subfunction).toBe(0x03);
		expect(request.suppressPositiveResponse).toBe(true);
		expect(request.data).toBeUndefined();
	});

	it("reads data after the subfunction", () => {
		const request = UdsRequest.fromPayload(
			new Uint8Array([0x27, 0x01, 0xab]),
			registry,
		);
		expect(request.subfunction).toBe(0x01);
		expect(request.suppressPositiveResponse).toBe(false);
		expect(request.data).toEqual(new Uint8Array([0xab]));
	});

	it("reads data from byte 1 for services without subfunction", () => {
		const request = UdsRequest.fromPayload(
			new Uint8Array([0x22, 0xf1, 0x90]),
			registry,
		);
		expect(request.service).toBe(readDataByIdentifier);
		expect(request.subfunction).toBeUndefined();
		expect(request.data).toEqual(new Uint8Array([0xf1, 0x90]));
	});

	it("leaves the service unset for an empty payload", () => {
		expect(UdsRequest.fromPayload(new Uint8Array(0), registry).service).toBeUndefined();
	});

	it("leaves the service unset for an unknown request ID", () => {
		const request = UdsRequest.fromPayload(new Uint8Array([0xaa, 0x01]), registry);
		expect(request.service).toBeUndefined();
		expect(request.data).toBeUndefined();
	});

	it("round-trips a request for every standard service", () => {
		for (const descriptor of registry) {
			const original = new UdsRequest({
				service: descriptor,
				subfunction: descriptor.usesSubfunction ? 0x01 : undefined,
				suppressPositiveResponse: descriptor.usesSubfunction,
				data: new Uint8Array([0xaa, 0xbb]),
			});

			const parsed = UdsRequest.fromPayload(original.getPayload(), registry);

			expect(parsed.service).toBe(descriptor);
			expect(parsed.subfunction).toBe(original.subfunction);
			expect(parsed.suppressPositiveResponse).toBe(
				original.suppressPositiveResponse,
			);
			expect(parsed.data).toEqual(original.data);
			expect(parsed.getPayload()).toEqual(original.getPayload());
		}
	});
});
