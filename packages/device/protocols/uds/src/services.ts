import { byteToHex } from "@udslink/core";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

// Ref: ISO 14229-1 §8.2: a positive response SID is the request SID + 0x40
export const RESPONSE_ID_OFFSET = 0x40;

// Ref: ISO 14229-1 §8.3: negative response SID
export const NEGATIVE_RESPONSE_MARKER = 0x7f;

const byte = z.number().int().min(0).max(0xff);

export const serviceDescriptorSchema = z.object({
	name: z.string().min(1),
	requestId: byte,
	responseId: byte,
	usesSubfunction: z.boolean(),
	hasResponseData: z.boolean(),
});

/**
 * Identity of a diagnostic service on the wire.
 * Registered once; frozen afterwards.
 */
export type ServiceDescriptor = Readonly<
	z.infer<typeof serviceDescriptorSchema>
>;

/** Input to {@link ServiceRegistry.register} */
export interface ServiceDefinition {
	name: string;
	requestId: number;
	/** @default requestId + 0x40 */
	responseId?: number;
	/** Whether byte 1 of a request is a subfunction @default false */
	usesSubfunction?: boolean;
	/** Whether a positive response carries bytes after the response ID @default true */
	hasResponseData?: boolean;
}

/**
 * Validate that a value is a well-formed service descriptor.
 *
 * @throws ConfigurationError listing the offending fields
 */
export function parseServiceDescriptor(value: unknown): ServiceDescriptor {
	const result = serviceDescriptorSchema.safeParse(value);
	if (!result.success) {
		const fields = result.error.issues
			.map((issue) => issue.path.join(".") || "(root)")
			.join(", ");
		throw new ConfigurationError(
			`Not a valid service descriptor (invalid: ${fields})`,
		);
	}
	return result.data;
}

/**
 * Maps request and response IDs to service descriptors.
 *
 * Passed explicitly to the framers, so a client and a simulated ECU, or two
 * protocol variants, can use different registries side by side.
 */
export class ServiceRegistry implements Iterable<ServiceDescriptor> {
	private readonly byRequestId = new Map<number, ServiceDescriptor>();
	private readonly byResponseId = new Map<number, ServiceDescriptor>();

	constructor(definitions: Iterable<ServiceDefinition> = []) {
		for (const definition of definitions) {
			this.register(definition);
		}
	}

	/**
	 * Register a service.
	 *
	 * @returns The frozen descriptor stored in the registry
	 * @throws ConfigurationError if an ID is not a byte, is the 0x7F
	 *         negative response marker, or is already registered
	 */
	register(definition: ServiceDefinition): ServiceDescriptor {
		const descriptor = parseServiceDescriptor({
			name: definition.name,
			requestId: definition.requestId,
			responseId:
				definition.responseId ?? definition.requestId + RESPONSE_ID_OFFSET,
			usesSubfunction: definition.usesSubfunction ?? false,
			hasResponseData: definition.hasResponseData ?? true,
		});

		if (
			descriptor.requestId === NEGATIVE_RESPONSE_MARKER ||
			descriptor.responseId === NEGATIVE_RESPONSE_MARKER
		) {
			throw new ConfigurationError(
				`Service ${descriptor.name} cannot use 0x7F, it is reserved for negative responses`,
			);
		}

		const requestClash = this.byRequestId.get(descriptor.requestId);
		if (requestClash) {
			throw new ConfigurationError(
				`Request ID ${byteToHex(descriptor.requestId)} of ${descriptor.name} is already used by ${requestClash.name}`,
			);
		}
		const responseClash = this.byResponseId.get(descriptor.responseId);
		if (responseClash) {
			throw new ConfigurationError(
				`Response ID ${byteToHex(descriptor.responseId)} of ${descriptor.name} is already used by ${responseClash.name}`,
			);
		}

		const frozen = Object.freeze(descriptor);
		this.byRequestId.set(frozen.requestId, frozen);
		this.byResponseId.set(frozen.responseId, frozen);
		return frozen;
	}

	fromRequestId(requestId: number): ServiceDescriptor | undefined {
		return this.byRequestId.get(requestId);
	}

	fromResponseId(responseId: number): ServiceDescriptor | undefined {
		return this.byResponseId.get(responseId);
	}

	/** True when this exact descriptor was registered here */
	has(descriptor: ServiceDescriptor): boolean {
		return this.byRequestId.get(descriptor.requestId) === descriptor;
	}

	get size(): number {
		return this.byRequestId.size;
	}

	[Symbol.iterator](): Iterator<ServiceDescriptor> {
		return this.byRequestId.values();
	}
}

/**
 * Request SIDs of the ISO 14229-1 services.
 * Ref: ISO 14229-1:2020 Table 23
 */
export const StandardServices = {
	DiagnosticSessionControl: 0x10,
	EcuReset: 0x11,
	ClearDiagnosticInformation: 0x14,
	ReadDtcInformation: 0x19,
	ReadDataByIdentifier: 0x22,
	ReadMemoryByAddress: 0x23,
	ReadScalingDataByIdentifier: 0x24,
	SecurityAccess: 0x27,
	CommunicationControl: 0x28,
	ReadDataByPeriodicIdentifier: 0x2a,
	DynamicallyDefineDataIdentifier: 0x2c,
	WriteDataByIdentifier: 0x2e,
	InputOutputControlByIdentifier: 0x2f,
	RoutineControl: 0x31,
	RequestDownload: 0x34,
	RequestUpload: 0x35,
	TransferData: 0x36,
	RequestTransferExit: 0x37,
	RequestFileTransfer: 0x38,
	WriteMemoryByAddress: 0x3d,
	TesterPresent: 0x3e,
	AccessTimingParameter: 0x83,
	SecuredDataTransmission: 0x84,
	ControlDtcSetting: 0x85,
	ResponseOnEvent: 0x86,
	LinkControl: 0x87,
} as const;

export type StandardServiceName = keyof typeof StandardServices;

/** Services whose request carries a subfunction byte */
const WITH_SUBFUNCTION: ReadonlySet<string> = new Set<StandardServiceName>([
	"DiagnosticSessionControl",
	"EcuReset",
	"ReadDtcInformation",
	"SecurityAccess",
	"CommunicationControl",
	"DynamicallyDefineDataIdentifier",
	"RoutineControl",
	"TesterPresent",
	"AccessTimingParameter",
	"ControlDtcSetting",
	"ResponseOnEvent",
	"LinkControl",
]);

/** Services whose positive response is the response SID alone */
const WITHOUT_RESPONSE_DATA: ReadonlySet<string> = new Set<StandardServiceName>([
	"ClearDiagnosticInformation",
	"ReadDataByPeriodicIdentifier",
]);

/**
 * Build a registry holding every ISO 14229-1 service identity.
 * Each call returns a new registry that callers may extend.
 */
export function createStandardServiceRegistry(): ServiceRegistry {
	return new ServiceRegistry(
		Object.entries(StandardServices).map(([name, requestId]) => ({
			name,
			requestId,
			usesSubfunction: WITH_SUBFUNCTION.has(name),
			hasResponseData: !WITHOUT_RESPONSE_DATA.has(name),
		})),
	);
}
