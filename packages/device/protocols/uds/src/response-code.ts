import { byteToHex } from "@udslink/core";

// Ref: ISO 14229-1:2020 Annex A.1: Negative response codes
// Ref: ISO 15764: security codes, placed at offset 0x38 by ISO 14229
const SECURITY_CODE_OFFSET = 0x38;

/**
 * Response codes. `PositiveResponse` (0x00) marks the absence of an error;
 * every other registered code is negative.
 */
export const ResponseCode = {
	PositiveResponse: 0x00,
	GeneralReject: 0x10,
	ServiceNotSupported: 0x11,
	SubFunctionNotSupported: 0x12,
	IncorrectMessageLengthOrInvalidFormat: 0x13,
	ResponseTooLong: 0x14,
	BusyRepeatRequest: 0x21,
	ConditionsNotCorrect: 0x22,
	RequestSequenceError: 0x24,
	NoResponseFromSubnetComponent: 0x25,
	FailurePreventsExecutionOfRequestedAction: 0x26,
	RequestOutOfRange: 0x31,
	SecurityAccessDenied: 0x33,
	InvalidKey: 0x35,
	ExceedNumberOfAttempts: 0x36,
	RequiredTimeDelayNotExpired: 0x37,

	GeneralSecurityViolation: SECURITY_CODE_OFFSET + 0,
	SecuredModeRequested: SECURITY_CODE_OFFSET + 1,
	InsufficientProtection: SECURITY_CODE_OFFSET + 2,
	TerminationWithSignatureRequested: SECURITY_CODE_OFFSET + 3,
	AccessDenied: SECURITY_CODE_OFFSET + 4,
	VersionNotSupported: SECURITY_CODE_OFFSET + 5,
	SecuredLinkNotSupported: SECURITY_CODE_OFFSET + 6,
	CertificateNotAvailable: SECURITY_CODE_OFFSET + 7,
	AuditTrailInformationNotAvailable: SECURITY_CODE_OFFSET + 8,

	UploadDownloadNotAccepted: 0x70,
	TransferDataSuspended: 0x71,
	GeneralProgrammingFailure: 0x72,
	WrongBlockSequenceCounter: 0x73,
	RequestCorrectlyReceivedResponsePending: 0x78,
	SubFunctionNotSupportedInActiveSession: 0x7e,
	ServiceNotSupportedInActiveSession: 0x7f,
	RpmTooHigh: 0x81,
	RpmTooLow: 0x82,
	EngineIsRunning: 0x83,
	EngineIsNotRunning: 0x84,
	EngineRunTimeTooLow: 0x85,
	TemperatureTooHigh: 0x86,
	TemperatureTooLow: 0x87,
	VehicleSpeedTooHigh: 0x88,
	VehicleSpeedTooLow: 0x89,
	ThrottlePedalTooHigh: 0x8a,
	ThrottlePedalTooLow: 0x8b,
	TransmissionRangeNotInNeutral: 0x8c,
	TransmissionRangeNotInGear: 0x8d,
	IsoSaeReserved: 0x8e,
	BrakeSwitchNotClosed: 0x8f,
	ShifterLeverNotInPark: 0x90,
	TorqueConverterClutchLocked: 0x91,
	VoltageTooHigh: 0x92,
	VoltageTooLow: 0x93,
} as const;

export type ResponseCodeName = keyof typeof ResponseCode;
export type ResponseCodeValue = (typeof ResponseCode)[ResponseCodeName];

const NAMES_BY_CODE: ReadonlyMap<number, string> = new Map(
	Object.entries(ResponseCode).map(([name, code]) => [code, name]),
);

/**
 * Symbolic name of a response code.
 *
 * @returns "" for an absent code, the name for a registered code, and the
 *          decimal value otherwise, so the result is always printable
 *
 * @example
 * getResponseCodeName(0x31); // "RequestOutOfRange"
 * getResponseCodeName(0xaa); // "170"
 */
export function getResponseCodeName(code: number | null | undefined): string {
	if (code === null || code === undefined) {
		return "";
	}
	return NAMES_BY_CODE.get(code) ?? String(code);
}

/**
 * Whether a code denotes a negative response.
 *
 * Codes that are not registered count as not negative. This keeps an
 * unknown vendor code from being reported as a confirmed failure, but it
 * also means such a code following a 0x7F marker is classified as positive
 * by {@link UdsResponse} construction.
 */
export function isNegativeResponseCode(
	code: number | null | undefined,
): boolean {
	if (
		code === null ||
		code === undefined ||
		code === ResponseCode.PositiveResponse
	) {
		return false;
	}
	return NAMES_BY_CODE.has(code);
}

const DESCRIPTIONS: Partial<Record<ResponseCodeName, string>> = {
	PositiveResponse: "Positive response",
	GeneralReject: "General reject",
	ServiceNotSupported: "Service not supported",
	SubFunctionNotSupported: "Sub-function not supported",
	IncorrectMessageLengthOrInvalidFormat:
		"Incorrect message length or invalid format",
	ResponseTooLong: "Response too long for the transport",
	BusyRepeatRequest: "ECU busy, repeat request",
	ConditionsNotCorrect: "Conditions not correct",
	RequestSequenceError: "Request sequence error",
	NoResponseFromSubnetComponent: "No response from subnet component",
	FailurePreventsExecutionOfRequestedAction:
		"Failure prevents execution of requested action",
	RequestOutOfRange: "Request out of range",
	SecurityAccessDenied: "Security access denied",
	InvalidKey: "Invalid key",
	ExceedNumberOfAttempts: "Exceeded number of attempts",
	RequiredTimeDelayNotExpired: "Required time delay not expired",
	UploadDownloadNotAccepted: "Upload/download not accepted",
	TransferDataSuspended: "Transfer data suspended",
	GeneralProgrammingFailure: "General programming failure",
	WrongBlockSequenceCounter: "Wrong block sequence counter",
	RequestCorrectlyReceivedResponsePending:
		"Request correctly received, response pending",
	SubFunctionNotSupportedInActiveSession:
		"Sub-function not supported in active session",
	ServiceNotSupportedInActiveSession:
		"Service not supported in active session",
	VoltageTooHigh: "Voltage too high",
	VoltageTooLow: "Voltage too low",
};

/**
 * Human-readable message for a response code.
 *
 * @example
 * describeResponseCode(0x31); // "Request out of range (NRC 0x31)"
 * describeResponseCode(0xaa); // "Unknown NRC (0xAA)"
 */
export function describeResponseCode(code: number): string {
	const hex = byteToHex(code);
	const name = NAMES_BY_CODE.get(code);
	if (name === undefined) {
		return `Unknown NRC (${hex})`;
	}
	const description = isResponseCodeName(name) ? DESCRIPTIONS[name] : undefined;
	return `${description ?? splitWords(name)} (NRC ${hex})`;
}

function isResponseCodeName(name: string): name is ResponseCodeName {
	return Object.hasOwn(ResponseCode, name);
}

/** "EngineIsRunning" → "Engine is running" */
function splitWords(name: string): string {
	const words = name.replace(/([a-z])([A-Z])/g, "$1 $2").toLowerCase();
	return words.charAt(0).toUpperCase() + words.slice(1);
}
