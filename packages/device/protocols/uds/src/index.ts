export type { ConfigSources, ConnectionConfig } from "./config.js";
export { connectionConfigSchema, loadConnectionConfig } from "./config.js";
export type {
	ConnectionLogger,
	ConnectionOptions,
	WaitFrameOptions,
} from "./connection.js";
export {
	Connection,
	DEFAULT_RECV_TIMEOUT_MS,
	DEFAULT_RX_QUEUE_CAPACITY,
	DEFAULT_WAIT_FRAME_TIMEOUT_MS,
	withConnection,
} from "./connection.js";
export type { DidCodecClass, DidCodecConfig } from "./did-codec.js";
export { DidCodec, LayoutDidCodec, resolveDidCodecs } from "./did-codec.js";
export type { DtcSeverityValue, DtcStatus, DtcStatusField } from "./dtc.js";
export { Dtc, DtcSeverity, formatDtcId } from "./dtc.js";
export {
	ConfigurationError,
	ConnectionNotOpenError,
	NotImplementedError,
	TimeoutError,
	UdsError,
} from "./errors.js";
export { AddressAndLengthIdentifier } from "./memory.js";
export type { UdsRequestInit } from "./request.js";
export { UdsRequest } from "./request.js";
export type { UdsResponseInit } from "./response.js";
export { UdsResponse } from "./response.js";
export type { ResponseCodeName, ResponseCodeValue } from "./response-code.js";
export { SecurityLevel } from "./security.js";
export {
	describeResponseCode,
	getResponseCodeName,
	isNegativeResponseCode,
	ResponseCode,
} from "./response-code.js";
export type {
	ServiceDefinition,
	ServiceDescriptor,
	StandardServiceName,
} from "./services.js";
export {
	createStandardServiceRegistry,
	NEGATIVE_RESPONSE_MARKER,
	parseServiceDescriptor,
	RESPONSE_ID_OFFSET,
	ServiceRegistry,
	serviceDescriptorSchema,
	StandardServices,
} from "./services.js";
