/**
 * Errors raised by the UDS client.
 *
 * Malformed payloads received from an ECU are never thrown; they come back
 * as UdsResponse objects with `valid === false`. Everything here is raised
 * synchronously at the call that supplied bad input, or when a caller asked
 * for a strict wait.
 */

export class UdsError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * Invalid or missing service, malformed subfunction, bad codec layout, response
 * code out of range, or an unusable connection configuration.
 */
export class ConfigurationError extends UdsError {}

/** A strict waitFrame() expired before a payload arrived */
export class TimeoutError extends UdsError {}

/** waitFrame() was called in strict mode on a connection that is not open */
export class ConnectionNotOpenError extends UdsError {}

/** A DidCodec was used without a concrete layout or subclass implementation */
export class NotImplementedError extends UdsError {}
