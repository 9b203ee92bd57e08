import type { Endianness, ScalarType } from "@udslink/core";
import {
	decodeScalar,
	encodeScalarInto,
	isScalarType,
	sizeOf,
} from "@udslink/core";
import { ConfigurationError, NotImplementedError } from "./errors.js";

/**
 * Converts the value of one Data Identifier to and from its binary payload.
 *
 * The base class has no layout: every member throws NotImplementedError.
 * Use {@link LayoutDidCodec} for fixed scalar layouts, or subclass and
 * implement all three members for anything else (strings, bitfields, ...).
 *
 * @example
 * class VinCodec extends DidCodec {
 *   override encode(vin: string) { return new TextEncoder().encode(vin); }
 *   override decode(payload: Uint8Array) { return new TextDecoder().decode(payload); }
 *   override get byteLength() { return 17; }
 * }
 */
export class DidCodec {
	encode(_value: unknown): Uint8Array {
		throw new NotImplementedError(
			`Cannot encode DID value: ${this.constructor.name} has no encode implementation`,
		);
	}

	decode(_payload: Uint8Array): unknown {
		throw new NotImplementedError(
			`Cannot decode DID payload: ${this.constructor.name} has no decode implementation`,
		);
	}

	/** Size of the encoded payload in bytes */
	get byteLength(): number {
		throw new NotImplementedError(
			`Cannot tell the payload size: ${this.constructor.name} has no byteLength implementation`,
		);
	}

	/**
	 * Resolve a codec from configuration.
	 *
	 * - a DidCodec instance is returned unchanged
	 * - a DidCodec subclass is instantiated with no arguments
	 * - a string is read as a {@link LayoutDidCodec} layout
	 *
	 * @throws ConfigurationError for any other value, or a malformed layout
	 */
	static fromConfig(config: unknown): DidCodec {
		if (config instanceof DidCodec) {
			return config;
		}
		if (typeof config === "string") {
			return new LayoutDidCodec(config);
		}
		if (isDidCodecClass(config)) {
			return new config();
		}
		throw new ConfigurationError(
			`DID codec config must be a DidCodec instance, a DidCodec subclass or a layout string (got ${describeValue(config)})`,
		);
	}
}

export type DidCodecClass = new () => DidCodec;

/** The accepted shapes of a DID codec configuration entry */
export type DidCodecConfig = DidCodec | DidCodecClass | string;

interface LayoutField {
	type: ScalarType;
	endianness: Endianness;
	offset: number;
}

const LAYOUT_TOKEN = /^([a-z]\d+)(le|be)?$/;

/**
 * Fixed binary layout described by a compact format string.
 *
 * The layout is a list of scalar tokens separated by spaces or commas:
 * `u8 i8 u16 i16 u32 i32 f32`, each optionally suffixed with `le` or `be`.
 * Multi-byte fields are big-endian unless marked `le`.
 *
 * Values are always arrays with one number per field; encode() also takes a
 * bare number for single-field layouts.
 *
 * @example
 * const codec = new LayoutDidCodec("u16, u8");
 * codec.encode([0x1234, 7]); // [0x12, 0x34, 0x07]
 * codec.decode(new Uint8Array([0x12, 0x34, 0x07])); // [0x1234, 7]
 */
export class LayoutDidCodec extends DidCodec {
	readonly layout: string;
	private readonly fields: readonly LayoutField[];
	private readonly size: number;

	constructor(layout: string) {
		super();
		// Reached without a layout when the class itself is given to fromConfig()
		if (typeof layout !== "string") {
			throw new ConfigurationError(
				`LayoutDidCodec needs a layout string (got ${describeValue(layout)})`,
			);
		}
		this.layout = layout;
		this.fields = parseLayout(layout);
		const last = this.fields[this.fields.length - 1];
		this.size = last ? last.offset + sizeOf(last.type) : 0;
	}

	override encode(value: number | readonly number[]): Uint8Array {
		const values = typeof value === "number" ? [value] : value;
		if (values.length !== this.fields.length) {
			throw new ConfigurationError(
				`Layout "${this.layout}" takes ${this.fields.length} value(s), got ${values.length}`,
			);
		}

		const payload = new Uint8Array(this.size);
		this.fields.forEach((field, index) => {
			const fieldValue = values[index];
			if (fieldValue === undefined) {
				return;
			}
			try {
				encodeScalarInto(
					payload,
					field.offset,
					fieldValue,
					field.type,
					field.endianness,
				);
			} catch (error) {
				throw new ConfigurationError(
					`Cannot encode field ${index} of layout "${this.layout}": ${error instanceof Error ? error.message : String(error)}`,
					{ cause: error },
				);
			}
		});
		return payload;
	}

	override decode(payload: Uint8Array): number[] {
		if (payload.length !== this.size) {
			throw new ConfigurationError(
				`Layout "${this.layout}" decodes ${this.size} bytes, got ${payload.length}`,
			);
		}
		return this.fields.map((field) =>
			decodeScalar(payload, field.offset, field.type, field.endianness),
		);
	}

	override get byteLength(): number {
		return this.size;
	}
}

/**
 * Resolve every DID codec of a configuration once, at setup.
 *
 * @throws ConfigurationError for a DID outside 0..0xFFFF or an invalid codec
 */
export function resolveDidCodecs(
	config: ReadonlyMap<number, DidCodecConfig> | Record<number, DidCodecConfig>,
): Map<number, DidCodec> {
	const entries: Array<[number, DidCodecConfig]> =
		config instanceof Map
			? Array.from(config.entries())
			: Object.entries(config).map(
					([did, codec]): [number, DidCodecConfig] => [Number(did), codec],
				);

	const resolved = new Map<number, DidCodec>();
	for (const [did, codecConfig] of entries) {
		if (!Number.isInteger(did) || did < 0 || did > 0xffff) {
			throw new ConfigurationError(
				`DID must be an integer between 0 and 0xFFFF (got ${did})`,
			);
		}
		try {
			resolved.set(did, DidCodec.fromConfig(codecConfig));
		} catch (error) {
			if (error instanceof ConfigurationError) {
				throw new ConfigurationError(
					`DID 0x${did.toString(16).padStart(4, "0").toUpperCase()}: ${error.message}`,
					{ cause: error },
				);
			}
			throw error;
		}
	}
	return resolved;
}

function parseLayout(layout: string): LayoutField[] {
	const tokens = layout
		.split(/[\s,]+/)
		.map((token) => token.trim().toLowerCase())
		.filter((token) => token.length > 0);

	if (tokens.length === 0) {
		throw new ConfigurationError("DID layout cannot be empty");
	}

	const fields: LayoutField[] = [];
	let offset = 0;
	for (const token of tokens) {
		const match = LAYOUT_TOKEN.exec(token);
		const type = match?.[1];
		if (type === undefined || !isScalarType(type)) {
			throw new ConfigurationError(
				`Unknown field "${token}" in DID layout "${layout}"`,
			);
		}
		const endianness: Endianness = match?.[2] === "le" ? "le" : "be";
		fields.push({ type, endianness, offset });
		offset += sizeOf(type);
	}
	return fields;
}

function isDidCodecClass(value: unknown): value is DidCodecClass {
	return (
		typeof value === "function" &&
		(value === DidCodec || value.prototype instanceof DidCodec)
	);
}

function describeValue(value: unknown): string {
	if (value === null) {
		return "null";
	}
	if (typeof value === "function") {
		return `function ${value.name || "(anonymous)"}`;
	}
	return typeof value;
}
