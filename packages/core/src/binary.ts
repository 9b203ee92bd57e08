/**
 * Byte order for multi-byte values
 * - "le" = little-endian (least significant byte first)
 * - "be" = big-endian (most significant byte first, the UDS wire order)
 */
export type Endianness = "le" | "be";

/**
 * Scalar data types that can appear in a fixed binary layout
 * - "u8" = unsigned 8-bit integer (0-255)
 * - "i8" = signed 8-bit integer (-128 to 127)
 * - "u16" = unsigned 16-bit integer (0-65535)
 * - "i16" = signed 16-bit integer (-32768 to 32767)
 * - "u32" = unsigned 32-bit integer (0-4294967295)
 * - "i32" = signed 32-bit integer (-2147483648 to 2147483647)
 * - "f32" = 32-bit floating point
 */
export type ScalarType = "u8" | "i8" | "u16" | "i16" | "u32" | "i32" | "f32";

const SCALAR_TYPES: readonly ScalarType[] = [
	"u8",
	"i8",
	"u16",
	"i16",
	"u32",
	"i32",
	"f32",
];

/** Inclusive integer range per type; f32 has none */
const INTEGER_RANGES: Record<Exclude<ScalarType, "f32">, [number, number]> = {
	u8: [0, 0xff],
	i8: [-0x80, 0x7f],
	u16: [0, 0xffff],
	i16: [-0x8000, 0x7fff],
	u32: [0, 0xffffffff],
	i32: [-0x80000000, 0x7fffffff],
};

export function isScalarType(value: string): value is ScalarType {
	return (SCALAR_TYPES as readonly string[]).includes(value);
}

/**
 * Get the byte size of a scalar type
 *
 * @example
 * sizeOf("u16"); // 2
 * sizeOf("f32"); // 4
 */
export function sizeOf(dtype: ScalarType): number {
	switch (dtype) {
		case "u8":
		case "i8":
			return 1;
		case "u16":
		case "i16":
			return 2;
		case "u32":
		case "i32":
		case "f32":
			return 4;
	}
}

/**
 * Decode a scalar value from a buffer at the given offset
 *
 * @param bytes - The buffer to read from
 * @param offset - Byte offset of the value
 * @param dtype - The scalar type to decode
 * @param endianness - Byte order
 * @returns The decoded value
 * @throws Error if the value does not fit inside the buffer
 *
 * @example
 * const bytes = new Uint8Array([0x12, 0x34]);
 * decodeScalar(bytes, 0, "u16", "be"); // 0x1234
 */
export function decodeScalar(
	bytes: Uint8Array,
	offset: number,
	dtype: ScalarType,
	endianness: Endianness = "be",
): number {
	if (offset < 0 || offset + sizeOf(dtype) > bytes.length) {
		throw new Error(
			`Offset ${offset} out of bounds for ${dtype} in buffer of length ${bytes.length}`,
		);
	}

	const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
	const littleEndian = endianness === "le";

	switch (dtype) {
		case "u8":
			return view.getUint8(offset);
		case "i8":
			return view.getInt8(offset);
		case "u16":
			return view.getUint16(offset, littleEndian);
		case "i16":
			return view.getInt16(offset, littleEndian);
		case "u32":
			return view.getUint32(offset, littleEndian);
		case "i32":
			return view.getInt32(offset, littleEndian);
		case "f32":
			return view.getFloat32(offset, littleEndian);
		default: {
			const _exhaustive: never = dtype;
			throw new Error(`Unknown scalar type: ${_exhaustive}`);
		}
	}
}

/**
 * Encode a numeric value into a buffer at the given offset.
 *
 * Integer types reject non-integers and values outside their range; nothing
 * is clamped.
 *
 * @throws Error if the value is not representable or does not fit the buffer
 *
 * @example
 * const out = new Uint8Array(2);
 * encodeScalarInto(out, 0, 0x1234, "u16", "be"); // out = [0x12, 0x34]
 */
export function encodeScalarInto(
	target: Uint8Array,
	offset: number,
	value: number,
	dtype: ScalarType,
	endianness: Endianness = "be",
): void {
	if (offset < 0 || offset + sizeOf(dtype) > target.length) {
		throw new Error(
			`Offset ${offset} out of bounds for ${dtype} in buffer of length ${target.length}`,
		);
	}

	if (dtype !== "f32") {
		const [min, max] = INTEGER_RANGES[dtype];
		if (!Number.isInteger(value) || value < min || value > max) {
			throw new Error(
				`Value ${value} is not representable as ${dtype} (${min}..${max})`,
			);
		}
	}

	const view = new DataView(
		target.buffer,
		target.byteOffset,
		target.byteLength,
	);
	const littleEndian = endianness === "le";

	switch (dtype) {
		case "u8":
			view.setUint8(offset, value);
			break;
		case "i8":
			view.setInt8(offset, value);
			break;
		case "u16":
			view.setUint16(offset, value, littleEndian);
			break;
		case "i16":
			view.setInt16(offset, value, littleEndian);
			break;
		case "u32":
			view.setUint32(offset, value, littleEndian);
			break;
		case "i32":
			view.setInt32(offset, value, littleEndian);
			break;
		case "f32":
			view.setFloat32(offset, value, littleEndian);
			break;
	}
}

/** True for an integer in 0..0xFF */
export function isByte(value: unknown): value is number {
	return (
		typeof value === "number" &&
		Number.isInteger(value) &&
		value >= 0 &&
		value <= 0xff
	);
}

/**
 * Format a single byte as "0xNN"
 */
export function byteToHex(value: number): string {
	return `0x${value.toString(16).padStart(2, "0").toUpperCase()}`;
}
