import { ConfigurationError } from "./errors.js";

/**
 * The addressAndLengthFormatIdentifier byte of the memory services
 * (ReadMemoryByAddress, WriteMemoryByAddress, RequestDownload, ...).
 *
 * High nibble: number of bytes in the memory size field.
 * Low nibble: number of bytes in the memory address field.
 */
export const AddressAndLengthIdentifier = {
	/** Memory size field widths */
	memorySize: {
		msize256: 1,
		msize64KB: 2,
		msize16MB: 3,
		msize4GB: 4,
	},

	/** Memory address field widths */
	address: {
		addr256B: 1,
		addr64KB: 2,
		addr16MB: 3,
		addr4GB: 4,
		addr1024GB: 5,
	},

	/**
	 * Build the identifier byte.
	 *
	 * @param memorySize - Size field width in bytes, 1-4
	 * @param address - Address field width in bytes, 1-5
	 * @throws ConfigurationError outside those ranges
	 *
	 * @example
	 * AddressAndLengthIdentifier.make(2, 3); // 0x23
	 */
	make(memorySize: number, address: number): number {
		if (!Number.isInteger(memorySize) || memorySize < 1 || memorySize > 4) {
			throw new ConfigurationError(
				`Memory size selector must be an integer between 1 and 4 (got ${memorySize})`,
			);
		}
		if (!Number.isInteger(address) || address < 1 || address > 5) {
			throw new ConfigurationError(
				`Address selector must be an integer between 1 and 5 (got ${address})`,
			);
		}
		return (memorySize << 4) | address;
	},
} as const;
