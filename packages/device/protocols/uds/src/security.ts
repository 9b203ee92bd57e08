import { byteToHex, isByte } from "@udslink/core";
import { ConfigurationError } from "./errors.js";

/**
 * A SecurityAccess level. The lowest bit is cleared, so a level built from
 * either subfunction of a seed/key pair names the same level.
 *
 * @example
 * new SecurityLevel(0x03).levelId; // 0x02
 */
export class SecurityLevel {
	readonly levelId: number;

	constructor(level: number) {
		if (!isByte(level)) {
			throw new ConfigurationError(
				`Security level must be a byte (got ${String(level)})`,
			);
		}
		this.levelId = level & 0xfe;
	}

	toString(): string {
		return `<SecurityLevel ${byteToHex(this.levelId)}>`;
	}
}
