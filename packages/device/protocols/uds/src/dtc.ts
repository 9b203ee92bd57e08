import { ConfigurationError } from "./errors.js";

// Ref: ISO 14229-1 Annex D.2: DTC status bit definitions
const STATUS_BITS = {
	testFailed: 0x01,
	testFailedThisOperationCycle: 0x02,
	pending: 0x04,
	confirmed: 0x08,
	testNotCompletedSinceLastClear: 0x10,
	testFailedSinceLastClear: 0x20,
	testNotCompletedThisOperationCycle: 0x40,
	warningIndicatorRequested: 0x80,
} as const;

export type DtcStatusField = keyof typeof STATUS_BITS;

/** The eight status flags of a DTC */
export type DtcStatus = Record<DtcStatusField, boolean>;

const STATUS_FIELDS = Object.keys(STATUS_BITS).filter(isStatusField);

/**
 * DTC severity, reported by ReadDtcInformation alongside the status.
 * Not part of the status byte.
 */
export const DtcSeverity = {
	NotAvailable: 0x00,
	MaintenanceOnly: 0x01,
	CheckAtNextHalt: 0x02,
	CheckImmediately: 0x04,
} as const;

export type DtcSeverityValue = (typeof DtcSeverity)[keyof typeof DtcSeverity];

/**
 * A Diagnostic Trouble Code and its status.
 *
 * The `status` byte and the eight boolean fields are two views of the same
 * state: reading `status` packs the flags, assigning it unpacks every flag.
 *
 * @example
 * const dtc = new Dtc(0x03001a);
 * dtc.status = 0x09;
 * dtc.testFailed; // true
 * dtc.confirmed; // true
 */
export class Dtc implements DtcStatus {
	/** 3-byte DTC number */
	readonly id: number;
	severity: DtcSeverityValue = DtcSeverity.NotAvailable;

	testFailed = false;
	testFailedThisOperationCycle = false;
	pending = false;
	confirmed = false;
	testNotCompletedSinceLastClear = false;
	testFailedSinceLastClear = false;
	testNotCompletedThisOperationCycle = false;
	warningIndicatorRequested = false;

	constructor(id: number) {
		if (!Number.isInteger(id) || id < 0 || id > 0xffffff) {
			throw new ConfigurationError(
				`DTC id must be an integer between 0 and 0xFFFFFF (got ${id})`,
			);
		}
		this.id = id;
	}

	/** Status byte packed from the eight flags */
	get status(): number {
		let status = 0;
		for (const field of STATUS_FIELDS) {
			if (this[field]) {
				status |= STATUS_BITS[field];
			}
		}
		return status;
	}

	/** Overwrites all eight flags; bits above 0xFF are ignored */
	set status(status: number) {
		for (const field of STATUS_FIELDS) {
			this[field] = (status & STATUS_BITS[field]) !== 0;
		}
	}

	/** Overwrite only the flags given, leaving the others as they are */
	updateStatus(update: Partial<DtcStatus>): void {
		for (const field of STATUS_FIELDS) {
			const value = update[field];
			if (value !== undefined) {
				this[field] = value;
			}
		}
	}

	toString(): string {
		return `<DTC ${formatDtcId(this.id)} - status=0x${this.status.toString(16).padStart(2, "0").toUpperCase()} severity=${this.severity}>`;
	}
}

const DTC_SYSTEMS = ["P", "C", "B", "U"] as const;

/**
 * Render a 3-byte DTC number the way scan tools print it.
 *
 * Byte 0 holds the system letter (bits 7-6) and the first three characters,
 * byte 1 the last two, and byte 2 the failure type.
 *
 * @example
 * formatDtcId(0x03001a); // "P0300-1A"
 * formatDtcId(0xc10000); // "U0100-00"
 */
export function formatDtcId(id: number): string {
	const high = (id >> 16) & 0xff;
	const middle = (id >> 8) & 0xff;
	const failureType = id & 0xff;
	const system = DTC_SYSTEMS[high >> 6] ?? "P";
	const digits = `${(high >> 4) & 0x03}${hexDigits(high & 0x0f, 1)}${hexDigits(middle, 2)}`;
	return `${system}${digits}-${hexDigits(failureType, 2)}`;
}

function hexDigits(value: number, width: number): string {
	return value.toString(16).padStart(width, "0").toUpperCase();
}

function isStatusField(name: string): name is DtcStatusField {
	return Object.hasOwn(STATUS_BITS, name);
}
