/**
 * Connection configuration.
 *
 * Reads configuration from:
 * 1. CLI arguments (--interface, --rxid, --txid, --recv-timeout-ms,
 *    --wait-frame-timeout-ms, --rx-queue-capacity)
 * 2. Environment variables (UDS_INTERFACE, UDS_RXID, UDS_TXID,
 *    UDS_RECV_TIMEOUT_MS, UDS_WAIT_FRAME_TIMEOUT_MS, UDS_RX_QUEUE_CAPACITY)
 * 3. Defaults
 *
 * Numbers are decimal or 0x-prefixed hex.
 */

import { z } from "zod";
import {
	DEFAULT_RECV_TIMEOUT_MS,
	DEFAULT_RX_QUEUE_CAPACITY,
	DEFAULT_WAIT_FRAME_TIMEOUT_MS,
} from "./connection.js";
import { ConfigurationError } from "./errors.js";

const MAX_CAN_ID = 0x1fffffff;

const numeric = z
	.string()
	.trim()
	.regex(/^(0x[0-9a-f]+|\d+)$/i, "must be a decimal or 0x-prefixed hex number")
	.transform((value) => Number(value));

export const connectionConfigSchema = z.object({
	interface: z.string().trim().min(1, "is required"),
	rxid: numeric.pipe(z.number().int().max(MAX_CAN_ID)),
	txid: numeric.pipe(z.number().int().max(MAX_CAN_ID)),
	recvTimeoutMs: numeric.pipe(z.number().int().positive()),
	waitFrameTimeoutMs: numeric.pipe(z.number().int().nonnegative()),
	rxQueueCapacity: numeric.pipe(z.number().int().positive()),
});

export type ConnectionConfig = z.output<typeof connectionConfigSchema>;

type RawConnectionConfig = Partial<z.input<typeof connectionConfigSchema>>;

const OPTIONS: ReadonlyArray<{
	key: keyof ConnectionConfig;
	flag: string;
	env: string;
}> = [
	{ key: "interface", flag: "--interface", env: "UDS_INTERFACE" },
	{ key: "rxid", flag: "--rxid", env: "UDS_RXID" },
	{ key: "txid", flag: "--txid", env: "UDS_TXID" },
	{ key: "recvTimeoutMs", flag: "--recv-timeout-ms", env: "UDS_RECV_TIMEOUT_MS" },
	{
		key: "waitFrameTimeoutMs",
		flag: "--wait-frame-timeout-ms",
		env: "UDS_WAIT_FRAME_TIMEOUT_MS",
	},
	{
		key: "rxQueueCapacity",
		flag: "--rx-queue-capacity",
		env: "UDS_RX_QUEUE_CAPACITY",
	},
];

const DEFAULTS: RawConnectionConfig = {
	recvTimeoutMs: String(DEFAULT_RECV_TIMEOUT_MS),
	waitFrameTimeoutMs: String(DEFAULT_WAIT_FRAME_TIMEOUT_MS),
	rxQueueCapacity: String(DEFAULT_RX_QUEUE_CAPACITY),
};

export interface ConfigSources {
	/** Process arguments, including the node and script entries @default process.argv */
	argv?: readonly string[];
	env?: Readonly<Record<string, string | undefined>>;
}

/**
 * Parse CLI arguments, in both `--flag value` and `--flag=value` forms.
 *
 * @param argv - Process arguments; the first two entries are skipped
 */
function parseCliArgs(argv: readonly string[]): RawConnectionConfig {
	const values: RawConnectionConfig = {};

	for (let i = 2; i < argv.length; i++) {
		const arg = argv[i];
		if (!arg) continue;

		for (const { key, flag } of OPTIONS) {
			if (arg === flag && i + 1 < argv.length) {
				values[key] = argv[i + 1];
				i++;
				break;
			}
			if (arg.startsWith(`${flag}=`)) {
				values[key] = arg.slice(flag.length + 1);
				break;
			}
		}
	}

	return values;
}

function readEnv(
	env: Readonly<Record<string, string | undefined>>,
): RawConnectionConfig {
	const values: RawConnectionConfig = {};
	for (const { key, env: name } of OPTIONS) {
		const value = env[name];
		if (value !== undefined && value !== "") {
			values[key] = value;
		}
	}
	return values;
}

/**
 * Load connection configuration from all sources.
 *
 * Priority: CLI args > env vars > defaults
 *
 * @throws ConfigurationError naming every field that is missing or invalid
 */
export function loadConnectionConfig(
	sources: ConfigSources = {},
): ConnectionConfig {
	const cli = parseCliArgs(sources.argv ?? process.argv);
	const fromEnv = readEnv(sources.env ?? process.env);

	const result = connectionConfigSchema.safeParse({
		...DEFAULTS,
		...fromEnv,
		...cli,
	});
	if (!result.success) {
		const problems = result.error.issues.map((issue) => {
			const field = issue.path.join(".");
			const option = OPTIONS.find((o) => o.key === field);
			const label = option ? `${field} (${option.flag} / ${option.env})` : field;
			return `${label}: ${issue.message}`;
		});
		throw new ConfigurationError(
			`Invalid connection configuration: ${problems.join("; ")}`,
			{ cause: result.error },
		);
	}
	return result.data;
}
