/**
 * Ledger configuration.
 *
 * Everything has a safe default so `ConditionalLedger.create()` works with no
 * configuration at all; deployments override through LEDGER_* variables.
 */

import { type LogLevel, LOG_LEVELS } from "../lib/logger/index.js";
import { addressSchema, validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";
import { type Address, address } from "./identifiers.js";

export interface LedgerConfig {
	/** Address that holds collateral pulled in by root-level splits */
	readonly custodyAddress: Address;
	/** Minimum level written by the ledger logger */
	readonly logLevel: LogLevel;
	/** JSONL event journal path; omit for no file journal */
	readonly journalPath?: string | undefined;
	/** Rotate the journal file once it reaches this size */
	readonly journalMaxFileSizeBytes?: number | undefined;
}

export const DEFAULT_LEDGER_CONFIG: LedgerConfig = {
	custodyAddress: address("0x00000000000000000000000000000000000c7f00"),
	logLevel: "info",
};

const envSchema = z.object({
	LEDGER_CUSTODY_ADDRESS: addressSchema.optional(),
	LEDGER_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
	LEDGER_JOURNAL_PATH: z.string().min(1).optional(),
	LEDGER_JOURNAL_MAX_BYTES: z
		.string()
		.regex(/^\d+$/, "must be a positive integer")
		.transform((v) => Number.parseInt(v, 10))
		.refine((n) => n > 0, "must be a positive integer")
		.optional(),
});

/** Mutable builder shape for constructing Partial<LedgerConfig>. */
interface MutableLedgerConfig {
	custodyAddress?: Address;
	logLevel?: LogLevel;
	journalPath?: string;
	journalMaxFileSizeBytes?: number;
}

/**
 * Reads ledger config values from environment variables.
 * Supported: LEDGER_CUSTODY_ADDRESS, LEDGER_LOG_LEVEL, LEDGER_JOURNAL_PATH,
 * LEDGER_JOURNAL_MAX_BYTES. Empty variables are ignored.
 * @throws ConfigError listing every invalid variable
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<LedgerConfig> {
	const present: Record<string, string> = {};
	for (const key of Object.keys(envSchema.shape)) {
		const raw = env[key];
		if (raw !== undefined && raw.trim().length > 0) {
			present[key] = raw.trim();
		}
	}

	const parsed = validate(envSchema, present);
	if (!parsed.ok) {
		const details = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
		throw new ConfigError(`Invalid ledger environment: ${details.join("; ")}`, {
			issues: parsed.error.issues,
		});
	}

	const vars = parsed.value;
	const result: MutableLedgerConfig = {};
	if (vars.LEDGER_CUSTODY_ADDRESS !== undefined) result.custodyAddress = vars.LEDGER_CUSTODY_ADDRESS;
	if (vars.LEDGER_LOG_LEVEL !== undefined) result.logLevel = vars.LEDGER_LOG_LEVEL;
	if (vars.LEDGER_JOURNAL_PATH !== undefined) result.journalPath = vars.LEDGER_JOURNAL_PATH;
	if (vars.LEDGER_JOURNAL_MAX_BYTES !== undefined) {
		result.journalMaxFileSizeBytes = vars.LEDGER_JOURNAL_MAX_BYTES;
	}
	return result;
}

/** Defaults overlaid with the given overrides. */
export function resolveConfig(overrides: Partial<LedgerConfig> = {}): LedgerConfig {
	return { ...DEFAULT_LEDGER_CONFIG, ...overrides };
}
