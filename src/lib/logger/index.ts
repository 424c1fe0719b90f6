/**
 * Logger wrapper: structured logging backed by pino.
 *
 * Ledger log lines carry uint256 amounts and ids; bigint fields are written
 * as base-10 strings so every sink can parse them. Supports path-based
 * redaction for deployments that log account addresses.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe; `silent` disables output. */
export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

// ── bigint serialization ────────────────────────────────────────────

function stringifyBigints(value: unknown, seen: WeakSet<object>): unknown {
	if (typeof value === "bigint") return value.toString();
	if (value === null || typeof value !== "object" || value instanceof Error) return value;
	if (seen.has(value)) return "[Circular]";
	seen.add(value);

	if (Array.isArray(value)) return value.map((item) => stringifyBigints(item, seen));
	const result: Record<string, unknown> = {};
	for (const [key, field] of Object.entries(value)) {
		result[key] = stringifyBigints(field, seen);
	}
	return result;
}

function fields(obj: Record<string, unknown>): Record<string, unknown> {
	const seen = new WeakSet<object>([obj]);
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = stringifyBigints(value, seen);
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type PinoMethod = "info" | "warn" | "error" | "debug";

function wrapPino(pinoLogger: pino.Logger): Logger {
	const write =
		(method: PinoMethod) =>
		(msgOrObj: string | Record<string, unknown>, msg?: string): void => {
			if (typeof msgOrObj === "string") {
				pinoLogger[method](msgOrObj);
			} else {
				pinoLogger[method](fields(msgOrObj), msg ?? "");
			}
		};

	return {
		info: write("info"),
		warn: write("warn"),
		error: write("error"),
		debug: write("debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(fields(bindings)));
		},
	};
}

/**
 * Creates a Logger backed by pino with optional redaction and destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "debug" });
 * logger.debug({ positionId: 42n, amount: 100n }, "position split");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const destination = config.destination;
	if (destination) {
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				destination.write(chunk);
			},
		};
		return wrapPino(pino(pinoOptions, stream));
	}
	return wrapPino(pino(pinoOptions));
}

/** Logger that discards everything; the ledger default. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}
