/**
 * Validation wrapper: thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Domain code uses this instead of importing Zod directly.
 * Re-exports `z` so schemas can be built without a direct zod dependency.
 */

import { z } from "zod";
import { ErrorCategory, LedgerError } from "../../shared/errors.js";
import { type Address, address } from "../../shared/identifiers.js";
import { type Result, err, ok } from "../../shared/result.js";
import { isUint256 } from "../../shared/uint256.js";
import { checksumAddress, isBytes32, isHexBytes } from "../ethereum/index.js";
import type { Hex } from "../ethereum/index.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Non-retryable error containing one or more validation issues. */
export class ValidationError extends LedgerError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorCategory.NonRetryable, { issues });
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	return err(new ValidationError("Validation failed", issues));
}

// ── Shared schemas ───────────────────────────────────────────────────

/** Unsigned 256-bit integer as a bigint. */
export const uint256Schema = z
	.bigint()
	.refine(isUint256, { message: "must be within [0, 2^256 - 1]" });

/** uint256 carried as a base-10 string (JSON boundary). */
export const uint256StringSchema = z
	.string()
	.regex(/^\d+$/, "must be a base-10 unsigned integer")
	.transform((s) => BigInt(s))
	.pipe(uint256Schema);

/** `0x`-prefixed whole-byte hex string. */
export const hexBytesSchema = z.custom<Hex>(
	(v) => typeof v === "string" && isHexBytes(v),
	"must be 0x-prefixed hex bytes",
);

/** 32-byte hex string. */
export const bytes32Schema = z.custom<Hex>(
	(v) => typeof v === "string" && isBytes32(v),
	"must be 32 bytes of hex",
);

/** 20-byte address in any case, normalized to its checksummed form. */
export const addressSchema = z
	.string()
	.refine((v) => checksumAddress(v) !== null, "must be a 20-byte hex address")
	.transform((v): Address => address(v));

/**
 * Checks that an operation amount fits a uint256.
 * @param field - Name reported in the issue path
 */
export function requireUint256(value: bigint, field: string): Result<bigint, ValidationError> {
	if (isUint256(value)) return ok(value);
	return err(
		new ValidationError(`${field} must be a uint256`, [
			{ path: [field], message: `must be within [0, 2^256 - 1], got ${value}` },
		]),
	);
}
