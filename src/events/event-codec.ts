/**
 * JSON codec for ledger events.
 *
 * uint256 fields are written as base-10 strings; decoding validates every
 * field and restores the branded identifier types.
 */

import {
	addressSchema,
	bytes32Schema,
	hexBytesSchema,
	uint256StringSchema,
	validate,
	z,
} from "../lib/validation/index.js";
import type { ValidationError } from "../lib/validation/index.js";
import { conditionId, positionId, questionId, slotId } from "../shared/identifiers.js";
import type { Result } from "../shared/result.js";
import type { LedgerEvent } from "./ledger-events.js";

const meta = {
	sequence: z.number().int().positive(),
	timestamp: z.number().finite(),
};

const conditionIdSchema = bytes32Schema.transform((v) => conditionId(v));
const questionIdSchema = bytes32Schema.transform((v) => questionId(v));
const slotIdSchema = uint256StringSchema.transform((v) => slotId(v));
const positionIdSchema = uint256StringSchema.transform((v) => positionId(v));

const positionChange = {
	stakeholder: addressSchema,
	collateralAsset: addressSchema,
	parentSlotId: slotIdSchema,
	conditionId: conditionIdSchema,
	amount: uint256StringSchema,
};

const ledgerEventSchema: z.ZodType<LedgerEvent, z.ZodTypeDef, unknown> = z.discriminatedUnion(
	"type",
	[
		z.object({
			type: z.literal("condition_preparation"),
			...meta,
			conditionId: conditionIdSchema,
			oracle: addressSchema,
			questionId: questionIdSchema,
			outcomeSlotCount: uint256StringSchema,
		}),
		z.object({
			type: z.literal("condition_resolution"),
			...meta,
			conditionId: conditionIdSchema,
			oracle: addressSchema,
			questionId: questionIdSchema,
			outcomeSlotCount: uint256StringSchema,
			payoutNumerators: z.array(uint256StringSchema),
			result: hexBytesSchema,
		}),
		z.object({ type: z.literal("position_split"), ...meta, ...positionChange }),
		z.object({ type: z.literal("position_merge"), ...meta, ...positionChange }),
		z.object({
			type: z.literal("payout_redemption"),
			...meta,
			redeemer: addressSchema,
			collateralAsset: addressSchema,
			parentSlotId: slotIdSchema,
			conditionId: conditionIdSchema,
			payout: uint256StringSchema,
		}),
		z.object({
			type: z.literal("transfer"),
			...meta,
			operator: addressSchema,
			from: addressSchema,
			to: addressSchema,
			id: positionIdSchema,
			value: uint256StringSchema,
		}),
		z.object({
			type: z.literal("transfer_batch"),
			...meta,
			operator: addressSchema,
			from: addressSchema,
			to: addressSchema,
			ids: z.array(positionIdSchema),
			values: z.array(uint256StringSchema),
		}),
		z.object({
			type: z.literal("approval"),
			...meta,
			owner: addressSchema,
			spender: addressSchema,
			id: positionIdSchema,
			oldValue: uint256StringSchema,
			value: uint256StringSchema,
		}),
	],
);

function bigintReplacer(_key: string, value: unknown): unknown {
	return typeof value === "bigint" ? value.toString() : value;
}

/** Serializes an event to a single JSON line (no trailing newline). */
export function encodeEvent(event: LedgerEvent): string {
	return JSON.stringify(event, bigintReplacer);
}

/** Validates a parsed JSON value back into a LedgerEvent. */
export function decodeEvent(record: unknown): Result<LedgerEvent, ValidationError> {
	return validate(ledgerEventSchema, record);
}
