/**
 * Ledger events: the durable audit trail of every committed operation.
 *
 * Operations stage payloads while they run; the ledger state stamps each
 * payload with a sequence number and timestamp when the outermost atomic
 * scope commits. Aborted operations never produce events.
 */

import type { Hex } from "../lib/ethereum/index.js";
import type {
	Address,
	ConditionId,
	PositionId,
	QuestionId,
	SlotId,
} from "../shared/identifiers.js";

export interface ConditionPreparation {
	readonly type: "condition_preparation";
	readonly conditionId: ConditionId;
	readonly oracle: Address;
	readonly questionId: QuestionId;
	readonly outcomeSlotCount: bigint;
}

export interface ConditionResolution {
	readonly type: "condition_resolution";
	readonly conditionId: ConditionId;
	readonly oracle: Address;
	readonly questionId: QuestionId;
	readonly outcomeSlotCount: bigint;
	readonly payoutNumerators: readonly bigint[];
	/** Raw report exactly as the oracle submitted it */
	readonly result: Hex;
}

export interface PositionSplit {
	readonly type: "position_split";
	readonly stakeholder: Address;
	readonly collateralAsset: Address;
	readonly parentSlotId: SlotId;
	readonly conditionId: ConditionId;
	readonly amount: bigint;
}

export interface PositionMerge {
	readonly type: "position_merge";
	readonly stakeholder: Address;
	readonly collateralAsset: Address;
	readonly parentSlotId: SlotId;
	readonly conditionId: ConditionId;
	readonly amount: bigint;
}

export interface PayoutRedemption {
	readonly type: "payout_redemption";
	readonly redeemer: Address;
	readonly collateralAsset: Address;
	readonly parentSlotId: SlotId;
	readonly conditionId: ConditionId;
	readonly payout: bigint;
}

export interface Transfer {
	readonly type: "transfer";
	readonly operator: Address;
	readonly from: Address;
	readonly to: Address;
	readonly id: PositionId;
	readonly value: bigint;
}

export interface TransferBatch {
	readonly type: "transfer_batch";
	readonly operator: Address;
	readonly from: Address;
	readonly to: Address;
	readonly ids: readonly PositionId[];
	readonly values: readonly bigint[];
}

export interface Approval {
	readonly type: "approval";
	readonly owner: Address;
	readonly spender: Address;
	readonly id: PositionId;
	readonly oldValue: bigint;
	readonly value: bigint;
}

/** What an operation stages; carries no ordering metadata yet. */
export type LedgerEventPayload =
	| ConditionPreparation
	| ConditionResolution
	| PositionSplit
	| PositionMerge
	| PayoutRedemption
	| Transfer
	| TransferBatch
	| Approval;

/** Metadata stamped at commit time. */
export interface EventMeta {
	/** Monotonic per ledger, starting at 1 */
	readonly sequence: number;
	readonly timestamp: number;
}

/** A committed event. */
export type LedgerEvent = LedgerEventPayload & EventMeta;

export type LedgerEventType = LedgerEvent["type"];

export type LedgerEventOf<K extends LedgerEventType> = Extract<LedgerEvent, { readonly type: K }>;

export const LEDGER_EVENT_TYPES: readonly LedgerEventType[] = [
	"condition_preparation",
	"condition_resolution",
	"position_split",
	"position_merge",
	"payout_redemption",
	"transfer",
	"transfer_batch",
	"approval",
];

/** Type guard narrowing a committed event to one type. */
export function isEventOf<K extends LedgerEventType>(
	event: LedgerEvent,
	type: K,
): event is LedgerEventOf<K> {
	return event.type === type;
}
