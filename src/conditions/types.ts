/**
 * Condition domain types.
 */

import type { ConditionRecord } from "../state/ledger-state.js";

export type Condition = ConditionRecord;

/** A condition's resolution state as stored. */
export interface PayoutVector {
	/** One entry per outcome slot; all zero until resolved */
	readonly numerators: readonly bigint[];
	/** Sum of numerators; 0 means unresolved */
	readonly denominator: bigint;
}
