/**
 * Slot and position identifier derivation.
 *
 * Slot ids compose by modular addition, so the order in which conditions
 * are nested does not change the resulting slot: splitting on A then B
 * lands on the same positions as splitting on B then A.
 */

import { hashOutcomeSlot, hashPosition } from "../lib/ethereum/index.js";
import {
	type Address,
	type ConditionId,
	type PositionId,
	type SlotId,
	positionId,
	slotId,
} from "../shared/identifiers.js";
import { wrappingAdd } from "../shared/uint256.js";

/** One nesting step: outcome `index` of `conditionId`. */
export interface SlotStep {
	readonly conditionId: ConditionId;
	readonly index: bigint;
}

/**
 * parentSlotId + keccak256(conditionId ‖ index), mod 2^256.
 * @throws Error if `index` is negative or wider than 256 bits
 */
export function getPayoutSlotId(parent: SlotId, conditionId: ConditionId, index: bigint): SlotId {
	return slotId(wrappingAdd(parent, hashOutcomeSlot(conditionId, index)));
}

/**
 * Folds a path of nesting steps onto `parent`.
 * @example
 * ```ts
 * const slot = deriveSlotPath(ROOT_SLOT, [
 *   { conditionId: election, index: 0n },
 *   { conditionId: policy, index: 1n },
 * ]);
 * ```
 */
export function deriveSlotPath(parent: SlotId, steps: Iterable<SlotStep>): SlotId {
	let slot = parent;
	for (const step of steps) {
		slot = getPayoutSlotId(slot, step.conditionId, step.index);
	}
	return slot;
}

/** keccak256(collateral ‖ slotId) as a uint256; the balance key and asset id. */
export function getPositionId(collateral: Address, slot: SlotId): PositionId {
	return positionId(hashPosition(collateral, slot));
}
