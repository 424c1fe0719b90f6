import {
	AlreadyPreparedError,
	InvalidOutcomeSlotCountError,
	type LedgerError,
} from "../shared/errors.js";
import type { Address, ConditionId, QuestionId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { LedgerState } from "../state/ledger-state.js";
import { getConditionId } from "./condition-id.js";
import type { Condition, PayoutVector } from "./types.js";

/** Largest outcome slot count a condition may declare. */
export const MAX_OUTCOME_SLOT_COUNT = 256n;

/**
 * Creates conditions and answers questions about them.
 *
 * A condition is "prepared" once its payout-numerator vector exists; that
 * vector's length is the outcome slot count every other component relies on.
 *
 * @example
 * ```ts
 * const registry = new ConditionRegistry(state);
 * const cid = unwrap(registry.prepareCondition(oracle, questionIdFromLabel("Q1"), 2n));
 * registry.getOutcomeSlotCount(cid); // 2n
 * ```
 */
export class ConditionRegistry {
	private readonly state: LedgerState;

	constructor(state: LedgerState) {
		this.state = state;
	}

	/**
	 * Registers a condition and allocates its zeroed payout vector.
	 * @returns The derived condition id
	 */
	prepareCondition(
		oracle: Address,
		questionId: QuestionId,
		outcomeSlotCount: bigint,
	): Result<ConditionId, LedgerError> {
		return this.state.atomic("prepareCondition", (): Result<ConditionId, LedgerError> => {
			if (outcomeSlotCount < 1n || outcomeSlotCount > MAX_OUTCOME_SLOT_COUNT) {
				return err(
					new InvalidOutcomeSlotCountError(
						`Outcome slot count must be between 1 and ${MAX_OUTCOME_SLOT_COUNT}`,
						{ outcomeSlotCount },
					),
				);
			}

			const id = getConditionId(oracle, questionId, outcomeSlotCount);
			if (this.state.getPayoutNumerators(id).length !== 0) {
				return err(
					new AlreadyPreparedError("Condition already prepared", {
						conditionId: id,
						oracle,
						questionId,
					}),
				);
			}

			this.state.setCondition({ conditionId: id, oracle, questionId, outcomeSlotCount });
			this.state.setPayoutNumerators(
				id,
				Array.from({ length: Number(outcomeSlotCount) }, () => 0n),
			);
			this.state.stage({
				type: "condition_preparation",
				conditionId: id,
				oracle,
				questionId,
				outcomeSlotCount,
			});
			return ok(id);
		});
	}

	/** Declared outcome count, or 0n if the condition was never prepared. */
	getOutcomeSlotCount(id: ConditionId): bigint {
		return BigInt(this.state.getPayoutNumerators(id).length);
	}

	getCondition(id: ConditionId): Condition | null {
		return this.state.getCondition(id);
	}

	getConditionId(oracle: Address, questionId: QuestionId, outcomeSlotCount: bigint): ConditionId {
		return getConditionId(oracle, questionId, outcomeSlotCount);
	}

	/** Copy of the numerator vector; empty for an unprepared condition. */
	payoutNumerators(id: ConditionId): bigint[] {
		return [...this.state.getPayoutNumerators(id)];
	}

	payoutDenominator(id: ConditionId): bigint {
		return this.state.getPayoutDenominator(id);
	}

	payoutVector(id: ConditionId): PayoutVector {
		return {
			numerators: this.state.getPayoutNumerators(id),
			denominator: this.state.getPayoutDenominator(id),
		};
	}

	isResolved(id: ConditionId): boolean {
		return this.state.getPayoutDenominator(id) > 0n;
	}
}
