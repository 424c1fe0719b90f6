import { type Hex, WORD_BYTES, packWords, unpackWords } from "../lib/ethereum/index.js";
import { type ValidationError, requireUint256 } from "../lib/validation/index.js";
import {
	AllZeroPayoutError,
	AlreadyResolvedError,
	BalanceOverflowError,
	type LedgerError,
	MalformedResultError,
	OutcomeCountMismatchError,
	PayoutAlreadySetError,
} from "../shared/errors.js";
import type { Address, QuestionId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { checkedAdd } from "../shared/uint256.js";
import type { LedgerState } from "../state/ledger-state.js";
import { getConditionId } from "./condition-id.js";
import type { PayoutVector } from "./types.js";

/**
 * Packs payout numerators into the byte layout `receiveResult` expects:
 * one big-endian 32-byte word per outcome slot.
 */
export function encodePayoutReport(numerators: readonly bigint[]): Result<Hex, ValidationError> {
	for (const [i, n] of numerators.entries()) {
		const checked = requireUint256(n, `numerators[${i}]`);
		if (!checked.ok) return checked;
	}
	return ok(packWords(numerators));
}

/** Splits a report into its numerators, rejecting empty or misaligned input. */
export function decodePayoutReport(result: Hex): Result<bigint[], MalformedResultError> {
	const words = unpackWords(result);
	if (words === null || words.length === 0) {
		return err(
			new MalformedResultError(
				`Result must be a non-empty multiple of ${WORD_BYTES} bytes of hex`,
				{ length: result.length },
			),
		);
	}
	return ok(words);
}

/**
 * Records oracle reports against prepared conditions.
 *
 * The reporting address is never stored: it is hashed together with the
 * question id and the report's outcome count, so a report from any other
 * address lands on a condition id that was never prepared.
 */
export class OracleIntake {
	private readonly state: LedgerState;

	constructor(state: LedgerState) {
		this.state = state;
	}

	/**
	 * Resolves the condition `(sender, questionId, result.length / 32)`.
	 * @param sender - The reporting oracle
	 * @param result - Packed payout numerators, see {@link encodePayoutReport}
	 */
	receiveResult(
		sender: Address,
		questionId: QuestionId,
		result: Hex,
	): Result<PayoutVector, LedgerError> {
		return this.state.atomic("receiveResult", (): Result<PayoutVector, LedgerError> => {
			const decoded = decodePayoutReport(result);
			if (!decoded.ok) return decoded;
			const reported = decoded.value;

			const outcomeSlotCount = BigInt(reported.length);
			const id = getConditionId(sender, questionId, outcomeSlotCount);
			const current = this.state.getPayoutNumerators(id);
			if (current.length !== reported.length) {
				return err(
					new OutcomeCountMismatchError("No condition prepared for this oracle and outcome count", {
						conditionId: id,
						oracle: sender,
						reported: reported.length,
					}),
				);
			}
			if (this.state.getPayoutDenominator(id) !== 0n) {
				return err(new AlreadyResolvedError("Condition already resolved", { conditionId: id }));
			}

			let denominator = 0n;
			for (const [index, numerator] of reported.entries()) {
				if (current[index] !== 0n) {
					return err(
						new PayoutAlreadySetError("Payout numerator already set", { conditionId: id, index }),
					);
				}
				const sum = checkedAdd(denominator, numerator);
				if (sum === null) {
					return err(
						new BalanceOverflowError("Payout denominator would exceed 2^256 - 1", {
							conditionId: id,
						}),
					);
				}
				denominator = sum;
			}
			if (denominator === 0n) {
				return err(new AllZeroPayoutError("Payout must be non-zero", { conditionId: id }));
			}

			this.state.setPayoutNumerators(id, reported);
			this.state.setPayoutDenominator(id, denominator);
			this.state.stage({
				type: "condition_resolution",
				conditionId: id,
				oracle: sender,
				questionId,
				outcomeSlotCount,
				payoutNumerators: reported,
				result,
			});
			return ok({ numerators: this.state.getPayoutNumerators(id), denominator });
		});
	}
}
