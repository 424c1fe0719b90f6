import { hashConditionTriple } from "../lib/ethereum/index.js";
import {
	type Address,
	type ConditionId,
	type QuestionId,
	conditionId,
} from "../shared/identifiers.js";

/**
 * keccak256(oracle ‖ questionId ‖ outcomeSlotCount), the only link between
 * a condition and the oracle allowed to resolve it.
 */
export function getConditionId(
	oracle: Address,
	questionId: QuestionId,
	outcomeSlotCount: bigint,
): ConditionId {
	return conditionId(hashConditionTriple(oracle, questionId, outcomeSlotCount));
}
