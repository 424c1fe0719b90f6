import { bench, describe } from "vitest";
import { getConditionId } from "../src/conditions/condition-id.js";
import { deriveSlotPath, getPayoutSlotId, getPositionId } from "../src/position/slot-id.js";
import { ROOT_SLOT, address, questionIdFromLabel } from "../src/shared/identifiers.js";

describe("slot derivation", () => {
	const oracle = address("0x9999999999999999999999999999999999999999");
	const collateral = address("0x5555555555555555555555555555555555555555");
	const outer = getConditionId(oracle, questionIdFromLabel("Q1"), 2n);
	const inner = getConditionId(oracle, questionIdFromLabel("Q2"), 3n);

	bench("payout slot id 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			getPayoutSlotId(ROOT_SLOT, outer, BigInt(i % 2));
		}
	});

	bench("two-step path + position id 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			const slot = deriveSlotPath(ROOT_SLOT, [
				{ conditionId: outer, index: 0n },
				{ conditionId: inner, index: BigInt(i % 3) },
			]);
			getPositionId(collateral, slot);
		}
	});
});
