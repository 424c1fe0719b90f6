import { bench, describe } from "vitest";
import { TestLedgerBuilder } from "../src/ledger/testing/test-ledger.js";
import { ROOT_SLOT, address, questionIdFromLabel } from "../src/shared/identifiers.js";
import { unwrap } from "../src/shared/result.js";

describe("split and merge", () => {
	const alice = address("0x1111111111111111111111111111111111111111");
	const oracle = address("0x9999999999999999999999999999999999999999");
	const { ledger, collateralAsset } = new TestLedgerBuilder().withFunds(alice, 1_000_000n).build();
	const binary = unwrap(ledger.conditions.prepareCondition(oracle, questionIdFromLabel("Q1"), 2n));
	const wide = unwrap(ledger.conditions.prepareCondition(oracle, questionIdFromLabel("Q2"), 32n));

	bench("binary split + merge 100x", () => {
		for (let i = 0; i < 100; i++) {
			ledger.positions.splitPosition(alice, collateralAsset, ROOT_SLOT, binary, 10n);
			ledger.positions.mergePosition(alice, collateralAsset, ROOT_SLOT, binary, 10n);
		}
	});

	bench("32-outcome split + merge 100x", () => {
		for (let i = 0; i < 100; i++) {
			ledger.positions.splitPosition(alice, collateralAsset, ROOT_SLOT, wide, 10n);
			ledger.positions.mergePosition(alice, collateralAsset, ROOT_SLOT, wide, 10n);
		}
	});
});
