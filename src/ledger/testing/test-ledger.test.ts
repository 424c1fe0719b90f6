import { describe, expect, it } from "vitest";
import { address, questionIdFromLabel } from "../../shared/identifiers.js";
import { MAX_UINT256 } from "../../shared/uint256.js";
import { TestLedgerBuilder } from "./test-ledger.js";

const ALICE = address("0x1111111111111111111111111111111111111111");
const ORACLE = address("0x9999999999999999999999999999999999999999");
const OTHER = address("0x6666666666666666666666666666666666666666");
const CUSTODY = address("0x7777777777777777777777777777777777777777");

describe("TestLedgerBuilder", () => {
	it("funds holders and approves custody", () => {
		const { token, custody } = new TestLedgerBuilder().withFunds(ALICE, 500n).build();

		expect(custody).toBe(CUSTODY);
		expect(token.balanceOf(ALICE)).toBe(500n);
		expect(token.allowance(ALICE, CUSTODY)).toBe(MAX_UINT256);
	});

	it("stamps events from the fake clock", async () => {
		const t = new TestLedgerBuilder().withClockAt(1_000).build();
		t.clock.advance(250);

		t.ledger.conditions.prepareCondition(ORACLE, questionIdFromLabel("Q1"), 2n);
		await t.ledger.flush();

		expect(t.events().map((e) => e.timestamp)).toEqual([1_250]);
		expect(t.journal.entries()).toEqual(t.events());
	});

	it("registers the chosen collateral asset", () => {
		const { ledger, collateralAsset } = new TestLedgerBuilder().withCollateralAsset(OTHER).build();

		expect(collateralAsset).toBe(OTHER);
		expect(ledger.collateral.get(OTHER)).not.toBeNull();
	});

	it("uses the chosen custody address for the ledger", () => {
		const custody = address("0x8888888888888888888888888888888888888888");
		const { ledger } = new TestLedgerBuilder().withCustody(custody).build();

		expect(ledger.config.custodyAddress).toBe(custody);
	});
});
