import { describe, expect, it } from "vitest";
import type { LedgerEvent } from "../events/ledger-events.js";
import { InsufficientBalanceError } from "../shared/errors.js";
import { address, conditionId, positionId, questionIdFromLabel } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";
import { MAX_UINT256 } from "../shared/uint256.js";
import { LedgerState } from "./ledger-state.js";

const ALICE = address("0x1111111111111111111111111111111111111111");
const BOB = address("0x2222222222222222222222222222222222222222");
const ORACLE = address("0x9999999999999999999999999999999999999999");
const ID = positionId(42n);
const CID = conditionId(`0x${"0c".repeat(32)}`);

function setup(): { state: LedgerState; committed: LedgerEvent[][]; clock: FakeClock } {
	const committed: LedgerEvent[][] = [];
	const clock = new FakeClock(5_000);
	const state = new LedgerState({ clock, onCommit: (events) => committed.push([...events]) });
	return { state, committed, clock };
}

function approval(value: bigint) {
	return { type: "approval", owner: ALICE, spender: BOB, id: ID, oldValue: 0n, value } as const;
}

describe("LedgerState", () => {
	describe("atomic", () => {
		it("commits staged events with sequence and timestamp", () => {
			const { state, committed } = setup();

			state.atomic("op", () => {
				state.stage(approval(1n));
				state.stage(approval(2n));
				return ok(undefined);
			});

			expect(committed).toEqual([
				[
					{ ...approval(1n), sequence: 1, timestamp: 5_000 },
					{ ...approval(2n), sequence: 2, timestamp: 5_000 },
				],
			]);
			expect(state.lastSequence).toBe(2);
		});

		it("keeps sequence numbers increasing across operations", () => {
			const { state, committed, clock } = setup();

			state.atomic("first", () => {
				state.stage(approval(1n));
				return ok(undefined);
			});
			clock.advance(10);
			state.atomic("second", () => {
				state.stage(approval(2n));
				return ok(undefined);
			});

			expect(committed.flat().map((e) => [e.sequence, e.timestamp])).toEqual([
				[1, 5_000],
				[2, 5_010],
			]);
		});

		it("does not call the listener when nothing was staged", () => {
			const { state, committed } = setup();
			state.atomic("read", () => ok(state.getBalance(ALICE, ID)));
			expect(committed).toEqual([]);
		});

		it("rolls back writes and events when fn returns err", () => {
			const { state, committed } = setup();

			const result = state.atomic("op", (): Result<void, InsufficientBalanceError> => {
				state.credit(ALICE, ID, 100n);
				state.setAllowance(ID, ALICE, BOB, 5n);
				state.stage(approval(5n));
				return err(new InsufficientBalanceError("stop"));
			});

			expect(result.ok).toBe(false);
			expect(state.getBalance(ALICE, ID)).toBe(0n);
			expect(state.getAllowance(ID, ALICE, BOB)).toBe(0n);
			expect(committed).toEqual([]);
			expect(state.lastSequence).toBe(0);
		});

		it("rolls back and rethrows when fn throws", () => {
			const { state, committed } = setup();
			state.atomic("seed", () => state.credit(ALICE, ID, 10n));

			expect(() =>
				state.atomic("op", () => {
					state.debit(ALICE, ID, 4n);
					state.stage(approval(1n));
					throw new Error("receiver exploded");
				}),
			).toThrow("receiver exploded");

			expect(state.getBalance(ALICE, ID)).toBe(10n);
			expect(committed).toEqual([]);
			expect(state.inScope).toBe(false);
		});

		it("a failing inner scope unwinds only its own writes", () => {
			const { state, committed } = setup();

			const outer = state.atomic("outer", () => {
				state.credit(ALICE, ID, 7n);
				state.stage(approval(7n));
				const inner = state.atomic("inner", (): Result<void, InsufficientBalanceError> => {
					state.credit(BOB, ID, 3n);
					state.stage(approval(3n));
					return err(new InsufficientBalanceError("inner"));
				});
				expect(inner.ok).toBe(false);
				return ok(undefined);
			});

			expect(outer.ok).toBe(true);
			expect(state.getBalance(ALICE, ID)).toBe(7n);
			expect(state.getBalance(BOB, ID)).toBe(0n);
			expect(committed).toHaveLength(1);
			expect(committed[0]?.map((e) => e.type === "approval" && e.value)).toEqual([7n]);
		});

		it("a failing outer scope unwinds a committed inner scope", () => {
			const { state, committed } = setup();

			state.atomic("outer", (): Result<void, InsufficientBalanceError> => {
				state.atomic("inner", () => state.credit(BOB, ID, 3n));
				return err(new InsufficientBalanceError("outer"));
			});

			expect(state.getBalance(BOB, ID)).toBe(0n);
			expect(committed).toEqual([]);
		});

		it("reports inScope only while running", () => {
			const { state } = setup();
			let during = false;
			state.atomic("op", () => {
				during = state.inScope;
				return ok(undefined);
			});
			expect(during).toBe(true);
			expect(state.inScope).toBe(false);
		});
	});

	describe("balances", () => {
		it("credit adds and debit subtracts", () => {
			const { state } = setup();
			state.credit(ALICE, ID, 10n);
			state.debit(ALICE, ID, 4n);
			expect(state.getBalance(ALICE, ID)).toBe(6n);
		});

		it("debit fails with the balance and requirement", () => {
			const { state } = setup();
			state.credit(ALICE, ID, 3n);

			const result = state.debit(ALICE, ID, 5n);

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.code).toBe("INSUFFICIENT_BALANCE");
				expect(result.error.context).toEqual({
					owner: ALICE,
					positionId: ID,
					balance: 3n,
					required: 5n,
				});
			}
			expect(state.getBalance(ALICE, ID)).toBe(3n);
		});

		it("credit fails past 2^256 - 1", () => {
			const { state } = setup();
			state.credit(ALICE, ID, MAX_UINT256);

			const result = state.credit(ALICE, ID, 1n);

			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe("BALANCE_OVERFLOW");
			expect(state.getBalance(ALICE, ID)).toBe(MAX_UINT256);
		});

		it("take zeroes and returns the balance", () => {
			const { state } = setup();
			state.credit(ALICE, ID, 9n);

			expect(state.take(ALICE, ID)).toBe(9n);
			expect(state.getBalance(ALICE, ID)).toBe(0n);
			expect(state.take(ALICE, ID)).toBe(0n);
		});

		it("keeps holders independent", () => {
			const { state } = setup();
			state.credit(ALICE, ID, 1n);
			expect(state.getBalance(BOB, ID)).toBe(0n);
			expect(state.getBalance(ALICE, positionId(43n))).toBe(0n);
		});
	});

	describe("allowances", () => {
		it("spendAllowance consumes and rejects overspend", () => {
			const { state } = setup();
			state.setAllowance(ID, ALICE, BOB, 5n);

			expect(state.spendAllowance(ID, ALICE, BOB, 2n).ok).toBe(true);
			expect(state.getAllowance(ID, ALICE, BOB)).toBe(3n);

			const over = state.spendAllowance(ID, ALICE, BOB, 4n);
			expect(over.ok).toBe(false);
			if (!over.ok) expect(over.error.code).toBe("INSUFFICIENT_ALLOWANCE");
			expect(state.getAllowance(ID, ALICE, BOB)).toBe(3n);
		});

		it("is directional", () => {
			const { state } = setup();
			state.setAllowance(ID, ALICE, BOB, 5n);
			expect(state.getAllowance(ID, BOB, ALICE)).toBe(0n);
		});
	});

	describe("conditions", () => {
		it("stores records and payout vectors", () => {
			const { state } = setup();
			const record = {
				conditionId: CID,
				oracle: ORACLE,
				questionId: questionIdFromLabel("Q1"),
				outcomeSlotCount: 2n,
			};

			state.setCondition(record);
			state.setPayoutNumerators(CID, [0n, 0n]);

			expect(state.getCondition(CID)).toEqual(record);
			expect(state.getPayoutNumerators(CID)).toEqual([0n, 0n]);
			expect(state.getPayoutDenominator(CID)).toBe(0n);
		});

		it("returns null and empty for unknown conditions", () => {
			const { state } = setup();
			expect(state.getCondition(CID)).toBeNull();
			expect(state.getPayoutNumerators(CID)).toEqual([]);
		});

		it("freezes the stored numerator vector", () => {
			const { state } = setup();
			const source = [1n, 2n];
			state.setPayoutNumerators(CID, source);
			source[0] = 99n;

			expect(state.getPayoutNumerators(CID)).toEqual([1n, 2n]);
			expect(Object.isFrozen(state.getPayoutNumerators(CID))).toBe(true);
		});

		it("rolls back a condition write", () => {
			const { state } = setup();
			state.atomic("op", (): Result<void, InsufficientBalanceError> => {
				state.setPayoutNumerators(CID, [0n, 0n]);
				state.setPayoutDenominator(CID, 4n);
				return err(new InsufficientBalanceError("abort"));
			});
			expect(state.getPayoutNumerators(CID)).toEqual([]);
			expect(state.getPayoutDenominator(CID)).toBe(0n);
		});
	});
});
