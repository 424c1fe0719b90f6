import { describe, expect, it } from "vitest";
import type { LedgerEvent } from "../events/ledger-events.js";
import { address, positionId } from "../shared/identifiers.js";
import { MemoryJournal } from "./memory-journal.js";

const ALICE = address("0x1111111111111111111111111111111111111111");
const BOB = address("0x2222222222222222222222222222222222222222");

function makeTransfer(sequence: number): LedgerEvent {
	return {
		type: "transfer",
		operator: ALICE,
		from: ALICE,
		to: BOB,
		id: positionId(7n),
		value: 1n,
		sequence,
		timestamp: sequence,
	};
}

function makeApproval(sequence: number): LedgerEvent {
	return {
		type: "approval",
		owner: ALICE,
		spender: BOB,
		id: positionId(7n),
		oldValue: 0n,
		value: 5n,
		sequence,
		timestamp: sequence,
	};
}

describe("MemoryJournal", () => {
	it("keeps events in insertion order", async () => {
		const journal = new MemoryJournal();

		await journal.record(makeTransfer(2));
		await journal.record(makeTransfer(1));

		expect(journal.entries().map((e) => e.sequence)).toEqual([2, 1]);
		expect(journal.size).toBe(2);
	});

	it("entriesOf() filters by type", async () => {
		const journal = new MemoryJournal();
		await journal.record(makeTransfer(1));
		await journal.record(makeApproval(2));
		await journal.record(makeTransfer(3));

		expect(journal.entriesOf("approval")).toEqual([makeApproval(2)]);
		expect(journal.entriesOf("transfer_batch")).toEqual([]);
	});

	it("drops the oldest events beyond maxEntries", async () => {
		const journal = new MemoryJournal({ maxEntries: 2 });

		for (let i = 1; i <= 5; i++) {
			await journal.record(makeTransfer(i));
		}

		expect(journal.entries().map((e) => e.sequence)).toEqual([4, 5]);
	});

	it("entries() returns a copy", async () => {
		const journal = new MemoryJournal();
		await journal.record(makeTransfer(1));

		journal.entries().pop();

		expect(journal.size).toBe(1);
	});

	it("clear() empties the journal", async () => {
		const journal = new MemoryJournal();
		await journal.record(makeTransfer(1));

		journal.clear();

		expect(journal.entries()).toEqual([]);
		await expect(journal.flush()).resolves.toBeUndefined();
	});
});
