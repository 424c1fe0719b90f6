import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { encodeEvent } from "../events/event-codec.js";
import type { LedgerEvent } from "../events/ledger-events.js";
import { createLogger } from "../lib/logger/index.js";
import type { Journal } from "../persistence/journal.js";
import { MemoryJournal } from "../persistence/memory-journal.js";
import { DEFAULT_LEDGER_CONFIG } from "../shared/config.js";
import { ROOT_SLOT, address, questionIdFromLabel } from "../shared/identifiers.js";
import { unwrap } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";
import { RECEIVED_ACK } from "../token/receiver.js";
import { ConditionalLedger } from "./conditional-ledger.js";
import { TestLedgerBuilder } from "./testing/test-ledger.js";

const ALICE = address("0x1111111111111111111111111111111111111111");
const BOB = address("0x2222222222222222222222222222222222222222");
const CAROL = address("0x3333333333333333333333333333333333333333");
const ORACLE = address("0x9999999999999999999999999999999999999999");
const Q1 = questionIdFromLabel("Q1");
const Q2 = questionIdFromLabel("Q2");

function capture(): { lines: Record<string, unknown>[]; destination: { write(msg: string): void } } {
	const lines: Record<string, unknown>[] = [];
	return {
		lines,
		destination: {
			write(msg: string) {
				lines.push(JSON.parse(msg));
			},
		},
	};
}

function quietLedger(journal?: Journal): ConditionalLedger {
	return ConditionalLedger.create({
		config: { logLevel: "silent" },
		clock: new FakeClock(5_000),
		...(journal !== undefined && { journal }),
	});
}

describe("ConditionalLedger", () => {
	it("applies defaults when created without options", () => {
		const ledger = ConditionalLedger.create({ config: { logLevel: "silent" } });

		expect(ledger.config.custodyAddress).toBe(DEFAULT_LEDGER_CONFIG.custodyAddress);
		expect(ledger.lastSequence).toBe(0);
	});

	it("keeps ledgers isolated", () => {
		const first = quietLedger();
		const second = quietLedger();

		first.conditions.prepareCondition(ORACLE, Q1, 2n);

		const cid = first.conditions.getConditionId(ORACLE, Q1, 2n);
		expect(first.conditions.getOutcomeSlotCount(cid)).toBe(2n);
		expect(second.conditions.getOutcomeSlotCount(cid)).toBe(0n);
	});

	describe("subscriptions", () => {
		it("on() delivers only the requested type", () => {
			const ledger = quietLedger();
			const prepared: LedgerEvent[] = [];
			ledger.on("condition_preparation", (event) => {
				prepared.push(event);
			});

			ledger.conditions.prepareCondition(ORACLE, Q1, 2n);
			ledger.oracle.receiveResult(ORACLE, Q1, `0x${"00".repeat(31)}01${"00".repeat(32)}`);

			expect(prepared).toEqual([
				{
					type: "condition_preparation",
					conditionId: ledger.conditions.getConditionId(ORACLE, Q1, 2n),
					oracle: ORACLE,
					questionId: Q1,
					outcomeSlotCount: 2n,
					sequence: 1,
					timestamp: 5_000,
				},
			]);
			expect(ledger.lastSequence).toBe(2);
		});

		it("on() narrows the handler's event type", () => {
			const ledger = quietLedger();
			const counts: bigint[] = [];
			ledger.on("condition_preparation", (event) => {
				counts.push(event.outcomeSlotCount);
			});

			ledger.conditions.prepareCondition(ORACLE, Q1, 3n);

			expect(counts).toEqual([3n]);
		});

		it("onAny() delivers every event in sequence order", () => {
			const ledger = quietLedger();
			const sequences: number[] = [];
			ledger.onAny((event) => {
				sequences.push(event.sequence);
			});

			ledger.conditions.prepareCondition(ORACLE, Q1, 2n);
			ledger.conditions.prepareCondition(ORACLE, Q2, 2n);

			expect(sequences).toEqual([1, 2]);
		});

		it("failed operations deliver nothing", () => {
			const ledger = quietLedger();
			const handler = vi.fn();
			ledger.onAny(handler);

			ledger.conditions.prepareCondition(ORACLE, Q1, 0n);

			expect(handler).not.toHaveBeenCalled();
		});

		it("unsubscribe stops delivery", () => {
			const ledger = quietLedger();
			const handler = vi.fn();
			const unsubscribe = ledger.onAny(handler);

			ledger.conditions.prepareCondition(ORACLE, Q1, 2n);
			unsubscribe();
			ledger.conditions.prepareCondition(ORACLE, Q2, 2n);

			expect(handler).toHaveBeenCalledTimes(1);
		});

		it("events committed from a handler are delivered and journaled after the current batch", async () => {
			const { ledger, journal, collateralAsset } = new TestLedgerBuilder()
				.withFunds(ALICE, 100n)
				.build();
			const cid = unwrap(ledger.conditions.prepareCondition(ORACLE, Q1, 2n));
			unwrap(ledger.positions.splitPosition(ALICE, collateralAsset, ROOT_SLOT, cid, 10n));
			const [yes, no] = unwrap(ledger.positions.childPositionIds(collateralAsset, ROOT_SLOT, cid));
			if (yes === undefined || no === undefined) throw new Error("expected two positions");

			ledger.assets.registerReceiver(BOB, {
				onReceived: (_operator, _from, id, value) => {
					ledger.assets.transfer(BOB, BOB, CAROL, id, value);
					return RECEIVED_ACK;
				},
			});
			let followedUp = false;
			ledger.onAny(() => {
				if (followedUp) return;
				followedUp = true;
				ledger.assets.transfer(ALICE, ALICE, CAROL, no, 1n);
			});
			const delivered: number[] = [];
			ledger.onAny((event) => {
				delivered.push(event.sequence);
			});

			unwrap(ledger.assets.safeTransfer(ALICE, ALICE, BOB, yes, 2n));
			await ledger.flush();

			expect(delivered).toEqual([3, 4, 5]);
			expect(journal.entries().map((e) => e.sequence)).toEqual([1, 2, 3, 4, 5]);
			expect(ledger.assets.balanceOf(CAROL, yes)).toBe(2n);
			expect(ledger.assets.balanceOf(CAROL, no)).toBe(1n);
		});

		it("a throwing handler is logged and does not affect the operation or other handlers", () => {
			const { lines, destination } = capture();
			const ledger = ConditionalLedger.create({
				logger: createLogger({ level: "error", destination }),
			});
			ledger.onAny(() => {
				throw new Error("handler broke");
			});
			const after = vi.fn();
			ledger.onAny(after);

			const result = ledger.conditions.prepareCondition(ORACLE, Q1, 2n);

			expect(result.ok).toBe(true);
			expect(after).toHaveBeenCalledTimes(1);
			expect(lines).toHaveLength(1);
			expect(lines[0]?.["msg"]).toBe("event handler threw");
			expect(lines[0]?.["component"]).toBe("conditional-ledger");
			expect(lines[0]?.["sequence"]).toBe(1);
			expect(lines[0]?.["err"]).toMatchObject({ code: "SYSTEM_ERROR", message: "handler broke" });
		});
	});

	describe("journal", () => {
		it("records committed events after flush()", async () => {
			const journal = new MemoryJournal();
			const ledger = quietLedger(journal);

			ledger.conditions.prepareCondition(ORACLE, Q1, 2n);
			ledger.conditions.prepareCondition(ORACLE, Q1, 2n);
			await ledger.flush();

			expect(journal.entries().map((e) => e.type)).toEqual(["condition_preparation"]);
		});

		it("keeps and logs journal failures without failing operations", async () => {
			const { lines, destination } = capture();
			const journal: Journal = {
				record: () => Promise.reject(new Error("disk full")),
				flush: () => Promise.resolve(),
			};
			const ledger = ConditionalLedger.create({
				journal,
				logger: createLogger({ level: "error", destination }),
			});

			expect(ledger.conditions.prepareCondition(ORACLE, Q1, 2n).ok).toBe(true);
			await ledger.flush();

			expect(ledger.journalErrors().map((e) => e.message)).toEqual(["disk full"]);
			expect(lines[0]?.["msg"]).toBe("journal write failed");
		});

		it("a failed write does not block later writes", async () => {
			let calls = 0;
			const recorded: number[] = [];
			const journal: Journal = {
				record: (event) => {
					calls++;
					if (calls === 1) return Promise.reject(new Error("transient"));
					recorded.push(event.sequence);
					return Promise.resolve();
				},
				flush: () => Promise.resolve(),
			};
			const ledger = quietLedger(journal);

			ledger.conditions.prepareCondition(ORACLE, Q1, 2n);
			ledger.conditions.prepareCondition(ORACLE, Q2, 2n);
			await ledger.flush();

			expect(recorded).toEqual([2]);
			expect(ledger.journalErrors()).toHaveLength(1);
		});

		describe("with journalPath", () => {
			let tmpDir: string;

			beforeEach(async () => {
				tmpDir = await mkdtemp(join(tmpdir(), "ledger-"));
			});

			afterEach(async () => {
				await rm(tmpDir, { recursive: true, force: true });
			});

			it("writes a JSONL file", async () => {
				const journalPath = join(tmpDir, "events.jsonl");
				const events: LedgerEvent[] = [];
				const ledger = ConditionalLedger.create({
					config: { logLevel: "silent", journalPath },
					clock: new FakeClock(5_000),
				});
				ledger.onAny((event) => {
					events.push(event);
				});

				ledger.conditions.prepareCondition(ORACLE, Q1, 2n);
				await ledger.flush();

				const content = await readFile(journalPath, "utf-8");
				expect(content).toBe(`${events.map(encodeEvent).join("\n")}\n`);
			});
		});
	});
});
