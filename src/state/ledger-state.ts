/**
 * LedgerState: the five persisted tables plus the machinery that makes
 * every operation all-or-nothing.
 *
 * Each write pushes an undo closure. `atomic()` remembers the undo-log and
 * staged-event positions when a scope opens and unwinds to them if the scope
 * returns an error or throws. Scopes nest, so a receiver callback that calls
 * back into the ledger joins the enclosing operation's fate.
 */

import type { EventMeta, LedgerEvent, LedgerEventPayload } from "../events/ledger-events.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import {
	BalanceOverflowError,
	InsufficientAllowanceError,
	InsufficientBalanceError,
	isLedgerError,
} from "../shared/errors.js";
import type {
	Address,
	ConditionId,
	PositionId,
	QuestionId,
} from "../shared/identifiers.js";
import { holdingKey } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import { checkedAdd, checkedSub } from "../shared/uint256.js";

/** Stored condition attributes. */
export interface ConditionRecord {
	readonly conditionId: ConditionId;
	readonly oracle: Address;
	readonly questionId: QuestionId;
	readonly outcomeSlotCount: bigint;
}

/** Receives every batch of events committed by an outermost scope. */
export type CommitListener = (events: readonly LedgerEvent[]) => void;

export interface LedgerStateOptions {
	readonly clock?: Clock;
	readonly logger?: Logger;
	readonly onCommit?: CommitListener;
}

const NO_NUMERATORS: readonly bigint[] = [];

export class LedgerState {
	private readonly conditions = new Map<ConditionId, ConditionRecord>();
	private readonly numerators = new Map<ConditionId, readonly bigint[]>();
	private readonly denominators = new Map<ConditionId, bigint>();
	private readonly balances = new Map<string, bigint>();
	private readonly allowances = new Map<string, bigint>();

	private readonly undoLog: (() => void)[] = [];
	private readonly staged: LedgerEventPayload[] = [];
	private depth = 0;
	private sequence = 0;

	private readonly clock: Clock;
	private readonly logger: Logger;
	private readonly onCommit: CommitListener | null;

	constructor(options: LedgerStateOptions = {}) {
		this.clock = options.clock ?? SystemClock;
		this.logger = options.logger ?? silentLogger();
		this.onCommit = options.onCommit ?? null;
	}

	// ── Atomic scopes ────────────────────────────────────────────────

	/**
	 * Runs `fn` as one atomic step. An error result or a thrown exception
	 * discards every write and staged event since the scope opened; thrown
	 * exceptions are re-thrown after the rollback.
	 * @param operation - Name used in log lines
	 */
	atomic<T, E extends Error>(operation: string, fn: () => Result<T, E>): Result<T, E> {
		const undoMark = this.undoLog.length;
		const stagedMark = this.staged.length;

		this.depth++;
		let result: Result<T, E>;
		try {
			result = fn();
		} catch (error: unknown) {
			this.rollback(undoMark, stagedMark);
			throw error;
		} finally {
			this.depth--;
		}

		if (!result.ok) {
			this.rollback(undoMark, stagedMark);
			this.logger.debug(
				{
					operation,
					depth: this.depth,
					code: isLedgerError(result.error) ? result.error.code : result.error.name,
					reason: result.error.message,
				},
				"operation aborted",
			);
		} else if (this.depth === 0) {
			const committed = this.commit();
			this.logger.debug({ operation, events: committed }, "operation committed");
		}
		return result;
	}

	/** Queues an event to be published if the enclosing scope commits. */
	stage(payload: LedgerEventPayload): void {
		this.staged.push(payload);
	}

	/** True while an operation is running. */
	get inScope(): boolean {
		return this.depth > 0;
	}

	/** Sequence number of the last committed event (0 before any). */
	get lastSequence(): number {
		return this.sequence;
	}

	private rollback(undoMark: number, stagedMark: number): void {
		while (this.undoLog.length > undoMark) {
			this.undoLog.pop()?.();
		}
		this.staged.length = stagedMark;
	}

	private commit(): number {
		this.undoLog.length = 0;
		if (this.staged.length === 0) return 0;

		const timestamp = this.clock.now();
		const events: LedgerEvent[] = this.staged.map((payload) => {
			const meta: EventMeta = { sequence: ++this.sequence, timestamp };
			return { ...payload, ...meta };
		});
		this.staged.length = 0;
		this.onCommit?.(events);
		return events.length;
	}

	private write<K, V>(table: Map<K, V>, key: K, value: V | undefined): void {
		const existed = table.has(key);
		const previous = table.get(key);
		this.undoLog.push(() => {
			if (existed && previous !== undefined) {
				table.set(key, previous);
			} else {
				table.delete(key);
			}
		});
		if (value === undefined) {
			table.delete(key);
		} else {
			table.set(key, value);
		}
	}

	// ── Conditions and payouts ───────────────────────────────────────

	getCondition(id: ConditionId): ConditionRecord | null {
		return this.conditions.get(id) ?? null;
	}

	setCondition(record: ConditionRecord): void {
		this.write(this.conditions, record.conditionId, record);
	}

	getPayoutNumerators(id: ConditionId): readonly bigint[] {
		return this.numerators.get(id) ?? NO_NUMERATORS;
	}

	setPayoutNumerators(id: ConditionId, values: readonly bigint[]): void {
		this.write(this.numerators, id, Object.freeze([...values]));
	}

	getPayoutDenominator(id: ConditionId): bigint {
		return this.denominators.get(id) ?? 0n;
	}

	setPayoutDenominator(id: ConditionId, value: bigint): void {
		this.write(this.denominators, id, value);
	}

	// ── Balances ─────────────────────────────────────────────────────

	getBalance(owner: Address, id: PositionId): bigint {
		return this.balances.get(holdingKey(owner, id)) ?? 0n;
	}

	private setBalance(owner: Address, id: PositionId, value: bigint): void {
		this.write(this.balances, holdingKey(owner, id), value === 0n ? undefined : value);
	}

	/** Adds `amount` to a balance; fails if the result leaves uint256. */
	credit(owner: Address, id: PositionId, amount: bigint): Result<void, BalanceOverflowError> {
		const next = checkedAdd(this.getBalance(owner, id), amount);
		if (next === null) {
			return err(
				new BalanceOverflowError("Position balance would exceed 2^256 - 1", {
					owner,
					positionId: id,
					amount,
				}),
			);
		}
		this.setBalance(owner, id, next);
		return ok(undefined);
	}

	/** Subtracts `amount` from a balance; fails on underflow. */
	debit(owner: Address, id: PositionId, amount: bigint): Result<void, InsufficientBalanceError> {
		const balance = this.getBalance(owner, id);
		const next = checkedSub(balance, amount);
		if (next === null) {
			return err(
				new InsufficientBalanceError("Insufficient position balance", {
					owner,
					positionId: id,
					balance,
					required: amount,
				}),
			);
		}
		this.setBalance(owner, id, next);
		return ok(undefined);
	}

	/** Zeroes a balance and returns what it held. */
	take(owner: Address, id: PositionId): bigint {
		const balance = this.getBalance(owner, id);
		if (balance !== 0n) this.setBalance(owner, id, 0n);
		return balance;
	}

	// ── Allowances ───────────────────────────────────────────────────

	getAllowance(id: PositionId, owner: Address, spender: Address): bigint {
		return this.allowances.get(allowanceKey(id, owner, spender)) ?? 0n;
	}

	setAllowance(id: PositionId, owner: Address, spender: Address, value: bigint): void {
		this.write(this.allowances, allowanceKey(id, owner, spender), value === 0n ? undefined : value);
	}

	/** Consumes `amount` of a spender's allowance; fails on underflow. */
	spendAllowance(
		id: PositionId,
		owner: Address,
		spender: Address,
		amount: bigint,
	): Result<void, InsufficientAllowanceError> {
		const allowance = this.getAllowance(id, owner, spender);
		const next = checkedSub(allowance, amount);
		if (next === null) {
			return err(
				new InsufficientAllowanceError("Insufficient allowance", {
					owner,
					spender,
					positionId: id,
					allowance,
					required: amount,
				}),
			);
		}
		this.setAllowance(id, owner, spender, next);
		return ok(undefined);
	}
}

function allowanceKey(id: PositionId, owner: Address, spender: Address): string {
	return `${id.toString(16)}:${owner}:${spender}`;
}
