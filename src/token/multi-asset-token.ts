import type { Hex } from "../lib/ethereum/index.js";
import { ValidationError, requireUint256 } from "../lib/validation/index.js";
import {
	type LedgerError,
	StaleApprovalError,
	TransferRejectedByReceiverError,
} from "../shared/errors.js";
import type { Address, PositionId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";
import type { LedgerState } from "../state/ledger-state.js";
import { BATCH_RECEIVED_ACK, RECEIVED_ACK, type TokenReceiver } from "./receiver.js";

const EMPTY_DATA: Hex = "0x";

/**
 * Multi-asset transfer layer over the position balance table.
 *
 * Every position id is an asset id. Balances are the very same entries the
 * position ledger splits, merges and redeems; this class only adds
 * transfers, per-id allowances and receiver acknowledgment.
 *
 * @example
 * ```ts
 * assets.approve(alice, bob, id, 0n, 50n);
 * assets.transfer(bob, alice, carol, id, 20n); // bob spends alice's allowance
 * ```
 */
export class MultiAssetToken {
	private readonly state: LedgerState;
	private readonly receivers = new Map<Address, TokenReceiver>();

	constructor(state: LedgerState) {
		this.state = state;
	}

	// ── Receivers ──────────────────────────────────────────────────

	/** Marks `account` as contract-like: safe transfers to it require acknowledgment. */
	registerReceiver(account: Address, receiver: TokenReceiver): void {
		this.receivers.set(account, receiver);
	}

	unregisterReceiver(account: Address): boolean {
		return this.receivers.delete(account);
	}

	// ── Queries ──────────────────────────────────────────────────

	balanceOf(owner: Address, id: PositionId): bigint {
		return this.state.getBalance(owner, id);
	}

	/** Balances for each `(owners[i], ids[i])` pair. */
	balanceOfBatch(
		owners: readonly Address[],
		ids: readonly PositionId[],
	): Result<bigint[], ValidationError> {
		const lengths = matchLengths("owners", owners.length, "ids", ids.length);
		if (!lengths.ok) return lengths;
		const balances: bigint[] = [];
		for (const [i, id] of ids.entries()) {
			const owner = owners[i];
			balances.push(owner === undefined ? 0n : this.state.getBalance(owner, id));
		}
		return ok(balances);
	}

	allowance(owner: Address, spender: Address, id: PositionId): bigint {
		return this.state.getAllowance(id, owner, spender);
	}

	// ── Transfers ──────────────────────────────────────────────────

	/**
	 * Moves `value` of `id` from `from` to `to`. When `sender` is not `from`,
	 * the move spends `sender`'s allowance first.
	 */
	transfer(
		sender: Address,
		from: Address,
		to: Address,
		id: PositionId,
		value: bigint,
	): Result<void, LedgerError> {
		return this.state.atomic("transfer", (): Result<void, LedgerError> => {
			const moved = this.move(sender, from, to, id, value);
			if (!moved.ok) return moved;
			this.state.stage({ type: "transfer", operator: sender, from, to, id, value });
			return ok(undefined);
		});
	}

	/**
	 * Like {@link transfer}, then asks a registered receiver at `to` to
	 * acknowledge. A wrong answer or a throwing receiver undoes the transfer.
	 */
	safeTransfer(
		sender: Address,
		from: Address,
		to: Address,
		id: PositionId,
		value: bigint,
		data: Hex = EMPTY_DATA,
	): Result<void, LedgerError> {
		return this.state.atomic("safeTransfer", (): Result<void, LedgerError> => {
			const moved = this.move(sender, from, to, id, value);
			if (!moved.ok) return moved;
			this.state.stage({ type: "transfer", operator: sender, from, to, id, value });

			const receiver = this.receivers.get(to);
			if (receiver === undefined) return ok(undefined);
			return acknowledge(to, RECEIVED_ACK, () =>
				receiver.onReceived(sender, from, id, value, data),
			);
		});
	}

	/** Moves several ids at once; all or none. */
	safeBatchTransfer(
		sender: Address,
		from: Address,
		to: Address,
		ids: readonly PositionId[],
		values: readonly bigint[],
		data: Hex = EMPTY_DATA,
	): Result<void, LedgerError> {
		return this.state.atomic("safeBatchTransfer", (): Result<void, LedgerError> => {
			const lengths = matchLengths("ids", ids.length, "values", values.length);
			if (!lengths.ok) return lengths;

			for (const [i, id] of ids.entries()) {
				const moved = this.move(sender, from, to, id, values[i] ?? 0n);
				if (!moved.ok) return moved;
			}
			this.state.stage({
				type: "transfer_batch",
				operator: sender,
				from,
				to,
				ids: [...ids],
				values: [...values],
			});

			const receiver = this.receivers.get(to);
			if (receiver === undefined) return ok(undefined);
			const onBatchReceived = receiver.onBatchReceived;
			if (onBatchReceived === undefined) {
				return err(
					new TransferRejectedByReceiverError("Receiver does not accept batch transfers", {
						receiver: to,
					}),
				);
			}
			return acknowledge(to, BATCH_RECEIVED_ACK, () =>
				onBatchReceived.call(receiver, sender, from, ids, values, data),
			);
		});
	}

	// ── Approvals ──────────────────────────────────────────────────

	/**
	 * Sets `spender`'s allowance on `id` to `value`. Unless `value` is zero,
	 * the live allowance must still equal `currentValue`, so a spender cannot
	 * use the old allowance and then receive the new one on top.
	 */
	approve(
		sender: Address,
		spender: Address,
		id: PositionId,
		currentValue: bigint,
		value: bigint,
	): Result<void, LedgerError> {
		return this.state.atomic("approve", (): Result<void, LedgerError> => {
			const checked = requireUint256(value, "value");
			if (!checked.ok) return checked;

			const oldValue = this.state.getAllowance(id, sender, spender);
			if (value !== 0n && oldValue !== currentValue) {
				return err(
					new StaleApprovalError("Allowance changed since it was read", {
						owner: sender,
						spender,
						positionId: id,
						expected: currentValue,
						actual: oldValue,
					}),
				);
			}

			this.state.setAllowance(id, sender, spender, value);
			this.state.stage({ type: "approval", owner: sender, spender, id, oldValue, value });
			return ok(undefined);
		});
	}

	// ── Internal ──────────────────────────────────────────────────

	private move(
		sender: Address,
		from: Address,
		to: Address,
		id: PositionId,
		value: bigint,
	): Result<void, LedgerError> {
		const checked = requireUint256(value, "value");
		if (!checked.ok) return checked;

		if (sender !== from) {
			const spent = this.state.spendAllowance(id, from, sender, value);
			if (!spent.ok) return spent;
		}
		const debited = this.state.debit(from, id, value);
		if (!debited.ok) return debited;
		return this.state.credit(to, id, value);
	}
}

function matchLengths(
	leftName: string,
	left: number,
	rightName: string,
	right: number,
): Result<void, ValidationError> {
	if (left === right) return ok(undefined);
	return err(
		new ValidationError(`${leftName} and ${rightName} must have the same length`, [
			{ path: [rightName], message: `expected ${left} entries, got ${right}` },
		]),
	);
}

function acknowledge(
	receiver: Address,
	expected: string,
	call: () => string,
): Result<void, TransferRejectedByReceiverError> {
	let answer: string;
	try {
		answer = call();
	} catch (error: unknown) {
		return err(
			new TransferRejectedByReceiverError("Receiver threw during acknowledgment", {
				receiver,
				cause: error,
			}),
		);
	}
	if (answer.toLowerCase() !== expected) {
		return err(
			new TransferRejectedByReceiverError("Receiver returned the wrong acknowledgment", {
				receiver,
				expected,
				answer,
			}),
		);
	}
	return ok(undefined);
}
