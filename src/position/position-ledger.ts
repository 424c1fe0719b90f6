import type { CollateralRegistry } from "../collateral/collateral-registry.js";
import type { ConditionRegistry } from "../conditions/condition-registry.js";
import { requireUint256 } from "../lib/validation/index.js";
import {
	CollateralTransferFailedError,
	ConditionNotPreparedError,
	type LedgerError,
	ReentrantCollateralMoveError,
	ResultNotReceivedError,
} from "../shared/errors.js";
import {
	type Address,
	type ConditionId,
	type PositionId,
	type SlotId,
	isRootSlot,
} from "../shared/identifiers.js";
import { type Result, err, ok, sequence } from "../shared/result.js";
import { mulDiv } from "../shared/uint256.js";
import type { LedgerState } from "../state/ledger-state.js";
import { getPayoutSlotId, getPositionId } from "./slot-id.js";

export interface PositionLedgerDeps {
	readonly state: LedgerState;
	readonly conditions: ConditionRegistry;
	readonly collateral: CollateralRegistry;
	/** Account that holds collateral backing root-level positions */
	readonly custody: Address;
}

/**
 * Split, merge and redeem: the operations that create and destroy
 * positions while keeping every unit backed by exactly one unit of the
 * parent basket.
 *
 * External collateral calls run last in each operation, after every
 * balance check has passed, so collateral only moves for operations that
 * commit. Collateral never moves for an operation started from inside
 * another one (a receiver callback): the undo log cannot take it back.
 *
 * @example
 * ```ts
 * positions.splitPosition(alice, usdc, ROOT_SLOT, cid, 100n);
 * positions.mergePosition(alice, usdc, ROOT_SLOT, cid, 40n);
 * ```
 */
export class PositionLedger {
	private readonly state: LedgerState;
	private readonly conditions: ConditionRegistry;
	private readonly collateral: CollateralRegistry;
	private readonly custody: Address;

	constructor(deps: PositionLedgerDeps) {
		this.state = deps.state;
		this.conditions = deps.conditions;
		this.collateral = deps.collateral;
		this.custody = deps.custody;
	}

	/**
	 * Converts `amount` of the parent basket into `amount` of every outcome branch of `conditionId`.
	 * A root parent pulls collateral from `sender` into custody.
	 */
	splitPosition(
		sender: Address,
		collateralAsset: Address,
		parentSlotId: SlotId,
		conditionId: ConditionId,
		amount: bigint,
	): Result<void, LedgerError> {
		const nested = this.state.inScope;
		return this.state.atomic("splitPosition", (): Result<void, LedgerError> => {
			const checked = requireUint256(amount, "amount");
			if (!checked.ok) return checked;

			const children = this.children(collateralAsset, parentSlotId, conditionId);
			if (!children.ok) return children;

			if (!isRootSlot(parentSlotId)) {
				const debited = this.state.debit(
					sender,
					getPositionId(collateralAsset, parentSlotId),
					amount,
				);
				if (!debited.ok) return debited;
			}

			const credited = sequence(
				children.value.map((id) => () => this.state.credit(sender, id, amount)),
			);
			if (!credited.ok) return credited;

			if (isRootSlot(parentSlotId)) {
				const pulled = this.pullCollateral(collateralAsset, sender, amount, nested);
				if (!pulled.ok) return pulled;
			}

			this.state.stage({
				type: "position_split",
				stakeholder: sender,
				collateralAsset,
				parentSlotId,
				conditionId,
				amount,
			});
			return ok(undefined);
		});
	}

	/**
	 * Converts `amount` of every outcome branch back into `amount` of the parent basket.
	 * A root parent returns collateral from custody to `sender`.
	 */
	mergePosition(
		sender: Address,
		collateralAsset: Address,
		parentSlotId: SlotId,
		conditionId: ConditionId,
		amount: bigint,
	): Result<void, LedgerError> {
		const nested = this.state.inScope;
		return this.state.atomic("mergePosition", (): Result<void, LedgerError> => {
			const checked = requireUint256(amount, "amount");
			if (!checked.ok) return checked;

			const children = this.children(collateralAsset, parentSlotId, conditionId);
			if (!children.ok) return children;

			const debited = sequence(
				children.value.map((id) => () => this.state.debit(sender, id, amount)),
			);
			if (!debited.ok) return debited;

			const paid = this.payOut(sender, collateralAsset, parentSlotId, amount, nested);
			if (!paid.ok) return paid;

			this.state.stage({
				type: "position_merge",
				stakeholder: sender,
				collateralAsset,
				parentSlotId,
				conditionId,
				amount,
			});
			return ok(undefined);
		});
	}

	/**
	 * Burns every outcome branch `sender` holds under `parentSlotId` for a
	 * resolved condition and pays `Σ balance_i * numerator_i / denominator`
	 * into the parent basket. Truncation remainders stay unredeemed.
	 * @returns The total paid, 0n when nothing was held
	 */
	redeemPayout(
		sender: Address,
		collateralAsset: Address,
		parentSlotId: SlotId,
		conditionId: ConditionId,
	): Result<bigint, LedgerError> {
		const nested = this.state.inScope;
		return this.state.atomic("redeemPayout", (): Result<bigint, LedgerError> => {
			const denominator = this.state.getPayoutDenominator(conditionId);
			if (denominator === 0n) {
				return err(new ResultNotReceivedError("Condition not resolved", { conditionId }));
			}

			const numerators = this.state.getPayoutNumerators(conditionId);
			const children = this.children(collateralAsset, parentSlotId, conditionId);
			if (!children.ok) return children;

			let total = 0n;
			for (const [index, id] of children.value.entries()) {
				const balance = this.state.take(sender, id);
				if (balance === 0n) continue;
				total += mulDiv(balance, numerators[index] ?? 0n, denominator);
			}

			if (total > 0n) {
				const paid = this.payOut(sender, collateralAsset, parentSlotId, total, nested);
				if (!paid.ok) return paid;
			}

			this.state.stage({
				type: "payout_redemption",
				redeemer: sender,
				collateralAsset,
				parentSlotId,
				conditionId,
				payout: total,
			});
			return ok(total);
		});
	}

	/**
	 * Position ids of every outcome branch of `conditionId` under `parentSlotId`, in index order.
	 * @returns err(ConditionNotPreparedError) for an unprepared condition
	 */
	childPositionIds(
		collateralAsset: Address,
		parentSlotId: SlotId,
		conditionId: ConditionId,
	): Result<PositionId[], ConditionNotPreparedError> {
		return this.children(collateralAsset, parentSlotId, conditionId);
	}

	// ── Internal ──────────────────────────────────────────────────

	private children(
		collateralAsset: Address,
		parentSlotId: SlotId,
		conditionId: ConditionId,
	): Result<PositionId[], ConditionNotPreparedError> {
		const count = this.conditions.getOutcomeSlotCount(conditionId);
		if (count === 0n) {
			return err(new ConditionNotPreparedError("Condition not prepared", { conditionId }));
		}
		const ids: PositionId[] = [];
		for (let index = 0n; index < count; index++) {
			ids.push(getPositionId(collateralAsset, getPayoutSlotId(parentSlotId, conditionId, index)));
		}
		return ok(ids);
	}

	/** Root: collateral out of custody. Nested: credit the parent position. */
	private payOut(
		payee: Address,
		collateralAsset: Address,
		parentSlotId: SlotId,
		amount: bigint,
		nested: boolean,
	): Result<void, LedgerError> {
		if (!isRootSlot(parentSlotId)) {
			return this.state.credit(payee, getPositionId(collateralAsset, parentSlotId), amount);
		}
		if (nested) return err(reentrant(collateralAsset, "transfer"));
		const token = this.collateral.get(collateralAsset);
		if (token === null) return err(unregistered(collateralAsset));
		return callCollateral("transfer", collateralAsset, { payee, amount }, () =>
			token.transfer(this.custody, payee, amount),
		);
	}

	private pullCollateral(
		collateralAsset: Address,
		payer: Address,
		amount: bigint,
		nested: boolean,
	): Result<void, LedgerError> {
		if (nested) return err(reentrant(collateralAsset, "transferFrom"));
		const token = this.collateral.get(collateralAsset);
		if (token === null) return err(unregistered(collateralAsset));
		return callCollateral("transferFrom", collateralAsset, { payer, amount }, () =>
			token.transferFrom(this.custody, payer, this.custody, amount),
		);
	}
}

function reentrant(
	collateralAsset: Address,
	operation: "transfer" | "transferFrom",
): ReentrantCollateralMoveError {
	return new ReentrantCollateralMoveError("Collateral cannot move inside another ledger operation", {
		collateralAsset,
		operation,
	});
}

function unregistered(collateralAsset: Address): CollateralTransferFailedError {
	return new CollateralTransferFailedError("Collateral asset not registered", { collateralAsset });
}

function callCollateral(
	operation: "transfer" | "transferFrom",
	collateralAsset: Address,
	context: Record<string, unknown>,
	call: () => boolean,
): Result<void, CollateralTransferFailedError> {
	let succeeded: boolean;
	try {
		succeeded = call();
	} catch (error: unknown) {
		return err(
			new CollateralTransferFailedError(`Collateral ${operation} threw`, {
				...context,
				collateralAsset,
				cause: error,
			}),
		);
	}
	if (!succeeded) {
		return err(
			new CollateralTransferFailedError(`Collateral ${operation} returned false`, {
				...context,
				collateralAsset,
			}),
		);
	}
	return ok(undefined);
}
