/**
 * MemoryCollateralToken: in-process fungible asset with ERC20 semantics.
 *
 * Used by tests, examples and benches in place of a real collateral asset.
 * Failed transfers return false and leave balances untouched.
 */

import type { Address } from "../shared/identifiers.js";
import { checkedAdd, checkedSub } from "../shared/uint256.js";
import type { CollateralToken } from "./types.js";

export class MemoryCollateralToken implements CollateralToken {
	private readonly balances = new Map<Address, bigint>();
	private readonly allowances = new Map<string, bigint>();
	private supply = 0n;

	/** Creates `amount` new units for `to`. */
	mint(to: Address, amount: bigint): void {
		const balance = checkedAdd(this.balanceOf(to), amount);
		const supply = checkedAdd(this.supply, amount);
		if (balance === null || supply === null) {
			throw new RangeError("MemoryCollateralToken.mint: supply would exceed 2^256 - 1");
		}
		this.balances.set(to, balance);
		this.supply = supply;
	}

	balanceOf(owner: Address): bigint {
		return this.balances.get(owner) ?? 0n;
	}

	allowance(owner: Address, spender: Address): bigint {
		return this.allowances.get(`${owner}:${spender}`) ?? 0n;
	}

	totalSupply(): bigint {
		return this.supply;
	}

	approve(owner: Address, spender: Address, amount: bigint): void {
		this.allowances.set(`${owner}:${spender}`, amount);
	}

	transfer(sender: Address, payee: Address, amount: bigint): boolean {
		return this.move(sender, payee, amount);
	}

	transferFrom(operator: Address, payer: Address, payee: Address, amount: bigint): boolean {
		const remaining = checkedSub(this.allowance(payer, operator), amount);
		if (remaining === null) return false;
		if (!this.move(payer, payee, amount)) return false;
		this.allowances.set(`${payer}:${operator}`, remaining);
		return true;
	}

	private move(from: Address, to: Address, amount: bigint): boolean {
		if (amount < 0n) return false;
		const fromBalance = checkedSub(this.balanceOf(from), amount);
		if (fromBalance === null) return false;
		this.balances.set(from, fromBalance);
		this.balances.set(to, this.balanceOf(to) + amount);
		return true;
	}
}
