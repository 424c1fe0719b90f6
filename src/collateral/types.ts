/**
 * Collateral asset interface consumed by the position ledger.
 *
 * The ledger calls these with its custody address as the acting account.
 * A `false` return or a thrown error aborts the calling ledger operation.
 */

import type { Address } from "../shared/identifiers.js";

export interface CollateralToken {
	/** Moves `amount` from `payer` to `payee`, spending `operator`'s allowance from `payer`. */
	transferFrom(operator: Address, payer: Address, payee: Address, amount: bigint): boolean;
	/** Moves `amount` out of `sender`'s own balance. */
	transfer(sender: Address, payee: Address, amount: bigint): boolean;
}
