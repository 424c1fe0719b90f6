/**
 * Receiver acknowledgment: contract-like recipients of safe transfers.
 *
 * An address with a registered TokenReceiver must answer every safe
 * transfer with the matching 4-byte constant; anything else rejects it.
 */

import type { Hex } from "../lib/ethereum/index.js";
import type { Address, PositionId } from "../shared/identifiers.js";

/** bytes4(keccak256("onERC1155Received(address,address,uint256,uint256,bytes)")) */
export const RECEIVED_ACK = "0xf23a6e61";
/** bytes4(keccak256("onERC1155BatchReceived(address,address,uint256[],uint256[],bytes)")) */
export const BATCH_RECEIVED_ACK = "0xbc197c81";

export interface TokenReceiver {
	onReceived(operator: Address, from: Address, id: PositionId, value: bigint, data: Hex): string;
	onBatchReceived?(
		operator: Address,
		from: Address,
		ids: readonly PositionId[],
		values: readonly bigint[],
		data: Hex,
	): string;
}

/** Acknowledges every transfer. */
export const acceptingReceiver: TokenReceiver = {
	onReceived: () => RECEIVED_ACK,
	onBatchReceived: () => BATCH_RECEIVED_ACK,
};
