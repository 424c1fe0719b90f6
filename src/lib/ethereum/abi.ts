/**
 * Packed ABI encoding and keccak256 hashing: thin wrappers over viem.
 *
 * Every identifier in the ledger is a keccak256 digest of a tightly packed
 * (`abi.encodePacked`) tuple. These helpers fix the exact tuple
 * layouts so callers cannot drift from them.
 */

import {
	concat,
	encodePacked,
	getAddress,
	hexToBigInt,
	isAddress,
	keccak256,
	numberToHex,
	slice,
	stringToHex,
} from "viem";
import type { Hex } from "./types.js";

/** Width in bytes of one ABI word (uint256 / bytes32). */
export const WORD_BYTES = 32;

const HEX_BYTES_RE = /^0x(?:[0-9a-fA-F]{2})*$/;
const BYTES32_RE = /^0x[0-9a-fA-F]{64}$/;

/** True when `value` is `0x` followed by a whole number of bytes. */
export function isHexBytes(value: string): value is Hex {
	return HEX_BYTES_RE.test(value);
}

/** True when `value` is exactly 32 bytes of hex. */
export function isBytes32(value: string): value is Hex {
	return BYTES32_RE.test(value);
}

/** Byte length of a well-formed hex byte string. */
export function byteLength(value: Hex): number {
	return (value.length - 2) / 2;
}

/**
 * Normalizes an address to its EIP-55 checksummed form.
 * @returns The checksummed address, or null if `value` is not a 20-byte address
 */
export function checksumAddress(value: string): Hex | null {
	if (!isAddress(value, { strict: false })) {
		return null;
	}
	return getAddress(value);
}

/**
 * UTF-8 encodes a short label into a right-padded bytes32.
 * @throws Error if the label is longer than 32 bytes
 */
export function labelToBytes32(label: string): Hex {
	return stringToHex(label, { size: WORD_BYTES });
}

/** keccak256(address oracle ‖ bytes32 questionId ‖ uint256 outcomeSlotCount) */
export function hashConditionTriple(oracle: Hex, questionId: Hex, outcomeSlotCount: bigint): Hex {
	return keccak256(
		encodePacked(["address", "bytes32", "uint256"], [oracle, questionId, outcomeSlotCount]),
	);
}

/** uint256(keccak256(bytes32 conditionId ‖ uint256 index)) */
export function hashOutcomeSlot(conditionId: Hex, index: bigint): bigint {
	return hexToBigInt(keccak256(encodePacked(["bytes32", "uint256"], [conditionId, index])));
}

/** uint256(keccak256(address collateral ‖ uint256 slotId)) */
export function hashPosition(collateral: Hex, slotId: bigint): bigint {
	return hexToBigInt(keccak256(encodePacked(["address", "uint256"], [collateral, slotId])));
}

/**
 * Packs unsigned integers as consecutive big-endian 32-byte words.
 * @throws Error if any value is negative or wider than 256 bits
 */
export function packWords(values: readonly bigint[]): Hex {
	return concat(values.map((v) => numberToHex(v, { size: WORD_BYTES })));
}

/**
 * Splits a byte string into big-endian 32-byte unsigned words.
 * @returns The decoded words, or null when the input is not a whole number of words
 */
export function unpackWords(value: string): bigint[] | null {
	if (!isHexBytes(value)) return null;
	const length = byteLength(value);
	if (length % WORD_BYTES !== 0) return null;

	const words: bigint[] = [];
	for (let offset = 0; offset < length; offset += WORD_BYTES) {
		words.push(hexToBigInt(slice(value, offset, offset + WORD_BYTES, { strict: true })));
	}
	return words;
}
