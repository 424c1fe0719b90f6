/**
 * Domain primitive identifiers: branded types for compile-time safety.
 *
 * Each identifier wraps a hex string or a uint256 with a unique brand, so a
 * SlotId cannot be passed where a PositionId is expected even though both
 * are plain bigints at runtime.
 */

import { type Hex, checksumAddress, isBytes32, labelToBytes32 } from "../lib/ethereum/index.js";
import { isUint256 } from "./uint256.js";

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Checksummed 20-byte account address (holders, oracles, collateral assets, custody). */
export type Address = Brand<Hex, "Address">;
/** Opaque 32-byte topic an oracle reports on. */
export type QuestionId = Brand<Hex, "QuestionId">;
/** keccak256 of (oracle, questionId, outcomeSlotCount). */
export type ConditionId = Brand<Hex, "ConditionId">;
/** Outcome-collection identifier; 0 is the root (raw collateral). */
export type SlotId = Brand<bigint, "SlotId">;
/** Balance key and multi-asset id: keccak256 of (collateral, slotId). */
export type PositionId = Brand<bigint, "PositionId">;

// ── Factory functions with validation ────────────────────────────────

/** Create a checksummed Address. Throws if `value` is not a 20-byte hex address. */
export function address(value: string): Address {
	const normalized = checksumAddress(value.trim());
	if (normalized === null) {
		throw new Error(`Address must be a 20-byte hex string, got: ${value}`);
	}
	return normalized as Address;
}

function bytes32<B extends string>(value: string, label: B): Brand<Hex, B> {
	const trimmed = value.trim();
	if (!isBytes32(trimmed)) {
		throw new Error(`${label} must be 32 bytes of hex, got: ${value}`);
	}
	return trimmed.toLowerCase() as Brand<Hex, B>;
}

/** Create a QuestionId from 32 bytes of hex. */
export function questionId(value: string): QuestionId {
	return bytes32(value, "QuestionId");
}

/** Create a QuestionId from a short UTF-8 label, right-padded to 32 bytes. */
export function questionIdFromLabel(label: string): QuestionId {
	if (label.length === 0) {
		throw new Error("QuestionId label cannot be empty");
	}
	return questionId(labelToBytes32(label));
}

/** Create a ConditionId from 32 bytes of hex. */
export function conditionId(value: string): ConditionId {
	return bytes32(value, "ConditionId");
}

/** Create a SlotId. Throws if `value` is outside the uint256 range. */
export function slotId(value: bigint): SlotId {
	if (!isUint256(value)) {
		throw new Error(`SlotId must be a uint256, got: ${value}`);
	}
	return value as SlotId;
}

/** Create a PositionId. Throws if `value` is outside the uint256 range. */
export function positionId(value: bigint): PositionId {
	if (!isUint256(value)) {
		throw new Error(`PositionId must be a uint256, got: ${value}`);
	}
	return value as PositionId;
}

/** The root slot: positions under it are backed directly by collateral. */
export const ROOT_SLOT: SlotId = slotId(0n);

export function isRootSlot(id: SlotId): boolean {
	return id === ROOT_SLOT;
}

/** Table key for an account/position pair. */
export function holdingKey(owner: Address, id: PositionId): string {
	return `${owner}:${id.toString(16)}`;
}
