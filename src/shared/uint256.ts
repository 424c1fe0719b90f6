/**
 * uint256 arithmetic: every amount, slot and position id lives in
 * [0, 2^256 - 1]. Checked operations return null instead of wrapping so the
 * caller can raise the matching domain error.
 */

export const UINT256_MODULUS = 1n << 256n;
export const MAX_UINT256 = UINT256_MODULUS - 1n;

export function isUint256(value: bigint): boolean {
	return value >= 0n && value <= MAX_UINT256;
}

/** a + b, or null if the sum exceeds MAX_UINT256. */
export function checkedAdd(a: bigint, b: bigint): bigint | null {
	const sum = a + b;
	return sum > MAX_UINT256 ? null : sum;
}

/** a - b, or null if the difference would be negative. */
export function checkedSub(a: bigint, b: bigint): bigint | null {
	return b > a ? null : a - b;
}

/** (a + b) mod 2^256 */
export function wrappingAdd(a: bigint, b: bigint): bigint {
	return (a + b) % UINT256_MODULUS;
}

/**
 * floor(value * numerator / denominator), computed without intermediate
 * overflow. Never exceeds `value` while numerator <= denominator.
 */
export function mulDiv(value: bigint, numerator: bigint, denominator: bigint): bigint {
	if (denominator === 0n) {
		throw new RangeError("mulDiv: division by zero");
	}
	return (value * numerator) / denominator;
}
