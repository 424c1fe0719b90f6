/**
 * Ethereum library wrapper: type definitions.
 *
 * Hashing and ABI packing are backed by viem, but domain code only sees
 * these plain template-literal types and never imports viem directly.
 */

/** `0x`-prefixed hex string of any byte length. */
export type Hex = `0x${string}`;
