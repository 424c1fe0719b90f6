export type { Hex } from "./types.js";
export {
	WORD_BYTES,
	byteLength,
	checksumAddress,
	hashConditionTriple,
	hashOutcomeSlot,
	hashPosition,
	isBytes32,
	isHexBytes,
	labelToBytes32,
	packWords,
	unpackWords,
} from "./abi.js";
