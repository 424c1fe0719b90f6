export { MultiAssetToken } from "./multi-asset-token.js";
export {
	type TokenReceiver,
	RECEIVED_ACK,
	BATCH_RECEIVED_ACK,
	acceptingReceiver,
} from "./receiver.js";
