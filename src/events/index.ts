export type {
	LedgerEvent,
	LedgerEventPayload,
	LedgerEventType,
	LedgerEventOf,
	EventMeta,
	ConditionPreparation,
	ConditionResolution,
	PositionSplit,
	PositionMerge,
	PayoutRedemption,
	Transfer,
	TransferBatch,
	Approval,
} from "./ledger-events.js";
export { LEDGER_EVENT_TYPES, isEventOf } from "./ledger-events.js";
export { encodeEvent, decodeEvent } from "./event-codec.js";
