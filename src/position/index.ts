export { type SlotStep, getPayoutSlotId, deriveSlotPath, getPositionId } from "./slot-id.js";
export { type PositionLedgerDeps, PositionLedger } from "./position-ledger.js";
