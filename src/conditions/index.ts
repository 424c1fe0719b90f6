export type { Condition, PayoutVector } from "./types.js";
export { getConditionId } from "./condition-id.js";
export { ConditionRegistry, MAX_OUTCOME_SLOT_COUNT } from "./condition-registry.js";
export { OracleIntake, encodePayoutReport, decodePayoutReport } from "./oracle-intake.js";
