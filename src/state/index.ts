export {
	type ConditionRecord,
	type CommitListener,
	type LedgerStateOptions,
	LedgerState,
} from "./ledger-state.js";
