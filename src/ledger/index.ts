export {
	ConditionalLedger,
	type ConditionalLedgerOptions,
	type Unsubscribe,
} from "./conditional-ledger.js";
export { TestLedgerBuilder, type TestLedger } from "./testing/test-ledger.js";
