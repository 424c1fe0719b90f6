// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Address,
	type QuestionId,
	type ConditionId,
	type SlotId,
	type PositionId,
	address,
	questionId,
	questionIdFromLabel,
	conditionId,
	slotId,
	positionId,
	ROOT_SLOT,
	isRootSlot,
	type Result,
	ok,
	err,
	map,
	flatMap,
	sequence,
	unwrap,
	isOk,
	isErr,
	ErrorCategory,
	LedgerError,
	AlreadyPreparedError,
	InvalidOutcomeSlotCountError,
	MalformedResultError,
	OutcomeCountMismatchError,
	AlreadyResolvedError,
	PayoutAlreadySetError,
	AllZeroPayoutError,
	ConditionNotPreparedError,
	ResultNotReceivedError,
	InsufficientBalanceError,
	BalanceOverflowError,
	CollateralTransferFailedError,
	InsufficientAllowanceError,
	StaleApprovalError,
	TransferRejectedByReceiverError,
	ReentrantCollateralMoveError,
	ConfigError,
	SystemError,
	classifyError,
	isLedgerError,
	isInsufficientBalance,
	isConfigError,
	MAX_UINT256,
	UINT256_MODULUS,
	isUint256,
	type Clock,
	SystemClock,
	FakeClock,
	type LedgerConfig,
	DEFAULT_LEDGER_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./shared/index.js";

// ── Infrastructure ───────────────────────────────────────────────────
export type { Hex } from "./lib/ethereum/index.js";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./lib/logger/index.js";
export { ValidationError, type ValidationIssue } from "./lib/validation/index.js";

// ── State ────────────────────────────────────────────────────────────
export { LedgerState, type LedgerStateOptions, type ConditionRecord } from "./state/index.js";

// ── Events ───────────────────────────────────────────────────────────
export {
	type LedgerEvent,
	type LedgerEventPayload,
	type LedgerEventType,
	type LedgerEventOf,
	type ConditionPreparation,
	type ConditionResolution,
	type PositionSplit,
	type PositionMerge,
	type PayoutRedemption,
	type Transfer,
	type TransferBatch,
	type Approval,
	LEDGER_EVENT_TYPES,
	isEventOf,
	encodeEvent,
	decodeEvent,
} from "./events/index.js";

// ── Conditions ───────────────────────────────────────────────────────
export {
	type Condition,
	type PayoutVector,
	getConditionId,
	ConditionRegistry,
	MAX_OUTCOME_SLOT_COUNT,
	OracleIntake,
	encodePayoutReport,
	decodePayoutReport,
} from "./conditions/index.js";

// ── Collateral ───────────────────────────────────────────────────────
export {
	type CollateralToken,
	CollateralRegistry,
	MemoryCollateralToken,
} from "./collateral/index.js";

// ── Positions ────────────────────────────────────────────────────────
export {
	type SlotStep,
	getPayoutSlotId,
	deriveSlotPath,
	getPositionId,
	PositionLedger,
	type PositionLedgerDeps,
} from "./position/index.js";

// ── Multi-asset Transfers ────────────────────────────────────────────
export {
	MultiAssetToken,
	type TokenReceiver,
	RECEIVED_ACK,
	BATCH_RECEIVED_ACK,
	acceptingReceiver,
} from "./token/index.js";

// ── Persistence ──────────────────────────────────────────────────────
export {
	type Journal,
	MemoryJournal,
	FileJournal,
	type FileJournalConfig,
	type RestoreResult,
	type CorruptLine,
	type InvalidLine,
} from "./persistence/index.js";

// ── Ledger ───────────────────────────────────────────────────────────
export {
	ConditionalLedger,
	type ConditionalLedgerOptions,
	type Unsubscribe,
	TestLedgerBuilder,
	type TestLedger,
} from "./ledger/index.js";
