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
} from "./identifiers.js";

export { type Result, ok, err, map, flatMap, sequence, unwrap, isOk, isErr } from "./result.js";

export {
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
} from "./errors.js";

export { MAX_UINT256, UINT256_MODULUS, isUint256 } from "./uint256.js";
export { type Clock, SystemClock, FakeClock } from "./time.js";
export {
	type LedgerConfig,
	DEFAULT_LEDGER_CONFIG,
	configFromEnv,
	resolveConfig,
} from "./config.js";
