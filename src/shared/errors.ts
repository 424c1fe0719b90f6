/**
 * LedgerError hierarchy: structured error classification.
 *
 * Every ledger operation failure is non-retryable: the engine never retries
 * internally and the caller owns retry policy. Configuration problems and
 * unexpected internal failures are fatal.
 */

/** Error severity categories. */
export const ErrorCategory = {
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing LedgerError subclasses with optional cause chain. */
interface LedgerErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & LedgerErrorOptions;

/** Base error class for all ledger operations. */
export class LedgerError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
	) {
		super(message);
		this.name = "LedgerError";
		this.category = category;
		this.code = code;
		this.context = context;
	}

	get isFatal(): boolean {
		return this.category === ErrorCategory.Fatal;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			context: this.context,
		};
	}
}

function split(context: ErrorContext): { cause: unknown; rest: Record<string, unknown> } {
	const { cause, ...rest } = context;
	return { cause, rest };
}

// ── Condition registry / oracle intake ───────────────────────────────

/** A condition with this (oracle, questionId, outcomeSlotCount) already has payout slots. */
export class AlreadyPreparedError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "ALREADY_PREPARED", ErrorCategory.NonRetryable, split(context).rest);
		this.name = "AlreadyPreparedError";
	}
}

/** Outcome slot count is zero or outside the uint256 range. */
export class InvalidOutcomeSlotCountError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "INVALID_OUTCOME_SLOT_COUNT", ErrorCategory.NonRetryable, split(context).rest);
		this.name = "InvalidOutcomeSlotCountError";
	}
}

/** Result bytes are empty, not hex, or not a whole number of 32-byte words. */
export class MalformedResultError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "MALFORMED_RESULT", ErrorCategory.NonRetryable, split(context).rest);
		this.name = "MalformedResultError";
	}
}

/** The reported vector length does not match a condition prepared by this oracle. */
export class OutcomeCountMismatchError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "OUTCOME_COUNT_MISMATCH", ErrorCategory.NonRetryable, split(context).rest);
		this.name = "OutcomeCountMismatchError";
	}
}

/** The condition already has a non-zero payout denominator. */
export class AlreadyResolvedError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "ALREADY_RESOLVED", ErrorCategory.NonRetryable, split(context).rest);
		this.name = "AlreadyResolvedError";
	}
}

/** A payout numerator slot was already written. */
export class PayoutAlreadySetError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "PAYOUT_ALREADY_SET", ErrorCategory.NonRetryable, split(context).rest);
		this.name = "PayoutAlreadySetError";
	}
}

/** Every reported numerator was zero. */
export class AllZeroPayoutError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "ALL_ZERO_PAYOUT", ErrorCategory.NonRetryable, split(context).rest);
		this.name = "AllZeroPayoutError";
	}
}

// ── Position ledger ──────────────────────────────────────────────────

export class ConditionNotPreparedError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CONDITION_NOT_PREPARED", ErrorCategory.NonRetryable, split(context).rest);
		this.name = "ConditionNotPreparedError";
	}
}

export class ResultNotReceivedError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "RESULT_NOT_RECEIVED", ErrorCategory.NonRetryable, split(context).rest);
		this.name = "ResultNotReceivedError";
	}
}

/** A position balance would go negative. */
export class InsufficientBalanceError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "INSUFFICIENT_BALANCE", ErrorCategory.NonRetryable, split(context).rest);
		this.name = "InsufficientBalanceError";
	}
}

/** A balance or accumulator would exceed 2^256 - 1. */
export class BalanceOverflowError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "BALANCE_OVERFLOW", ErrorCategory.NonRetryable, split(context).rest);
		this.name = "BalanceOverflowError";
	}
}

/** The collateral asset refused, threw, or is not registered. */
export class CollateralTransferFailedError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = split(context);
		super(message, "COLLATERAL_TRANSFER_FAILED", ErrorCategory.NonRetryable, rest);
		this.name = "CollateralTransferFailedError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A collateral move was attempted from inside another ledger operation. */
export class ReentrantCollateralMoveError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "REENTRANT_COLLATERAL_MOVE", ErrorCategory.NonRetryable, split(context).rest);
		this.name = "ReentrantCollateralMoveError";
	}
}

// ── Multi-asset transfer layer ───────────────────────────────────────

export class InsufficientAllowanceError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "INSUFFICIENT_ALLOWANCE", ErrorCategory.NonRetryable, split(context).rest);
		this.name = "InsufficientAllowanceError";
	}
}

/** The live allowance no longer equals the value the approver expected. */
export class StaleApprovalError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "STALE_APPROVAL", ErrorCategory.NonRetryable, split(context).rest);
		this.name = "StaleApprovalError";
	}
}

/** A registered receiver returned the wrong acknowledgment or threw. */
export class TransferRejectedByReceiverError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = split(context);
		super(message, "TRANSFER_REJECTED_BY_RECEIVER", ErrorCategory.NonRetryable, rest);
		this.name = "TransferRejectedByReceiverError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Infrastructure ───────────────────────────────────────────────────

/** Fatal error for invalid or missing configuration. */
export class ConfigError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = split(context);
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for unexpected internal failures. */
export class SystemError extends LedgerError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, rest } = split(context);
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

/** Wrap anything thrown across an external boundary into a LedgerError. */
export function classifyError(error: unknown): LedgerError {
	if (error instanceof LedgerError) return error;
	if (error instanceof Error) {
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

export function isLedgerError(e: unknown): e is LedgerError {
	return e instanceof LedgerError;
}

/** Type guard for InsufficientBalanceError. */
export function isInsufficientBalance(e: unknown): e is InsufficientBalanceError {
	return e instanceof InsufficientBalanceError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}
