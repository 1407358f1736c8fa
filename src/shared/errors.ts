/**
 * FeeEngineError hierarchy — structured error classification.
 *
 * Every error carries a category: `input_domain` for values outside what the
 * math accepts (rates, overflow, balances), `defect` for wiring and
 * configuration mistakes (access control, double initialization, unknown
 * fees). Nothing here is retried; the caller fixes the input and resubmits.
 */

/** Error categories; neither is retryable. */
export const ErrorCategory = {
	InputDomain: "input_domain",
	Defect: "defect",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing FeeEngineError subclasses with optional cause chain. */
interface FeeEngineErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & FeeEngineErrorOptions;

/** Base error class for all fee engine operations. */
export class FeeEngineError extends Error {
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
		this.name = "FeeEngineError";
		this.category = category;
		this.code = code;
		this.context = context;
	}

	get isDefect(): boolean {
		return this.category === ErrorCategory.Defect;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			context: stringifyBigints(this.context),
		};
	}
}

function stringifyBigints(context: Record<string, unknown>): Record<string, unknown> {
	const out: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(context)) {
		out[key] = typeof value === "bigint" ? value.toString() : value;
	}
	return out;
}

// ── Input-domain errors ──────────────────────────────────────────────

/** A rate is negative, below the identity factor, or above the configured ceiling. */
export class RateOutOfRangeError extends FeeEngineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "RATE_OUT_OF_RANGE", ErrorCategory.InputDomain, rest);
		this.name = "RateOutOfRangeError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** An intermediate product left the 256-bit unsigned range. */
export class ArithmeticOverflowError extends FeeEngineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "ARITHMETIC_OVERFLOW", ErrorCategory.InputDomain, rest);
		this.name = "ArithmeticOverflowError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A settlement timestamp is earlier than the last recorded one. */
export class NotMonotonicError extends FeeEngineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "NOT_MONOTONIC", ErrorCategory.InputDomain, rest);
		this.name = "NotMonotonicError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A burn or transfer asks for more shares than the holder has. */
export class InsufficientSharesError extends FeeEngineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "INSUFFICIENT_SHARES", ErrorCategory.InputDomain, rest);
		this.name = "InsufficientSharesError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Defects ──────────────────────────────────────────────────────────

/** One-time settings were supplied a second time. */
export class AlreadyConfiguredError extends FeeEngineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "ALREADY_CONFIGURED", ErrorCategory.Defect, rest);
		this.name = "AlreadyConfiguredError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A privileged call came from a principal that does not own the state. */
export class UnauthorizedCallerError extends FeeEngineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "UNAUTHORIZED_CALLER", ErrorCategory.Defect, rest);
		this.name = "UnauthorizedCallerError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A fee kind is not registered, or not enabled for the fund. */
export class UnknownFeeKindError extends FeeEngineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "UNKNOWN_FEE_KIND", ErrorCategory.Defect, rest);
		this.name = "UnknownFeeKindError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** The fund has no fee configuration at all. */
export class FundNotInitializedError extends FeeEngineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "FUND_NOT_INITIALIZED", ErrorCategory.Defect, rest);
		this.name = "FundNotInitializedError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A fee returned an instruction the current hook cannot apply (e.g. a burn without a payer). */
export class InvalidSettlementError extends FeeEngineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "INVALID_SETTLEMENT", ErrorCategory.Defect, rest);
		this.name = "InvalidSettlementError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A unit of work was started for a fund that already has one in progress. */
export class ConcurrentSettlementError extends FeeEngineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "CONCURRENT_SETTLEMENT", ErrorCategory.Defect, rest);
		this.name = "ConcurrentSettlementError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Invalid or missing configuration. */
export class ConfigError extends FeeEngineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Defect, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Unexpected internal failure, used to wrap foreign errors. */
export class SystemError extends FeeEngineError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "SYSTEM_ERROR", ErrorCategory.Defect, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classification helper ────────────────────────────────────────────

/** Wrap anything thrown into a FeeEngineError, passing engine errors through unchanged. */
export function classifyError(error: unknown): FeeEngineError {
	if (error instanceof FeeEngineError) return error;
	if (error instanceof RangeError) {
		return new ArithmeticOverflowError(error.message, { cause: error });
	}
	if (error instanceof Error) {
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for any FeeEngineError. */
export function isFeeEngineError(e: unknown): e is FeeEngineError {
	return e instanceof FeeEngineError;
}

/** Type guard for access-control failures. */
export function isUnauthorized(e: unknown): e is UnauthorizedCallerError {
	return e instanceof UnauthorizedCallerError;
}
