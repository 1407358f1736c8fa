import { describe, expect, it } from "vitest";
import {
	AlreadyConfiguredError,
	ArithmeticOverflowError,
	ConcurrentSettlementError,
	ConfigError,
	ErrorCategory,
	FeeEngineError,
	FundNotInitializedError,
	InsufficientSharesError,
	InvalidSettlementError,
	NotMonotonicError,
	RateOutOfRangeError,
	SystemError,
	UnauthorizedCallerError,
	UnknownFeeKindError,
	classifyError,
	isFeeEngineError,
	isUnauthorized,
} from "./errors.js";

describe("FeeEngineError hierarchy", () => {
	describe("error categories", () => {
		const cases: Array<[string, FeeEngineError, ErrorCategory]> = [
			["RateOutOfRangeError", new RateOutOfRangeError("rate"), ErrorCategory.InputDomain],
			["ArithmeticOverflowError", new ArithmeticOverflowError("wide"), ErrorCategory.InputDomain],
			["NotMonotonicError", new NotMonotonicError("back"), ErrorCategory.InputDomain],
			["InsufficientSharesError", new InsufficientSharesError("low"), ErrorCategory.InputDomain],
			["AlreadyConfiguredError", new AlreadyConfiguredError("twice"), ErrorCategory.Defect],
			["UnauthorizedCallerError", new UnauthorizedCallerError("who"), ErrorCategory.Defect],
			["UnknownFeeKindError", new UnknownFeeKindError("what"), ErrorCategory.Defect],
			["FundNotInitializedError", new FundNotInitializedError("none"), ErrorCategory.Defect],
			["InvalidSettlementError", new InvalidSettlementError("bad"), ErrorCategory.Defect],
			["ConcurrentSettlementError", new ConcurrentSettlementError("busy"), ErrorCategory.Defect],
			["ConfigError", new ConfigError("cfg"), ErrorCategory.Defect],
			["SystemError", new SystemError("panic"), ErrorCategory.Defect],
		];

		it.each(cases)("%s has category %s", (_name, error, expected) => {
			expect(error.category).toBe(expected);
		});

		it.each(cases)("%s sets its own name", (name, error) => {
			expect(error.name).toBe(name);
			expect(error).toBeInstanceOf(FeeEngineError);
		});
	});

	describe("isDefect", () => {
		it("is true for wiring mistakes", () => {
			expect(new UnauthorizedCallerError("x").isDefect).toBe(true);
		});

		it("is false for input-domain errors", () => {
			expect(new RateOutOfRangeError("x").isDefect).toBe(false);
		});
	});

	describe("context and cause", () => {
		it("moves cause out of the context", () => {
			const root = new Error("root");
			const e = new NotMonotonicError("regressed", { cause: root, lastSettled: 10n });
			expect(e.cause).toBe(root);
			expect(e.context).toEqual({ lastSettled: 10n });
		});

		it("toJSON renders bigints as strings", () => {
			const e = new RateOutOfRangeError("too high", { annualRate: 2_000_000_000_000_000_000n });
			expect(e.toJSON()).toEqual({
				name: "RateOutOfRangeError",
				message: "too high",
				code: "RATE_OUT_OF_RANGE",
				category: "input_domain",
				context: { annualRate: "2000000000000000000" },
			});
		});
	});

	describe("classifyError", () => {
		it("passes engine errors through", () => {
			const e = new UnknownFeeKindError("nope");
			expect(classifyError(e)).toBe(e);
		});

		it("maps RangeError to ArithmeticOverflowError", () => {
			const e = classifyError(new RangeError("Maximum BigInt size exceeded"));
			expect(e).toBeInstanceOf(ArithmeticOverflowError);
			expect(e.message).toBe("Maximum BigInt size exceeded");
		});

		it("wraps other errors as SystemError", () => {
			const e = classifyError(new Error("boom"));
			expect(e).toBeInstanceOf(SystemError);
		});

		it("wraps non-errors", () => {
			const e = classifyError("text");
			expect(e).toBeInstanceOf(SystemError);
			expect(e.message).toBe("text");
		});
	});

	describe("type guards", () => {
		it("isFeeEngineError", () => {
			expect(isFeeEngineError(new ConfigError("x"))).toBe(true);
			expect(isFeeEngineError(new Error("x"))).toBe(false);
		});

		it("isUnauthorized", () => {
			expect(isUnauthorized(new UnauthorizedCallerError("x"))).toBe(true);
			expect(isUnauthorized(new ConfigError("x"))).toBe(false);
		});
	});
});
