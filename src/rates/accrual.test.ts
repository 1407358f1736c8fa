import { describe, expect, it } from "vitest";
import { ArithmeticOverflowError, RateOutOfRangeError } from "../shared/errors.js";
import { RAY, WAD } from "../shared/fixed-point.js";
import { Duration } from "../shared/time.js";
import { sharesDue } from "./accrual.js";

const TEN_PERCENT_FACTOR = 1_000_000_003_022_265_980_097_387_651n;
const TWO_PERCENT_FACTOR = 1_000_000_000_627_937_192_491_029_811n;

describe("sharesDue", () => {
	it("charges 10% a year for ten seconds on 1e18 shares", () => {
		expect(sharesDue(TEN_PERCENT_FACTOR, WAD, 10n)).toBe(30_222_660_212n);
	});

	it("charges one day at 10%", () => {
		expect(sharesDue(TEN_PERCENT_FACTOR, WAD, Duration.days(1n))).toBe(261_157_876_067_812n);
	});

	it("stays one unit under the exact annual rate after a full year", () => {
		expect(sharesDue(TEN_PERCENT_FACTOR, WAD, Duration.years(1n))).toBe(99_999_999_999_999_999n);
		expect(sharesDue(TWO_PERCENT_FACTOR, WAD, Duration.years(1n))).toBe(19_999_999_999_999_999n);
	});

	it("charges 30 days at 2%", () => {
		expect(sharesDue(TWO_PERCENT_FACTOR, WAD, Duration.days(30n))).toBe(1_628_938_483_711_657n);
	});

	it("returns 0 for zero elapsed time", () => {
		expect(sharesDue(TEN_PERCENT_FACTOR, WAD, 0n)).toBe(0n);
	});

	it("returns 0 for zero supply", () => {
		expect(sharesDue(TEN_PERCENT_FACTOR, 0n, 10n)).toBe(0n);
	});

	it("skips rate validation on the zero fast paths", () => {
		expect(sharesDue(0n, WAD, 0n)).toBe(0n);
		expect(sharesDue(0n, 0n, 10n)).toBe(0n);
	});

	it("returns 0 at the identity factor", () => {
		expect(sharesDue(RAY, WAD, Duration.years(5n))).toBe(0n);
	});

	it("rejects a factor below RAY", () => {
		expect(() => sharesDue(RAY - 1n, WAD, 10n)).toThrow(RateOutOfRangeError);
	});

	it("rejects negative supply and elapsed time", () => {
		expect(() => sharesDue(TEN_PERCENT_FACTOR, -1n, 10n)).toThrow(RateOutOfRangeError);
		expect(() => sharesDue(TEN_PERCENT_FACTOR, WAD, -1n)).toThrow(RateOutOfRangeError);
	});

	it("fails fast instead of wrapping past 256 bits", () => {
		expect(() => sharesDue(2n * RAY, WAD, 1_000n)).toThrow(ArithmeticOverflowError);
	});
});
