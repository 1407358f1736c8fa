import { describe, expect, it } from "vitest";
import { RateOutOfRangeError } from "../shared/errors.js";
import { RAY, WAD } from "../shared/fixed-point.js";
import { RateConverter, formatRate, parseAnnualRate } from "./rate-converter.js";

const TEN_PERCENT = 100_000_000_000_000_000n;
const TEN_PERCENT_FACTOR = 1_000_000_003_022_265_980_097_387_651n;

describe("RateConverter", () => {
	const converter = RateConverter.create();

	describe("toPerSecondRate", () => {
		it("converts 10% a year to its per-second factor", () => {
			expect(converter.toPerSecondRate(TEN_PERCENT)).toBe(TEN_PERCENT_FACTOR);
		});

		it("converts 2% a year", () => {
			expect(converter.toPerSecondRate(20_000_000_000_000_000n)).toBe(
				1_000_000_000_627_937_192_491_029_811n,
			);
		});

		it("maps a zero rate to the identity factor", () => {
			expect(converter.toPerSecondRate(0n)).toBe(RAY);
		});

		it("converts the 100% ceiling", () => {
			expect(converter.toPerSecondRate(WAD)).toBe(1_000_000_021_979_553_151_239_153_028n);
		});

		it("rejects a negative rate", () => {
			expect(() => converter.toPerSecondRate(-1n)).toThrow(RateOutOfRangeError);
		});

		it("rejects a rate above the ceiling", () => {
			expect(() => converter.toPerSecondRate(WAD + 1n)).toThrow(RateOutOfRangeError);
		});

		it("honours a custom year length", () => {
			const tenSecondYear = RateConverter.create({ secondsPerYear: 10n, maxAnnualRate: WAD });
			expect(tenSecondYear.toPerSecondRate(TEN_PERCENT)).toBe(
				1_009_576_582_776_887_025_717_734_582n,
			);
		});

		it("honours a custom ceiling", () => {
			const capped = RateConverter.create({
				secondsPerYear: 31_536_000n,
				maxAnnualRate: TEN_PERCENT,
			});
			expect(() => capped.toPerSecondRate(TEN_PERCENT + 1n)).toThrow(RateOutOfRangeError);
			expect(capped.maxPerSecondRate()).toBe(TEN_PERCENT_FACTOR);
		});
	});

	describe("toAnnualRate", () => {
		it("recovers 10% from its factor", () => {
			expect(converter.toAnnualRate(TEN_PERCENT_FACTOR)).toBe(TEN_PERCENT);
		});

		it("maps the identity factor to zero", () => {
			expect(converter.toAnnualRate(RAY)).toBe(0n);
		});

		it("rejects a factor below RAY", () => {
			expect(() => converter.toAnnualRate(RAY - 1n)).toThrow(RateOutOfRangeError);
		});

		it("rejects a factor above the ceiling's factor", () => {
			expect(() => converter.toAnnualRate(converter.maxPerSecondRate() + 1n)).toThrow(
				RateOutOfRangeError,
			);
		});

		it("accepts the ceiling's factor itself", () => {
			expect(converter.toAnnualRate(converter.maxPerSecondRate())).toBe(WAD);
		});
	});

	describe("assertPerSecondRate", () => {
		it("reports the accepted bounds in the error context", () => {
			try {
				converter.assertPerSecondRate(0n);
				expect.unreachable("should have thrown");
			} catch (e) {
				expect(e).toBeInstanceOf(RateOutOfRangeError);
				if (e instanceof RateOutOfRangeError) {
					expect(e.context["min"]).toBe(RAY);
					expect(e.context["perSecondRate"]).toBe(0n);
				}
			}
		});
	});

	describe("fromDecimalRate", () => {
		it("parses and converts in one step", () => {
			expect(converter.fromDecimalRate("0.1")).toBe(TEN_PERCENT_FACTOR);
		});
	});
});

describe("parseAnnualRate", () => {
	it("parses a decimal fraction to wad", () => {
		expect(parseAnnualRate("0.1")).toBe(TEN_PERCENT);
		expect(parseAnnualRate("1")).toBe(WAD);
	});

	it("rejects text that is not a number", () => {
		expect(() => parseAnnualRate("ten percent")).toThrow(RateOutOfRangeError);
	});

	it("rejects a negative rate", () => {
		expect(() => parseAnnualRate("-0.1")).toThrow("Annual rate must be non-negative");
	});
});

describe("formatRate", () => {
	it("renders wad rates as decimal fractions", () => {
		expect(formatRate(TEN_PERCENT)).toBe("0.1");
		expect(formatRate(WAD)).toBe("1");
		expect(formatRate(0n)).toBe("0");
	});
});
