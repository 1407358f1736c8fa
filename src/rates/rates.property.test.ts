import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { WAD } from "../shared/fixed-point.js";
import { sharesDue } from "./accrual.js";
import { RateConverter } from "./rate-converter.js";

const converter = RateConverter.create();

const annualRate = fc.bigInt({ min: 0n, max: WAD });
const supply = fc.bigInt({ min: 0n, max: 10n ** 30n });
const elapsed = fc.bigInt({ min: 0n, max: 10n * 31_536_000n });
const factor = annualRate.map((r) => converter.toPerSecondRate(r));

describe("rates (property-based)", () => {
	it("toAnnualRate(toPerSecondRate(r)) is within 1e-9 of r", () => {
		fc.assert(
			fc.property(annualRate, (r) => {
				const back = converter.toAnnualRate(converter.toPerSecondRate(r));
				const diff = back > r ? back - r : r - back;
				expect(diff * 1_000_000_000n <= r).toBe(true);
			}),
			{ numRuns: 50 },
		);
	});

	it("zero elapsed time accrues nothing", () => {
		fc.assert(
			fc.property(factor, supply, (rate, s) => {
				expect(sharesDue(rate, s, 0n)).toBe(0n);
			}),
			{ numRuns: 30 },
		);
	});

	it("zero supply accrues nothing", () => {
		fc.assert(
			fc.property(factor, elapsed, (rate, t) => {
				expect(sharesDue(rate, 0n, t)).toBe(0n);
			}),
			{ numRuns: 30 },
		);
	});

	it("shares due never decrease with elapsed time", () => {
		fc.assert(
			fc.property(factor, supply, elapsed, elapsed, (rate, s, a, b) => {
				const [t1, t2] = a <= b ? [a, b] : [b, a];
				expect(sharesDue(rate, s, t1) <= sharesDue(rate, s, t2)).toBe(true);
			}),
			{ numRuns: 30 },
		);
	});

	it("one year never over-dilutes past the annual rate", () => {
		fc.assert(
			fc.property(annualRate, (r) => {
				const due = sharesDue(converter.toPerSecondRate(r), WAD, 31_536_000n);
				expect(due <= r).toBe(true);
			}),
			{ numRuns: 30 },
		);
	});
});
