import { bench, describe } from "vitest";
import { RateConverter } from "../src/rates/rate-converter.js";
import { sharesDue } from "../src/rates/accrual.js";
import { WAD } from "../src/shared/fixed-point.js";

describe("management fee accrual", () => {
	const converter = RateConverter.create();
	const factor = converter.toPerSecondRate(WAD / 50n);
	const supply = 1_000_000n * WAD;

	bench("sharesDue over one day 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			sharesDue(factor, supply, 86_400n);
		}
	});

	bench("sharesDue over one year 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			sharesDue(factor, supply, 31_536_000n);
		}
	});

	bench("toPerSecondRate 2%", () => {
		converter.toPerSecondRate(WAD / 50n);
	});

	bench("toAnnualRate round trip", () => {
		converter.toAnnualRate(factor);
	});
});
