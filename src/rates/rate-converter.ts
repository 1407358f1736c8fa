/**
 * Conversion between annual fee rates and per-second growth factors.
 *
 * An annual rate is a wad fraction (0.1e18 = 10%). Its per-second form is the
 * ray-scaled factor x with x^secondsPerYear = 1 + annualRate, so compounding
 * it every second for a year reproduces the annual rate. The factor is found
 * by integer search over rpow; no floating point is involved.
 */

import { formatUnits, parseUnits } from "../lib/decimal/index.js";
import type { EngineConfig } from "../shared/config.js";
import { DEFAULT_ENGINE_CONFIG } from "../shared/config.js";
import { RateOutOfRangeError } from "../shared/errors.js";
import { RAY, WAD_TO_RAY, rpow } from "../shared/fixed-point.js";

export type RateConverterConfig = Pick<EngineConfig, "secondsPerYear" | "maxAnnualRate">;

export class RateConverter {
	readonly secondsPerYear: bigint;
	readonly maxAnnualRate: bigint;
	private maxFactor: bigint | null = null;

	private constructor(config: RateConverterConfig) {
		this.secondsPerYear = config.secondsPerYear;
		this.maxAnnualRate = config.maxAnnualRate;
	}

	static create(config: RateConverterConfig = DEFAULT_ENGINE_CONFIG): RateConverter {
		return new RateConverter(config);
	}

	/**
	 * Largest ray factor x with x^secondsPerYear <= 1 + annualRate.
	 * @throws RateOutOfRangeError if annualRate is negative or above the ceiling
	 */
	toPerSecondRate(annualRate: bigint): bigint {
		if (annualRate < 0n || annualRate > this.maxAnnualRate) {
			throw new RateOutOfRangeError("Annual rate outside the accepted range", {
				annualRate,
				maxAnnualRate: this.maxAnnualRate,
			});
		}

		const target = RAY + annualRate * WAD_TO_RAY;
		const grows = (x: bigint) => rpow(x, this.secondsPerYear) <= target;

		// Gallop up to the first factor past the target, then bisect.
		let lo = RAY;
		let step = 1n;
		let hi = RAY + step;
		while (grows(hi)) {
			lo = hi;
			step *= 2n;
			hi = RAY + step;
		}
		while (hi - lo > 1n) {
			const mid = (lo + hi) / 2n;
			if (grows(mid)) {
				lo = mid;
			} else {
				hi = mid;
			}
		}
		return lo;
	}

	/**
	 * Annual wad rate a per-second factor compounds to, rounded to the nearest unit.
	 * @throws RateOutOfRangeError if the factor is below RAY or above the ceiling's factor
	 */
	toAnnualRate(perSecondRate: bigint): bigint {
		this.assertPerSecondRate(perSecondRate);
		const grown = rpow(perSecondRate, this.secondsPerYear);
		return (grown - RAY + WAD_TO_RAY / 2n) / WAD_TO_RAY;
	}

	/** Per-second factor of the configured ceiling. */
	maxPerSecondRate(): bigint {
		if (this.maxFactor === null) {
			this.maxFactor = this.toPerSecondRate(this.maxAnnualRate);
		}
		return this.maxFactor;
	}

	/** @throws RateOutOfRangeError unless RAY <= perSecondRate <= maxPerSecondRate() */
	assertPerSecondRate(perSecondRate: bigint): void {
		if (perSecondRate < RAY || perSecondRate > this.maxPerSecondRate()) {
			throw new RateOutOfRangeError("Per-second rate outside the accepted range", {
				perSecondRate,
				min: RAY,
				max: this.maxPerSecondRate(),
			});
		}
	}

	/**
	 * Per-second factor for a decimal annual rate string.
	 * @example converter.fromDecimalRate("0.02") // 2% a year
	 */
	fromDecimalRate(annualRate: string): bigint {
		return this.toPerSecondRate(parseAnnualRate(annualRate));
	}
}

/**
 * Parses a decimal fraction ("0.1" = 10%) into a wad rate.
 * @throws RateOutOfRangeError if the text is not a non-negative decimal
 */
export function parseAnnualRate(annualRate: string): bigint {
	let parsed: bigint;
	try {
		parsed = parseUnits(annualRate, 18);
	} catch (cause) {
		throw new RateOutOfRangeError(`Invalid annual rate "${annualRate}"`, { cause });
	}
	if (parsed < 0n) {
		throw new RateOutOfRangeError("Annual rate must be non-negative", { annualRate: parsed });
	}
	return parsed;
}

/** Renders a wad rate as a decimal fraction: 100000000000000000n becomes "0.1". */
export function formatRate(rate: bigint): string {
	return formatUnits(rate, 18);
}
