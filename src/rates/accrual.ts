import { RateOutOfRangeError } from "../shared/errors.js";
import { RAY, mulDivDown, rpow } from "../shared/fixed-point.js";

/**
 * Shares to mint so existing holders are diluted by the compounded rate:
 * floor(sharesSupply * (perSecondRate^secondsElapsed - 1)).
 *
 * Zero elapsed time or zero supply short-circuit to 0 without exponentiating,
 * whatever the rate.
 *
 * @throws RateOutOfRangeError for negative inputs or a factor below RAY
 * @throws ArithmeticOverflowError if an intermediate exceeds 256 bits
 */
export function sharesDue(perSecondRate: bigint, sharesSupply: bigint, secondsElapsed: bigint): bigint {
	if (sharesSupply < 0n || secondsElapsed < 0n) {
		throw new RateOutOfRangeError("Accrual inputs must be non-negative", {
			sharesSupply,
			secondsElapsed,
		});
	}
	if (secondsElapsed === 0n || sharesSupply === 0n) return 0n;

	if (perSecondRate < RAY) {
		throw new RateOutOfRangeError("Per-second rate below the identity factor", { perSecondRate });
	}

	const growth = rpow(perSecondRate, secondsElapsed) - RAY;
	return mulDivDown(sharesSupply, growth, RAY);
}
