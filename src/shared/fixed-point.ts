/**
 * Fixed-point kernel — unsigned 256-bit-budget arithmetic on native BigInt.
 *
 * BigInt never wraps, so every helper here checks its result against
 * UINT256_MAX and throws ArithmeticOverflowError instead of growing past the
 * width the fee math is specified for. All divisions floor.
 */

import { ArithmeticOverflowError } from "./errors.js";

/** 1e18: scale of wad values (annual rates, share prices, fee rates). */
export const WAD = 10n ** 18n;
/** 1e27: scale of ray values (per-second growth factors). */
export const RAY = 10n ** 27n;
/** 1e9: factor between ray and wad precision. */
export const WAD_TO_RAY = RAY / WAD;

export const UINT256_MAX = (1n << 256n) - 1n;

function assertInRange(value: bigint, op: string, operands: Record<string, bigint>): bigint {
	if (value > UINT256_MAX) {
		throw new ArithmeticOverflowError(`${op} overflows 256 bits`, operands);
	}
	if (value < 0n) {
		throw new ArithmeticOverflowError(`${op} underflows below zero`, operands);
	}
	return value;
}

/** a + b, rejected above UINT256_MAX. */
export function checkedAdd(a: bigint, b: bigint): bigint {
	return assertInRange(a + b, "add", { a, b });
}

/** a - b, rejected below zero. */
export function checkedSub(a: bigint, b: bigint): bigint {
	return assertInRange(a - b, "sub", { a, b });
}

/** a * b, rejected above UINT256_MAX. */
export function checkedMul(a: bigint, b: bigint): bigint {
	return assertInRange(a * b, "mul", { a, b });
}

/** floor(a * b / denominator), with the product held to 256 bits. */
export function mulDivDown(a: bigint, b: bigint, denominator: bigint): bigint {
	if (denominator === 0n) {
		throw new ArithmeticOverflowError("mulDiv by zero", { a, b, denominator });
	}
	return checkedMul(a, b) / denominator;
}

/**
 * x^n at `base` scale by repeated squaring, flooring every multiplication.
 *
 * `x` and the result are scaled by `base` (x = base means 1.0). Flooring keeps
 * the result at or below the exact power, so fees computed from it never
 * over-dilute.
 *
 * @throws ArithmeticOverflowError if any intermediate product exceeds 256 bits
 */
export function rpow(x: bigint, n: bigint, base: bigint = RAY): bigint {
	if (x < 0n || n < 0n || base <= 0n) {
		throw new ArithmeticOverflowError("rpow operands must be non-negative", { x, n, base });
	}
	if (n === 0n) return base;
	if (x === 0n) return 0n;

	let result = n % 2n === 1n ? x : base;
	let square = x;
	let exponent = n / 2n;
	while (exponent > 0n) {
		square = mulDivDown(square, square, base);
		if (exponent % 2n === 1n) {
			result = mulDivDown(result, square, base);
		}
		exponent /= 2n;
	}
	return result;
}

export function maxBigInt(a: bigint, b: bigint): bigint {
	return a >= b ? a : b;
}

export function minBigInt(a: bigint, b: bigint): bigint {
	return a <= b ? a : b;
}
