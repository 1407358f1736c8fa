/**
 * Decimal string ⇄ scaled integer conversion backed by decimal.js-light.
 *
 * Rates and share amounts live as scaled bigints everywhere in the engine;
 * this module is the one place they meet human-readable decimal text
 * ("0.02" for a 2% fee, "1.5" shares). No IEEE 754 floats are involved.
 */
import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 80, rounding: DecimalLight.ROUND_DOWN });

function parseDecimal(value: string): DecimalLight {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error("parseUnits: empty string");
	}
	try {
		return new DecimalLight(trimmed);
	} catch (cause) {
		throw new Error(`parseUnits: invalid decimal "${trimmed}"`, { cause });
	}
}

/**
 * Converts a decimal string to an integer scaled by 10^decimals.
 * Digits beyond `decimals` are truncated toward zero.
 * @throws Error if the string is empty or not a decimal number
 * @example parseUnits("0.1", 18) // 100000000000000000n
 */
export function parseUnits(value: string, decimals: number): bigint {
	const scaled = parseDecimal(value).times(new DecimalLight(10).pow(decimals));
	return BigInt(scaled.toFixed(0, DecimalLight.ROUND_DOWN));
}

/**
 * Renders an integer scaled by 10^decimals as a plain decimal string,
 * without exponent notation or trailing zeros.
 * @example formatUnits(1500000000000000000n, 18) // "1.5"
 */
export function formatUnits(value: bigint, decimals: number): string {
	const fixed = new DecimalLight(value.toString())
		.dividedBy(new DecimalLight(10).pow(decimals))
		.toFixed(decimals);
	if (fixed.indexOf(".") === -1) {
		return fixed;
	}
	return fixed.replace(/0+$/, "").replace(/\.$/, "");
}
