/**
 * Engine configuration.
 *
 * Defaults reproduce the reference protocol: 365-day years and a 100% annual
 * ceiling on rates. Environment overrides are parsed with zod and surface as
 * ConfigError.
 */

import { parseUnits } from "../lib/decimal/index.js";
import type { LogLevel } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";
import { WAD } from "./fixed-point.js";

export interface EngineConfig {
	/** Seconds used to annualize rates */
	readonly secondsPerYear: bigint;
	/** Highest accepted annual rate, wad-scaled (1e18 = 100%) */
	readonly maxAnnualRate: bigint;
	readonly logLevel: LogLevel;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
	secondsPerYear: 31_536_000n,
	maxAnnualRate: WAD,
	logLevel: "info",
};

const positiveIntString = z
	.string()
	.trim()
	.regex(/^[0-9]+$/, "must be a positive integer")
	.transform((s) => BigInt(s))
	.refine((n) => n > 0n, "must be a positive integer");

const decimalFraction = z
	.string()
	.trim()
	.regex(/^[0-9]+(\.[0-9]+)?$/, "must be a non-negative decimal")
	.transform((s) => parseUnits(s, 18));

const envSchema = z.object({
	FEE_ENGINE_SECONDS_PER_YEAR: positiveIntString.optional(),
	FEE_ENGINE_MAX_ANNUAL_RATE: decimalFraction.optional(),
	FEE_ENGINE_LOG_LEVEL: z
		.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
		.optional(),
});

/** Mutable builder shape for assembling Partial<EngineConfig>. */
interface MutableEngineConfig {
	secondsPerYear?: bigint;
	maxAnnualRate?: bigint;
	logLevel?: LogLevel;
}

/**
 * Reads config overrides from environment variables.
 * Supported: FEE_ENGINE_SECONDS_PER_YEAR, FEE_ENGINE_MAX_ANNUAL_RATE (a decimal
 * fraction, "1" = 100%), FEE_ENGINE_LOG_LEVEL. Empty values are ignored.
 * @throws ConfigError if a variable holds an invalid value
 */
export function configFromEnv(
	env: Readonly<Record<string, string | undefined>> = process.env,
): Partial<EngineConfig> {
	const present: Record<string, string> = {};
	for (const key of Object.keys(envSchema.shape)) {
		const raw = env[key];
		if (raw !== undefined && raw.trim().length > 0) {
			present[key] = raw;
		}
	}

	const parsed = validate(envSchema, present, "Invalid engine configuration");
	if (!parsed.ok) {
		const detail = parsed.error.issues
			.map((i) => `${i.path.join(".")}: ${i.message}`)
			.join("; ");
		throw new ConfigError(`Invalid engine configuration: ${detail}`, { cause: parsed.error });
	}

	const result: MutableEngineConfig = {};
	const values = parsed.value;
	if (values.FEE_ENGINE_SECONDS_PER_YEAR !== undefined) {
		result.secondsPerYear = values.FEE_ENGINE_SECONDS_PER_YEAR;
	}
	if (values.FEE_ENGINE_MAX_ANNUAL_RATE !== undefined) {
		result.maxAnnualRate = values.FEE_ENGINE_MAX_ANNUAL_RATE;
	}
	if (values.FEE_ENGINE_LOG_LEVEL !== undefined) {
		result.logLevel = values.FEE_ENGINE_LOG_LEVEL;
	}
	return result;
}

/** Merges overrides onto the defaults. */
export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
	const config = { ...DEFAULT_ENGINE_CONFIG, ...overrides };
	if (config.secondsPerYear <= 0n) {
		throw new ConfigError("secondsPerYear must be positive", {
			secondsPerYear: config.secondsPerYear,
		});
	}
	if (config.maxAnnualRate < 0n) {
		throw new ConfigError("maxAnnualRate must be non-negative", {
			maxAnnualRate: config.maxAnnualRate,
		});
	}
	return config;
}
