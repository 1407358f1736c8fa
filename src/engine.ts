/**
 * createFeeEngine — wires configuration, logging, the in-memory fund
 * environment, the fee manager and the built-in fees.
 */

import { EntranceRateFee, EntranceRateMode } from "./fees/entrance-rate-fee.js";
import { ManagementFee, ManagementFeePolicy } from "./fees/management-fee.js";
import { PerformanceFee } from "./fees/performance-fee.js";
import { type Logger, createLogger } from "./lib/logger/index.js";
import { FeeManager } from "./manager/fee-manager.js";
import { RateConverter } from "./rates/rate-converter.js";
import { type EngineConfig, configFromEnv, resolveEngineConfig } from "./shared/config.js";
import { accountId, feeKind } from "./shared/identifiers.js";
import { type ChainClock, SystemChainClock } from "./shared/time.js";
import { FundController } from "./vault/fund-controller.js";
import { InMemorySharesLedger } from "./vault/in-memory-shares-ledger.js";
import { InMemoryValuation } from "./vault/in-memory-valuation.js";

/** Kinds under which the built-in fees are registered. */
export const BuiltInFeeKind = {
	Management: "management",
	Performance: "performance",
	EntranceRateBurn: "entrance_rate_burn",
	EntranceRateDirect: "entrance_rate_direct",
} as const;

export type BuiltInFeeKind = (typeof BuiltInFeeKind)[keyof typeof BuiltInFeeKind];

export interface FeeEngineOptions {
	/** Applied over the environment and the defaults. */
	readonly config?: Partial<EngineConfig> | undefined;
	/** Environment read by configFromEnv; process.env when omitted. */
	readonly env?: Readonly<Record<string, string | undefined>> | undefined;
	readonly clock?: ChainClock | undefined;
	/** Replaces the pino logger built from the configured level. */
	readonly logger?: Logger | undefined;
	readonly managementFeePolicy?: ManagementFeePolicy | undefined;
}

export interface FeeEngine {
	readonly config: EngineConfig;
	readonly logger: Logger;
	readonly clock: ChainClock;
	readonly converter: RateConverter;
	readonly sharesLedger: InMemorySharesLedger;
	readonly valuation: InMemoryValuation;
	readonly feeManager: FeeManager;
	readonly controller: FundController;
}

export const ENGINE_ACCOUNTS = {
	feeManager: accountId("fee-manager"),
	controller: accountId("fund-controller"),
	managementFee: accountId("fee:management"),
	performanceFee: accountId("fee:performance"),
	entranceRateBurnFee: accountId("fee:entrance_rate_burn"),
	entranceRateDirectFee: accountId("fee:entrance_rate_direct"),
} as const;

/**
 * @throws ConfigError if the environment or the overrides are invalid
 *
 * @example
 * ```ts
 * const engine = createFeeEngine({ clock: new FakeChainClock(1_000n) });
 * engine.controller.createFund(fundId("fund-1"), {
 *   recipient: accountId("owner"),
 *   fees: [{ kind: "management", settings: { annualRate: 20_000_000_000_000_000n } }],
 * });
 * ```
 */
export function createFeeEngine(options: FeeEngineOptions = {}): FeeEngine {
	const config = resolveEngineConfig({
		...configFromEnv(options.env ?? process.env),
		...options.config,
	});
	const logger = options.logger ?? createLogger({ level: config.logLevel });
	const clock = options.clock ?? SystemChainClock;
	const converter = RateConverter.create(config);

	const sharesLedger = new InMemorySharesLedger([
		ENGINE_ACCOUNTS.feeManager,
		ENGINE_ACCOUNTS.controller,
	]);
	const valuation = new InMemoryValuation();

	const feeManager = new FeeManager({
		account: ENGINE_ACCOUNTS.feeManager,
		sharesLedger,
		valuation,
		clock,
		logger,
	});
	feeManager.registerFee(
		new ManagementFee({
			account: ENGINE_ACCOUNTS.managementFee,
			kind: feeKind(BuiltInFeeKind.Management),
			feeManager: ENGINE_ACCOUNTS.feeManager,
			converter,
			policy: options.managementFeePolicy ?? ManagementFeePolicy.Mint,
		}),
	);
	feeManager.registerFee(
		new PerformanceFee({
			account: ENGINE_ACCOUNTS.performanceFee,
			kind: feeKind(BuiltInFeeKind.Performance),
			feeManager: ENGINE_ACCOUNTS.feeManager,
		}),
	);
	feeManager.registerFee(
		new EntranceRateFee({
			account: ENGINE_ACCOUNTS.entranceRateBurnFee,
			kind: feeKind(BuiltInFeeKind.EntranceRateBurn),
			feeManager: ENGINE_ACCOUNTS.feeManager,
			mode: EntranceRateMode.Burn,
		}),
	);
	feeManager.registerFee(
		new EntranceRateFee({
			account: ENGINE_ACCOUNTS.entranceRateDirectFee,
			kind: feeKind(BuiltInFeeKind.EntranceRateDirect),
			feeManager: ENGINE_ACCOUNTS.feeManager,
			mode: EntranceRateMode.Direct,
		}),
	);

	const controller = new FundController({
		account: ENGINE_ACCOUNTS.controller,
		feeManager,
		sharesLedger,
		assets: valuation,
		logger,
	});

	logger.debug(
		{
			secondsPerYear: config.secondsPerYear,
			maxAnnualRate: config.maxAnnualRate,
			fees: feeManager.registeredFees(),
		},
		"Fee engine ready",
	);
	return { config, logger, clock, converter, sharesLedger, valuation, feeManager, controller };
}
