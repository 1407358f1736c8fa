// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type FundId,
	type FeeKind,
	type AccountId,
	fundId,
	feeKind,
	accountId,
	idToString,
	type Result,
	ok,
	err,
	isOk,
	isErr,
	unwrap,
	unwrapOr,
	attempt,
	ErrorCategory,
	FeeEngineError,
	RateOutOfRangeError,
	ArithmeticOverflowError,
	NotMonotonicError,
	InsufficientSharesError,
	AlreadyConfiguredError,
	UnauthorizedCallerError,
	UnknownFeeKindError,
	FundNotInitializedError,
	InvalidSettlementError,
	ConcurrentSettlementError,
	ConfigError,
	SystemError,
	classifyError,
	isFeeEngineError,
	isUnauthorized,
	WAD,
	RAY,
	UINT256_MAX,
	mulDivDown,
	rpow,
	type Restore,
	type ChainClock,
	SystemChainClock,
	FakeChainClock,
	Duration,
	type EngineConfig,
	DEFAULT_ENGINE_CONFIG,
	configFromEnv,
	resolveEngineConfig,
} from "./shared/index.js";

// ── Rates ────────────────────────────────────────────────────────────
export {
	type RateConverterConfig,
	RateConverter,
	parseAnnualRate,
	formatRate,
	sharesDue,
} from "./rates/index.js";

// ── Fees ─────────────────────────────────────────────────────────────
export {
	FeeHook,
	SettlementType,
	NO_SETTLEMENT,
	type HookPayload,
	type HookEvent,
	type SettlementInstruction,
	type SettleContext,
	type ActivationContext,
	type FeeCapabilities,
	type FeeInfo,
	type ManagementFeeInfo,
	type PerformanceFeeInfo,
	type EntranceRateFeeInfo,
	type Fee,
	FeeLedger,
	type FeeLedgerEntry,
	OutstandingBucket,
	ManagementFee,
	ManagementFeePolicy,
	type ManagementFeeSettings,
	PerformanceFee,
	type PerformanceFeeSettings,
	sharePrice,
	EntranceRateFee,
	EntranceRateMode,
	type EntranceRateFeeSettings,
} from "./fees/index.js";

// ── Fee Manager ──────────────────────────────────────────────────────
export {
	FeeManager,
	type FeeManagerOptions,
	type FundFeeConfig,
	type FeeSelection,
	type DispatchOptions,
	type AppliedSettlement,
	type PayoutReport,
	type MigrationReport,
	type FeeManagerEvents,
	type FeeSettledEvent,
	type FeeConfiguredEvent,
	type SharesOutstandingPaidEvent,
} from "./manager/index.js";

// ── Vault ────────────────────────────────────────────────────────────
export {
	type SharesLedger,
	type ValuationSource,
	type FundAssets,
	type FundShareRegistry,
	InMemorySharesLedger,
	InMemoryValuation,
	FundController,
	type BuyReceipt,
	type RedeemReceipt,
	type CreateFundOptions,
} from "./vault/index.js";

// ── Engine ───────────────────────────────────────────────────────────
export {
	createFeeEngine,
	BuiltInFeeKind,
	ENGINE_ACCOUNTS,
	type FeeEngine,
	type FeeEngineOptions,
} from "./engine.js";

// ── Infrastructure ───────────────────────────────────────────────────
export {
	type Logger,
	type LoggerConfig,
	type LogLevel,
	createLogger,
	silentLogger,
} from "./lib/logger/index.js";
export { TypedEmitter, type EventMap } from "./lib/events/index.js";
export { ValidationError, type ValidationIssue, validate } from "./lib/validation/index.js";
export { parseUnits, formatUnits } from "./lib/decimal/index.js";
