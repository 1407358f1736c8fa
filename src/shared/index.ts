export {
	type FundId,
	type FeeKind,
	type AccountId,
	fundId,
	feeKind,
	accountId,
	idToString,
} from "./identifiers.js";

export {
	type Result,
	ok,
	err,
	map,
	unwrap,
	unwrapOr,
	isOk,
	isErr,
	attempt,
} from "./result.js";

export {
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
} from "./errors.js";

export {
	WAD,
	RAY,
	WAD_TO_RAY,
	UINT256_MAX,
	checkedAdd,
	checkedSub,
	checkedMul,
	mulDivDown,
	rpow,
	maxBigInt,
	minBigInt,
} from "./fixed-point.js";

export { type Restore, checkpointMap, combineRestores } from "./checkpoint.js";
export { type ChainClock, SystemChainClock, FakeChainClock, Duration } from "./time.js";
export {
	type EngineConfig,
	DEFAULT_ENGINE_CONFIG,
	configFromEnv,
	resolveEngineConfig,
} from "./config.js";
