export {
	FeeHook,
	SettlementType,
	NO_SETTLEMENT,
	payerOf,
	type HookPayloads,
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
	type Restore,
	type Fee,
} from "./types.js";
export { OwnedStore, requireCaller } from "./owned-store.js";
export { type FeeLedgerEntry, FeeLedger } from "./fee-ledger.js";
export { OutstandingBucket } from "./outstanding-bucket.js";
export {
	ManagementFeePolicy,
	type ManagementFeeOptions,
	type ManagementFeeSettings,
	ManagementFee,
} from "./management-fee.js";
export {
	type PerformanceFeeOptions,
	type PerformanceFeeSettings,
	PerformanceFee,
	sharePrice,
} from "./performance-fee.js";
export {
	EntranceRateMode,
	type EntranceRateFeeOptions,
	type EntranceRateFeeSettings,
	EntranceRateFee,
} from "./entrance-rate-fee.js";
