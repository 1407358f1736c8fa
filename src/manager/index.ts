export { FeeManager } from "./fee-manager.js";
export { toHookEvent } from "./hook-events.js";
export type {
	AppliedSettlement,
	DispatchOptions,
	FeeConfiguredEvent,
	FeeManagerEvents,
	FeeManagerOptions,
	FeeSelection,
	FeeSettledEvent,
	FundFeeConfig,
	MigrationReport,
	PayoutReport,
	SharesOutstandingPaidEvent,
} from "./types.js";
