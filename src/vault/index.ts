export type { FundAssets, FundShareRegistry, SharesLedger, ValuationSource } from "./types.js";
export { InMemorySharesLedger } from "./in-memory-shares-ledger.js";
export { InMemoryValuation } from "./in-memory-valuation.js";
export {
	type BuyReceipt,
	type CreateFundOptions,
	type FundControllerOptions,
	type RedeemReceipt,
	FundController,
} from "./fund-controller.js";
