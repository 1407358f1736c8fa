import type { Restore } from "../shared/checkpoint.js";
import type { AccountId, FundId } from "../shared/identifiers.js";

/**
 * A fund's share token as the fee engine sees it. Mutations name the caller
 * and are restricted to authorized principals.
 */
export interface SharesLedger {
	getSharesSupply(fundId: FundId): bigint;
	getBalance(fundId: FundId, holder: AccountId): bigint;
	/** The account that holds shares minted as outstanding fees. */
	getOutstandingHolder(fundId: FundId): AccountId;
	mintShares(caller: AccountId, fundId: FundId, to: AccountId, amount: bigint): void;
	burnShares(caller: AccountId, fundId: FundId, from: AccountId, amount: bigint): void;
	transferShares(
		caller: AccountId,
		fundId: FundId,
		from: AccountId,
		to: AccountId,
		amount: bigint,
	): void;
	/** Saves every fund's shares, or only `fundId`'s. */
	checkpoint(fundId?: FundId): Restore;
}

/** Gross asset value of a fund, in its denomination asset's smallest unit. */
export interface ValuationSource {
	calcGav(fundId: FundId): bigint;
}

/** A valuation source whose assets move when shares are bought or redeemed. */
export interface FundAssets extends ValuationSource {
	deposit(fundId: FundId, amount: bigint): void;
	withdraw(fundId: FundId, amount: bigint): void;
	checkpoint(fundId?: FundId): Restore;
}

/** A shares ledger that can open a register for a new fund. */
export interface FundShareRegistry extends SharesLedger {
	registerFund(caller: AccountId, fundId: FundId, outstandingHolder?: AccountId): void;
	hasFund(fundId: FundId): boolean;
}
