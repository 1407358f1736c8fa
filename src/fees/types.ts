/**
 * Fee contracts shared by the settlement engines and the fee manager.
 *
 * A fee declares, as plain data, which hooks it settles on and which it only
 * observes. The manager treats every fee through the same `Fee` interface.
 */

import type { Restore } from "../shared/checkpoint.js";
import type { AccountId, FeeKind, FundId } from "../shared/identifiers.js";

// ── Hooks ────────────────────────────────────────────────────────────

/** Lifecycle points at which a fund calls into its fees. */
export const FeeHook = {
	Continuous: "continuous",
	PreBuyShares: "pre_buy_shares",
	PostBuyShares: "post_buy_shares",
	PreRedeemShares: "pre_redeem_shares",
} as const;

export type FeeHook = (typeof FeeHook)[keyof typeof FeeHook];

/** Caller-supplied data for each hook. */
export interface HookPayloads {
	readonly continuous: Readonly<Record<string, never>>;
	readonly pre_buy_shares: { readonly buyer: AccountId; readonly investmentAmount: bigint };
	readonly post_buy_shares: {
		readonly buyer: AccountId;
		readonly investmentAmount: bigint;
		readonly sharesBought: bigint;
	};
	readonly pre_redeem_shares: { readonly redeemer: AccountId; readonly sharesRedeemed: bigint };
}

export type HookPayload<H extends FeeHook = FeeHook> = HookPayloads[H];

/** A hook together with its payload, discriminated on `hook`. */
export type HookEvent =
	| { readonly hook: typeof FeeHook.Continuous }
	| ({ readonly hook: typeof FeeHook.PreBuyShares } & HookPayloads["pre_buy_shares"])
	| ({ readonly hook: typeof FeeHook.PostBuyShares } & HookPayloads["post_buy_shares"])
	| ({ readonly hook: typeof FeeHook.PreRedeemShares } & HookPayloads["pre_redeem_shares"]);

/** The investor a Direct or Burn settlement charges, when the hook has one. */
export function payerOf(event: HookEvent): AccountId | null {
	switch (event.hook) {
		case FeeHook.PreBuyShares:
		case FeeHook.PostBuyShares:
			return event.buyer;
		case FeeHook.PreRedeemShares:
			return event.redeemer;
		case FeeHook.Continuous:
			return null;
	}
}

// ── Settlement ───────────────────────────────────────────────────────

/** How the fee manager realizes a fee's shares. */
export const SettlementType = {
	None: "none",
	/** Transfer from the payer to the recipient. */
	Direct: "direct",
	/** Mint to the recipient. */
	Mint: "mint",
	/** Burn from the payer. */
	Burn: "burn",
	/** Mint to the fund's outstanding-shares holder. */
	MintSharesOutstanding: "mint_shares_outstanding",
	/** Burn from the fund's outstanding-shares holder. */
	BurnSharesOutstanding: "burn_shares_outstanding",
} as const;

export type SettlementType = (typeof SettlementType)[keyof typeof SettlementType];

export interface SettlementInstruction {
	readonly type: SettlementType;
	readonly sharesDue: bigint;
}

export const NO_SETTLEMENT: SettlementInstruction = {
	type: SettlementType.None,
	sharesDue: 0n,
};

// ── Contexts ─────────────────────────────────────────────────────────

/** Fund state a fee sees when it is asked to settle or update. */
export interface SettleContext {
	readonly fundId: FundId;
	readonly event: HookEvent;
	/** Total supply, including shares held as outstanding fees. */
	readonly sharesSupply: bigint;
	/** Shares held by the fund's outstanding-shares holder, across all fees. */
	readonly totalSharesOutstanding: bigint;
	/** Gross asset value; null unless the fee declared it needs GAV for this call. */
	readonly gav: bigint | null;
	readonly now: bigint;
}

export interface ActivationContext {
	readonly fundId: FundId;
	readonly sharesSupply: bigint;
	readonly gav: bigint | null;
	readonly now: bigint;
}

// ── Fee contract ─────────────────────────────────────────────────────

export interface FeeCapabilities {
	readonly settlesOn: readonly FeeHook[];
	readonly updatesOn: readonly FeeHook[];
	readonly usesGavOnSettle: boolean;
	readonly usesGavOnUpdate: boolean;
}

export interface ManagementFeeInfo {
	readonly model: "management";
	readonly scaledPerSecondRate: bigint;
	readonly lastSettled: bigint;
}

export interface PerformanceFeeInfo {
	readonly model: "performance";
	readonly rate: bigint;
	readonly period: bigint;
	readonly activated: bigint;
	readonly lastPaid: bigint;
	readonly highWaterMark: bigint;
	readonly lastSharePrice: bigint;
	readonly aggregateValueDue: bigint;
}

export interface EntranceRateFeeInfo {
	readonly model: "entrance_rate";
	readonly rate: bigint;
}

export type FeeInfo = ManagementFeeInfo | PerformanceFeeInfo | EntranceRateFeeInfo;

export type { Restore } from "../shared/checkpoint.js";

/**
 * A settlement engine for one fee kind.
 *
 * Every mutating method takes the caller's identity and rejects anyone but
 * the fee manager the fee was built for.
 */
export interface Fee<TInfo extends FeeInfo = FeeInfo> {
	readonly kind: FeeKind;
	readonly capabilities: FeeCapabilities;

	/** One-time per fund. Settings are validated by the fee's own schema. */
	addFundSettings(caller: AccountId, fundId: FundId, settings: unknown): void;
	activateForFund(caller: AccountId, fundId: FundId, ctx: ActivationContext): void;
	settle(caller: AccountId, ctx: SettleContext): SettlementInstruction;
	update(caller: AccountId, ctx: SettleContext): void;
	/** Releases shares from the fund's outstanding bucket; 0n when nothing is due. */
	payout(caller: AccountId, fundId: FundId, now: bigint): bigint;
	/** Releases the whole bucket regardless of payout conditions, as on migration. */
	releaseOutstanding(caller: AccountId, fundId: FundId, now: bigint): bigint;

	sharesOutstanding(fundId: FundId): bigint;
	isConfigured(fundId: FundId): boolean;
	getFeeInfoForFund(fundId: FundId): TInfo;
	/** Saves the fee's state for every fund, or only for `fundId`. */
	checkpoint(fundId?: FundId): Restore;
}
