/**
 * PerformanceFee — crystallising high-water-mark fee on share price.
 *
 * Between payouts the fee tracks the value earned above the high-water mark
 * and keeps the shares owed for it in the outstanding bucket, minting more as
 * the share price rises and burning back as it falls. A payout, allowed once
 * per period, releases the bucket and lifts the high-water mark.
 */

import { parseOrThrow, z } from "../lib/validation/index.js";
import { combineRestores } from "../shared/checkpoint.js";
import { AlreadyConfiguredError, InvalidSettlementError } from "../shared/errors.js";
import { WAD, checkedSub, maxBigInt, mulDivDown } from "../shared/fixed-point.js";
import { type AccountId, type FeeKind, type FundId, feeKind } from "../shared/identifiers.js";
import { OutstandingBucket } from "./outstanding-bucket.js";
import { OwnedStore, requireCaller } from "./owned-store.js";
import {
	type ActivationContext,
	type Fee,
	type FeeCapabilities,
	FeeHook,
	NO_SETTLEMENT,
	type PerformanceFeeInfo,
	type Restore,
	type SettleContext,
	type SettlementInstruction,
	SettlementType,
} from "./types.js";

export interface PerformanceFeeOptions {
	readonly account: AccountId;
	readonly feeManager: AccountId;
	readonly kind?: FeeKind;
}

const settingsSchema = z
	.object({
		/** Share of value above the high-water mark, wad-scaled. */
		rate: z.bigint().positive().max(WAD),
		/** Crystallisation period in seconds. */
		period: z.bigint().positive(),
	})
	.strict();

export type PerformanceFeeSettings = z.input<typeof settingsSchema>;

type PerformanceFeeState = Omit<PerformanceFeeInfo, "model">;

const CAPABILITIES: FeeCapabilities = {
	settlesOn: [FeeHook.Continuous, FeeHook.PreBuyShares, FeeHook.PreRedeemShares],
	updatesOn: [FeeHook.Continuous, FeeHook.PostBuyShares, FeeHook.PreRedeemShares],
	usesGavOnSettle: true,
	usesGavOnUpdate: true,
};

function requireGav(ctx: { readonly fundId: FundId; readonly gav: bigint | null }): bigint {
	if (ctx.gav === null) {
		throw new InvalidSettlementError("Performance fee needs the fund's GAV", {
			fundId: ctx.fundId,
		});
	}
	return ctx.gav;
}

/** Share price at wad scale; 1e18 when there are no shares. */
export function sharePrice(gav: bigint, sharesSupply: bigint): bigint {
	if (sharesSupply === 0n) return WAD;
	return mulDivDown(gav, WAD, sharesSupply);
}

export class PerformanceFee implements Fee<PerformanceFeeInfo> {
	readonly kind: FeeKind;
	readonly capabilities = CAPABILITIES;

	private readonly account: AccountId;
	private readonly feeManager: AccountId;
	private readonly state: OwnedStore<PerformanceFeeState>;
	private readonly bucket: OutstandingBucket;

	constructor(options: PerformanceFeeOptions) {
		this.kind = options.kind ?? feeKind("performance");
		this.account = options.account;
		this.feeManager = options.feeManager;
		this.state = new OwnedStore(options.account, "PerformanceFee");
		this.bucket = new OutstandingBucket(options.account);
	}

	// ── Configuration ──────────────────────────────────────────────

	addFundSettings(caller: AccountId, fundId: FundId, settings: unknown): void {
		requireCaller(caller, this.feeManager, "PerformanceFee.addFundSettings");
		const { rate, period } = parseOrThrow(
			settingsSchema,
			settings,
			"Invalid performance fee settings",
		);
		if (this.state.has(fundId)) {
			throw new AlreadyConfiguredError("Performance fee already configured for fund", { fundId });
		}
		this.state.set(this.account, fundId, {
			rate,
			period,
			activated: 0n,
			lastPaid: 0n,
			highWaterMark: 0n,
			lastSharePrice: 0n,
			aggregateValueDue: 0n,
		});
	}

	/**
	 * Starts the first period and sets the high-water mark to the current share price.
	 * @throws InvalidSettlementError if the fund has shares but they are worth nothing
	 */
	activateForFund(caller: AccountId, fundId: FundId, ctx: ActivationContext): void {
		requireCaller(caller, this.feeManager, "PerformanceFee.activateForFund");
		const current = this.state.require(fundId);
		const price = sharePrice(requireGav(ctx), ctx.sharesSupply);
		if (price === 0n) {
			throw new InvalidSettlementError("Cannot set a high-water mark from a zero share price", {
				fundId,
				gav: ctx.gav,
				sharesSupply: ctx.sharesSupply,
			});
		}
		this.state.set(this.account, fundId, {
			...current,
			activated: ctx.now,
			highWaterMark: price,
			lastSharePrice: price,
		});
	}

	// ── Settlement ─────────────────────────────────────────────────

	settle(caller: AccountId, ctx: SettleContext): SettlementInstruction {
		requireCaller(caller, this.feeManager, "PerformanceFee.settle");
		const current = this.state.require(ctx.fundId);
		const gav = requireGav(ctx);
		const netSharesSupply = checkedSub(ctx.sharesSupply, ctx.totalSharesOutstanding);
		if (netSharesSupply === 0n) return NO_SETTLEMENT;

		const nextSharePrice = mulDivDown(gav, WAD, netSharesSupply);
		const hwm = current.highWaterMark;
		const superHwmValue =
			((maxBigInt(hwm, nextSharePrice) - maxBigInt(hwm, current.lastSharePrice)) *
				netSharesSupply) /
			WAD;

		let nextAggregateValueDue = current.aggregateValueDue + (superHwmValue * current.rate) / WAD;
		if (nextAggregateValueDue < 0n) nextAggregateValueDue = 0n;

		let sharesForValue = 0n;
		if (nextAggregateValueDue > 0n) {
			// shares for the value due dilute the remaining GAV, which must stay positive
			if (nextAggregateValueDue >= gav) {
				throw new InvalidSettlementError("Performance fee value due exceeds the fund's GAV", {
					fundId: ctx.fundId,
					gav,
					aggregateValueDue: nextAggregateValueDue,
				});
			}
			sharesForValue = mulDivDown(
				nextAggregateValueDue,
				netSharesSupply,
				checkedSub(gav, nextAggregateValueDue),
			);
		}

		const outstanding = this.bucket.balanceOf(ctx.fundId);
		const delta = sharesForValue - outstanding;

		this.state.set(this.account, ctx.fundId, {
			...current,
			aggregateValueDue: nextAggregateValueDue,
			lastSharePrice: nextSharePrice,
		});

		if (delta > 0n) {
			this.bucket.increase(this.account, ctx.fundId, delta);
			return { type: SettlementType.MintSharesOutstanding, sharesDue: delta };
		}
		if (delta < 0n) {
			this.bucket.decrease(this.account, ctx.fundId, -delta);
			return { type: SettlementType.BurnSharesOutstanding, sharesDue: -delta };
		}
		return NO_SETTLEMENT;
	}

	/** Refreshes the last share price after shares were bought or redeemed. */
	update(caller: AccountId, ctx: SettleContext): void {
		requireCaller(caller, this.feeManager, "PerformanceFee.update");
		const current = this.state.require(ctx.fundId);
		const gav = requireGav(ctx);
		const netSharesSupply = checkedSub(ctx.sharesSupply, ctx.totalSharesOutstanding);
		if (netSharesSupply === 0n) return;

		const nextSharePrice = mulDivDown(gav, WAD, netSharesSupply);
		if (nextSharePrice === current.lastSharePrice) return;
		this.state.set(this.account, ctx.fundId, { ...current, lastSharePrice: nextSharePrice });
	}

	/**
	 * A full period must have passed since activation, and the current period
	 * must have started after the last payout.
	 */
	payoutAllowed(fundId: FundId, now: bigint): boolean {
		const { activated, period, lastPaid } = this.state.require(fundId);
		if (now < activated) return false;
		const sinceActivated = now - activated;
		if (sinceActivated < period) return false;
		const periodStart = now - (sinceActivated % period);
		return lastPaid < periodStart;
	}

	/** Crystallises the fee: lifts the high-water mark and releases the bucket. */
	payout(caller: AccountId, fundId: FundId, now: bigint): bigint {
		requireCaller(caller, this.feeManager, "PerformanceFee.payout");
		if (!this.payoutAllowed(fundId, now)) return 0n;
		return this.crystallise(fundId, now);
	}

	/** Crystallises whether or not a period has passed. */
	releaseOutstanding(caller: AccountId, fundId: FundId, now: bigint): bigint {
		requireCaller(caller, this.feeManager, "PerformanceFee.releaseOutstanding");
		return this.crystallise(fundId, now);
	}

	private crystallise(fundId: FundId, now: bigint): bigint {
		const current = this.state.require(fundId);
		this.state.set(this.account, fundId, {
			...current,
			highWaterMark: maxBigInt(current.highWaterMark, current.lastSharePrice),
			aggregateValueDue: 0n,
			lastPaid: now,
		});
		return this.bucket.drain(this.account, fundId);
	}

	// ── Queries ────────────────────────────────────────────────────

	sharesOutstanding(fundId: FundId): bigint {
		return this.bucket.balanceOf(fundId);
	}

	isConfigured(fundId: FundId): boolean {
		return this.state.has(fundId);
	}

	getFeeInfoForFund(fundId: FundId): PerformanceFeeInfo {
		return { model: "performance", ...this.state.require(fundId) };
	}

	checkpoint(fundId?: FundId): Restore {
		return combineRestores([this.state.checkpoint(fundId), this.bucket.checkpoint(fundId)]);
	}
}
