/**
 * ManagementFee — time-based dilution at a fixed annual rate.
 *
 * Per fund: Unconfigured → Configured (lastSettled = 0) → Active. The first
 * settlement only starts the clock; later ones mint shares for the time since
 * the previous one, compounded per second. Shares already set aside as
 * outstanding fees are excluded from the base.
 */

import { parseOrThrow, z } from "../lib/validation/index.js";
import { sharesDue } from "../rates/accrual.js";
import type { RateConverter } from "../rates/rate-converter.js";
import { combineRestores } from "../shared/checkpoint.js";
import { NotMonotonicError } from "../shared/errors.js";
import { checkedSub } from "../shared/fixed-point.js";
import { type AccountId, type FeeKind, type FundId, feeKind } from "../shared/identifiers.js";
import { FeeLedger } from "./fee-ledger.js";
import { OutstandingBucket } from "./outstanding-bucket.js";
import { requireCaller } from "./owned-store.js";
import {
	type ActivationContext,
	type Fee,
	type FeeCapabilities,
	FeeHook,
	type ManagementFeeInfo,
	NO_SETTLEMENT,
	type Restore,
	type SettleContext,
	type SettlementInstruction,
	SettlementType,
} from "./types.js";

/** Where accrued management fees go. */
export const ManagementFeePolicy = {
	/** Mint straight to the recipient. */
	Mint: "mint",
	/** Mint to the outstanding holder; released by payout. */
	Outstanding: "outstanding",
} as const;

export type ManagementFeePolicy = (typeof ManagementFeePolicy)[keyof typeof ManagementFeePolicy];

export interface ManagementFeeOptions {
	/** Principal the fee's own ledger and bucket belong to. */
	readonly account: AccountId;
	readonly feeManager: AccountId;
	readonly converter: RateConverter;
	readonly kind?: FeeKind;
	readonly policy?: ManagementFeePolicy;
}

/** Either the per-second factor itself or an annual wad rate to convert. */
const settingsSchema = z.union([
	z.object({ scaledPerSecondRate: z.bigint() }).strict(),
	z.object({ annualRate: z.bigint() }).strict(),
]);

export type ManagementFeeSettings = z.input<typeof settingsSchema>;

const CAPABILITIES: FeeCapabilities = {
	settlesOn: [FeeHook.Continuous, FeeHook.PreBuyShares, FeeHook.PreRedeemShares],
	updatesOn: [],
	usesGavOnSettle: false,
	usesGavOnUpdate: false,
};

export class ManagementFee implements Fee<ManagementFeeInfo> {
	readonly kind: FeeKind;
	readonly capabilities = CAPABILITIES;
	readonly policy: ManagementFeePolicy;

	private readonly account: AccountId;
	private readonly feeManager: AccountId;
	private readonly converter: RateConverter;
	private readonly ledger: FeeLedger;
	private readonly bucket: OutstandingBucket;

	constructor(options: ManagementFeeOptions) {
		this.kind = options.kind ?? feeKind("management");
		this.policy = options.policy ?? ManagementFeePolicy.Mint;
		this.account = options.account;
		this.feeManager = options.feeManager;
		this.converter = options.converter;
		this.ledger = new FeeLedger(options.account);
		this.bucket = new OutstandingBucket(options.account);
	}

	// ── Configuration ──────────────────────────────────────────────

	/**
	 * @throws ValidationError if settings match neither accepted shape
	 * @throws RateOutOfRangeError if the rate is outside the converter's range
	 * @throws AlreadyConfiguredError on a second call for the fund
	 */
	addFundSettings(caller: AccountId, fundId: FundId, settings: unknown): void {
		requireCaller(caller, this.feeManager, "ManagementFee.addFundSettings");
		const parsed = parseOrThrow(settingsSchema, settings, "Invalid management fee settings");

		let rate: bigint;
		if ("scaledPerSecondRate" in parsed) {
			rate = parsed.scaledPerSecondRate;
			this.converter.assertPerSecondRate(rate);
		} else {
			rate = this.converter.toPerSecondRate(parsed.annualRate);
		}
		this.ledger.addFundSettings(this.account, fundId, rate);
	}

	/** A fund that already has shares starts accruing from activation. */
	activateForFund(caller: AccountId, fundId: FundId, ctx: ActivationContext): void {
		requireCaller(caller, this.feeManager, "ManagementFee.activateForFund");
		this.ledger.getLedger(fundId);
		if (ctx.sharesSupply > 0n) {
			this.ledger.recordSettlement(this.account, fundId, ctx.now);
		}
	}

	// ── Settlement ─────────────────────────────────────────────────

	settle(caller: AccountId, ctx: SettleContext): SettlementInstruction {
		requireCaller(caller, this.feeManager, "ManagementFee.settle");
		const { scaledPerSecondRate, lastSettled } = this.ledger.getLedger(ctx.fundId);

		let due = 0n;
		if (lastSettled !== 0n) {
			if (ctx.now < lastSettled) {
				throw new NotMonotonicError("Settlement timestamp moved backwards", {
					fundId: ctx.fundId,
					lastSettled,
					now: ctx.now,
				});
			}
			const netSharesSupply = checkedSub(ctx.sharesSupply, ctx.totalSharesOutstanding);
			due = sharesDue(scaledPerSecondRate, netSharesSupply, ctx.now - lastSettled);
		}

		this.ledger.recordSettlement(this.account, ctx.fundId, ctx.now);

		if (due === 0n) return NO_SETTLEMENT;
		if (this.policy === ManagementFeePolicy.Outstanding) {
			this.bucket.increase(this.account, ctx.fundId, due);
			return { type: SettlementType.MintSharesOutstanding, sharesDue: due };
		}
		return { type: SettlementType.Mint, sharesDue: due };
	}

	/** Management fees observe no hooks. */
	update(caller: AccountId, _ctx: SettleContext): void {
		requireCaller(caller, this.feeManager, "ManagementFee.update");
	}

	payout(caller: AccountId, fundId: FundId, _now: bigint): bigint {
		requireCaller(caller, this.feeManager, "ManagementFee.payout");
		this.ledger.getLedger(fundId);
		if (this.policy === ManagementFeePolicy.Mint) return 0n;
		return this.bucket.drain(this.account, fundId);
	}

	releaseOutstanding(caller: AccountId, fundId: FundId, _now: bigint): bigint {
		requireCaller(caller, this.feeManager, "ManagementFee.releaseOutstanding");
		this.ledger.getLedger(fundId);
		return this.bucket.drain(this.account, fundId);
	}

	// ── Queries ────────────────────────────────────────────────────

	sharesOutstanding(fundId: FundId): bigint {
		return this.bucket.balanceOf(fundId);
	}

	isConfigured(fundId: FundId): boolean {
		return this.ledger.hasFund(fundId);
	}

	getFeeInfoForFund(fundId: FundId): ManagementFeeInfo {
		const entry = this.ledger.getLedger(fundId);
		return { model: "management", ...entry };
	}

	/** The annual rate the fund was configured with, recovered from its factor. */
	annualRateForFund(fundId: FundId): bigint {
		return this.converter.toAnnualRate(this.ledger.getLedger(fundId).scaledPerSecondRate);
	}

	checkpoint(fundId?: FundId): Restore {
		return combineRestores([this.ledger.checkpoint(fundId), this.bucket.checkpoint(fundId)]);
	}
}
