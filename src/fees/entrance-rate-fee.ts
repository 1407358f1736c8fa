/**
 * EntranceRateFee — a flat cut of every share purchase.
 *
 * Settles after a buy: `sharesBought * rate / 1e18` of the buyer's new shares
 * are either burned (value stays with existing holders) or handed directly to
 * the fee recipient.
 */

import { parseOrThrow, z } from "../lib/validation/index.js";
import { AlreadyConfiguredError } from "../shared/errors.js";
import { WAD, mulDivDown } from "../shared/fixed-point.js";
import { type AccountId, type FeeKind, type FundId, feeKind } from "../shared/identifiers.js";
import { OwnedStore, requireCaller } from "./owned-store.js";
import {
	type ActivationContext,
	type EntranceRateFeeInfo,
	type Fee,
	type FeeCapabilities,
	FeeHook,
	NO_SETTLEMENT,
	type Restore,
	type SettleContext,
	type SettlementInstruction,
	SettlementType,
} from "./types.js";

export const EntranceRateMode = {
	Burn: "burn",
	Direct: "direct",
} as const;

export type EntranceRateMode = (typeof EntranceRateMode)[keyof typeof EntranceRateMode];

export interface EntranceRateFeeOptions {
	readonly account: AccountId;
	readonly feeManager: AccountId;
	readonly mode: EntranceRateMode;
	readonly kind?: FeeKind;
}

const settingsSchema = z
	.object({
		rate: z.bigint().positive().lt(WAD),
	})
	.strict();

export type EntranceRateFeeSettings = z.input<typeof settingsSchema>;

const CAPABILITIES: FeeCapabilities = {
	settlesOn: [FeeHook.PostBuyShares],
	updatesOn: [],
	usesGavOnSettle: false,
	usesGavOnUpdate: false,
};

export class EntranceRateFee implements Fee<EntranceRateFeeInfo> {
	readonly kind: FeeKind;
	readonly capabilities = CAPABILITIES;
	readonly mode: EntranceRateMode;

	private readonly account: AccountId;
	private readonly feeManager: AccountId;
	private readonly rates: OwnedStore<bigint>;

	constructor(options: EntranceRateFeeOptions) {
		this.mode = options.mode;
		this.kind = options.kind ?? feeKind(`entrance_rate_${options.mode}`);
		this.account = options.account;
		this.feeManager = options.feeManager;
		this.rates = new OwnedStore(options.account, "EntranceRateFee");
	}

	addFundSettings(caller: AccountId, fundId: FundId, settings: unknown): void {
		requireCaller(caller, this.feeManager, "EntranceRateFee.addFundSettings");
		const { rate } = parseOrThrow(settingsSchema, settings, "Invalid entrance rate fee settings");
		if (this.rates.has(fundId)) {
			throw new AlreadyConfiguredError("Entrance rate fee already configured for fund", { fundId });
		}
		this.rates.set(this.account, fundId, rate);
	}

	activateForFund(caller: AccountId, fundId: FundId, _ctx: ActivationContext): void {
		requireCaller(caller, this.feeManager, "EntranceRateFee.activateForFund");
		this.rates.require(fundId);
	}

	settle(caller: AccountId, ctx: SettleContext): SettlementInstruction {
		requireCaller(caller, this.feeManager, "EntranceRateFee.settle");
		const rate = this.rates.require(ctx.fundId);
		if (ctx.event.hook !== FeeHook.PostBuyShares) return NO_SETTLEMENT;

		const due = mulDivDown(ctx.event.sharesBought, rate, WAD);
		if (due === 0n) return NO_SETTLEMENT;
		return {
			type: this.mode === EntranceRateMode.Burn ? SettlementType.Burn : SettlementType.Direct,
			sharesDue: due,
		};
	}

	update(caller: AccountId, _ctx: SettleContext): void {
		requireCaller(caller, this.feeManager, "EntranceRateFee.update");
	}

	payout(caller: AccountId, fundId: FundId, _now: bigint): bigint {
		requireCaller(caller, this.feeManager, "EntranceRateFee.payout");
		this.rates.require(fundId);
		return 0n;
	}

	releaseOutstanding(caller: AccountId, fundId: FundId, _now: bigint): bigint {
		requireCaller(caller, this.feeManager, "EntranceRateFee.releaseOutstanding");
		this.rates.require(fundId);
		return 0n;
	}

	sharesOutstanding(_fundId: FundId): bigint {
		return 0n;
	}

	isConfigured(fundId: FundId): boolean {
		return this.rates.has(fundId);
	}

	getFeeInfoForFund(fundId: FundId): EntranceRateFeeInfo {
		return { model: "entrance_rate", rate: this.rates.require(fundId) };
	}

	checkpoint(fundId?: FundId): Restore {
		return this.rates.checkpoint(fundId);
	}
}
