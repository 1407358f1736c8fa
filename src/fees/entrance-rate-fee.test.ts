import { describe, expect, it } from "vitest";
import { ValidationError } from "../lib/validation/index.js";
import { FundNotInitializedError, UnauthorizedCallerError } from "../shared/errors.js";
import { WAD } from "../shared/fixed-point.js";
import { accountId, fundId } from "../shared/identifiers.js";
import { EntranceRateFee, EntranceRateMode } from "./entrance-rate-fee.js";
import { FeeHook, type HookEvent, type SettleContext, SettlementType } from "./types.js";

const manager = accountId("fee-manager");
const buyer = accountId("investor");
const fund = fundId("fund-1");

function postBuy(sharesBought: bigint): SettleContext {
	const event: HookEvent = {
		hook: FeeHook.PostBuyShares,
		buyer,
		investmentAmount: sharesBought,
		sharesBought,
	};
	return { fundId: fund, event, sharesSupply: sharesBought, totalSharesOutstanding: 0n, gav: null, now: 1n };
}

function makeFee(mode: EntranceRateMode): EntranceRateFee {
	const fee = new EntranceRateFee({ account: accountId("entrance-fee"), feeManager: manager, mode });
	fee.addFundSettings(manager, fund, { rate: WAD / 100n });
	return fee;
}

describe("EntranceRateFee", () => {
	it("names itself after its mode", () => {
		expect(makeFee(EntranceRateMode.Burn).kind).toBe("entrance_rate_burn");
		expect(makeFee(EntranceRateMode.Direct).kind).toBe("entrance_rate_direct");
	});

	it("settles only after buys", () => {
		expect(makeFee(EntranceRateMode.Burn).capabilities.settlesOn).toEqual([FeeHook.PostBuyShares]);
	});

	it("burns 1% of the shares bought", () => {
		expect(makeFee(EntranceRateMode.Burn).settle(manager, postBuy(500n * WAD))).toEqual({
			type: SettlementType.Burn,
			sharesDue: 5n * WAD,
		});
	});

	it("transfers 1% of the shares bought in direct mode", () => {
		expect(makeFee(EntranceRateMode.Direct).settle(manager, postBuy(500n * WAD))).toEqual({
			type: SettlementType.Direct,
			sharesDue: 5n * WAD,
		});
	});

	it("rounds a tiny purchase down to no settlement", () => {
		expect(makeFee(EntranceRateMode.Burn).settle(manager, postBuy(99n)).type).toBe(
			SettlementType.None,
		);
	});

	it("ignores other hooks", () => {
		const fee = makeFee(EntranceRateMode.Burn);
		const instruction = fee.settle(manager, {
			fundId: fund,
			event: { hook: FeeHook.Continuous },
			sharesSupply: WAD,
			totalSharesOutstanding: 0n,
			gav: null,
			now: 1n,
		});
		expect(instruction.type).toBe(SettlementType.None);
	});

	it("never holds or pays out outstanding shares", () => {
		const fee = makeFee(EntranceRateMode.Direct);
		expect(fee.sharesOutstanding(fund)).toBe(0n);
		expect(fee.payout(manager, fund, 10n)).toBe(0n);
	});

	it.each([
		["a zero rate", { rate: 0n }],
		["a 100% rate", { rate: WAD }],
		["an extra field", { rate: 1n, period: 1n }],
	])("rejects %s", (_label, settings) => {
		const fee = new EntranceRateFee({
			account: accountId("entrance-fee"),
			feeManager: manager,
			mode: EntranceRateMode.Burn,
		});
		expect(() => fee.addFundSettings(manager, fund, settings)).toThrow(ValidationError);
	});

	it("reports its rate", () => {
		expect(makeFee(EntranceRateMode.Burn).getFeeInfoForFund(fund)).toEqual({
			model: "entrance_rate",
			rate: WAD / 100n,
		});
	});

	it("throws for an unconfigured fund", () => {
		const fee = makeFee(EntranceRateMode.Burn);
		expect(() => fee.getFeeInfoForFund(fundId("fund-2"))).toThrow(FundNotInitializedError);
	});

	it("rejects other callers", () => {
		const fee = makeFee(EntranceRateMode.Burn);
		expect(() => fee.settle(buyer, postBuy(WAD))).toThrow(UnauthorizedCallerError);
	});
});
