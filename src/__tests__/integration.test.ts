import { beforeEach, describe, expect, it } from "vitest";
import {
	FakeChainClock,
	type FeeEngine,
	FeeHook,
	type FeeSettledEvent,
	ManagementFeePolicy,
	RateConverter,
	SettlementType,
	type SharesOutstandingPaidEvent,
	WAD,
	accountId,
	createFeeEngine,
	fundId,
	sharesDue,
	silentLogger,
} from "../index.js";

const OWNER = accountId("owner");
const ALICE = accountId("alice");
const FUND = fundId("fund-1");
const VAULT = accountId("fund-1:vault");

const TEN_PERCENT = WAD / 10n;
const TEN_PERCENT_FACTOR = 1_000_000_003_022_265_980_097_387_651n;
const TEN_SECONDS_OF_MANAGEMENT = 30_222_660_212n;
const DOUBLING_SHARES = 52_631_578_947_368_421n;

function engineAt(start: bigint, policy: ManagementFeePolicy = ManagementFeePolicy.Mint) {
	const clock = new FakeChainClock(start);
	const engine = createFeeEngine({
		env: {},
		clock,
		logger: silentLogger(),
		managementFeePolicy: policy,
	});
	return { clock, engine };
}

describe("fee settlement end to end", () => {
	it("accrues ten seconds of a 10% management fee on 1e18 shares", () => {
		const factor = RateConverter.create().toPerSecondRate(TEN_PERCENT);
		expect(factor).toBe(TEN_PERCENT_FACTOR);

		const due = sharesDue(factor, WAD, 10n);
		expect(due).toBe(TEN_SECONDS_OF_MANAGEMENT);
		expect(due).toBeLessThan(WAD / 1_000_000n);
	});

	it("charges nothing on a fund's first settlement and starts its clock", () => {
		const { engine } = engineAt(5_000n);
		engine.sharesLedger.registerFund(accountId("fund-controller"), FUND);
		engine.sharesLedger.mintShares(accountId("fund-controller"), FUND, ALICE, 1_000n * WAD);
		engine.feeManager.configureFees(FUND, {
			recipient: OWNER,
			fees: [{ kind: "management", settings: { annualRate: TEN_PERCENT } }],
		});

		expect(engine.feeManager.dispatchHook(FUND, FeeHook.Continuous, {})).toEqual([
			{ feeKind: "management", instruction: { type: SettlementType.None, sharesDue: 0n } },
		]);
		expect(engine.feeManager.getFeeInfoForFund(FUND, "management")).toMatchObject({
			lastSettled: 5_000n,
		});
	});

	it("pays an outstanding management fee out exactly once", () => {
		const { clock, engine } = engineAt(1_000n, ManagementFeePolicy.Outstanding);
		engine.controller.createFund(FUND, {
			recipient: OWNER,
			fees: [{ kind: "management", settings: { annualRate: TEN_PERCENT } }],
		});
		engine.controller.buyShares(FUND, ALICE, WAD);
		clock.advance(10n);

		expect(engine.controller.invokeContinuousHook(FUND)).toEqual([
			{
				feeKind: "management",
				instruction: {
					type: SettlementType.MintSharesOutstanding,
					sharesDue: TEN_SECONDS_OF_MANAGEMENT,
				},
			},
		]);
		expect(engine.feeManager.getSharesOutstanding(FUND, "management")).toBe(
			TEN_SECONDS_OF_MANAGEMENT,
		);

		expect(engine.controller.payoutSharesOutstanding(FUND, ["management"])).toEqual([
			{ feeKind: "management", paidOut: true, shares: TEN_SECONDS_OF_MANAGEMENT },
		]);
		expect(engine.sharesLedger.getBalance(FUND, OWNER)).toBe(TEN_SECONDS_OF_MANAGEMENT);

		expect(engine.controller.payoutSharesOutstanding(FUND, ["management"])).toEqual([
			{ feeKind: "management", paidOut: false, shares: 0n },
		]);
		expect(engine.feeManager.getSharesOutstanding(FUND, "management")).toBe(0n);
	});
});

describe("fund lifecycle with performance and management fees", () => {
	let clock: FakeChainClock;
	let engine: FeeEngine;
	let settled: FeeSettledEvent[];
	let paid: SharesOutstandingPaidEvent[];

	beforeEach(() => {
		({ clock, engine } = engineAt(1_000n));
		settled = [];
		paid = [];
		engine.feeManager.events.on("feeSettled", (e) => settled.push(e));
		engine.feeManager.events.on("sharesOutstandingPaid", (e) => paid.push(e));

		engine.controller.createFund(FUND, {
			recipient: OWNER,
			fees: [
				{ kind: "performance", settings: { rate: TEN_PERCENT, period: 100n } },
				{ kind: "management", settings: { annualRate: TEN_PERCENT } },
			],
		});
		engine.controller.buyShares(FUND, ALICE, WAD);
	});

	it("settles performance before management when GAV doubles", () => {
		engine.valuation.setGav(FUND, 2n * WAD);
		clock.advance(10n);

		expect(engine.controller.invokeContinuousHook(FUND)).toEqual([
			{
				feeKind: "performance",
				instruction: { type: SettlementType.MintSharesOutstanding, sharesDue: DOUBLING_SHARES },
			},
			{
				feeKind: "management",
				instruction: { type: SettlementType.Mint, sharesDue: TEN_SECONDS_OF_MANAGEMENT },
			},
		]);
		expect(engine.sharesLedger.getBalance(FUND, VAULT)).toBe(DOUBLING_SHARES);
		expect(engine.sharesLedger.getBalance(FUND, OWNER)).toBe(TEN_SECONDS_OF_MANAGEMENT);
		expect(engine.feeManager.getFeeInfoForFund(FUND, "performance")).toMatchObject({
			aggregateValueDue: TEN_PERCENT,
			lastSharePrice: 1_999_999_939_554_681_402n,
		});
	});

	it("crystallises after a period and redeems at the diluted share price", () => {
		engine.valuation.setGav(FUND, 2n * WAD);
		clock.advance(10n);
		engine.controller.invokeContinuousHook(FUND);

		clock.set(1_100n);
		expect(engine.controller.payoutSharesOutstanding(FUND, ["performance"])).toEqual([
			{ feeKind: "performance", paidOut: true, shares: DOUBLING_SHARES },
		]);
		expect(engine.feeManager.getFeeInfoForFund(FUND, "performance")).toMatchObject({
			highWaterMark: 1_999_999_939_554_681_402n,
			lastPaid: 1_100n,
		});

		expect(engine.controller.redeemShares(FUND, ALICE, WAD)).toEqual({
			sharesRedeemed: WAD,
			assetsPaid: 1_899_999_428_640_703_194n,
		});
		expect(engine.valuation.calcGav(FUND)).toBe(100_000_571_359_296_806n);
		expect(engine.sharesLedger.getBalance(FUND, OWNER)).toBe(52_631_895_490_010_317n);
		expect(engine.sharesLedger.getSharesSupply(FUND)).toBe(52_631_895_490_010_317n);

		expect(settled.map((e) => [e.feeKind, e.hook, e.type, e.sharesDue, e.account])).toEqual([
			["performance", "continuous", "mint_shares_outstanding", DOUBLING_SHARES, VAULT],
			["management", "continuous", "mint", TEN_SECONDS_OF_MANAGEMENT, OWNER],
			["management", "pre_redeem_shares", "mint", 286_319_981_684n, OWNER],
		]);
		expect(paid).toEqual([
			{
				fundId: FUND,
				feeKind: "performance",
				recipient: OWNER,
				shares: DOUBLING_SHARES,
				timestamp: 1_100n,
			},
		]);
	});

	it("hands outstanding shares to the owner on migration", () => {
		engine.valuation.setGav(FUND, 2n * WAD);
		clock.advance(10n);
		engine.controller.invokeContinuousHook(FUND);

		// management shares minted at 1010 raise the net supply, so the same value due now needs more shares
		const report = engine.controller.migrate(FUND);
		expect(report.settled).toEqual([
			{
				feeKind: "performance",
				instruction: { type: SettlementType.MintSharesOutstanding, sharesDue: 1_590_666_327n },
			},
			{ feeKind: "management", instruction: { type: SettlementType.None, sharesDue: 0n } },
		]);
		expect(report.released).toEqual([
			{ feeKind: "performance", paidOut: true, shares: 52_631_580_538_034_748n },
			{ feeKind: "management", paidOut: false, shares: 0n },
		]);
		expect(engine.sharesLedger.getBalance(FUND, VAULT)).toBe(0n);
		expect(engine.sharesLedger.getBalance(FUND, OWNER)).toBe(52_631_610_760_694_960n);
	});
});
