/**
 * Management Fee Demo — a year of a 2% management fee on a simulated fund.
 *
 * Buys shares, settles the fee monthly through the continuous hook and prints
 * the owner's share of the fund.
 *
 * Run: npx tsx examples/management-fee-demo.ts
 */

import {
	Duration,
	FakeChainClock,
	accountId,
	attempt,
	createFeeEngine,
	formatUnits,
	fundId,
	parseAnnualRate,
} from "../src/index.js";

const clock = new FakeChainClock(1_700_000_000n);
const engine = createFeeEngine({ clock, config: { logLevel: "warn" } });

const fund = fundId("demo-fund");
const owner = accountId("fund-owner");
const investor = accountId("investor");

engine.controller.createFund(fund, {
	recipient: owner,
	fees: [{ kind: "management", settings: { annualRate: parseAnnualRate("0.02") } }],
});
engine.controller.buyShares(fund, investor, 1_000_000n * 10n ** 18n);

for (let month = 1; month <= 12; month++) {
	clock.advance(Duration.days(30n));
	engine.controller.invokeContinuousHook(fund);
	const ownerShares = engine.sharesLedger.getBalance(fund, owner);
	console.log(`Month ${month}: owner holds ${formatUnits(ownerShares, 18)} shares`);
}

const supply = engine.sharesLedger.getSharesSupply(fund);
const ownerShares = engine.sharesLedger.getBalance(fund, owner);
console.log(`\nSupply: ${formatUnits(supply, 18)}`);
console.log(`Owner stake: ${formatUnits((ownerShares * 10n ** 18n) / supply, 16)}%`);

const rejected = attempt(() => engine.converter.toPerSecondRate(parseAnnualRate("1.5")));
if (!rejected.ok) {
	console.log(`A 150% annual rate is rejected: ${rejected.error.code}`);
}
