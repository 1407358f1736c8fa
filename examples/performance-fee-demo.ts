/**
 * Performance Fee Demo — high-water mark, clawback and crystallisation.
 *
 * Run: npx tsx examples/performance-fee-demo.ts
 */

import {
	FakeChainClock,
	WAD,
	accountId,
	createFeeEngine,
	formatUnits,
	fundId,
} from "../src/index.js";

const clock = new FakeChainClock(1_700_000_000n);
const engine = createFeeEngine({ clock, config: { logLevel: "warn" } });

const fund = fundId("perf-fund");
const owner = accountId("fund-owner");
const period = 7n * 86_400n;

engine.feeManager.events.on("feeSettled", (e) => {
	console.log(`  ${e.feeKind} ${e.type} ${formatUnits(e.sharesDue, 18)} shares (${e.hook})`);
});
engine.feeManager.events.on("sharesOutstandingPaid", (e) => {
	console.log(`  paid ${formatUnits(e.shares, 18)} shares to ${e.recipient}`);
});

engine.controller.createFund(fund, {
	recipient: owner,
	fees: [{ kind: "performance", settings: { rate: WAD / 5n, period } }],
});
engine.controller.buyShares(fund, accountId("investor"), 100n * WAD);

const marks = [130n, 110n, 150n];
for (const mark of marks) {
	clock.advance(86_400n);
	engine.valuation.setGav(fund, mark * WAD);
	console.log(`GAV marked to ${mark}`);
	engine.controller.invokeContinuousHook(fund);
}

clock.advance(period);
console.log("Period over");
engine.controller.payoutSharesOutstanding(fund, ["performance"]);

const info = engine.feeManager.getFeeInfoForFund(fund, "performance");
if (info.model === "performance") {
	console.log(`High-water mark: ${formatUnits(info.highWaterMark, 18)}`);
}
