import { describe, expect, it } from "vitest";
import { Duration, FakeChainClock, SystemChainClock } from "./time.js";

describe("ChainClock", () => {
	describe("SystemChainClock", () => {
		it("returns whole seconds close to Date.now()", () => {
			const before = BigInt(Math.floor(Date.now() / 1_000));
			const now = SystemChainClock.now();
			const after = BigInt(Math.floor(Date.now() / 1_000));
			expect(now >= before).toBe(true);
			expect(now <= after).toBe(true);
		});
	});

	describe("FakeChainClock", () => {
		it("starts at 0 by default", () => {
			expect(new FakeChainClock().now()).toBe(0n);
		});

		it("advance increments time", () => {
			const clock = new FakeChainClock(1_000n);
			clock.advance(10n);
			expect(clock.now()).toBe(1_010n);
		});

		it("set jumps to an absolute time", () => {
			const clock = new FakeChainClock(1_000n);
			clock.set(5n);
			expect(clock.now()).toBe(5n);
		});
	});

	describe("Duration", () => {
		it("converts to seconds", () => {
			expect(Duration.minutes(2n)).toBe(120n);
			expect(Duration.hours(1n)).toBe(3_600n);
			expect(Duration.days(1n)).toBe(86_400n);
			expect(Duration.years(1n)).toBe(31_536_000n);
		});
	});
});
