/**
 * Chain time — injectable seconds clock for deterministic settlement.
 *
 * Settlement math reads time only through ChainClock.now(), in whole seconds
 * as bigint, so a simulated chain can be replayed exactly.
 */

/** Injectable time source in unix seconds. */
export interface ChainClock {
	now(): bigint;
}

/** Wall-clock seconds, for live simulations. */
export const SystemChainClock: ChainClock = {
	now: () => BigInt(Math.floor(Date.now() / 1_000)),
};

/** Controllable clock for tests -- advance time manually with `advance()`. */
export class FakeChainClock implements ChainClock {
	private time: bigint;

	constructor(startSeconds = 0n) {
		this.time = startSeconds;
	}

	now(): bigint {
		return this.time;
	}

	advance(seconds: bigint): void {
		this.time += seconds;
	}

	set(seconds: bigint): void {
		this.time = seconds;
	}
}

// ── Duration helpers ─────────────────────────────────────────────────

/** Helpers to convert human-readable durations to seconds. */
export const Duration = {
	seconds: (n: bigint) => n,
	minutes: (n: bigint) => n * 60n,
	hours: (n: bigint) => n * 3_600n,
	days: (n: bigint) => n * 86_400n,
	/** 365-day years, matching the default rate-conversion year. */
	years: (n: bigint) => n * 31_536_000n,
} as const;
