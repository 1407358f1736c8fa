import { type Restore, checkpointMap } from "../shared/checkpoint.js";
import { ArithmeticOverflowError } from "../shared/errors.js";
import { checkedAdd, checkedSub } from "../shared/fixed-point.js";
import type { FundId } from "../shared/identifiers.js";
import type { FundAssets } from "./types.js";

/**
 * GAV per fund, set directly or moved by deposits and withdrawals.
 * Funds never touched report a GAV of zero.
 */
export class InMemoryValuation implements FundAssets {
	private readonly gavs = new Map<FundId, bigint>();

	calcGav(fundId: FundId): bigint {
		return this.gavs.get(fundId) ?? 0n;
	}

	/** Marks the fund's holdings to a new value, e.g. after a price move. */
	setGav(fundId: FundId, gav: bigint): void {
		if (gav < 0n) {
			throw new ArithmeticOverflowError("GAV cannot be negative", { fundId, gav });
		}
		this.gavs.set(fundId, gav);
	}

	deposit(fundId: FundId, amount: bigint): void {
		this.gavs.set(fundId, checkedAdd(this.calcGav(fundId), amount));
	}

	/** @throws ArithmeticOverflowError if more is withdrawn than the fund holds */
	withdraw(fundId: FundId, amount: bigint): void {
		this.gavs.set(fundId, checkedSub(this.calcGav(fundId), amount));
	}

	checkpoint(fundId?: FundId): Restore {
		return checkpointMap(this.gavs, fundId);
	}
}
