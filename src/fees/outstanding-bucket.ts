/**
 * Shares minted as fee compensation but not yet paid to the fee recipient,
 * per fund, for one fee kind.
 */

import { checkedAdd, checkedSub } from "../shared/fixed-point.js";
import type { AccountId, FundId } from "../shared/identifiers.js";
import { OwnedStore } from "./owned-store.js";
import type { Restore } from "./types.js";

export class OutstandingBucket {
	private readonly store: OwnedStore<bigint>;

	constructor(owner: AccountId) {
		this.store = new OwnedStore(owner, "OutstandingBucket");
	}

	balanceOf(fundId: FundId): bigint {
		return this.store.get(fundId) ?? 0n;
	}

	increase(caller: AccountId, fundId: FundId, shares: bigint): void {
		this.store.set(caller, fundId, checkedAdd(this.balanceOf(fundId), shares));
	}

	/** @throws ArithmeticOverflowError if more is removed than the bucket holds */
	decrease(caller: AccountId, fundId: FundId, shares: bigint): void {
		this.store.set(caller, fundId, checkedSub(this.balanceOf(fundId), shares));
	}

	/** Empties the bucket and returns what it held. */
	drain(caller: AccountId, fundId: FundId): bigint {
		const shares = this.balanceOf(fundId);
		this.store.set(caller, fundId, 0n);
		return shares;
	}

	checkpoint(fundId?: FundId): Restore {
		return this.store.checkpoint(fundId);
	}
}
