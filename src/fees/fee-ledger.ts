/**
 * FeeLedger — per-fund rate and last-settled timestamp for one fee kind.
 *
 * Only the owning settlement engine may write. The rate is fixed when the
 * fund is configured; only `lastSettled` moves afterwards, and never back.
 */

import { AlreadyConfiguredError, NotMonotonicError } from "../shared/errors.js";
import type { AccountId, FundId } from "../shared/identifiers.js";
import { OwnedStore, requireCaller } from "./owned-store.js";
import type { Restore } from "./types.js";

export interface FeeLedgerEntry {
	/** Per-second growth factor at ray scale. */
	readonly scaledPerSecondRate: bigint;
	/** Unix seconds of the last settlement; 0n when never settled. */
	readonly lastSettled: bigint;
}

export class FeeLedger {
	private readonly store: OwnedStore<FeeLedgerEntry>;

	constructor(owner: AccountId) {
		this.store = new OwnedStore(owner, "FeeLedger");
	}

	get owner(): AccountId {
		return this.store.owner;
	}

	/** @throws AlreadyConfiguredError on a second call for the same fund */
	addFundSettings(caller: AccountId, fundId: FundId, scaledPerSecondRate: bigint): void {
		requireCaller(caller, this.store.owner, "FeeLedger.addFundSettings");
		if (this.store.has(fundId)) {
			throw new AlreadyConfiguredError("Fee ledger already configured for fund", { fundId });
		}
		this.store.set(caller, fundId, { scaledPerSecondRate, lastSettled: 0n });
	}

	hasFund(fundId: FundId): boolean {
		return this.store.has(fundId);
	}

	/** @throws FundNotInitializedError if the fund was never configured */
	getLedger(fundId: FundId): FeeLedgerEntry {
		return this.store.require(fundId);
	}

	/**
	 * Moves `lastSettled` to `timestamp`.
	 * @throws NotMonotonicError if timestamp is earlier than a previous settlement
	 */
	recordSettlement(caller: AccountId, fundId: FundId, timestamp: bigint): void {
		requireCaller(caller, this.store.owner, "FeeLedger.recordSettlement");
		const entry = this.store.require(fundId);
		if (entry.lastSettled !== 0n && timestamp < entry.lastSettled) {
			throw new NotMonotonicError("Settlement timestamp moved backwards", {
				fundId,
				lastSettled: entry.lastSettled,
				timestamp,
			});
		}
		this.store.set(caller, fundId, { ...entry, lastSettled: timestamp });
	}

	checkpoint(fundId?: FundId): Restore {
		return this.store.checkpoint(fundId);
	}
}
