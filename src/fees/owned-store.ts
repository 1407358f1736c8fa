/**
 * OwnedStore — per-fund state that only one principal may write.
 *
 * Values are treated as immutable: writers replace them, never mutate them,
 * so a checkpoint only has to copy the map, or the one fund's entry.
 */

import { type Restore, checkpointMap } from "../shared/checkpoint.js";
import { FundNotInitializedError, UnauthorizedCallerError } from "../shared/errors.js";
import type { AccountId, FundId } from "../shared/identifiers.js";

/** @throws UnauthorizedCallerError unless caller is the expected principal */
export function requireCaller(caller: AccountId, expected: AccountId, operation: string): void {
	if (caller !== expected) {
		throw new UnauthorizedCallerError(`${operation}: caller is not authorized`, {
			caller,
			expected,
		});
	}
}

export class OwnedStore<T> {
	readonly owner: AccountId;
	private readonly label: string;
	private readonly entries = new Map<FundId, T>();

	constructor(owner: AccountId, label: string) {
		this.owner = owner;
		this.label = label;
	}

	has(fundId: FundId): boolean {
		return this.entries.has(fundId);
	}

	get(fundId: FundId): T | undefined {
		return this.entries.get(fundId);
	}

	/** @throws FundNotInitializedError if nothing is stored for the fund */
	require(fundId: FundId): T {
		const value = this.entries.get(fundId);
		if (value === undefined) {
			throw new FundNotInitializedError(`${this.label}: fund is not configured`, { fundId });
		}
		return value;
	}

	set(caller: AccountId, fundId: FundId, value: T): void {
		requireCaller(caller, this.owner, `${this.label}.set`);
		this.entries.set(fundId, value);
	}

	/** Saves every fund, or only `fundId` when given. */
	checkpoint(fundId?: FundId): Restore {
		return checkpointMap(this.entries, fundId);
	}
}
