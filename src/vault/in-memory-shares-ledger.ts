/**
 * InMemorySharesLedger — per-fund share balances for simulation and tests.
 *
 * Only principals passed to `authorize()` may register funds or move shares;
 * reads are open. A fund's register is an immutable value replaced on write,
 * so a checkpoint copies the map of funds, or keeps one fund's register.
 */

import { type Restore, checkpointMap } from "../shared/checkpoint.js";
import {
	FundNotInitializedError,
	InsufficientSharesError,
	UnauthorizedCallerError,
} from "../shared/errors.js";
import { checkedAdd, checkedSub } from "../shared/fixed-point.js";
import { type AccountId, type FundId, accountId } from "../shared/identifiers.js";
import type { FundShareRegistry } from "./types.js";

interface FundShares {
	readonly outstandingHolder: AccountId;
	readonly supply: bigint;
	readonly balances: ReadonlyMap<AccountId, bigint>;
}

export class InMemorySharesLedger implements FundShareRegistry {
	private readonly authorized = new Set<AccountId>();
	private readonly funds = new Map<FundId, FundShares>();

	constructor(authorized: readonly AccountId[] = []) {
		for (const principal of authorized) {
			this.authorized.add(principal);
		}
	}

	authorize(principal: AccountId): void {
		this.authorized.add(principal);
	}

	isAuthorized(principal: AccountId): boolean {
		return this.authorized.has(principal);
	}

	/**
	 * Opens an empty share register for a fund.
	 * Outstanding fee shares are held by `<fundId>:vault` unless another holder is given.
	 */
	registerFund(caller: AccountId, fundId: FundId, outstandingHolder?: AccountId): void {
		this.requireAuthorized(caller, "registerFund");
		if (this.funds.has(fundId)) return;
		this.funds.set(fundId, {
			outstandingHolder: outstandingHolder ?? accountId(`${fundId}:vault`),
			supply: 0n,
			balances: new Map(),
		});
	}

	hasFund(fundId: FundId): boolean {
		return this.funds.has(fundId);
	}

	// ── Reads ──────────────────────────────────────────────────────

	getSharesSupply(fundId: FundId): bigint {
		return this.fund(fundId).supply;
	}

	getBalance(fundId: FundId, holder: AccountId): bigint {
		return this.fund(fundId).balances.get(holder) ?? 0n;
	}

	getOutstandingHolder(fundId: FundId): AccountId {
		return this.fund(fundId).outstandingHolder;
	}

	/** Non-zero balances, for inspection. */
	holders(fundId: FundId): ReadonlyMap<AccountId, bigint> {
		return this.fund(fundId).balances;
	}

	// ── Writes ─────────────────────────────────────────────────────

	mintShares(caller: AccountId, fundId: FundId, to: AccountId, amount: bigint): void {
		this.requireAuthorized(caller, "mintShares");
		const fund = this.fund(fundId);
		const balances = new Map(fund.balances);
		setBalance(balances, to, checkedAdd(fund.balances.get(to) ?? 0n, amount));
		this.funds.set(fundId, { ...fund, supply: checkedAdd(fund.supply, amount), balances });
	}

	/** @throws InsufficientSharesError if `from` holds fewer than `amount` shares */
	burnShares(caller: AccountId, fundId: FundId, from: AccountId, amount: bigint): void {
		this.requireAuthorized(caller, "burnShares");
		const fund = this.fund(fundId);
		const balances = new Map(fund.balances);
		setBalance(balances, from, this.debit(fundId, fund, from, amount));
		this.funds.set(fundId, { ...fund, supply: checkedSub(fund.supply, amount), balances });
	}

	/** @throws InsufficientSharesError if `from` holds fewer than `amount` shares */
	transferShares(
		caller: AccountId,
		fundId: FundId,
		from: AccountId,
		to: AccountId,
		amount: bigint,
	): void {
		this.requireAuthorized(caller, "transferShares");
		const fund = this.fund(fundId);
		const balances = new Map(fund.balances);
		setBalance(balances, from, this.debit(fundId, fund, from, amount));
		setBalance(balances, to, checkedAdd(balances.get(to) ?? 0n, amount));
		this.funds.set(fundId, { ...fund, balances });
	}

	checkpoint(fundId?: FundId): Restore {
		return checkpointMap(this.funds, fundId);
	}

	// ── Internals ──────────────────────────────────────────────────

	private fund(fundId: FundId): FundShares {
		const fund = this.funds.get(fundId);
		if (!fund) {
			throw new FundNotInitializedError("Shares ledger has no such fund", { fundId });
		}
		return fund;
	}

	private debit(fundId: FundId, fund: FundShares, holder: AccountId, amount: bigint): bigint {
		const balance = fund.balances.get(holder) ?? 0n;
		if (amount < 0n || balance < amount) {
			throw new InsufficientSharesError("Holder has too few shares", {
				fundId,
				holder,
				balance,
				amount,
			});
		}
		return balance - amount;
	}

	private requireAuthorized(caller: AccountId, operation: string): void {
		if (!this.authorized.has(caller)) {
			throw new UnauthorizedCallerError(`SharesLedger.${operation}: caller is not authorized`, {
				caller,
			});
		}
	}
}

function setBalance(balances: Map<AccountId, bigint>, holder: AccountId, balance: bigint): void {
	if (balance === 0n) {
		balances.delete(holder);
	} else {
		balances.set(holder, balance);
	}
}
