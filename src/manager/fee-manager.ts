/**
 * FeeManager — registry and hook dispatcher for a fund's fees.
 *
 * Each public operation is one unit of work per fund: the fund's shares,
 * its state in every fee and its configuration are checkpointed first and
 * restored if anything throws, and events are emitted only once the unit has
 * committed. A unit started for a fund that already has one open fails with
 * ConcurrentSettlementError.
 *
 * A configured fund's fees are activated by `activateFund`, or otherwise on
 * the fund's first dispatch or payout, so no fee settles from a blank state.
 */

import {
	type ActivationContext,
	type Fee,
	FeeHook,
	type FeeInfo,
	type HookEvent,
	type HookPayload,
	type SettleContext,
	type SettlementInstruction,
	SettlementType,
	payerOf,
} from "../fees/types.js";
import { TypedEmitter } from "../lib/events/index.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { type Restore, checkpointMap, combineRestores } from "../shared/checkpoint.js";
import {
	AlreadyConfiguredError,
	ConcurrentSettlementError,
	FundNotInitializedError,
	InvalidSettlementError,
	UnknownFeeKindError,
	classifyError,
} from "../shared/errors.js";
import { type AccountId, type FeeKind, type FundId, feeKind } from "../shared/identifiers.js";
import type { ChainClock } from "../shared/time.js";
import type { SharesLedger, ValuationSource } from "../vault/types.js";
import { toHookEvent } from "./hook-events.js";
import type {
	AppliedSettlement,
	DispatchOptions,
	FeeManagerEvents,
	FeeManagerOptions,
	FeeSelection,
	FundFeeConfig,
	MigrationReport,
	PayoutReport,
} from "./types.js";

interface FundRecord {
	readonly recipient: AccountId;
	readonly enabled: readonly FeeKind[];
	readonly activated: boolean;
}

/** Events queued inside a unit of work, flushed after commit. */
type Pending = Array<() => void>;

export class FeeManager {
	readonly account: AccountId;
	readonly events = new TypedEmitter<FeeManagerEvents>();

	private readonly ledger: SharesLedger;
	private readonly valuation: ValuationSource;
	private readonly clock: ChainClock;
	private readonly logger: Logger;
	private readonly fees = new Map<FeeKind, Fee>();
	private readonly funds = new Map<FundId, FundRecord>();
	private readonly inProgress = new Set<FundId>();

	constructor(options: FeeManagerOptions) {
		this.account = options.account;
		this.ledger = options.sharesLedger;
		this.valuation = options.valuation;
		this.clock = options.clock;
		this.logger = (options.logger ?? silentLogger()).child({ component: "fee-manager" });
	}

	// ── Registry ───────────────────────────────────────────────────

	/** @throws AlreadyConfiguredError if a fee with the same kind is registered */
	registerFee(fee: Fee): void {
		if (this.fees.has(fee.kind)) {
			throw new AlreadyConfiguredError("Fee kind already registered", { feeKind: fee.kind });
		}
		this.fees.set(fee.kind, fee);
		this.logger.debug({ feeKind: fee.kind }, "Fee registered");
	}

	/** @throws UnknownFeeKindError if no fee is registered under the kind, or it is blank */
	getFee(kind: FeeKind | string): Fee {
		const fee = kind.trim() === "" ? undefined : this.fees.get(feeKind(kind));
		if (!fee) {
			throw new UnknownFeeKindError("Fee kind is not registered", { feeKind: kind });
		}
		return fee;
	}

	registeredFees(): readonly FeeKind[] {
		return [...this.fees.keys()];
	}

	// ── Configuration ──────────────────────────────────────────────

	/**
	 * Enables fees for a fund, once. An empty list configures the fund with no fees.
	 * @throws AlreadyConfiguredError if the fund is configured or a kind is listed twice
	 * @throws UnknownFeeKindError if a kind is not registered
	 */
	configureFees(fundId: FundId, config: FundFeeConfig): void {
		this.unitOfWork(fundId, "configureFees", (pending) => {
			if (this.funds.has(fundId)) {
				throw new AlreadyConfiguredError("Fund fees already configured", { fundId });
			}
			this.funds.set(fundId, { recipient: config.recipient, enabled: [], activated: false });
			for (const selection of config.fees) {
				this.enableFee(fundId, selection, pending);
			}
		});
	}

	/**
	 * Enables one more fee for an already configured fund. The fee is activated
	 * straight away if the fund already is.
	 */
	configureFee(fundId: FundId, kind: FeeKind | string, settings: unknown): void {
		this.unitOfWork(fundId, "configureFee", (pending) => {
			const fee = this.enableFee(fundId, { kind, settings }, pending);
			if (this.requireFund(fundId).activated) {
				fee.activateForFund(this.account, fundId, this.activationContext(fundId, [fee]));
			}
		});
	}

	/** Starts every enabled fee's accrual for the fund. */
	activateFund(fundId: FundId): void {
		this.unitOfWork(fundId, "activateFund", () => {
			this.activate(fundId, this.requireFund(fundId));
		});
	}

	// ── Dispatch ───────────────────────────────────────────────────

	/**
	 * Settles, then updates, every participating fee for a hook. Each fee's
	 * instruction is applied to the shares ledger before the next fee settles.
	 *
	 * @returns one entry per fee that settled, in dispatch order
	 * @throws FundNotInitializedError if the fund has no fee configuration
	 * @throws UnknownFeeKindError if options name a fee not enabled for the fund
	 * @throws InvalidSettlementError if options name fees for a hook other than Continuous
	 */
	dispatchHook<H extends FeeHook>(
		fundId: FundId,
		hook: H,
		payload: HookPayload<H>,
		options: DispatchOptions = {},
	): AppliedSettlement[] {
		const event = toHookEvent(hook, payload);
		if (options.feeKinds !== undefined && event.hook !== FeeHook.Continuous) {
			throw new InvalidSettlementError("Only a continuous dispatch can be limited to named fees", {
				fundId,
				hook: event.hook,
			});
		}
		return this.unitOfWork(fundId, `dispatchHook:${hook}`, (pending) =>
			this.dispatch(fundId, event, options, pending),
		);
	}

	/**
	 * Asks each named fee to release its outstanding shares and transfers
	 * whatever it releases to the fund's recipient.
	 */
	payoutOutstanding(fundId: FundId, feeKinds: readonly (FeeKind | string)[]): PayoutReport[] {
		return this.unitOfWork(fundId, "payoutOutstanding", (pending) => {
			this.requireActiveFund(fundId);
			const now = this.clock.now();
			return feeKinds.map((kind) => {
				const fee = this.requireEnabled(fundId, kind);
				const shares = fee.payout(this.account, fundId, now);
				return this.release(fundId, fee, shares, now, pending);
			});
		});
	}

	/**
	 * Settles every fee continuously, then releases all outstanding shares to
	 * the recipient whatever the fees' payout conditions, and re-activates the
	 * fees so accrual restarts under the fund's new controller.
	 */
	settleForMigration(fundId: FundId): MigrationReport {
		return this.unitOfWork(fundId, "settleForMigration", (pending) => {
			const settled = this.dispatch(fundId, { hook: FeeHook.Continuous }, {}, pending);

			const now = this.clock.now();
			const record = this.requireFund(fundId);
			const fees = record.enabled.map((kind) => this.getFee(kind));
			const released = fees.map((fee) =>
				this.release(fundId, fee, fee.releaseOutstanding(this.account, fundId, now), now, pending),
			);

			const ctx = this.activationContext(fundId, fees);
			for (const fee of fees) {
				fee.activateForFund(this.account, fundId, ctx);
			}
			this.logger.info({ fundId, now }, "Fund fees settled for migration");
			return { settled, released };
		});
	}

	// ── Queries ────────────────────────────────────────────────────

	isFundConfigured(fundId: FundId): boolean {
		return this.funds.has(fundId);
	}

	getEnabledFees(fundId: FundId): readonly FeeKind[] {
		return this.requireFund(fundId).enabled;
	}

	getRecipient(fundId: FundId): AccountId {
		return this.requireFund(fundId).recipient;
	}

	getFeeInfoForFund(fundId: FundId, kind: FeeKind | string): FeeInfo {
		return this.requireEnabled(fundId, kind).getFeeInfoForFund(fundId);
	}

	getSharesOutstanding(fundId: FundId, kind: FeeKind | string): bigint {
		return this.requireEnabled(fundId, kind).sharesOutstanding(fundId);
	}

	/**
	 * Snapshot of the shares ledger, every registered fee and the fund
	 * configuration; limited to one fund's entries when `fundId` is given.
	 */
	checkpoint(fundId?: FundId): Restore {
		return combineRestores([
			this.ledger.checkpoint(fundId),
			...[...this.fees.values()].map((fee) => fee.checkpoint(fundId)),
			checkpointMap(this.funds, fundId),
		]);
	}

	// ── Internals ──────────────────────────────────────────────────

	private unitOfWork<T>(fundId: FundId, operation: string, work: (pending: Pending) => T): T {
		if (this.inProgress.has(fundId)) {
			throw new ConcurrentSettlementError("A fee operation is already running for this fund", {
				fundId,
				operation,
			});
		}
		this.inProgress.add(fundId);
		const restore = this.checkpoint(fundId);
		const pending: Pending = [];

		let result: T;
		try {
			result = work(pending);
		} catch (error) {
			restore();
			this.logger.warn(
				{ fundId, operation, error: classifyError(error).toJSON() },
				"Fee operation rolled back",
			);
			throw error;
		} finally {
			this.inProgress.delete(fundId);
		}

		for (const emit of pending) {
			emit();
		}
		return result;
	}

	private dispatch(
		fundId: FundId,
		event: HookEvent,
		options: DispatchOptions,
		pending: Pending,
	): AppliedSettlement[] {
		const record = this.requireActiveFund(fundId);
		const participants = this.selectFees(fundId, record, options);
		const now = this.clock.now();

		let gav: bigint | null = null;
		const readGav = (): bigint => {
			if (gav === null) gav = this.valuation.calcGav(fundId);
			return gav;
		};

		const applied: AppliedSettlement[] = [];
		for (const fee of participants) {
			if (!fee.capabilities.settlesOn.includes(event.hook)) continue;
			const ctx = this.settleContext(fundId, event, fee.capabilities.usesGavOnSettle ? readGav() : null, now);
			const instruction = fee.settle(this.account, ctx);
			const account = this.apply(fundId, record, event, fee.kind, instruction);
			applied.push({ feeKind: fee.kind, instruction });

			if (instruction.type !== SettlementType.None && account !== null) {
				this.logger.debug(
					{ fundId, feeKind: fee.kind, hook: event.hook, ...instruction },
					"Fee settled",
				);
				const settled = {
					fundId,
					feeKind: fee.kind,
					hook: event.hook,
					type: instruction.type,
					sharesDue: instruction.sharesDue,
					account,
					timestamp: now,
				};
				pending.push(() => this.events.emit("feeSettled", settled));
			}
		}

		for (const fee of participants) {
			if (!fee.capabilities.updatesOn.includes(event.hook)) continue;
			const ctx = this.settleContext(fundId, event, fee.capabilities.usesGavOnUpdate ? readGav() : null, now);
			fee.update(this.account, ctx);
		}

		return applied;
	}

	/**
	 * Realizes an instruction on the shares ledger.
	 * @returns the holder the shares moved from or to; null for None
	 */
	private apply(
		fundId: FundId,
		record: FundRecord,
		event: HookEvent,
		kind: FeeKind,
		instruction: SettlementInstruction,
	): AccountId | null {
		const { type, sharesDue } = instruction;
		if (type === SettlementType.None) return null;
		if (sharesDue <= 0n) {
			throw new InvalidSettlementError("Settlement must move a positive number of shares", {
				fundId,
				feeKind: kind,
				type,
				sharesDue,
			});
		}

		switch (type) {
			case SettlementType.Mint:
				this.ledger.mintShares(this.account, fundId, record.recipient, sharesDue);
				return record.recipient;
			case SettlementType.MintSharesOutstanding: {
				const holder = this.ledger.getOutstandingHolder(fundId);
				this.ledger.mintShares(this.account, fundId, holder, sharesDue);
				return holder;
			}
			case SettlementType.BurnSharesOutstanding: {
				const holder = this.ledger.getOutstandingHolder(fundId);
				this.ledger.burnShares(this.account, fundId, holder, sharesDue);
				return holder;
			}
			case SettlementType.Burn: {
				const payer = this.requirePayer(fundId, event, kind, type);
				this.ledger.burnShares(this.account, fundId, payer, sharesDue);
				return payer;
			}
			case SettlementType.Direct: {
				const payer = this.requirePayer(fundId, event, kind, type);
				this.ledger.transferShares(this.account, fundId, payer, record.recipient, sharesDue);
				return payer;
			}
		}
	}

	private requirePayer(
		fundId: FundId,
		event: HookEvent,
		kind: FeeKind,
		type: SettlementType,
	): AccountId {
		const payer = payerOf(event);
		if (payer === null) {
			throw new InvalidSettlementError("Settlement needs a payer the hook does not have", {
				fundId,
				feeKind: kind,
				hook: event.hook,
				type,
			});
		}
		return payer;
	}

	private release(
		fundId: FundId,
		fee: Fee,
		shares: bigint,
		now: bigint,
		pending: Pending,
	): PayoutReport {
		if (shares === 0n) {
			return { feeKind: fee.kind, paidOut: false, shares: 0n };
		}
		const recipient = this.requireFund(fundId).recipient;
		const holder = this.ledger.getOutstandingHolder(fundId);
		this.ledger.transferShares(this.account, fundId, holder, recipient, shares);

		this.logger.info({ fundId, feeKind: fee.kind, recipient, shares }, "Outstanding fee shares paid");
		const paid = { fundId, feeKind: fee.kind, recipient, shares, timestamp: now };
		pending.push(() => this.events.emit("sharesOutstandingPaid", paid));
		return { feeKind: fee.kind, paidOut: true, shares };
	}

	private enableFee(fundId: FundId, selection: FeeSelection, pending: Pending): Fee {
		const record = this.requireFund(fundId);
		const fee = this.getFee(selection.kind);
		if (record.enabled.includes(fee.kind)) {
			throw new AlreadyConfiguredError("Fee already enabled for fund", {
				fundId,
				feeKind: fee.kind,
			});
		}
		fee.addFundSettings(this.account, fundId, selection.settings);
		this.funds.set(fundId, { ...record, enabled: [...record.enabled, fee.kind] });

		this.logger.info({ fundId, feeKind: fee.kind }, "Fee configured");
		const configured = { fundId, feeKind: fee.kind, recipient: record.recipient };
		pending.push(() => this.events.emit("feeConfigured", configured));
		return fee;
	}

	private selectFees(fundId: FundId, record: FundRecord, options: DispatchOptions): Fee[] {
		if (options.feeKinds === undefined) {
			return record.enabled.map((kind) => this.getFee(kind));
		}
		const wanted = new Set(options.feeKinds.map((kind) => this.requireEnabled(fundId, kind).kind));
		return record.enabled.filter((kind) => wanted.has(kind)).map((kind) => this.getFee(kind));
	}

	private activate(fundId: FundId, record: FundRecord): FundRecord {
		const fees = record.enabled.map((kind) => this.getFee(kind));
		const ctx = this.activationContext(fundId, fees);
		for (const fee of fees) {
			fee.activateForFund(this.account, fundId, ctx);
		}
		const activated = { ...record, activated: true };
		this.funds.set(fundId, activated);
		this.logger.info({ fundId, fees: record.enabled, now: ctx.now }, "Fund fees activated");
		return activated;
	}

	/** The fund's record, activating its fees first if that has not happened yet. */
	private requireActiveFund(fundId: FundId): FundRecord {
		const record = this.requireFund(fundId);
		return record.activated ? record : this.activate(fundId, record);
	}

	private requireFund(fundId: FundId): FundRecord {
		const record = this.funds.get(fundId);
		if (!record) {
			throw new FundNotInitializedError("Fund has no fee configuration", { fundId });
		}
		return record;
	}

	/** @throws UnknownFeeKindError unless the kind is registered and enabled for the fund */
	private requireEnabled(fundId: FundId, kind: FeeKind | string): Fee {
		const fee = this.getFee(kind);
		if (!this.requireFund(fundId).enabled.includes(fee.kind)) {
			throw new UnknownFeeKindError("Fee kind is not enabled for fund", {
				fundId,
				feeKind: fee.kind,
			});
		}
		return fee;
	}

	private settleContext(
		fundId: FundId,
		event: HookEvent,
		gav: bigint | null,
		now: bigint,
	): SettleContext {
		const holder = this.ledger.getOutstandingHolder(fundId);
		return {
			fundId,
			event,
			sharesSupply: this.ledger.getSharesSupply(fundId),
			totalSharesOutstanding: this.ledger.getBalance(fundId, holder),
			gav,
			now,
		};
	}

	private activationContext(fundId: FundId, fees: readonly Fee[]): ActivationContext {
		const needsGav = fees.some(
			(fee) => fee.capabilities.usesGavOnSettle || fee.capabilities.usesGavOnUpdate,
		);
		return {
			fundId,
			sharesSupply: this.ledger.getSharesSupply(fundId),
			gav: needsGav ? this.valuation.calcGav(fundId) : null,
			now: this.clock.now(),
		};
	}
}
