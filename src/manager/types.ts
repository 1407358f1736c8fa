import type { FeeHook, SettlementInstruction, SettlementType } from "../fees/types.js";
import type { Logger } from "../lib/logger/index.js";
import type { AccountId, FeeKind, FundId } from "../shared/identifiers.js";
import type { ChainClock } from "../shared/time.js";
import type { SharesLedger, ValuationSource } from "../vault/types.js";

export interface FeeManagerOptions {
	/** The manager's own principal; fees and the shares ledger must accept it. */
	readonly account: AccountId;
	readonly sharesLedger: SharesLedger;
	readonly valuation: ValuationSource;
	readonly clock: ChainClock;
	readonly logger?: Logger;
}

/** One fee to enable for a fund, with the settings its schema expects. */
export interface FeeSelection {
	readonly kind: FeeKind | string;
	readonly settings: unknown;
}

export interface FundFeeConfig {
	/** Receives minted, transferred and paid-out fee shares. */
	readonly recipient: AccountId;
	/** Enabled fees, in the order hooks are dispatched to them. */
	readonly fees: readonly FeeSelection[];
}

export interface DispatchOptions {
	/** Only these enabled fees take part; all of them when omitted. */
	readonly feeKinds?: readonly (FeeKind | string)[];
}

export interface AppliedSettlement {
	readonly feeKind: FeeKind;
	readonly instruction: SettlementInstruction;
}

export interface PayoutReport {
	readonly feeKind: FeeKind;
	readonly paidOut: boolean;
	readonly shares: bigint;
}

export interface MigrationReport {
	readonly settled: readonly AppliedSettlement[];
	readonly released: readonly PayoutReport[];
}

// ── Events ───────────────────────────────────────────────────────────

export interface FeeConfiguredEvent {
	readonly fundId: FundId;
	readonly feeKind: FeeKind;
	readonly recipient: AccountId;
}

export interface FeeSettledEvent {
	readonly fundId: FundId;
	readonly feeKind: FeeKind;
	readonly hook: FeeHook;
	readonly type: SettlementType;
	readonly sharesDue: bigint;
	/** Holder the shares moved from or to. */
	readonly account: AccountId;
	readonly timestamp: bigint;
}

export interface SharesOutstandingPaidEvent {
	readonly fundId: FundId;
	readonly feeKind: FeeKind;
	readonly recipient: AccountId;
	readonly shares: bigint;
	readonly timestamp: bigint;
}

/** Emitted only after the unit of work that produced them commits. */
export interface FeeManagerEvents {
	feeConfigured: (e: FeeConfiguredEvent) => void;
	feeSettled: (e: FeeSettledEvent) => void;
	sharesOutstandingPaid: (e: SharesOutstandingPaidEvent) => void;
}
