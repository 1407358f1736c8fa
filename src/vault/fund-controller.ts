/**
 * FundController — a fund's lifecycle around the fee manager.
 *
 * Buys and redeems shares at the gross share price (GAV / total supply) and
 * calls the four fee hooks where a fund would. Every flow is restored as a
 * whole if any step fails; fee events from hooks that committed before the
 * failing step are not retracted.
 */

import { FeeHook } from "../fees/types.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import { parseOrThrow, z } from "../lib/validation/index.js";
import type { FeeManager } from "../manager/fee-manager.js";
import type {
	AppliedSettlement,
	FundFeeConfig,
	MigrationReport,
	PayoutReport,
} from "../manager/types.js";
import { combineRestores } from "../shared/checkpoint.js";
import { InvalidSettlementError, classifyError } from "../shared/errors.js";
import { mulDivDown } from "../shared/fixed-point.js";
import type { AccountId, FeeKind, FundId } from "../shared/identifiers.js";
import type { FundAssets, FundShareRegistry } from "./types.js";

export interface FundControllerOptions {
	/** Principal the shares ledger accepts for buys and redemptions. */
	readonly account: AccountId;
	readonly feeManager: FeeManager;
	readonly sharesLedger: FundShareRegistry;
	readonly assets: FundAssets;
	readonly logger?: Logger;
}

export interface CreateFundOptions extends FundFeeConfig {
	/** Holder of outstanding fee shares; the ledger's default when omitted. */
	readonly outstandingHolder?: AccountId;
}

export interface BuyReceipt {
	/** Shares minted for the investment, before any entrance fee. */
	readonly sharesBought: bigint;
	/** Shares the buyer holds on top of what they held before. */
	readonly sharesReceived: bigint;
}

export interface RedeemReceipt {
	readonly sharesRedeemed: bigint;
	readonly assetsPaid: bigint;
}

const positiveAmount = z.bigint().positive();

export class FundController {
	private readonly account: AccountId;
	private readonly feeManager: FeeManager;
	private readonly ledger: FundShareRegistry;
	private readonly assets: FundAssets;
	private readonly logger: Logger;

	constructor(options: FundControllerOptions) {
		this.account = options.account;
		this.feeManager = options.feeManager;
		this.ledger = options.sharesLedger;
		this.assets = options.assets;
		this.logger = (options.logger ?? silentLogger()).child({ component: "fund-controller" });
	}

	/** Opens the fund's share register, then configures and activates its fees. */
	createFund(fundId: FundId, options: CreateFundOptions): void {
		this.atomically(fundId, "createFund", () => {
			this.ledger.registerFund(this.account, fundId, options.outstandingHolder);
			this.feeManager.configureFees(fundId, { recipient: options.recipient, fees: options.fees });
			this.feeManager.activateFund(fundId);
			this.logger.info(
				{ fundId, recipient: options.recipient, fees: options.fees.map((f) => f.kind) },
				"Fund created",
			);
		});
	}

	/**
	 * Buys shares at the gross share price; the first purchase is 1:1.
	 * @throws InvalidSettlementError if the fund has shares but no assets, or the
	 *   investment is too small for a single share
	 */
	buyShares(fundId: FundId, buyer: AccountId, investmentAmount: bigint): BuyReceipt {
		const amount = parseOrThrow(positiveAmount, investmentAmount, "Invalid investment amount");
		return this.atomically(fundId, "buyShares", () => {
			this.feeManager.dispatchHook(fundId, FeeHook.PreBuyShares, {
				buyer,
				investmentAmount: amount,
			});

			const supply = this.ledger.getSharesSupply(fundId);
			const gav = this.assets.calcGav(fundId);
			if (supply > 0n && gav === 0n) {
				throw new InvalidSettlementError("Fund has shares but no assets", { fundId, supply });
			}
			const sharesBought = supply === 0n ? amount : mulDivDown(amount, supply, gav);
			if (sharesBought === 0n) {
				throw new InvalidSettlementError("Investment buys no shares", {
					fundId,
					investmentAmount: amount,
				});
			}

			const before = this.ledger.getBalance(fundId, buyer);
			this.assets.deposit(fundId, amount);
			this.ledger.mintShares(this.account, fundId, buyer, sharesBought);

			this.feeManager.dispatchHook(fundId, FeeHook.PostBuyShares, {
				buyer,
				investmentAmount: amount,
				sharesBought,
			});

			const sharesReceived = this.ledger.getBalance(fundId, buyer) - before;
			this.logger.info(
				{ fundId, buyer, investmentAmount: amount, sharesBought, sharesReceived },
				"Shares bought",
			);
			return { sharesBought, sharesReceived };
		});
	}

	/**
	 * Settles fees, then burns the shares and pays out their share of GAV.
	 * @throws InsufficientSharesError if the redeemer holds fewer shares
	 */
	redeemShares(fundId: FundId, redeemer: AccountId, sharesRedeemed: bigint): RedeemReceipt {
		const shares = parseOrThrow(positiveAmount, sharesRedeemed, "Invalid share amount");
		return this.atomically(fundId, "redeemShares", () => {
			this.feeManager.dispatchHook(fundId, FeeHook.PreRedeemShares, {
				redeemer,
				sharesRedeemed: shares,
			});

			const supply = this.ledger.getSharesSupply(fundId);
			const gav = this.assets.calcGav(fundId);
			this.ledger.burnShares(this.account, fundId, redeemer, shares);
			const assetsPaid = mulDivDown(gav, shares, supply);
			this.assets.withdraw(fundId, assetsPaid);

			this.logger.info({ fundId, redeemer, shares, assetsPaid }, "Shares redeemed");
			return { sharesRedeemed: shares, assetsPaid };
		});
	}

	invokeContinuousHook(
		fundId: FundId,
		feeKinds?: readonly (FeeKind | string)[],
	): AppliedSettlement[] {
		return this.feeManager.dispatchHook(
			fundId,
			FeeHook.Continuous,
			{},
			feeKinds === undefined ? {} : { feeKinds },
		);
	}

	payoutSharesOutstanding(fundId: FundId, feeKinds: readonly (FeeKind | string)[]): PayoutReport[] {
		return this.feeManager.payoutOutstanding(fundId, feeKinds);
	}

	/** Settles and releases every fee so the fund can continue under a new controller. */
	migrate(fundId: FundId): MigrationReport {
		return this.feeManager.settleForMigration(fundId);
	}

	private atomically<T>(fundId: FundId, operation: string, work: () => T): T {
		const restore = combineRestores([
			this.feeManager.checkpoint(fundId),
			this.assets.checkpoint(fundId),
		]);
		try {
			return work();
		} catch (error) {
			restore();
			this.logger.warn(
				{ fundId, operation, error: classifyError(error).toJSON() },
				"Fund operation rolled back",
			);
			throw error;
		}
	}
}
