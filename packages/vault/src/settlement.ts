/**
 * Settlement Engine — batch fulfillment of both queues.
 *
 * Deposits: price the whole batch once, mint per request, then hand the
 * batch total to one yield source in a single call.
 *
 * Withdrawals: pay each request its snapshotted value, net of the
 * performance fee on realized yield, pulling liquidity back from sources
 * when idle capital (net of pending deposits) runs short.
 *
 * Rules:
 * - Entries are taken from the current head; removal reshuffles the tail
 * - A stale entry is removed and does not count toward the batch
 * - A deposit that would mint zero shares stays queued and is skipped
 * - Pending-deposit capital is never used to pay a redemption
 * - A redemption that cannot be fully funded stops the call; requests
 *   settled before it stay settled
 */

import type { Address, AssetToken } from "@quevault/types";
import type { PrincipalBook, TokenLedger } from "@quevault/ledger";
import { bpsOf, mulDiv, saturatingSub } from "@quevault/ledger";
import { VAULT_EVENTS } from "@quevault/event-store";
import type { Logger } from "pino";
import type { PoolAllocationTracker } from "./allocation.js";
import type { DepositQueue } from "./deposit-queue.js";
import type { RedeemQueue } from "./redeem-queue.js";
import type { Valuation } from "./valuation.js";
import type {
  DepositFulfillment,
  DepositRequest,
  VaultEventEmitter,
  WithdrawalFulfillment,
} from "./types.js";
import { MAX_DEPOSIT_BATCH_SIZE, VaultError } from "./types.js";

// =============================================================================
// State handle
// =============================================================================

/**
 * Everything settlement reads and writes, passed by reference.
 */
export interface SettlementState {
  readonly vault: Address;
  readonly asset: AssetToken;
  readonly shares: TokenLedger;
  readonly principal: PrincipalBook;
  readonly deposits: DepositQueue;
  readonly redemptions: RedeemQueue;
  readonly allocations: PoolAllocationTracker;
  readonly valuation: Valuation;
}

export interface FeeSettings {
  readonly bps: bigint;
  readonly recipient: Address | undefined;
}

type DepositStep =
  | { readonly kind: "stale"; readonly controller: Address }
  | { readonly kind: "fulfill"; readonly request: DepositRequest; readonly shares: bigint };

// =============================================================================
// Engine
// =============================================================================

export class SettlementEngine {
  private readonly state: SettlementState;
  private readonly emit: VaultEventEmitter;
  private readonly log: Logger;

  constructor(state: SettlementState, emit: VaultEventEmitter, logger: Logger) {
    this.state = state;
    this.emit = emit;
    this.log = logger.child({ component: "settlement" });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Deposits
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Mint shares for up to `batchSize` queued deposits and supply their
   * assets to `target`.
   *
   * The batch is planned on a copy of the queue first. If the supply to
   * the target fails, the call rejects and nothing has changed.
   */
  async fulfillDeposits(batchSize: number, target: Address): Promise<DepositFulfillment> {
    if (!Number.isInteger(batchSize) || batchSize < 1 || batchSize > MAX_DEPOSIT_BATCH_SIZE) {
      throw new VaultError(
        "INVALID_BATCH_SIZE",
        `Deposit batch size must be an integer in 1..${MAX_DEPOSIT_BATCH_SIZE}, got ${batchSize}`,
      );
    }
    const { allocations, deposits, shares: shareToken, valuation } = this.state;
    allocations.require(target);

    const empty: DepositFulfillment = {
      processed: 0,
      skipped: 0,
      stale: 0,
      assets: 0n,
      shares: 0n,
      target,
    };
    if (deposits.length === 0) {
      return empty;
    }

    const supply = shareToken.totalSupply;
    const backing = await valuation.backingAssets(deposits.pendingDepositAssets);
    if (supply > 0n && backing === 0n) {
      throw new VaultError(
        "ZERO_BACKING",
        `Cannot price deposits: ${supply} shares outstanding against zero backing assets`,
      );
    }

    // ─── Plan ─────────────────────────────────────────────────────────
    const plan: DepositStep[] = [];
    const draft = deposits.clone();
    let position = 0;
    let processed = 0;
    let skipped = 0;
    let assets = 0n;
    let minted = 0n;

    while (processed < batchSize && position < draft.length) {
      const controller = draft.at(position);
      if (controller === undefined) {
        break;
      }
      const request = draft.requestOf(controller);
      if (request === undefined) {
        draft.removeStale(controller);
        plan.push({ kind: "stale", controller });
        continue;
      }

      const shares = supply === 0n ? request.assets : mulDiv(request.assets, supply, backing);
      if (shares === 0n) {
        skipped++;
        position++;
        continue;
      }

      draft.remove(controller);
      plan.push({ kind: "fulfill", request, shares });
      processed++;
      assets += request.assets;
      minted += shares;
    }

    // ─── Move capital ─────────────────────────────────────────────────
    if (assets > 0n) {
      await allocations.supply(target, assets);
    }

    // ─── Commit ───────────────────────────────────────────────────────
    for (const step of plan) {
      if (step.kind === "stale") {
        deposits.removeStale(step.controller);
        continue;
      }
      const { request, shares } = step;
      deposits.remove(request.controller);
      shareToken.mint(request.receiver, shares);
      this.state.principal.recordDeposit(request.controller, request.assets, shares);
      this.emit(VAULT_EVENTS.DEPOSIT_FULFILLED, {
        controller: request.controller,
        receiver: request.receiver,
        assets: request.assets.toString(),
        shares: shares.toString(),
      });
    }

    const result: DepositFulfillment = {
      processed,
      skipped,
      stale: plan.length - processed,
      assets,
      shares: minted,
      target,
    };
    this.log.info(
      {
        processed,
        skipped,
        stale: result.stale,
        assets: assets.toString(),
        shares: minted.toString(),
        target,
      },
      "deposit batch fulfilled",
    );
    return result;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Withdrawals
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Pay out up to `batchSize` queued redemptions, head first.
   *
   * @throws VaultError INSUFFICIENT_LIQUIDITY when a request cannot be
   *   funded even after pulling from every source. `details.settled` is
   *   the number of requests paid before the stop.
   */
  async fulfillWithdrawals(batchSize: number, fee: FeeSettings): Promise<WithdrawalFulfillment> {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new VaultError(
        "INVALID_BATCH_SIZE",
        `Withdrawal batch size must be a positive integer, got ${batchSize}`,
      );
    }
    const { asset, deposits, principal, redemptions, shares, vault, valuation } = this.state;

    let processed = 0;
    let stale = 0;
    let grossAssets = 0n;
    let fees = 0n;
    let payouts = 0n;
    let recovered = 0n;

    while (processed < batchSize && redemptions.length > 0) {
      const controller = redemptions.at(0);
      if (controller === undefined) {
        break;
      }
      const request = redemptions.requestOf(controller);
      if (request === undefined) {
        redemptions.removeStale(controller);
        stale++;
        continue;
      }

      const gross = request.assetsAtRequest;
      const principalPart = principal.proportionalPrincipal(controller, request.shares, gross);
      const yieldAmount = saturatingSub(gross, principalPart);
      const feeAmount = bpsOf(yieldAmount, fee.bps);
      const payout = gross - feeAmount;

      let available = saturatingSub(valuation.idle(), deposits.pendingDepositAssets);
      if (available < gross) {
        const pulled = await this.state.allocations.withdrawAsNeeded(gross - available);
        recovered += pulled.recovered;
        available = saturatingSub(valuation.idle(), deposits.pendingDepositAssets);
      }
      if (available < gross) {
        this.log.warn(
          {
            settled: processed,
            controller,
            required: gross.toString(),
            available: available.toString(),
          },
          "withdrawal batch stopped: insufficient liquidity",
        );
        throw new VaultError(
          "INSUFFICIENT_LIQUIDITY",
          `Cannot fund redemption for "${controller}": needs ${gross}, ${available} available`,
          {
            settled: processed,
            controller,
            required: gross.toString(),
            available: available.toString(),
          },
        );
      }

      // ─── Settle ─────────────────────────────────────────────────────
      shares.burn(vault, request.shares);
      // Without a recipient the fee stays in the vault.
      const feeRecipient = feeAmount > 0n ? fee.recipient : undefined;
      if (feeRecipient !== undefined) {
        asset.transfer(vault, feeRecipient, feeAmount);
      }
      asset.transfer(vault, request.receiver, payout);
      principal.recordRedemption(controller, principalPart, request.shares);
      redemptions.remove(controller);

      this.emit(VAULT_EVENTS.REDEEM_FULFILLED, {
        controller,
        receiver: request.receiver,
        shares: request.shares.toString(),
        grossAssets: gross.toString(),
        principal: principalPart.toString(),
        yieldAmount: yieldAmount.toString(),
        fee: feeAmount.toString(),
        payout: payout.toString(),
        feeRecipient: feeRecipient ?? null,
      });

      processed++;
      grossAssets += gross;
      fees += feeAmount;
      payouts += payout;
    }

    this.log.info(
      {
        processed,
        stale,
        grossAssets: grossAssets.toString(),
        fees: fees.toString(),
        recovered: recovered.toString(),
      },
      "withdrawal batch fulfilled",
    );
    return { processed, stale, grossAssets, fees, payouts, recovered };
  }
}
