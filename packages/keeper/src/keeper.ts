/**
 * Keeper — drains the vault's request queues in batches.
 *
 * Rules:
 * - Deposits go to the configured target, or the first allow-listed source
 * - A failed batch is retried once at half size, then the drain stops
 * - A drain stops when its queue is empty, a batch settles nothing, or the
 *   batch limit is reached
 * - Before each withdrawal batch, idle capital is topped up to cover the
 *   batch, pulling from the largest recorded positions first
 * - Requests a failed withdrawal batch settled before it stopped count as
 *   processed
 * - A cycle ends with a USD valuation when an oracle is bound
 */

import type { Logger } from "pino";
import pino from "pino";
import type { Address } from "@quevault/types";
import { formatAmount, minOf, saturatingSub } from "@quevault/ledger";
import type { UsdValuation, Vault } from "@quevault/vault";
import { MAX_DEPOSIT_BATCH_SIZE, USD_DECIMALS, VaultError } from "@quevault/vault";
import type { KeeperConfig } from "./config.js";

// =============================================================================
// Types
// =============================================================================

export interface KeeperOptions {
  readonly vault: Vault;
  readonly executor: Address;
  readonly targetSource?: Address;
  readonly depositBatchSize?: number;
  readonly withdrawBatchSize?: number;
  readonly maxBatches?: number;
  /** Oldest oracle quote a cycle's USD valuation accepts */
  readonly priceMaxAgeSeconds?: number;
  readonly logger?: Logger;
}

export type DrainStopReason = "empty" | "no-progress" | "max-batches" | "failed" | "no-target";

export interface DrainReport {
  /** Batches that completed, including ones that needed a retry */
  readonly batches: number;
  readonly processed: number;
  /** Failed fulfillment calls, retries included */
  readonly failures: number;
  readonly stopped: DrainStopReason;
}

export interface WithdrawalDrainReport extends DrainReport {
  /** Assets pulled back from sources ahead of settlement */
  readonly prefunded: bigint;
}

export interface CycleReport {
  readonly deposits: DrainReport;
  readonly withdrawals: WithdrawalDrainReport;
  /** Undefined when no oracle is bound for the asset, or the quote failed */
  readonly valuation: UsdValuation | undefined;
}

interface Attempt<T> {
  readonly result: T | undefined;
  readonly failures: number;
  /** Requests settled by failed calls before they stopped */
  readonly settled: number;
}

// =============================================================================
// Keeper
// =============================================================================

export class Keeper {
  private readonly vault: Vault;
  private readonly executor: Address;
  private readonly targetSource: Address | undefined;
  private readonly depositBatchSize: number;
  private readonly withdrawBatchSize: number;
  private readonly maxBatches: number;
  private readonly priceMaxAgeSeconds: number;
  private readonly log: Logger;

  constructor(options: KeeperOptions) {
    this.vault = options.vault;
    this.executor = options.executor;
    this.targetSource = options.targetSource;
    this.depositBatchSize = options.depositBatchSize ?? MAX_DEPOSIT_BATCH_SIZE;
    this.withdrawBatchSize = options.withdrawBatchSize ?? 10;
    this.maxBatches = options.maxBatches ?? 20;
    this.priceMaxAgeSeconds = options.priceMaxAgeSeconds ?? 60;
    this.log = (options.logger ?? pino({ level: "silent" })).child({
      component: "keeper",
      executor: options.executor,
    });
  }

  static fromConfig(vault: Vault, config: KeeperConfig, logger?: Logger): Keeper {
    return new Keeper({
      vault,
      executor: config.KEEPER_EXECUTOR,
      targetSource: config.KEEPER_TARGET_SOURCE,
      depositBatchSize: config.KEEPER_DEPOSIT_BATCH_SIZE,
      withdrawBatchSize: config.KEEPER_WITHDRAW_BATCH_SIZE,
      maxBatches: config.KEEPER_MAX_BATCHES,
      priceMaxAgeSeconds: config.KEEPER_PRICE_MAX_AGE_SECONDS,
      logger,
    });
  }

  /**
   * The source deposit batches are supplied to, if any.
   */
  depositTarget(): Address | undefined {
    return this.targetSource ?? this.vault.sources.listAllowed()[0];
  }

  // ─── Deposits ────────────────────────────────────────────────────────

  async drainDeposits(): Promise<DrainReport> {
    const target = this.depositTarget();
    if (target === undefined) {
      this.log.warn("no allow-listed source to supply deposits to");
      return { batches: 0, processed: 0, failures: 0, stopped: "no-target" };
    }

    let batches = 0;
    let processed = 0;
    let failures = 0;
    const finish = (stopped: DrainStopReason): DrainReport => {
      const report = { batches, processed, failures, stopped };
      this.log.info({ queue: "deposits", target, ...report }, "drain finished");
      return report;
    };

    while (batches < this.maxBatches) {
      if (this.vault.depositQueueLength === 0) {
        return finish("empty");
      }
      const attempt = await this.withRetry("deposits", this.depositBatchSize, (size) =>
        this.vault.fulfillDeposits(this.executor, size, target),
      );
      failures += attempt.failures;
      processed += attempt.settled;
      if (attempt.result === undefined) {
        return finish("failed");
      }
      batches++;
      processed += attempt.result.processed;
      if (attempt.result.processed === 0 && attempt.result.stale === 0) {
        return finish("no-progress");
      }
    }
    return finish(this.vault.depositQueueLength === 0 ? "empty" : "max-batches");
  }

  // ─── Withdrawals ─────────────────────────────────────────────────────

  async drainWithdrawals(): Promise<WithdrawalDrainReport> {
    let batches = 0;
    let processed = 0;
    let failures = 0;
    let prefunded = 0n;
    const finish = (stopped: DrainStopReason): WithdrawalDrainReport => {
      const report = { batches, processed, failures, stopped, prefunded };
      this.log.info(
        { queue: "withdrawals", ...report, prefunded: prefunded.toString() },
        "drain finished",
      );
      return report;
    };

    while (batches < this.maxBatches) {
      if (this.vault.redeemQueueLength === 0) {
        return finish("empty");
      }
      prefunded += await this.prefund(this.withdrawBatchSize);
      const attempt = await this.withRetry("withdrawals", this.withdrawBatchSize, (size) =>
        this.vault.fulfillWithdrawals(this.executor, size),
      );
      failures += attempt.failures;
      processed += attempt.settled;
      if (attempt.result === undefined) {
        return finish("failed");
      }
      batches++;
      processed += attempt.result.processed;
      if (attempt.result.processed === 0 && attempt.result.stale === 0) {
        return finish("no-progress");
      }
    }
    return finish(this.vault.redeemQueueLength === 0 ? "empty" : "max-batches");
  }

  /**
   * Deposits first, so newly minted shares are priced before any
   * redemption moves capital out.
   */
  async runCycle(): Promise<CycleReport> {
    const deposits = await this.drainDeposits();
    const withdrawals = await this.drainWithdrawals();
    const valuation = await this.reportValuation();
    return { deposits, withdrawals, valuation };
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private async reportValuation(): Promise<UsdValuation | undefined> {
    const { prices, asset } = this.vault;
    if (!prices.configured || prices.priceIdOf(asset.address) === undefined) {
      return undefined;
    }
    try {
      const valuation = await this.vault.totalAssetsUsd(this.priceMaxAgeSeconds);
      this.log.info(
        { usd: formatAmount(valuation.usd, USD_DECIMALS), publishTime: valuation.publishTime },
        "vault valuation",
      );
      return valuation;
    } catch (err) {
      this.log.warn(
        { maxAgeSeconds: this.priceMaxAgeSeconds, err: err instanceof Error ? err.message : String(err) },
        "USD valuation unavailable",
      );
      return undefined;
    }
  }

  /**
   * Bring free idle capital up to what the next `batchSize` redemptions
   * need. Returns what arrived.
   */
  private async prefund(batchSize: number): Promise<bigint> {
    const count = Math.min(batchSize, this.vault.redeemQueueLength);
    let needed = 0n;
    for (let i = 0; i < count; i++) {
      const entry = this.vault.redeemQueueAt(i);
      if (entry !== undefined) {
        needed += this.vault.withdrawalRequestOf(entry.controller)?.assetsAtRequest ?? 0n;
      }
    }

    let shortfall = saturatingSub(needed, this.vault.availableIdle());
    let pulled = 0n;
    for (const source of this.vault.sourcesByPrincipal()) {
      if (shortfall === 0n) {
        break;
      }
      if (!this.vault.sources.isAllowed(source)) {
        continue;
      }
      const amount = minOf(shortfall, this.vault.poolPrincipal(source));
      try {
        const received = await this.vault.deallocate(this.executor, source, amount);
        pulled += received;
        shortfall = saturatingSub(shortfall, received);
      } catch (err) {
        this.log.warn(
          { source, amount: amount.toString(), err: err instanceof Error ? err.message : String(err) },
          "prefund pull failed, trying next source",
        );
      }
    }

    if (pulled > 0n) {
      this.log.info(
        { needed: needed.toString(), pulled: pulled.toString(), shortfall: shortfall.toString() },
        "prefunded withdrawal batch",
      );
    }
    return pulled;
  }

  private async withRetry<T>(
    queue: string,
    batchSize: number,
    run: (size: number) => Promise<T>,
  ): Promise<Attempt<T>> {
    let settled = 0;
    try {
      return { result: await run(batchSize), failures: 0, settled };
    } catch (err) {
      settled += settledBefore(err);
      this.log.warn(
        { queue, batchSize, settled, err: err instanceof Error ? err.message : String(err) },
        "batch failed, retrying at half size",
      );
    }

    const retrySize = Math.max(1, Math.floor(batchSize / 2));
    try {
      return { result: await run(retrySize), failures: 1, settled };
    } catch (err) {
      settled += settledBefore(err);
      this.log.error(
        { queue, batchSize: retrySize, settled, err: err instanceof Error ? err.message : String(err) },
        "batch failed after retry, giving up",
      );
      return { result: undefined, failures: 2, settled };
    }
  }
}

/**
 * Requests a failed fulfillment call paid out before it stopped.
 */
function settledBefore(err: unknown): number {
  if (err instanceof VaultError) {
    const settled = err.details?.["settled"];
    if (typeof settled === "number") {
      return settled;
    }
  }
  return 0;
}
