/**
 * Pool Allocation Tracker — capital placed with external yield sources.
 *
 * Keeps a recorded principal per source. Recorded principal is an
 * accounting figure, not the live position: it grows by what was
 * supplied and shrinks by what actually came back, floored at zero.
 *
 * Rules:
 * - Only allow-listed sources are touched
 * - Dispatch is by the kind tag the allow-list stores
 * - Received amounts are measured as a balance delta, never trusted from
 *   the source's return value
 */

import type { Address, AllowList, AssetToken, YieldSource } from "@quevault/types";
import { minOf, saturatingSub } from "@quevault/ledger";
import type { Logger } from "pino";
import { VAULT_EVENTS } from "@quevault/event-store";
import type { RecoveryResult, VaultEventEmitter } from "./types.js";
import { VaultError } from "./types.js";

const REFERRAL_CODE = 0;

// =============================================================================
// Capability dispatch
// =============================================================================

/**
 * Live asset value of `holder`'s position in a source.
 */
export async function positionValue(
  source: YieldSource,
  asset: Address,
  holder: Address,
): Promise<bigint> {
  switch (source.kind) {
    case "reserve": {
      const reserve = await source.api.getReserveData(asset);
      return reserve.receiptToken.balanceOf(holder);
    }
    case "share": {
      const shares = await source.api.balanceOf(holder);
      return shares === 0n ? 0n : source.api.convertToAssets(shares);
    }
  }
}

async function callSupply(
  source: YieldSource,
  asset: Address,
  amount: bigint,
  vault: Address,
): Promise<void> {
  switch (source.kind) {
    case "reserve":
      await source.api.supply(asset, amount, vault, REFERRAL_CODE);
      return;
    case "share":
      await source.api.deposit(amount, vault);
      return;
  }
}

async function callWithdraw(
  source: YieldSource,
  asset: Address,
  amount: bigint,
  vault: Address,
): Promise<void> {
  switch (source.kind) {
    case "reserve":
      await source.api.withdraw(asset, amount, vault);
      return;
    case "share":
      await source.api.withdraw(amount, vault, vault);
      return;
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// =============================================================================
// Tracker
// =============================================================================

export interface PoolAllocationTrackerDeps {
  readonly vault: Address;
  readonly asset: AssetToken;
  readonly allowList: AllowList;
  readonly logger: Logger;
  readonly emit: VaultEventEmitter;
}

export class PoolAllocationTracker {
  private readonly principal: Map<Address, bigint> = new Map();
  private readonly deps: PoolAllocationTrackerDeps;
  private readonly log: Logger;

  constructor(deps: PoolAllocationTrackerDeps) {
    this.deps = deps;
    this.log = deps.logger.child({ component: "allocation" });
  }

  principalOf(source: Address): bigint {
    return this.principal.get(source) ?? 0n;
  }

  /**
   * Sources with recorded principal, largest first (ties by address).
   */
  byPrincipal(): readonly Address[] {
    return [...this.principal.entries()]
      .sort(([a, pa], [b, pb]) => (pa === pb ? a.localeCompare(b) : pa > pb ? -1 : 1))
      .map(([address]) => address);
  }

  /**
   * The allow-listed capability for `address`, or a rejection.
   */
  require(address: Address): YieldSource {
    if (!this.deps.allowList.isAllowed(address)) {
      throw new VaultError("SOURCE_NOT_ALLOWED", `Source "${address}" is not allow-listed`, {
        source: address,
      });
    }
    const source = this.deps.allowList.resolve(address);
    if (source === undefined) {
      throw new VaultError("UNKNOWN_SOURCE", `No capability registered for "${address}"`, {
        source: address,
      });
    }
    return source;
  }

  // ─── Supply ──────────────────────────────────────────────────────────

  /**
   * Approve the source for `amount`, call its deposit entry point and
   * record the principal. No allowance survives the call, whether it
   * succeeds or fails.
   */
  async supply(address: Address, amount: bigint): Promise<void> {
    if (amount <= 0n) {
      throw new VaultError("INVALID_AMOUNT", `Supply must be positive, got ${amount}`);
    }
    const source = this.require(address);
    const { vault, asset } = this.deps;

    asset.approve(vault, address, amount);
    try {
      await callSupply(source, asset.address, amount, vault);
    } catch (err) {
      asset.approve(vault, address, 0n);
      throw new VaultError(
        "SOURCE_CALL_FAILED",
        `Supply of ${amount} to "${address}" failed: ${errorMessage(err)}`,
        { source: address, amount: amount.toString() },
        { cause: err },
      );
    }
    if (asset.allowance(vault, address) > 0n) {
      asset.approve(vault, address, 0n);
    }

    const principal = this.principalOf(address) + amount;
    this.principal.set(address, principal);
    this.deps.emit(VAULT_EVENTS.SOURCE_SUPPLIED, {
      source: address,
      amount: amount.toString(),
      principal: principal.toString(),
    });
  }

  // ─── Withdraw ────────────────────────────────────────────────────────

  /**
   * Pull `amount` back from a source. Returns what actually arrived.
   */
  async withdraw(address: Address, amount: bigint): Promise<bigint> {
    if (amount <= 0n) {
      throw new VaultError("INVALID_AMOUNT", `Withdrawal must be positive, got ${amount}`);
    }
    const source = this.require(address);
    const { vault, asset } = this.deps;

    const before = asset.balanceOf(vault);
    try {
      await callWithdraw(source, asset.address, amount, vault);
    } catch (err) {
      throw new VaultError(
        "SOURCE_CALL_FAILED",
        `Withdrawal of ${amount} from "${address}" failed: ${errorMessage(err)}`,
        { source: address, amount: amount.toString() },
        { cause: err },
      );
    }
    const received = saturatingSub(asset.balanceOf(vault), before);

    const recorded = this.principalOf(address);
    const principal = recorded - minOf(received, recorded);
    if (principal === 0n) {
      this.principal.delete(address);
    } else {
      this.principal.set(address, principal);
    }

    this.deps.emit(VAULT_EVENTS.SOURCE_WITHDRAWN, {
      source: address,
      requested: amount.toString(),
      received: received.toString(),
      principal: principal.toString(),
    });
    return received;
  }

  /**
   * Walk the allow-listed sources pulling what each can give until
   * `shortfall` is covered. A failing source is logged and skipped.
   */
  async withdrawAsNeeded(shortfall: bigint): Promise<RecoveryResult> {
    let recovered = 0n;
    const { allowList, asset, vault } = this.deps;

    for (const address of allowList.listAllowed()) {
      if (recovered >= shortfall) {
        break;
      }
      const source = allowList.resolve(address);
      if (source === undefined) {
        this.log.warn({ source: address }, "allow-listed source has no capability, skipping");
        continue;
      }

      try {
        const available = await positionValue(source, asset.address, vault);
        const wanted = minOf(shortfall - recovered, available);
        if (wanted === 0n) {
          continue;
        }
        recovered += await this.withdraw(address, wanted);
      } catch (err) {
        this.log.warn(
          { source: address, err: errorMessage(err) },
          "liquidity pull failed, trying next source",
        );
      }
    }

    const covered = recovered >= shortfall;
    this.log.info(
      { shortfall: shortfall.toString(), recovered: recovered.toString(), covered },
      "liquidity pull finished",
    );
    return { recovered, covered };
  }

  snapshot(): Readonly<Record<Address, string>> {
    const out: Record<Address, string> = {};
    for (const address of [...this.principal.keys()].sort()) {
      out[address] = this.principalOf(address).toString();
    }
    return out;
  }
}
