/**
 * @quevault/ledger — Per-depositor cost-basis telemetry.
 *
 * Tracks how much principal each depositor has put in and how many shares
 * that principal bought. Used only to split a redemption into return of
 * capital and yield.
 */

import type { Address } from "@quevault/types";
import type { PrincipalRecord, PrincipalSnapshot } from "./types.js";
import { LedgerError } from "./types.js";
import { mulDiv, saturatingSub } from "./unit-math.js";

const EMPTY: PrincipalRecord = { principal: 0n, shares: 0n };

export class PrincipalBook {
  private readonly _records: Map<Address, PrincipalRecord> = new Map();

  get(holder: Address): PrincipalRecord {
    return this._records.get(holder) ?? EMPTY;
  }

  /**
   * Credit a fulfilled deposit.
   */
  recordDeposit(holder: Address, assets: bigint, shares: bigint): PrincipalRecord {
    if (assets < 0n || shares < 0n) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Deposit telemetry must be non-negative, got assets=${assets} shares=${shares}`,
      );
    }
    const current = this.get(holder);
    const next: PrincipalRecord = {
      principal: current.principal + assets,
      shares: current.shares + shares,
    };
    this._records.set(holder, next);
    return next;
  }

  /**
   * Principal attributable to `shares` of the holder's lifetime shares.
   *
   * With no recorded shares there is no basis to split on, so the whole
   * gross amount counts as principal (and therefore no yield).
   */
  proportionalPrincipal(holder: Address, shares: bigint, grossAssets: bigint): bigint {
    const record = this.get(holder);
    if (record.shares === 0n) {
      return grossAssets;
    }
    return mulDiv(record.principal, shares, record.shares);
  }

  /**
   * Debit a fulfilled redemption. Both counters are floored at zero.
   */
  recordRedemption(holder: Address, principal: bigint, shares: bigint): PrincipalRecord {
    const current = this.get(holder);
    const next: PrincipalRecord = {
      principal: saturatingSub(current.principal, principal),
      shares: saturatingSub(current.shares, shares),
    };
    if (next.principal === 0n && next.shares === 0n) {
      this._records.delete(holder);
    } else {
      this._records.set(holder, next);
    }
    return next;
  }

  snapshot(): PrincipalSnapshot {
    const records: Record<Address, { principal: string; shares: string }> = {};
    for (const holder of [...this._records.keys()].sort()) {
      const record = this.get(holder);
      records[holder] = {
        principal: record.principal.toString(),
        shares: record.shares.toString(),
      };
    }
    return { records };
  }
}
