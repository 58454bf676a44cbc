/**
 * @quevault/ledger — Internal types for the bookkeeping primitives.
 *
 * Rules:
 * - Snapshots are plain JSON (amounts as base-10 strings)
 * - Fail-closed: invalid operations throw, never silently succeed
 * - A failed operation leaves every balance untouched
 */

import type { Address } from "@quevault/types";

// ─── Principal Telemetry ─────────────────────────────────────────────────

/**
 * Cost-basis telemetry for one depositor.
 *
 * Both fields are lifetime counters: they grow on every fulfilled deposit
 * and shrink by exactly what each redemption removes. They are never reset
 * wholesale on a partial redemption.
 */
export interface PrincipalRecord {
  readonly principal: bigint;
  readonly shares: bigint;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of a token's balances.
 * Holders are listed in sorted order so equal states serialize equally.
 */
export interface TokenSnapshot {
  readonly address: Address;
  readonly decimals: number;
  readonly totalSupply: string;
  readonly balances: Readonly<Record<Address, string>>;
}

export interface PrincipalSnapshot {
  readonly records: Readonly<
    Record<Address, { readonly principal: string; readonly shares: string }>
  >;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_DECIMALS"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "DIVISION_BY_ZERO";

/**
 * Structured error from the ledger primitives.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
