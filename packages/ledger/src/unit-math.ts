/**
 * @quevault/ledger — Deterministic base-unit arithmetic.
 *
 * All arithmetic is bigint. Division truncates toward zero, which for the
 * non-negative quantities used here means rounding down.
 *
 * Rules:
 * - No floating-point operations
 * - Inputs to mulDiv must be non-negative
 * - Decimal strings are only for display
 */

import { LedgerError } from "./types.js";

/** Denominator for basis-point rates: 10000 bps = 100%. */
export const BPS_DENOMINATOR = 10_000n;

/** Fixed-point scale for share prices: 1 share = 1 asset is PRICE_SCALE. */
export const PRICE_SCALE = 10n ** 18n;

// ─── Arithmetic ──────────────────────────────────────────────────────────

/**
 * `a * b / denominator`, truncating. The product is exact (bigint), so
 * there is no intermediate overflow.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new LedgerError("DIVISION_BY_ZERO", `mulDiv(${a}, ${b}, 0)`);
  }
  if (a < 0n || b < 0n || denominator < 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `mulDiv operands must be non-negative, got ${a}, ${b}, ${denominator}`,
    );
  }
  return (a * b) / denominator;
}

/**
 * The `bps` share of `amount`, rounded down.
 */
export function bpsOf(amount: bigint, bps: bigint): bigint {
  return mulDiv(amount, bps, BPS_DENOMINATOR);
}

/**
 * `a - b`, floored at zero.
 */
export function saturatingSub(a: bigint, b: bigint): bigint {
  return a > b ? a - b : 0n;
}

export function minOf(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

// ─── Decimal Strings ─────────────────────────────────────────────────────

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}
