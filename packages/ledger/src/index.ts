/**
 * @quevault/ledger — Bookkeeping primitives for the vault.
 *
 * A pure TypeScript package with zero runtime dependencies:
 * - TokenLedger: fungible balances, allowances, mint and burn
 * - PrincipalBook: per-depositor cost-basis telemetry
 * - Unit math: bigint mulDiv, basis points, decimal formatting
 *
 * Design rules:
 * - All monetary arithmetic uses bigint (no floating point)
 * - Fail-closed: invalid operations throw, never silently succeed
 * - Zero runtime dependencies
 */

export { TokenLedger } from "./token-ledger.js";
export { PrincipalBook } from "./principal-book.js";

export {
  BPS_DENOMINATOR,
  PRICE_SCALE,
  mulDiv,
  bpsOf,
  saturatingSub,
  minOf,
  formatAmount,
} from "./unit-math.js";

export type {
  PrincipalRecord,
  TokenSnapshot,
  PrincipalSnapshot,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError } from "./types.js";
