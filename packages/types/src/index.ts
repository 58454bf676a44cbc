/**
 * @quevault/types — Shared domain types for the quevault stack.
 *
 * These types are used across all packages:
 * - Financial primitives (addresses, the asset token surface)
 * - Yield source capabilities and the allow-list collaborator
 * - Price oracle collaborator
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Amounts are bigint base units
 */

// Financial types
export type { Address, AssetToken } from "./financial.js";

// Yield sources
export type {
  SourceKind,
  ReceiptToken,
  ReserveData,
  ReserveStyleSource,
  ShareStyleSource,
  YieldSource,
  AllowList,
} from "./source.js";

// Oracle
export type { PriceQuote, PriceOracle } from "./oracle.js";

// Event types
export type { DomainEvent, EventMetadata } from "./event.js";

// Runtime type guards
export {
  isAddress,
  isSourceKind,
  isYieldSource,
  isPriceQuote,
} from "./guards.js";
