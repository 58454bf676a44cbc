/**
 * Runtime Type Guards
 *
 * Narrowing functions for domain types, used at system boundaries
 * (source registration, oracle responses).
 */

import type { Address } from "./financial.js";
import type { SourceKind, YieldSource } from "./source.js";
import type { PriceQuote } from "./oracle.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

// =============================================================================
// Financial guards
// =============================================================================

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && value.trim().length > 0;
}

// =============================================================================
// Source guards
// =============================================================================

const SOURCE_KINDS = new Set<string>(["reserve", "share"]);

export function isSourceKind(value: unknown): value is SourceKind {
  return typeof value === "string" && SOURCE_KINDS.has(value);
}

export function isYieldSource(value: unknown): value is YieldSource {
  if (!isRecord(value)) return false;
  const v = value;
  return (
    isSourceKind(v.kind) &&
    isAddress(v.address) &&
    v.api !== null &&
    typeof v.api === "object"
  );
}

// =============================================================================
// Oracle guards
// =============================================================================

export function isPriceQuote(value: unknown): value is PriceQuote {
  if (!isRecord(value)) return false;
  const v = value;
  return (
    typeof v.price === "bigint" &&
    typeof v.expo === "number" &&
    Number.isInteger(v.expo) &&
    typeof v.conf === "bigint" &&
    typeof v.publishTime === "number" &&
    Number.isFinite(v.publishTime)
  );
}
