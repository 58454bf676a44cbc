/**
 * Tests for bigint unit arithmetic.
 */

import { describe, it, expect } from "vitest";
import {
  BPS_DENOMINATOR,
  PRICE_SCALE,
  mulDiv,
  bpsOf,
  saturatingSub,
  minOf,
  formatAmount,
} from "../src/unit-math.js";
import { LedgerError } from "../src/types.js";

describe("mulDiv", () => {
  it("multiplies then divides", () => {
    expect(mulDiv(100n, 1100n, 1000n)).toBe(110n);
  });

  it("truncates toward zero", () => {
    expect(mulDiv(1n, 1000n, 1001n)).toBe(0n);
    expect(mulDiv(7n, 3n, 2n)).toBe(10n);
  });

  it("does not overflow on large products", () => {
    const big = 10n ** 30n;
    expect(mulDiv(big, big, big)).toBe(big);
  });

  it("throws on a zero denominator", () => {
    expect(() => mulDiv(1n, 1n, 0n)).toThrow(LedgerError);
  });

  it("throws on negative operands", () => {
    expect(() => mulDiv(-1n, 1n, 1n)).toThrow(/non-negative/);
  });
});

describe("bpsOf", () => {
  it("takes a basis-point share", () => {
    expect(bpsOf(10n, 1000n)).toBe(1n);
    expect(bpsOf(10_000n, 250n)).toBe(250n);
  });

  it("rounds down", () => {
    expect(bpsOf(9n, 1000n)).toBe(0n);
  });

  it("100% is the full amount", () => {
    expect(bpsOf(12_345n, BPS_DENOMINATOR)).toBe(12_345n);
  });
});

describe("saturatingSub / minOf", () => {
  it("floors subtraction at zero", () => {
    expect(saturatingSub(5n, 3n)).toBe(2n);
    expect(saturatingSub(3n, 5n)).toBe(0n);
    expect(saturatingSub(3n, 3n)).toBe(0n);
  });

  it("picks the smaller value", () => {
    expect(minOf(2n, 9n)).toBe(2n);
    expect(minOf(9n, 2n)).toBe(2n);
  });
});

describe("formatAmount", () => {
  it("formats scaled values", () => {
    expect(formatAmount(10050n, 2)).toBe("100.50");
    expect(formatAmount(-5025n, 2)).toBe("-50.25");
    expect(formatAmount(5n, 3)).toBe("0.005");
    expect(formatAmount(42n, 0)).toBe("42");
  });

  it("formats the price scale as one", () => {
    expect(formatAmount(PRICE_SCALE, 18)).toBe("1.000000000000000000");
  });
});
