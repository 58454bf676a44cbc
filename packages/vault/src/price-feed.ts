/**
 * Price Feed — USD reporting over an external price oracle.
 *
 * Reporting only: no accounting decision ever reads a price.
 *
 * Rules:
 * - One price id per asset, bound by an admin
 * - A quote older than the caller's bound is rejected, judged by the
 *   injected clock as well as by the oracle itself
 * - USD values are 18-decimal fixed point
 */

import type { Address, PriceOracle, PriceQuote } from "@quevault/types";
import { isPriceQuote } from "@quevault/types";
import type { AccessControl } from "./access-control.js";
import type { UsdValuation } from "./types.js";
import { VaultError } from "./types.js";

export const USD_DECIMALS = 18;

export class PriceFeed {
  private oracle: PriceOracle | undefined;
  private readonly priceIds: Map<Address, string> = new Map();
  private readonly access: AccessControl;
  private readonly clock: () => Date;

  constructor(access: AccessControl, clock: () => Date) {
    this.access = access;
    this.clock = clock;
  }

  get configured(): boolean {
    return this.oracle !== undefined;
  }

  priceIdOf(asset: Address): string | undefined {
    return this.priceIds.get(asset);
  }

  setOracle(caller: Address, oracle: PriceOracle | undefined): void {
    this.access.requireRole("admin", caller);
    this.oracle = oracle;
  }

  setPriceId(caller: Address, asset: Address, priceId: string): void {
    this.access.requireRole("admin", caller);
    if (priceId.length === 0) {
      throw new VaultError("INVALID_PRICE", "Price id must be non-empty", { asset });
    }
    this.priceIds.set(asset, priceId);
  }

  /**
   * Freshest quote for `asset`, no older than `maxAgeSeconds`.
   */
  async quote(asset: Address, maxAgeSeconds: number): Promise<PriceQuote> {
    if (!Number.isInteger(maxAgeSeconds) || maxAgeSeconds < 1) {
      throw new VaultError(
        "INVALID_AMOUNT",
        `maxAgeSeconds must be a positive integer, got ${maxAgeSeconds}`,
      );
    }
    const priceId = this.priceIds.get(asset);
    if (this.oracle === undefined || priceId === undefined) {
      throw new VaultError("ORACLE_NOT_CONFIGURED", `No price source bound for "${asset}"`, {
        asset,
      });
    }

    const quote = await this.oracle.getPriceNoOlderThan(priceId, maxAgeSeconds);
    if (!isPriceQuote(quote)) {
      throw new VaultError("INVALID_PRICE", `Oracle returned a malformed quote for "${asset}"`, {
        asset,
      });
    }
    const now = Math.floor(this.clock().getTime() / 1000);
    if (now - quote.publishTime > maxAgeSeconds) {
      throw new VaultError(
        "STALE_PRICE",
        `Quote for "${asset}" published at ${quote.publishTime} is older than ${maxAgeSeconds}s`,
        { asset, publishTime: quote.publishTime, now },
      );
    }
    if (quote.price <= 0n) {
      throw new VaultError("INVALID_PRICE", `Oracle returned a non-positive price for "${asset}"`, {
        asset,
        price: quote.price.toString(),
      });
    }
    return quote;
  }

  /**
   * USD value of `amount` base units of an asset with `decimals`.
   */
  async valueUsd(
    asset: Address,
    decimals: number,
    amount: bigint,
    maxAgeSeconds: number,
  ): Promise<UsdValuation> {
    const quote = await this.quote(asset, maxAgeSeconds);
    return { usd: toUsd(amount, decimals, quote), publishTime: quote.publishTime };
  }
}

/**
 * amount × price × 10^expo, rescaled from `decimals` to USD_DECIMALS.
 */
export function toUsd(amount: bigint, decimals: number, quote: PriceQuote): bigint {
  const shift = USD_DECIMALS + quote.expo - decimals;
  const raw = amount * quote.price;
  return shift >= 0 ? raw * 10n ** BigInt(shift) : raw / 10n ** BigInt(-shift);
}
