/**
 * Price Oracle Types
 *
 * Used for USD reporting only. No accounting decision reads a price.
 */

/**
 * A fixed-point price: `price * 10^expo` USD per whole asset unit.
 */
export interface PriceQuote {
  readonly price: bigint;
  readonly expo: number;
  /** Confidence interval, same scale as `price` */
  readonly conf: bigint;
  /** Unix seconds */
  readonly publishTime: number;
}

export interface PriceOracle {
  /**
   * Freshest quote for `priceId`. Must reject when that quote is older
   * than `maxAgeSeconds`.
   */
  getPriceNoOlderThan(priceId: string, maxAgeSeconds: number): Promise<PriceQuote>;
}
