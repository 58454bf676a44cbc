/**
 * Yield Source Types
 *
 * External yield sources are capabilities the vault calls into.
 * Two shapes are supported, and the allow-list stores which shape each
 * address implements so dispatch never depends on probing.
 *
 * - reserve: lending-market style (supply / withdraw / receipt token)
 * - share: tokenized-vault style (deposit / withdraw / shares)
 */

import type { Address } from "./financial.js";

/** Which capability shape a yield source implements. */
export type SourceKind = "reserve" | "share";

/**
 * Interest-bearing receipt handed out by a reserve-style source.
 * Assumed redeemable 1:1 for the underlying asset.
 */
export interface ReceiptToken {
  balanceOf(holder: Address): Promise<bigint>;
}

export interface ReserveData {
  readonly receiptToken: ReceiptToken;
}

/**
 * Lending-market style source.
 */
export interface ReserveStyleSource {
  supply(
    asset: Address,
    amount: bigint,
    onBehalfOf: Address,
    referralCode: number,
  ): Promise<void>;

  /** Returns the amount the source claims to have sent. Not trusted. */
  withdraw(asset: Address, amount: bigint, to: Address): Promise<bigint>;

  getReserveData(asset: Address): Promise<ReserveData>;
}

/**
 * Tokenized-vault style source.
 */
export interface ShareStyleSource {
  asset(): Promise<Address>;
  deposit(amount: bigint, receiver: Address): Promise<bigint>;
  withdraw(amount: bigint, receiver: Address, owner: Address): Promise<bigint>;
  balanceOf(holder: Address): Promise<bigint>;
  convertToAssets(shares: bigint): Promise<bigint>;
}

/**
 * A yield source tagged with its shape.
 */
export type YieldSource =
  | {
      readonly kind: "reserve";
      readonly address: Address;
      readonly api: ReserveStyleSource;
    }
  | {
      readonly kind: "share";
      readonly address: Address;
      readonly api: ShareStyleSource;
    };

/**
 * The externally governed set of sources the vault may use.
 * Read-mostly from the vault's point of view; always consulted fresh.
 */
export interface AllowList {
  isAllowed(address: Address): boolean;
  kindOf(address: Address): SourceKind | undefined;
  /** Allowed addresses in registration order. */
  listAllowed(): readonly Address[];
  /** The capability for an address, or undefined if none is registered. */
  resolve(address: Address): YieldSource | undefined;
}
