/**
 * Financial Types
 *
 * Core primitives for deterministic vault accounting.
 *
 * Rules:
 * - Amounts are bigint base units (no floating point, no decimal strings)
 * - Identities are opaque strings; the engine never parses them
 * - A token is an external collaborator; the vault only moves balances
 */

/**
 * Identity of a holder, contract, or yield source.
 */
export type Address = string;

/**
 * A fungible token as seen by the vault.
 *
 * Mirrors the usual transfer/approve/transferFrom surface. Every method
 * throws on failure (insufficient balance or allowance) and leaves the
 * balances untouched.
 */
export interface AssetToken {
  /** The token's own identity */
  readonly address: Address;

  /** Number of decimals for display (USDC = 6, most ERC-20s = 18) */
  readonly decimals: number;

  balanceOf(holder: Address): bigint;
  allowance(owner: Address, spender: Address): bigint;

  /** Set (not add to) the amount `spender` may pull from `owner`. */
  approve(owner: Address, spender: Address, amount: bigint): void;

  transfer(from: Address, to: Address, amount: bigint): void;

  /** Move `amount` from `from` to `to`, consuming `spender`'s allowance. */
  transferFrom(
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint,
  ): void;
}
