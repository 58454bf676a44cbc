/**
 * @quevault/ledger — Fungible token balances.
 *
 * An in-process token: balances, allowances, mint and burn. The vault uses
 * one for its shares (escrow is simply the vault's own balance), and tests
 * use one as the underlying asset.
 *
 * Rules:
 * - Balances never go negative
 * - totalSupply always equals the sum of balances
 * - Every check runs before any write
 */

import type { Address, AssetToken } from "@quevault/types";
import type { TokenSnapshot } from "./types.js";
import { LedgerError } from "./types.js";

export class TokenLedger implements AssetToken {
  readonly address: Address;
  readonly decimals: number;
  private readonly _balances: Map<Address, bigint> = new Map();
  private readonly _allowances: Map<Address, Map<Address, bigint>> = new Map();
  private _totalSupply = 0n;

  constructor(address: Address, decimals: number) {
    if (!Number.isInteger(decimals) || decimals < 0) {
      throw new LedgerError(
        "INVALID_DECIMALS",
        `Token decimals must be a non-negative integer, got: ${String(decimals)}`,
      );
    }
    this.address = address;
    this.decimals = decimals;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  balanceOf(holder: Address): bigint {
    return this._balances.get(holder) ?? 0n;
  }

  allowance(owner: Address, spender: Address): bigint {
    return this._allowances.get(owner)?.get(spender) ?? 0n;
  }

  /**
   * Holders with a non-zero balance, sorted.
   */
  holders(): readonly Address[] {
    return [...this._balances.keys()].sort();
  }

  // ─── Movements ───────────────────────────────────────────────────────

  approve(owner: Address, spender: Address, amount: bigint): void {
    this.assertNonNegative(amount);

    let spenders = this._allowances.get(owner);
    if (spenders === undefined) {
      spenders = new Map();
      this._allowances.set(owner, spenders);
    }

    if (amount === 0n) {
      spenders.delete(spender);
      if (spenders.size === 0) {
        this._allowances.delete(owner);
      }
    } else {
      spenders.set(spender, amount);
    }
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    this.assertNonNegative(amount);
    this.assertCovered(from, amount);
    this.setBalance(from, this.balanceOf(from) - amount);
    this.setBalance(to, this.balanceOf(to) + amount);
  }

  transferFrom(
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint,
  ): void {
    this.assertNonNegative(amount);

    const allowed = this.allowance(from, spender);
    if (allowed < amount) {
      throw new LedgerError(
        "INSUFFICIENT_ALLOWANCE",
        `"${spender}" may pull ${allowed} from "${from}" but tried ${amount}`,
      );
    }
    this.assertCovered(from, amount);

    this.approve(from, spender, allowed - amount);
    this.transfer(from, to, amount);
  }

  mint(to: Address, amount: bigint): void {
    this.assertNonNegative(amount);
    this.setBalance(to, this.balanceOf(to) + amount);
    this._totalSupply += amount;
  }

  burn(from: Address, amount: bigint): void {
    this.assertNonNegative(amount);
    this.assertCovered(from, amount);
    this.setBalance(from, this.balanceOf(from) - amount);
    this._totalSupply -= amount;
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): TokenSnapshot {
    const balances: Record<Address, string> = {};
    for (const holder of this.holders()) {
      balances[holder] = this.balanceOf(holder).toString();
    }
    return {
      address: this.address,
      decimals: this.decimals,
      totalSupply: this._totalSupply.toString(),
      balances,
    };
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private setBalance(holder: Address, value: bigint): void {
    if (value === 0n) {
      this._balances.delete(holder);
    } else {
      this._balances.set(holder, value);
    }
  }

  private assertNonNegative(amount: bigint): void {
    if (amount < 0n) {
      throw new LedgerError("INVALID_AMOUNT", `Amount must be non-negative, got ${amount}`);
    }
  }

  private assertCovered(holder: Address, amount: bigint): void {
    const balance = this.balanceOf(holder);
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `"${holder}" holds ${balance} of ${this.address}, needs ${amount}`,
      );
    }
  }
}
