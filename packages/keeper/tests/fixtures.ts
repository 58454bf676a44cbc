/**
 * An in-process lending pool and a vault wired to two of them.
 */

import type { Address, ReserveData, ReserveStyleSource, YieldSource } from "@quevault/types";
import { TokenLedger } from "@quevault/ledger";
import { Vault } from "@quevault/vault";
import type { VaultConfig } from "@quevault/vault";

export const VAULT = "vault";
export const ADMIN = "admin";
export const EXECUTOR = "keeper";

export class LendingPool implements ReserveStyleSource {
  private readonly receipt: TokenLedger;

  /** Number of upcoming supply calls that throw */
  failingSupplies = 0;

  constructor(
    readonly address: Address,
    private readonly asset: TokenLedger,
  ) {
    this.receipt = new TokenLedger(`${address}:receipt`, asset.decimals);
  }

  get source(): YieldSource {
    return { kind: "reserve", address: this.address, api: this };
  }

  async supply(_asset: Address, amount: bigint, onBehalfOf: Address): Promise<void> {
    if (this.failingSupplies > 0) {
      this.failingSupplies--;
      throw new Error(`${this.address}: supply rejected`);
    }
    this.asset.transferFrom(this.address, onBehalfOf, this.address, amount);
    this.receipt.mint(onBehalfOf, amount);
  }

  async withdraw(_asset: Address, amount: bigint, to: Address): Promise<bigint> {
    this.receipt.burn(to, amount);
    this.asset.transfer(this.address, to, amount);
    return amount;
  }

  async getReserveData(): Promise<ReserveData> {
    return { receiptToken: { balanceOf: async (holder: Address) => this.receipt.balanceOf(holder) } };
  }

  /** Write `holder`'s position down by `amount` */
  lose(holder: Address, amount: bigint): void {
    this.receipt.burn(holder, amount);
  }

  accrue(holder: Address, amount: bigint): void {
    this.asset.mint(this.address, amount);
    this.receipt.mint(holder, amount);
  }
}

export interface Setup {
  readonly vault: Vault;
  readonly asset: TokenLedger;
  readonly poolA: LendingPool;
  readonly poolB: LendingPool;
}

export function setup(overrides: Omit<Partial<VaultConfig>, "address" | "asset" | "admin"> = {}): Setup {
  const asset = new TokenLedger("usdc", 6);
  const vault = new Vault({ address: VAULT, asset, admin: ADMIN, ...overrides });
  vault.grantRole(ADMIN, "executor", EXECUTOR);
  const poolA = new LendingPool("pool-a", asset);
  const poolB = new LendingPool("pool-b", asset);
  vault.registerSource(ADMIN, poolA.source);
  vault.registerSource(ADMIN, poolB.source);
  return { vault, asset, poolA, poolB };
}

/** Mint, approve and request a deposit for each holder. */
export function queueDeposits(s: Setup, deposits: Readonly<Record<Address, bigint>>): void {
  for (const [holder, amount] of Object.entries(deposits)) {
    s.asset.mint(holder, amount);
    s.asset.approve(holder, VAULT, amount);
    s.vault.requestDeposit(holder, amount);
  }
}
