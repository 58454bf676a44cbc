/**
 * In-process yield sources for vault tests.
 *
 * Both pools hold real balances in the test asset (a TokenLedger), so
 * every movement they make is visible in the vault's idle balance.
 */

import type {
  Address,
  ReserveData,
  ReserveStyleSource,
  ShareStyleSource,
  YieldSource,
} from "@quevault/types";
import { TokenLedger } from "@quevault/ledger";
import { Vault } from "../src/vault.js";
import type { VaultConfig } from "../src/types.js";

export const VAULT = "vault";
export const ADMIN = "admin";
export const EXECUTOR = "keeper";

export function makeAsset(): TokenLedger {
  return new TokenLedger("usdc", 6);
}

/**
 * Mint `amount` to `holder` and approve the vault for it.
 */
export function fund(asset: TokenLedger, holder: Address, amount: bigint): void {
  asset.mint(holder, amount);
  asset.approve(holder, VAULT, amount);
}

// =============================================================================
// Reserve-style pool
// =============================================================================

/**
 * Lending-market pool: supplied assets become 1:1 receipt tokens.
 */
export class MockReservePool implements ReserveStyleSource {
  readonly receipt: TokenLedger;
  failValuation = false;
  failWithdraw = false;
  failSupply = false;

  /** Runs at the start of every supply call */
  onSupply: (() => void) | undefined;

  /** Assets withheld from every withdrawal (simulates a lossy source) */
  haircut = 0n;

  /** Assets left unpulled on every supply */
  pullShort = 0n;

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
    this.onSupply?.();
    if (this.failSupply) {
      throw new Error(`${this.address}: supply disabled`);
    }
    const pulled = amount - this.pullShort;
    this.asset.transferFrom(this.address, onBehalfOf, this.address, pulled);
    this.receipt.mint(onBehalfOf, pulled);
  }

  async withdraw(_asset: Address, amount: bigint, to: Address): Promise<bigint> {
    if (this.failWithdraw) {
      throw new Error(`${this.address}: withdraw disabled`);
    }
    this.receipt.burn(to, amount);
    this.asset.transfer(this.address, to, amount - this.haircut);
    return amount;
  }

  async getReserveData(): Promise<ReserveData> {
    if (this.failValuation) {
      throw new Error(`${this.address}: no reserve data`);
    }
    return {
      receiptToken: { balanceOf: async (holder: Address) => this.receipt.balanceOf(holder) },
    };
  }

  /** Credit `amount` of yield to `holder`. */
  accrue(holder: Address, amount: bigint): void {
    this.asset.mint(this.address, amount);
    this.receipt.mint(holder, amount);
  }
}

// =============================================================================
// Share-style pool
// =============================================================================

/**
 * Tokenized-vault pool: deposits mint pool shares priced against the
 * pool's asset balance.
 */
export class MockSharePool implements ShareStyleSource {
  private readonly shares: TokenLedger;
  failValuation = false;
  failWithdraw = false;

  constructor(
    readonly address: Address,
    private readonly assetToken: TokenLedger,
  ) {
    this.shares = new TokenLedger(`${address}:shares`, assetToken.decimals);
  }

  get source(): YieldSource {
    return { kind: "share", address: this.address, api: this };
  }

  private get totalAssets(): bigint {
    return this.assetToken.balanceOf(this.address);
  }

  async asset(): Promise<Address> {
    return this.assetToken.address;
  }

  async deposit(amount: bigint, receiver: Address): Promise<bigint> {
    const supply = this.shares.totalSupply;
    const minted = supply === 0n ? amount : (amount * supply) / this.totalAssets;
    this.assetToken.transferFrom(this.address, receiver, this.address, amount);
    this.shares.mint(receiver, minted);
    return minted;
  }

  async withdraw(amount: bigint, receiver: Address, owner: Address): Promise<bigint> {
    if (this.failWithdraw) {
      throw new Error(`${this.address}: withdraw disabled`);
    }
    const supply = this.shares.totalSupply;
    const assets = this.totalAssets;
    const burned = (amount * supply + assets - 1n) / assets;
    this.shares.burn(owner, burned);
    this.assetToken.transfer(this.address, receiver, amount);
    return burned;
  }

  async balanceOf(holder: Address): Promise<bigint> {
    if (this.failValuation) {
      throw new Error(`${this.address}: balance unavailable`);
    }
    return this.shares.balanceOf(holder);
  }

  async convertToAssets(shares: bigint): Promise<bigint> {
    const supply = this.shares.totalSupply;
    return supply === 0n ? shares : (shares * this.totalAssets) / supply;
  }

  /** Grow the pool's assets without minting shares. */
  accrue(amount: bigint): void {
    this.assetToken.mint(this.address, amount);
  }
}

// =============================================================================
// Harness
// =============================================================================

export interface Harness {
  readonly vault: Vault;
  readonly asset: TokenLedger;
  readonly reserve: MockReservePool;
  readonly share: MockSharePool;
}

/**
 * A vault with an executor and both pool kinds registered and allowed,
 * reserve first.
 */
export function makeHarness(
  overrides: Omit<Partial<VaultConfig>, "address" | "asset" | "admin"> = {},
): Harness {
  const asset = makeAsset();
  const vault = new Vault({ address: VAULT, asset, admin: ADMIN, ...overrides });
  vault.grantRole(ADMIN, "executor", EXECUTOR);
  const reserve = new MockReservePool("pool-r", asset);
  const share = new MockSharePool("pool-s", asset);
  vault.registerSource(ADMIN, reserve.source);
  vault.registerSource(ADMIN, share.source);
  return { vault, asset, reserve, share };
}

/**
 * Queue and fulfill deposits for each holder, supplying to `target`.
 */
export async function seed(
  h: Harness,
  deposits: Readonly<Record<Address, bigint>>,
  target: Address = "pool-r",
): Promise<void> {
  for (const [holder, amount] of Object.entries(deposits)) {
    fund(h.asset, holder, amount);
    h.vault.requestDeposit(holder, amount);
  }
  while (h.vault.depositQueueLength > 0) {
    const result = await h.vault.fulfillDeposits(EXECUTOR, 5, target);
    if (result.processed === 0) {
      break;
    }
  }
}
