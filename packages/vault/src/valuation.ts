/**
 * Valuation — total assets under management and the share price.
 *
 * totalAssets = idle balance + Σ live position in every allow-listed source.
 * A source that fails to report contributes zero; the failure is logged,
 * never propagated.
 */

import type { Address, AllowList, AssetToken } from "@quevault/types";
import { PRICE_SCALE, mulDiv, saturatingSub } from "@quevault/ledger";
import type { Logger } from "pino";
import { positionValue } from "./allocation.js";

export interface ValuationDeps {
  readonly vault: Address;
  readonly asset: AssetToken;
  readonly allowList: AllowList;
  readonly logger: Logger;
}

export class Valuation {
  private readonly deps: ValuationDeps;
  private readonly log: Logger;

  constructor(deps: ValuationDeps) {
    this.deps = deps;
    this.log = deps.logger.child({ component: "valuation" });
  }

  /** Asset balance held directly by the vault. */
  idle(): bigint {
    return this.deps.asset.balanceOf(this.deps.vault);
  }

  async totalAssets(): Promise<bigint> {
    const { allowList, asset, vault } = this.deps;
    let total = this.idle();

    for (const address of allowList.listAllowed()) {
      const source = allowList.resolve(address);
      if (source === undefined) {
        this.log.warn({ source: address }, "allow-listed source has no capability, valued at zero");
        continue;
      }
      try {
        total += await positionValue(source, asset.address, vault);
      } catch (err) {
        this.log.warn(
          { source: address, kind: source.kind, err: err instanceof Error ? err.message : String(err) },
          "source valuation failed, valued at zero",
        );
      }
    }
    return total;
  }

  /**
   * Assets backing outstanding shares: everything except capital still
   * waiting to be converted into shares.
   */
  async backingAssets(pendingDepositAssets: bigint): Promise<bigint> {
    return saturatingSub(await this.totalAssets(), pendingDepositAssets);
  }

  /**
   * PRICE_SCALE-scaled assets per share. 1:1 while no shares exist.
   */
  async sharePrice(totalSupply: bigint, pendingDepositAssets: bigint): Promise<bigint> {
    if (totalSupply === 0n) {
      return PRICE_SCALE;
    }
    return mulDiv(await this.backingAssets(pendingDepositAssets), PRICE_SCALE, totalSupply);
  }
}
