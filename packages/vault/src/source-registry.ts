/**
 * Source Registry — the governed allow-list of yield sources.
 *
 * Stores each source's capability together with its kind tag, so
 * valuation and allocation dispatch on the tag instead of probing.
 * Only admins change it; everyone else reads.
 */

import type { Address, AllowList, SourceKind, YieldSource } from "@quevault/types";
import { isAddress, isYieldSource } from "@quevault/types";
import type { AccessControl } from "./access-control.js";
import { VaultError } from "./types.js";

interface Entry {
  readonly source: YieldSource;
  allowed: boolean;
}

export class SourceRegistry implements AllowList {
  private readonly entries: Map<Address, Entry> = new Map();
  private readonly access: AccessControl;

  constructor(access: AccessControl) {
    this.access = access;
  }

  /**
   * Register (or replace) a source's capability. Allowed unless told
   * otherwise. Registration order is listing order.
   */
  register(caller: Address, source: YieldSource, allowed = true): void {
    this.access.requireRole("admin", caller);
    if (!isAddress(source.address)) {
      throw new VaultError("INVALID_ADDRESS", "Source address must be non-empty");
    }
    if (!isYieldSource(source)) {
      throw new VaultError("UNKNOWN_SOURCE", "Source must carry a supported kind and an api");
    }
    this.entries.set(source.address, { source, allowed });
  }

  setAllowed(caller: Address, address: Address, allowed: boolean): void {
    this.access.requireRole("admin", caller);
    const entry = this.entries.get(address);
    if (entry === undefined) {
      throw new VaultError("UNKNOWN_SOURCE", `Source "${address}" is not registered`, {
        source: address,
      });
    }
    entry.allowed = allowed;
  }

  isAllowed(address: Address): boolean {
    return this.entries.get(address)?.allowed === true;
  }

  kindOf(address: Address): SourceKind | undefined {
    return this.entries.get(address)?.source.kind;
  }

  listAllowed(): readonly Address[] {
    return [...this.entries.values()]
      .filter((entry) => entry.allowed)
      .map((entry) => entry.source.address);
  }

  resolve(address: Address): YieldSource | undefined {
    return this.entries.get(address)?.source;
  }
}
