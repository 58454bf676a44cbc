/**
 * Access Control — role membership for governed entry points.
 *
 * Two roles:
 * - admin: fees, fee recipient, oracle binding, allow-list, pause, roles
 * - executor: batch fulfillment and manual allocation
 *
 * Every check runs before any state change.
 */

import type { Address } from "@quevault/types";
import type { Role } from "./types.js";
import { VaultError } from "./types.js";

export class AccessControl {
  private readonly members: Record<Role, Set<Address>> = {
    admin: new Set(),
    executor: new Set(),
  };

  constructor(admin: Address) {
    if (admin.length === 0) {
      throw new VaultError("INVALID_ADDRESS", "Admin address must be non-empty");
    }
    this.members.admin.add(admin);
  }

  hasRole(role: Role, account: Address): boolean {
    return this.members[role].has(account);
  }

  requireRole(role: Role, account: Address): void {
    if (!this.hasRole(role, account)) {
      throw new VaultError("UNAUTHORIZED", `"${account}" lacks the ${role} role`, {
        role,
        account,
      });
    }
  }

  /**
   * Returns false when the account already held the role.
   */
  grantRole(caller: Address, role: Role, account: Address): boolean {
    this.requireRole("admin", caller);
    if (account.length === 0) {
      throw new VaultError("INVALID_ADDRESS", "Account address must be non-empty");
    }
    if (this.members[role].has(account)) {
      return false;
    }
    this.members[role].add(account);
    return true;
  }

  /**
   * Returns false when the account did not hold the role.
   */
  revokeRole(caller: Address, role: Role, account: Address): boolean {
    this.requireRole("admin", caller);
    return this.members[role].delete(account);
  }

  membersOf(role: Role): readonly Address[] {
    return [...this.members[role]].sort();
  }
}
