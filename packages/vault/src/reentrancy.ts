/**
 * Reentrancy Guard — one mutating operation at a time.
 *
 * Held from entry to exit of every mutating call, including the awaits on
 * external sources in between. A second mutating call while the guard is
 * held is rejected, not queued. Released on every exit path.
 */

import { VaultError } from "./types.js";

export class ReentrancyGuard {
  private holder: string | undefined;

  get held(): boolean {
    return this.holder !== undefined;
  }

  run<T>(operation: string, fn: () => T): T {
    this.enter(operation);
    try {
      return fn();
    } finally {
      this.holder = undefined;
    }
  }

  async runAsync<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    this.enter(operation);
    try {
      return await fn();
    } finally {
      this.holder = undefined;
    }
  }

  private enter(operation: string): void {
    if (this.holder !== undefined) {
      throw new VaultError(
        "REENTRANT_CALL",
        `${operation} called while ${this.holder} is in progress`,
        { operation, inProgress: this.holder },
      );
    }
    this.holder = operation;
  }
}
