/**
 * Request Queue — ordered identities with O(1) removal by identity.
 *
 * An array of pending identities plus a reverse index (identity → slot).
 * Removing slot i moves the last entry into i and truncates, so removal
 * reorders the tail. Fulfillment walks "current order from the head",
 * which after removals is not insertion order.
 *
 * Rules:
 * - Each identity appears at most once
 * - The index always points at every entry's current slot
 */

import type { Address } from "@quevault/types";
import { VaultError } from "./types.js";

export class RequestQueue {
  private readonly order: Address[] = [];
  private readonly index: Map<Address, number> = new Map();

  /**
   * Rebuild a queue from a serialized order.
   */
  static from(order: readonly Address[]): RequestQueue {
    const queue = new RequestQueue();
    for (const id of order) {
      queue.push(id);
    }
    return queue;
  }

  get length(): number {
    return this.order.length;
  }

  at(position: number): Address | undefined {
    return this.order[position];
  }

  has(id: Address): boolean {
    return this.index.has(id);
  }

  positionOf(id: Address): number | undefined {
    return this.index.get(id);
  }

  entries(): readonly Address[] {
    return [...this.order];
  }

  push(id: Address): void {
    if (this.index.has(id)) {
      throw new VaultError("ALREADY_PENDING", `"${id}" is already queued`);
    }
    this.index.set(id, this.order.length);
    this.order.push(id);
  }

  /**
   * Swap-with-last removal. Returns the removed identity.
   */
  removeAt(position: number): Address {
    const removed = this.order[position];
    const last = this.order[this.order.length - 1];
    if (removed === undefined || last === undefined) {
      throw new RangeError(`No queue entry at ${position} (length ${this.order.length})`);
    }

    this.order[position] = last;
    this.index.set(last, position);
    this.order.pop();
    this.index.delete(removed);
    return removed;
  }

  /**
   * Remove by identity. False if the identity is not queued.
   */
  remove(id: Address): boolean {
    const position = this.index.get(id);
    if (position === undefined) {
      return false;
    }
    this.removeAt(position);
    return true;
  }

  clone(): RequestQueue {
    return RequestQueue.from(this.order);
  }

  /**
   * True when every slot and every index entry agree.
   */
  isConsistent(): boolean {
    if (this.index.size !== this.order.length) {
      return false;
    }
    return this.order.every((id, position) => this.index.get(id) === position);
  }
}
