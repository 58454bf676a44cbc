/**
 * Deposit Queue — pending deposits and the pendingDepositAssets counter.
 *
 * Per controller: absent → pending (enqueue) → absent (fulfill or cancel).
 * Records are deleted, never flagged. The counter moves in lockstep with
 * every record created or deleted.
 *
 * A queue entry whose record is missing is stale; settlement removes it
 * without counting it.
 */

import type { Address } from "@quevault/types";
import { saturatingSub } from "@quevault/ledger";
import { RequestQueue } from "./request-queue.js";
import type { DepositQueueSnapshot, DepositRequest } from "./types.js";
import { VaultError } from "./types.js";

export class DepositQueue {
  private readonly queue: RequestQueue;
  private readonly requests: Map<Address, DepositRequest>;
  private _pendingDepositAssets: bigint;

  constructor() {
    this.queue = new RequestQueue();
    this.requests = new Map();
    this._pendingDepositAssets = 0n;
  }

  /**
   * Restore from a snapshot. Order entries without a request come back
   * as stale entries.
   */
  static fromSnapshot(snapshot: DepositQueueSnapshot): DepositQueue {
    const restored = new DepositQueue();
    for (const id of snapshot.order) {
      restored.queue.push(id);
    }
    for (const [controller, entry] of Object.entries(snapshot.requests)) {
      restored.requests.set(controller, {
        controller,
        receiver: entry.receiver,
        assets: BigInt(entry.assets),
      });
    }
    restored._pendingDepositAssets = BigInt(snapshot.pendingDepositAssets);
    return restored;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  get length(): number {
    return this.queue.length;
  }

  get pendingDepositAssets(): bigint {
    return this._pendingDepositAssets;
  }

  at(position: number): Address | undefined {
    return this.queue.at(position);
  }

  requestOf(controller: Address): DepositRequest | undefined {
    return this.requests.get(controller);
  }

  hasPending(controller: Address): boolean {
    return this.requests.has(controller);
  }

  isConsistent(): boolean {
    return this.queue.isConsistent();
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  enqueue(request: DepositRequest): void {
    if (request.assets <= 0n) {
      throw new VaultError("INVALID_AMOUNT", `Deposit must be positive, got ${request.assets}`);
    }
    if (this.requests.has(request.controller)) {
      throw new VaultError(
        "ALREADY_PENDING",
        `"${request.controller}" already has a pending deposit`,
      );
    }

    // A stale entry for this controller keeps its slot.
    if (!this.queue.has(request.controller)) {
      this.queue.push(request.controller);
    }
    this.requests.set(request.controller, request);
    this._pendingDepositAssets += request.assets;
  }

  /**
   * Delete a live request and its queue entry.
   */
  remove(controller: Address): DepositRequest {
    const request = this.requests.get(controller);
    if (request === undefined) {
      throw new VaultError("NO_PENDING_REQUEST", `"${controller}" has no pending deposit`);
    }
    this.requests.delete(controller);
    this.queue.remove(controller);
    this._pendingDepositAssets = saturatingSub(this._pendingDepositAssets, request.assets);
    return request;
  }

  /**
   * Drop a queue entry that has no request behind it.
   */
  removeStale(controller: Address): void {
    if (this.requests.has(controller)) {
      throw new VaultError("ALREADY_PENDING", `"${controller}" is live, not stale`);
    }
    this.queue.remove(controller);
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  clone(): DepositQueue {
    return DepositQueue.fromSnapshot(this.snapshot());
  }

  snapshot(): DepositQueueSnapshot {
    const requests: Record<Address, { receiver: Address; assets: string }> = {};
    for (const controller of [...this.requests.keys()].sort()) {
      const request = this.requests.get(controller);
      if (request !== undefined) {
        requests[controller] = { receiver: request.receiver, assets: request.assets.toString() };
      }
    }
    return {
      order: this.queue.entries(),
      requests,
      pendingDepositAssets: this._pendingDepositAssets.toString(),
    };
  }
}
