/**
 * Redeem Queue — pending redemptions and the totalRequestedAssets counter.
 *
 * Same removal discipline as the deposit queue. The escrowed shares live
 * in the share token under the vault's own account; this queue only
 * records who is owed what.
 */

import type { Address } from "@quevault/types";
import { saturatingSub } from "@quevault/ledger";
import { RequestQueue } from "./request-queue.js";
import type { RedeemQueueSnapshot, WithdrawalRequest } from "./types.js";
import { VaultError } from "./types.js";

export class RedeemQueue {
  private readonly queue: RequestQueue;
  private readonly requests: Map<Address, WithdrawalRequest>;
  private _totalRequestedAssets: bigint;

  constructor() {
    this.queue = new RequestQueue();
    this.requests = new Map();
    this._totalRequestedAssets = 0n;
  }

  /**
   * Restore from a snapshot. Order entries without a request come back
   * as stale entries.
   */
  static fromSnapshot(snapshot: RedeemQueueSnapshot): RedeemQueue {
    const restored = new RedeemQueue();
    for (const id of snapshot.order) {
      restored.queue.push(id);
    }
    for (const [controller, entry] of Object.entries(snapshot.requests)) {
      restored.requests.set(controller, {
        controller,
        receiver: entry.receiver,
        shares: BigInt(entry.shares),
        assetsAtRequest: BigInt(entry.assetsAtRequest),
      });
    }
    restored._totalRequestedAssets = BigInt(snapshot.totalRequestedAssets);
    return restored;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  get length(): number {
    return this.queue.length;
  }

  get totalRequestedAssets(): bigint {
    return this._totalRequestedAssets;
  }

  at(position: number): Address | undefined {
    return this.queue.at(position);
  }

  requestOf(controller: Address): WithdrawalRequest | undefined {
    return this.requests.get(controller);
  }

  hasPending(controller: Address): boolean {
    return this.requests.has(controller);
  }

  isConsistent(): boolean {
    return this.queue.isConsistent();
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  /**
   * Queue a redemption. A controller whose stale entry is still queued
   * keeps its slot.
   */
  enqueue(request: WithdrawalRequest): void {
    if (request.shares <= 0n) {
      throw new VaultError("INVALID_AMOUNT", `Redemption must be positive, got ${request.shares}`);
    }
    if (request.assetsAtRequest <= 0n) {
      throw new VaultError(
        "ZERO_ASSETS",
        `${request.shares} shares are worth nothing at the current price`,
      );
    }
    if (this.requests.has(request.controller)) {
      throw new VaultError(
        "ALREADY_PENDING",
        `"${request.controller}" already has a pending redemption`,
      );
    }

    if (!this.queue.has(request.controller)) {
      this.queue.push(request.controller);
    }
    this.requests.set(request.controller, request);
    this._totalRequestedAssets += request.assetsAtRequest;
  }

  /**
   * Delete a live request and its queue entry. The counter drops by the
   * request's assets at request time.
   */
  remove(controller: Address): WithdrawalRequest {
    const request = this.requests.get(controller);
    if (request === undefined) {
      throw new VaultError("NO_PENDING_REQUEST", `"${controller}" has no pending redemption`);
    }
    this.requests.delete(controller);
    this.queue.remove(controller);
    this._totalRequestedAssets = saturatingSub(
      this._totalRequestedAssets,
      request.assetsAtRequest,
    );
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

  snapshot(): RedeemQueueSnapshot {
    const requests: Record<
      Address,
      { receiver: Address; shares: string; assetsAtRequest: string }
    > = {};
    for (const controller of [...this.requests.keys()].sort()) {
      const request = this.requests.get(controller);
      if (request !== undefined) {
        requests[controller] = {
          receiver: request.receiver,
          shares: request.shares.toString(),
          assetsAtRequest: request.assetsAtRequest.toString(),
        };
      }
    }
    return {
      order: this.queue.entries(),
      requests,
      totalRequestedAssets: this._totalRequestedAssets.toString(),
    };
  }
}
