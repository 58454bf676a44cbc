import { describe, it, expect } from "vitest";
import { DepositQueue } from "../src/deposit-queue.js";

describe("DepositQueue", () => {
  it("tracks pending assets across enqueue and remove", () => {
    const queue = new DepositQueue();
    queue.enqueue({ controller: "alice", receiver: "alice", assets: 100n });
    queue.enqueue({ controller: "bob", receiver: "carol", assets: 40n });

    expect(queue.length).toBe(2);
    expect(queue.pendingDepositAssets).toBe(140n);

    const removed = queue.remove("alice");
    expect(removed.assets).toBe(100n);
    expect(queue.pendingDepositAssets).toBe(40n);
    expect(queue.at(0)).toBe("bob");
    expect(queue.hasPending("alice")).toBe(false);
  });

  it("rejects a non-positive amount", () => {
    const queue = new DepositQueue();
    expect(() => queue.enqueue({ controller: "alice", receiver: "alice", assets: 0n })).toThrow(
      expect.objectContaining({ code: "INVALID_AMOUNT" }),
    );
  });

  it("rejects a second request from the same controller", () => {
    const queue = new DepositQueue();
    queue.enqueue({ controller: "alice", receiver: "alice", assets: 10n });
    expect(() => queue.enqueue({ controller: "alice", receiver: "alice", assets: 5n })).toThrow(
      expect.objectContaining({ code: "ALREADY_PENDING" }),
    );
    expect(queue.pendingDepositAssets).toBe(10n);
  });

  it("rejects removing a controller with nothing pending", () => {
    expect(() => new DepositQueue().remove("nobody")).toThrow(
      expect.objectContaining({ code: "NO_PENDING_REQUEST" }),
    );
  });

  it("restores stale entries from a snapshot", () => {
    const queue = DepositQueue.fromSnapshot({
      order: ["ghost", "alice"],
      requests: { alice: { receiver: "alice", assets: "25" } },
      pendingDepositAssets: "25",
    });

    expect(queue.length).toBe(2);
    expect(queue.requestOf("ghost")).toBeUndefined();
    queue.removeStale("ghost");
    expect(queue.length).toBe(1);
    expect(queue.at(0)).toBe("alice");
  });

  it("re-enqueueing a stale controller keeps its slot", () => {
    const queue = DepositQueue.fromSnapshot({
      order: ["ghost", "alice"],
      requests: { alice: { receiver: "alice", assets: "25" } },
      pendingDepositAssets: "25",
    });
    queue.enqueue({ controller: "ghost", receiver: "ghost", assets: 5n });

    expect(queue.length).toBe(2);
    expect(queue.at(0)).toBe("ghost");
    expect(queue.pendingDepositAssets).toBe(30n);
  });

  it("refuses to treat a live request as stale", () => {
    const queue = new DepositQueue();
    queue.enqueue({ controller: "alice", receiver: "alice", assets: 10n });
    expect(() => queue.removeStale("alice")).toThrow(
      expect.objectContaining({ code: "ALREADY_PENDING" }),
    );
  });

  it("clones without sharing state", () => {
    const queue = new DepositQueue();
    queue.enqueue({ controller: "alice", receiver: "alice", assets: 10n });
    const copy = queue.clone();
    copy.remove("alice");

    expect(queue.pendingDepositAssets).toBe(10n);
    expect(copy.pendingDepositAssets).toBe(0n);
  });

  it("snapshots requests sorted by controller", () => {
    const queue = new DepositQueue();
    queue.enqueue({ controller: "zed", receiver: "zed", assets: 1n });
    queue.enqueue({ controller: "amy", receiver: "bo", assets: 2n });

    const snapshot = queue.snapshot();
    expect(snapshot.order).toEqual(["zed", "amy"]);
    expect(Object.keys(snapshot.requests)).toEqual(["amy", "zed"]);
    expect(snapshot.requests["amy"]).toEqual({ receiver: "bo", assets: "2" });
    expect(snapshot.pendingDepositAssets).toBe("3");
  });
});
