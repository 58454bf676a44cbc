/**
 * Tests for Keeper — batch draining, retry and prefunding.
 */

import { describe, it, expect } from "vitest";
import pino from "pino";
import type { PriceOracle } from "@quevault/types";
import { Vault } from "@quevault/vault";
import { TokenLedger } from "@quevault/ledger";
import { Keeper } from "../src/keeper.js";
import { createKeeper } from "../src/index.js";
import { ADMIN, EXECUTOR, VAULT, queueDeposits, setup } from "./fixtures.js";

function captureLogger() {
  const lines: Record<string, unknown>[] = [];
  const logger = pino(
    { level: "info" },
    {
      write(message: string) {
        lines.push(JSON.parse(message));
      },
    },
  );
  return { logger, lines };
}

const SEVEN = {
  u1: 10n,
  u2: 10n,
  u3: 10n,
  u4: 10n,
  u5: 10n,
  u6: 10n,
  u7: 10n,
};

// =============================================================================
// Deposits
// =============================================================================

describe("Keeper.drainDeposits", () => {
  it("drains the queue in batches into the first allowed source", async () => {
    const s = setup();
    queueDeposits(s, SEVEN);
    const keeper = new Keeper({ vault: s.vault, executor: EXECUTOR });

    const report = await keeper.drainDeposits();

    expect(report).toEqual({ batches: 2, processed: 7, failures: 0, stopped: "empty" });
    expect(s.vault.poolPrincipal("pool-a")).toBe(70n);
    expect(s.vault.totalSupply).toBe(70n);
  });

  it("uses the configured target", async () => {
    const s = setup();
    queueDeposits(s, { alice: 25n });
    const keeper = new Keeper({ vault: s.vault, executor: EXECUTOR, targetSource: "pool-b" });

    expect(keeper.depositTarget()).toBe("pool-b");
    await keeper.drainDeposits();
    expect(s.vault.poolPrincipal("pool-b")).toBe(25n);
  });

  it("stops at the batch limit", async () => {
    const s = setup();
    queueDeposits(s, SEVEN);
    const keeper = new Keeper({ vault: s.vault, executor: EXECUTOR, maxBatches: 1 });

    const report = await keeper.drainDeposits();

    expect(report).toEqual({ batches: 1, processed: 5, failures: 0, stopped: "max-batches" });
    expect(s.vault.depositQueueLength).toBe(2);
  });

  it("stops when a batch settles nothing", async () => {
    const s = setup();
    queueDeposits(s, { alice: 1n });
    const keeper = new Keeper({ vault: s.vault, executor: EXECUTOR });
    await keeper.drainDeposits();
    s.poolA.accrue(VAULT, 1_000_000n);
    queueDeposits(s, { bob: 1n });

    const report = await keeper.drainDeposits();

    expect(report).toEqual({ batches: 1, processed: 0, failures: 0, stopped: "no-progress" });
    expect(s.vault.hasPendingDeposit("bob")).toBe(true);
  });

  it("retries a failed batch once at half size", async () => {
    const s = setup();
    queueDeposits(s, { a: 1n, b: 2n, c: 3n });
    s.poolA.failingSupplies = 1;
    const keeper = new Keeper({ vault: s.vault, executor: EXECUTOR });

    const report = await keeper.drainDeposits();

    expect(report).toEqual({ batches: 2, processed: 3, failures: 1, stopped: "empty" });
    expect(s.vault.poolPrincipal("pool-a")).toBe(6n);
  });

  it("gives up after the retry fails and logs why", async () => {
    const s = setup();
    queueDeposits(s, { a: 1n });
    s.poolA.failingSupplies = 2;
    const { logger, lines } = captureLogger();
    const keeper = new Keeper({ vault: s.vault, executor: EXECUTOR, logger });

    const report = await keeper.drainDeposits();

    expect(report).toEqual({ batches: 0, processed: 0, failures: 2, stopped: "failed" });
    expect(s.vault.hasPendingDeposit("a")).toBe(true);
    const errors = lines.filter((line) => line["level"] === 50);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({
      component: "keeper",
      queue: "deposits",
      batchSize: 2,
      msg: "batch failed after retry, giving up",
    });
  });

  it("reports when there is nowhere to supply", async () => {
    const asset = new TokenLedger("usdc", 6);
    const vault = new Vault({ address: VAULT, asset, admin: ADMIN });
    const keeper = new Keeper({ vault, executor: EXECUTOR });

    expect(await keeper.drainDeposits()).toEqual({
      batches: 0,
      processed: 0,
      failures: 0,
      stopped: "no-target",
    });
  });
});

// =============================================================================
// Withdrawals
// =============================================================================

describe("Keeper.drainWithdrawals", () => {
  it("prefunds the batch from the largest positions first", async () => {
    const s = setup();
    queueDeposits(s, { alice: 100n, bob: 100n, carol: 100n });
    const keeper = new Keeper({ vault: s.vault, executor: EXECUTOR });
    await keeper.drainDeposits();
    await s.vault.rebalance(EXECUTOR, "pool-a", "pool-b", 100n);
    for (const holder of ["alice", "bob", "carol"]) {
      await s.vault.requestRedeem(holder, 100n);
    }

    const report = await keeper.drainWithdrawals();

    expect(report).toEqual({
      batches: 1,
      processed: 3,
      failures: 0,
      stopped: "empty",
      prefunded: 300n,
    });
    expect(s.vault.poolPrincipal("pool-a")).toBe(0n);
    expect(s.vault.poolPrincipal("pool-b")).toBe(0n);
    expect(s.asset.balanceOf("carol")).toBe(100n);
  });

  it("only prefunds what idle capital cannot cover", async () => {
    const s = setup();
    queueDeposits(s, { alice: 100n });
    const keeper = new Keeper({ vault: s.vault, executor: EXECUTOR });
    await keeper.drainDeposits();
    await s.vault.deallocate(EXECUTOR, "pool-a", 30n);
    await s.vault.requestRedeem("alice", 50n);

    const report = await keeper.drainWithdrawals();

    expect(report.prefunded).toBe(20n);
    expect(s.vault.poolPrincipal("pool-a")).toBe(50n);
    expect(s.vault.idleAssets()).toBe(0n);
  });

  it("counts requests a failed batch paid before it stopped", async () => {
    const s = setup();
    queueDeposits(s, { alice: 100n, bob: 100n });
    const keeper = new Keeper({ vault: s.vault, executor: EXECUTOR });
    await keeper.drainDeposits();
    await s.vault.requestRedeem("alice", 100n);
    await s.vault.requestRedeem("bob", 100n);
    s.poolA.lose(VAULT, 50n);

    const report = await keeper.drainWithdrawals();

    expect(report).toEqual({
      batches: 0,
      processed: 1,
      failures: 2,
      stopped: "failed",
      prefunded: 0n,
    });
    expect(s.asset.balanceOf("alice")).toBe(100n);
    expect(s.vault.hasPendingRedeem("bob")).toBe(true);
  });

  it("is a no-op on an empty queue", async () => {
    const s = setup();
    const keeper = new Keeper({ vault: s.vault, executor: EXECUTOR });
    expect(await keeper.drainWithdrawals()).toEqual({
      batches: 0,
      processed: 0,
      failures: 0,
      stopped: "empty",
      prefunded: 0n,
    });
  });
});

// =============================================================================
// Cycle and construction
// =============================================================================

describe("Keeper.runCycle", () => {
  it("settles deposits before withdrawals", async () => {
    const s = setup();
    queueDeposits(s, { alice: 40n });
    const keeper = new Keeper({ vault: s.vault, executor: EXECUTOR });
    await keeper.drainDeposits();
    await s.vault.requestRedeem("alice", 40n);
    queueDeposits(s, { bob: 60n });

    const report = await keeper.runCycle();

    expect(report.deposits).toEqual({ batches: 1, processed: 1, failures: 0, stopped: "empty" });
    expect(report.withdrawals.processed).toBe(1);
    expect(report.valuation).toBeUndefined();
    expect(s.vault.balanceOf("bob")).toBe(60n);
    expect(s.asset.balanceOf("alice")).toBe(40n);
  });
});

describe("Keeper.runCycle valuation", () => {
  const NOW = new Date("2026-01-01T00:00:00Z");
  const NOW_SECONDS = Math.floor(NOW.getTime() / 1000);

  function oracleAt(publishTime: number): PriceOracle {
    return {
      getPriceNoOlderThan: async () => ({ price: 100_000_000n, expo: -8, conf: 0n, publishTime }),
    };
  }

  it("values the vault in USD when an oracle is bound", async () => {
    const s = setup({ clock: () => NOW });
    s.vault.setOracle(ADMIN, oracleAt(NOW_SECONDS));
    s.vault.setPriceId(ADMIN, "usdc-usd");
    queueDeposits(s, { alice: 2_500_000n });
    const { logger, lines } = captureLogger();
    const keeper = new Keeper({ vault: s.vault, executor: EXECUTOR, logger });

    const report = await keeper.runCycle();

    expect(report.valuation).toEqual({ usd: 2_500_000_000_000_000_000n, publishTime: NOW_SECONDS });
    expect(lines.find((l) => l["msg"] === "vault valuation")).toMatchObject({
      usd: "2.500000000000000000",
      publishTime: NOW_SECONDS,
    });
  });

  it("logs and skips a stale quote", async () => {
    const s = setup({ clock: () => NOW });
    s.vault.setOracle(ADMIN, oracleAt(NOW_SECONDS - 31));
    s.vault.setPriceId(ADMIN, "usdc-usd");
    const { logger, lines } = captureLogger();
    const keeper = new Keeper({
      vault: s.vault,
      executor: EXECUTOR,
      priceMaxAgeSeconds: 30,
      logger,
    });

    const report = await keeper.runCycle();

    expect(report.valuation).toBeUndefined();
    expect(lines.find((l) => l["msg"] === "USD valuation unavailable")).toMatchObject({
      level: 40,
      maxAgeSeconds: 30,
    });
  });
});

describe("createKeeper", () => {
  it("builds a keeper from environment variables", async () => {
    const s = setup();
    queueDeposits(s, { alice: 5n });
    const keeper = createKeeper(s.vault, {
      KEEPER_EXECUTOR: EXECUTOR,
      KEEPER_TARGET_SOURCE: "pool-b",
      NODE_ENV: "test",
      LOG_LEVEL: "fatal",
    });

    expect(keeper.depositTarget()).toBe("pool-b");
    await keeper.drainDeposits();
    expect(s.vault.poolPrincipal("pool-b")).toBe(5n);
  });
});
