/**
 * Vault — queue-based vault top-level coordinator.
 *
 * Composes:
 * - DepositQueue / RedeemQueue (deferred requests)
 * - SettlementEngine (batch fulfillment)
 * - PoolAllocationTracker + Valuation (yield sources)
 * - AccessControl, SourceRegistry, PriceFeed (governance)
 *
 * The Vault is the caller-facing API. Every mutating entry point checks
 * the caller's role and the pause flag, holds the reentrancy guard for
 * its whole duration, and records what it did in the event log.
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import type { Address, AssetToken, DomainEvent, PriceOracle, YieldSource } from "@quevault/types";
import {
  BPS_DENOMINATOR,
  PRICE_SCALE,
  PrincipalBook,
  TokenLedger,
  mulDiv,
  saturatingSub,
} from "@quevault/ledger";
import type { PrincipalRecord } from "@quevault/ledger";
import { InMemoryEventStore, VAULT_EVENTS, createVaultEvent } from "@quevault/event-store";
import type { EventStore, HashedStoredEvent, VaultEventContext } from "@quevault/event-store";
import { AccessControl } from "./access-control.js";
import { PoolAllocationTracker } from "./allocation.js";
import { DepositQueue } from "./deposit-queue.js";
import { PriceFeed } from "./price-feed.js";
import { RedeemQueue } from "./redeem-queue.js";
import { ReentrancyGuard } from "./reentrancy.js";
import { SettlementEngine } from "./settlement.js";
import { SourceRegistry } from "./source-registry.js";
import { Valuation } from "./valuation.js";
import type {
  DepositFulfillment,
  DepositRequest,
  Role,
  UsdValuation,
  VaultConfig,
  VaultEventEmitter,
  VaultSnapshot,
  WithdrawalFulfillment,
  WithdrawalRequest,
} from "./types.js";
import { VaultError } from "./types.js";

function validateFee(bps: bigint): bigint {
  if (bps < 0n || bps > BPS_DENOMINATOR) {
    throw new VaultError("INVALID_FEE", `Fee must be within 0..${BPS_DENOMINATOR} bps, got ${bps}`);
  }
  return bps;
}

/** The actor and correlation of one mutating call, and the events it recorded. */
interface OperationContext {
  readonly event: VaultEventContext;
  readonly events: DomainEvent[];
}

function validateAddress(address: Address, what: string): Address {
  if (address.length === 0) {
    throw new VaultError("INVALID_ADDRESS", `${what} must be a non-empty address`);
  }
  return address;
}

// =============================================================================
// Vault
// =============================================================================

export class Vault {
  readonly address: Address;
  readonly asset: AssetToken;
  readonly shares: TokenLedger;
  readonly access: AccessControl;
  readonly sources: SourceRegistry;
  readonly prices: PriceFeed;
  readonly store: EventStore;
  readonly streamId: string;

  private readonly principal = new PrincipalBook();
  private readonly deposits = new DepositQueue();
  private readonly redemptions = new RedeemQueue();
  private readonly allocations: PoolAllocationTracker;
  private readonly valuation: Valuation;
  private readonly settlement: SettlementEngine;
  private readonly guard = new ReentrancyGuard();
  private readonly log: Logger;
  private readonly clock: () => Date;

  private _paused = false;
  private _feeBps: bigint;
  private _feeRecipient: Address | undefined;
  private context: OperationContext | undefined;

  constructor(config: VaultConfig) {
    this.address = validateAddress(config.address, "Vault");
    this._feeBps = validateFee(config.feeBps ?? 0n);
    this._feeRecipient =
      config.feeRecipient === undefined
        ? undefined
        : validateAddress(config.feeRecipient, "Fee recipient");

    this.asset = config.asset;
    this.shares = new TokenLedger(`${this.address}:shares`, config.shareDecimals ?? config.asset.decimals);
    this.access = new AccessControl(config.admin);
    this.sources = new SourceRegistry(this.access);
    this.clock = config.clock ?? (() => new Date());
    this.prices = new PriceFeed(this.access, this.clock);
    this.log = (config.logger ?? pino({ level: "silent" })).child({ vault: this.address });
    this.store = config.store ?? new InMemoryEventStore({ now: this.clock, logger: this.log });
    this.streamId = `vault:${this.address}`;

    const deps = {
      vault: this.address,
      asset: this.asset,
      allowList: this.sources,
      logger: this.log,
    };
    this.allocations = new PoolAllocationTracker({ ...deps, emit: this.emit });
    this.valuation = new Valuation(deps);
    this.settlement = new SettlementEngine(
      {
        vault: this.address,
        asset: this.asset,
        shares: this.shares,
        principal: this.principal,
        deposits: this.deposits,
        redemptions: this.redemptions,
        allocations: this.allocations,
        valuation: this.valuation,
      },
      this.emit,
      this.log,
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Requests
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Pull `assets` from the caller (who must have approved the vault) and
   * queue a deposit. Shares are minted at fulfillment.
   */
  requestDeposit(caller: Address, assets: bigint, receiver: Address = caller): DepositRequest {
    return this.run(caller, "requestDeposit", () => {
      this.whenNotPaused();
      validateAddress(caller, "Controller");
      validateAddress(receiver, "Receiver");
      if (assets <= 0n) {
        throw new VaultError("INVALID_AMOUNT", `Deposit must be positive, got ${assets}`);
      }
      if (this.deposits.hasPending(caller)) {
        throw new VaultError("ALREADY_PENDING", `"${caller}" already has a pending deposit`);
      }
      const balance = this.asset.balanceOf(caller);
      if (balance < assets) {
        throw new VaultError(
          "INSUFFICIENT_BALANCE",
          `"${caller}" holds ${balance}, cannot deposit ${assets}`,
        );
      }
      const allowance = this.asset.allowance(caller, this.address);
      if (allowance < assets) {
        throw new VaultError(
          "INSUFFICIENT_ALLOWANCE",
          `"${caller}" approved ${allowance}, cannot deposit ${assets}`,
        );
      }

      this.asset.transferFrom(this.address, caller, this.address, assets);
      const request: DepositRequest = { controller: caller, receiver, assets };
      this.deposits.enqueue(request);
      this.emit(VAULT_EVENTS.DEPOSIT_REQUESTED, {
        controller: caller,
        receiver,
        assets: assets.toString(),
      });
      return request;
    });
  }

  /**
   * Escrow `shares` and queue a redemption whose asset value is fixed
   * now, at the current share price.
   */
  async requestRedeem(
    caller: Address,
    shares: bigint,
    receiver: Address = caller,
  ): Promise<WithdrawalRequest> {
    return this.runAsync(caller, "requestRedeem", async () => {
      this.whenNotPaused();
      validateAddress(caller, "Controller");
      validateAddress(receiver, "Receiver");
      if (shares <= 0n) {
        throw new VaultError("INVALID_AMOUNT", `Redemption must be positive, got ${shares}`);
      }
      if (this.redemptions.hasPending(caller)) {
        throw new VaultError("ALREADY_PENDING", `"${caller}" already has a pending redemption`);
      }
      const balance = this.shares.balanceOf(caller);
      if (balance < shares) {
        throw new VaultError(
          "INSUFFICIENT_BALANCE",
          `"${caller}" holds ${balance} shares, cannot redeem ${shares}`,
        );
      }

      const price = await this.valuation.sharePrice(
        this.shares.totalSupply,
        this.deposits.pendingDepositAssets,
      );
      const assetsAtRequest = mulDiv(shares, price, PRICE_SCALE);
      if (assetsAtRequest === 0n) {
        throw new VaultError("ZERO_ASSETS", `${shares} shares are worth nothing at price ${price}`);
      }

      const request: WithdrawalRequest = { controller: caller, receiver, shares, assetsAtRequest };
      this.shares.transfer(caller, this.address, shares);
      this.redemptions.enqueue(request);
      this.emit(VAULT_EVENTS.REDEEM_REQUESTED, {
        controller: caller,
        receiver,
        shares: shares.toString(),
        assetsAtRequest: assetsAtRequest.toString(),
      });
      return request;
    });
  }

  /**
   * Refund a pending deposit in full. Allowed while paused.
   */
  cancelDeposit(caller: Address): DepositRequest {
    return this.run(caller, "cancelDeposit", () => {
      const request = this.deposits.requestOf(caller);
      if (request === undefined) {
        throw new VaultError("NO_PENDING_REQUEST", `"${caller}" has no pending deposit`);
      }
      const idle = this.valuation.idle();
      if (idle < request.assets) {
        throw new VaultError(
          "INSUFFICIENT_IDLE",
          `Vault holds ${idle}, cannot refund ${request.assets}`,
        );
      }

      this.asset.transfer(this.address, caller, request.assets);
      this.deposits.remove(caller);
      this.emit(VAULT_EVENTS.DEPOSIT_CANCELLED, {
        controller: caller,
        assets: request.assets.toString(),
      });
      return request;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Fulfillment (executor)
  // ───────────────────────────────────────────────────────────────────────

  async fulfillDeposits(
    caller: Address,
    batchSize: number,
    target: Address,
  ): Promise<DepositFulfillment> {
    return this.runAsync(caller, "fulfillDeposits", async () => {
      this.access.requireRole("executor", caller);
      this.whenNotPaused();
      return this.settlement.fulfillDeposits(batchSize, target);
    });
  }

  async fulfillWithdrawals(caller: Address, batchSize: number): Promise<WithdrawalFulfillment> {
    return this.runAsync(caller, "fulfillWithdrawals", async () => {
      this.access.requireRole("executor", caller);
      this.whenNotPaused();
      return this.settlement.fulfillWithdrawals(batchSize, {
        bps: this._feeBps,
        recipient: this._feeRecipient,
      });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Allocation (executor)
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Supply idle capital to a source. Capital reserved for pending
   * deposits is off limits.
   */
  async allocate(caller: Address, source: Address, amount: bigint): Promise<void> {
    return this.runAsync(caller, "allocate", async () => {
      this.access.requireRole("executor", caller);
      this.whenNotPaused();
      if (amount <= 0n) {
        throw new VaultError("INVALID_AMOUNT", `Allocation must be positive, got ${amount}`);
      }
      const available = this.availableIdle();
      if (amount > available) {
        throw new VaultError(
          "INSUFFICIENT_IDLE",
          `Only ${available} idle assets are free to allocate, requested ${amount}`,
        );
      }
      await this.allocations.supply(source, amount);
    });
  }

  /**
   * Pull capital back from a source. Returns what actually arrived.
   */
  async deallocate(caller: Address, source: Address, amount: bigint): Promise<bigint> {
    return this.runAsync(caller, "deallocate", async () => {
      this.access.requireRole("executor", caller);
      this.whenNotPaused();
      return this.allocations.withdraw(source, amount);
    });
  }

  /**
   * Move capital between sources: withdraw `amount` from `from`, supply
   * what arrived to `to`. If the supply fails, the withdrawn capital
   * stays idle in the vault.
   */
  async rebalance(caller: Address, from: Address, to: Address, amount: bigint): Promise<bigint> {
    return this.runAsync(caller, "rebalance", async () => {
      this.access.requireRole("executor", caller);
      this.whenNotPaused();
      this.allocations.require(to);
      const received = await this.allocations.withdraw(from, amount);
      if (received > 0n) {
        await this.allocations.supply(to, received);
      }
      return received;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Governance (admin)
  // ───────────────────────────────────────────────────────────────────────

  setFeeBps(caller: Address, bps: bigint): void {
    this.run(caller, "setFeeBps", () => {
      this.access.requireRole("admin", caller);
      this._feeBps = validateFee(bps);
      this.configUpdated("feeBps", bps.toString());
    });
  }

  setFeeRecipient(caller: Address, recipient: Address | undefined): void {
    this.run(caller, "setFeeRecipient", () => {
      this.access.requireRole("admin", caller);
      this._feeRecipient =
        recipient === undefined ? undefined : validateAddress(recipient, "Fee recipient");
      this.configUpdated("feeRecipient", recipient ?? null);
    });
  }

  registerSource(caller: Address, source: YieldSource, allowed = true): void {
    this.run(caller, "registerSource", () => {
      this.sources.register(caller, source, allowed);
      this.configUpdated("source.registered", `${source.address}:${source.kind}`);
    });
  }

  setSourceAllowed(caller: Address, source: Address, allowed: boolean): void {
    this.run(caller, "setSourceAllowed", () => {
      this.sources.setAllowed(caller, source, allowed);
      this.configUpdated(allowed ? "source.allowed" : "source.disallowed", source);
    });
  }

  setOracle(caller: Address, oracle: PriceOracle | undefined): void {
    this.run(caller, "setOracle", () => {
      this.prices.setOracle(caller, oracle);
      this.configUpdated("oracle", oracle === undefined ? null : "bound");
    });
  }

  setPriceId(caller: Address, priceId: string): void {
    this.run(caller, "setPriceId", () => {
      this.prices.setPriceId(caller, this.asset.address, priceId);
      this.configUpdated("priceId", priceId);
    });
  }

  grantRole(caller: Address, role: Role, account: Address): boolean {
    return this.run(caller, "grantRole", () => {
      const changed = this.access.grantRole(caller, role, account);
      if (changed) {
        this.configUpdated("role.granted", `${role}:${account}`);
      }
      return changed;
    });
  }

  revokeRole(caller: Address, role: Role, account: Address): boolean {
    return this.run(caller, "revokeRole", () => {
      const changed = this.access.revokeRole(caller, role, account);
      if (changed) {
        this.configUpdated("role.revoked", `${role}:${account}`);
      }
      return changed;
    });
  }

  /**
   * Halt requests, fulfillment and allocation. False if already paused.
   */
  pause(caller: Address): boolean {
    return this.run(caller, "pause", () => {
      this.access.requireRole("admin", caller);
      if (this._paused) {
        return false;
      }
      this._paused = true;
      this.emit(VAULT_EVENTS.PAUSED, { by: caller });
      return true;
    });
  }

  unpause(caller: Address): boolean {
    return this.run(caller, "unpause", () => {
      this.access.requireRole("admin", caller);
      if (!this._paused) {
        return false;
      }
      this._paused = false;
      this.emit(VAULT_EVENTS.UNPAUSED, { by: caller });
      return true;
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Views
  // ───────────────────────────────────────────────────────────────────────

  get paused(): boolean {
    return this._paused;
  }

  get feeBps(): bigint {
    return this._feeBps;
  }

  get feeRecipient(): Address | undefined {
    return this._feeRecipient;
  }

  get totalSupply(): bigint {
    return this.shares.totalSupply;
  }

  get pendingDepositAssets(): bigint {
    return this.deposits.pendingDepositAssets;
  }

  get totalRequestedAssets(): bigint {
    return this.redemptions.totalRequestedAssets;
  }

  get depositQueueLength(): number {
    return this.deposits.length;
  }

  get redeemQueueLength(): number {
    return this.redemptions.length;
  }

  depositQueueAt(position: number): { controller: Address; assets: bigint } | undefined {
    const controller = this.deposits.at(position);
    if (controller === undefined) {
      return undefined;
    }
    return { controller, assets: this.deposits.requestOf(controller)?.assets ?? 0n };
  }

  redeemQueueAt(position: number): { controller: Address; shares: bigint } | undefined {
    const controller = this.redemptions.at(position);
    if (controller === undefined) {
      return undefined;
    }
    return { controller, shares: this.redemptions.requestOf(controller)?.shares ?? 0n };
  }

  depositRequestOf(controller: Address): DepositRequest | undefined {
    return this.deposits.requestOf(controller);
  }

  withdrawalRequestOf(controller: Address): WithdrawalRequest | undefined {
    return this.redemptions.requestOf(controller);
  }

  hasPendingDeposit(controller: Address): boolean {
    return this.deposits.hasPending(controller);
  }

  hasPendingRedeem(controller: Address): boolean {
    return this.redemptions.hasPending(controller);
  }

  poolPrincipal(source: Address): bigint {
    return this.allocations.principalOf(source);
  }

  /** Allocated sources, largest recorded principal first. */
  sourcesByPrincipal(): readonly Address[] {
    return this.allocations.byPrincipal();
  }

  principalOf(holder: Address): PrincipalRecord {
    return this.principal.get(holder);
  }

  balanceOf(holder: Address): bigint {
    return this.shares.balanceOf(holder);
  }

  idleAssets(): bigint {
    return this.valuation.idle();
  }

  /** Idle assets not reserved for pending deposits. */
  availableIdle(): bigint {
    return saturatingSub(this.valuation.idle(), this.deposits.pendingDepositAssets);
  }

  async totalAssets(): Promise<bigint> {
    return this.valuation.totalAssets();
  }

  async sharePrice(): Promise<bigint> {
    return this.valuation.sharePrice(this.shares.totalSupply, this.deposits.pendingDepositAssets);
  }

  /**
   * Shares `assets` would mint at the current price. Zero when the vault
   * has shares but no backing.
   */
  async previewDeposit(assets: bigint): Promise<bigint> {
    const supply = this.shares.totalSupply;
    if (supply === 0n) {
      return assets;
    }
    const backing = await this.valuation.backingAssets(this.deposits.pendingDepositAssets);
    return backing === 0n ? 0n : mulDiv(assets, supply, backing);
  }

  async convertToAssets(shares: bigint): Promise<bigint> {
    return mulDiv(shares, await this.sharePrice(), PRICE_SCALE);
  }

  async totalAssetsUsd(maxAgeSeconds: number): Promise<UsdValuation> {
    return this.prices.valueUsd(
      this.asset.address,
      this.asset.decimals,
      await this.valuation.totalAssets(),
      maxAgeSeconds,
    );
  }

  events(): readonly HashedStoredEvent[] {
    return this.store.read(this.streamId);
  }

  snapshot(): VaultSnapshot {
    return {
      address: this.address,
      paused: this._paused,
      feeBps: this._feeBps.toString(),
      feeRecipient: this._feeRecipient ?? null,
      idleAssets: this.valuation.idle().toString(),
      shares: this.shares.snapshot(),
      principal: this.principal.snapshot(),
      deposits: this.deposits.snapshot(),
      redemptions: this.redemptions.snapshot(),
      poolPrincipal: this.allocations.snapshot(),
      roles: {
        admin: this.access.membersOf("admin"),
        executor: this.access.membersOf("executor"),
      },
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Inside an operation, events are held until the operation's state
   * change is complete; outside one they are appended at once.
   */
  private readonly emit: VaultEventEmitter = (type, payload) => {
    const context = this.context;
    if (context === undefined) {
      const direct = { actor: this.address, correlationId: randomUUID() };
      this.store.append(this.streamId, [createVaultEvent(type, payload, direct, this.clock())]);
      return;
    }
    context.events.push(createVaultEvent(type, payload, context.event, this.clock()));
  };

  private open(actor: Address): OperationContext {
    const context: OperationContext = { event: { actor, correlationId: randomUUID() }, events: [] };
    this.context = context;
    return context;
  }

  /**
   * Append what the operation recorded, including the events of work that
   * committed before a failure.
   */
  private close(context: OperationContext): void {
    this.context = undefined;
    if (context.events.length > 0) {
      this.store.append(this.streamId, context.events);
    }
  }

  private configUpdated(key: string, value: string | null): void {
    this.emit(VAULT_EVENTS.CONFIG_UPDATED, { key, value });
  }

  private whenNotPaused(): void {
    if (this._paused) {
      throw new VaultError("PAUSED", "Vault is paused");
    }
  }

  private run<T>(actor: Address, operation: string, fn: () => T): T {
    return this.guard.run(operation, () => {
      const context = this.open(actor);
      try {
        return fn();
      } finally {
        this.close(context);
      }
    });
  }

  private async runAsync<T>(actor: Address, operation: string, fn: () => Promise<T>): Promise<T> {
    return this.guard.runAsync(operation, async () => {
      const context = this.open(actor);
      try {
        return await fn();
      } finally {
        this.close(context);
      }
    });
  }
}
