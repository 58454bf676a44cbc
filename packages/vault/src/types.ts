/**
 * Vault Types
 *
 * Domain types for the queue-based vault.
 * The vault runs three flows:
 *
 * 1. Requests — deposits and redemptions are queued, not executed
 * 2. Settlement — an executor drains the queues in batches
 * 3. Allocation — idle capital is placed with allow-listed yield sources
 *
 * Rules:
 * - All types are readonly (immutability by default)
 * - Amounts are bigint base units in memory, strings in snapshots
 * - Every rejected call leaves state unchanged
 */

import type { Address, AssetToken } from "@quevault/types";
import type { EventStore, VaultEventPayloads, VaultEventType } from "@quevault/event-store";
import type { PrincipalSnapshot, TokenSnapshot } from "@quevault/ledger";
import type { Logger } from "pino";

// =============================================================================
// Requests
// =============================================================================

/**
 * A queued deposit. The assets are already in vault custody; the shares
 * are minted at fulfillment.
 */
export interface DepositRequest {
  readonly controller: Address;
  readonly receiver: Address;
  readonly assets: bigint;
}

/**
 * A queued redemption. The shares are already escrowed; the asset value
 * is fixed at request time and never repriced.
 */
export interface WithdrawalRequest {
  readonly controller: Address;
  readonly receiver: Address;
  readonly shares: bigint;
  readonly assetsAtRequest: bigint;
}

// =============================================================================
// Configuration
// =============================================================================

export type Role = "admin" | "executor";

/** Largest batch fulfillDeposits accepts. */
export const MAX_DEPOSIT_BATCH_SIZE = 5;

export interface VaultConfig {
  /** The vault's own account in the asset and share tokens */
  readonly address: Address;

  /** The underlying asset */
  readonly asset: AssetToken;

  /** Initial holder of the admin role */
  readonly admin: Address;

  /** Performance fee on realized yield, in basis points. Default 0. */
  readonly feeBps?: bigint;

  /** Where fees go. Without one, fees are forgone. */
  readonly feeRecipient?: Address;

  /** Share token decimals. Default: the asset's. */
  readonly shareDecimals?: number;

  /** Event log. Default: a fresh InMemoryEventStore. */
  readonly store?: EventStore;

  /** Default: a silent pino logger. */
  readonly logger?: Logger;

  /** Clock for events and price staleness. Default: wall clock. */
  readonly clock?: () => Date;
}

// =============================================================================
// Results
// =============================================================================

export interface DepositFulfillment {
  /** Requests settled (shares minted) */
  readonly processed: number;

  /** Requests left queued because they would mint zero shares */
  readonly skipped: number;

  /** Queue entries without a request, removed along the way */
  readonly stale: number;

  /** Assets supplied to the target in one call */
  readonly assets: bigint;

  readonly shares: bigint;

  readonly target: Address;
}

export interface WithdrawalFulfillment {
  readonly processed: number;
  readonly stale: number;
  readonly grossAssets: bigint;
  readonly fees: bigint;
  readonly payouts: bigint;

  /** Assets pulled back from yield sources to cover payouts */
  readonly recovered: bigint;
}

export interface RecoveryResult {
  readonly recovered: bigint;
  readonly covered: boolean;
}

export interface UsdValuation {
  /** 18-decimal USD */
  readonly usd: bigint;

  /** Unix seconds of the quote used */
  readonly publishTime: number;
}

// =============================================================================
// Snapshots
// =============================================================================

export interface DepositQueueSnapshot {
  readonly order: readonly Address[];
  readonly requests: Readonly<Record<Address, { readonly receiver: Address; readonly assets: string }>>;
  readonly pendingDepositAssets: string;
}

export interface RedeemQueueSnapshot {
  readonly order: readonly Address[];
  readonly requests: Readonly<
    Record<
      Address,
      { readonly receiver: Address; readonly shares: string; readonly assetsAtRequest: string }
    >
  >;
  readonly totalRequestedAssets: string;
}

/**
 * Serializable vault state. Two snapshots are equal exactly when the
 * vault's own records are equal.
 */
export interface VaultSnapshot {
  readonly address: Address;
  readonly paused: boolean;
  readonly feeBps: string;
  readonly feeRecipient: Address | null;
  readonly idleAssets: string;
  readonly shares: TokenSnapshot;
  readonly principal: PrincipalSnapshot;
  readonly deposits: DepositQueueSnapshot;
  readonly redemptions: RedeemQueueSnapshot;
  readonly poolPrincipal: Readonly<Record<Address, string>>;
  readonly roles: Readonly<Record<Role, readonly Address[]>>;
}

// =============================================================================
// Events
// =============================================================================

/**
 * Appends one vault event in the context of the current operation.
 */
export type VaultEventEmitter = <T extends VaultEventType>(
  type: T,
  payload: VaultEventPayloads[T],
) => void;

// =============================================================================
// Errors
// =============================================================================

export type VaultErrorCode =
  | "UNAUTHORIZED"
  | "PAUSED"
  | "REENTRANT_CALL"
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS"
  | "INVALID_BATCH_SIZE"
  | "INVALID_FEE"
  | "ALREADY_PENDING"
  | "NO_PENDING_REQUEST"
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "INSUFFICIENT_IDLE"
  | "INSUFFICIENT_LIQUIDITY"
  | "ZERO_BACKING"
  | "ZERO_ASSETS"
  | "SOURCE_NOT_ALLOWED"
  | "UNKNOWN_SOURCE"
  | "SOURCE_CALL_FAILED"
  | "ORACLE_NOT_CONFIGURED"
  | "STALE_PRICE"
  | "INVALID_PRICE";

/**
 * Structured error from the vault engine.
 * Validation failures are thrown before any state change.
 */
export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: VaultErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "VaultError";
    this.code = code;
    this.details = details;
  }
}
