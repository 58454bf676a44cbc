/**
 * @quevault/vault — Queue-based vault engine.
 *
 * Deposits and redemptions are queued on request and settled later, in
 * batches, by an executor. Idle capital is placed with allow-listed yield
 * sources; realized yield is paid out net of a performance fee.
 *
 * @packageDocumentation
 */

// Coordinator
export { Vault } from "./vault.js";

// Engine parts
export { RequestQueue } from "./request-queue.js";
export { DepositQueue } from "./deposit-queue.js";
export { RedeemQueue } from "./redeem-queue.js";
export { PoolAllocationTracker, positionValue } from "./allocation.js";
export type { PoolAllocationTrackerDeps } from "./allocation.js";
export { Valuation } from "./valuation.js";
export type { ValuationDeps } from "./valuation.js";
export { SettlementEngine } from "./settlement.js";
export type { SettlementState, FeeSettings } from "./settlement.js";

// Governance
export { AccessControl } from "./access-control.js";
export { ReentrancyGuard } from "./reentrancy.js";
export { SourceRegistry } from "./source-registry.js";
export { PriceFeed, toUsd, USD_DECIMALS } from "./price-feed.js";

// Types
export type {
  DepositRequest,
  WithdrawalRequest,
  Role,
  VaultConfig,
  DepositFulfillment,
  WithdrawalFulfillment,
  RecoveryResult,
  UsdValuation,
  DepositQueueSnapshot,
  RedeemQueueSnapshot,
  VaultSnapshot,
  VaultEventEmitter,
  VaultErrorCode,
} from "./types.js";
export { VaultError, MAX_DEPOSIT_BATCH_SIZE } from "./types.js";
