/**
 * @quevault/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a global SHA-256 hash chain
 * - Vault domain event definitions and factory
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  HashedStoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError, isHashedEvent } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Vault domain events
export {
  VAULT_EVENTS,
  VAULT_EVENT_SCHEMAS,
  createVaultEvent,
} from "./vault-events.js";
export type {
  VaultEventType,
  VaultEventPayloads,
  VaultEventSchema,
  VaultEventContext,
  DepositRequestedPayload,
  DepositFulfilledPayload,
  DepositCancelledPayload,
  RedeemRequestedPayload,
  RedeemFulfilledPayload,
  SourceSuppliedPayload,
  SourceWithdrawnPayload,
  ConfigUpdatedPayload,
  PauseChangedPayload,
} from "./vault-events.js";
