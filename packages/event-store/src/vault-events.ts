/**
 * @quevault/event-store — Vault domain event definitions.
 *
 * Naming convention: `vault.<entity>.<action>`, or `vault.<state>` for
 * emergency controls.
 *
 * Each event type defines:
 * - A payload type (what data the event carries)
 * - A schema entry (emitting subsystem + description)
 *
 * Amounts travel as base-10 strings of base units.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventMetadata } from "@quevault/types";

// =============================================================================
// Event Types
// =============================================================================

export const VAULT_EVENTS = {
  DEPOSIT_REQUESTED: "vault.deposit.requested",
  DEPOSIT_FULFILLED: "vault.deposit.fulfilled",
  DEPOSIT_CANCELLED: "vault.deposit.cancelled",
  REDEEM_REQUESTED: "vault.redeem.requested",
  REDEEM_FULFILLED: "vault.redeem.fulfilled",
  SOURCE_SUPPLIED: "vault.source.supplied",
  SOURCE_WITHDRAWN: "vault.source.withdrawn",
  CONFIG_UPDATED: "vault.config.updated",
  PAUSED: "vault.paused",
  UNPAUSED: "vault.unpaused",
} as const;

export type VaultEventType = (typeof VAULT_EVENTS)[keyof typeof VAULT_EVENTS];

// =============================================================================
// Payloads
// =============================================================================

export type DepositRequestedPayload = {
  readonly controller: string;
  readonly receiver: string;
  readonly assets: string;
};

export type DepositFulfilledPayload = {
  readonly controller: string;
  readonly receiver: string;
  readonly assets: string;
  readonly shares: string;
};

export type DepositCancelledPayload = {
  readonly controller: string;
  readonly assets: string;
};

export type RedeemRequestedPayload = {
  readonly controller: string;
  readonly receiver: string;
  readonly shares: string;
  readonly assetsAtRequest: string;
};

export type RedeemFulfilledPayload = {
  readonly controller: string;
  readonly receiver: string;
  readonly shares: string;
  readonly grossAssets: string;
  readonly principal: string;
  readonly yieldAmount: string;
  readonly fee: string;
  readonly payout: string;
  /** null when the fee was forgone */
  readonly feeRecipient: string | null;
};

export type SourceSuppliedPayload = {
  readonly source: string;
  readonly amount: string;
  /** Recorded principal after the supply */
  readonly principal: string;
};

export type SourceWithdrawnPayload = {
  readonly source: string;
  readonly requested: string;
  readonly received: string;
  /** Recorded principal after the withdrawal */
  readonly principal: string;
};

export type ConfigUpdatedPayload = {
  readonly key: string;
  readonly value: string | null;
};

export type PauseChangedPayload = {
  readonly by: string;
};

export interface VaultEventPayloads {
  readonly [VAULT_EVENTS.DEPOSIT_REQUESTED]: DepositRequestedPayload;
  readonly [VAULT_EVENTS.DEPOSIT_FULFILLED]: DepositFulfilledPayload;
  readonly [VAULT_EVENTS.DEPOSIT_CANCELLED]: DepositCancelledPayload;
  readonly [VAULT_EVENTS.REDEEM_REQUESTED]: RedeemRequestedPayload;
  readonly [VAULT_EVENTS.REDEEM_FULFILLED]: RedeemFulfilledPayload;
  readonly [VAULT_EVENTS.SOURCE_SUPPLIED]: SourceSuppliedPayload;
  readonly [VAULT_EVENTS.SOURCE_WITHDRAWN]: SourceWithdrawnPayload;
  readonly [VAULT_EVENTS.CONFIG_UPDATED]: ConfigUpdatedPayload;
  readonly [VAULT_EVENTS.PAUSED]: PauseChangedPayload;
  readonly [VAULT_EVENTS.UNPAUSED]: PauseChangedPayload;
}

// =============================================================================
// Schemas
// =============================================================================

export interface VaultEventSchema {
  readonly type: VaultEventType;
  readonly description: string;
  readonly source: EventMetadata["source"];
}

function schema(
  type: VaultEventType,
  source: EventMetadata["source"],
  description: string,
): VaultEventSchema {
  return { type, source, description };
}

export const VAULT_EVENT_SCHEMAS: ReadonlyMap<VaultEventType, VaultEventSchema> = new Map(
  [
    schema(VAULT_EVENTS.DEPOSIT_REQUESTED, "vault", "Assets were pulled in and a deposit queued"),
    schema(VAULT_EVENTS.DEPOSIT_FULFILLED, "settlement", "Shares were minted for a queued deposit"),
    schema(VAULT_EVENTS.DEPOSIT_CANCELLED, "vault", "A queued deposit was refunded"),
    schema(VAULT_EVENTS.REDEEM_REQUESTED, "vault", "Shares were escrowed and a redemption queued"),
    schema(VAULT_EVENTS.REDEEM_FULFILLED, "settlement", "Escrowed shares were burned and assets paid"),
    schema(VAULT_EVENTS.SOURCE_SUPPLIED, "allocator", "Capital was supplied to a yield source"),
    schema(VAULT_EVENTS.SOURCE_WITHDRAWN, "allocator", "Capital was withdrawn from a yield source"),
    schema(VAULT_EVENTS.CONFIG_UPDATED, "vault", "A governed setting changed"),
    schema(VAULT_EVENTS.PAUSED, "vault", "Requests, fulfillment and allocation were halted"),
    schema(VAULT_EVENTS.UNPAUSED, "vault", "Normal operation resumed"),
  ].map((s) => [s.type, s] as const),
);

// =============================================================================
// Factory
// =============================================================================

export interface VaultEventContext {
  readonly actor: string;
  readonly correlationId: string;
  readonly causationId?: string;
}

/**
 * Build a vault DomainEvent. The emitting subsystem comes from the schema.
 */
export function createVaultEvent<T extends VaultEventType>(
  type: T,
  payload: VaultEventPayloads[T],
  context: VaultEventContext,
  now: Date = new Date(),
): DomainEvent {
  const metadata: EventMetadata = {
    eventId: randomUUID(),
    timestamp: now.toISOString(),
    actor: context.actor,
    correlationId: context.correlationId,
    source: VAULT_EVENT_SCHEMAS.get(type)?.source ?? "vault",
    ...(context.causationId !== undefined ? { causationId: context.causationId } : {}),
  };
  return { type, metadata, payload };
}
