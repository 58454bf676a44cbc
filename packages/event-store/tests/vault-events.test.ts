/**
 * Tests for the vault event catalog and factory.
 */

import { describe, it, expect } from "vitest";
import {
  VAULT_EVENTS,
  VAULT_EVENT_SCHEMAS,
  createVaultEvent,
} from "../src/vault-events.js";

const NOW = new Date("2026-03-01T12:00:00.000Z");

describe("VAULT_EVENTS", () => {
  it("has a schema for every event type", () => {
    expect(VAULT_EVENT_SCHEMAS.size).toBe(Object.keys(VAULT_EVENTS).length);
    for (const type of Object.values(VAULT_EVENTS)) {
      expect(VAULT_EVENT_SCHEMAS.get(type)?.type).toBe(type);
    }
  });
});

describe("createVaultEvent", () => {
  it("fills metadata from the context and schema", () => {
    const event = createVaultEvent(
      VAULT_EVENTS.DEPOSIT_FULFILLED,
      { controller: "alice", receiver: "bob", assets: "100", shares: "100" },
      { actor: "keeper", correlationId: "batch-1" },
      NOW,
    );

    expect(event.type).toBe("vault.deposit.fulfilled");
    expect(event.metadata.timestamp).toBe("2026-03-01T12:00:00.000Z");
    expect(event.metadata.actor).toBe("keeper");
    expect(event.metadata.correlationId).toBe("batch-1");
    expect(event.metadata.source).toBe("settlement");
    expect(event.metadata.eventId).toMatch(/^[0-9a-f-]{36}$/);
    expect("causationId" in event.metadata).toBe(false);
    expect(event.payload).toEqual({ controller: "alice", receiver: "bob", assets: "100", shares: "100" });
  });

  it("carries a causation id when given", () => {
    const event = createVaultEvent(
      VAULT_EVENTS.SOURCE_SUPPLIED,
      { source: "pool-x", amount: "100", principal: "100" },
      { actor: "keeper", correlationId: "batch-1", causationId: "evt-0" },
      NOW,
    );
    expect(event.metadata.causationId).toBe("evt-0");
    expect(event.metadata.source).toBe("allocator");
  });

  it("assigns a fresh id per event", () => {
    const ctx = { actor: "admin", correlationId: "c" };
    const a = createVaultEvent(VAULT_EVENTS.PAUSED, { by: "admin" }, ctx, NOW);
    const b = createVaultEvent(VAULT_EVENTS.PAUSED, { by: "admin" }, ctx, NOW);
    expect(a.metadata.eventId).not.toBe(b.metadata.eventId);
  });
});
