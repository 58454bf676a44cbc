/**
 * @quevault/event-store — In-memory EventStore implementation.
 *
 * The vault keeps its audit trail here: one stream per vault, every event
 * hash-linked to the one before it across all streams.
 *
 * Properties:
 * - O(1) append (amortized)
 * - Synchronous subscription dispatch, after the whole batch is stored
 * - A throwing subscriber is logged and skipped; the append still succeeds
 * - No durability (state lives as long as the process)
 */

import pino from "pino";
import type { Logger } from "pino";
import type { DomainEvent } from "@quevault/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadAllOptions,
  ReadDirection,
  ReadOptions,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Clock for `appendedAt`. Defaults to the wall clock. */
  readonly now?: () => Date;
  /** Receives subscriber failures. Defaults to a silent logger. */
  readonly logger?: Logger;
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, HashedStoredEvent[]>();
  private readonly _globalLog: HashedStoredEvent[] = [];
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();
  private readonly _now: () => Date;
  private readonly _log: Logger;
  private _lastHash: string = GENESIS_HASH;

  constructor(options?: InMemoryEventStoreOptions) {
    this._now = options?.now ?? (() => new Date());
    this._log = (options?.logger ?? pino({ level: "silent" })).child({ component: "event-store" });
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const currentVersion = this.streamVersion(streamId);
    this._checkExpectedVersion(streamId, currentVersion, options?.expectedVersion);

    let stream = this._streams.get(streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(streamId, stream);
    }

    const fromVersion = currentVersion + 1;
    const appendedAt = this._now().toISOString();
    const stored: HashedStoredEvent[] = [];

    for (const [offset, event] of events.entries()) {
      const base = {
        event: {
          type: event.type,
          metadata: event.metadata,
          payload: event.payload,
        },
        streamId,
        version: fromVersion + offset,
        globalPosition: this._globalLog.length + 1,
        appendedAt,
      };
      const previousHash = this._lastHash;
      const hashed: HashedStoredEvent = {
        ...base,
        hash: computeEventHash(base, previousHash),
        previousHash,
      };

      this._lastHash = hashed.hash;
      stream.push(hashed);
      this._globalLog.push(hashed);
      stored.push(hashed);
    }

    this._dispatch(streamId, stored);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly HashedStoredEvent[] {
    this._validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    return page(stream, (e) => e.version, fromVersion, options?.direction, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly HashedStoredEvent[] {
    return page(
      this._globalLog,
      (e) => e.globalPosition,
      options?.fromPosition ?? 1,
      options?.direction,
      options?.maxCount,
    );
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    subscribers.add(handler);

    return {
      unsubscribe: () => {
        subscribers.delete(handler);
        if (subscribers.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);
    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _checkExpectedVersion(
    streamId: string,
    currentVersion: number,
    expected: AppendOptions["expectedVersion"],
  ): void {
    if (expected === undefined || expected === "any") {
      return;
    }
    if (expected === "no_stream") {
      if (currentVersion !== 0) {
        throw new EventStoreError(
          "CONCURRENCY_CONFLICT",
          `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
          streamId,
        );
      }
      return;
    }
    if (currentVersion !== expected) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${currentVersion}, expected ${expected}`,
        streamId,
      );
    }
  }

  private _dispatch(streamId: string, events: readonly HashedStoredEvent[]): void {
    const handlers = [
      ...(this._streamSubscribers.get(streamId) ?? []),
      ...this._globalSubscribers,
    ];
    for (const handler of handlers) {
      for (const event of events) {
        try {
          handler(event);
        } catch (err) {
          this._log.error(
            {
              streamId,
              type: event.event.type,
              version: event.version,
              err: err instanceof Error ? err.message : String(err),
            },
            "event subscriber failed",
          );
        }
      }
    }
  }
}

function page(
  log: readonly HashedStoredEvent[],
  positionOf: (event: HashedStoredEvent) => number,
  from: number,
  direction: ReadDirection = "forward",
  maxCount?: number,
): HashedStoredEvent[] {
  const result =
    direction === "forward"
      ? log.filter((e) => positionOf(e) >= from)
      : log.filter((e) => positionOf(e) <= from).reverse();

  return maxCount !== undefined && maxCount >= 0 ? result.slice(0, maxCount) : result;
}
