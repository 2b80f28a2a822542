/**
 * @meridian/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays; all state is lost on process exit.
 * Used by the protocol service, tests and short-lived processes.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events in the stream)
 * - Synchronous subscription dispatch after commit
 */

import type { DomainEvent } from "@meridian/types";
import { isDomainEvent } from "@meridian/types";
import type {
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
  UnhashedEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _globalSubscribers = new Set<EventHandler>();
  private _lastHash: string = GENESIS_HASH;

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }
    for (const event of events) {
      if (!isDomainEvent(event)) {
        throw new EventStoreError("INVALID_EVENT", `Malformed event for stream "${streamId}"`, streamId);
      }
    }

    const fromVersion = this.streamVersion(streamId) + 1;
    const appendedAt = new Date().toISOString();
    const stored: StoredEvent[] = [];
    let previousHash = this._lastHash;

    events.forEach((event, i) => {
      const base: UnhashedEvent = {
        event,
        streamId,
        version: fromVersion + i,
        globalPosition: this._globalLog.length + i + 1,
        appendedAt,
      };
      const hash = computeEventHash(base, previousHash);
      stored.push({ ...base, hash, previousHash });
      previousHash = hash;
    });

    // Commit
    const stream = this._streams.get(streamId) ?? [];
    stream.push(...stored);
    this._streams.set(streamId, stream);
    this._globalLog.push(...stored);
    this._lastHash = previousHash;

    this._dispatch(stored);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError("INVALID_VERSION", `fromVersion must be >= 1, got ${fromVersion}`, streamId);
    }

    const stream = this._streams.get(streamId) ?? [];
    const selected = options?.direction === "backward"
      ? stream.filter((e) => e.version <= fromVersion).reverse()
      : stream.filter((e) => e.version >= fromVersion);

    return limit(selected, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    const selected = options?.direction === "backward"
      ? this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse()
      : this._globalLog.filter((e) => e.globalPosition >= fromPosition);

    return limit(selected, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

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

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _dispatch(events: readonly StoredEvent[]): void {
    for (const event of events) {
      for (const handler of this._globalSubscribers) {
        handler(event);
      }
    }
  }
}

function limit(events: StoredEvent[], maxCount: number | undefined): readonly StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
