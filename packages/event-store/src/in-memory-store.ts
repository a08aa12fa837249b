/**
 * @custody/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. All state is lost on process exit,
 * which matches the in-memory custody ledger it records for.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Synchronous subscription dispatch
 */

import type { DomainEvent } from "@custody/types";
import { isDomainEvent } from "@custody/types";
import type {
  AppendResult,
  EventHandler,
  EventStore,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";

/**
 * In-memory event store.
 *
 * All events are stored in two data structures:
 * - Per-stream arrays (indexed by streamId) for stream reads
 * - Global array for readAll and global subscriptions
 */
export class InMemoryEventStore implements EventStore {
  /** Per-stream event storage */
  private readonly _streams = new Map<string, StoredEvent[]>();

  /** Global event log (all streams, in append order) */
  private readonly _globalLog: StoredEvent[] = [];

  /** Per-stream subscribers */
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();

  /** Global subscribers (all streams) */
  private readonly _globalSubscribers = new Set<EventHandler>();

  private _nextGlobalPosition = 1;

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }
    events.forEach((event, i) => {
      if (!isDomainEvent(event)) {
        throw new EventStoreError(
          "INVALID_EVENT",
          `Event ${String(i)} is not a well-formed domain event`,
          streamId,
        );
      }
    });

    let stream = this._streams.get(streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(streamId, stream);
    }

    const fromVersion = stream.length + 1;
    const appendedAt = new Date().toISOString();
    const storedEvents: StoredEvent[] = events.map((event, i) => ({
      event: {
        type: event.type,
        metadata: event.metadata,
        payload: event.payload,
      },
      streamId,
      version: fromVersion + i,
      globalPosition: this._nextGlobalPosition + i,
      appendedAt,
    }));

    this._nextGlobalPosition += events.length;
    stream.push(...storedEvents);
    this._globalLog.push(...storedEvents);

    this._dispatch(streamId, storedEvents);

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
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    let result = stream.filter(
      (e) =>
        e.version >= fromVersion &&
        (options?.type === undefined || e.event.type === options.type),
    );

    const maxCount = options?.maxCount;
    if (maxCount !== undefined && maxCount >= 0) {
      result = result.slice(0, maxCount);
    }
    return result;
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    let result = this._globalLog.filter((e) => e.globalPosition >= fromPosition);

    const maxCount = options?.maxCount;
    if (maxCount !== undefined && maxCount >= 0) {
      result = result.slice(0, maxCount);
    }
    return result;
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    const set = subscribers;
    set.add(handler);

    return {
      unsubscribe: () => {
        set.delete(handler);
        if (set.size === 0) {
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

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._nextGlobalPosition - 1;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const streamSubs = this._streamSubscribers.get(streamId);
    if (streamSubs !== undefined) {
      for (const handler of [...streamSubs]) {
        for (const event of events) {
          handler(event);
        }
      }
    }

    for (const handler of [...this._globalSubscribers]) {
      for (const event of events) {
        handler(event);
      }
    }
  }
}
