/**
 * @invite-escrow/event-store — In-memory EventStore implementation.
 *
 * Stores events in plain arrays. All state is lost on process exit; the
 * escrow ledger itself is in-memory, so its event log lives beside it.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events in the stream or store)
 * - Synchronous subscription dispatch, after the whole batch is stored
 */

import { isDomainEvent } from "@invite-escrow/types";
import type { DomainEvent } from "@invite-escrow/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ExpectedVersion,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  StoredEventContent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Source of `appendedAt` timestamps. Default: `() => new Date()` */
  readonly now?: () => Date;
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();
  private readonly _now: () => Date;

  /** Hash of the last appended event (for chain linking) */
  private _lastHash: string = GENESIS_HASH;

  constructor(options?: InMemoryEventStoreOptions) {
    this._now = options?.now ?? (() => new Date());
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

    const malformed = events.findIndex((event) => !isDomainEvent(event));
    if (malformed !== -1) {
      throw new EventStoreError(
        "INVALID_EVENT",
        `Event at index ${malformed} is not a well-formed domain event`,
        streamId,
      );
    }

    const existing = this._streams.get(streamId);
    const currentVersion = existing?.length ?? 0;
    this._checkExpectedVersion(streamId, currentVersion, options?.expectedVersion);

    const stream = existing ?? [];
    if (existing === undefined) {
      this._streams.set(streamId, stream);
    }

    const fromVersion = currentVersion + 1;
    const appendedAt = this._now().toISOString();
    const stored: StoredEvent[] = [];

    events.forEach((event, i) => {
      const content: StoredEventContent = {
        event,
        streamId,
        version: fromVersion + i,
        globalPosition: this._globalLog.length + 1,
        appendedAt,
      };
      const previousHash = this._lastHash;
      const record: StoredEvent = {
        ...content,
        hash: computeEventHash(content, previousHash),
        previousHash,
      };
      this._lastHash = record.hash;

      stream.push(record);
      this._globalLog.push(record);
      stored.push(record);
    });

    this._dispatch(streamId, stored);

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

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const result =
      (options?.direction ?? "forward") === "forward"
        ? stream.filter((e) => e.version >= fromVersion)
        : stream.filter((e) => e.version <= fromVersion).reverse();

    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const direction = options?.direction ?? "forward";
    const fromPosition =
      options?.fromPosition ?? (direction === "forward" ? 1 : this._globalLog.length);

    const result =
      direction === "forward"
        ? this._globalLog.filter((e) => e.globalPosition >= fromPosition)
        : this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse();

    return limit(result, options?.maxCount);
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

  private _checkExpectedVersion(
    streamId: string,
    currentVersion: number,
    expected: ExpectedVersion | undefined,
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

  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const streamSubs = this._streamSubscribers.get(streamId);
    if (streamSubs !== undefined) {
      for (const handler of streamSubs) {
        for (const event of events) {
          handler(event);
        }
      }
    }

    for (const handler of this._globalSubscribers) {
      for (const event of events) {
        handler(event);
      }
    }
  }
}

function limit(events: StoredEvent[], maxCount: number | undefined): readonly StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
