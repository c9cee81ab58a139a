/**
 * @invite-escrow/event-store — Core types.
 *
 * Defines the interfaces and types for append-only event persistence.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every event has a monotonically increasing version within its stream
 * - Every event is linked to its predecessor by hash
 * - Concurrency control via expected version (optimistic locking)
 */

import type { DomainEvent } from "@invite-escrow/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * The fields of a stored event that take part in its hash.
 */
export interface StoredEventContent {
  /** The domain event */
  readonly event: DomainEvent;

  /** Stream this event belongs to */
  readonly streamId: string;

  /** Position within this stream (1-based, monotonically increasing) */
  readonly version: number;

  /** Position across all streams (1-based, monotonically increasing) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;
}

/**
 * An event as persisted in the store, chained to its predecessor.
 */
export interface StoredEvent extends StoredEventContent {
  /** SHA-256 over the canonical content and `previousHash` */
  readonly hash: string;

  /** Hash of the event at the previous global position, or "genesis" */
  readonly previousHash: string;
}

// =============================================================================
// Append Options
// =============================================================================

/**
 * Expected version for optimistic concurrency control.
 *
 * - A number: the stream must be at exactly this version before append
 * - "no_stream": the stream must not exist (first write)
 * - "any": no concurrency check (append regardless)
 */
export type ExpectedVersion = number | "no_stream" | "any";

export interface AppendOptions {
  readonly expectedVersion?: ExpectedVersion;
}

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly count: number;
}

// =============================================================================
// Read Options
// =============================================================================

export type ReadDirection = "forward" | "backward";

export interface ReadOptions {
  /** Start reading from this version (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number;

  /** Reading direction. Default: "forward" */
  readonly direction?: ReadDirection;
}

export interface ReadAllOptions {
  /** Start reading from this global position (inclusive). Default: 1 */
  readonly fromPosition?: number;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number;

  /** Reading direction. Default: "forward" */
  readonly direction?: ReadDirection;
}

// =============================================================================
// Subscription
// =============================================================================

export type EventHandler = (event: StoredEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  /** Global position of the offending event */
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;

  /** Global position of the last event whose hash was checked */
  readonly lastVerifiedPosition: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are monotonically increasing with no gaps
 * - Subscriptions see events in order
 */
export interface EventStore {
  /**
   * Append one or more events to a stream.
   *
   * @throws EventStoreError if the concurrency check fails
   */
  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult;

  /** Read events from a single stream (empty if the stream doesn't exist). */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Read events across all streams in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  subscribe(streamId: string, handler: EventHandler): Subscription;

  subscribeAll(handler: EventHandler): Subscription;

  streamExists(streamId: string): boolean;

  /** Version of the last event in the stream, or 0. */
  streamVersion(streamId: string): number;

  /** Position of the last event in the store, or 0. */
  globalPosition(): number;

  /** Recompute and check the hash chain over every stored event. */
  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "CONCURRENCY_CONFLICT"
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_EVENT"
  | "INVALID_VERSION";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
