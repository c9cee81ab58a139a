/**
 * @invite-escrow/event-store — Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain
 * - Escrow event catalog and notification mapping
 * - EventStoreSink, the ledger's publishing endpoint
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  StoredEventContent,
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
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementations
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Escrow events
export {
  ESCROW_EVENTS,
  escrowStreamId,
  eventTypeOf,
  toDomainEvent,
  EventStoreSink,
} from "./escrow-events.js";
export type {
  EscrowEventType,
  EscrowEventPayload,
  EventContext,
  EventStoreSinkOptions,
} from "./escrow-events.js";
