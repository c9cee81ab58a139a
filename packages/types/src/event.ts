/**
 * Event Types
 *
 * Every committed change to the escrow ledger is published as a
 * DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, why)
 * - Amounts in payloads are decimal strings (bigint is not JSON)
 * - Events from a failed call are never published
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** ID grouping every event emitted by one ledger call */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: "escrow";
}

/**
 * A domain event. Discriminated by `type` field.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "escrow.created", "escrow.revoked") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
