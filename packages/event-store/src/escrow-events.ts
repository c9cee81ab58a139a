/**
 * @invite-escrow/event-store — Escrow domain events.
 *
 * Catalog of the events the escrow ledger publishes, the mapping from
 * ledger notifications to DomainEvents, and a sink that appends every
 * committed batch to an EventStore.
 *
 * Rules:
 * - One stream per (inviter, invitee) relationship
 * - Amounts travel as decimal strings
 * - Every event in one batch shares a correlationId
 * - Batch order is preserved in global positions
 */

import { randomUUID } from "node:crypto";
import type { Address, DomainEvent } from "@invite-escrow/types";
import type { EscrowEventSink, EscrowNotification } from "@invite-escrow/escrow";
import type { EventStore } from "./types.js";

// =============================================================================
// Catalog
// =============================================================================

export const ESCROW_EVENTS = {
  "escrow.created": {
    description: "An inviter locked value for an invitee",
  },
  "escrow.redeemed": {
    description: "An invitee redeemed the escrow of their chosen inviter",
  },
  "escrow.refunded": {
    description: "An escrow was returned to its inviter because the invitee chose another",
  },
  "escrow.revoked": {
    description: "An inviter withdrew an escrow",
  },
} as const;

export type EscrowEventType = keyof typeof ESCROW_EVENTS;

// A type alias, so it satisfies DomainEvent's index-signature payload.
export type EscrowEventPayload = {
  readonly inviter: Address;
  readonly invitee: Address;
  /** Decimal string of the locked or settled amount */
  readonly amount: string;
  readonly day: number;
};

// =============================================================================
// Mapping
// =============================================================================

export interface EventContext {
  readonly correlationId: string;
  readonly timestamp: string;
  readonly eventId: string;
}

export function escrowStreamId(inviter: Address, invitee: Address): string {
  return `escrow-${inviter}-${invitee}`;
}

export function eventTypeOf(notification: EscrowNotification): EscrowEventType {
  switch (notification.kind) {
    case "created":
      return "escrow.created";
    case "redeemed":
      return "escrow.redeemed";
    case "refunded":
      return "escrow.refunded";
    case "revoked":
      return "escrow.revoked";
  }
}

/** The principal whose call produced the notification. */
function actorOf(notification: EscrowNotification): Address {
  switch (notification.kind) {
    case "created":
    case "revoked":
      return notification.inviter;
    case "redeemed":
    case "refunded":
      return notification.invitee;
  }
}

export function toDomainEvent(
  notification: EscrowNotification,
  context: EventContext,
): DomainEvent {
  const payload: EscrowEventPayload = {
    inviter: notification.inviter,
    invitee: notification.invitee,
    amount: notification.amount.toString(),
    day: notification.day,
  };

  return {
    type: eventTypeOf(notification),
    metadata: {
      eventId: context.eventId,
      timestamp: context.timestamp,
      actor: actorOf(notification),
      correlationId: context.correlationId,
      source: "escrow",
    },
    payload,
  };
}

// =============================================================================
// Sink
// =============================================================================

export interface EventStoreSinkOptions {
  /** Default: `() => new Date()` */
  readonly now?: () => Date;

  /** Used for both event and correlation IDs. Default: `randomUUID` */
  readonly generateId?: () => string;
}

export class EventStoreSink implements EscrowEventSink {
  private readonly _now: () => Date;
  private readonly _generateId: () => string;

  constructor(
    private readonly _store: EventStore,
    options?: EventStoreSinkOptions,
  ) {
    this._now = options?.now ?? (() => new Date());
    this._generateId = options?.generateId ?? randomUUID;
  }

  publish(notifications: readonly EscrowNotification[]): void {
    const correlationId = this._generateId();
    const timestamp = this._now().toISOString();

    for (const notification of notifications) {
      const event = toDomainEvent(notification, {
        correlationId,
        timestamp,
        eventId: this._generateId(),
      });
      this._store.append(escrowStreamId(notification.inviter, notification.invitee), [event]);
    }
  }
}
