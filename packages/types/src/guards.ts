/**
 * Runtime Type Guards
 *
 * Narrowing functions for escrow domain types, used at system boundaries
 * (clock input, events handed to the event store).
 */

import type { DayIndex } from "./escrow.js";
import type { DomainEvent, EventMetadata } from "./event.js";

// =============================================================================
// Escrow guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["escrow"]);

export function isDayIndex(value: unknown): value is DayIndex {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

// =============================================================================
// Event guards
// =============================================================================

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    v.type.length > 0 &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
