/**
 * @invite-escrow/types — Shared domain types for the invitation escrow stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No methods that mutate state
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Address types
export type { Address } from "./address.js";
export {
  SENTINEL,
  ZERO_ADDRESS,
  normalizeAddress,
  isAddressLike,
  isReservedAddress,
} from "./address.js";

// Escrow types
export type {
  DayIndex,
  EscrowRecord,
  EscrowRelationship,
  BalanceAndAge,
  SettlementKind,
} from "./escrow.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
} from "./event.js";

// Runtime type guards
export {
  isDayIndex,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
