/**
 * Escrow Types
 *
 * Invitation escrow primitives shared by the engine, the event store and
 * the HTTP node.
 *
 * Rules:
 * - Amounts are bigint base units (18 decimals), never floating point
 * - A record exists only while its face value is non-zero
 * - Current value is always derived, never stored
 */

import type { Address } from "./address.js";

/**
 * Absolute, monotonic day number counted from the clock's day zero.
 */
export type DayIndex = number;

/**
 * The locked value for one (inviter, invitee) pair.
 */
export interface EscrowRecord {
  /** Amount locked at creation. Immutable for the record's lifetime. */
  readonly faceValue: bigint;

  /** Day on which faceValue was anchored */
  readonly lastUpdatedDay: DayIndex;
}

/**
 * An escrow record together with the two parties it binds.
 */
export interface EscrowRelationship extends EscrowRecord {
  readonly inviter: Address;
  readonly invitee: Address;
}

/**
 * Decayed value of a record at a given day.
 */
export interface BalanceAndAge {
  readonly amount: bigint;
  readonly daysElapsed: number;
}

/**
 * How a settled escrow left the ledger.
 *
 * - redeemed: consumed by the invitee, original asset returned to the inviter
 * - refunded: dissolved by another inviter's redemption, wrapped asset returned
 * - revoked: withdrawn by the inviter, wrapped asset returned
 */
export type SettlementKind = "redeemed" | "refunded" | "revoked";
