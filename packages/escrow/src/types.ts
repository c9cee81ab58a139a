/**
 * @invite-escrow/escrow — Internal types for the escrow engine.
 *
 * These extend the shared @invite-escrow/types with engine-specific
 * structures used only within this package.
 *
 * Rules:
 * - All types are readonly
 * - Records are never mutated in place, only created and destroyed
 * - Fail-closed: invalid calls throw, never silently succeed
 */

import type { Address, DayIndex, EscrowRelationship } from "@invite-escrow/types";

// ─── Policy Constants ────────────────────────────────────────────────────

/** One whole unit of the asset (18 decimals). */
export const ONE_UNIT = 10n ** 18n;

/** Smallest amount an inviter may lock. */
export const MIN_ESCROW_AMOUNT = 97n * ONE_UNIT;

/** Largest amount an inviter may lock. */
export const MAX_ESCROW_AMOUNT = 100n * ONE_UNIT;

// ─── Notifications ───────────────────────────────────────────────────────

/** An escrow was locked for an invitee. */
export interface EscrowCreated {
  readonly kind: "created";
  readonly inviter: Address;
  readonly invitee: Address;
  readonly amount: bigint;
  readonly day: DayIndex;
}

/**
 * An escrow left the ledger. `amount` is the settled (decayed) value.
 */
export interface EscrowSettled {
  readonly kind: "redeemed" | "refunded" | "revoked";
  readonly inviter: Address;
  readonly invitee: Address;
  readonly amount: bigint;
  readonly day: DayIndex;
}

export type EscrowNotification = EscrowCreated | EscrowSettled;

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for escrow operations. */
export type EscrowErrorCode =
  | "UNAUTHORIZED_CALLER"
  | "INELIGIBLE_PRINCIPAL"
  | "OPERATOR_MISMATCH"
  | "AMOUNT_OUT_OF_RANGE"
  | "MALFORMED_PAYLOAD"
  | "COUNTERPART_ALREADY_ONBOARDED"
  | "INVALID_COUNTERPART"
  | "DUPLICATE_RELATIONSHIP"
  | "NO_SUCH_RELATIONSHIP"
  | "TRUST_MISSING_OR_EXPIRED"
  | "REENTRANT_CALL"
  | "INVALID_DAY"
  | "INDEX_CORRUPTED"
  | "DISBURSEMENT_INCOMPLETE";

/**
 * Structured error from the escrow engine.
 * Always thrown — never returns error codes silently.
 *
 * `details` carries the values needed to diagnose the failure, with
 * bigints rendered as decimal strings so the error stays serializable.
 */
export class EscrowError extends Error {
  public readonly code: EscrowErrorCode;
  public readonly details: Readonly<Record<string, string | number>> | undefined;

  constructor(
    code: EscrowErrorCode,
    message: string,
    details?: Readonly<Record<string, string | number>>,
  ) {
    super(message);
    this.name = "EscrowError";
    this.code = code;
    this.details = details;
  }
}

// ─── Configuration ───────────────────────────────────────────────────────

/**
 * Closed range of amounts accepted by create().
 */
export interface AmountBounds {
  readonly min: bigint;
  readonly max: bigint;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Point-in-time view of every active escrow, oldest first.
 */
export interface EscrowSnapshot {
  readonly day: DayIndex;
  readonly relationships: readonly EscrowRelationship[];
}
