/**
 * @invite-escrow/escrow — Collaborator contracts.
 *
 * The engine owns no identity data and holds no tokens. Everything it
 * needs from the outside world arrives through these interfaces. All of
 * them are synchronous: a call into the ledger runs to completion before
 * the next one is observed, and a collaborator may call back into the
 * ledger only to be rejected by the reentrancy gate.
 */

import type { Address, DayIndex } from "@invite-escrow/types";
import type { EscrowNotification } from "./types.js";

/**
 * Maps wall-clock time to an absolute day index.
 */
export interface Clock {
  today(): DayIndex;
}

/**
 * Projects a locked amount forward in time.
 *
 * Implementations must be deterministic, non-increasing in
 * `elapsedDays`, and satisfy `project(v, 0) === v`.
 */
export interface DecayFunction {
  project(initialValue: bigint, elapsedDays: number): bigint;
}

/**
 * Identity and trust registry.
 */
export interface IdentityOracle {
  /** Whether the address is a principal allowed to sponsor others. */
  isEligiblePrincipal(address: Address): boolean;

  /** Whether the address has already completed onboarding. */
  isOnboarded(address: Address): boolean;

  /** Whether `truster` currently trusts `trustee` (expiry included). */
  trusts(truster: Address, trustee: Address): boolean;
}

/**
 * Moves value out of escrow.
 */
export interface ValueMover {
  /** Return the original (personal) asset to `to`. */
  transferOriginal(to: Address, amount: bigint): void;

  /** Wrap into the decaying representation, then transfer to `to`. */
  convertAndTransfer(to: Address, amount: bigint): void;
}

/**
 * Reports what the external asset holder actually holds on behalf of
 * the escrow. Used to cap bulk refunds when the holder's own decay
 * bookkeeping has drifted below the ledger's projection.
 */
export interface HoldingsOracle {
  escrowedHoldings(): bigint;
}

/**
 * Receives notifications of committed ledger calls, in emission order.
 */
export interface EscrowEventSink {
  publish(notifications: readonly EscrowNotification[]): void;
}
