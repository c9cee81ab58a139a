/**
 * Shared fixtures for @invite-escrow/escrow tests.
 *
 * In-process stand-ins for every collaborator, each recording what the
 * ledger asked of it.
 */

import type { Address } from "@invite-escrow/types";
import type {
  DecayFunction,
  EscrowEventSink,
  HoldingsOracle,
  IdentityOracle,
  ValueMover,
} from "../src/collaborators.js";
import { EscrowLedger } from "../src/escrow-ledger.js";
import type { EscrowLedgerOptions } from "../src/escrow-ledger.js";
import { ManualClock } from "../src/clock.js";
import type { EscrowNotification } from "../src/types.js";
import { ONE_UNIT } from "../src/types.js";

// ─── Addresses & Amounts ─────────────────────────────────────────────────

export const ALICE: Address = "0x1111111111111111111111111111111111111111";
export const BOB: Address = "0x2222222222222222222222222222222222222222";
export const CAROL: Address = "0x3333333333333333333333333333333333333333";
export const DAVE: Address = "0x4444444444444444444444444444444444444444";
export const ERIN: Address = "0x5555555555555555555555555555555555555555";
export const REGISTRY: Address = "0x9999999999999999999999999999999999999999";

export function units(whole: bigint): bigint {
  return whole * ONE_UNIT;
}

export const HUNDRED = units(100n);

// ─── Collaborators ───────────────────────────────────────────────────────

export class FakeIdentity implements IdentityOracle {
  readonly eligible = new Set<Address>();
  readonly onboarded = new Set<Address>();
  private readonly _trust = new Set<string>();

  /** Invoked at the start of every trusts() call. */
  onTrusts: (() => void) | undefined;

  trust(truster: Address, trustee: Address): void {
    this._trust.add(`${truster}:${trustee}`);
  }

  untrust(truster: Address, trustee: Address): void {
    this._trust.delete(`${truster}:${trustee}`);
  }

  isEligiblePrincipal(address: Address): boolean {
    return this.eligible.has(address);
  }

  isOnboarded(address: Address): boolean {
    return this.onboarded.has(address);
  }

  trusts(truster: Address, trustee: Address): boolean {
    this.onTrusts?.();
    return this._trust.has(`${truster}:${trustee}`);
  }
}

export interface RecordedTransfer {
  readonly form: "original" | "wrapped";
  readonly to: Address;
  readonly amount: bigint;
}

export class RecordingValueMover implements ValueMover {
  readonly transfers: RecordedTransfer[] = [];

  /** Invoked before every transfer is recorded; throwing refuses it. */
  onTransfer: ((transfer: RecordedTransfer) => void) | undefined;

  transferOriginal(to: Address, amount: bigint): void {
    this._record({ form: "original", to, amount });
  }

  convertAndTransfer(to: Address, amount: bigint): void {
    this._record({ form: "wrapped", to, amount });
  }

  private _record(transfer: RecordedTransfer): void {
    this.onTransfer?.(transfer);
    this.transfers.push(transfer);
  }
}

export class RecordingSink implements EscrowEventSink {
  readonly batches: (readonly EscrowNotification[])[] = [];

  /** Invoked before every batch is recorded; throwing refuses it. */
  onPublish: (() => void) | undefined;

  publish(notifications: readonly EscrowNotification[]): void {
    this.onPublish?.();
    this.batches.push([...notifications]);
  }

  get all(): readonly EscrowNotification[] {
    return this.batches.flat();
  }
}

export class FixedHoldings implements HoldingsOracle {
  constructor(public held: bigint) {}

  escrowedHoldings(): bigint {
    return this.held;
  }
}

/**
 * Loses 1% of the face value per day; nothing is left after 100 days.
 */
export class LinearDecay implements DecayFunction {
  project(initialValue: bigint, elapsedDays: number): bigint {
    if (elapsedDays >= 100) {
      return 0n;
    }
    return (initialValue * BigInt(100 - elapsedDays)) / 100n;
  }
}

// ─── Harness ─────────────────────────────────────────────────────────────

export interface Harness {
  readonly ledger: EscrowLedger;
  readonly identity: FakeIdentity;
  readonly values: RecordingValueMover;
  readonly clock: ManualClock;
  readonly sink: RecordingSink;
}

/**
 * Ledger on day 10 with linear decay. ALICE, BOB and CAROL are eligible
 * inviters; nobody trusts anybody yet.
 */
export function createHarness(overrides?: Partial<EscrowLedgerOptions>): Harness {
  const identity = new FakeIdentity();
  identity.eligible.add(ALICE);
  identity.eligible.add(BOB);
  identity.eligible.add(CAROL);

  const values = new RecordingValueMover();
  const clock = new ManualClock(10);
  const sink = new RecordingSink();

  const ledger = new EscrowLedger({
    identity,
    values,
    clock,
    sink,
    decay: new LinearDecay(),
    ...overrides,
  });

  return { ledger, identity, values, clock, sink };
}

/** Trust and lock HUNDRED from `inviter` to `invitee`. */
export function invite(h: Harness, inviter: Address, invitee: Address): void {
  h.identity.trust(inviter, invitee);
  h.ledger.create(inviter, invitee, HUNDRED);
}
