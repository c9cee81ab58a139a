/**
 * @invite-escrow/escrow — Core EscrowLedger class.
 *
 * Tracks one decaying escrow per (inviter, invitee) pair and the two
 * relationship indexes that let either party enumerate its counterparts.
 *
 * API surface:
 * - create() — Lock an amount for an invitee
 * - redeem() — Invitee consumes one inviter's escrow, all others are refunded
 * - revokeOne() — Inviter withdraws one escrow
 * - revokeAll() — Inviter withdraws every escrow in one transfer
 * - listInviters() / listInvitees() — Enumerate counterparts, newest first
 * - currentBalanceAndAge() — Decayed value and age of an escrow
 * - snapshot() — Every active escrow
 *
 * Every mutating call runs inside the reentrancy gate and a journal: it
 * either commits as a whole and publishes its notifications, or throws
 * and leaves no trace. Once value has left the escrow the call's state
 * changes stand, even if a later transfer or the sink fails.
 */

import { isReservedAddress, normalizeAddress } from "@invite-escrow/types";
import type {
  Address,
  BalanceAndAge,
  DayIndex,
  EscrowRecord,
  EscrowRelationship,
} from "@invite-escrow/types";
import type {
  Clock,
  DecayFunction,
  EscrowEventSink,
  HoldingsOracle,
  IdentityOracle,
  ValueMover,
} from "./collaborators.js";
import { DemurrageDecay } from "./demurrage.js";
import { Journal } from "./journal.js";
import { assetIdOf } from "./payload-codec.js";
import { ReentrancyGate } from "./reentrancy-gate.js";
import { RelationshipIndex } from "./relationship-index.js";
import type {
  AmountBounds,
  EscrowCreated,
  EscrowSettled,
  EscrowSnapshot,
} from "./types.js";
import { EscrowError, MAX_ESCROW_AMOUNT, MIN_ESCROW_AMOUNT } from "./types.js";

// ─── Options & Results ───────────────────────────────────────────────────

export interface EscrowLedgerOptions {
  readonly identity: IdentityOracle;
  readonly values: ValueMover;
  readonly clock: Clock;
  /** Defaults to the 7%-per-year demurrage curve. */
  readonly decay?: DecayFunction | undefined;
  /** Defaults to [MIN_ESCROW_AMOUNT, MAX_ESCROW_AMOUNT]. */
  readonly bounds?: AmountBounds | undefined;
  /** When set, revokeAll() never transfers more than the holder reports. */
  readonly holdings?: HoldingsOracle | undefined;
  readonly sink?: EscrowEventSink | undefined;
}

export interface CreateOptions {
  /**
   * Principal that initiated the underlying asset transfer. When given it
   * must be the inviter itself, not a delegate.
   */
  readonly operator?: Address | undefined;
  /** Asset class that was transferred. When given it must be the inviter's own. */
  readonly assetId?: bigint | undefined;
}

export interface RedeemResult {
  readonly redeemed: EscrowSettled;
  /** Escrows of every other inviter, dissolved and refunded. */
  readonly refunded: readonly EscrowSettled[];
}

export interface RevokeAllResult {
  readonly revoked: readonly EscrowSettled[];
  /** Sum of the settled values. */
  readonly total: bigint;
  /** Amount actually sent, after capping at the external holdings. */
  readonly transferred: bigint;
}

interface PendingTransfer {
  readonly to: Address;
  readonly amount: bigint;
  readonly form: "original" | "wrapped";
}

/** What a mutating call settled, and what it still owes. */
interface Settlement<T> {
  readonly result: T;
  readonly transfers: readonly PendingTransfer[];
}

// ─── Ledger ──────────────────────────────────────────────────────────────

/**
 * Invitation escrow ledger.
 *
 * Owns the record map and both relationship indexes exclusively. A pair
 * is linked in `_inviteesOf[inviter]` and `_invitersOf[invitee]` if and
 * only if `_records` holds an entry for it.
 */
export class EscrowLedger {
  private readonly _records: Map<string, EscrowRelationship> = new Map();
  private readonly _inviteesOf: RelationshipIndex = new RelationshipIndex();
  private readonly _invitersOf: RelationshipIndex = new RelationshipIndex();
  private readonly _gate: ReentrancyGate = new ReentrancyGate();

  private readonly _identity: IdentityOracle;
  private readonly _values: ValueMover;
  private readonly _clock: Clock;
  private readonly _decay: DecayFunction;
  private readonly _bounds: AmountBounds;
  private readonly _holdings: HoldingsOracle | undefined;
  private readonly _sink: EscrowEventSink | undefined;

  constructor(options: EscrowLedgerOptions) {
    const bounds = options.bounds ?? { min: MIN_ESCROW_AMOUNT, max: MAX_ESCROW_AMOUNT };
    if (bounds.min <= 0n || bounds.min > bounds.max) {
      throw new RangeError(
        `Escrow bounds must satisfy 0 < min <= max, got [${bounds.min.toString()}, ${bounds.max.toString()}]`,
      );
    }

    this._identity = options.identity;
    this._values = options.values;
    this._clock = options.clock;
    this._decay = options.decay ?? new DemurrageDecay();
    this._bounds = bounds;
    this._holdings = options.holdings;
    this._sink = options.sink;
  }

  get bounds(): AmountBounds {
    return this._bounds;
  }

  // ─── Create ──────────────────────────────────────────────────────────

  /**
   * Lock `amount` from `inviter` for `invitee`.
   *
   * Checks, in order (fail-closed, first failure wins):
   * 1. Inviter is an eligible principal
   * 2. Operator and asset class, when given, are the inviter's own
   * 3. Amount lies within the configured bounds
   * 4. Invitee has not already been onboarded
   * 5. Invitee is neither the zero address nor the sentinel
   * 6. No active escrow exists for the pair
   * 7. Inviter currently trusts invitee
   */
  create(
    inviter: Address,
    invitee: Address,
    amount: bigint,
    options?: CreateOptions,
  ): EscrowCreated {
    return this._transact("create", (journal, today) => {
      const from = normalizeAddress(inviter);
      const to = normalizeAddress(invitee);

      if (!this._identity.isEligiblePrincipal(from)) {
        throw new EscrowError(
          "INELIGIBLE_PRINCIPAL",
          `Inviter "${from}" is not an eligible principal`,
          { inviter: from },
        );
      }

      if (options?.operator !== undefined && normalizeAddress(options.operator) !== from) {
        throw new EscrowError(
          "OPERATOR_MISMATCH",
          `Transfer must be made by the inviter directly, not by "${options.operator}"`,
          { inviter: from, operator: options.operator },
        );
      }

      if (options?.assetId !== undefined && options.assetId !== assetIdOf(from)) {
        throw new EscrowError(
          "OPERATOR_MISMATCH",
          `Asset ${options.assetId.toString()} is not owned by "${from}"`,
          { inviter: from, assetId: options.assetId.toString() },
        );
      }

      if (amount < this._bounds.min || amount > this._bounds.max) {
        throw new EscrowError(
          "AMOUNT_OUT_OF_RANGE",
          `Amount ${amount.toString()} is outside [${this._bounds.min.toString()}, ${this._bounds.max.toString()}]`,
          {
            amount: amount.toString(),
            min: this._bounds.min.toString(),
            max: this._bounds.max.toString(),
          },
        );
      }

      if (this._identity.isOnboarded(to)) {
        throw new EscrowError(
          "COUNTERPART_ALREADY_ONBOARDED",
          `Invitee "${to}" has already been onboarded`,
          { invitee: to },
        );
      }

      if (isReservedAddress(to)) {
        throw new EscrowError(
          "INVALID_COUNTERPART",
          `Invitee "${to}" is a reserved address`,
          { invitee: to },
        );
      }

      if (this._records.has(pairKey(from, to))) {
        throw new EscrowError(
          "DUPLICATE_RELATIONSHIP",
          `An escrow from "${from}" to "${to}" is already active`,
          { inviter: from, invitee: to },
        );
      }

      if (!this._identity.trusts(from, to)) {
        throw new EscrowError(
          "TRUST_MISSING_OR_EXPIRED",
          `Inviter "${from}" does not trust invitee "${to}"`,
          { inviter: from, invitee: to },
        );
      }

      this._link(journal, { inviter: from, invitee: to, faceValue: amount, lastUpdatedDay: today });

      const created: EscrowCreated = {
        kind: "created",
        inviter: from,
        invitee: to,
        amount,
        day: today,
      };
      journal.emit(created);
      return { result: created, transfers: [] };
    });
  }

  // ─── Redeem ──────────────────────────────────────────────────────────

  /**
   * Invitee accepts `chosenInviter`'s escrow.
   *
   * Every escrow held for the invitee is dissolved in the same call: the
   * chosen one returns the original asset to its inviter (after a fresh
   * trust check), every other one is refunded in wrapped form. All
   * records are settled and checked before the first transfer is made.
   * Transfers go out in enumeration order.
   */
  redeem(invitee: Address, chosenInviter: Address): RedeemResult {
    return this._transact("redeem", (journal, today) => {
      const to = normalizeAddress(invitee);
      const chosen = normalizeAddress(chosenInviter);

      this._assertRedeemable(chosen, to, today);

      let redeemed: EscrowSettled | undefined;
      const refunded: EscrowSettled[] = [];
      const transfers: PendingTransfer[] = [];

      for (const inviter of this._invitersOf.enumerate(to)) {
        const settled = this._unlink(journal, inviter, to, today);

        if (inviter === chosen) {
          if (!this._identity.trusts(inviter, to)) {
            throw new EscrowError(
              "TRUST_MISSING_OR_EXPIRED",
              `Trust from "${inviter}" to "${to}" is missing or has expired`,
              { inviter, invitee: to },
            );
          }
          redeemed = { kind: "redeemed", inviter, invitee: to, amount: settled, day: today };
          transfers.push({ to: inviter, amount: settled, form: "original" });
          journal.emit(redeemed);
        } else {
          const refund: EscrowSettled = {
            kind: "refunded",
            inviter,
            invitee: to,
            amount: settled,
            day: today,
          };
          refunded.push(refund);
          transfers.push({ to: inviter, amount: settled, form: "wrapped" });
          journal.emit(refund);
        }
      }

      if (redeemed === undefined) {
        throw new EscrowError(
          "INDEX_CORRUPTED",
          `Escrow from "${chosen}" to "${to}" exists but is not indexed`,
        );
      }

      return { result: { redeemed, refunded }, transfers };
    });
  }

  // ─── Revoke ──────────────────────────────────────────────────────────

  /**
   * Inviter withdraws its escrow for `invitee`, receiving the settled
   * value in wrapped form.
   */
  revokeOne(inviter: Address, invitee: Address): EscrowSettled {
    return this._transact("revokeOne", (journal, today) => {
      const from = normalizeAddress(inviter);
      const to = normalizeAddress(invitee);

      this._assertRedeemable(from, to, today);
      const settled = this._unlink(journal, from, to, today);

      const revoked: EscrowSettled = {
        kind: "revoked",
        inviter: from,
        invitee: to,
        amount: settled,
        day: today,
      };
      journal.emit(revoked);
      return { result: revoked, transfers: [{ to: from, amount: settled, form: "wrapped" }] };
    });
  }

  /**
   * Inviter withdraws every escrow it holds. One notification per
   * escrow, one transfer for the total. A no-op for an inviter with
   * nothing open.
   */
  revokeAll(inviter: Address): RevokeAllResult {
    return this._transact("revokeAll", (journal, today) => {
      const from = normalizeAddress(inviter);
      const revoked: EscrowSettled[] = [];
      let total = 0n;

      for (const invitee of this._inviteesOf.enumerate(from)) {
        const settled = this._unlink(journal, from, invitee, today);
        total += settled;

        const entry: EscrowSettled = {
          kind: "revoked",
          inviter: from,
          invitee,
          amount: settled,
          day: today,
        };
        revoked.push(entry);
        journal.emit(entry);
      }

      let transferred = total;
      if (this._holdings !== undefined && total > 0n) {
        const held = this._holdings.escrowedHoldings();
        if (held < transferred) {
          transferred = held;
        }
      }

      return {
        result: { revoked, total, transferred },
        transfers: [{ to: from, amount: transferred, form: "wrapped" }],
      };
    });
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /** Inviters holding an escrow for `invitee`, newest first. */
  listInviters(invitee: Address): readonly Address[] {
    return this._invitersOf.enumerate(normalizeAddress(invitee));
  }

  /** Invitees `inviter` holds an escrow for, newest first. */
  listInvitees(inviter: Address): readonly Address[] {
    return this._inviteesOf.enumerate(normalizeAddress(inviter));
  }

  /**
   * Decayed value and age of the escrow for the pair.
   * Returns zero amount and zero days when there is none.
   */
  currentBalanceAndAge(inviter: Address, invitee: Address): BalanceAndAge {
    const record = this.getRecord(inviter, invitee);
    if (record === undefined) {
      return { amount: 0n, daysElapsed: 0 };
    }

    const daysElapsed = this._elapsed(record, this._clock.today());
    return { amount: this._decay.project(record.faceValue, daysElapsed), daysElapsed };
  }

  getRecord(inviter: Address, invitee: Address): EscrowRecord | undefined {
    const record = this._records.get(pairKey(normalizeAddress(inviter), normalizeAddress(invitee)));
    if (record === undefined) {
      return undefined;
    }
    return { faceValue: record.faceValue, lastUpdatedDay: record.lastUpdatedDay };
  }

  /** Number of active escrows. */
  get recordCount(): number {
    return this._records.size;
  }

  /** Whether a mutating call is currently in progress. */
  get busy(): boolean {
    return this._gate.held;
  }

  /** Every active escrow, oldest first. */
  snapshot(): EscrowSnapshot {
    return {
      day: this._clock.today(),
      relationships: [...this._records.values()],
    };
  }

  // ─── Internal ────────────────────────────────────────────────────────

  /**
   * Run a mutating call inside the gate and a fresh journal. The day is
   * read once, so a call never straddles two days.
   *
   * The call's state changes are undone if it fails before any value has
   * left the escrow. From the first completed transfer on they are
   * permanent: a later transfer failure surfaces as
   * DISBURSEMENT_INCOMPLETE, and the notifications of a committed call
   * are published even then. A sink that throws does not undo anything.
   */
  private _transact<T>(
    name: string,
    operation: (journal: Journal, today: DayIndex) => Settlement<T>,
  ): T {
    return this._gate.run(name, () => {
      const journal = new Journal();
      let settlement: Settlement<T>;
      try {
        settlement = operation(journal, this._clock.today());
      } catch (err: unknown) {
        journal.rollback();
        throw err;
      }

      const shortfall = this._disburse(journal, settlement.transfers);
      const notifications = journal.commit();
      if (notifications.length > 0) {
        this._sink?.publish(notifications);
      }
      if (shortfall !== undefined) {
        throw shortfall;
      }
      return settlement.result;
    });
  }

  /**
   * Throws NO_SUCH_RELATIONSHIP unless the pair has an escrow whose
   * value has not decayed to zero.
   */
  private _assertRedeemable(inviter: Address, invitee: Address, today: DayIndex): void {
    const record = this._records.get(pairKey(inviter, invitee));
    if (
      record === undefined ||
      this._decay.project(record.faceValue, this._elapsed(record, today)) === 0n
    ) {
      throw new EscrowError(
        "NO_SUCH_RELATIONSHIP",
        `No active escrow from "${inviter}" to "${invitee}"`,
        { inviter, invitee },
      );
    }
  }

  private _link(journal: Journal, relationship: EscrowRelationship): void {
    const { inviter, invitee } = relationship;
    const key = pairKey(inviter, invitee);

    this._records.set(key, relationship);
    this._inviteesOf.insert(inviter, invitee);
    this._invitersOf.insert(invitee, inviter);

    journal.record(() => {
      this._invitersOf.remove(invitee, inviter);
      this._inviteesOf.remove(inviter, invitee);
      this._records.delete(key);
    });
  }

  /**
   * Destroy the pair's escrow and return its settled value.
   */
  private _unlink(journal: Journal, inviter: Address, invitee: Address, today: DayIndex): bigint {
    const key = pairKey(inviter, invitee);
    const record = this._records.get(key);
    if (record === undefined) {
      throw new EscrowError(
        "NO_SUCH_RELATIONSHIP",
        `No active escrow from "${inviter}" to "${invitee}"`,
        { inviter, invitee },
      );
    }

    const settled = this._decay.project(record.faceValue, this._elapsed(record, today));

    this._records.delete(key);
    const inviteePredecessor = this._inviteesOf.remove(inviter, invitee);
    const inviterPredecessor = this._invitersOf.remove(invitee, inviter);
    if (inviteePredecessor === undefined || inviterPredecessor === undefined) {
      throw new EscrowError(
        "INDEX_CORRUPTED",
        `Escrow from "${inviter}" to "${invitee}" is missing from an index`,
      );
    }

    journal.record(() => {
      this._invitersOf.relink(invitee, inviterPredecessor, inviter);
      this._inviteesOf.relink(inviter, inviteePredecessor, invitee);
      this._records.set(key, record);
    });

    return settled;
  }

  private _elapsed(record: EscrowRecord, today: DayIndex): number {
    const elapsed = today - record.lastUpdatedDay;
    if (elapsed < 0) {
      throw new EscrowError(
        "INVALID_DAY",
        `Clock reads day ${String(today)}, before the escrow was anchored on day ${String(record.lastUpdatedDay)}`,
        { today, lastUpdatedDay: record.lastUpdatedDay },
      );
    }
    return elapsed;
  }

  /**
   * Make the external transfers of a settled call, in order. Zero amounts
   * are skipped.
   *
   * If the first transfer fails, nothing has moved: the journal is rolled
   * back and the failure rethrown. A failure after that cannot be undone
   * here, so it stops the run and is returned as the transfers still owed.
   */
  private _disburse(journal: Journal, transfers: readonly PendingTransfer[]): EscrowError | undefined {
    const owed = transfers.filter((t) => t.amount > 0n);

    for (const [i, transfer] of owed.entries()) {
      try {
        if (transfer.form === "original") {
          this._values.transferOriginal(transfer.to, transfer.amount);
        } else {
          this._values.convertAndTransfer(transfer.to, transfer.amount);
        }
      } catch (err: unknown) {
        if (i === 0) {
          journal.rollback();
          throw err;
        }
        const unpaid = owed.slice(i);
        const unpaidAmount = unpaid.reduce((sum, t) => sum + t.amount, 0n);
        const reason = err instanceof Error ? err.message : String(err);
        return new EscrowError(
          "DISBURSEMENT_INCOMPLETE",
          `Transfer to "${transfer.to}" failed after ${String(i)} of ${String(owed.length)} transfers: ${reason}`,
          {
            paid: i,
            unpaid: unpaid.length,
            unpaidAmount: unpaidAmount.toString(),
            failedRecipient: transfer.to,
            reason,
          },
        );
      }
    }
    return undefined;
  }
}

function pairKey(inviter: Address, invitee: Address): string {
  return `${inviter}:${invitee}`;
}
