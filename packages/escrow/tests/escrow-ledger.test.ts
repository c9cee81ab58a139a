/**
 * Tests for the core EscrowLedger class.
 *
 * Covers:
 * - create() preconditions and their order
 * - revokeOne(), redeem() and revokeAll() settlement
 * - All-or-nothing rollback on failure
 * - Reentrancy rejection
 * - Read-only queries
 */

import { describe, it, expect, beforeEach } from "vitest";
import { SENTINEL, ZERO_ADDRESS, normalizeAddress } from "@invite-escrow/types";
import { EscrowLedger } from "../src/escrow-ledger.js";
import { ManualClock } from "../src/clock.js";
import { assetIdOf } from "../src/payload-codec.js";
import { EscrowError } from "../src/types.js";
import type { EscrowErrorCode } from "../src/types.js";
import {
  ALICE,
  BOB,
  CAROL,
  DAVE,
  ERIN,
  HUNDRED,
  FakeIdentity,
  FixedHoldings,
  RecordingValueMover,
  createHarness,
  invite,
  units,
} from "./fixtures.js";
import type { Harness } from "./fixtures.js";

function expectEscrowError(fn: () => unknown, code: EscrowErrorCode): EscrowError {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(EscrowError);
    expect((err as EscrowError).code).toBe(code);
    return err as EscrowError;
  }
  throw new Error(`Expected EscrowError ${code}, but nothing was thrown`);
}

describe("EscrowLedger", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  // ─── Construction ────────────────────────────────────────────────────

  describe("construction", () => {
    it("defaults to the 97–100 unit bounds", () => {
      expect(h.ledger.bounds).toEqual({ min: units(97n), max: units(100n) });
    });

    it("rejects inverted bounds", () => {
      expect(
        () =>
          new EscrowLedger({
            identity: new FakeIdentity(),
            values: new RecordingValueMover(),
            clock: new ManualClock(),
            bounds: { min: units(5n), max: units(4n) },
          }),
      ).toThrow(RangeError);
    });

    it("rejects a zero minimum", () => {
      expect(
        () =>
          new EscrowLedger({
            identity: new FakeIdentity(),
            values: new RecordingValueMover(),
            clock: new ManualClock(),
            bounds: { min: 0n, max: units(4n) },
          }),
      ).toThrow(RangeError);
    });
  });

  // ─── Create ──────────────────────────────────────────────────────────

  describe("create", () => {
    it("records the escrow and links both indexes", () => {
      h.identity.trust(ALICE, DAVE);
      const created = h.ledger.create(ALICE, DAVE, HUNDRED);

      expect(created).toEqual({ kind: "created", inviter: ALICE, invitee: DAVE, amount: HUNDRED, day: 10 });
      expect(h.ledger.getRecord(ALICE, DAVE)).toEqual({ faceValue: HUNDRED, lastUpdatedDay: 10 });
      expect(h.ledger.listInvitees(ALICE)).toEqual([DAVE]);
      expect(h.ledger.listInviters(DAVE)).toEqual([ALICE]);
      expect(h.ledger.recordCount).toBe(1);
    });

    it("publishes one creation notification", () => {
      invite(h, ALICE, DAVE);
      expect(h.sink.batches).toEqual([
        [{ kind: "created", inviter: ALICE, invitee: DAVE, amount: HUNDRED, day: 10 }],
      ]);
    });

    it("reports the full amount and zero age right after creation", () => {
      invite(h, ALICE, DAVE);
      expect(h.ledger.currentBalanceAndAge(ALICE, DAVE)).toEqual({ amount: HUNDRED, daysElapsed: 0 });
    });

    it("makes no transfer", () => {
      invite(h, ALICE, DAVE);
      expect(h.values.transfers).toEqual([]);
    });

    it("accepts both ends of the amount range", () => {
      h.identity.trust(ALICE, DAVE);
      h.identity.trust(ALICE, ERIN);
      h.ledger.create(ALICE, DAVE, units(97n));
      h.ledger.create(ALICE, ERIN, units(100n));

      expect(h.ledger.listInvitees(ALICE)).toEqual([ERIN, DAVE]);
    });

    it("rejects an ineligible inviter before anything else", () => {
      const err = expectEscrowError(() => h.ledger.create(ERIN, DAVE, 1n), "INELIGIBLE_PRINCIPAL");
      expect(err.details).toEqual({ inviter: ERIN });
    });

    it("rejects a transfer made by a delegate", () => {
      h.identity.trust(ALICE, DAVE);
      expectEscrowError(
        () => h.ledger.create(ALICE, DAVE, HUNDRED, { operator: BOB }),
        "OPERATOR_MISMATCH",
      );
    });

    it("rejects an asset class the inviter does not own and reports it", () => {
      h.identity.trust(ALICE, DAVE);
      const err = expectEscrowError(
        () => h.ledger.create(ALICE, DAVE, HUNDRED, { assetId: assetIdOf(BOB) }),
        "OPERATOR_MISMATCH",
      );
      expect(err.details).toEqual({ inviter: ALICE, assetId: assetIdOf(BOB).toString() });
    });

    it("accepts a transfer made by the inviter itself", () => {
      h.identity.trust(ALICE, DAVE);
      h.ledger.create(ALICE, DAVE, HUNDRED, { operator: ALICE, assetId: assetIdOf(ALICE) });
      expect(h.ledger.listInvitees(ALICE)).toEqual([DAVE]);
    });

    it("rejects an amount below the minimum and reports it", () => {
      const err = expectEscrowError(() => h.ledger.create(ALICE, DAVE, units(96n)), "AMOUNT_OUT_OF_RANGE");
      expect(err.details).toEqual({
        amount: "96000000000000000000",
        min: "97000000000000000000",
        max: "100000000000000000000",
      });
    });

    it("rejects an amount above the maximum", () => {
      expectEscrowError(() => h.ledger.create(ALICE, DAVE, HUNDRED + 1n), "AMOUNT_OUT_OF_RANGE");
    });

    it("honours custom bounds", () => {
      const custom = createHarness({ bounds: { min: 5n, max: 10n } });
      custom.identity.trust(ALICE, DAVE);
      custom.ledger.create(ALICE, DAVE, 7n);

      expect(custom.ledger.getRecord(ALICE, DAVE)).toEqual({ faceValue: 7n, lastUpdatedDay: 10 });
      expectEscrowError(() => custom.ledger.create(ALICE, ERIN, 11n), "AMOUNT_OUT_OF_RANGE");
    });

    it("rejects an invitee that is already onboarded", () => {
      h.identity.onboarded.add(DAVE);
      h.identity.trust(ALICE, DAVE);
      expectEscrowError(() => h.ledger.create(ALICE, DAVE, HUNDRED), "COUNTERPART_ALREADY_ONBOARDED");
    });

    it("rejects the zero address as invitee", () => {
      expectEscrowError(() => h.ledger.create(ALICE, ZERO_ADDRESS, HUNDRED), "INVALID_COUNTERPART");
    });

    it("rejects the sentinel as invitee", () => {
      expectEscrowError(() => h.ledger.create(ALICE, SENTINEL, HUNDRED), "INVALID_COUNTERPART");
    });

    it("rejects a second escrow for the same pair", () => {
      invite(h, ALICE, DAVE);
      expectEscrowError(() => h.ledger.create(ALICE, DAVE, HUNDRED), "DUPLICATE_RELATIONSHIP");
      expect(h.ledger.listInvitees(ALICE)).toEqual([DAVE]);
    });

    it("treats the reverse pair as a separate escrow", () => {
      invite(h, ALICE, BOB);
      invite(h, BOB, ALICE);

      expect(h.ledger.listInvitees(ALICE)).toEqual([BOB]);
      expect(h.ledger.listInviters(ALICE)).toEqual([BOB]);
    });

    it("rejects an invitee the inviter does not trust", () => {
      expectEscrowError(() => h.ledger.create(ALICE, DAVE, HUNDRED), "TRUST_MISSING_OR_EXPIRED");
    });

    it("leaves no trace when a precondition fails", () => {
      expectEscrowError(() => h.ledger.create(ALICE, DAVE, HUNDRED), "TRUST_MISSING_OR_EXPIRED");

      expect(h.ledger.recordCount).toBe(0);
      expect(h.ledger.listInvitees(ALICE)).toEqual([]);
      expect(h.ledger.listInviters(DAVE)).toEqual([]);
      expect(h.sink.batches).toEqual([]);
    });

    it("normalizes address casing", () => {
      const lower = "0xabcdefabcdefabcdefabcdefabcdefabcdefabcd";
      const upper = "0xABCDEFABCDEFABCDEFABCDEFABCDEFABCDEFABCD";
      const normalized = normalizeAddress(lower);
      h.identity.trust(ALICE, normalized);

      h.ledger.create(ALICE, lower, HUNDRED);

      expect(h.ledger.listInvitees(ALICE)).toEqual([normalized]);
      expect(h.ledger.listInviters(upper)).toEqual([ALICE]);
    });
  });

  // ─── Revoke One ──────────────────────────────────────────────────────

  describe("revokeOne", () => {
    it("returns the decayed value in wrapped form", () => {
      invite(h, ALICE, DAVE);
      h.clock.advance(25);

      const revoked = h.ledger.revokeOne(ALICE, DAVE);

      expect(revoked).toEqual({ kind: "revoked", inviter: ALICE, invitee: DAVE, amount: units(75n), day: 35 });
      expect(h.values.transfers).toEqual([{ form: "wrapped", to: ALICE, amount: units(75n) }]);
    });

    it("succeeds once and fails the second time", () => {
      invite(h, ALICE, DAVE);
      h.clock.advance(25);
      h.ledger.revokeOne(ALICE, DAVE);

      expectEscrowError(() => h.ledger.revokeOne(ALICE, DAVE), "NO_SUCH_RELATIONSHIP");
      expect(h.values.transfers).toHaveLength(1);
    });

    it("unlinks both indexes", () => {
      invite(h, ALICE, DAVE);
      invite(h, ALICE, ERIN);
      h.ledger.revokeOne(ALICE, DAVE);

      expect(h.ledger.listInvitees(ALICE)).toEqual([ERIN]);
      expect(h.ledger.listInviters(DAVE)).toEqual([]);
      expect(h.ledger.getRecord(ALICE, DAVE)).toBeUndefined();
    });

    it("publishes the revocation", () => {
      invite(h, ALICE, DAVE);
      h.ledger.revokeOne(ALICE, DAVE);

      expect(h.sink.batches[1]).toEqual([
        { kind: "revoked", inviter: ALICE, invitee: DAVE, amount: HUNDRED, day: 10 },
      ]);
    });

    it("rejects a pair with no escrow", () => {
      const err = expectEscrowError(() => h.ledger.revokeOne(ALICE, DAVE), "NO_SUCH_RELATIONSHIP");
      expect(err.details).toEqual({ inviter: ALICE, invitee: DAVE });
    });

    it("treats a fully decayed escrow as absent", () => {
      invite(h, ALICE, DAVE);
      h.clock.advance(100);

      expectEscrowError(() => h.ledger.revokeOne(ALICE, DAVE), "NO_SUCH_RELATIONSHIP");
      expect(h.values.transfers).toEqual([]);
    });

    it("rolls back when the transfer fails", () => {
      invite(h, ALICE, DAVE);
      invite(h, ALICE, ERIN);
      h.values.onTransfer = () => {
        throw new Error("transfer rejected");
      };

      expect(() => h.ledger.revokeOne(ALICE, ERIN)).toThrow("transfer rejected");

      expect(h.ledger.listInvitees(ALICE)).toEqual([ERIN, DAVE]);
      expect(h.ledger.listInviters(ERIN)).toEqual([ALICE]);
      expect(h.ledger.getRecord(ALICE, ERIN)).toEqual({ faceValue: HUNDRED, lastUpdatedDay: 10 });
      expect(h.sink.batches).toHaveLength(2);
    });
  });

  // ─── Redeem ──────────────────────────────────────────────────────────

  describe("redeem", () => {
    it("credits the chosen inviter and refunds the others", () => {
      invite(h, ALICE, DAVE);
      invite(h, BOB, DAVE);

      const result = h.ledger.redeem(DAVE, BOB);

      expect(result.redeemed).toEqual({ kind: "redeemed", inviter: BOB, invitee: DAVE, amount: HUNDRED, day: 10 });
      expect(result.refunded).toEqual([
        { kind: "refunded", inviter: ALICE, invitee: DAVE, amount: HUNDRED, day: 10 },
      ]);
      expect(h.values.transfers).toEqual([
        { form: "original", to: BOB, amount: HUNDRED },
        { form: "wrapped", to: ALICE, amount: HUNDRED },
      ]);
    });

    it("clears every index touched by the invitee", () => {
      invite(h, ALICE, DAVE);
      invite(h, BOB, DAVE);
      h.ledger.redeem(DAVE, BOB);

      expect(h.ledger.listInviters(DAVE)).toEqual([]);
      expect(h.ledger.listInvitees(ALICE)).toEqual([]);
      expect(h.ledger.listInvitees(BOB)).toEqual([]);
      expect(h.ledger.recordCount).toBe(0);
    });

    it("publishes notifications in enumeration order", () => {
      invite(h, ALICE, DAVE);
      invite(h, BOB, DAVE);
      invite(h, CAROL, DAVE);
      h.ledger.redeem(DAVE, BOB);

      expect(h.sink.batches[3]?.map((n) => `${n.kind}:${n.inviter}`)).toEqual([
        `refunded:${CAROL}`,
        `redeemed:${BOB}`,
        `refunded:${ALICE}`,
      ]);
    });

    it("settles each escrow against its own creation day", () => {
      invite(h, ALICE, DAVE);
      h.clock.advance(20);
      invite(h, BOB, DAVE);
      h.clock.advance(10);

      const result = h.ledger.redeem(DAVE, BOB);

      expect(result.redeemed.amount).toBe(units(90n));
      expect(result.refunded.map((r) => r.amount)).toEqual([units(70n)]);
    });

    it("leaves the invitee's other counterparts' unrelated escrows alone", () => {
      invite(h, ALICE, DAVE);
      invite(h, ALICE, ERIN);
      invite(h, BOB, DAVE);
      h.ledger.redeem(DAVE, BOB);

      expect(h.ledger.listInvitees(ALICE)).toEqual([ERIN]);
      expect(h.ledger.listInviters(ERIN)).toEqual([ALICE]);
    });

    it("requires an escrow from the chosen inviter even when others exist", () => {
      invite(h, ALICE, DAVE);
      expectEscrowError(() => h.ledger.redeem(DAVE, BOB), "NO_SUCH_RELATIONSHIP");
      expect(h.ledger.listInviters(DAVE)).toEqual([ALICE]);
    });

    it("rejects a chosen escrow that has fully decayed", () => {
      invite(h, ALICE, DAVE);
      h.clock.advance(100);
      expectEscrowError(() => h.ledger.redeem(DAVE, ALICE), "NO_SUCH_RELATIONSHIP");
    });

    it("fails as a whole when the chosen inviter no longer trusts the invitee", () => {
      invite(h, BOB, DAVE);
      invite(h, ALICE, DAVE);
      h.identity.untrust(BOB, DAVE);

      expectEscrowError(() => h.ledger.redeem(DAVE, BOB), "TRUST_MISSING_OR_EXPIRED");

      expect(h.ledger.listInviters(DAVE)).toEqual([ALICE, BOB]);
      expect(h.ledger.listInvitees(ALICE)).toEqual([DAVE]);
      expect(h.ledger.listInvitees(BOB)).toEqual([DAVE]);
      expect(h.ledger.getRecord(ALICE, DAVE)).toEqual({ faceValue: HUNDRED, lastUpdatedDay: 10 });
      expect(h.values.transfers).toEqual([]);
      expect(h.sink.batches).toHaveLength(2);
    });

    it("does not re-check trust for the inviters being refunded", () => {
      invite(h, ALICE, DAVE);
      invite(h, BOB, DAVE);
      h.identity.untrust(ALICE, DAVE);

      const result = h.ledger.redeem(DAVE, BOB);
      expect(result.refunded.map((r) => r.inviter)).toEqual([ALICE]);
    });

    it("dissolves a fully decayed refund without a transfer", () => {
      invite(h, ALICE, DAVE);
      h.clock.advance(100);
      invite(h, BOB, DAVE);

      const result = h.ledger.redeem(DAVE, BOB);

      expect(result.refunded).toEqual([
        { kind: "refunded", inviter: ALICE, invitee: DAVE, amount: 0n, day: 110 },
      ]);
      expect(h.values.transfers).toEqual([{ form: "original", to: BOB, amount: HUNDRED }]);
      expect(h.ledger.listInviters(DAVE)).toEqual([]);
    });

    it("rolls back every settled escrow when the first transfer fails", () => {
      invite(h, ALICE, DAVE);
      invite(h, BOB, DAVE);
      invite(h, CAROL, DAVE);
      h.values.onTransfer = (transfer) => {
        if (transfer.form === "wrapped") {
          throw new Error("wrapping unavailable");
        }
      };

      expect(() => h.ledger.redeem(DAVE, BOB)).toThrow("wrapping unavailable");

      expect(h.ledger.listInviters(DAVE)).toEqual([CAROL, BOB, ALICE]);
      expect(h.ledger.recordCount).toBe(3);
      expect(h.values.transfers).toEqual([]);
      expect(h.sink.batches).toHaveLength(3);
    });

    it("keeps the settlement when a later transfer fails", () => {
      invite(h, ALICE, DAVE);
      invite(h, BOB, DAVE);
      invite(h, CAROL, DAVE);
      h.values.onTransfer = (transfer) => {
        if (transfer.form === "original") {
          throw new Error("original unavailable");
        }
      };

      const err = expectEscrowError(() => h.ledger.redeem(DAVE, BOB), "DISBURSEMENT_INCOMPLETE");

      expect(err.details).toEqual({
        paid: 1,
        unpaid: 2,
        unpaidAmount: "200000000000000000000",
        failedRecipient: BOB,
        reason: "original unavailable",
      });
      expect(h.values.transfers).toEqual([{ form: "wrapped", to: CAROL, amount: HUNDRED }]);
      expect(h.ledger.listInviters(DAVE)).toEqual([]);
      expect(h.ledger.recordCount).toBe(0);
      expect(h.sink.batches[3]).toEqual([
        { kind: "refunded", inviter: CAROL, invitee: DAVE, amount: HUNDRED, day: 10 },
        { kind: "redeemed", inviter: BOB, invitee: DAVE, amount: HUNDRED, day: 10 },
        { kind: "refunded", inviter: ALICE, invitee: DAVE, amount: HUNDRED, day: 10 },
      ]);
    });

    it("never pays a settled escrow twice after a partial failure", () => {
      invite(h, ALICE, DAVE);
      invite(h, BOB, DAVE);
      h.values.onTransfer = (transfer) => {
        if (transfer.to === ALICE) {
          throw new Error("recipient offline");
        }
      };
      expectEscrowError(() => h.ledger.redeem(DAVE, BOB), "DISBURSEMENT_INCOMPLETE");
      h.values.onTransfer = undefined;

      expectEscrowError(() => h.ledger.redeem(DAVE, BOB), "NO_SUCH_RELATIONSHIP");
      expectEscrowError(() => h.ledger.revokeOne(ALICE, DAVE), "NO_SUCH_RELATIONSHIP");
      expect(h.values.transfers).toEqual([{ form: "original", to: BOB, amount: HUNDRED }]);
    });
  });

  // ─── Revoke All ──────────────────────────────────────────────────────

  describe("revokeAll", () => {
    it("does nothing for an inviter with no open escrows", () => {
      const result = h.ledger.revokeAll(ALICE);

      expect(result).toEqual({ revoked: [], total: 0n, transferred: 0n });
      expect(h.values.transfers).toEqual([]);
      expect(h.sink.batches).toEqual([]);
    });

    it("settles every escrow with one transfer of the total", () => {
      invite(h, ALICE, BOB);
      invite(h, ALICE, DAVE);
      invite(h, ALICE, ERIN);
      h.clock.advance(10);

      const result = h.ledger.revokeAll(ALICE);

      expect(result.total).toBe(units(270n));
      expect(result.transferred).toBe(units(270n));
      expect(h.values.transfers).toEqual([{ form: "wrapped", to: ALICE, amount: units(270n) }]);
    });

    it("publishes one revocation per escrow, newest first", () => {
      invite(h, ALICE, BOB);
      invite(h, ALICE, DAVE);
      invite(h, ALICE, ERIN);
      h.ledger.revokeAll(ALICE);

      expect(h.sink.batches[3]).toEqual([
        { kind: "revoked", inviter: ALICE, invitee: ERIN, amount: HUNDRED, day: 10 },
        { kind: "revoked", inviter: ALICE, invitee: DAVE, amount: HUNDRED, day: 10 },
        { kind: "revoked", inviter: ALICE, invitee: BOB, amount: HUNDRED, day: 10 },
      ]);
    });

    it("clears the inviter's escrows but not other inviters'", () => {
      invite(h, ALICE, DAVE);
      invite(h, BOB, DAVE);
      h.ledger.revokeAll(ALICE);

      expect(h.ledger.listInvitees(ALICE)).toEqual([]);
      expect(h.ledger.listInviters(DAVE)).toEqual([BOB]);
      expect(h.ledger.getRecord(BOB, DAVE)).toEqual({ faceValue: HUNDRED, lastUpdatedDay: 10 });
    });

    it("dissolves fully decayed escrows without transferring", () => {
      invite(h, ALICE, DAVE);
      h.clock.advance(100);

      const result = h.ledger.revokeAll(ALICE);

      expect(result.revoked).toEqual([
        { kind: "revoked", inviter: ALICE, invitee: DAVE, amount: 0n, day: 110 },
      ]);
      expect(h.values.transfers).toEqual([]);
      expect(h.ledger.recordCount).toBe(0);
    });

    it("caps the transfer at what the external holder reports", () => {
      const capped = createHarness({ holdings: new FixedHoldings(units(250n)) });
      invite(capped, ALICE, BOB);
      invite(capped, ALICE, DAVE);
      invite(capped, ALICE, ERIN);
      capped.clock.advance(10);

      const result = capped.ledger.revokeAll(ALICE);

      expect(result.total).toBe(units(270n));
      expect(result.transferred).toBe(units(250n));
      expect(capped.values.transfers).toEqual([{ form: "wrapped", to: ALICE, amount: units(250n) }]);
    });

    it("transfers the full total when the holder has enough", () => {
      const covered = createHarness({ holdings: new FixedHoldings(units(1000n)) });
      invite(covered, ALICE, DAVE);

      expect(covered.ledger.revokeAll(ALICE).transferred).toBe(HUNDRED);
    });
  });

  // ─── Sink Failures ───────────────────────────────────────────────────

  describe("sink failures", () => {
    it("keeps a paid-out revocation when publishing fails", () => {
      invite(h, ALICE, DAVE);
      h.sink.onPublish = () => {
        throw new Error("sink offline");
      };

      expect(() => h.ledger.revokeOne(ALICE, DAVE)).toThrow("sink offline");

      expect(h.values.transfers).toEqual([{ form: "wrapped", to: ALICE, amount: HUNDRED }]);
      expect(h.ledger.getRecord(ALICE, DAVE)).toBeUndefined();
      expect(h.ledger.listInvitees(ALICE)).toEqual([]);
      expect(h.ledger.listInviters(DAVE)).toEqual([]);
      expect(h.ledger.busy).toBe(false);
    });

    it("does not pay again when the revocation is retried", () => {
      invite(h, ALICE, DAVE);
      h.sink.onPublish = () => {
        throw new Error("sink offline");
      };
      expect(() => h.ledger.revokeOne(ALICE, DAVE)).toThrow("sink offline");
      h.sink.onPublish = undefined;

      expectEscrowError(() => h.ledger.revokeOne(ALICE, DAVE), "NO_SUCH_RELATIONSHIP");
      expect(h.values.transfers).toHaveLength(1);
      expect(h.sink.batches).toHaveLength(1);
    });

    it("keeps a created escrow when publishing fails", () => {
      h.identity.trust(ALICE, DAVE);
      h.sink.onPublish = () => {
        throw new Error("sink offline");
      };

      expect(() => h.ledger.create(ALICE, DAVE, HUNDRED)).toThrow("sink offline");

      expect(h.ledger.getRecord(ALICE, DAVE)).toEqual({ faceValue: HUNDRED, lastUpdatedDay: 10 });
      expect(h.ledger.listInviters(DAVE)).toEqual([ALICE]);
    });
  });

  // ─── Reentrancy ──────────────────────────────────────────────────────

  describe("reentrancy", () => {
    it("rejects a redeem attempted from inside create and keeps state intact", () => {
      invite(h, ALICE, DAVE);
      h.identity.trust(BOB, DAVE);

      let reentry: unknown;
      h.identity.onTrusts = () => {
        h.identity.onTrusts = undefined;
        try {
          h.ledger.redeem(DAVE, ALICE);
        } catch (err) {
          reentry = err;
        }
      };

      h.ledger.create(BOB, DAVE, HUNDRED);

      expect(reentry).toBeInstanceOf(EscrowError);
      expect((reentry as EscrowError).code).toBe("REENTRANT_CALL");
      expect(h.ledger.listInviters(DAVE)).toEqual([BOB, ALICE]);
      expect(h.values.transfers).toEqual([]);
    });

    it("rejects a revoke attempted from inside a redeem transfer", () => {
      invite(h, ALICE, DAVE);
      invite(h, ALICE, ERIN);

      const reentries: string[] = [];
      h.values.onTransfer = () => {
        try {
          h.ledger.revokeOne(ALICE, ERIN);
        } catch (err) {
          reentries.push((err as EscrowError).code);
        }
      };

      h.ledger.redeem(DAVE, ALICE);

      expect(reentries).toEqual(["REENTRANT_CALL"]);
      expect(h.ledger.listInvitees(ALICE)).toEqual([ERIN]);
      expect(h.values.transfers).toEqual([{ form: "original", to: ALICE, amount: HUNDRED }]);
    });

    it("aborts the outer call when the re-entrant failure propagates", () => {
      invite(h, ALICE, DAVE);
      invite(h, BOB, DAVE);
      h.values.onTransfer = () => {
        h.ledger.revokeAll(ALICE);
      };

      expectEscrowError(() => h.ledger.redeem(DAVE, BOB), "REENTRANT_CALL");

      expect(h.ledger.listInviters(DAVE)).toEqual([BOB, ALICE]);
      expect(h.ledger.busy).toBe(false);
    });

    it("accepts new calls once the outer call has returned", () => {
      invite(h, ALICE, DAVE);
      h.values.onTransfer = () => {
        expectEscrowError(() => h.ledger.revokeAll(ALICE), "REENTRANT_CALL");
      };
      h.ledger.revokeOne(ALICE, DAVE);
      h.values.onTransfer = undefined;

      invite(h, ALICE, DAVE);
      expect(h.ledger.revokeAll(ALICE).total).toBe(HUNDRED);
    });
  });

  // ─── Queries ─────────────────────────────────────────────────────────

  describe("queries", () => {
    it("reports decayed balance and age", () => {
      invite(h, ALICE, DAVE);
      h.clock.advance(30);

      expect(h.ledger.currentBalanceAndAge(ALICE, DAVE)).toEqual({ amount: units(70n), daysElapsed: 30 });
    });

    it("reports zero for a pair with no escrow", () => {
      expect(h.ledger.currentBalanceAndAge(ALICE, DAVE)).toEqual({ amount: 0n, daysElapsed: 0 });
    });

    it("rejects a clock that runs backwards", () => {
      invite(h, ALICE, DAVE);
      h.clock.set(9);

      expectEscrowError(() => h.ledger.currentBalanceAndAge(ALICE, DAVE), "INVALID_DAY");
      expectEscrowError(() => h.ledger.revokeAll(ALICE), "INVALID_DAY");
      expect(h.ledger.listInvitees(ALICE)).toEqual([DAVE]);
    });

    it("snapshots every escrow, oldest first", () => {
      invite(h, ALICE, DAVE);
      h.clock.advance(1);
      invite(h, BOB, ERIN);

      expect(h.ledger.snapshot()).toEqual({
        day: 11,
        relationships: [
          { inviter: ALICE, invitee: DAVE, faceValue: HUNDRED, lastUpdatedDay: 10 },
          { inviter: BOB, invitee: ERIN, faceValue: HUNDRED, lastUpdatedDay: 11 },
        ],
      });
    });

    it("is not busy outside a call", () => {
      expect(h.ledger.busy).toBe(false);
    });
  });
});
