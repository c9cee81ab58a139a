/**
 * InMemoryIdentityRegistry — principals and day-bounded trust.
 *
 * Stands in for the external identity system behind the escrow ledger.
 *
 * Rules:
 * - A registered principal is eligible to invite
 * - A principal registered with `onboarded: false` is eligible but may
 *   still be invited
 * - Trust holds through its expiry day (inclusive); no expiry means
 *   until revoked
 */

import type { Address, DayIndex } from "@invite-escrow/types";
import type { Clock, IdentityOracle } from "@invite-escrow/escrow";

interface PrincipalEntry {
  readonly onboarded: boolean;
}

interface TrustEntry {
  readonly expiresOnDay: DayIndex | undefined;
}

export class InMemoryIdentityRegistry implements IdentityOracle {
  private readonly _principals = new Map<Address, PrincipalEntry>();
  private readonly _trust = new Map<string, TrustEntry>();

  constructor(private readonly _clock: Clock) {}

  // ─── Registration ───────────────────────────────────────────────────

  registerPrincipal(address: Address, onboarded = true): void {
    this._principals.set(address, { onboarded });
  }

  setTrust(truster: Address, trustee: Address, expiresOnDay?: DayIndex): void {
    this._trust.set(trustKey(truster, trustee), { expiresOnDay });
  }

  revokeTrust(truster: Address, trustee: Address): boolean {
    return this._trust.delete(trustKey(truster, trustee));
  }

  // ─── IdentityOracle ─────────────────────────────────────────────────

  isEligiblePrincipal(address: Address): boolean {
    return this._principals.has(address);
  }

  isOnboarded(address: Address): boolean {
    return this._principals.get(address)?.onboarded ?? false;
  }

  trusts(truster: Address, trustee: Address): boolean {
    const entry = this._trust.get(trustKey(truster, trustee));
    if (entry === undefined) {
      return false;
    }
    return entry.expiresOnDay === undefined || this._clock.today() <= entry.expiresOnDay;
  }
}

function trustKey(truster: Address, trustee: Address): string {
  return `${truster}:${trustee}`;
}
