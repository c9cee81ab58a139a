/**
 * Response shapes.
 *
 * bigint is not JSON; every amount leaves the API as a decimal string.
 */

import type { BalanceAndAge } from "@invite-escrow/types";
import type { EscrowNotification, RedeemResult, RevokeAllResult } from "@invite-escrow/escrow";
import type { StoredEvent } from "@invite-escrow/event-store";
import type { AccountBalances } from "../services/asset-bank.js";

export interface NotificationView {
  readonly kind: EscrowNotification["kind"];
  readonly inviter: string;
  readonly invitee: string;
  readonly amount: string;
  readonly day: number;
}

export function presentNotification(n: EscrowNotification): NotificationView {
  return {
    kind: n.kind,
    inviter: n.inviter,
    invitee: n.invitee,
    amount: n.amount.toString(),
    day: n.day,
  };
}

export function presentRedeem(result: RedeemResult) {
  return {
    redeemed: presentNotification(result.redeemed),
    refunded: result.refunded.map(presentNotification),
  };
}

export function presentRevokeAll(result: RevokeAllResult) {
  return {
    revoked: result.revoked.map(presentNotification),
    total: result.total.toString(),
    transferred: result.transferred.toString(),
  };
}

export function presentBalance(balance: BalanceAndAge) {
  return { amount: balance.amount.toString(), daysElapsed: balance.daysElapsed };
}

export function presentAccount(address: string, balances: AccountBalances) {
  return {
    address,
    original: balances.original.toString(),
    wrapped: balances.wrapped.toString(),
  };
}

export function presentEvent(stored: StoredEvent) {
  return {
    globalPosition: stored.globalPosition,
    streamId: stored.streamId,
    version: stored.version,
    type: stored.event.type,
    metadata: stored.event.metadata,
    payload: stored.event.payload,
    appendedAt: stored.appendedAt,
    hash: stored.hash,
    previousHash: stored.previousHash,
  };
}
