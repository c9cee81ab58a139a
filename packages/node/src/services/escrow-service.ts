/**
 * EscrowService — Composition root for the escrow stack.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. Wires the ledger to the in-memory identity registry,
 * the asset bank and the hash-chained event store.
 */

import type { Logger } from "pino";
import type { Address, BalanceAndAge, DayIndex } from "@invite-escrow/types";
import {
  AssetTransferHook,
  EscrowLedger,
  assetIdOf,
  encodeCounterpart,
} from "@invite-escrow/escrow";
import type {
  AmountBounds,
  Clock,
  DecayFunction,
  EscrowCreated,
  EscrowEventSink,
  EscrowNotification,
  EscrowSettled,
  RedeemResult,
  RevokeAllResult,
} from "@invite-escrow/escrow";
import { EventStoreSink, InMemoryEventStore } from "@invite-escrow/event-store";
import type {
  EventStoreIntegrityResult,
  ReadAllOptions,
  StoredEvent,
} from "@invite-escrow/event-store";
import { InMemoryIdentityRegistry } from "./identity-registry.js";
import { InMemoryAssetBank } from "./asset-bank.js";
import type { AccountBalances } from "./asset-bank.js";

// =============================================================================
// Configuration
// =============================================================================

export interface EscrowServiceConfig {
  readonly clock: Clock;
  readonly registry: Address;
  readonly bounds?: AmountBounds | undefined;
  readonly decay?: DecayFunction | undefined;
  /** Receives every committed notification at info level. */
  readonly logger?: Logger | undefined;
}

// =============================================================================
// Sink
// =============================================================================

/**
 * Appends committed notifications to the event store, then logs them.
 */
class LoggingEventSink implements EscrowEventSink {
  constructor(
    private readonly _inner: EscrowEventSink,
    private readonly _logger: Logger | undefined,
  ) {}

  publish(notifications: readonly EscrowNotification[]): void {
    this._inner.publish(notifications);
    for (const n of notifications) {
      this._logger?.info(
        { kind: n.kind, inviter: n.inviter, invitee: n.invitee, amount: n.amount.toString(), day: n.day },
        `escrow ${n.kind}`,
      );
    }
  }
}

// =============================================================================
// Service
// =============================================================================

export class EscrowService {
  readonly identity: InMemoryIdentityRegistry;
  readonly bank: InMemoryAssetBank;
  readonly eventStore: InMemoryEventStore;
  readonly ledger: EscrowLedger;
  readonly hook: AssetTransferHook;

  private readonly _clock: Clock;

  constructor(config: EscrowServiceConfig) {
    this._clock = config.clock;
    this.identity = new InMemoryIdentityRegistry(config.clock);
    this.bank = new InMemoryAssetBank();
    this.eventStore = new InMemoryEventStore();

    this.ledger = new EscrowLedger({
      identity: this.identity,
      values: this.bank,
      clock: config.clock,
      decay: config.decay,
      bounds: config.bounds,
      holdings: this.bank,
      sink: new LoggingEventSink(new EventStoreSink(this.eventStore), config.logger),
    });
    this.hook = new AssetTransferHook(this.ledger, config.registry);
  }

  today(): DayIndex {
    return this._clock.today();
  }

  // ─── Identity ──────────────────────────────────────────────────────

  registerPrincipal(address: Address, onboarded: boolean): void {
    this.identity.registerPrincipal(address, onboarded);
  }

  setTrust(truster: Address, trustee: Address, expiresOnDay?: DayIndex): void {
    this.identity.setTrust(truster, trustee, expiresOnDay);
  }

  /** Returns false when there was no trust to withdraw. */
  revokeTrust(truster: Address, trustee: Address): boolean {
    return this.identity.revokeTrust(truster, trustee);
  }

  // ─── Assets ────────────────────────────────────────────────────────

  mint(to: Address, amount: bigint): AccountBalances {
    return this.bank.mint(to, amount);
  }

  account(address: Address): AccountBalances {
    return this.bank.account(address);
  }

  // ─── Escrow ────────────────────────────────────────────────────────

  /**
   * Lock `amount` from `inviter` for `invitee`, the way the asset
   * registry would: the balance moves only if the ledger holds the new
   * escrow, including when the ledger committed it and then failed to
   * publish.
   */
  createEscrow(inviter: Address, invitee: Address, amount: bigint): EscrowCreated {
    this.bank.assertCanDeposit(inviter, amount);
    const existed = this.ledger.getRecord(inviter, invitee) !== undefined;

    let created: EscrowCreated;
    try {
      created = this.hook.onReceived({
        registry: this.hook.registry,
        operator: inviter,
        from: inviter,
        assetId: assetIdOf(inviter),
        amount,
        data: encodeCounterpart(invitee),
      });
    } catch (err: unknown) {
      if (!existed && this.ledger.getRecord(inviter, invitee) !== undefined) {
        this.bank.deposit(inviter, amount);
      }
      throw err;
    }

    this.bank.deposit(inviter, amount);
    return created;
  }

  redeem(invitee: Address, inviter: Address): RedeemResult {
    return this.ledger.redeem(invitee, inviter);
  }

  revokeOne(inviter: Address, invitee: Address): EscrowSettled {
    return this.ledger.revokeOne(inviter, invitee);
  }

  revokeAll(inviter: Address): RevokeAllResult {
    return this.ledger.revokeAll(inviter);
  }

  balanceAndAge(inviter: Address, invitee: Address): BalanceAndAge {
    return this.ledger.currentBalanceAndAge(inviter, invitee);
  }

  listInviters(invitee: Address): readonly Address[] {
    return this.ledger.listInviters(invitee);
  }

  listInvitees(inviter: Address): readonly Address[] {
    return this.ledger.listInvitees(inviter);
  }

  // ─── Events ────────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }
}
