/**
 * @invite-escrow/escrow — Asset transfer hook.
 *
 * Entry point for deposits. The asset registry notifies the escrow of
 * every incoming transfer; a valid notification becomes a create() on
 * the ledger.
 */

import { normalizeAddress } from "@invite-escrow/types";
import type { Address } from "@invite-escrow/types";
import type { EscrowLedger } from "./escrow-ledger.js";
import { decodeCounterpart } from "./payload-codec.js";
import type { EscrowCreated } from "./types.js";
import { EscrowError } from "./types.js";

/**
 * A single-asset transfer into the escrow, as reported by the registry.
 */
export interface TransferNotification {
  /** Component delivering the notification. */
  readonly registry: Address;
  /** Principal that initiated the transfer. */
  readonly operator: Address;
  /** Principal whose balance was debited. */
  readonly from: Address;
  readonly assetId: bigint;
  readonly amount: bigint;
  /** ABI-encoded invitee address. */
  readonly data: string;
}

export class AssetTransferHook {
  private readonly _ledger: EscrowLedger;
  private readonly _registry: Address;

  constructor(ledger: EscrowLedger, registry: Address) {
    this._ledger = ledger;
    this._registry = normalizeAddress(registry);
  }

  get registry(): Address {
    return this._registry;
  }

  /**
   * Validate a transfer notification and lock its amount.
   *
   * The registry must be the configured one and the payload must name
   * the invitee. The operator, the source and the owner of the
   * transferred asset class must all be the same principal; create()
   * checks that right after the source's eligibility.
   */
  onReceived(notification: TransferNotification): EscrowCreated {
    if (normalizeAddress(notification.registry) !== this._registry) {
      throw new EscrowError(
        "UNAUTHORIZED_CALLER",
        `Transfer notifications are only accepted from "${this._registry}"`,
        { caller: notification.registry },
      );
    }

    const invitee = decodeCounterpart(notification.data);

    return this._ledger.create(notification.from, invitee, notification.amount, {
      operator: notification.operator,
      assetId: notification.assetId,
    });
  }
}
