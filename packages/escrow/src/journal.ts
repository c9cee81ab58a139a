/**
 * @invite-escrow/escrow — Per-call undo journal.
 *
 * Every mutation made by a ledger call registers its inverse here, and
 * every notification is buffered here. On commit the inverses are
 * discarded and the notifications released; on rollback the inverses run
 * newest-first and the buffer is dropped, leaving the ledger exactly as
 * it was before the call. Once committed, a rollback has nothing to undo.
 */

import type { EscrowNotification } from "./types.js";

export class Journal {
  private readonly _undo: (() => void)[] = [];
  private readonly _notifications: EscrowNotification[] = [];

  /** Register the inverse of a mutation that has just been applied. */
  record(undo: () => void): void {
    this._undo.push(undo);
  }

  emit(notification: EscrowNotification): void {
    this._notifications.push(notification);
  }

  get notifications(): readonly EscrowNotification[] {
    return this._notifications;
  }

  /** Make every recorded mutation permanent and release the notifications. */
  commit(): readonly EscrowNotification[] {
    const released = [...this._notifications];
    this._undo.length = 0;
    this._notifications.length = 0;
    return released;
  }

  /** Undo every recorded mutation, newest first. */
  rollback(): void {
    for (let i = this._undo.length - 1; i >= 0; i--) {
      const undo = this._undo[i];
      if (undo !== undefined) {
        undo();
      }
    }
    this._undo.length = 0;
    this._notifications.length = 0;
  }
}
