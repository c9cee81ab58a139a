/**
 * @invite-escrow/escrow — Call-scoped reentrancy guard.
 *
 * One flag per ledger. Set on entry to a guarded operation, cleared on
 * every exit path. A guarded call made while the flag is set fails
 * before touching any state.
 */

import { EscrowError } from "./types.js";

export class ReentrancyGate {
  private _held = false;

  /** Whether a guarded operation is currently running. */
  get held(): boolean {
    return this._held;
  }

  /**
   * Run `operation` while holding the gate.
   * Throws REENTRANT_CALL if the gate is already held.
   */
  run<T>(name: string, operation: () => T): T {
    if (this._held) {
      throw new EscrowError(
        "REENTRANT_CALL",
        `Reentrant call into ${name} while another escrow operation is in progress`,
        { operation: name },
      );
    }

    this._held = true;
    try {
      return operation();
    } finally {
      this._held = false;
    }
  }
}
