/**
 * InMemoryAssetBank — balances for the original and wrapped asset forms.
 *
 * Stands in for the asset registry. Deposits move original-form units
 * into the escrow account; the ledger's transfers pay out of it.
 *
 * Rules:
 * - Balances never go negative
 * - Every failed movement leaves all balances untouched
 */

import type { Address } from "@invite-escrow/types";
import type { HoldingsOracle, ValueMover } from "@invite-escrow/escrow";

export interface AccountBalances {
  readonly original: bigint;
  readonly wrapped: bigint;
}

export type AssetBankErrorCode = "INSUFFICIENT_BALANCE" | "INVALID_AMOUNT";

export class AssetBankError extends Error {
  constructor(
    public readonly code: AssetBankErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "AssetBankError";
  }
}

const EMPTY: AccountBalances = { original: 0n, wrapped: 0n };

export class InMemoryAssetBank implements ValueMover, HoldingsOracle {
  private readonly _accounts = new Map<Address, AccountBalances>();
  private _escrowed = 0n;

  // ─── Accounts ───────────────────────────────────────────────────────

  account(address: Address): AccountBalances {
    return this._accounts.get(address) ?? EMPTY;
  }

  mint(to: Address, amount: bigint): AccountBalances {
    this._assertPositive(amount);
    return this._credit(to, { original: amount, wrapped: 0n });
  }

  /** Throws unless `from` holds at least `amount` in original form. */
  assertCanDeposit(from: Address, amount: bigint): void {
    const held = this.account(from).original;
    if (held < amount) {
      throw new AssetBankError(
        "INSUFFICIENT_BALANCE",
        `${from} holds ${held.toString()}, needs ${amount.toString()}`,
      );
    }
  }

  /** Move original-form units from `from` into the escrow account. */
  deposit(from: Address, amount: bigint): void {
    this._assertPositive(amount);
    this.assertCanDeposit(from, amount);
    const current = this.account(from);
    this._accounts.set(from, { ...current, original: current.original - amount });
    this._escrowed += amount;
  }

  // ─── ValueMover ─────────────────────────────────────────────────────

  transferOriginal(to: Address, amount: bigint): void {
    this._withdraw(amount);
    this._credit(to, { original: amount, wrapped: 0n });
  }

  convertAndTransfer(to: Address, amount: bigint): void {
    this._withdraw(amount);
    this._credit(to, { original: 0n, wrapped: amount });
  }

  // ─── HoldingsOracle ─────────────────────────────────────────────────

  escrowedHoldings(): bigint {
    return this._escrowed;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _withdraw(amount: bigint): void {
    if (amount > this._escrowed) {
      throw new AssetBankError(
        "INSUFFICIENT_BALANCE",
        `Escrow account holds ${this._escrowed.toString()}, needs ${amount.toString()}`,
      );
    }
    this._escrowed -= amount;
  }

  private _credit(to: Address, delta: AccountBalances): AccountBalances {
    const current = this.account(to);
    const next = {
      original: current.original + delta.original,
      wrapped: current.wrapped + delta.wrapped,
    };
    this._accounts.set(to, next);
    return next;
  }

  private _assertPositive(amount: bigint): void {
    if (amount <= 0n) {
      throw new AssetBankError("INVALID_AMOUNT", `Amount must be positive, got ${amount.toString()}`);
    }
  }
}
