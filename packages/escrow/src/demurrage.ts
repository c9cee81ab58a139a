/**
 * @invite-escrow/escrow — Deterministic demurrage arithmetic.
 *
 * Balances lose 7% of their value per year, applied per whole day:
 *
 *   value(n) = floor(value(0) · γⁿ),   γ = 0.93^(1/365.25)
 *
 * γ is held as a 64.64 fixed-point bigint, so every projection is
 * reproducible bit for bit.
 *
 * Rules:
 * - No floating-point operations
 * - Always projected from the original amount, never compounded
 * - project(v, 0) === v
 */

import type { DecayFunction } from "./collaborators.js";
import { EscrowError } from "./types.js";

/** 1.0 in 64.64 fixed point. */
export const ONE_64X64 = 1n << 64n;

/** Daily retention factor γ in 64.64 fixed point. */
export const GAMMA_64X64 = 18443079296116538654n;

/**
 * Multiply two 64.64 fixed-point values, rounding down.
 */
export function mul64x64(a: bigint, b: bigint): bigint {
  return (a * b) >> 64n;
}

/**
 * Raise a 64.64 fixed-point base to a non-negative integer power by
 * repeated squaring, rounding down at every step.
 */
export function pow64x64(base: bigint, exponent: number): bigint {
  if (!Number.isSafeInteger(exponent) || exponent < 0) {
    throw new EscrowError(
      "INVALID_DAY",
      `Exponent must be a non-negative integer, got ${String(exponent)}`,
    );
  }

  let result = ONE_64X64;
  let factor = base;
  let remaining = BigInt(exponent);

  while (remaining > 0n) {
    if ((remaining & 1n) === 1n) {
      result = mul64x64(result, factor);
    }
    factor = mul64x64(factor, factor);
    remaining >>= 1n;
  }

  return result;
}

/**
 * The default decay curve.
 */
export class DemurrageDecay implements DecayFunction {
  private readonly _gamma: bigint;

  /**
   * @param gamma - Daily retention factor in 64.64 fixed point; must lie in (0, 1].
   */
  constructor(gamma: bigint = GAMMA_64X64) {
    if (gamma <= 0n || gamma > ONE_64X64) {
      throw new RangeError(`Retention factor must lie in (0, 1], got ${gamma.toString()}/2^64`);
    }
    this._gamma = gamma;
  }

  project(initialValue: bigint, elapsedDays: number): bigint {
    if (!Number.isSafeInteger(elapsedDays) || elapsedDays < 0) {
      throw new EscrowError(
        "INVALID_DAY",
        `Elapsed days must be a non-negative integer, got ${String(elapsedDays)}`,
        { elapsedDays },
      );
    }
    if (elapsedDays === 0 || initialValue === 0n) {
      return initialValue;
    }
    return (initialValue * pow64x64(this._gamma, elapsedDays)) >> 64n;
  }
}
