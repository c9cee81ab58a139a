/**
 * Address Types
 *
 * Principals are identified by 20-byte hex addresses. Every address that
 * enters the escrow stack is normalized to its checksummed form so that
 * map keys and comparisons never depend on input casing.
 */

import { getAddress, isAddress as isHexAddress } from "viem";
import type { Address } from "viem";

export type { Address };

/**
 * Reserved marker terminating every relationship list. Never a valid
 * principal.
 */
export const SENTINEL: Address = "0x0000000000000000000000000000000000000001";

/** The zero address. Never a valid principal. */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/**
 * Normalize an address to its checksummed form.
 * Throws viem's InvalidAddressError for malformed input.
 */
export function normalizeAddress(value: string): Address {
  return getAddress(value);
}

/**
 * True when the value is a syntactically valid address, regardless of
 * checksum casing.
 */
export function isAddressLike(value: unknown): value is Address {
  return typeof value === "string" && isHexAddress(value, { strict: false });
}

/** True for the two addresses that can never take part in an escrow. */
export function isReservedAddress(address: Address): boolean {
  const normalized = normalizeAddress(address);
  return normalized === ZERO_ADDRESS || normalized === SENTINEL;
}
