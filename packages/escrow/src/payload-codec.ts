/**
 * @invite-escrow/escrow — Transfer payload codec.
 *
 * The asset registry forwards an opaque payload with every transfer. For
 * an invitation it is exactly one ABI-encoded `address`: a 32-byte word
 * holding the invitee, left-padded with zeros.
 */

import {
  decodeAbiParameters,
  encodeAbiParameters,
  hexToBigInt,
  isHex,
} from "viem";
import type { Hex } from "viem";
import { normalizeAddress } from "@invite-escrow/types";
import type { Address } from "@invite-escrow/types";
import { EscrowError } from "./types.js";

const COUNTERPART_PARAMS = [{ type: "address", name: "invitee" }] as const;

const ADDRESS_BITS = 160n;

/** "0x" followed by one 32-byte word. */
const WORD_HEX_LENGTH = 2 + 64;

/**
 * Encode an invitee address as a transfer payload.
 */
export function encodeCounterpart(invitee: Address): Hex {
  return encodeAbiParameters(COUNTERPART_PARAMS, [invitee]);
}

/**
 * Decode a transfer payload into the invitee address.
 * Throws MALFORMED_PAYLOAD unless the payload is one clean address word.
 */
export function decodeCounterpart(data: string): Address {
  if (!isHex(data, { strict: true }) || data.length !== WORD_HEX_LENGTH) {
    throw new EscrowError(
      "MALFORMED_PAYLOAD",
      "Payload must be exactly one 32-byte ABI word",
      { payload: data },
    );
  }

  if (hexToBigInt(data) >> ADDRESS_BITS !== 0n) {
    throw new EscrowError(
      "MALFORMED_PAYLOAD",
      "Payload word has non-zero bits above the 20-byte address",
      { payload: data },
    );
  }

  const [invitee] = decodeAbiParameters(COUNTERPART_PARAMS, data);
  return normalizeAddress(invitee);
}

/**
 * Id of the personal asset class owned by `owner`: the address read as
 * an unsigned 160-bit integer.
 */
export function assetIdOf(owner: Address): bigint {
  return hexToBigInt(normalizeAddress(owner));
}
