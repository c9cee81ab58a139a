/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Addresses are normalized to their checksummed form; amounts are
 * decimal strings of base units and parse to bigint.
 */

import { z } from "zod";
import { isAddressLike, normalizeAddress } from "@invite-escrow/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AddressSchema = z
  .string()
  .refine(isAddressLike, { message: "Expected a 20-byte hex address" })
  .transform((value) => normalizeAddress(value));

export const AmountSchema = z
  .string()
  .regex(/^[0-9]+$/, "Expected a non-negative integer in base units")
  .transform((value) => BigInt(value));

export const DaySchema = z.number().int().min(0);

// =============================================================================
// Identity DTOs
// =============================================================================

export const RegisterPrincipalSchema = z.object({
  address: AddressSchema,
  onboarded: z.boolean().default(true),
});

export type RegisterPrincipalDto = z.infer<typeof RegisterPrincipalSchema>;

export const SetTrustSchema = z.object({
  truster: AddressSchema,
  trustee: AddressSchema,
  expiresOnDay: DaySchema.optional(),
});

export type SetTrustDto = z.infer<typeof SetTrustSchema>;

// =============================================================================
// Asset DTOs
// =============================================================================

export const MintSchema = z.object({
  to: AddressSchema,
  amount: AmountSchema,
});

export type MintDto = z.infer<typeof MintSchema>;

// =============================================================================
// Escrow DTOs
// =============================================================================

export const CreateEscrowSchema = z.object({
  inviter: AddressSchema,
  invitee: AddressSchema,
  amount: AmountSchema,
});

export type CreateEscrowDto = z.infer<typeof CreateEscrowSchema>;

export const RedeemSchema = z.object({
  invitee: AddressSchema,
  inviter: AddressSchema,
});

export type RedeemDto = z.infer<typeof RedeemSchema>;

export const RevokeSchema = z.object({
  inviter: AddressSchema,
  invitee: AddressSchema,
});

export type RevokeDto = z.infer<typeof RevokeSchema>;

export const RevokeAllSchema = z.object({
  inviter: AddressSchema,
});

export type RevokeAllDto = z.infer<typeof RevokeAllSchema>;

export const PairParamsSchema = z.object({
  inviter: AddressSchema,
  invitee: AddressSchema,
});

export const TrustParamsSchema = z.object({
  truster: AddressSchema,
  trustee: AddressSchema,
});

export const InviteeParamsSchema = z.object({ invitee: AddressSchema });

export const InviterParamsSchema = z.object({ inviter: AddressSchema });

export const AccountParamsSchema = z.object({ address: AddressSchema });

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = z.object({
  afterPosition: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
