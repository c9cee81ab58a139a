/**
 * Type barrel — re-exports all public types from @invite-escrow/node.
 */

// DTOs
export {
  AddressSchema,
  AmountSchema,
  DaySchema,
  RegisterPrincipalSchema,
  SetTrustSchema,
  MintSchema,
  CreateEscrowSchema,
  RedeemSchema,
  RevokeSchema,
  RevokeAllSchema,
  PairParamsSchema,
  InviteeParamsSchema,
  InviterParamsSchema,
  AccountParamsSchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type {
  RegisterPrincipalDto,
  SetTrustDto,
  MintDto,
  CreateEscrowDto,
  RedeemDto,
  RevokeDto,
  RevokeAllDto,
  ListEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
