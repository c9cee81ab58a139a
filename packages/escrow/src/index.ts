/**
 * @invite-escrow/escrow — Demurrage-adjusted invitation escrow engine.
 *
 * A pure TypeScript engine. Enforces:
 * - One active escrow per (inviter, invitee) pair
 * - Both relationship indexes agree with the record map after every call
 * - Balances decay per day and are always projected from the face value
 * - Every mutating call is all-or-nothing and rejects re-entrance
 * - All monetary arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - All types are readonly
 * - Records are never mutated in place
 * - Fail-closed: invalid calls throw, never silently succeed
 */

// Core engine
export { EscrowLedger } from "./escrow-ledger.js";
export type {
  EscrowLedgerOptions,
  CreateOptions,
  RedeemResult,
  RevokeAllResult,
} from "./escrow-ledger.js";

// Deposit entry point
export { AssetTransferHook } from "./transfer-hook.js";
export type { TransferNotification } from "./transfer-hook.js";
export { encodeCounterpart, decodeCounterpart, assetIdOf } from "./payload-codec.js";

// Building blocks
export { RelationshipIndex } from "./relationship-index.js";
export { ReentrancyGate } from "./reentrancy-gate.js";
export { Journal } from "./journal.js";

// Decay and time
export {
  DemurrageDecay,
  GAMMA_64X64,
  ONE_64X64,
  mul64x64,
  pow64x64,
} from "./demurrage.js";
export { SystemClock, ManualClock, SECONDS_PER_DAY } from "./clock.js";

// Collaborator contracts
export type {
  Clock,
  DecayFunction,
  IdentityOracle,
  ValueMover,
  HoldingsOracle,
  EscrowEventSink,
} from "./collaborators.js";

// Types
export type {
  EscrowCreated,
  EscrowSettled,
  EscrowNotification,
  EscrowErrorCode,
  AmountBounds,
  EscrowSnapshot,
} from "./types.js";

export {
  EscrowError,
  ONE_UNIT,
  MIN_ESCROW_AMOUNT,
  MAX_ESCROW_AMOUNT,
} from "./types.js";
