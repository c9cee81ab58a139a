/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps known domain errors (EscrowError, AssetBankError, etc.)
 * to appropriate HTTP status codes. Anything unmapped is a 500 whose
 * message never leaves the process.
 */

import type { Context } from "hono";
import { EscrowError } from "@invite-escrow/escrow";
import { createErrorEnvelope } from "../types/error.js";
import { RequestValidationError } from "./validate.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 403 | 404 | 409 | 422 | 500;

const STATUS_MAP: Readonly<Record<string, ErrorStatus>> = {
  // Request validation
  VALIDATION_ERROR: 400,

  // Escrow errors
  NO_SUCH_RELATIONSHIP: 404,
  DUPLICATE_RELATIONSHIP: 409,
  REENTRANT_CALL: 409,
  UNAUTHORIZED_CALLER: 403,
  OPERATOR_MISMATCH: 403,
  INELIGIBLE_PRINCIPAL: 403,
  TRUST_MISSING_OR_EXPIRED: 403,
  AMOUNT_OUT_OF_RANGE: 400,
  MALFORMED_PAYLOAD: 400,
  COUNTERPART_ALREADY_ONBOARDED: 400,
  INVALID_COUNTERPART: 400,

  // Asset bank errors
  INSUFFICIENT_BALANCE: 422,
  INVALID_AMOUNT: 400,
};

function codeOf(err: Error): string | undefined {
  if ("code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function detailsOf(err: Error): Readonly<Record<string, unknown>> | undefined {
  if (err instanceof RequestValidationError) {
    return err.issues.length > 0 ? { issues: err.issues } : undefined;
  }
  if (err instanceof EscrowError) {
    return err.details;
  }
  return undefined;
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = codeOf(err);
  const status = code !== undefined ? (STATUS_MAP[code] ?? 500) : 500;

  if (status === 500) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", err.message, detailsOf(err)), status);
}
