/**
 * Zod request validation.
 *
 * Parses request bodies, path params and query strings against Zod
 * schemas. Failures throw RequestValidationError, which the error
 * handler renders as 400 VALIDATION_ERROR with the issues attached.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";

export interface ValidationIssue {
  readonly path: string;
  readonly message: string;
}

export class RequestValidationError extends Error {
  readonly code = "VALIDATION_ERROR";

  constructor(
    message: string,
    public readonly issues: readonly ValidationIssue[] = [],
  ) {
    super(message);
    this.name = "RequestValidationError";
  }
}

/**
 * Parse the JSON request body against a schema.
 */
export async function readBody<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new RequestValidationError("Invalid JSON in request body");
  }
  return parseWith(schema, body, "Request body validation failed");
}

/**
 * Parse route params against a schema.
 */
export function readParams<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): T {
  return parseWith(schema, c.req.param(), "Invalid path parameters");
}

/**
 * Parse the query string against a schema.
 */
export function readQuery<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): T {
  return parseWith(schema, c.req.query(), "Invalid query parameters");
}

function parseWith<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  input: unknown,
  message: string,
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new RequestValidationError(message, formatZodErrors(result.error));
  }
  return result.data;
}

function formatZodErrors(error: ZodError): readonly ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
