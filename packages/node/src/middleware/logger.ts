/**
 * Request logging middleware.
 *
 * Hands one structured entry per request to the supplied log function;
 * main.ts routes it into pino.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
  now: () => number = Date.now,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: now() - start,
      requestId: c.get("requestId"),
    });
  };
}
