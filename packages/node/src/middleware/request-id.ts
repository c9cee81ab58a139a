/**
 * Request ID middleware.
 *
 * Propagates a caller-supplied X-Request-Id header, or generates a UUID
 * when the header is missing or unusable. The ID is echoed on the
 * response and attached to every request log entry.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

const MAX_REQUEST_ID_LENGTH = 128;
const PRINTABLE = /^[\x21-\x7e]+$/;

function acceptable(value: string | undefined): value is string {
  return value !== undefined && value.length <= MAX_REQUEST_ID_LENGTH && PRINTABLE.test(value);
}

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId = acceptable(incoming) ? incoming : randomUUID();

    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
