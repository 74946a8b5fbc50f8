/**
 * Request ID middleware.
 *
 * Propagates the caller's X-Request-Id or mints a UUID, and echoes it on
 * the response so clients can quote it when reporting a failed decision.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

/** Longest caller-supplied id we accept; longer ones are replaced. */
const MAX_REQUEST_ID_LENGTH = 128;

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      incoming !== undefined && incoming.length > 0 && incoming.length <= MAX_REQUEST_ID_LENGTH
        ? incoming
        : randomUUID();

    c.set("requestId", requestId);
    await next();
    c.header(REQUEST_ID_HEADER, requestId);
  };
}
