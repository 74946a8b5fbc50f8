/**
 * Global error handler.
 *
 * Catches everything thrown by route handlers and answers with the error
 * envelope. Engine errors map to a status by code; anything else is a
 * 500 whose message is never passed through.
 */

import type { Context, ErrorHandler, NotFoundHandler } from "hono";
import { AdvanceError } from "@payadvance/engine";
import type { AdvanceErrorCode } from "@payadvance/engine";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Engine Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 404 | 500;

const STATUS_MAP: Readonly<Record<AdvanceErrorCode, ErrorStatus>> = {
  INVALID_INPUT: 400,
  LOAN_NOT_FOUND: 404,
  // A repeated id is a generator fault, not a caller error
  DUPLICATE_LOAN_ID: 500,
  INTERNAL_ERROR: 500,
};

const INTERNAL_MESSAGE = "Internal server error";

export interface ErrorHandlerOptions {
  /** Called for every error answered with a 500, with the request id. */
  readonly onInternalError?: ((err: Error, requestId: string) => void) | undefined;
}

// =============================================================================
// Handlers
// =============================================================================

/**
 * Create the onError handler for the app.
 */
export function createErrorHandler(
  options?: ErrorHandlerOptions,
): ErrorHandler<AppEnv> {
  return (err: Error, c: Context<AppEnv>): Response => {
    if (err instanceof AdvanceError) {
      const status = STATUS_MAP[err.code];
      if (status !== 500) {
        return c.json(createErrorEnvelope(err.code, err.message), status);
      }
    }

    options?.onInternalError?.(err, c.get("requestId"));
    return c.json(createErrorEnvelope("INTERNAL_ERROR", INTERNAL_MESSAGE), 500);
  };
}

/**
 * Envelope for unmatched routes.
 */
export const handleNotFound: NotFoundHandler<AppEnv> = (c) => {
  return c.json(
    createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`),
    404,
  );
};
