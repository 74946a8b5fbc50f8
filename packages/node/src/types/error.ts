/**
 * Error envelope types for API responses.
 *
 * All error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Codes the API can answer with. Engine error codes pass through
 * unchanged; the rest come from HTTP handling.
 */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "INVALID_INPUT"
  | "NOT_FOUND"
  | "LOAN_NOT_FOUND"
  | "DUPLICATE_LOAN_ID"
  | "INTERNAL_ERROR";

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  if (details !== undefined) {
    return { error: { code, message, details } };
  }
  return { error: { code, message } };
}
