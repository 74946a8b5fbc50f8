/**
 * @payadvance/sdk — SDK types.
 *
 * Types specific to the SDK client layer.
 * Domain types are imported from @payadvance/types.
 */

import type { LoanRecord } from "@payadvance/types";

// =============================================================================
// Client Configuration
// =============================================================================

/**
 * Configuration for the PayAdvance SDK client.
 */
export interface PayAdvanceClientConfig {
  /** Base URL of the PayAdvance service (e.g., "http://localhost:8000") */
  readonly baseUrl: string;
  /** Per-attempt timeout in milliseconds (default: 5000) */
  readonly timeout?: number | undefined;
  /** Total attempts for transient failures, including the first (default: 10) */
  readonly maxAttempts?: number | undefined;
  /** Fixed delay between attempts in milliseconds (default: 5000) */
  readonly retryDelayMs?: number | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
  /** Custom sleep function (for testing) */
  readonly sleepFn?: ((ms: number) => Promise<void>) | undefined;
}

// =============================================================================
// Response Types
// =============================================================================

/**
 * A decoded response from the service.
 */
export interface PayAdvanceResponse<T> {
  /** Response payload */
  readonly data: T;
  /** HTTP status code */
  readonly status: number;
  /** Response headers (selected) */
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Every loan in the service's ledger.
 */
export interface LoanList {
  readonly data: readonly LoanRecord[];
  readonly total: number;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Codes raised by the SDK itself. Server error codes
 * (e.g. "INVALID_INPUT", "LOAN_NOT_FOUND") pass through as sent.
 */
export type ClientErrorCode =
  | "NETWORK_ERROR"
  | "TIMEOUT"
  | "SERVER_ERROR"
  | "CLIENT_ERROR"
  | "INVALID_RESPONSE";

/**
 * Structured error from the PayAdvance service or transport.
 */
export class PayAdvanceError extends Error {
  /** Error code from the API or the transport */
  readonly code: string;
  /** HTTP status code; 0 when no response arrived */
  readonly statusCode: number;
  /** Additional error details (validation issues, etc.) */
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode: number, details?: unknown) {
    super(message);
    this.name = "PayAdvanceError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }

  /** Network failures, timeouts and 5xx answers may succeed on another try. */
  get transient(): boolean {
    return this.statusCode === 0 || this.statusCode >= 500;
  }
}
