/**
 * @payadvance/sdk — HTTP Client.
 *
 * Wraps native fetch() with:
 * - Request ID generation
 * - Per-attempt timeout handling
 * - Fixed-delay retry for network errors, timeouts and 5xx
 * - Error normalization into PayAdvanceError
 *
 * Design:
 * - Zero external dependencies (uses native fetch)
 * - 4xx answers are final and never retried
 * - Custom fetch and sleep functions for testing
 */

import type { PayAdvanceClientConfig, PayAdvanceResponse } from "./types.js";
import { PayAdvanceError } from "./types.js";
import { DEFAULT_RETRY_CONFIG, RetryExhaustedError, sleep, withRetry } from "./retry.js";
import type { RetryConfig } from "./retry.js";

// =============================================================================
// Internal Helpers
// =============================================================================

/** Generate a simple request ID */
function generateRequestId(): string {
  return `sdk-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

/**
 * Parse a response body as JSON, handling empty responses.
 */
async function parseResponseBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    return { raw: text };
  }
}

/**
 * Extract selected headers from a Response.
 */
function extractHeaders(response: Response): Record<string, string> {
  const result: Record<string, string> = {};
  const interestingHeaders = ["content-type", "content-disposition", "x-request-id"];

  for (const name of interestingHeaders) {
    const value = response.headers.get(name);
    if (value !== null) {
      result[name] = value;
    }
  }

  return result;
}

interface ErrorFields {
  readonly code?: string | undefined;
  readonly message?: string | undefined;
  readonly details?: unknown;
}

/**
 * Pull `{ error: { code, message, details } }` out of a body, if present.
 */
function errorFields(body: unknown): ErrorFields {
  if (body === null || typeof body !== "object" || !("error" in body)) {
    return {};
  }
  const error = body.error;
  if (error === null || typeof error !== "object") {
    return {};
  }
  const e = error as Record<string, unknown>;
  return {
    code: typeof e.code === "string" ? e.code : undefined,
    message: typeof e.message === "string" ? e.message : undefined,
    details: e.details,
  };
}

function isTransient(err: unknown): boolean {
  return err instanceof PayAdvanceError && err.transient;
}

// =============================================================================
// HTTP Client
// =============================================================================

/** Per-call options. */
export interface RequestOptions {
  /** Set to false to send exactly one attempt. Default: true */
  readonly retry?: boolean | undefined;
}

/**
 * Low-level HTTP client for the PayAdvance service.
 *
 * Bodies come back undecoded; PayAdvanceClient narrows them into
 * domain types.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly retry: RetryConfig;
  private readonly fetchFn: typeof fetch;
  private readonly sleepFn: (ms: number) => Promise<void>;

  constructor(config: PayAdvanceClientConfig) {
    // Strip trailing slash
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeout = config.timeout ?? 5000;
    this.retry = {
      maxAttempts: Math.max(1, config.maxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts),
      delayMs: config.retryDelayMs ?? DEFAULT_RETRY_CONFIG.delayMs,
    };
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
    this.sleepFn = config.sleepFn ?? sleep;
  }

  /**
   * Perform a GET request.
   */
  async get(path: string, options?: RequestOptions): Promise<PayAdvanceResponse<unknown>> {
    return this.request("GET", path, undefined, options);
  }

  /**
   * Perform a POST request with a JSON body.
   */
  async post(
    path: string,
    body: unknown,
    options?: RequestOptions,
  ): Promise<PayAdvanceResponse<unknown>> {
    return this.request("POST", path, body, options);
  }

  /**
   * Core request method: one request id for every attempt.
   *
   * @throws PayAdvanceError with the server's code for a 4xx, or with
   *   the last transient failure once attempts run out
   */
  private async request(
    method: string,
    path: string,
    body?: unknown,
    options?: RequestOptions,
  ): Promise<PayAdvanceResponse<unknown>> {
    const url = `${this.baseUrl}${path}`;

    const init: RequestInit = {
      method,
      headers: {
        "Content-Type": "application/json",
        "Accept": "application/json",
        "X-Request-Id": generateRequestId(),
      },
    };

    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    try {
      return await withRetry(
        () => this.attempt(url, init),
        options?.retry === false ? { ...this.retry, maxAttempts: 1 } : this.retry,
        isTransient,
        this.sleepFn,
      );
    } catch (err: unknown) {
      if (err instanceof RetryExhaustedError && err.lastError instanceof PayAdvanceError) {
        throw err.lastError;
      }
      throw err;
    }
  }

  /**
   * A single attempt. Every failure is thrown as a PayAdvanceError.
   */
  private async attempt(url: string, init: RequestInit): Promise<PayAdvanceResponse<unknown>> {
    const response = await this.fetchWithTimeout(url, init);
    const responseBody = await parseResponseBody(response);

    // 2xx → success
    if (response.ok) {
      return {
        data: responseBody,
        status: response.status,
        headers: extractHeaders(response),
      };
    }

    const fields = errorFields(responseBody);

    // 4xx → client errors, final
    if (response.status >= 400 && response.status < 500) {
      throw new PayAdvanceError(
        fields.code ?? "CLIENT_ERROR",
        fields.message ?? `HTTP ${response.status}`,
        response.status,
        fields.details,
      );
    }

    throw new PayAdvanceError(
      fields.code ?? "SERVER_ERROR",
      fields.message ?? `HTTP ${response.status}`,
      response.status,
      fields.details,
    );
  }

  /**
   * Fetch with a timeout using AbortController.
   */
  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await this.fetchFn(url, {
        ...init,
        signal: controller.signal,
      });
    } catch (error: unknown) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new PayAdvanceError(
          "TIMEOUT",
          `Request timed out after ${this.timeout}ms`,
          0,
        );
      }
      throw new PayAdvanceError(
        "NETWORK_ERROR",
        error instanceof Error ? error.message : "Network error",
        0,
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
