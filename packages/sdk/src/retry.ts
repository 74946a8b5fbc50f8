/**
 * @payadvance/sdk — Fixed-delay retry.
 *
 * Generic retry utility for transient failures. Used by HttpClient to
 * ride out a service that is restarting or briefly unreachable.
 *
 * Every retry waits the same delay; there is no backoff and no jitter.
 */

/**
 * Configuration for retry behavior.
 */
export interface RetryConfig {
  /** Maximum number of attempts (including the first try). Default: 10 */
  readonly maxAttempts: number;
  /** Delay in ms between attempts. Default: 5000 */
  readonly delayMs: number;
}

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 10,
  delayMs: 5000,
};

/**
 * Error thrown when all retry attempts are exhausted.
 */
export class RetryExhaustedError extends Error {
  constructor(
    /** Number of attempts made */
    public readonly attempts: number,
    /** The last error encountered */
    public readonly lastError: unknown,
  ) {
    const msg = lastError instanceof Error ? lastError.message : String(lastError);
    super(`All ${attempts} retry attempts exhausted. Last error: ${msg}`);
    this.name = "RetryExhaustedError";
  }
}

/**
 * Sleep for the specified duration.
 * Extracted for testability — can be mocked in tests.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry on failure.
 *
 * @param fn - The async function to execute
 * @param config - Retry configuration
 * @param shouldRetry - Predicate to determine if an error is retryable (default: all errors)
 * @param sleepFn - Sleep function (injectable for testing)
 * @returns The result of the function
 * @throws RetryExhaustedError if all attempts fail
 * @throws The original error if shouldRetry returns false
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  shouldRetry: (err: unknown) => boolean = () => true,
  sleepFn: (ms: number) => Promise<void> = sleep,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt < config.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      lastError = err;

      if (!shouldRetry(err)) {
        throw err;
      }

      // No sleep after the last attempt
      if (attempt < config.maxAttempts - 1) {
        await sleepFn(config.delayMs);
      }
    }
  }

  throw new RetryExhaustedError(config.maxAttempts, lastError);
}
