/**
 * @payadvance/sdk — Typed client for the PayAdvance service.
 *
 * @example
 * ```ts
 * import { PayAdvanceClient } from "@payadvance/sdk";
 *
 * const client = new PayAdvanceClient({ baseUrl: "http://localhost:8000" });
 * const decision = await client.computeAdvance({
 *   grossSalary: 4000,
 *   payFrequency: "Monthly",
 *   advanceAmount: 1000,
 * });
 * console.log(decision.message);
 * ```
 */

export { PayAdvanceClient } from "./client.js";
export type { HealthStatus } from "./client.js";
export { HttpClient } from "./http-client.js";
export type { RequestOptions } from "./http-client.js";
export { PayAdvanceError } from "./types.js";
export type {
  PayAdvanceClientConfig,
  PayAdvanceResponse,
  LoanList,
  ClientErrorCode,
} from "./types.js";
export { DEFAULT_RETRY_CONFIG } from "./retry.js";
export type { RetryConfig } from "./retry.js";
