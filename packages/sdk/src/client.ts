/**
 * @payadvance/sdk — PayAdvance Client.
 *
 * Main entry point for the PayAdvance SDK.
 *
 * Design:
 * - Delegates to HttpClient for transport and retry
 * - Maps snake_case wire payloads to camelCase domain types
 * - The CSV export is its own call, so a failed export never
 *   re-issues the decision that preceded it
 */

import type {
  AdvanceDecision,
  AdvanceRequest,
  LoanRecord,
  ScheduleExport,
} from "@payadvance/types";
import type { LoanList, PayAdvanceClientConfig } from "./types.js";
import { HttpClient } from "./http-client.js";
import {
  decodeDecision,
  decodeLoanList,
  decodeLoanRecord,
  decodeScheduleExport,
  toWireRequest,
} from "./wire.js";

export interface HealthStatus {
  readonly status: string;
}

/**
 * Client for the PayAdvance service.
 *
 * @example
 * ```ts
 * const client = new PayAdvanceClient({ baseUrl: "http://localhost:8000" });
 * const decision = await client.computeAdvance({
 *   grossSalary: 4000,
 *   payFrequency: "Monthly",
 *   advanceAmount: 1000,
 * });
 * ```
 */
export class PayAdvanceClient {
  private readonly http: HttpClient;

  constructor(config: PayAdvanceClientConfig) {
    this.http = new HttpClient(config);
  }

  /**
   * Ask the service for a decision. Approved decisions are recorded
   * server-side and carry a loanId.
   */
  async computeAdvance(request: AdvanceRequest): Promise<AdvanceDecision> {
    const res = await this.http.post("/calculate_advance", toWireRequest(request));
    return decodeDecision(res.data);
  }

  /**
   * Fetch the amortization schedule as CSV in a single attempt.
   * Nothing is recorded.
   *
   * Resolves to undefined when the request yields no schedule
   * (ineligible, rejected, or no complete loan terms).
   */
  async exportSchedule(request: AdvanceRequest): Promise<ScheduleExport | undefined> {
    const res = await this.http.post(
      "/calculate_advance?export_csv=true",
      toWireRequest(request),
      { retry: false },
    );
    return decodeScheduleExport(res.data);
  }

  async getLoan(loanId: string): Promise<LoanRecord> {
    const res = await this.http.get(`/loan/${encodeURIComponent(loanId)}`);
    return decodeLoanRecord(res.data);
  }

  async listLoans(): Promise<LoanList> {
    const res = await this.http.get("/loans");
    return decodeLoanList(res.data);
  }

  async health(): Promise<HealthStatus> {
    const res = await this.http.get("/health");
    const data = res.data;
    const status =
      data !== null && typeof data === "object" && "status" in data && typeof data.status === "string"
        ? data.status
        : "unknown";
    return { status };
  }
}
