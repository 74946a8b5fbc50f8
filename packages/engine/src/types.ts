/**
 * @payadvance/engine — Engine-internal types.
 *
 * Rules:
 * - Every failure is an AdvanceError with a code, never a bare Error
 * - Fail-closed: invalid input throws before the ledger is touched
 */

import type { LoanRecord } from "@payadvance/types";

// ─── Eligibility ─────────────────────────────────────────────────────────

/**
 * Salary-based eligibility and the advance ceiling derived from it.
 */
export interface EligibilityResult {
  readonly eligible: boolean;
  /** 0 when ineligible */
  readonly maxAdvance: number;
  readonly advanceApproved: boolean;
}

// ─── Ledger ──────────────────────────────────────────────────────────────

/** A loan record before the ledger has assigned its id. */
export type LoanDraft = Omit<LoanRecord, "loanId">;

/** Produces a fresh, collision-resistant loan id. */
export type LoanIdGenerator = () => string;

// ─── Orchestration ───────────────────────────────────────────────────────

export interface DecideOptions {
  /**
   * Return the amortization schedule as CSV instead of the decision.
   * Only takes effect when loan math runs; the export is not recorded.
   */
  readonly exportCsv?: boolean | undefined;
}

export interface OrchestratorOptions {
  /** Clock for LoanRecord timestamps. Default: system time. */
  readonly now?: (() => Date) | undefined;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for engine operations. */
export type AdvanceErrorCode =
  | "INVALID_INPUT"
  | "LOAN_NOT_FOUND"
  | "DUPLICATE_LOAN_ID"
  | "INTERNAL_ERROR";

/**
 * Structured error from the advance engine.
 * Always thrown — never returned.
 */
export class AdvanceError extends Error {
  public readonly code: AdvanceErrorCode;

  constructor(code: AdvanceErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AdvanceError";
    this.code = code;
  }
}
