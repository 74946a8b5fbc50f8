/**
 * Advance Types
 *
 * The request an applicant submits and the decision the engine returns.
 *
 * Rules:
 * - Monetary values are plain numbers rounded to cents by the engine
 * - Optional loan terms are absent (undefined), never zero-filled
 * - A decision is returned once; only its ledger copy is kept
 */

import type { AmortizationRow } from "./loan.js";

/**
 * How often the applicant is paid. The quoted gross salary is per period.
 */
export type PayFrequency = "Weekly" | "Bi-Weekly" | "Monthly" | "Annually";

/** All pay frequencies, in display order. */
export const PAY_FREQUENCIES: readonly PayFrequency[] = [
  "Weekly",
  "Bi-Weekly",
  "Monthly",
  "Annually",
] as const;

/**
 * A salary-advance request, optionally carrying loan terms.
 *
 * Loan math only runs when loanAmount, interestRate and loanTerm are all
 * present and non-zero.
 */
export interface AdvanceRequest {
  /** Gross salary per pay period */
  readonly grossSalary: number;

  /**
   * Pay frequency of grossSalary. Kept as a plain string at the boundary;
   * the engine rejects anything outside PayFrequency.
   */
  readonly payFrequency: string;

  /** Requested advance amount */
  readonly advanceAmount: number;

  readonly loanAmount?: number | undefined;

  /** Annual interest rate, in percent (12 = 12%) */
  readonly interestRate?: number | undefined;

  /** Loan term in months */
  readonly loanTerm?: number | undefined;

  /** Attach the month-by-month schedule to the decision */
  readonly includeAmortization?: boolean | undefined;
}

/**
 * Terminal state of a single decision.
 *
 * ineligible → salary below threshold
 * rejected → advance exceeds the maximum allowed
 * approved → advance only
 * approved_with_loan → advance plus loan repayment figures
 */
export type AdvanceOutcome =
  | "ineligible"
  | "rejected"
  | "approved"
  | "approved_with_loan";

export const ADVANCE_OUTCOMES: readonly AdvanceOutcome[] = [
  "ineligible",
  "rejected",
  "approved",
  "approved_with_loan",
] as const;

/**
 * Result of evaluating an AdvanceRequest.
 */
export interface AdvanceDecision {
  readonly outcome: AdvanceOutcome;

  /** Salary-based eligibility */
  readonly eligible: boolean;

  /** Whether the requested advance itself was approved */
  readonly advanceApproved: boolean;

  readonly maxAdvance: number;
  readonly approvedAmount: number;
  readonly fee: number;

  /** Loan principal plus monthly-compounded interest */
  readonly totalRepayable?: number | undefined;

  readonly amortizationSchedule?: readonly AmortizationRow[] | undefined;

  /** Human-readable summary */
  readonly message: string;

  /** Ledger id, present only for approved decisions */
  readonly loanId?: string | undefined;
}

/**
 * A CSV rendering of the amortization schedule.
 */
export interface ScheduleExport {
  readonly csvData: string;
  readonly filename: string;
}
