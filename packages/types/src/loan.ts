/**
 * Loan Types
 *
 * Amortization rows and the immutable record kept for every approved
 * advance.
 */

import type { PayFrequency } from "./advance.js";

/**
 * One month of a level-payment amortization schedule.
 * All monetary fields are rounded to 2 decimals.
 */
export interface AmortizationRow {
  /** 1-based month index */
  readonly month: number;
  readonly payment: number;
  readonly principal: number;
  readonly interest: number;
  /** Balance remaining after this month's payment. 0 on the final row. */
  readonly balance: number;
}

/**
 * Snapshot of an approved advance, owned by the loan ledger.
 *
 * Loan fields the request did not carry are stored as null so the record
 * always has the same shape.
 */
export interface LoanRecord {
  readonly loanId: string;
  readonly grossSalary: number;
  readonly payFrequency: PayFrequency;
  readonly advanceAmount: number;
  readonly fee: number;
  readonly loanAmount: number | null;
  readonly interestRate: number | null;
  readonly loanTerm: number | null;
  readonly totalRepayable: number | null;
  readonly amortizationSchedule: readonly AmortizationRow[] | null;
  /** ISO-8601 creation time */
  readonly timestamp: string;
}
