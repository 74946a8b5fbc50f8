/**
 * @payadvance/engine — Eligibility rules.
 */

import type { EligibilityResult } from "./types.js";

/** Monthly salary below which no advance is offered. */
export const MIN_MONTHLY_SALARY = 1000;

/** Largest advance, as a fraction of monthly salary. */
export const MAX_ADVANCE_RATIO = 0.5;

const INELIGIBLE: EligibilityResult = {
  eligible: false,
  maxAdvance: 0,
  advanceApproved: false,
};

/**
 * Apply the salary threshold and the advance ceiling.
 *
 * A salary exactly at the threshold is eligible. An advance exactly at
 * the ceiling is approved.
 */
export function evaluateEligibility(
  monthlySalary: number,
  advanceAmount: number,
): EligibilityResult {
  if (!(monthlySalary >= MIN_MONTHLY_SALARY)) {
    return INELIGIBLE;
  }

  const maxAdvance = monthlySalary * MAX_ADVANCE_RATIO;
  return {
    eligible: true,
    maxAdvance,
    advanceApproved: advanceAmount <= maxAdvance,
  };
}
