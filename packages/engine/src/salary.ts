/**
 * @payadvance/engine — Salary normalisation.
 *
 * Converts a salary quoted per pay period into its monthly equivalent.
 */

import type { PayFrequency } from "@payadvance/types";
import { isPayFrequency } from "@payadvance/types";
import { AdvanceError } from "./types.js";

/**
 * @throws AdvanceError INVALID_INPUT for an unrecognised frequency
 */
export function assertPayFrequency(value: string): PayFrequency {
  if (!isPayFrequency(value)) {
    throw new AdvanceError("INVALID_INPUT", "Invalid pay_frequency");
  }
  return value;
}

/**
 * Monthly equivalent of a per-period gross salary.
 *
 * Weekly 1000 → 4333.33…, Annually 60000 → 5000.
 *
 * @throws AdvanceError INVALID_INPUT for a non-finite salary or an
 *   unrecognised frequency
 */
export function toMonthlySalary(grossSalary: number, payFrequency: string): number {
  if (!Number.isFinite(grossSalary)) {
    throw new AdvanceError(
      "INVALID_INPUT",
      `gross_salary must be a finite number, got: ${String(grossSalary)}`,
    );
  }

  switch (assertPayFrequency(payFrequency)) {
    case "Weekly":
      return (grossSalary * 52) / 12;
    case "Bi-Weekly":
      return (grossSalary * 26) / 12;
    case "Monthly":
      return grossSalary;
    case "Annually":
      return grossSalary / 12;
  }
}
