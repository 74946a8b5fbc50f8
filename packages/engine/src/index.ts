/**
 * @payadvance/engine — Salary-advance decision engine.
 *
 * Pure TypeScript, no runtime dependencies beyond Node built-ins:
 * - Salary normalisation to a monthly figure
 * - Eligibility threshold and advance ceiling
 * - Clamped advance fee
 * - Compound-interest totals and level-payment amortization
 * - In-memory loan ledger
 * - Orchestration into a single decision, with CSV export
 *
 * Design rules:
 * - All returned types are readonly; ledger records are frozen
 * - Fail-closed: invalid input throws AdvanceError, never NaN
 */

// Orchestration
export { AdvanceOrchestrator } from "./orchestrator.js";

// Ledger
export { LoanLedger } from "./loan-ledger.js";

// Rules
export { assertPayFrequency, toMonthlySalary } from "./salary.js";
export {
  evaluateEligibility,
  MIN_MONTHLY_SALARY,
  MAX_ADVANCE_RATIO,
} from "./eligibility.js";
export { computeFee, FEE_RATE, MIN_FEE, MAX_FEE } from "./fees.js";

// Loan math
export { totalRepayable, monthlyPayment, amortize } from "./loan-calculator.js";

// Export
export {
  encodeScheduleCsv,
  exportSchedule,
  SCHEDULE_CSV_HEADER,
  SCHEDULE_CSV_FILENAME,
} from "./schedule-csv.js";

// Money
export { roundCents, formatDollars } from "./money.js";

// Types
export type {
  EligibilityResult,
  LoanDraft,
  LoanIdGenerator,
  DecideOptions,
  OrchestratorOptions,
  AdvanceErrorCode,
} from "./types.js";

export { AdvanceError } from "./types.js";
