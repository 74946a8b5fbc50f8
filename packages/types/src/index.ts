/**
 * @payadvance/types — Shared domain types for the PayAdvance stack.
 *
 * Used by the engine, the HTTP service, the SDK and the CLI:
 * - Advance requests and decisions
 * - Amortization rows and loan records
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 */

// Advance types
export type {
  PayFrequency,
  AdvanceRequest,
  AdvanceOutcome,
  AdvanceDecision,
  ScheduleExport,
} from "./advance.js";
export { PAY_FREQUENCIES, ADVANCE_OUTCOMES } from "./advance.js";

// Loan types
export type { AmortizationRow, LoanRecord } from "./loan.js";

// Runtime type guards
export {
  isPayFrequency,
  isAdvanceOutcome,
  isAmortizationRow,
  isScheduleExport,
} from "./guards.js";
