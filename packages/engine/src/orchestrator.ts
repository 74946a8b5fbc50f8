/**
 * @payadvance/engine — Advance orchestrator.
 *
 * Runs one request through the full pipeline:
 *
 *   normalise salary → eligibility → fee → (loan math) → ledger → message
 *
 * Terminal outcomes:
 * - ineligible          salary below threshold; nothing else is computed
 * - rejected            advance above the ceiling; no fee, no loan, no record
 * - approved            advance recorded, no loan figures
 * - approved_with_loan  advance recorded with total repayable (and schedule)
 *
 * A decision either completes, with its ledger record committed when
 * approved, or throws before the ledger is touched.
 */

import type {
  AdvanceDecision,
  AdvanceRequest,
  AmortizationRow,
  LoanRecord,
  ScheduleExport,
} from "@payadvance/types";
import { evaluateEligibility, MIN_MONTHLY_SALARY } from "./eligibility.js";
import { computeFee } from "./fees.js";
import { amortize, totalRepayable } from "./loan-calculator.js";
import type { LoanLedger } from "./loan-ledger.js";
import { formatDollars } from "./money.js";
import { assertPayFrequency, toMonthlySalary } from "./salary.js";
import { exportSchedule } from "./schedule-csv.js";
import { AdvanceError } from "./types.js";
import type { DecideOptions, OrchestratorOptions } from "./types.js";

interface LoanTerms {
  readonly loanAmount: number;
  readonly interestRate: number;
  readonly loanTerm: number;
}

/** A loan field counts only when present and non-zero. */
function isSet(value: number | undefined): value is number {
  return value !== undefined && value !== 0 && !Number.isNaN(value);
}

function loanTermsOf(request: AdvanceRequest): LoanTerms | undefined {
  const { loanAmount, interestRate, loanTerm } = request;
  if (isSet(loanAmount) && isSet(interestRate) && isSet(loanTerm)) {
    return { loanAmount, interestRate, loanTerm };
  }
  return undefined;
}

export class AdvanceOrchestrator {
  private readonly _ledger: LoanLedger;
  private readonly _now: () => Date;

  constructor(ledger: LoanLedger, options?: OrchestratorOptions) {
    this._ledger = ledger;
    this._now = options?.now ?? (() => new Date());
  }

  /**
   * Decide on an advance request.
   *
   * With `exportCsv` set and loan terms present on an approved request,
   * returns only the schedule as CSV and records nothing.
   *
   * @throws AdvanceError INVALID_INPUT for an unknown pay frequency or
   *   unusable loan terms
   * @throws AdvanceError INTERNAL_ERROR for anything unexpected
   */
  decide(
    request: AdvanceRequest,
    options?: DecideOptions,
  ): AdvanceDecision | ScheduleExport {
    try {
      return this._decide(request, options?.exportCsv === true);
    } catch (err: unknown) {
      if (err instanceof AdvanceError) {
        throw err;
      }
      throw new AdvanceError(
        "INTERNAL_ERROR",
        "Unexpected failure while computing advance",
        { cause: err },
      );
    }
  }

  /**
   * @throws AdvanceError LOAN_NOT_FOUND
   */
  lookup(loanId: string): LoanRecord {
    return this._ledger.get(loanId);
  }

  private _decide(
    request: AdvanceRequest,
    exportCsv: boolean,
  ): AdvanceDecision | ScheduleExport {
    const payFrequency = assertPayFrequency(request.payFrequency);
    const monthlySalary = toMonthlySalary(request.grossSalary, payFrequency);
    const { eligible, maxAdvance, advanceApproved } = evaluateEligibility(
      monthlySalary,
      request.advanceAmount,
    );

    if (!eligible) {
      return {
        outcome: "ineligible",
        eligible: false,
        advanceApproved: false,
        maxAdvance: 0,
        approvedAmount: 0,
        fee: 0,
        message: `Ineligible: Monthly salary is below the minimum threshold of $${String(MIN_MONTHLY_SALARY)}.`,
      };
    }

    if (!advanceApproved) {
      return {
        outcome: "rejected",
        eligible: true,
        advanceApproved: false,
        maxAdvance,
        approvedAmount: 0,
        fee: 0,
        message:
          `Requested advance ($${formatDollars(request.advanceAmount)}) ` +
          `exceeds maximum allowed ($${formatDollars(maxAdvance)}).`,
      };
    }

    const fee = computeFee(request.advanceAmount, advanceApproved);

    let repayable: number | undefined;
    let schedule: readonly AmortizationRow[] | undefined;
    const terms = loanTermsOf(request);
    if (terms !== undefined) {
      repayable = totalRepayable(terms.loanAmount, terms.interestRate, terms.loanTerm);
      if (request.includeAmortization === true || exportCsv) {
        schedule = amortize(terms.loanAmount, terms.interestRate, terms.loanTerm);
        if (exportCsv) {
          return exportSchedule(schedule);
        }
      }
    }

    const record = this._ledger.record({
      grossSalary: request.grossSalary,
      payFrequency,
      advanceAmount: request.advanceAmount,
      fee,
      loanAmount: request.loanAmount ?? null,
      interestRate: request.interestRate ?? null,
      loanTerm: request.loanTerm ?? null,
      totalRepayable: repayable ?? null,
      amortizationSchedule: schedule ?? null,
      timestamp: this._now().toISOString(),
    });

    let message =
      `Advance approved! Amount: $${formatDollars(request.advanceAmount)}, ` +
      `Fee: $${formatDollars(fee)}`;
    if (repayable !== undefined && terms !== undefined) {
      message += `. Loan repayable: $${formatDollars(repayable)} over ${String(terms.loanTerm)} months.`;
    }

    return {
      outcome: repayable !== undefined ? "approved_with_loan" : "approved",
      eligible: true,
      advanceApproved: true,
      maxAdvance,
      approvedAmount: request.advanceAmount,
      fee,
      ...(repayable !== undefined ? { totalRepayable: repayable } : {}),
      ...(schedule !== undefined ? { amortizationSchedule: schedule } : {}),
      message,
      loanId: record.loanId,
    };
  }
}
