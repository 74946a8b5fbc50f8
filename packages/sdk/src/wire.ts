/**
 * @payadvance/sdk — Wire mapping.
 *
 * The service speaks snake_case with nulls for absent fields; the SDK
 * hands out camelCase domain types with those fields left off. Every
 * decoder throws INVALID_RESPONSE on a body of the wrong shape.
 */

import type {
  AdvanceDecision,
  AdvanceRequest,
  AmortizationRow,
  LoanRecord,
  ScheduleExport,
} from "@payadvance/types";
import { isAdvanceOutcome, isAmortizationRow, isPayFrequency } from "@payadvance/types";
import { PayAdvanceError } from "./types.js";
import type { LoanList } from "./types.js";

type WireObject = Record<string, unknown>;

function invalid(message: string): PayAdvanceError {
  return new PayAdvanceError("INVALID_RESPONSE", message, 200);
}

function asObject(value: unknown, what: string): WireObject {
  if (value === null || typeof value !== "object" || Array.isArray(value)) {
    throw invalid(`Expected ${what} object`);
  }
  return value as WireObject;
}

function num(o: WireObject, key: string): number {
  const v = o[key];
  if (typeof v !== "number") {
    throw invalid(`Expected number at "${key}"`);
  }
  return v;
}

function optNum(o: WireObject, key: string): number | null {
  const v = o[key];
  return v === null || v === undefined ? null : num(o, key);
}

function str(o: WireObject, key: string): string {
  const v = o[key];
  if (typeof v !== "string") {
    throw invalid(`Expected string at "${key}"`);
  }
  return v;
}

function bool(o: WireObject, key: string): boolean {
  const v = o[key];
  if (typeof v !== "boolean") {
    throw invalid(`Expected boolean at "${key}"`);
  }
  return v;
}

function schedule(o: WireObject, key: string): readonly AmortizationRow[] | null {
  const v = o[key];
  if (v === null || v === undefined) {
    return null;
  }
  if (!Array.isArray(v) || !v.every(isAmortizationRow)) {
    throw invalid(`Expected amortization rows at "${key}"`);
  }
  return v;
}

// =============================================================================
// Requests
// =============================================================================

export function toWireRequest(request: AdvanceRequest): WireObject {
  return {
    gross_salary: request.grossSalary,
    pay_frequency: request.payFrequency,
    advance_amount: request.advanceAmount,
    loan_amount: request.loanAmount ?? null,
    interest_rate: request.interestRate ?? null,
    loan_term: request.loanTerm ?? null,
    include_amortization: request.includeAmortization ?? false,
  };
}

// =============================================================================
// Responses
// =============================================================================

export function decodeDecision(body: unknown): AdvanceDecision {
  const o = asObject(body, "decision");
  const outcome = o.outcome;
  if (!isAdvanceOutcome(outcome)) {
    throw invalid(`Unknown outcome: ${String(outcome)}`);
  }

  const totalRepayable = optNum(o, "total_repayable");
  const amortizationSchedule = schedule(o, "amortization_schedule");
  const loanId = o.loan_id;

  return {
    outcome,
    eligible: bool(o, "eligible"),
    advanceApproved: bool(o, "advance_approved"),
    maxAdvance: num(o, "max_advance"),
    approvedAmount: num(o, "approved_amount"),
    fee: num(o, "fee"),
    ...(totalRepayable !== null ? { totalRepayable } : {}),
    ...(amortizationSchedule !== null ? { amortizationSchedule } : {}),
    message: str(o, "message"),
    ...(typeof loanId === "string" ? { loanId } : {}),
  };
}

export function decodeLoanRecord(body: unknown): LoanRecord {
  const o = asObject(body, "loan record");
  const payFrequency = o.pay_frequency;
  if (!isPayFrequency(payFrequency)) {
    throw invalid(`Unknown pay_frequency: ${String(payFrequency)}`);
  }

  return {
    loanId: str(o, "loan_id"),
    grossSalary: num(o, "gross_salary"),
    payFrequency,
    advanceAmount: num(o, "advance_amount"),
    fee: num(o, "fee"),
    loanAmount: optNum(o, "loan_amount"),
    interestRate: optNum(o, "interest_rate"),
    loanTerm: optNum(o, "loan_term"),
    totalRepayable: optNum(o, "total_repayable"),
    amortizationSchedule: schedule(o, "amortization_schedule"),
    timestamp: str(o, "timestamp"),
  };
}

export function decodeLoanList(body: unknown): LoanList {
  const o = asObject(body, "loan list");
  const data = o.data;
  if (!Array.isArray(data)) {
    throw invalid('Expected array at "data"');
  }
  return { data: data.map(decodeLoanRecord), total: num(o, "total") };
}

/**
 * Returns undefined when the service answered a decision instead,
 * which it does when there is no loan to export.
 */
export function decodeScheduleExport(body: unknown): ScheduleExport | undefined {
  const o = asObject(body, "export");
  if (!("csv_data" in o)) {
    return undefined;
  }
  return { csvData: str(o, "csv_data"), filename: str(o, "filename") };
}
