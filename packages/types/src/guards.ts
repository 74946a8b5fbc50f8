/**
 * Runtime Type Guards
 *
 * Narrowing functions for PayAdvance domain types, used where data
 * crosses a process boundary (HTTP payloads, CLI input).
 */

import type { AdvanceOutcome, PayFrequency, ScheduleExport } from "./advance.js";
import { ADVANCE_OUTCOMES, PAY_FREQUENCIES } from "./advance.js";
import type { AmortizationRow } from "./loan.js";

const FREQUENCIES = new Set<string>(PAY_FREQUENCIES);
const OUTCOMES = new Set<string>(ADVANCE_OUTCOMES);

export function isPayFrequency(value: unknown): value is PayFrequency {
  return typeof value === "string" && FREQUENCIES.has(value);
}

export function isAdvanceOutcome(value: unknown): value is AdvanceOutcome {
  return typeof value === "string" && OUTCOMES.has(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export function isAmortizationRow(value: unknown): value is AmortizationRow {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isFiniteNumber(v.month) &&
    Number.isInteger(v.month) &&
    v.month >= 1 &&
    isFiniteNumber(v.payment) &&
    isFiniteNumber(v.principal) &&
    isFiniteNumber(v.interest) &&
    isFiniteNumber(v.balance) &&
    v.balance >= 0
  );
}

export function isScheduleExport(value: unknown): value is ScheduleExport {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return typeof v.csvData === "string" && typeof v.filename === "string";
}
