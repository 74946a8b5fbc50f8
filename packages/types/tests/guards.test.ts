/**
 * Runtime type guard tests for @payadvance/types
 */
import { describe, it, expect } from "vitest";
import {
  isPayFrequency,
  isAdvanceOutcome,
  isAmortizationRow,
  isScheduleExport,
} from "../src/guards.js";
import { PAY_FREQUENCIES } from "../src/advance.js";

describe("isPayFrequency", () => {
  it("accepts every known frequency", () => {
    for (const f of PAY_FREQUENCIES) {
      expect(isPayFrequency(f)).toBe(true);
    }
  });

  it("is case-sensitive", () => {
    expect(isPayFrequency("weekly")).toBe(false);
    expect(isPayFrequency("BiWeekly")).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isPayFrequency(undefined)).toBe(false);
    expect(isPayFrequency(12)).toBe(false);
  });
});

describe("isAdvanceOutcome", () => {
  it("accepts the four outcomes", () => {
    for (const o of ["ineligible", "rejected", "approved", "approved_with_loan"]) {
      expect(isAdvanceOutcome(o)).toBe(true);
    }
  });

  it("rejects anything else", () => {
    expect(isAdvanceOutcome("pending")).toBe(false);
    expect(isAdvanceOutcome(null)).toBe(false);
  });
});

describe("isAmortizationRow", () => {
  const row = { month: 1, payment: 88.85, principal: 78.85, interest: 10, balance: 921.15 };

  it("accepts a valid row", () => {
    expect(isAmortizationRow(row)).toBe(true);
  });

  it("accepts a zero final balance", () => {
    expect(isAmortizationRow({ ...row, month: 12, balance: 0 })).toBe(true);
  });

  it("rejects a negative balance", () => {
    expect(isAmortizationRow({ ...row, balance: -0.01 })).toBe(false);
  });

  it("rejects a zero or fractional month", () => {
    expect(isAmortizationRow({ ...row, month: 0 })).toBe(false);
    expect(isAmortizationRow({ ...row, month: 1.5 })).toBe(false);
  });

  it("rejects NaN fields", () => {
    expect(isAmortizationRow({ ...row, interest: Number.NaN })).toBe(false);
  });

  it("rejects null and missing fields", () => {
    expect(isAmortizationRow(null)).toBe(false);
    expect(isAmortizationRow({ month: 1 })).toBe(false);
  });
});

describe("isScheduleExport", () => {
  it("accepts csv data with a filename", () => {
    expect(
      isScheduleExport({ csvData: "Month\n", filename: "amortization_schedule.csv" }),
    ).toBe(true);
  });

  it("rejects a decision-shaped object", () => {
    expect(isScheduleExport({ eligible: true, message: "ok" })).toBe(false);
  });
});
