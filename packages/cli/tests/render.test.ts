/**
 * Tests for decision rendering (colour disabled).
 */

import { describe, it, expect, beforeAll } from "vitest";
import chalk from "chalk";
import type { AdvanceDecision } from "@payadvance/types";
import { dollars, renderDecision, renderSchedule } from "../src/render.js";

beforeAll(() => {
  chalk.level = 0;
});

describe("dollars", () => {
  it("formats with separators and two decimals", () => {
    expect(dollars(2166.666)).toBe("$2,166.67");
    expect(dollars(10)).toBe("$10.00");
  });
});

describe("renderDecision", () => {
  it("lists the figures of an approved advance", () => {
    const decision: AdvanceDecision = {
      outcome: "approved",
      eligible: true,
      advanceApproved: true,
      maxAdvance: 2000,
      approvedAmount: 1000,
      fee: 50,
      message: "Advance approved! Amount: $1,000.00, Fee: $50.00",
      loanId: "loan-1",
    };

    expect(renderDecision(decision)).toEqual([
      "    ✓ Advance approved! Amount: $1,000.00, Fee: $50.00",
      "    → Eligible        yes",
      "    → Max advance     $2,000.00",
      "    → Approved        $1,000.00",
      "    → Fee             $50.00",
      "    → Loan ID         loan-1",
    ]);
  });

  it("shows only the message and eligibility when ineligible", () => {
    const decision: AdvanceDecision = {
      outcome: "ineligible",
      eligible: false,
      advanceApproved: false,
      maxAdvance: 0,
      approvedAmount: 0,
      fee: 0,
      message: "Ineligible: Monthly salary is below the minimum threshold of $1000.",
    };

    expect(renderDecision(decision)).toEqual([
      "    ✗ Ineligible: Monthly salary is below the minimum threshold of $1000.",
      "    → Eligible        no",
    ]);
  });

  it("shows the ceiling on a rejection", () => {
    const lines = renderDecision({
      outcome: "rejected",
      eligible: true,
      advanceApproved: false,
      maxAdvance: 2500,
      approvedAmount: 0,
      fee: 0,
      message: "Requested advance ($3,000.00) exceeds maximum allowed ($2,500.00).",
    });

    expect(lines[0]).toBe("    ✗ Requested advance ($3,000.00) exceeds maximum allowed ($2,500.00).");
    expect(lines).toContain("    → Max advance     $2,500.00");
    expect(lines).not.toContain("    → Fee             $0.00");
  });

  it("appends the loan total and the schedule", () => {
    const lines = renderDecision({
      outcome: "approved_with_loan",
      eligible: true,
      advanceApproved: true,
      maxAdvance: 2000,
      approvedAmount: 1000,
      fee: 50,
      totalRepayable: 1126.83,
      amortizationSchedule: [
        { month: 1, payment: 88.85, principal: 78.85, interest: 10, balance: 921.15 },
      ],
      message: "ok",
      loanId: "loan-1",
    });

    expect(lines).toContain("    → Total repayable $1,126.83");
    expect(lines.slice(-2)).toEqual([
      "    Month       Payment     Principal      Interest       Balance",
      "        1         88.85         78.85         10.00        921.15",
    ]);
  });
});

describe("renderSchedule", () => {
  it("pads large amounts into their columns", () => {
    const lines = renderSchedule([
      { month: 12, payment: 12345.6, principal: 12000, interest: 345.6, balance: 0 },
    ]);

    expect(lines[3]).toBe("       12     12,345.60     12,000.00        345.60          0.00");
  });
});
