/**
 * Tests for compound-interest totals and amortization.
 */

import { describe, it, expect } from "vitest";
import { totalRepayable, monthlyPayment, amortize } from "../src/loan-calculator.js";
import { AdvanceError } from "../src/types.js";

function sumPrincipal(rows: readonly { principal: number }[]): number {
  return rows.reduce((acc, r) => acc + r.principal, 0);
}

// =============================================================================
// totalRepayable
// =============================================================================

describe("totalRepayable", () => {
  it("compounds monthly and rounds to cents", () => {
    // 1000 * 1.01^12 = 1126.825…
    expect(totalRepayable(1000, 12, 12)).toBe(1126.83);
  });

  it("matches the closed-form formula", () => {
    const expected = Math.round(5000 * Math.pow(1 + 0.1 / 12, 6) * 100) / 100;
    expect(totalRepayable(5000, 10, 6)).toBe(expected);
    expect(expected).toBe(5255.27);
  });

  it("returns the principal at a zero rate", () => {
    expect(totalRepayable(1000, 0, 3)).toBe(1000);
  });

  it("throws INVALID_INPUT for a non-positive term", () => {
    expect(() => totalRepayable(1000, 12, 0)).toThrow(AdvanceError);
    expect(() => totalRepayable(1000, 12, -3)).toThrow(
      "loan_term must be a positive whole number of months",
    );
  });

  it("throws INVALID_INPUT for a fractional term", () => {
    expect(() => totalRepayable(1000, 12, 1.5)).toThrow(AdvanceError);
  });

  it("throws INVALID_INPUT for a negative rate or principal", () => {
    expect(() => totalRepayable(1000, -1, 12)).toThrow("interest_rate");
    expect(() => totalRepayable(-1, 12, 12)).toThrow("loan_amount");
  });
});

// =============================================================================
// monthlyPayment
// =============================================================================

describe("monthlyPayment", () => {
  it("computes the level payment", () => {
    expect(monthlyPayment(1000, 12, 12)).toBe(88.85);
    expect(monthlyPayment(5000, 10, 6)).toBe(857.81);
  });

  it("splits the principal evenly at a zero rate", () => {
    expect(monthlyPayment(1000, 0, 3)).toBe(333.33);
    expect(monthlyPayment(1200, 0, 12)).toBe(100);
  });
});

// =============================================================================
// amortize
// =============================================================================

describe("amortize", () => {
  it("produces one row per month", () => {
    const rows = amortize(1000, 12, 12);
    expect(rows).toHaveLength(12);
    expect(rows.map((r) => r.month)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);
  });

  it("splits each payment into principal and interest", () => {
    const rows = amortize(1000, 12, 12);
    expect(rows[0]).toEqual({
      month: 1,
      payment: 88.85,
      principal: 78.85,
      interest: 10,
      balance: 921.15,
    });
    expect(rows[1]).toEqual({
      month: 2,
      payment: 88.85,
      principal: 79.64,
      interest: 9.21,
      balance: 841.51,
    });
  });

  it("retires the loan exactly on the last row", () => {
    const rows = amortize(1000, 12, 12);
    expect(rows[11]).toEqual({
      month: 12,
      payment: 88.85,
      principal: 87.96,
      interest: 0.88,
      balance: 0,
    });
  });

  it("principal column sums to the original principal", () => {
    expect(Math.abs(sumPrincipal(amortize(1000, 12, 12)) - 1000)).toBeLessThanOrEqual(0.010001);
    expect(Math.abs(sumPrincipal(amortize(5000, 10, 6)) - 5000)).toBeLessThanOrEqual(0.010001);
  });

  it("raises the last payment to clear a residual balance", () => {
    // 333.33 * 3 leaves 0.01 outstanding
    const rows = amortize(1000, 0, 3);
    expect(rows).toEqual([
      { month: 1, payment: 333.33, principal: 333.33, interest: 0, balance: 666.67 },
      { month: 2, payment: 333.33, principal: 333.33, interest: 0, balance: 333.34 },
      { month: 3, payment: 333.34, principal: 333.34, interest: 0, balance: 0 },
    ]);
  });

  it("takes the last month's interest out of the corrected payment", () => {
    // 16.81 rounds down, leaving a residual on month 6
    const rows = amortize(100, 3, 6);
    expect(rows[4]!.balance).toBe(16.78);
    expect(rows[5]).toEqual({
      month: 6,
      payment: 16.78,
      principal: 16.74,
      interest: 0.04,
      balance: 0,
    });
    expect(sumPrincipal(rows)).toBeCloseTo(99.95, 6);
  });

  it("handles a single-month term", () => {
    const rows = amortize(1000, 12, 1);
    expect(rows).toEqual([
      { month: 1, payment: 1010, principal: 1000, interest: 10, balance: 0 },
    ]);
  });

  it("throws INVALID_INPUT instead of dividing by zero", () => {
    try {
      amortize(1000, 0, 0);
      expect.fail("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(AdvanceError);
      expect((err as AdvanceError).code).toBe("INVALID_INPUT");
    }
  });
});
