/**
 * Tests for loan lookup routes.
 */

import { describe, it, expect } from "vitest";
import { createTestApp, jsonRequest, APPROVED_WITH_LOAN } from "./setup.js";

describe("GET /loan/:loanId", () => {
  it("returns the stored record in snake_case", async () => {
    const { app } = createTestApp();
    await app.request(jsonRequest("/calculate_advance", "POST", APPROVED_WITH_LOAN));

    const res = await app.request("/loan/loan-1");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      loan_id: "loan-1",
      advance_amount: 1000,
      fee: 50,
      timestamp: "2026-03-01T12:00:00.000Z",
      gross_salary: 4000,
      pay_frequency: "Monthly",
      loan_amount: 1000,
      interest_rate: 12,
      loan_term: 12,
      total_repayable: 1126.83,
      amortization_schedule: null,
    });
  });

  it("keeps the schedule when one was requested", async () => {
    const { app } = createTestApp();
    await app.request(
      jsonRequest("/calculate_advance", "POST", { ...APPROVED_WITH_LOAN, include_amortization: true }),
    );

    const res = await app.request("/loan/loan-1");
    const body = (await res.json()) as { amortization_schedule: unknown[] };
    expect(body.amortization_schedule).toHaveLength(12);
  });

  it("answers 404 LOAN_NOT_FOUND for an unknown id", async () => {
    const { app } = createTestApp();
    const res = await app.request("/loan/missing");

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: "LOAN_NOT_FOUND", message: "Loan not found" },
    });
  });
});

describe("GET /loans", () => {
  it("is empty before any approval", async () => {
    const { app } = createTestApp();
    const res = await app.request("/loans");

    expect(await res.json()).toEqual({ data: [], total: 0 });
  });

  it("lists approved loans oldest first and skips declined requests", async () => {
    const { app } = createTestApp();
    await app.request(
      jsonRequest("/calculate_advance", "POST", {
        gross_salary: 4000,
        pay_frequency: "Monthly",
        advance_amount: 200,
      }),
    );
    await app.request(
      jsonRequest("/calculate_advance", "POST", {
        gross_salary: 500,
        pay_frequency: "Monthly",
        advance_amount: 100,
      }),
    );
    await app.request(jsonRequest("/calculate_advance", "POST", APPROVED_WITH_LOAN));

    const res = await app.request("/loans");
    const body = (await res.json()) as { data: { loan_id: string; fee: number }[]; total: number };

    expect(body.total).toBe(2);
    expect(body.data.map((l) => l.loan_id)).toEqual(["loan-1", "loan-2"]);
    expect(body.data[0]!.fee).toBe(10);
  });
});
