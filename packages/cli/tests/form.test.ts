/**
 * Tests for command-line form parsing.
 */

import { describe, it, expect } from "vitest";
import { parseForm, FormError, DEFAULT_BACKEND_URL } from "../src/form.js";

const BASE = ["--salary", "4000", "--frequency", "Monthly", "--advance", "1000"];

function problemsOf(argv: string[]): readonly string[] {
  try {
    parseForm(argv, {});
  } catch (err) {
    if (err instanceof FormError) {
      return err.problems;
    }
    throw err;
  }
  throw new Error("expected a FormError");
}

describe("parseForm", () => {
  it("builds an advance request from the required flags", () => {
    expect(parseForm(BASE, {})).toEqual({
      help: false,
      request: {
        grossSalary: 4000,
        payFrequency: "Monthly",
        advanceAmount: 1000,
        loanAmount: undefined,
        interestRate: undefined,
        loanTerm: undefined,
        includeAmortization: false,
      },
      exportDir: ".",
      baseUrl: DEFAULT_BACKEND_URL,
    });
  });

  it("reads loan terms and the amortization switch", () => {
    const form = parseForm(
      [
        ...BASE,
        "--loan-amount",
        "5000",
        "--interest-rate",
        "12.5",
        "--loan-term",
        "24",
        "--amortization",
        "--export",
        "/tmp/out",
      ],
      {},
    );

    expect(form.help).toBe(false);
    if (!form.help) {
      expect(form.request.loanAmount).toBe(5000);
      expect(form.request.interestRate).toBe(12.5);
      expect(form.request.loanTerm).toBe(24);
      expect(form.request.includeAmortization).toBe(true);
      expect(form.exportDir).toBe("/tmp/out");
    }
  });

  it("takes the base URL from --url, then BACKEND_URL", () => {
    const fromEnv = parseForm(BASE, { BACKEND_URL: "http://backend:9000" });
    const fromFlag = parseForm([...BASE, "--url", "http://flag:1"], {
      BACKEND_URL: "http://backend:9000",
    });

    expect(fromEnv.help === false && fromEnv.baseUrl).toBe("http://backend:9000");
    expect(fromFlag.help === false && fromFlag.baseUrl).toBe("http://flag:1");
  });

  it("answers help without validating anything else", () => {
    expect(parseForm(["--help"], {})).toEqual({ help: true });
    expect(parseForm(["-h", "--salary", "x"], {})).toEqual({ help: true });
  });

  it("reports every missing required flag", () => {
    expect(problemsOf([])).toEqual([
      "--salary is required",
      "--frequency: must be one of Weekly, Bi-Weekly, Monthly, Annually",
      "--advance is required",
    ]);
  });

  it("rejects an unknown frequency", () => {
    expect(problemsOf(["--salary", "4000", "--frequency", "Daily", "--advance", "10"])).toEqual([
      "--frequency: must be one of Weekly, Bi-Weekly, Monthly, Annually",
    ]);
  });

  it("rejects out-of-range loan terms", () => {
    const problems = problemsOf([...BASE, "--interest-rate", "150", "--loan-term", "2.5"]);

    expect(problems).toHaveLength(2);
    expect(problems[0]).toMatch(/^--interest-rate: /);
    expect(problems[1]).toMatch(/^--loan-term: /);
  });

  it("rejects a negative advance and a zero salary", () => {
    const problems = problemsOf(["--salary", "0", "--frequency", "Weekly", "--advance=-5"]);

    expect(problems.map((p) => p.split(":")[0])).toEqual(["--salary", "--advance"]);
  });

  it("rejects an invalid base URL", () => {
    expect(problemsOf([...BASE, "--url", "not a url"])).toEqual(["--url: Invalid url"]);
  });

  it("turns unknown flags into a FormError", () => {
    const problems = problemsOf([...BASE, "--bogus"]);
    expect(problems).toHaveLength(1);
    expect(problems[0]).toContain("--bogus");
  });
});
