/**
 * Tests for cent rounding and dollar formatting.
 */

import { describe, it, expect } from "vitest";
import { roundCents, formatDollars } from "../src/money.js";

describe("roundCents", () => {
  it("rounds to two decimals", () => {
    expect(roundCents(88.8487887)).toBe(88.85);
    expect(roundCents(1126.8250301)).toBe(1126.83);
  });

  it("rounds exact ties to even", () => {
    expect(roundCents(0.125)).toBe(0.12);
    expect(roundCents(0.375)).toBe(0.38);
  });

  it("leaves whole amounts unchanged", () => {
    expect(roundCents(50)).toBe(50);
    expect(roundCents(0)).toBe(0);
  });

  it("never returns negative zero", () => {
    expect(Object.is(roundCents(-0.001), 0)).toBe(true);
    expect(Object.is(roundCents(-0), 0)).toBe(true);
  });
});

describe("formatDollars", () => {
  it("adds thousands separators and two decimals", () => {
    expect(formatDollars(1000)).toBe("1,000.00");
    expect(formatDollars(1234567.891)).toBe("1,234,567.89");
  });

  it("pads small amounts", () => {
    expect(formatDollars(10)).toBe("10.00");
    expect(formatDollars(0)).toBe("0.00");
  });
});
