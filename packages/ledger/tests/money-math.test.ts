/**
 * Tests for the deterministic money math engine.
 *
 * Covers:
 * - parseAmount / formatAmount
 * - Arithmetic operations (add, subtract, sum, compare)
 * - Quantity multiplication and rounding
 * - Validation and error cases
 */

import { describe, it, expect } from "vitest";
import {
  parseAmount,
  formatAmount,
  toAmount,
  addAmounts,
  subtractAmounts,
  sumAmounts,
  negateAmount,
  absAmount,
  isZero,
  isPositive,
  isNegative,
  compareAmounts,
  multiplyAmount,
} from "../src/money-math.js";
import { LedgerError } from "../src/types.js";

// ─── parseAmount ─────────────────────────────────────────────────────────

describe("parseAmount", () => {
  it("scales whole numbers to cents", () => {
    expect(parseAmount("100")).toBe(10000n);
  });

  it("pads a single decimal", () => {
    expect(parseAmount("-50.2")).toBe(-5020n);
  });

  it("accepts an explicit plus sign", () => {
    expect(parseAmount("+7.00")).toBe(700n);
  });

  it("trims surrounding whitespace", () => {
    expect(parseAmount("  12.34 ")).toBe(1234n);
  });

  it("rejects more than two decimals", () => {
    expect(() => parseAmount("1.005")).toThrow(LedgerError);
  });

  it("rejects garbage", () => {
    for (const bad of ["", "abc", "1,000.00", "$5", "1.2.3", ".50"]) {
      expect(() => parseAmount(bad), bad).toThrow(LedgerError);
    }
  });

  it("reports INVALID_AMOUNT", () => {
    expect(() => parseAmount("x")).toThrow(
      expect.objectContaining({ code: "INVALID_AMOUNT" }),
    );
  });
});

// ─── formatAmount ────────────────────────────────────────────────────────

describe("formatAmount", () => {
  it("formats cents with two places", () => {
    expect(formatAmount(10050n)).toBe("100.50");
    expect(formatAmount(0n)).toBe("0.00");
    expect(formatAmount(7n)).toBe("0.07");
  });

  it("keeps the sign on sub-unit negatives", () => {
    expect(formatAmount(-5n)).toBe("-0.05");
  });
});

describe("toAmount", () => {
  it("canonicalizes accepted input", () => {
    expect(toAmount("45")).toBe("45.00");
    expect(toAmount("+45.5")).toBe("45.50");
    expect(toAmount("-0")).toBe("0.00");
  });
});

// ─── Arithmetic ──────────────────────────────────────────────────────────

describe("arithmetic", () => {
  it("adds and subtracts", () => {
    expect(addAmounts("0.10", "0.20")).toBe("0.30");
    expect(subtractAmounts("100.00", "250.75")).toBe("-150.75");
  });

  it("sums an empty list to zero", () => {
    expect(sumAmounts([])).toBe("0.00");
  });

  it("sums many amounts", () => {
    expect(sumAmounts(["1.00", "2.50", "-0.25"])).toBe("3.25");
  });

  it("negates and takes absolute values", () => {
    expect(negateAmount("12.00")).toBe("-12.00");
    expect(negateAmount("0.00")).toBe("0.00");
    expect(absAmount("-3.40")).toBe("3.40");
  });

  it("classifies sign", () => {
    expect(isZero("0.00")).toBe(true);
    expect(isPositive("0.01")).toBe(true);
    expect(isNegative("-0.01")).toBe(true);
    expect(isPositive("0.00")).toBe(false);
  });

  it("compares amounts", () => {
    expect(compareAmounts("1.00", "2.00")).toBe(-1);
    expect(compareAmounts("2.00", "2")).toBe(0);
    expect(compareAmounts("-1.00", "-2.00")).toBe(1);
  });
});

describe("multiplyAmount", () => {
  it("multiplies by fractional hours", () => {
    expect(multiplyAmount("150.00", "1.50")).toBe("225.00");
  });

  it("rounds half away from zero", () => {
    expect(multiplyAmount("0.10", "0.25")).toBe("0.03");
    expect(multiplyAmount("-0.10", "0.25")).toBe("-0.03");
  });

  it("truncates below half", () => {
    // 0.33 * 0.10 = 0.033
    expect(multiplyAmount("0.33", "0.10")).toBe("0.03");
  });
});
