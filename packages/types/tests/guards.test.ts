/**
 * Runtime type guard tests for @tallybook/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAmount,
  isIsoDate,
  isAccountType,
  isSourceRef,
  isAccount,
  isJournalEntry,
  isJournalLine,
  isBankAccountType,
  isSignRule,
  isPaymentMethod,
} from "../src/guards.js";

// =============================================================================
// Ledger guards
// =============================================================================

describe("isAmount", () => {
  it("accepts canonical two-decimal amounts", () => {
    expect(isAmount("100.50")).toBe(true);
    expect(isAmount("0.00")).toBe(true);
    expect(isAmount("-45.00")).toBe(true);
  });

  it("rejects non-canonical strings", () => {
    expect(isAmount("100")).toBe(false);
    expect(isAmount("100.5")).toBe(false);
    expect(isAmount("1,000.00")).toBe(false);
    expect(isAmount("+1.00")).toBe(false);
  });

  it("rejects numbers", () => {
    expect(isAmount(100.5)).toBe(false);
  });
});

describe("isIsoDate", () => {
  it("accepts real calendar dates", () => {
    expect(isIsoDate("2024-01-15")).toBe(true);
    expect(isIsoDate("2024-02-29")).toBe(true);
  });

  it("rejects impossible dates", () => {
    expect(isIsoDate("2023-02-29")).toBe(false);
    expect(isIsoDate("2024-13-01")).toBe(false);
  });

  it("rejects other layouts", () => {
    expect(isIsoDate("01/15/2024")).toBe(false);
    expect(isIsoDate("2024-01-15T00:00:00Z")).toBe(false);
    expect(isIsoDate(20240115)).toBe(false);
  });
});

describe("isAccountType", () => {
  it("accepts the five account types", () => {
    for (const t of ["asset", "liability", "equity", "income", "expense"]) {
      expect(isAccountType(t)).toBe(true);
    }
  });

  it("rejects unknown types", () => {
    expect(isAccountType("revenue")).toBe(false);
    expect(isAccountType("ASSET")).toBe(false);
  });
});

describe("isSourceRef", () => {
  it("accepts a tagged reference", () => {
    expect(isSourceRef({ kind: "invoice", id: 7 })).toBe(true);
    expect(isSourceRef({ kind: "bank-transaction", id: 1 })).toBe(true);
  });

  it("rejects unknown kinds and bad ids", () => {
    expect(isSourceRef({ kind: "receipt", id: 7 })).toBe(false);
    expect(isSourceRef({ kind: "invoice", id: 0 })).toBe(false);
    expect(isSourceRef({ kind: "invoice", id: "7" })).toBe(false);
    expect(isSourceRef(null)).toBe(false);
  });
});

describe("isAccount", () => {
  it("accepts a chart-of-accounts row", () => {
    expect(
      isAccount({ id: 1, code: "1000", name: "Cash", type: "asset", active: true }),
    ).toBe(true);
  });

  it("rejects an empty code", () => {
    expect(
      isAccount({ id: 1, code: "", name: "Cash", type: "asset", active: true }),
    ).toBe(false);
  });

  it("rejects a missing active flag", () => {
    expect(isAccount({ id: 1, code: "1000", name: "Cash", type: "asset" })).toBe(false);
  });
});

describe("isJournalEntry", () => {
  it("accepts an entry with and without source", () => {
    expect(
      isJournalEntry({
        id: 3,
        postedAt: "2024-01-15",
        postedBy: null,
        description: "Invoice 2024-001 posted",
        source: { kind: "invoice", id: 1 },
      }),
    ).toBe(true);
    expect(
      isJournalEntry({
        id: 4,
        postedAt: "2024-01-15",
        postedBy: "owner",
        description: "Manual",
        source: null,
      }),
    ).toBe(true);
  });

  it("rejects a malformed source", () => {
    expect(
      isJournalEntry({
        id: 3,
        postedAt: "2024-01-15",
        postedBy: null,
        description: "x",
        source: { kind: "nope", id: 1 },
      }),
    ).toBe(false);
  });
});

describe("isJournalLine", () => {
  it("accepts a debit line", () => {
    expect(
      isJournalLine({ id: 1, entryId: 1, accountId: 2, debit: "10.00", credit: "0.00" }),
    ).toBe(true);
  });

  it("rejects numeric amounts", () => {
    expect(
      isJournalLine({ id: 1, entryId: 1, accountId: 2, debit: 10, credit: 0 }),
    ).toBe(false);
  });
});

// =============================================================================
// Banking and billing guards
// =============================================================================

describe("isBankAccountType", () => {
  it("accepts known types", () => {
    expect(isBankAccountType("credit-card")).toBe(true);
    expect(isBankAccountType("cash")).toBe(true);
  });

  it("rejects unknown types", () => {
    expect(isBankAccountType("brokerage")).toBe(false);
  });
});

describe("isSignRule", () => {
  it("accepts the three rules", () => {
    expect(isSignRule("BANK_STANDARD")).toBe(true);
    expect(isSignRule("CC_CHARGES_POSITIVE")).toBe(true);
    expect(isSignRule("CC_CHARGES_NEGATIVE")).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isSignRule("bank_standard")).toBe(false);
    expect(isSignRule("")).toBe(false);
  });
});

describe("isPaymentMethod", () => {
  it("accepts ach and rejects wire", () => {
    expect(isPaymentMethod("ach")).toBe(true);
    expect(isPaymentMethod("wire")).toBe(false);
  });
});
