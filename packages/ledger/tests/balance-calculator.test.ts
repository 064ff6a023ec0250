/**
 * Tests for the balance calculator.
 *
 * Covers:
 * - Account balance computation
 * - Normal balance rules (debit vs credit normal)
 * - Date range filtering
 * - Trial balance and income statement
 */

import { describe, it, expect } from "vitest";
import type { Account, JournalEntry, JournalLine } from "@tallybook/types";
import {
  computeAccountBalance,
  computeIncomeStatement,
  computeTrialBalance,
  inRange,
} from "../src/balance-calculator.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const CASH: Account = { id: 1, code: "1000", name: "Cash", type: "asset", active: true };
const CARD: Account = { id: 2, code: "2100", name: "Card", type: "liability", active: true };
const EQUITY: Account = { id: 3, code: "3000", name: "Equity", type: "equity", active: true };
const REVENUE: Account = { id: 4, code: "4000", name: "Revenue", type: "income", active: true };
const RENT: Account = { id: 5, code: "6100", name: "Rent", type: "expense", active: true };
const ACCOUNTS = [CASH, CARD, EQUITY, REVENUE, RENT];

function entries(...dates: string[]): Map<number, JournalEntry> {
  const map = new Map<number, JournalEntry>();
  dates.forEach((postedAt, i) => {
    map.set(i + 1, { id: i + 1, postedAt, postedBy: null, description: `e${String(i + 1)}`, source: null });
  });
  return map;
}

let lineId = 0;
function dr(entryId: number, account: Account, amount: string): JournalLine {
  return { id: ++lineId, entryId, accountId: account.id, debit: amount, credit: "0.00" };
}
function cr(entryId: number, account: Account, amount: string): JournalLine {
  return { id: ++lineId, entryId, accountId: account.id, debit: "0.00", credit: amount };
}

// Jan: owner puts in 1000, earns 500. Feb: pays 200 rent on the card.
const ENTRIES = entries("2024-01-02", "2024-01-20", "2024-02-01");
const LINES: JournalLine[] = [
  dr(1, CASH, "1000.00"),
  cr(1, EQUITY, "1000.00"),
  dr(2, CASH, "500.00"),
  cr(2, REVENUE, "500.00"),
  dr(3, RENT, "200.00"),
  cr(3, CARD, "200.00"),
];

// ─── Tests ───────────────────────────────────────────────────────────────

describe("inRange", () => {
  it("is inclusive at both ends", () => {
    const range = { from: "2024-01-01", to: "2024-01-31" };
    expect(inRange("2024-01-01", range)).toBe(true);
    expect(inRange("2024-01-31T23:59:59Z", range)).toBe(true);
    expect(inRange("2024-02-01", range)).toBe(false);
  });

  it("accepts open ends", () => {
    expect(inRange("1999-12-31", { to: "2024-01-01" })).toBe(true);
    expect(inRange("1999-12-31", { from: "2024-01-01" })).toBe(false);
    expect(inRange("1999-12-31", undefined)).toBe(true);
  });
});

describe("computeAccountBalance", () => {
  it("computes a debit-normal balance", () => {
    const bal = computeAccountBalance(CASH, ENTRIES, LINES);
    expect(bal.debitSum).toBe("1500.00");
    expect(bal.creditSum).toBe("0.00");
    expect(bal.balance).toBe("1500.00");
    expect(bal.normalBalance).toBe("1500.00");
  });

  it("computes a credit-normal balance", () => {
    const bal = computeAccountBalance(CARD, ENTRIES, LINES);
    expect(bal.balance).toBe("-200.00");
    expect(bal.normalBalance).toBe("200.00");
  });

  it("filters by posting date", () => {
    const bal = computeAccountBalance(CASH, ENTRIES, LINES, { to: "2024-01-10" });
    expect(bal.balance).toBe("1000.00");
  });

  it("returns zeros for an untouched account", () => {
    const idle: Account = { id: 9, code: "1999", name: "Idle", type: "asset", active: true };
    const bal = computeAccountBalance(idle, ENTRIES, LINES);
    expect(bal.debitSum).toBe("0.00");
    expect(bal.balance).toBe("0.00");
  });
});

describe("computeTrialBalance", () => {
  it("lists every account and balances", () => {
    const tb = computeTrialBalance(ACCOUNTS, ENTRIES, LINES);
    expect(tb.lines).toHaveLength(5);
    expect(tb.totalDebits).toBe("1700.00");
    expect(tb.totalCredits).toBe("1700.00");
    expect(tb.balanced).toBe(true);
  });

  it("keeps raw debit and credit sums per account", () => {
    const tb = computeTrialBalance(ACCOUNTS, ENTRIES, LINES);
    const revenue = tb.lines.find((l) => l.code === "4000");
    expect(revenue).toMatchObject({ debitSum: "0.00", creditSum: "500.00", balance: "-500.00" });
  });

  it("applies a range", () => {
    const tb = computeTrialBalance(ACCOUNTS, ENTRIES, LINES, { from: "2024-02-01" });
    expect(tb.totalDebits).toBe("200.00");
    expect(tb.range).toEqual({ from: "2024-02-01" });
  });

  it("flags an unbalanced line set", () => {
    const tb = computeTrialBalance(ACCOUNTS, ENTRIES, [dr(1, CASH, "5.00")]);
    expect(tb.balanced).toBe(false);
  });
});

describe("computeIncomeStatement", () => {
  it("nets revenue against expenses", () => {
    const is = computeIncomeStatement(ACCOUNTS, ENTRIES, LINES);
    expect(is.revenueTotal).toBe("500.00");
    expect(is.expenseTotal).toBe("200.00");
    expect(is.netIncome).toBe("300.00");
    expect(is.revenue.map((l) => l.code)).toEqual(["4000"]);
    expect(is.expenses).toEqual([
      { accountId: RENT.id, code: "6100", name: "Rent", amount: "200.00" },
    ]);
  });

  it("reports a loss for a range with only expenses", () => {
    const is = computeIncomeStatement(ACCOUNTS, ENTRIES, LINES, { from: "2024-02-01" });
    expect(is.netIncome).toBe("-200.00");
  });
});
