/**
 * Tests for the chart of accounts.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ChartOfAccounts } from "../src/accounts.js";
import { LedgerError } from "../src/types.js";

describe("ChartOfAccounts", () => {
  let chart: ChartOfAccounts;

  beforeEach(() => {
    chart = new ChartOfAccounts();
  });

  it("assigns sequential ids", () => {
    const cash = chart.open({ code: "1000", name: "Cash", type: "asset" });
    const rev = chart.open({ code: "4000", name: "Revenue", type: "income" });
    expect(cash.id).toBe(1);
    expect(rev.id).toBe(2);
    expect(chart.nextId).toBe(3);
  });

  it("defaults accounts to active", () => {
    expect(chart.open({ code: "1000", name: "Cash", type: "asset" }).active).toBe(true);
    expect(
      chart.open({ code: "1001", name: "Old", type: "asset", active: false }).active,
    ).toBe(false);
  });

  it("trims codes", () => {
    const acct = chart.open({ code: " 1000 ", name: "Cash", type: "asset" });
    expect(acct.code).toBe("1000");
    expect(chart.getByCode("1000")?.id).toBe(acct.id);
  });

  it("rejects duplicate codes", () => {
    chart.open({ code: "1000", name: "Cash", type: "asset" });
    expect(() => chart.open({ code: "1000", name: "Other", type: "asset" })).toThrow(
      /already exists/,
    );
  });

  it("rejects empty codes", () => {
    expect(() => chart.open({ code: "  ", name: "Blank", type: "asset" })).toThrow(
      expect.objectContaining({ code: "INVALID_ACCOUNT" }),
    );
  });

  it("throws UNKNOWN_ACCOUNT for missing ids and codes", () => {
    expect(() => chart.assertExists(99)).toThrow(LedgerError);
    expect(() => chart.assertCode("9999")).toThrow(/Unknown account code/);
  });

  it("reports the normal balance from the type", () => {
    const cash = chart.open({ code: "1000", name: "Cash", type: "asset" });
    const card = chart.open({ code: "2100", name: "Card", type: "liability" });
    expect(chart.getNormalBalance(cash.id)).toBe("debit");
    expect(chart.getNormalBalance(card.id)).toBe("credit");
  });

  it("orders by type, then code", () => {
    chart.open({ code: "5000", name: "Rent", type: "expense" });
    chart.open({ code: "4000", name: "Revenue", type: "income" });
    chart.open({ code: "1100", name: "AR", type: "asset" });
    chart.open({ code: "1000", name: "Cash", type: "asset" });
    chart.open({ code: "3000", name: "Equity", type: "equity" });
    expect(chart.getAll().map((a) => a.code)).toEqual([
      "1000",
      "1100",
      "3000",
      "4000",
      "5000",
    ]);
  });

  it("filters by code range", () => {
    chart.open({ code: "1000", name: "Cash", type: "asset" });
    chart.open({ code: "1110", name: "Checking", type: "asset" });
    chart.open({ code: "1111", name: "Savings", type: "asset" });
    chart.open({ code: "1200", name: "Other", type: "asset" });
    expect(chart.inCodeRange("1110", "1199").map((a) => a.code)).toEqual([
      "1110",
      "1111",
    ]);
  });

  it("toggles active without changing identity", () => {
    const cash = chart.open({ code: "1000", name: "Cash", type: "asset" });
    const updated = chart.setActive(cash.id, false);
    expect(updated).toEqual({ ...cash, active: false });
    expect(chart.get(cash.id)?.active).toBe(false);
  });

  it("frees the code on remove", () => {
    const cash = chart.open({ code: "1000", name: "Cash", type: "asset" });
    chart.remove(cash.id);
    expect(chart.has(cash.id)).toBe(false);
    expect(chart.open({ code: "1000", name: "Cash again", type: "asset" }).id).toBe(2);
  });

  it("loads a saved chart", () => {
    chart.load([{ id: 5, code: "1000", name: "Cash", type: "asset", active: true }], 6);
    expect(chart.count).toBe(1);
    expect(chart.getByCode("1000")?.id).toBe(5);
    expect(chart.open({ code: "1100", name: "AR", type: "asset" }).id).toBe(6);
  });
});
