import { describe, it, expect, beforeEach } from "vitest";
import type { Account, BankAccount } from "@tallybook/types";
import { Books } from "@tallybook/books";
import { StatementImporter } from "../src/statement-importer.js";
import { ImportError } from "../src/types.js";

let books: Books;
let importer: StatementImporter;
let checking: BankAccount;
let card: BankAccount;
let suspense: Account;

beforeEach(() => {
  books = new Books({ now: () => new Date("2024-03-01T12:00:00.000Z") });
  importer = new StatementImporter(books);
  suspense = books.store.journal.openAccount({ code: "6999", name: "Uncategorized", type: "expense" });
  checking = books.banking.createBankAccount({
    type: "checking",
    institution: "First Local",
    maskedNumber: "****1234",
    openingBalance: "0.00",
  });
  card = books.banking.createBankAccount({
    type: "credit-card",
    institution: "Card Co",
    maskedNumber: "****9999",
    openingBalance: "0.00",
  });
});

const BANK_CSV = [
  "Date,Description,Amount",
  "01/05/2024,Coffee shop,-4.50",
  '01/06/2024,"Deposit, payroll","$1,200.00"',
  "01/07/2024,Online TRANSFER to savings,-100.00",
  "Total,,1095.50",
].join("\n");

describe("setImportProfile", () => {
  it("defaults the date format and keeps an explicit sign rule", () => {
    const profile = importer.setImportProfile(checking.id, {
      dateColumn: 0,
      descriptionColumn: 1,
      amountColumn: 2,
      signRule: "CC_CHARGES_POSITIVE",
      skipIfDescriptionContains: "  ",
    });
    expect(profile).toEqual({
      bankAccountId: checking.id,
      dateColumn: 0,
      descriptionColumn: 1,
      amountColumn: 2,
      dateFormat: "%Y-%m-%d",
      signRule: "CC_CHARGES_POSITIVE",
      skipIfDescriptionContains: null,
    });
    expect(importer.getImportProfile(checking.id)).toEqual(profile);
  });

  it("uses BANK_STANDARD when a bank account profile names no rule", () => {
    const profile = importer.setImportProfile(checking.id, {
      dateColumn: 0,
      descriptionColumn: 1,
      amountColumn: 2,
    });
    expect(profile.signRule).toBe("BANK_STANDARD");
  });

  it("requires a sign rule for cards", () => {
    expect(() =>
      importer.setImportProfile(card.id, { dateColumn: 0, descriptionColumn: 1, amountColumn: 2 }),
    ).toThrow(expect.objectContaining({ code: "INVALID_CONFIGURATION" }));
    expect(importer.getImportProfile(card.id)).toBeUndefined();
  });

  it("rejects negative column indices and incomplete date formats", () => {
    expect(() =>
      importer.setImportProfile(checking.id, { dateColumn: -1, descriptionColumn: 1, amountColumn: 2 }),
    ).toThrow(expect.objectContaining({ code: "INVALID_CONFIGURATION" }));
    expect(() =>
      importer.setImportProfile(checking.id, {
        dateColumn: 0,
        descriptionColumn: 1,
        amountColumn: 2,
        dateFormat: "%m/%Y",
      }),
    ).toThrow(expect.objectContaining({ code: "INVALID_CONFIGURATION" }));
  });
});

describe("importStatement", () => {
  beforeEach(() => {
    importer.setImportProfile(checking.id, {
      dateColumn: 0,
      descriptionColumn: 1,
      amountColumn: 2,
      dateFormat: "%m/%d/%Y",
      skipIfDescriptionContains: "transfer",
    });
  });

  it("posts accepted rows and reports skipped ones", () => {
    const result = importer.importStatement(checking.id, BANK_CSV, { offsetAccountId: suspense.id });

    expect(result.imported.map((t) => [t.date, t.description, t.amount])).toEqual([
      ["2024-01-05", "Coffee shop", "-4.50"],
      ["2024-01-06", "Deposit, payroll", "1200.00"],
    ]);
    expect(result.skipped).toEqual([
      { row: 1, reason: "header" },
      { row: 4, reason: "filtered" },
      { row: 5, reason: "header" },
    ]);
    expect(books.bankAccountBalance(checking.id)).toBe("1195.50");
    expect(books.accountBalance(suspense.id).balance).toBe("-1195.50");
    expect(result.imported.every((t) => t.offsetAccountId === suspense.id)).toBe(true);
  });

  it("flips card charges under CC_CHARGES_POSITIVE", () => {
    importer.setImportProfile(card.id, {
      dateColumn: 0,
      descriptionColumn: 1,
      amountColumn: 2,
      signRule: "CC_CHARGES_POSITIVE",
    });
    const csv = "2024-02-01,Software,45.00\n2024-02-03,Payment,-100.00\n";

    const result = importer.importStatement(card.id, csv, { offsetAccountId: suspense.id });

    expect(result.imported.map((t) => t.amount)).toEqual(["-45.00", "100.00"]);
    expect(books.bankAccountBalance(card.id)).toBe("55.00");
  });

  it("skips rows with a zero amount", () => {
    const csv = [
      "Date,Description,Amount",
      "01/05/2024,Coffee,-4.50",
      "01/06/2024,Card verification,0.00",
      "01/07/2024,Deposit,100.00",
    ].join("\n");

    const result = importer.importStatement(checking.id, csv, { offsetAccountId: suspense.id });

    expect(result.imported.map((t) => t.amount)).toEqual(["-4.50", "100.00"]);
    expect(result.skipped).toEqual([
      { row: 1, reason: "header" },
      { row: 3, reason: "zero" },
    ]);
    expect(books.bankAccountBalance(checking.id)).toBe("95.50");
  });

  it("reports a malformed file as a failed import", () => {
    const csv = 'Date,Description,Amount\n01/05/2024,"Coffee,-4.50\n';
    const entriesBefore = books.store.journal.entryCount;

    let caught: unknown;
    try {
      importer.importStatement(checking.id, csv, { offsetAccountId: suspense.id });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ImportError);
    expect(caught).toMatchObject({
      code: "ROW_FAILED",
      details: { cause: "CSV_QUOTE_NOT_CLOSED" },
    });
    expect(books.banking.transactionsFor(checking.id)).toEqual([]);
    expect(books.store.journal.entryCount).toBe(entriesBefore);
  });

  it("keeps nothing when a row fails", () => {
    const csv = [
      "01/05/2024,Coffee shop,-4.50",
      "01/06/2024,Lunch,-12.00",
      "13/45/2024,Broken,-1.00",
    ].join("\n");
    const entriesBefore = books.store.journal.entryCount;

    let caught: unknown;
    try {
      importer.importStatement(checking.id, csv, { offsetAccountId: suspense.id });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ImportError);
    expect(caught).toMatchObject({ code: "ROW_FAILED", row: 3, details: { row: 3, cause: "INVALID_DATE" } });
    expect(books.banking.transactionsFor(checking.id)).toEqual([]);
    expect(books.store.journal.entryCount).toBe(entriesBefore);
  });

  it("reports malformed amounts with their row", () => {
    expect(() =>
      importer.importStatement(checking.id, "01/05/2024,Coffee,abc", { offsetAccountId: suspense.id }),
    ).toThrow(expect.objectContaining({ code: "ROW_FAILED", row: 1, details: { row: 1, cause: "INVALID_AMOUNT" } }));
  });

  it("reports rows that are missing a column", () => {
    expect(() =>
      importer.importStatement(checking.id, "01/05/2024,Coffee", { offsetAccountId: suspense.id }),
    ).toThrow(expect.objectContaining({ code: "ROW_FAILED", row: 1 }));
  });

  it("needs a profile", () => {
    expect(() => importer.importStatement(card.id, BANK_CSV, { offsetAccountId: suspense.id })).toThrow(
      expect.objectContaining({ code: "NOT_FOUND" }),
    );
  });

  it("needs a known offset account", () => {
    expect(() => importer.importStatement(checking.id, BANK_CSV, { offsetAccountId: 999 })).toThrow(
      expect.objectContaining({ code: "UNKNOWN_ACCOUNT" }),
    );
  });
});
