/**
 * Shared fixtures for the reconciler tests.
 */

import type { Account, BankAccount, BankTransaction } from "@tallybook/types";
import { Books } from "@tallybook/books";
import { Reconciler } from "../src/reconciler.js";

export interface Fixture {
  readonly books: Books;
  readonly reconciler: Reconciler;
  readonly supplies: Account;
  readonly checking: BankAccount;
  readonly savings: BankAccount;
  readonly card: BankAccount;
  txn(bank: BankAccount, date: string, amount: string, description?: string): BankTransaction;
}

export function makeFixture(): Fixture {
  const books = new Books({ now: () => new Date("2024-03-01T12:00:00.000Z") });
  const supplies = books.store.journal.openAccount({
    code: "6100",
    name: "Office Supplies",
    type: "expense",
  });
  const checking = books.banking.createBankAccount({
    type: "checking",
    institution: "First Local",
    maskedNumber: "****1234",
    openingBalance: "1000.00",
  });
  const savings = books.banking.createBankAccount({
    type: "savings",
    institution: "First Local",
    maskedNumber: "****5678",
    openingBalance: "0.00",
  });
  const card = books.banking.createBankAccount({
    type: "credit-card",
    institution: "Card Co",
    maskedNumber: "****9999",
    openingBalance: "0.00",
  });

  return {
    books,
    reconciler: new Reconciler(books),
    supplies,
    checking,
    savings,
    card,
    txn: (bank, date, amount, description = "statement line") =>
      books.banking.postTransaction({
        bankAccountId: bank.id,
        date,
        description,
        amount,
        offsetAccountId: books.chart.ownerEquity.id,
      }),
  };
}

/** Debit/credit triples of an entry's lines by account code. */
export function linesOf(books: Books, entryId: number): [string, string, string][] {
  const journal = books.store.journal;
  return journal.getLines(entryId).map((line) => [
    journal.requireAccount(line.accountId).code,
    line.debit,
    line.credit,
  ]);
}
