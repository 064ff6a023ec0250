/**
 * Shared fixtures for the books tests.
 */

import type { Account } from "@tallybook/types";
import { Books } from "../src/books.js";

/** Fixed clock: 2024-03-01, noon UTC. */
export const NOW = new Date("2024-03-01T12:00:00.000Z");

export interface Fixture {
  readonly books: Books;
  readonly supplies: Account;
  readonly software: Account;
  readonly interest: Account;
}

export function makeBooks(): Fixture {
  const books = new Books({ now: () => NOW });
  const journal = books.store.journal;
  return {
    books,
    supplies: journal.openAccount({ code: "6100", name: "Office Supplies", type: "expense" }),
    software: journal.openAccount({ code: "6200", name: "Software", type: "expense" }),
    interest: journal.openAccount({ code: "4100", name: "Interest Income", type: "income" }),
  };
}

/** Debit/credit pairs of an entry's lines by account code. */
export function linesOf(books: Books, entryId: number): [string, string, string][] {
  const journal = books.store.journal;
  return journal.getLines(entryId).map((line) => [
    journal.requireAccount(line.accountId).code,
    line.debit,
    line.credit,
  ]);
}
