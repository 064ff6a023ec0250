/**
 * Bank ↔ Expense Matcher
 *
 * Settles recorded expenses against bank or card withdrawals.
 *
 * Linking supersedes the transaction's own entry: it is deleted and a new
 * entry debits the expense category's GL account and credits the bank
 * account for |amount|.
 */

import type { BankTransaction, Expense } from "@tallybook/types";
import type { Books } from "@tallybook/books";
import { BooksError, isMatched } from "@tallybook/books";
import { LedgerError, absAmount, compareAmounts } from "@tallybook/ledger";
import { assertUnmatched, dropTransactionEntries } from "./entries.js";
import type { BatchExpenseRow, BatchMatchResult, BatchRowError } from "./types.js";

export class ExpenseMatcher {
  constructor(private readonly books: Books) {}

  /**
   * Link a transaction to an expense and re-post it against the
   * expense category's account.
   */
  linkExpense(transactionId: number, expenseId: number): Expense {
    const { store, logger } = this.books;

    return store.transaction(() => {
      const txn = store.bankTransactions.require(transactionId);
      assertUnmatched(txn);
      const expense = store.expenses.require(expenseId);
      this.assertExpenseUnsettled(expense);

      const category = store.expenseCategories.require(expense.categoryId);
      if (category.accountId === null) {
        throw new BooksError(
          "MISSING_GL_ACCOUNT",
          `Expense category "${category.name}" has no GL account`,
          { categoryId: category.id },
        );
      }
      const bankAccount = store.bankAccounts.require(txn.bankAccountId);
      const amount = absAmount(txn.amount);

      const deleted = dropTransactionEntries(store, txn);
      const { entry } = store.journal.post({
        postedAt: txn.date,
        description: `Expense: ${expense.description}`,
        source: { kind: "expense", id: expense.id },
        lines: [
          { accountId: category.accountId, debit: amount },
          { accountId: bankAccount.accountId, credit: amount },
        ],
      });

      store.bankTransactions.update(txn.id, {
        expenseId: expense.id,
        offsetAccountId: category.accountId,
        journalEntryId: entry.id,
      });
      logger.info(
        { transactionId: txn.id, expenseId: expense.id, entryId: entry.id, superseded: deleted },
        "expense linked",
      );
      return store.expenses.update(expense.id, { paymentAccountId: bankAccount.id });
    });
  }

  /**
   * Match many transactions at once. Each row commits on its own;
   * failures are collected and the remaining rows still run.
   */
  matchExpensesBatch(rows: readonly BatchExpenseRow[]): BatchMatchResult {
    const { store } = this.books;
    const linked: number[] = [];
    const created: Expense[] = [];
    const skipped: number[] = [];
    const errors: BatchRowError[] = [];

    for (const row of rows) {
      if (row.expenseId === undefined && row.categoryId === undefined) continue;

      try {
        const txn = store.bankTransactions.require(row.transactionId);
        if (isMatched(txn)) {
          skipped.push(txn.id);
          continue;
        }

        if (row.expenseId !== undefined) {
          this.linkExpense(txn.id, row.expenseId);
          linked.push(txn.id);
        } else if (row.categoryId !== undefined) {
          created.push(this.createAndLink(txn, row.categoryId));
        }
      } catch (err) {
        if (!(err instanceof BooksError) && !(err instanceof LedgerError)) {
          throw err;
        }
        errors.push({ transactionId: row.transactionId, code: err.code, message: err.message });
      }
    }

    this.books.logger.info(
      { linked: linked.length, created: created.length, skipped: skipped.length, errors: errors.length },
      "batch expense match finished",
    );
    return { linked, created, skipped, errors };
  }

  /**
   * Unsettled expenses for exactly |amount|, newest first.
   */
  expenseCandidates(transactionId: number): readonly Expense[] {
    const { store } = this.books;
    const txn = store.bankTransactions.require(transactionId);
    const amount = absAmount(txn.amount);
    const settled = settledExpenseIds(store.bankTransactions.all());

    return [
      ...store.expenses.filter(
        (e) =>
          e.paymentAccountId === null &&
          !settled.has(e.id) &&
          compareAmounts(e.amount, amount) === 0,
      ),
    ].sort((a, b) => (a.date !== b.date ? (a.date < b.date ? 1 : -1) : b.id - a.id));
  }

  private createAndLink(txn: BankTransaction, categoryId: number): Expense {
    return this.books.store.transaction(() => {
      const expense = this.books.directory.createExpense({
        clientId: null,
        categoryId,
        date: txn.date,
        amount: absAmount(txn.amount),
        description: txn.description,
        billable: false,
      });
      return this.linkExpense(txn.id, expense.id);
    });
  }

  private assertExpenseUnsettled(expense: Expense): void {
    const holder = this.books.store.bankTransactions.find((t) => t.expenseId === expense.id);
    if (expense.paymentAccountId !== null || holder !== undefined) {
      throw new BooksError(
        "ALREADY_MATCHED",
        `Expense ${String(expense.id)} is already settled`,
        { expenseId: expense.id, transactionId: holder?.id ?? null },
      );
    }
  }
}

function settledExpenseIds(transactions: readonly BankTransaction[]): Set<number> {
  const ids = new Set<number>();
  for (const txn of transactions) {
    if (txn.expenseId !== null) ids.add(txn.expenseId);
  }
  return ids;
}
