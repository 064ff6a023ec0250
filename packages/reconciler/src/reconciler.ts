/**
 * Reconciler — Top-level coordinator
 *
 * One entry point for matching bank activity against the books:
 * expenses, transfers and client payments, plus undoing a match.
 *
 * Usage:
 *   const reconciler = new Reconciler(books);
 *   reconciler.matchTransfer(withdrawalId, depositId);
 *   reconciler.unmatchTransaction(withdrawalId, suspenseAccountId);
 */

import type { BankTransaction, Expense, Payment } from "@tallybook/types";
import type { Books, RecordedPayment } from "@tallybook/books";
import { BooksError, isMatched } from "@tallybook/books";
import { ExpenseMatcher } from "./expense-matcher.js";
import { PaymentMatcher } from "./payment-matcher.js";
import { TransferMatcher } from "./transfer-matcher.js";
import { dropTransactionEntries } from "./entries.js";
import type {
  BatchExpenseRow,
  BatchMatchResult,
  PaymentFromTransactionInput,
  TransferMatch,
  UnmatchResult,
} from "./types.js";

export class Reconciler {
  private readonly expenses: ExpenseMatcher;
  private readonly transfers: TransferMatcher;
  private readonly payments: PaymentMatcher;

  constructor(private readonly books: Books) {
    this.expenses = new ExpenseMatcher(books);
    this.transfers = new TransferMatcher(books);
    this.payments = new PaymentMatcher(books);
  }

  linkExpense(transactionId: number, expenseId: number): Expense {
    return this.expenses.linkExpense(transactionId, expenseId);
  }

  matchExpensesBatch(rows: readonly BatchExpenseRow[]): BatchMatchResult {
    return this.expenses.matchExpensesBatch(rows);
  }

  expenseCandidates(transactionId: number): readonly Expense[] {
    return this.expenses.expenseCandidates(transactionId);
  }

  matchTransfer(fromTransactionId: number, toTransactionId: number): TransferMatch {
    return this.transfers.matchTransfer(fromTransactionId, toTransactionId);
  }

  transferCandidates(transactionId: number): readonly BankTransaction[] {
    return this.transfers.transferCandidates(transactionId);
  }

  linkExistingPayment(transactionId: number, paymentId: number, user: string | null = null): Payment {
    return this.payments.linkExistingPayment(transactionId, paymentId, user);
  }

  createPaymentFromTransaction(
    transactionId: number,
    input: PaymentFromTransactionInput,
    user: string | null = null,
  ): RecordedPayment {
    return this.payments.createPaymentFromTransaction(transactionId, input, user);
  }

  /**
   * Undo a payment, expense or transfer match.
   *
   * The superseding entry is deleted (a payment's entry stays: it belongs
   * to the payment), the links are cleared, and each released transaction
   * is posted again against `offsetAccountId`.
   */
  unmatchTransaction(transactionId: number, offsetAccountId: number): UnmatchResult {
    const { store, banking, logger } = this.books;

    return store.transaction(() => {
      const txn = store.bankTransactions.require(transactionId);
      if (!isMatched(txn)) {
        throw new BooksError(
          "NOT_MATCHED",
          `Bank transaction ${String(txn.id)} is not matched`,
          { transactionId: txn.id },
        );
      }
      store.journal.requireAccount(offsetAccountId);

      const deletedEntryIds: number[] = [];
      const releasedIds: number[] = [txn.id];

      if (txn.paymentId === null && txn.journalEntryId !== null) {
        const superseding = store.journal.getEntry(txn.journalEntryId);
        if (superseding !== undefined) {
          store.journal.deleteEntry(superseding.id);
          deletedEntryIds.push(superseding.id);
        }
      }
      deletedEntryIds.push(...dropTransactionEntries(store, txn));

      if (txn.expenseId !== null) {
        store.expenses.update(txn.expenseId, { paymentAccountId: null });
      }
      if (txn.transferPairId !== null) {
        const partner = store.bankTransactions.require(txn.transferPairId);
        deletedEntryIds.push(...dropTransactionEntries(store, partner));
        store.bankTransactions.update(partner.id, { transferPairId: null, journalEntryId: null });
        releasedIds.push(partner.id);
      }
      store.bankTransactions.update(txn.id, {
        paymentId: null,
        expenseId: null,
        transferPairId: null,
        journalEntryId: null,
      });

      const released = releasedIds.map((id) => banking.retagTransaction(id, offsetAccountId));

      logger.info(
        { transactionId: txn.id, released: releasedIds, deletedEntryIds, offsetAccountId },
        "bank transaction unmatched",
      );
      return { released, deletedEntryIds };
    });
  }
}
