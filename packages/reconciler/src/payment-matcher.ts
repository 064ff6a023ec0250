/**
 * Bank ↔ Payment Matcher
 *
 * Deposits settle client payments. A linked deposit's entry is the
 * payment's own entry (Dr Cash / Cr AR / Cr Unapplied); the deposit's
 * bank-transaction entry is deleted so the money is not counted twice.
 */

import type { BankTransaction, Payment } from "@tallybook/types";
import type { Books, RecordedPayment } from "@tallybook/books";
import { BooksError } from "@tallybook/books";
import { compareAmounts, isPositive } from "@tallybook/ledger";
import { assertUnmatched, dropTransactionEntries } from "./entries.js";
import type { PaymentFromTransactionInput } from "./types.js";

export class PaymentMatcher {
  constructor(private readonly books: Books) {}

  /**
   * Link a deposit to a payment recorded earlier. The amounts must be
   * identical; the payment takes the statement's date.
   */
  linkExistingPayment(transactionId: number, paymentId: number, user: string | null = null): Payment {
    const { store, logger } = this.books;

    return store.transaction(() => {
      const txn = store.bankTransactions.require(transactionId);
      assertUnmatched(txn);
      const payment = store.payments.require(paymentId);
      this.assertPaymentUnlinked(payment);

      if (compareAmounts(payment.amount, txn.amount) !== 0) {
        throw new BooksError(
          "AMOUNT_MISMATCH",
          `Payment (${payment.amount}) and transaction (${txn.amount}) amounts do not match`,
          { paymentId: payment.id, paymentAmount: payment.amount, transactionAmount: txn.amount },
        );
      }

      if (payment.date !== txn.date) {
        store.payments.update(payment.id, { date: txn.date });
      }
      const posted = this.books.posting.postPayment(payment.id, user);
      this.link(txn, payment.id, posted.entry.id);

      logger.info(
        { transactionId: txn.id, paymentId: payment.id, entryId: posted.entry.id },
        "payment linked",
      );
      return store.payments.require(payment.id);
    });
  }

  /**
   * Record a payment for a deposit, dated and sized from it, post it and
   * link it.
   */
  createPaymentFromTransaction(
    transactionId: number,
    input: PaymentFromTransactionInput,
    user: string | null = null,
  ): RecordedPayment {
    const { store, logger } = this.books;

    return store.transaction(() => {
      const txn = store.bankTransactions.require(transactionId);
      assertUnmatched(txn);
      if (!isPositive(txn.amount)) {
        throw new BooksError(
          "AMOUNT_MISMATCH",
          `Bank transaction ${String(txn.id)} is not a deposit`,
          { transactionId: txn.id, amount: txn.amount },
        );
      }

      const recorded = this.books.directory.recordPayment(
        {
          clientId: input.clientId,
          date: txn.date,
          amount: txn.amount,
          method: input.method,
          memo: input.memo,
          applications: input.applications,
        },
        user,
      );
      this.link(txn, recorded.payment.id, recorded.posted.entry.id);

      logger.info(
        { transactionId: txn.id, paymentId: recorded.payment.id },
        "payment created from bank transaction",
      );
      return recorded;
    });
  }

  private link(txn: BankTransaction, paymentId: number, entryId: number): void {
    const { store } = this.books;
    dropTransactionEntries(store, txn);
    store.bankTransactions.update(txn.id, { paymentId, journalEntryId: entryId });
  }

  /** A payment settles at most one deposit. */
  private assertPaymentUnlinked(payment: Payment): void {
    const holder = this.books.store.bankTransactions.find((t) => t.paymentId === payment.id);
    if (holder !== undefined) {
      throw new BooksError(
        "ALREADY_MATCHED",
        `Payment ${String(payment.id)} is already linked to bank transaction ${String(holder.id)}`,
        { paymentId: payment.id, transactionId: holder.id },
      );
    }
  }
}
