/**
 * Shared rules for transactions whose entry is about to be superseded.
 */

import type { BankTransaction } from "@tallybook/types";
import { BooksError, isMatched } from "@tallybook/books";
import type { BookStore } from "@tallybook/books";

export function assertUnmatched(txn: BankTransaction): void {
  if (isMatched(txn)) {
    throw new BooksError(
      "ALREADY_MATCHED",
      `Bank transaction ${String(txn.id)} is already matched`,
      {
        transactionId: txn.id,
        paymentId: txn.paymentId,
        expenseId: txn.expenseId,
        transferPairId: txn.transferPairId,
      },
    );
  }
}

/**
 * Delete the entries a transaction posted for itself.
 * Entries of other documents (a payment's) are left alone.
 */
export function dropTransactionEntries(store: BookStore, txn: BankTransaction): number[] {
  const deleted: number[] = [];
  for (const entry of store.journal.entriesForSource({ kind: "bank-transaction", id: txn.id })) {
    store.journal.deleteEntry(entry.id);
    deleted.push(entry.id);
  }
  return deleted;
}

