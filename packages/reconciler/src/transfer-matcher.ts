/**
 * Bank ↔ Bank Transfer Matcher
 *
 * Pairs the two sides of a transfer between the user's own accounts.
 * Both transactions give up their own entries and share one:
 *   Dr destination GL / Cr source GL for the common |amount|.
 *
 * The source is the side with a negative amount. When neither side is
 * negative the first argument is the source.
 */

import type { BankTransaction } from "@tallybook/types";
import type { Books } from "@tallybook/books";
import { BooksError, isMatched } from "@tallybook/books";
import { absAmount, compareAmounts, isNegative } from "@tallybook/ledger";
import { assertUnmatched, dropTransactionEntries } from "./entries.js";
import type { TransferMatch } from "./types.js";

export class TransferMatcher {
  constructor(private readonly books: Books) {}

  matchTransfer(fromTransactionId: number, toTransactionId: number): TransferMatch {
    const { store, logger } = this.books;

    return store.transaction(() => {
      const txnFrom = store.bankTransactions.require(fromTransactionId);
      const txnTo = store.bankTransactions.require(toTransactionId);

      if (txnFrom.bankAccountId === txnTo.bankAccountId) {
        throw new BooksError(
          "SAME_ACCOUNT_TRANSFER",
          "Both sides of a transfer are on the same bank account",
          { bankAccountId: txnFrom.bankAccountId },
        );
      }
      assertUnmatched(txnFrom);
      assertUnmatched(txnTo);

      const amount = absAmount(txnFrom.amount);
      if (compareAmounts(amount, absAmount(txnTo.amount)) !== 0) {
        throw new BooksError(
          "AMOUNT_MISMATCH",
          `Transfer amounts differ: ${txnFrom.amount} vs ${txnTo.amount}`,
          { from: txnFrom.amount, to: txnTo.amount },
        );
      }

      const [source, destination] =
        !isNegative(txnFrom.amount) && isNegative(txnTo.amount)
          ? [txnTo, txnFrom]
          : [txnFrom, txnTo];
      const sourceBank = store.bankAccounts.require(source.bankAccountId);
      const destinationBank = store.bankAccounts.require(destination.bankAccountId);
      const sourceGl = store.journal.requireAccount(sourceBank.accountId);
      const destinationGl = store.journal.requireAccount(destinationBank.accountId);

      const deleted = [
        ...dropTransactionEntries(store, source),
        ...dropTransactionEntries(store, destination),
      ];
      const posted = store.journal.post({
        postedAt: source.date,
        description: `Transfer: ${sourceGl.name} → ${destinationGl.name}`,
        source: { kind: "bank-transaction", id: source.id },
        lines: [
          { accountId: destinationGl.id, debit: amount },
          { accountId: sourceGl.id, credit: amount },
        ],
      });

      const matchedSource = store.bankTransactions.update(source.id, {
        transferPairId: destination.id,
        offsetAccountId: destinationGl.id,
        journalEntryId: posted.entry.id,
      });
      const matchedDestination = store.bankTransactions.update(destination.id, {
        transferPairId: source.id,
        offsetAccountId: sourceGl.id,
        journalEntryId: posted.entry.id,
      });

      logger.info(
        {
          sourceId: source.id,
          destinationId: destination.id,
          amount,
          entryId: posted.entry.id,
          superseded: deleted,
        },
        "transfer matched",
      );
      return { entry: posted, source: matchedSource, destination: matchedDestination };
    });
  }

  /**
   * Unmatched transactions on other bank accounts for the same |amount|,
   * newest first.
   */
  transferCandidates(transactionId: number): readonly BankTransaction[] {
    const { store } = this.books;
    const txn = store.bankTransactions.require(transactionId);
    const amount = absAmount(txn.amount);

    return [
      ...store.bankTransactions.filter(
        (t) =>
          t.bankAccountId !== txn.bankAccountId &&
          !isMatched(t) &&
          compareAmounts(absAmount(t.amount), amount) === 0,
      ),
    ].sort((a, b) => (a.date !== b.date ? (a.date < b.date ? 1 : -1) : b.id - a.id));
  }
}
