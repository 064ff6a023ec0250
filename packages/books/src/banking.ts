/**
 * @tallybook/books — Bank accounts and bank transactions.
 *
 * Every bank transaction owns a journal entry until it is matched:
 * - amount > 0 (deposit): Dr bank GL / Cr offset
 * - amount < 0 (withdrawal): Dr offset / Cr bank GL
 *
 * Retagging rebuilds the lines of that same entry; matching deletes it
 * and links a new one (see @tallybook/reconciler).
 */

import type { BankAccount, BankTransaction } from "@tallybook/types";
import type { LineDraft, PostedEntry } from "@tallybook/ledger";
import {
  LedgerError,
  absAmount,
  isPositive,
  isZero,
  toAmount,
} from "@tallybook/ledger";
import type { BooksContext } from "./context.js";
import { assertIsoDate } from "./dates.js";
import type { CreateBankAccountInput, PostTransactionInput } from "./types.js";
import { BooksError } from "./types.js";

/** Derived: linked to a payment, an expense or a transfer counterpart. */
export function isMatched(txn: BankTransaction): boolean {
  return txn.paymentId !== null || txn.expenseId !== null || txn.transferPairId !== null;
}

/**
 * The two lines of a bank transaction posted against an offset account.
 */
export function bankTransactionLines(
  amount: string,
  bankGlAccountId: number,
  offsetAccountId: number,
): readonly LineDraft[] {
  const abs = absAmount(amount);
  if (isPositive(amount)) {
    return [
      { accountId: bankGlAccountId, debit: abs },
      { accountId: offsetAccountId, credit: abs },
    ];
  }
  return [
    { accountId: offsetAccountId, debit: abs },
    { accountId: bankGlAccountId, credit: abs },
  ];
}

export class BankingService {
  constructor(private readonly ctx: BooksContext) {}

  // ─── Bank Accounts ───────────────────────────────────────────────────

  /**
   * Next free code in the reserved bank range: numeric max + 1, or the
   * floor when the range is empty.
   */
  nextBankAccountCode(): string {
    const { store, chart } = this.ctx;
    const { bankCodeFloor, bankCodeCeiling } = chart.config;

    let max: number | null = null;
    for (const account of store.journal.accountsInCodeRange(bankCodeFloor, bankCodeCeiling)) {
      if (!/^\d+$/.test(account.code)) {
        throw new BooksError(
          "INVALID_CONFIGURATION",
          `Invalid account code in bank range: "${account.code}"`,
          { code: account.code },
        );
      }
      const n = Number(account.code);
      max = max === null ? n : Math.max(max, n);
    }

    if (max === null) {
      return bankCodeFloor;
    }

    const next = String(max + 1).padStart(bankCodeFloor.length, "0");
    if (next > bankCodeCeiling) {
      throw new BooksError(
        "INVALID_CONFIGURATION",
        `Bank account code range ${bankCodeFloor}-${bankCodeCeiling} is exhausted`,
      );
    }
    return next;
  }

  /**
   * Create the GL account, the bank account and its opening entry in one unit.
   */
  createBankAccount(input: CreateBankAccountInput): BankAccount {
    const { store, logger, now } = this.ctx;

    return store.transaction(() => {
      const openingBalance = toAmount(input.openingBalance);
      const account = store.journal.openAccount({
        code: this.nextBankAccountCode(),
        name: `${input.institution} (${input.maskedNumber})`,
        type: input.type === "credit-card" ? "liability" : "asset",
      });

      const bankAccount = store.bankAccounts.insert((id) => ({
        id,
        accountId: account.id,
        type: input.type,
        institution: input.institution,
        maskedNumber: input.maskedNumber,
        openingBalance,
        createdAt: now().toISOString(),
      }));

      if (!isZero(openingBalance)) {
        this.postOpeningEntry(bankAccount);
      }

      logger.info(
        { bankAccountId: bankAccount.id, accountCode: account.code, openingBalance },
        "bank account created",
      );
      return bankAccount;
    });
  }

  /**
   * Opening balance entry against Owner Equity.
   *
   * Asset, positive: Dr bank / Cr equity. Asset, negative: Dr equity / Cr bank.
   * Liability, positive: Dr equity / Cr card. Liability, negative: Dr card / Cr equity.
   */
  postOpeningEntry(bankAccount: BankAccount): PostedEntry {
    const { store, chart } = this.ctx;
    const gl = store.journal.requireAccount(bankAccount.accountId);
    const equityId = chart.ownerEquity.id;
    const amount = absAmount(bankAccount.openingBalance);
    const increases = isPositive(bankAccount.openingBalance);

    // An increase of a liability is a credit, of an asset a debit.
    const bankOnDebit = gl.type === "liability" ? !increases : increases;
    const lines: LineDraft[] = bankOnDebit
      ? [
          { accountId: gl.id, debit: amount },
          { accountId: equityId, credit: amount },
        ]
      : [
          { accountId: equityId, debit: amount },
          { accountId: gl.id, credit: amount },
        ];

    return store.journal.post({
      postedAt: bankAccount.createdAt.slice(0, 10),
      description: `Opening balance for ${bankAccount.institution} (${bankAccount.maskedNumber})`,
      source: { kind: "bank-account", id: bankAccount.id },
      lines,
    });
  }

  requireBankAccount(id: number): BankAccount {
    return this.ctx.store.bankAccounts.require(id);
  }

  listBankAccounts(): readonly BankAccount[] {
    return this.ctx.store.bankAccounts.all();
  }

  // ─── Bank Transactions ───────────────────────────────────────────────

  /**
   * Record a bank transaction and its entry.
   */
  postTransaction(input: PostTransactionInput): BankTransaction {
    const { store, logger } = this.ctx;

    return store.transaction(() => {
      const bankAccount = store.bankAccounts.require(input.bankAccountId);
      const date = assertIsoDate(input.date);
      const amount = toAmount(input.amount);
      if (isZero(amount)) {
        throw new LedgerError("INVALID_AMOUNT", "A bank transaction cannot be zero");
      }
      store.journal.requireAccount(input.offsetAccountId);

      const txn = store.bankTransactions.insert((id) => ({
        id,
        bankAccountId: bankAccount.id,
        date,
        description: input.description,
        amount,
        offsetAccountId: input.offsetAccountId,
        journalEntryId: null,
        paymentId: null,
        expenseId: null,
        transferPairId: null,
      }));

      const { entry } = store.journal.post({
        postedAt: date,
        description: `Bank txn: ${input.description}`,
        source: { kind: "bank-transaction", id: txn.id },
        lines: bankTransactionLines(amount, bankAccount.accountId, input.offsetAccountId),
      });

      logger.debug(
        { transactionId: txn.id, bankAccountId: bankAccount.id, amount, entryId: entry.id },
        "bank transaction posted",
      );
      return store.bankTransactions.update(txn.id, { journalEntryId: entry.id });
    });
  }

  /**
   * Point a transaction at a different offset account, rebuilding the
   * lines of its existing entry. The entry id does not change.
   */
  retagTransaction(transactionId: number, newOffsetAccountId: number): BankTransaction {
    const { store, logger } = this.ctx;

    return store.transaction(() => {
      const txn = store.bankTransactions.require(transactionId);
      if (isMatched(txn)) {
        throw new BooksError(
          "ALREADY_MATCHED",
          `Bank transaction ${String(txn.id)} is matched; unmatch it before retagging`,
          { transactionId: txn.id },
        );
      }
      store.journal.requireAccount(newOffsetAccountId);
      const bankAccount = store.bankAccounts.require(txn.bankAccountId);
      const lines = bankTransactionLines(txn.amount, bankAccount.accountId, newOffsetAccountId);

      let entryId = txn.journalEntryId;
      if (entryId !== null && store.journal.getEntry(entryId) !== undefined) {
        store.journal.replaceLines(entryId, lines);
      } else {
        entryId = store.journal.post({
          postedAt: txn.date,
          description: `Bank txn: ${txn.description}`,
          source: { kind: "bank-transaction", id: txn.id },
          lines,
        }).entry.id;
      }

      logger.info(
        {
          transactionId: txn.id,
          from: txn.offsetAccountId,
          to: newOffsetAccountId,
          entryId,
        },
        "bank transaction retagged",
      );
      return store.bankTransactions.update(txn.id, {
        offsetAccountId: newOffsetAccountId,
        journalEntryId: entryId,
      });
    });
  }

  /**
   * Retag a transaction as an owner contribution or draw.
   */
  markAsOwnerEquity(transactionId: number): BankTransaction {
    return this.retagTransaction(transactionId, this.ctx.chart.ownerEquity.id);
  }

  /**
   * Remove an unmatched transaction together with its entry.
   */
  deleteTransaction(transactionId: number): void {
    const { store, logger } = this.ctx;

    store.transaction(() => {
      const txn = store.bankTransactions.require(transactionId);
      if (isMatched(txn)) {
        throw new BooksError(
          "ALREADY_MATCHED",
          `Bank transaction ${String(txn.id)} is matched and cannot be deleted`,
          { transactionId: txn.id },
        );
      }
      for (const entry of store.journal.entriesForSource({
        kind: "bank-transaction",
        id: txn.id,
      })) {
        store.journal.deleteEntry(entry.id);
      }
      store.bankTransactions.delete(txn.id);
      logger.info({ transactionId: txn.id }, "bank transaction deleted");
    });
  }

  requireTransaction(id: number): BankTransaction {
    return this.ctx.store.bankTransactions.require(id);
  }

  /**
   * Transactions of one account, oldest first (date, then insertion order).
   */
  transactionsFor(bankAccountId: number): readonly BankTransaction[] {
    return [...this.ctx.store.bankTransactions.filter((t) => t.bankAccountId === bankAccountId)]
      .sort(compareTransactions);
  }
}

export function compareTransactions(a: BankTransaction, b: BankTransaction): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  return a.id - b.id;
}

