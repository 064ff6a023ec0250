/**
 * @tallybook/books — Book store.
 *
 * Holds the journal and every business table in memory and provides the
 * unit of work the engine's operations run in. The outermost transaction
 * snapshots the whole book; if the callback throws, the snapshot is
 * restored and the error re-thrown, so no partial entry, line or link
 * survives.
 *
 * Nested transactions join the enclosing one and take no snapshot of
 * their own. An error thrown inside them rolls back only once it leaves
 * the outermost scope; catching it half way keeps the inner writes.
 */

import type {
  BankAccount,
  BankTransaction,
  Client,
  Expense,
  ExpenseCategory,
  ImportProfile,
  Invoice,
  InvoiceLine,
  Payment,
  PaymentApplication,
} from "@tallybook/types";
import { Journal, LedgerError } from "@tallybook/ledger";
import { Table } from "./table.js";
import type { BooksSnapshot } from "./types.js";

export class BookStore {
  readonly journal: Journal = new Journal();

  readonly bankAccounts = new Table<BankAccount>("bank account");
  readonly bankTransactions = new Table<BankTransaction>("bank transaction");
  readonly clients = new Table<Client>("client");
  readonly invoices = new Table<Invoice>("invoice");
  readonly invoiceLines = new Table<InvoiceLine>("invoice line");
  readonly payments = new Table<Payment>("payment");
  readonly paymentApplications = new Table<PaymentApplication>("payment application");
  readonly expenseCategories = new Table<ExpenseCategory>("expense category");
  readonly expenses = new Table<Expense>("expense");

  /** Keyed by bank account id (one profile per account) */
  readonly importProfiles: Map<number, ImportProfile> = new Map();

  private _depth = 0;

  /**
   * Run `fn` atomically against the book.
   */
  transaction<T>(fn: () => T): T {
    if (this._depth > 0) {
      this._depth++;
      try {
        return fn();
      } finally {
        this._depth--;
      }
    }

    const savepoint = this.snapshot();
    this._depth++;
    try {
      return fn();
    } catch (err) {
      this.restore(savepoint);
      throw err;
    } finally {
      this._depth--;
    }
  }

  /** Whether a transaction is currently open. */
  get inTransaction(): boolean {
    return this._depth > 0;
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): BooksSnapshot {
    return {
      version: 1,
      journal: this.journal.snapshot(),
      bankAccounts: this.bankAccounts.snapshot(),
      bankTransactions: this.bankTransactions.snapshot(),
      importProfiles: [...this.importProfiles.values()].sort(
        (a, b) => a.bankAccountId - b.bankAccountId,
      ),
      clients: this.clients.snapshot(),
      invoices: this.invoices.snapshot(),
      invoiceLines: this.invoiceLines.snapshot(),
      payments: this.payments.snapshot(),
      paymentApplications: this.paymentApplications.snapshot(),
      expenseCategories: this.expenseCategories.snapshot(),
      expenses: this.expenses.snapshot(),
    };
  }

  restore(snapshot: BooksSnapshot): void {
    if (snapshot.version !== 1) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Unsupported books snapshot version: ${String(snapshot.version)}`,
      );
    }

    this.journal.restore(snapshot.journal);
    this.bankAccounts.restore(snapshot.bankAccounts);
    this.bankTransactions.restore(snapshot.bankTransactions);
    this.clients.restore(snapshot.clients);
    this.invoices.restore(snapshot.invoices);
    this.invoiceLines.restore(snapshot.invoiceLines);
    this.payments.restore(snapshot.payments);
    this.paymentApplications.restore(snapshot.paymentApplications);
    this.expenseCategories.restore(snapshot.expenseCategories);
    this.expenses.restore(snapshot.expenses);

    this.importProfiles.clear();
    for (const profile of snapshot.importProfiles) {
      this.importProfiles.set(profile.bankAccountId, profile);
    }
  }

  static fromSnapshot(snapshot: BooksSnapshot): BookStore {
    const store = new BookStore();
    store.restore(snapshot);
    return store;
  }
}
