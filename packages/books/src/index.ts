/**
 * @tallybook/books — Book store and posting engine.
 *
 * Turns business events into balanced journal entries:
 * - Invoices: post / reverse, append-only, one live posting at a time
 * - Payments: one entry per payment (cash vs receivables vs unapplied)
 * - Bank accounts: GL account allocation and opening balances
 * - Bank transactions: post, retag, mark as owner equity, delete
 *
 * Every operation is atomic: on any error the book is left as it was.
 */

// Facade
export { Books } from "./books.js";

// Store
export { BookStore } from "./store.js";
export { Table } from "./table.js";

// Services
export { PostingEngine } from "./posting.js";
export {
  BankingService,
  bankTransactionLines,
  compareTransactions,
  isMatched,
} from "./banking.js";
export { BillingDirectory } from "./directory.js";
export type { RecordedPayment } from "./directory.js";
export type { BooksContext } from "./context.js";

// Chart
export { ChartAccounts, seedChartOfAccounts } from "./chart.js";

// Reports
export { bankAccountBalance, runningBalanceForRange } from "./balances.js";
export { agingBucket, arAging, clientBalanceSummary } from "./receivables.js";
export type { ClientBalanceOptions } from "./receivables.js";

// Integrity
export { inspectBooks, repairBooks } from "./integrity.js";
export type {
  IntegrityReport,
  MissingOpeningEntry,
  OrphanedEntry,
  RepairOptions,
  RepairResult,
} from "./integrity.js";

// Persistence
export {
  FileBooksRepository,
  InMemoryBooksRepository,
  computeStateHash,
  verifyStoredBooks,
} from "./repository.js";
export type { BooksRepository, StoredBooks } from "./repository.js";
export { BooksSnapshotSchema } from "./snapshot-schema.js";

// Dates
export { addDays, assertIsoDate, daysBetween, toIsoDate } from "./dates.js";

// Types
export type {
  ChartConfig,
  BooksLogger,
  BooksOptions,
  CreateBankAccountInput,
  PostTransactionInput,
  CreateClientInput,
  CreateInvoiceInput,
  InvoiceLineInput,
  ApplicationInput,
  RecordPaymentInput,
  CreateCategoryInput,
  CreateExpenseInput,
  RegisterRow,
  BankRegister,
  ClientBalance,
  ClientBalanceSortKey,
  AgingBucket,
  AgingRow,
  ArAging,
  TableSnapshot,
  BooksSnapshot,
  BooksErrorCode,
} from "./types.js";
export { BooksError, DEFAULT_CHART_CONFIG, silentLogger } from "./types.js";
