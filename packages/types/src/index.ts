/**
 * @tallybook/types — Shared domain types for the bookkeeping engine.
 *
 * These types are used across all tallybook packages:
 * - Ledger primitives (accounts, journal entries, journal lines)
 * - Banking (bank accounts, transactions, import profiles)
 * - Billing documents (clients, invoices, payments, expenses)
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Ids are positive integers assigned by the book store
 */

// Ledger types
export type {
  Amount,
  IsoDate,
  AccountType,
  Account,
  SourceKind,
  SourceRef,
  JournalEntry,
  JournalLine,
} from "./ledger.js";

// Banking types
export type {
  BankAccountType,
  BankAccount,
  BankTransaction,
  SignRule,
  ImportProfile,
} from "./banking.js";

// Billing types
export type {
  Client,
  InvoiceStatus,
  InvoicePostingState,
  Invoice,
  InvoiceLineType,
  InvoiceLine,
  PaymentMethod,
  Payment,
  PaymentApplication,
  ExpenseCategory,
  Expense,
} from "./billing.js";

// Runtime type guards
export {
  isAmount,
  isIsoDate,
  isAccountType,
  isSourceKind,
  isSourceRef,
  isAccount,
  isJournalEntry,
  isJournalLine,
  isBankAccountType,
  isSignRule,
  isPaymentMethod,
} from "./guards.js";
