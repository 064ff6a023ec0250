/**
 * @tallybook/ledger — Double-entry journal engine.
 *
 * A pure TypeScript ledger with zero runtime dependencies.
 * Enforces double-entry accounting invariants:
 * - Every entry balances (debits = credits)
 * - Referenced accounts cannot be deleted
 * - Deleting an entry deletes its lines
 * - All monetary arithmetic uses bigint cents (no floating point)
 */

// Core engine
export { Journal } from "./journal.js";

// Chart of accounts
export { ChartOfAccounts, compareAccounts } from "./accounts.js";

// Balance computation
export {
  computeAccountBalance,
  computeTrialBalance,
  computeIncomeStatement,
  inRange,
} from "./balance-calculator.js";

// Money arithmetic
export {
  AMOUNT_DECIMALS,
  ZERO,
  parseAmount,
  formatAmount,
  toAmount,
  addAmounts,
  subtractAmounts,
  sumAmounts,
  negateAmount,
  absAmount,
  isZero,
  isPositive,
  isNegative,
  compareAmounts,
  multiplyAmount,
} from "./money-math.js";

// Types
export type {
  NormalBalance,
  OpenAccountInput,
  LineDraft,
  EntryDraft,
  PostedEntry,
  DateRange,
  EntryFilter,
  AccountBalance,
  TrialBalanceLine,
  TrialBalance,
  IncomeStatementLine,
  IncomeStatement,
  JournalSnapshot,
  LedgerErrorCode,
} from "./types.js";

export { LedgerError, NORMAL_BALANCE, ACCOUNT_TYPE_ORDER } from "./types.js";
