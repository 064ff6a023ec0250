/**
 * @tallybook/reconciler — Bank transaction matching.
 *
 * Matches bank and card activity to what the books already know:
 * 1. Expense — a withdrawal settles a recorded expense
 * 2. Transfer — two transactions on the user's own accounts
 * 3. Payment — a deposit settles a client payment
 *
 * Every match supersedes the transaction's own entry and runs as one
 * unit of work against the books.
 */

// Reconciler (top-level coordinator)
export { Reconciler } from "./reconciler.js";

// Matchers
export { ExpenseMatcher } from "./expense-matcher.js";
export { TransferMatcher } from "./transfer-matcher.js";
export { PaymentMatcher } from "./payment-matcher.js";

// Types
export type {
  TransferMatch,
  PaymentFromTransactionInput,
  BatchExpenseRow,
  BatchRowError,
  BatchMatchResult,
  UnmatchResult,
} from "./types.js";
