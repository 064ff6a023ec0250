/**
 * @tallybook/reconciler domain types.
 *
 * Inputs and results of matching bank activity to:
 * - Expenses (settled from a bank or card account)
 * - Transfers (the other side on another bank account)
 * - Client payments (deposits)
 */

import type { BankTransaction, Expense, PaymentMethod } from "@tallybook/types";
import type { ApplicationInput } from "@tallybook/books";
import type { PostedEntry } from "@tallybook/ledger";

// =============================================================================
// Transfers
// =============================================================================

/** A matched transfer: both transactions share one entry. */
export interface TransferMatch {
  readonly entry: PostedEntry;
  /** The side funds left (negative amount, or the first argument) */
  readonly source: BankTransaction;
  readonly destination: BankTransaction;
}

// =============================================================================
// Payments
// =============================================================================

/** A payment created from a deposit takes its date and amount from the deposit. */
export interface PaymentFromTransactionInput {
  readonly clientId: number;
  readonly method: PaymentMethod;
  readonly memo?: string | undefined;
  readonly applications?: readonly ApplicationInput[] | undefined;
}

// =============================================================================
// Batch Expense Matching
// =============================================================================

/**
 * One row of a batch match: link an existing expense, or create one
 * in the given category. Rows with neither are ignored.
 */
export interface BatchExpenseRow {
  readonly transactionId: number;
  readonly expenseId?: number | undefined;
  readonly categoryId?: number | undefined;
}

export interface BatchRowError {
  readonly transactionId: number;
  readonly code: string;
  readonly message: string;
}

export interface BatchMatchResult {
  /** Transactions linked to an existing expense */
  readonly linked: readonly number[];
  /** Expenses created and linked, one per row */
  readonly created: readonly Expense[];
  /** Transactions skipped because they were already matched */
  readonly skipped: readonly number[];
  readonly errors: readonly BatchRowError[];
}

// =============================================================================
// Unmatching
// =============================================================================

export interface UnmatchResult {
  /** The transaction and, for a transfer, its former partner, re-posted */
  readonly released: readonly BankTransaction[];
  /** Entries deleted because they were superseded */
  readonly deletedEntryIds: readonly number[];
}
