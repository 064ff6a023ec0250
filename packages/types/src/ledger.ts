/**
 * Ledger Types
 *
 * Core accounting primitives for the general ledger.
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - A single reporting currency; amounts carry exactly two decimals
 * - Journal lines never exist without their entry
 */

/**
 * A precise monetary amount in the books' currency.
 * Canonical form is a signed decimal string with two places ("150.00", "-45.10").
 */
export type Amount = string;

/** A calendar date, ISO 8601 "YYYY-MM-DD". */
export type IsoDate = string;

/** The five fundamental account types in double-entry accounting. */
export type AccountType = "asset" | "liability" | "equity" | "income" | "expense";

/**
 * An entry in the chart of accounts.
 *
 * The code is unique and sortable; its numeric range encodes the type
 * ("1000"-"1999" assets, "2000"-"2999" liabilities, ...).
 */
export interface Account {
  readonly id: number;
  readonly code: string;
  readonly name: string;
  readonly type: AccountType;
  readonly active: boolean;
}

/**
 * The kinds of business document a journal entry can originate from.
 */
export type SourceKind =
  | "invoice"
  | "payment"
  | "bank-transaction"
  | "bank-account"
  | "expense";

/**
 * Tagged reference to the document that produced a journal entry.
 * Resolving it is a lookup keyed by `kind`.
 */
export interface SourceRef {
  readonly kind: SourceKind;
  readonly id: number;
}

/**
 * One atomic accounting event. Its lines always balance.
 */
export interface JournalEntry {
  readonly id: number;

  /** ISO 8601 date or timestamp the entry is effective at */
  readonly postedAt: string;

  /** User that caused the posting, for audit display only */
  readonly postedBy: string | null;

  readonly description: string;

  /** Originating business document, if any */
  readonly source: SourceRef | null;
}

/**
 * A single debit or credit row within a journal entry.
 * Exactly one of debit/credit is non-zero in normal postings.
 */
export interface JournalLine {
  readonly id: number;
  readonly entryId: number;
  readonly accountId: number;
  readonly debit: Amount;
  readonly credit: Amount;
}
