/**
 * @tallybook/ledger — Internal types for the ledger engine.
 *
 * These extend the shared @tallybook/types with ledger-specific
 * structures used by the journal and the balance calculator.
 *
 * Rules:
 * - All types are readonly
 * - A committed entry always balances
 * - Fail-closed: invalid entries throw, never silently succeed
 */

import type {
  Account,
  AccountType,
  Amount,
  IsoDate,
  JournalEntry,
  JournalLine,
  SourceRef,
} from "@tallybook/types";

// ─── Account Types ───────────────────────────────────────────────────────

/** Normal balance direction for an account. */
export type NormalBalance = "debit" | "credit";

/**
 * Map account types to their normal balance direction.
 *
 * - Asset, Expense → debit-normal (increases with debits)
 * - Liability, Income, Equity → credit-normal (increases with credits)
 */
export const NORMAL_BALANCE: Readonly<Record<AccountType, NormalBalance>> = {
  asset: "debit",
  expense: "debit",
  liability: "credit",
  income: "credit",
  equity: "credit",
} as const;

/** Display order of account types in reports. */
export const ACCOUNT_TYPE_ORDER: readonly AccountType[] = [
  "asset",
  "liability",
  "equity",
  "income",
  "expense",
];

/**
 * Input for opening a chart-of-accounts entry.
 */
export interface OpenAccountInput {
  readonly code: string;
  readonly name: string;
  readonly type: AccountType;
  readonly active?: boolean | undefined;
}

// ─── Posting Types ───────────────────────────────────────────────────────

/**
 * One side of a journal line before it is committed.
 * Omitted sides are zero.
 */
export interface LineDraft {
  readonly accountId: number;
  readonly debit?: Amount | undefined;
  readonly credit?: Amount | undefined;
}

/**
 * A journal entry before it is committed.
 */
export interface EntryDraft {
  readonly postedAt: string;
  readonly postedBy?: string | null | undefined;
  readonly description: string;
  readonly source?: SourceRef | null | undefined;
  readonly lines: readonly LineDraft[];
}

/**
 * A committed entry together with its lines.
 */
export interface PostedEntry {
  readonly entry: JournalEntry;
  readonly lines: readonly JournalLine[];
}

// ─── Query Types ─────────────────────────────────────────────────────────

/**
 * Inclusive date range. Either end may be open.
 */
export interface DateRange {
  readonly from?: IsoDate | undefined;
  readonly to?: IsoDate | undefined;
}

/**
 * Filter criteria for querying journal entries.
 */
export interface EntryFilter {
  readonly accountId?: number | undefined;
  readonly source?: SourceRef | undefined;
  readonly range?: DateRange | undefined;
}

// ─── Report Types ────────────────────────────────────────────────────────

/**
 * Debit/credit activity of one account.
 */
export interface AccountBalance {
  readonly accountId: number;
  readonly code: string;
  readonly name: string;
  readonly type: AccountType;
  readonly debitSum: Amount;
  readonly creditSum: Amount;
  /** debitSum − creditSum */
  readonly balance: Amount;
  /** Balance in the account's normal direction (positive = normal) */
  readonly normalBalance: Amount;
}

/**
 * A single line in the trial balance.
 */
export interface TrialBalanceLine {
  readonly accountId: number;
  readonly code: string;
  readonly name: string;
  readonly type: AccountType;
  readonly debitSum: Amount;
  readonly creditSum: Amount;
  readonly balance: Amount;
}

/**
 * The full trial balance report.
 * Total debits MUST equal total credits.
 */
export interface TrialBalance {
  readonly range: DateRange;
  readonly lines: readonly TrialBalanceLine[];
  readonly totalDebits: Amount;
  readonly totalCredits: Amount;
  readonly balanced: boolean;
}

export interface IncomeStatementLine {
  readonly accountId: number;
  readonly code: string;
  readonly name: string;
  /** Revenue shown positive for income accounts, cost positive for expense accounts */
  readonly amount: Amount;
}

export interface IncomeStatement {
  readonly range: DateRange;
  readonly revenue: readonly IncomeStatementLine[];
  readonly expenses: readonly IncomeStatementLine[];
  readonly revenueTotal: Amount;
  readonly expenseTotal: Amount;
  readonly netIncome: Amount;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the entire journal.
 * Used for rollback and persistence.
 */
export interface JournalSnapshot {
  readonly version: 1;
  readonly accounts: readonly Account[];
  readonly entries: readonly JournalEntry[];
  readonly lines: readonly JournalLine[];
  readonly sequences: {
    readonly account: number;
    readonly entry: number;
    readonly line: number;
  };
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "UNBALANCED_ENTRY"
  | "EMPTY_ENTRY"
  | "INVALID_AMOUNT"
  | "INVALID_LINE"
  | "UNKNOWN_ACCOUNT"
  | "INVALID_ACCOUNT"
  | "UNKNOWN_ENTRY"
  | "DUPLICATE_ACCOUNT_CODE"
  | "ACCOUNT_IN_USE"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
