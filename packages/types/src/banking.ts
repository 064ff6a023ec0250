/**
 * Banking Types
 *
 * Bank accounts wrap exactly one GL account. Bank transactions use the
 * internal sign convention: positive = funds in, negative = funds out.
 */

import type { Amount, IsoDate } from "./ledger.js";

export type BankAccountType = "checking" | "savings" | "credit-card" | "cash";

/**
 * A real-world bank, card or cash account.
 *
 * `openingBalance` is the only balance ever persisted; everything else
 * is derived from transactions and the journal.
 */
export interface BankAccount {
  readonly id: number;

  /** The GL account this bank account posts to (asset, or liability for cards) */
  readonly accountId: number;

  readonly type: BankAccountType;
  readonly institution: string;
  readonly maskedNumber: string;
  readonly openingBalance: Amount;
  readonly createdAt: string;
}

/**
 * A deposit, withdrawal or charge against a bank account.
 *
 * At most one of paymentId / expenseId / transferPairId is set.
 * Transfer pairs share one journal entry.
 */
export interface BankTransaction {
  readonly id: number;
  readonly bankAccountId: number;
  readonly date: IsoDate;
  readonly description: string;
  readonly amount: Amount;

  /** The non-bank GL account this transaction affects */
  readonly offsetAccountId: number | null;

  readonly journalEntryId: number | null;
  readonly paymentId: number | null;
  readonly expenseId: number | null;
  readonly transferPairId: number | null;
}

/**
 * How a statement file signs its amounts.
 *
 * - BANK_STANDARD: + deposit, - withdrawal (same as internal)
 * - CC_CHARGES_POSITIVE: + charge, - payment
 * - CC_CHARGES_NEGATIVE: - charge, + payment (same as internal)
 */
export type SignRule = "BANK_STANDARD" | "CC_CHARGES_POSITIVE" | "CC_CHARGES_NEGATIVE";

/**
 * Per-account layout of a CSV bank statement.
 */
export interface ImportProfile {
  readonly bankAccountId: number;

  /** Zero-based column indices */
  readonly dateColumn: number;
  readonly descriptionColumn: number;
  readonly amountColumn: number;

  /** strptime-style pattern, e.g. "%m/%d/%Y" */
  readonly dateFormat: string;

  readonly signRule: SignRule;

  /** Rows whose description contains this (case-insensitive) are skipped */
  readonly skipIfDescriptionContains: string | null;
}
