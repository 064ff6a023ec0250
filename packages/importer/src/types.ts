/**
 * @tallybook/importer — Types for statement import.
 *
 * Rules:
 * - An import is all-or-nothing: one failing row aborts every row
 * - The failing row is reported by its 1-based record number
 */

import type { BankTransaction, SignRule } from "@tallybook/types";

// ─── Profiles ────────────────────────────────────────────────────────────

/**
 * How a bank's CSV export is laid out. `signRule` may be left out for
 * checking, savings and cash accounts; credit cards must name one.
 */
export interface ImportProfileInput {
  readonly dateColumn: number;
  readonly descriptionColumn: number;
  readonly amountColumn: number;
  readonly dateFormat?: string | undefined;
  readonly signRule?: SignRule | undefined;
  readonly skipIfDescriptionContains?: string | null | undefined;
}

// ─── Import ──────────────────────────────────────────────────────────────

export interface ImportOptions {
  /** GL account every imported transaction is posted against until retagged */
  readonly offsetAccountId: number;
}

export type SkipReason = "empty" | "header" | "filtered" | "zero";

export interface SkippedRow {
  readonly row: number;
  readonly reason: SkipReason;
}

export interface ImportResult {
  readonly bankAccountId: number;
  readonly imported: readonly BankTransaction[];
  readonly skipped: readonly SkippedRow[];
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type ImportErrorCode = "ROW_FAILED";

/**
 * A statement row could not be imported. Nothing from the statement
 * was kept.
 */
export class ImportError extends Error {
  public readonly code: ImportErrorCode = "ROW_FAILED";
  public readonly row: number;
  public readonly details: Readonly<Record<string, unknown>>;

  constructor(row: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Row ${String(row)}: ${reason}`, { cause });
    this.name = "ImportError";
    this.row = row;
    this.details = {
      row,
      cause: typeof cause === "object" && cause !== null && "code" in cause ? cause.code : null,
    };
  }
}
