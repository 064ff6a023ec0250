/**
 * @tallybook/importer — CSV bank statement import.
 *
 * Each accepted row becomes one bank transaction posted through
 * `postTransaction`. Rows are skipped when they are empty, when the
 * date cell does not start with a digit (header and footer lines), when
 * the description contains the profile's skip text, or when the amount
 * is zero (card verification holds).
 *
 * The whole statement is one unit of work: a malformed file or the first
 * failing row throws an ImportError and nothing from the statement is kept.
 */

import { parse } from "csv-parse/sync";
import type { BankTransaction, ImportProfile } from "@tallybook/types";
import type { Books } from "@tallybook/books";
import { BooksError } from "@tallybook/books";
import { isZero } from "@tallybook/ledger";
import { DEFAULT_DATE_FORMAT, assertDateFormat, parseDate } from "./date-format.js";
import { normalizeAmount, resolveSignRule } from "./sign-rules.js";
import type { ImportOptions, ImportProfileInput, ImportResult, SkippedRow } from "./types.js";
import { ImportError } from "./types.js";

export class StatementImporter {
  constructor(private readonly books: Books) {}

  // ─── Profiles ────────────────────────────────────────────────────────

  /**
   * Create or replace the import profile of a bank account.
   */
  setImportProfile(bankAccountId: number, input: ImportProfileInput): ImportProfile {
    const { store, logger } = this.books;

    return store.transaction(() => {
      const bankAccount = store.bankAccounts.require(bankAccountId);
      for (const [field, value] of [
        ["dateColumn", input.dateColumn],
        ["descriptionColumn", input.descriptionColumn],
        ["amountColumn", input.amountColumn],
      ] as const) {
        if (!Number.isInteger(value) || value < 0) {
          throw new BooksError("INVALID_CONFIGURATION", `${field} must be a column index ≥ 0`, {
            field,
            value,
          });
        }
      }
      const dateFormat = input.dateFormat ?? DEFAULT_DATE_FORMAT;
      assertDateFormat(dateFormat);

      const skip = input.skipIfDescriptionContains?.trim() ?? "";
      const profile: ImportProfile = {
        bankAccountId: bankAccount.id,
        dateColumn: input.dateColumn,
        descriptionColumn: input.descriptionColumn,
        amountColumn: input.amountColumn,
        dateFormat,
        signRule: resolveSignRule(bankAccount.type, input.signRule),
        skipIfDescriptionContains: skip === "" ? null : skip,
      };
      store.importProfiles.set(bankAccount.id, profile);
      logger.info({ bankAccountId: bankAccount.id, signRule: profile.signRule }, "import profile saved");
      return profile;
    });
  }

  getImportProfile(bankAccountId: number): ImportProfile | undefined {
    return this.books.store.importProfiles.get(bankAccountId);
  }

  requireImportProfile(bankAccountId: number): ImportProfile {
    const profile = this.getImportProfile(bankAccountId);
    if (profile === undefined) {
      throw new BooksError(
        "NOT_FOUND",
        `No import profile defined for bank account ${String(bankAccountId)}`,
        { kind: "import profile", id: bankAccountId },
      );
    }
    return profile;
  }

  // ─── Import ──────────────────────────────────────────────────────────

  importStatement(bankAccountId: number, csv: string, options: ImportOptions): ImportResult {
    const { store, logger } = this.books;
    const bankAccount = store.bankAccounts.require(bankAccountId);
    const profile = this.requireImportProfile(bankAccount.id);
    store.journal.requireAccount(options.offsetAccountId);

    const records = readRecords(csv);

    const result = store.transaction(() => {
      const imported: BankTransaction[] = [];
      const skipped: SkippedRow[] = [];

      for (const [index, record] of records.entries()) {
        const row = index + 1;
        try {
          const outcome = this.importRow(bankAccount.id, profile, record, options.offsetAccountId);
          if (typeof outcome === "string") {
            skipped.push({ row, reason: outcome });
          } else {
            imported.push(outcome);
          }
        } catch (err) {
          throw new ImportError(row, err);
        }
      }

      return { bankAccountId: bankAccount.id, imported, skipped };
    });

    logger.info(
      { bankAccountId: bankAccount.id, imported: result.imported.length, skipped: result.skipped.length },
      "bank statement imported",
    );
    return result;
  }

  private importRow(
    bankAccountId: number,
    profile: ImportProfile,
    record: readonly string[],
    offsetAccountId: number,
  ): BankTransaction | SkippedRow["reason"] {
    if (record.every((cell) => cell.trim() === "")) {
      return "empty";
    }

    const rawDate = (record[profile.dateColumn] ?? "").trim();
    if (!/^\d/.test(rawDate)) {
      return "header";
    }

    const description = cell(record, profile.descriptionColumn, "description");
    const skip = profile.skipIfDescriptionContains;
    if (skip !== null && description.toLowerCase().includes(skip.toLowerCase())) {
      return "filtered";
    }

    const date = parseDate(rawDate, profile.dateFormat);
    const rawAmount = cell(record, profile.amountColumn, "amount").replace(/[$,]/g, "");
    const amount = normalizeAmount(rawAmount, profile.signRule);
    if (isZero(amount)) {
      return "zero";
    }

    return this.books.banking.postTransaction({
      bankAccountId,
      date,
      description,
      amount,
      offsetAccountId,
    });
  }
}

function cell(record: readonly string[], column: number, name: string): string {
  const value = record[column];
  if (value === undefined) {
    throw new BooksError("INVALID_CONFIGURATION", `Row has no ${name} column ${String(column)}`, {
      column,
    });
  }
  return value.trim();
}

/**
 * Parse the whole file up front. A CSV syntax error is reported against
 * the line the parser stopped on.
 */
function readRecords(csv: string): string[][] {
  let parsed: unknown;
  try {
    parsed = parse(csv, {
      bom: true,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: false,
    });
  } catch (err) {
    const line = typeof err === "object" && err !== null && "lines" in err ? err.lines : undefined;
    throw new ImportError(typeof line === "number" ? line : 0, err);
  }
  return toRecords(parsed);
}

function toRecords(parsed: unknown): string[][] {
  if (!Array.isArray(parsed)) return [];
  return parsed.map((record: unknown) =>
    Array.isArray(record) ? record.map((value: unknown) => String(value)) : [],
  );
}
