/**
 * @tallybook/books — Integrity check and repair.
 *
 * Finds the damage older books can carry:
 * 1. Orphaned entries: sourced from a bank transaction that no longer
 *    references them (or no longer exists)
 * 2. Bank accounts with a non-zero opening balance and no opening entry
 * 3. Unbalanced entries
 *
 * Repair deletes orphans and posts the missing opening entries.
 * Unbalanced entries are reported only.
 */

import type { BankingService } from "./banking.js";
import type { BooksContext } from "./context.js";
import { isZero } from "@tallybook/ledger";

export interface OrphanedEntry {
  readonly entryId: number;
  readonly transactionId: number;
  readonly description: string;
}

export interface MissingOpeningEntry {
  readonly bankAccountId: number;
  readonly openingBalance: string;
}

export interface IntegrityReport {
  readonly orphanedEntries: readonly OrphanedEntry[];
  readonly missingOpeningEntries: readonly MissingOpeningEntry[];
  readonly unbalancedEntryIds: readonly number[];
  readonly clean: boolean;
}

export interface RepairOptions {
  /** Report what would change without changing anything */
  readonly dryRun?: boolean | undefined;
}

export interface RepairResult {
  readonly dryRun: boolean;
  readonly report: IntegrityReport;
  readonly deletedEntryIds: readonly number[];
  readonly openingEntryIds: readonly number[];
}

export function inspectBooks(ctx: BooksContext): IntegrityReport {
  const { store } = ctx;
  const journal = store.journal;

  const orphanedEntries: OrphanedEntry[] = [];
  const unbalancedEntryIds: number[] = [];

  for (const entry of journal.getEntries()) {
    if (!journal.isBalanced(entry.id)) {
      unbalancedEntryIds.push(entry.id);
    }
    if (entry.source?.kind !== "bank-transaction") continue;

    const txn = store.bankTransactions.get(entry.source.id);
    if (txn === undefined || txn.journalEntryId !== entry.id) {
      orphanedEntries.push({
        entryId: entry.id,
        transactionId: entry.source.id,
        description: entry.description,
      });
    }
  }

  const missingOpeningEntries: MissingOpeningEntry[] = [];
  for (const bankAccount of store.bankAccounts.all()) {
    if (isZero(bankAccount.openingBalance)) continue;
    const opening = journal.entriesForSource({ kind: "bank-account", id: bankAccount.id });
    if (opening.length === 0) {
      missingOpeningEntries.push({
        bankAccountId: bankAccount.id,
        openingBalance: bankAccount.openingBalance,
      });
    }
  }

  return {
    orphanedEntries,
    missingOpeningEntries,
    unbalancedEntryIds,
    clean:
      orphanedEntries.length === 0 &&
      missingOpeningEntries.length === 0 &&
      unbalancedEntryIds.length === 0,
  };
}

export function repairBooks(
  ctx: BooksContext,
  banking: BankingService,
  options: RepairOptions = {},
): RepairResult {
  const { store, logger } = ctx;
  const report = inspectBooks(ctx);
  const dryRun = options.dryRun === true;

  if (dryRun) {
    logger.info(
      {
        orphaned: report.orphanedEntries.length,
        missingOpening: report.missingOpeningEntries.length,
      },
      "integrity repair dry run",
    );
    return { dryRun, report, deletedEntryIds: [], openingEntryIds: [] };
  }

  return store.transaction(() => {
    const deletedEntryIds: number[] = [];
    for (const orphan of report.orphanedEntries) {
      store.journal.deleteEntry(orphan.entryId);
      deletedEntryIds.push(orphan.entryId);
    }

    const openingEntryIds: number[] = [];
    for (const missing of report.missingOpeningEntries) {
      const bankAccount = store.bankAccounts.require(missing.bankAccountId);
      openingEntryIds.push(banking.postOpeningEntry(bankAccount).entry.id);
    }

    if (report.unbalancedEntryIds.length > 0) {
      logger.warn(
        { entryIds: report.unbalancedEntryIds },
        "unbalanced entries need manual correction",
      );
    }
    logger.info({ deletedEntryIds, openingEntryIds }, "integrity repair applied");
    return { dryRun, report, deletedEntryIds, openingEntryIds };
  });
}
