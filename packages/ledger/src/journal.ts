/**
 * @tallybook/ledger — Core Journal class.
 *
 * Double-entry journal: the chart of accounts, journal entries and
 * their lines. Every committed entry balances.
 *
 * API surface:
 * - openAccount() / removeAccount() — Maintain the chart (restrict delete)
 * - post() — Commit a balanced entry
 * - replaceLines() — Rebuild an entry's lines in place
 * - deleteEntry() — Remove an entry and its lines (cascade)
 * - entriesForSource() — Entries posted for a business document
 * - getAccountBalance() / getTrialBalance() / getIncomeStatement()
 * - snapshot() / restore() — Rollback and persistence
 */

import type {
  Account,
  Amount,
  JournalEntry,
  JournalLine,
  SourceRef,
} from "@tallybook/types";
import { ChartOfAccounts } from "./accounts.js";
import {
  computeAccountBalance,
  computeIncomeStatement,
  computeTrialBalance,
  inRange,
} from "./balance-calculator.js";
import { formatAmount, parseAmount } from "./money-math.js";
import type {
  AccountBalance,
  DateRange,
  EntryDraft,
  EntryFilter,
  IncomeStatement,
  JournalSnapshot,
  LineDraft,
  OpenAccountInput,
  PostedEntry,
  TrialBalance,
} from "./types.js";
import { LedgerError } from "./types.js";

function sameSource(a: SourceRef | null, b: SourceRef): boolean {
  return a !== null && a.kind === b.kind && a.id === b.id;
}

export class Journal {
  private readonly _accounts: ChartOfAccounts = new ChartOfAccounts();
  private readonly _entries: Map<number, JournalEntry> = new Map();
  private readonly _lines: Map<number, JournalLine> = new Map();
  private readonly _linesByEntry: Map<number, number[]> = new Map();
  private _nextEntryId = 1;
  private _nextLineId = 1;

  // ─── Chart of Accounts ───────────────────────────────────────────────

  openAccount(input: OpenAccountInput): Account {
    return this._accounts.open(input);
  }

  getAccount(id: number): Account | undefined {
    return this._accounts.get(id);
  }

  requireAccount(id: number): Account {
    return this._accounts.assertExists(id);
  }

  getAccountByCode(code: string): Account | undefined {
    return this._accounts.getByCode(code);
  }

  requireAccountByCode(code: string): Account {
    return this._accounts.assertCode(code);
  }

  getAccounts(): readonly Account[] {
    return this._accounts.getAll();
  }

  accountsInCodeRange(from: string, to: string): readonly Account[] {
    return this._accounts.inCodeRange(from, to);
  }

  setAccountActive(id: number, active: boolean): Account {
    return this._accounts.setActive(id, active);
  }

  isAccountReferenced(id: number): boolean {
    for (const line of this._lines.values()) {
      if (line.accountId === id) return true;
    }
    return false;
  }

  /**
   * Delete an account. Referenced accounts are protected.
   */
  removeAccount(id: number): void {
    this._accounts.assertExists(id);
    if (this.isAccountReferenced(id)) {
      throw new LedgerError(
        "ACCOUNT_IN_USE",
        `Account ${String(id)} is referenced by journal lines and cannot be deleted`,
      );
    }
    this._accounts.remove(id);
  }

  // ─── Posting ─────────────────────────────────────────────────────────

  /**
   * Commit a balanced journal entry.
   *
   * Validation rules (fail-closed — all must pass):
   * 1. At least one line
   * 2. All referenced accounts exist
   * 3. Every line has exactly one non-zero, non-negative side
   * 4. Total debits equal total credits
   */
  post(draft: EntryDraft): PostedEntry {
    const lines = this._validateLines(draft.lines);

    const entry: JournalEntry = {
      id: this._nextEntryId++,
      postedAt: draft.postedAt,
      postedBy: draft.postedBy ?? null,
      description: draft.description,
      source: draft.source ?? null,
    };

    this._entries.set(entry.id, entry);
    this._linesByEntry.set(entry.id, []);

    return { entry, lines: this._insertLines(entry.id, lines) };
  }

  /**
   * Replace every line of an existing entry. The entry keeps its id.
   */
  replaceLines(entryId: number, drafts: readonly LineDraft[]): PostedEntry {
    const entry = this.requireEntry(entryId);
    const lines = this._validateLines(drafts);

    for (const lineId of this._linesByEntry.get(entryId) ?? []) {
      this._lines.delete(lineId);
    }
    this._linesByEntry.set(entryId, []);

    return { entry, lines: this._insertLines(entryId, lines) };
  }

  /**
   * Delete an entry; its lines go with it.
   */
  deleteEntry(entryId: number): void {
    this.requireEntry(entryId);
    for (const lineId of this._linesByEntry.get(entryId) ?? []) {
      this._lines.delete(lineId);
    }
    this._linesByEntry.delete(entryId);
    this._entries.delete(entryId);
  }

  private _validateLines(
    drafts: readonly LineDraft[],
  ): readonly { accountId: number; debit: bigint; credit: bigint }[] {
    if (drafts.length === 0) {
      throw new LedgerError("EMPTY_ENTRY", "Cannot post an entry without lines");
    }

    let debits = 0n;
    let credits = 0n;
    const validated = drafts.map((draft, index) => {
      this._accounts.assertExists(draft.accountId);
      const debit = parseAmount(draft.debit ?? "0");
      const credit = parseAmount(draft.credit ?? "0");

      if (debit < 0n || credit < 0n) {
        throw new LedgerError(
          "INVALID_LINE",
          `Line ${String(index + 1)} has a negative side (debit=${formatAmount(debit)}, credit=${formatAmount(credit)})`,
        );
      }
      if ((debit === 0n) === (credit === 0n)) {
        throw new LedgerError(
          "INVALID_LINE",
          `Line ${String(index + 1)} must carry exactly one non-zero side`,
        );
      }

      debits += debit;
      credits += credit;
      return { accountId: draft.accountId, debit, credit };
    });

    if (debits !== credits) {
      throw new LedgerError(
        "UNBALANCED_ENTRY",
        `Entry is unbalanced: debits=${formatAmount(debits)}, credits=${formatAmount(credits)}`,
      );
    }

    return validated;
  }

  private _insertLines(
    entryId: number,
    lines: readonly { accountId: number; debit: bigint; credit: bigint }[],
  ): readonly JournalLine[] {
    const ids = this._linesByEntry.get(entryId) ?? [];
    const inserted = lines.map((l) => {
      const line: JournalLine = {
        id: this._nextLineId++,
        entryId,
        accountId: l.accountId,
        debit: formatAmount(l.debit),
        credit: formatAmount(l.credit),
      };
      this._lines.set(line.id, line);
      ids.push(line.id);
      return line;
    });
    this._linesByEntry.set(entryId, ids);
    return inserted;
  }

  // ─── Query Operations ────────────────────────────────────────────────

  getEntry(id: number): JournalEntry | undefined {
    return this._entries.get(id);
  }

  requireEntry(id: number): JournalEntry {
    const entry = this._entries.get(id);
    if (entry === undefined) {
      throw new LedgerError("UNKNOWN_ENTRY", `Unknown journal entry: ${String(id)}`);
    }
    return entry;
  }

  getLines(entryId: number): readonly JournalLine[] {
    const ids = this._linesByEntry.get(entryId) ?? [];
    const lines: JournalLine[] = [];
    for (const id of ids) {
      const line = this._lines.get(id);
      if (line !== undefined) lines.push(line);
    }
    return lines;
  }

  getAllLines(): readonly JournalLine[] {
    return [...this._lines.values()];
  }

  /**
   * Entries in id order, optionally filtered.
   */
  getEntries(filter?: EntryFilter): readonly JournalEntry[] {
    const entries = [...this._entries.values()].sort((a, b) => a.id - b.id);
    if (filter === undefined) {
      return entries;
    }

    return entries.filter((entry) => {
      if (filter.source !== undefined && !sameSource(entry.source, filter.source)) {
        return false;
      }
      if (filter.range !== undefined && !inRange(entry.postedAt, filter.range)) {
        return false;
      }
      if (filter.accountId !== undefined) {
        return this.getLines(entry.id).some((l) => l.accountId === filter.accountId);
      }
      return true;
    });
  }

  /**
   * All entries posted for a business document, oldest first.
   */
  entriesForSource(source: SourceRef): readonly JournalEntry[] {
    return this.getEntries({ source });
  }

  /**
   * Debit and credit totals of one entry.
   */
  entryTotals(entryId: number): { readonly debits: Amount; readonly credits: Amount } {
    let debits = 0n;
    let credits = 0n;
    for (const line of this.getLines(entryId)) {
      debits += parseAmount(line.debit);
      credits += parseAmount(line.credit);
    }
    return { debits: formatAmount(debits), credits: formatAmount(credits) };
  }

  isBalanced(entryId: number): boolean {
    const totals = this.entryTotals(entryId);
    return totals.debits === totals.credits;
  }

  get entryCount(): number {
    return this._entries.size;
  }

  get lineCount(): number {
    return this._lines.size;
  }

  // ─── Balances ────────────────────────────────────────────────────────

  getAccountBalance(accountId: number, range?: DateRange): AccountBalance {
    return computeAccountBalance(
      this._accounts.assertExists(accountId),
      this._entries,
      this._lines.values(),
      range,
    );
  }

  getTrialBalance(range?: DateRange): TrialBalance {
    return computeTrialBalance(
      this._accounts.getAll(),
      this._entries,
      this._lines.values(),
      range,
    );
  }

  getIncomeStatement(range?: DateRange): IncomeStatement {
    return computeIncomeStatement(
      this._accounts.getAll(),
      this._entries,
      this._lines.values(),
      range,
    );
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): JournalSnapshot {
    return {
      version: 1,
      accounts: this._accounts.getAll(),
      entries: this.getEntries(),
      lines: [...this._lines.values()].sort((a, b) => a.id - b.id),
      sequences: {
        account: this._accounts.nextId,
        entry: this._nextEntryId,
        line: this._nextLineId,
      },
    };
  }

  /**
   * Replace the journal's state with a snapshot.
   * Lines must reference known entries and accounts.
   */
  restore(snapshot: JournalSnapshot): void {
    if (snapshot.version !== 1) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Unsupported journal snapshot version: ${String(snapshot.version)}`,
      );
    }

    const accountIds = new Set(snapshot.accounts.map((a) => a.id));
    const entryIds = new Set(snapshot.entries.map((e) => e.id));
    for (const line of snapshot.lines) {
      if (!entryIds.has(line.entryId) || !accountIds.has(line.accountId)) {
        throw new LedgerError(
          "INVALID_SNAPSHOT",
          `Journal line ${String(line.id)} references a missing entry or account`,
        );
      }
    }

    this._accounts.load(snapshot.accounts, snapshot.sequences.account);
    this._entries.clear();
    this._lines.clear();
    this._linesByEntry.clear();

    for (const entry of snapshot.entries) {
      this._entries.set(entry.id, entry);
      this._linesByEntry.set(entry.id, []);
    }
    for (const line of snapshot.lines) {
      this._lines.set(line.id, line);
      this._linesByEntry.get(line.entryId)?.push(line.id);
    }

    this._nextEntryId = snapshot.sequences.entry;
    this._nextLineId = snapshot.sequences.line;
  }

  static fromSnapshot(snapshot: JournalSnapshot): Journal {
    const journal = new Journal();
    journal.restore(snapshot);
    return journal;
  }
}
