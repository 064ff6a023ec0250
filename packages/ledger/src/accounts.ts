/**
 * @tallybook/ledger — Chart of accounts.
 *
 * Accounts are never hard-deleted while a journal line references them;
 * the journal enforces that before calling `remove()`.
 *
 * Rules:
 * - No duplicate account codes
 * - Account type determines normal balance (debit/credit)
 * - Ids come from a monotonically increasing sequence
 */

import type { Account, AccountType } from "@tallybook/types";
import type { NormalBalance, OpenAccountInput } from "./types.js";
import { ACCOUNT_TYPE_ORDER, LedgerError, NORMAL_BALANCE } from "./types.js";

export class ChartOfAccounts {
  private readonly _accounts: Map<number, Account> = new Map();
  private readonly _byCode: Map<string, number> = new Map();
  private _nextId = 1;

  /**
   * Open a new account.
   * Throws if the code already exists.
   */
  open(input: OpenAccountInput): Account {
    const code = input.code.trim();
    if (code === "") {
      throw new LedgerError("INVALID_ACCOUNT", "Account code cannot be empty");
    }
    if (this._byCode.has(code)) {
      throw new LedgerError(
        "DUPLICATE_ACCOUNT_CODE",
        `Account code already exists: "${code}"`,
      );
    }

    const account: Account = {
      id: this._nextId++,
      code,
      name: input.name,
      type: input.type,
      active: input.active ?? true,
    };

    this._accounts.set(account.id, account);
    this._byCode.set(code, account.id);
    return account;
  }

  get(id: number): Account | undefined {
    return this._accounts.get(id);
  }

  getByCode(code: string): Account | undefined {
    const id = this._byCode.get(code);
    return id === undefined ? undefined : this._accounts.get(id);
  }

  has(id: number): boolean {
    return this._accounts.has(id);
  }

  /**
   * Assert an account exists. Throws if not found.
   */
  assertExists(id: number): Account {
    const account = this._accounts.get(id);
    if (account === undefined) {
      throw new LedgerError("UNKNOWN_ACCOUNT", `Unknown account: ${String(id)}`);
    }
    return account;
  }

  /**
   * Look up an account by code. Throws if not found.
   */
  assertCode(code: string): Account {
    const account = this.getByCode(code);
    if (account === undefined) {
      throw new LedgerError("UNKNOWN_ACCOUNT", `Unknown account code: "${code}"`);
    }
    return account;
  }

  getNormalBalance(id: number): NormalBalance {
    return NORMAL_BALANCE[this.assertExists(id).type];
  }

  setActive(id: number, active: boolean): Account {
    const updated: Account = { ...this.assertExists(id), active };
    this._accounts.set(id, updated);
    return updated;
  }

  /**
   * Drop an account. Callers must have checked it is unreferenced.
   */
  remove(id: number): void {
    const account = this.assertExists(id);
    this._accounts.delete(id);
    this._byCode.delete(account.code);
  }

  /**
   * Accounts whose code sorts within [from, to], in code order.
   */
  inCodeRange(from: string, to: string): readonly Account[] {
    return this.getAll().filter((a) => a.code >= from && a.code <= to);
  }

  /**
   * All accounts, ordered by type then code.
   */
  getAll(): readonly Account[] {
    return [...this._accounts.values()].sort(compareAccounts);
  }

  getByType(type: AccountType): readonly Account[] {
    return this.getAll().filter((a) => a.type === type);
  }

  get count(): number {
    return this._accounts.size;
  }

  get nextId(): number {
    return this._nextId;
  }

  /**
   * Replace the whole chart (rollback / rehydration).
   */
  load(accounts: readonly Account[], nextId: number): void {
    this._accounts.clear();
    this._byCode.clear();
    for (const account of accounts) {
      this._accounts.set(account.id, account);
      this._byCode.set(account.code, account.id);
    }
    this._nextId = nextId;
  }
}

export function compareAccounts(a: Account, b: Account): number {
  const byType = ACCOUNT_TYPE_ORDER.indexOf(a.type) - ACCOUNT_TYPE_ORDER.indexOf(b.type);
  if (byType !== 0) return byType;
  return a.code < b.code ? -1 : a.code > b.code ? 1 : 0;
}
