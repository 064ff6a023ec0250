/**
 * Standard chart of accounts and lookups of the accounts the posting
 * engine writes to.
 */

import type { Account, AccountType } from "@tallybook/types";
import type { Journal } from "@tallybook/ledger";
import type { ChartConfig } from "./types.js";

interface StandardAccount {
  readonly code: (config: ChartConfig) => string;
  readonly name: string;
  readonly type: AccountType;
}

const STANDARD_ACCOUNTS: readonly StandardAccount[] = [
  { code: (c) => c.cashCode, name: "Cash", type: "asset" },
  { code: (c) => c.receivablesCode, name: "Accounts Receivable", type: "asset" },
  { code: (c) => c.unappliedPaymentsCode, name: "Unapplied Payments", type: "liability" },
  { code: (c) => c.ownerEquityCode, name: "Owner Equity", type: "equity" },
  { code: (c) => c.revenueCode, name: "Consulting Revenue", type: "income" },
];

/**
 * Open the accounts the engine needs. Codes that already exist are left alone.
 *
 * @returns The accounts that were created
 */
export function seedChartOfAccounts(journal: Journal, config: ChartConfig): readonly Account[] {
  const created: Account[] = [];
  for (const standard of STANDARD_ACCOUNTS) {
    const code = standard.code(config);
    if (journal.getAccountByCode(code) === undefined) {
      created.push(journal.openAccount({ code, name: standard.name, type: standard.type }));
    }
  }
  return created;
}

/**
 * Resolves the configured codes to accounts at call time.
 */
export class ChartAccounts {
  constructor(
    private readonly journal: Journal,
    readonly config: ChartConfig,
  ) {}

  get cash(): Account {
    return this.journal.requireAccountByCode(this.config.cashCode);
  }

  get receivables(): Account {
    return this.journal.requireAccountByCode(this.config.receivablesCode);
  }

  get unappliedPayments(): Account {
    return this.journal.requireAccountByCode(this.config.unappliedPaymentsCode);
  }

  get ownerEquity(): Account {
    return this.journal.requireAccountByCode(this.config.ownerEquityCode);
  }

  get revenue(): Account {
    return this.journal.requireAccountByCode(this.config.revenueCode);
  }
}
