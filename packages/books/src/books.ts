/**
 * @tallybook/books — The books facade.
 *
 * Wires the store, the chart, the posting engine, the banking service
 * and the billing directory together, and answers the read-only queries
 * the surrounding application needs.
 */

import type { IsoDate } from "@tallybook/types";
import type {
  AccountBalance,
  DateRange,
  IncomeStatement,
  TrialBalance,
} from "@tallybook/ledger";
import { bankAccountBalance, runningBalanceForRange } from "./balances.js";
import { BankingService } from "./banking.js";
import { ChartAccounts, seedChartOfAccounts } from "./chart.js";
import type { BooksContext } from "./context.js";
import { toIsoDate } from "./dates.js";
import { BillingDirectory } from "./directory.js";
import type { IntegrityReport, RepairOptions, RepairResult } from "./integrity.js";
import { inspectBooks, repairBooks } from "./integrity.js";
import { PostingEngine } from "./posting.js";
import type { ClientBalanceOptions } from "./receivables.js";
import { arAging, clientBalanceSummary } from "./receivables.js";
import { BookStore } from "./store.js";
import type {
  ArAging,
  BankRegister,
  BooksLogger,
  BooksOptions,
  BooksSnapshot,
  ClientBalance,
} from "./types.js";
import { DEFAULT_CHART_CONFIG, silentLogger } from "./types.js";

export class Books {
  readonly store: BookStore;
  readonly chart: ChartAccounts;
  readonly logger: BooksLogger;
  readonly context: BooksContext;

  readonly posting: PostingEngine;
  readonly banking: BankingService;
  readonly directory: BillingDirectory;

  /**
   * @param store - Existing state to operate on; a fresh store by default.
   *   The standard accounts are opened when missing.
   */
  constructor(options: BooksOptions = {}, store: BookStore = new BookStore()) {
    const config = options.chart ?? DEFAULT_CHART_CONFIG;
    this.store = store;
    this.logger = options.logger ?? silentLogger;
    this.chart = new ChartAccounts(store.journal, config);
    this.context = {
      store,
      chart: this.chart,
      logger: this.logger,
      now: options.now ?? (() => new Date()),
    };

    seedChartOfAccounts(store.journal, config);

    this.posting = new PostingEngine(this.context);
    this.banking = new BankingService(this.context);
    this.directory = new BillingDirectory(this.context, this.posting);
  }

  static fromSnapshot(snapshot: BooksSnapshot, options: BooksOptions = {}): Books {
    return new Books(options, BookStore.fromSnapshot(snapshot));
  }

  snapshot(): BooksSnapshot {
    return this.store.snapshot();
  }

  today(): IsoDate {
    return toIsoDate(this.context.now());
  }

  // ─── Balances ────────────────────────────────────────────────────────

  bankAccountBalance(bankAccountId: number): string {
    return bankAccountBalance(this.store, bankAccountId);
  }

  runningBalanceForRange(bankAccountId: number, from?: IsoDate, to?: IsoDate): BankRegister {
    return runningBalanceForRange(this.store, bankAccountId, from, to);
  }

  accountBalance(accountId: number, range?: DateRange): AccountBalance {
    return this.store.journal.getAccountBalance(accountId, range);
  }

  trialBalance(range?: DateRange): TrialBalance {
    return this.store.journal.getTrialBalance(range);
  }

  incomeStatement(range?: DateRange): IncomeStatement {
    return this.store.journal.getIncomeStatement(range);
  }

  // ─── Receivables ─────────────────────────────────────────────────────

  clientBalanceSummary(options?: ClientBalanceOptions): readonly ClientBalance[] {
    return clientBalanceSummary(this.store, options);
  }

  arAging(asOf: IsoDate = this.today()): ArAging {
    return arAging(this.store, asOf);
  }

  // ─── Integrity ───────────────────────────────────────────────────────

  inspect(): IntegrityReport {
    return inspectBooks(this.context);
  }

  repair(options?: RepairOptions): RepairResult {
    return repairBooks(this.context, this.banking, options);
  }
}
