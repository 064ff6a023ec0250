/**
 * @tallybook/books — Types for the book store and posting engine.
 *
 * Rules:
 * - All records are readonly; updates replace the row
 * - Every mutation runs inside BookStore.transaction()
 * - Domain failures throw BooksError, never return error values
 */

import type {
  Amount,
  BankAccount,
  BankAccountType,
  BankTransaction,
  Client,
  Expense,
  ExpenseCategory,
  ImportProfile,
  Invoice,
  InvoiceLine,
  InvoiceLineType,
  IsoDate,
  Payment,
  PaymentApplication,
  PaymentMethod,
} from "@tallybook/types";
import type { JournalSnapshot } from "@tallybook/ledger";

// ─── Chart Configuration ─────────────────────────────────────────────────

/**
 * Account codes the posting engine depends on.
 */
export interface ChartConfig {
  readonly cashCode: string;
  readonly receivablesCode: string;
  readonly unappliedPaymentsCode: string;
  readonly ownerEquityCode: string;
  readonly revenueCode: string;

  /** Inclusive code range reserved for bank-account GL accounts */
  readonly bankCodeFloor: string;
  readonly bankCodeCeiling: string;
}

export const DEFAULT_CHART_CONFIG: ChartConfig = {
  cashCode: "1000",
  receivablesCode: "1100",
  unappliedPaymentsCode: "2200",
  ownerEquityCode: "3000",
  revenueCode: "4000",
  bankCodeFloor: "1110",
  bankCodeCeiling: "1199",
};

// ─── Logging ─────────────────────────────────────────────────────────────

/**
 * Minimal structured logger. A pino logger satisfies it.
 */
export interface BooksLogger {
  debug(obj: Record<string, unknown>, msg?: string): void;
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
}

const noop = (): void => undefined;

export const silentLogger: BooksLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

/**
 * Engine-wide options.
 */
export interface BooksOptions {
  readonly chart?: ChartConfig | undefined;
  readonly logger?: BooksLogger | undefined;

  /** Clock used for "today" (aging, reversal dates, creation stamps) */
  readonly now?: (() => Date) | undefined;
}

// ─── Operation Inputs ────────────────────────────────────────────────────

export interface CreateBankAccountInput {
  readonly type: BankAccountType;
  readonly institution: string;
  readonly maskedNumber: string;
  readonly openingBalance: Amount;
}

export interface PostTransactionInput {
  readonly bankAccountId: number;
  readonly date: IsoDate;
  readonly description: string;
  readonly amount: Amount;
  readonly offsetAccountId: number;
}

export interface CreateClientInput {
  readonly name: string;
  readonly paymentTermsDays?: number | undefined;
}

export interface CreateInvoiceInput {
  readonly clientId: number;
  readonly issueDate: IsoDate;

  /** Defaults to issueDate + the client's payment terms */
  readonly dueDate?: IsoDate | undefined;
  readonly notes?: string | undefined;
}

export interface InvoiceLineInput {
  readonly lineType?: InvoiceLineType | undefined;
  readonly description: string;
  readonly quantity: string;
  readonly unitPrice: Amount;
}

export interface ApplicationInput {
  readonly invoiceId: number;
  readonly amount: Amount;
}

export interface RecordPaymentInput {
  readonly clientId: number;
  readonly date: IsoDate;
  readonly amount: Amount;
  readonly method: PaymentMethod;
  readonly memo?: string | undefined;
  readonly applications?: readonly ApplicationInput[] | undefined;
}

export interface CreateCategoryInput {
  readonly name: string;
  readonly accountId?: number | null | undefined;
  readonly billableByDefault?: boolean | undefined;
}

export interface CreateExpenseInput {
  readonly clientId?: number | null | undefined;
  readonly categoryId: number;
  readonly date: IsoDate;
  readonly amount: Amount;
  readonly description: string;
  readonly billable?: boolean | undefined;
}

// ─── Report Types ────────────────────────────────────────────────────────

export interface RegisterRow {
  readonly transaction: BankTransaction;

  /** Balance after this row */
  readonly runningBalance: Amount;
}

export interface BankRegister {
  readonly bankAccountId: number;
  readonly from: IsoDate | null;
  readonly to: IsoDate | null;
  readonly balanceForward: Amount;
  readonly rows: readonly RegisterRow[];
  readonly endingBalance: Amount;
}

export interface ClientBalance {
  readonly clientId: number;
  readonly name: string;
  readonly totalInvoiced: Amount;
  readonly applied: Amount;
  readonly unapplied: Amount;
  readonly outstanding: Amount;

  /** outstanding − unapplied */
  readonly netAr: Amount;
}

export type ClientBalanceSortKey =
  | "name"
  | "totalInvoiced"
  | "applied"
  | "unapplied"
  | "outstanding"
  | "netAr";

export type AgingBucket = "current" | "days31to60" | "days61to90" | "over90";

export interface AgingRow {
  readonly invoiceId: number;
  readonly invoiceNumber: string;
  readonly clientId: number;
  readonly dueDate: IsoDate;
  readonly daysPastDue: number;
  readonly outstanding: Amount;
  readonly bucket: AgingBucket;
}

export interface ArAging {
  readonly asOf: IsoDate;
  readonly rows: readonly AgingRow[];
  readonly totals: Readonly<Record<AgingBucket, Amount>>;
  readonly total: Amount;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

export interface TableSnapshot<T> {
  readonly rows: readonly T[];
  readonly nextId: number;
}

/**
 * Serializable state of the whole book: the journal plus every table.
 */
export interface BooksSnapshot {
  readonly version: 1;
  readonly journal: JournalSnapshot;
  readonly bankAccounts: TableSnapshot<BankAccount>;
  readonly bankTransactions: TableSnapshot<BankTransaction>;
  readonly importProfiles: readonly ImportProfile[];
  readonly clients: TableSnapshot<Client>;
  readonly invoices: TableSnapshot<Invoice>;
  readonly invoiceLines: TableSnapshot<InvoiceLine>;
  readonly payments: TableSnapshot<Payment>;
  readonly paymentApplications: TableSnapshot<PaymentApplication>;
  readonly expenseCategories: TableSnapshot<ExpenseCategory>;
  readonly expenses: TableSnapshot<Expense>;
}

// ─── Error Types ─────────────────────────────────────────────────────────

export type BooksErrorCode =
  | "ALREADY_MATCHED"
  | "AMOUNT_MISMATCH"
  | "MISSING_GL_ACCOUNT"
  | "SAME_ACCOUNT_TRANSFER"
  | "INVALID_CONFIGURATION"
  | "NOT_FOUND"
  | "INVALID_TRANSITION"
  | "DRAFT_EXISTS"
  | "OVER_APPLIED"
  | "NOT_MATCHED"
  | "INVALID_DATE";

/**
 * Domain error raised by the posting engine and its collaborators.
 * The calling layer turns these into user-visible messages.
 */
export class BooksError extends Error {
  public readonly code: BooksErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: BooksErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "BooksError";
    this.code = code;
    this.details = details;
  }
}
