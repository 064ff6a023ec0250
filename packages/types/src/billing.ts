/**
 * Billing Types
 *
 * The client / invoice / payment / expense documents the engine posts.
 * Their CRUD lives with the surrounding application; these shapes are
 * what the engine reads and updates.
 */

import type { Amount, IsoDate } from "./ledger.js";

export interface Client {
  readonly id: number;
  readonly name: string;
  readonly paymentTermsDays: number;
  readonly active: boolean;
}

/** Draft → Issued → Paid/Void, Issued → Draft. */
export type InvoiceStatus = "draft" | "issued" | "paid" | "void";

/**
 * Latest ledger state of an invoice: it has never been posted,
 * its last posting is live, or its last posting was reversed.
 */
export type InvoicePostingState = "unposted" | "posted" | "reversed";

export interface Invoice {
  readonly id: number;
  readonly clientId: number;
  readonly invoiceNumber: string;
  readonly issueDate: IsoDate;
  readonly dueDate: IsoDate;
  readonly status: InvoiceStatus;

  /** Cached sum of line totals, recomputed whenever lines change */
  readonly total: Amount;

  readonly postingState: InvoicePostingState;
  readonly notes: string;
}

export type InvoiceLineType = "time" | "expense" | "other";

export interface InvoiceLine {
  readonly id: number;
  readonly invoiceId: number;
  readonly lineType: InvoiceLineType;
  readonly description: string;

  /** Decimal string, two places (hours or units) */
  readonly quantity: string;
  readonly unitPrice: Amount;
  readonly lineTotal: Amount;
}

export type PaymentMethod = "check" | "ach" | "cash" | "card" | "other";

export interface Payment {
  readonly id: number;
  readonly clientId: number;
  readonly date: IsoDate;
  readonly amount: Amount;
  readonly method: PaymentMethod;
  readonly memo: string;

  /** Portion of the payment not yet allocated to invoices */
  readonly unappliedAmount: Amount;
}

export interface PaymentApplication {
  readonly id: number;
  readonly paymentId: number;
  readonly invoiceId: number;
  readonly amount: Amount;
}

export interface ExpenseCategory {
  readonly id: number;
  readonly name: string;

  /** GL expense account; required before a bank settlement can post */
  readonly accountId: number | null;

  readonly billableByDefault: boolean;
}

export interface Expense {
  readonly id: number;
  readonly clientId: number | null;
  readonly categoryId: number;
  readonly date: IsoDate;
  readonly amount: Amount;
  readonly description: string;
  readonly billable: boolean;

  /** Bank account the expense was settled from, once matched */
  readonly paymentAccountId: number | null;

  readonly invoiceLineId: number | null;
}
