/**
 * @tallybook/books — Receivables reports.
 *
 * Only issued and paid invoices count as receivables; drafts and voided
 * invoices are left out of both reports.
 */

import type { Invoice, IsoDate } from "@tallybook/types";
import { formatAmount, parseAmount } from "@tallybook/ledger";
import { assertIsoDate, daysBetween } from "./dates.js";
import type { BookStore } from "./store.js";
import type {
  AgingBucket,
  AgingRow,
  ArAging,
  ClientBalance,
  ClientBalanceSortKey,
} from "./types.js";

function isReceivable(invoice: Invoice): boolean {
  return invoice.status === "issued" || invoice.status === "paid";
}

function appliedCents(store: BookStore, invoiceId: number): bigint {
  let cents = 0n;
  for (const app of store.paymentApplications.filter((a) => a.invoiceId === invoiceId)) {
    cents += parseAmount(app.amount);
  }
  return cents;
}

export interface ClientBalanceOptions {
  readonly sortBy?: ClientBalanceSortKey | undefined;
  readonly descending?: boolean | undefined;
}

/**
 * Per-client invoiced / applied / unapplied / outstanding totals.
 * Sorted by name (case-insensitive) unless another key is given.
 */
export function clientBalanceSummary(
  store: BookStore,
  options: ClientBalanceOptions = {},
): readonly ClientBalance[] {
  const rows = store.clients.all().map((client): ClientBalance => {
    let invoiced = 0n;
    let applied = 0n;
    for (const invoice of store.invoices.filter(
      (inv) => inv.clientId === client.id && isReceivable(inv),
    )) {
      invoiced += parseAmount(invoice.total);
      applied += appliedCents(store, invoice.id);
    }

    let unapplied = 0n;
    for (const payment of store.payments.filter((p) => p.clientId === client.id)) {
      unapplied += parseAmount(payment.unappliedAmount);
    }

    const outstanding = invoiced - applied;
    return {
      clientId: client.id,
      name: client.name,
      totalInvoiced: formatAmount(invoiced),
      applied: formatAmount(applied),
      unapplied: formatAmount(unapplied),
      outstanding: formatAmount(outstanding),
      netAr: formatAmount(outstanding - unapplied),
    };
  });

  const sortBy = options.sortBy ?? "name";
  const direction = options.descending === true ? -1 : 1;
  return rows.sort((a, b) => {
    let order: number;
    if (sortBy === "name") {
      const an = a.name.toLowerCase();
      const bn = b.name.toLowerCase();
      order = an < bn ? -1 : an > bn ? 1 : 0;
    } else {
      const diff = parseAmount(a[sortBy]) - parseAmount(b[sortBy]);
      order = diff < 0n ? -1 : diff > 0n ? 1 : 0;
    }
    return order !== 0 ? order * direction : a.clientId - b.clientId;
  });
}

export function agingBucket(daysPastDue: number): AgingBucket {
  if (daysPastDue <= 30) return "current";
  if (daysPastDue <= 60) return "days31to60";
  if (daysPastDue <= 90) return "days61to90";
  return "over90";
}

/**
 * Open receivables bucketed by days past due as of `asOf`.
 * Invoices not yet due fall in the first bucket.
 */
export function arAging(store: BookStore, asOf: IsoDate): ArAging {
  const date = assertIsoDate(asOf, "asOf");
  const totals: Record<AgingBucket, bigint> = {
    current: 0n,
    days31to60: 0n,
    days61to90: 0n,
    over90: 0n,
  };
  const rows: AgingRow[] = [];

  for (const invoice of store.invoices.filter(isReceivable)) {
    const outstanding = parseAmount(invoice.total) - appliedCents(store, invoice.id);
    if (outstanding <= 0n) continue;

    const daysPastDue = daysBetween(invoice.dueDate, date);
    const bucket = agingBucket(daysPastDue);
    totals[bucket] += outstanding;
    rows.push({
      invoiceId: invoice.id,
      invoiceNumber: invoice.invoiceNumber,
      clientId: invoice.clientId,
      dueDate: invoice.dueDate,
      daysPastDue,
      outstanding: formatAmount(outstanding),
      bucket,
    });
  }

  return {
    asOf: date,
    rows,
    totals: {
      current: formatAmount(totals.current),
      days31to60: formatAmount(totals.days31to60),
      days61to90: formatAmount(totals.days61to90),
      over90: formatAmount(totals.over90),
    },
    total: formatAmount(totals.current + totals.days31to60 + totals.days61to90 + totals.over90),
  };
}
