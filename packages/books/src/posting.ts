/**
 * @tallybook/books — Posting engine for invoices and payments.
 *
 * Invoice postings are append-only: a reversal is a second entry with the
 * lines swapped, tagged with the same source. The invoice's
 * `postingState` records whether its latest posting is live, so posting
 * twice is a no-op and post → reverse → post yields three entries.
 *
 * A payment has at most one entry; posting it again returns the
 * existing one.
 */

import type { Payment } from "@tallybook/types";
import type { LineDraft, PostedEntry } from "@tallybook/ledger";
import { formatAmount, isZero, parseAmount } from "@tallybook/ledger";
import type { BooksContext } from "./context.js";
import { toIsoDate } from "./dates.js";

export class PostingEngine {
  constructor(private readonly ctx: BooksContext) {}

  // ─── Invoices ────────────────────────────────────────────────────────

  /**
   * Record an issued invoice: Dr Accounts Receivable / Cr Revenue.
   *
   * @returns The new entry, or null when the invoice is already posted
   *   or has a zero total
   */
  postInvoice(invoiceId: number, user: string | null = null): PostedEntry | null {
    const { store, chart, logger } = this.ctx;

    return store.transaction(() => {
      const invoice = store.invoices.require(invoiceId);
      if (invoice.postingState === "posted" || isZero(invoice.total)) {
        return null;
      }

      const posted = store.journal.post({
        postedAt: invoice.issueDate,
        postedBy: user,
        description: `Invoice ${invoice.invoiceNumber} posted`,
        source: { kind: "invoice", id: invoice.id },
        lines: [
          { accountId: chart.receivables.id, debit: invoice.total },
          { accountId: chart.revenue.id, credit: invoice.total },
        ],
      });
      store.invoices.update(invoice.id, { postingState: "posted" });

      logger.info(
        { invoiceId: invoice.id, entryId: posted.entry.id, total: invoice.total },
        "invoice posted",
      );
      return posted;
    });
  }

  /**
   * Offset an invoice's live posting: Dr Revenue / Cr Accounts Receivable.
   *
   * @returns The reversing entry, or null when nothing is posted
   */
  reverseInvoice(invoiceId: number, user: string | null = null): PostedEntry | null {
    const { store, chart, logger, now } = this.ctx;

    return store.transaction(() => {
      const invoice = store.invoices.require(invoiceId);
      if (invoice.postingState !== "posted") {
        return null;
      }

      const posted = store.journal.post({
        postedAt: toIsoDate(now()),
        postedBy: user,
        description: `Invoice ${invoice.invoiceNumber} reversed`,
        source: { kind: "invoice", id: invoice.id },
        lines: [
          { accountId: chart.revenue.id, debit: invoice.total },
          { accountId: chart.receivables.id, credit: invoice.total },
        ],
      });
      store.invoices.update(invoice.id, { postingState: "reversed" });

      logger.info(
        { invoiceId: invoice.id, entryId: posted.entry.id, total: invoice.total },
        "invoice reversed",
      );
      return posted;
    });
  }

  // ─── Payments ────────────────────────────────────────────────────────

  /**
   * Record a received payment.
   *
   * Dr Cash (amount)
   *   Cr Accounts Receivable (applied total, omitted when zero)
   *   Cr Unapplied Payments (remainder, omitted when zero)
   */
  postPayment(paymentId: number, user: string | null = null): PostedEntry {
    const { store, chart, logger } = this.ctx;

    return store.transaction(() => {
      const payment = store.payments.require(paymentId);

      const existing = store.journal.entriesForSource({ kind: "payment", id: payment.id })[0];
      if (existing !== undefined) {
        return { entry: existing, lines: store.journal.getLines(existing.id) };
      }

      const total = parseAmount(payment.amount);
      const applied = this.appliedTotal(payment);
      const unapplied = total - applied;

      const lines: LineDraft[] = [{ accountId: chart.cash.id, debit: payment.amount }];
      if (applied > 0n) {
        lines.push({ accountId: chart.receivables.id, credit: formatAmount(applied) });
      }
      if (unapplied > 0n) {
        lines.push({ accountId: chart.unappliedPayments.id, credit: formatAmount(unapplied) });
      }

      const client = store.clients.require(payment.clientId);
      const posted = store.journal.post({
        postedAt: payment.date,
        postedBy: user,
        description: `Payment received from ${client.name}`,
        source: { kind: "payment", id: payment.id },
        lines,
      });

      logger.info(
        { paymentId: payment.id, entryId: posted.entry.id, lines: lines.length },
        "payment posted",
      );
      return posted;
    });
  }

  private appliedTotal(payment: Payment): bigint {
    let applied = 0n;
    for (const app of this.ctx.store.paymentApplications.filter(
      (a) => a.paymentId === payment.id,
    )) {
      applied += parseAmount(app.amount);
    }
    return applied;
  }
}
