/**
 * @tallybook/books — Billing directory.
 *
 * Clients, invoices, payments and expenses: the documents the posting
 * engine reads and updates. Invoice lifecycle transitions call the
 * posting engine so the ledger follows the status.
 *
 * Invoice state machine:
 *   draft → issued (post)    issued → draft (reverse)
 *   draft | issued → void (reverse when posted)
 *   issued → paid (automatic, once outstanding ≤ 0)
 */

import type {
  Client,
  Expense,
  ExpenseCategory,
  Invoice,
  InvoiceLine,
  Payment,
  PaymentApplication,
} from "@tallybook/types";
import type { PostedEntry } from "@tallybook/ledger";
import {
  LedgerError,
  formatAmount,
  isPositive,
  multiplyAmount,
  parseAmount,
  sumAmounts,
  toAmount,
} from "@tallybook/ledger";
import type { BooksContext } from "./context.js";
import { addDays, assertIsoDate } from "./dates.js";
import type { PostingEngine } from "./posting.js";
import type {
  ApplicationInput,
  CreateCategoryInput,
  CreateClientInput,
  CreateExpenseInput,
  CreateInvoiceInput,
  InvoiceLineInput,
  RecordPaymentInput,
} from "./types.js";
import { BooksError } from "./types.js";

const DEFAULT_PAYMENT_TERMS_DAYS = 30;

export interface RecordedPayment {
  readonly payment: Payment;
  readonly applications: readonly PaymentApplication[];
  readonly posted: PostedEntry;
}

export class BillingDirectory {
  constructor(
    private readonly ctx: BooksContext,
    private readonly posting: PostingEngine,
  ) {}

  // ─── Clients ─────────────────────────────────────────────────────────

  createClient(input: CreateClientInput): Client {
    return this.ctx.store.clients.insert((id) => ({
      id,
      name: input.name,
      paymentTermsDays: input.paymentTermsDays ?? DEFAULT_PAYMENT_TERMS_DAYS,
      active: true,
    }));
  }

  requireClient(id: number): Client {
    return this.ctx.store.clients.require(id);
  }

  listClients(): readonly Client[] {
    return this.ctx.store.clients.all();
  }

  setClientActive(id: number, active: boolean): Client {
    return this.ctx.store.clients.update(id, { active });
  }

  // ─── Expense Categories & Expenses ───────────────────────────────────

  createCategory(input: CreateCategoryInput): ExpenseCategory {
    const accountId = input.accountId ?? null;
    if (accountId !== null) {
      this.ctx.store.journal.requireAccount(accountId);
    }
    return this.ctx.store.expenseCategories.insert((id) => ({
      id,
      name: input.name,
      accountId,
      billableByDefault: input.billableByDefault ?? false,
    }));
  }

  setCategoryAccount(categoryId: number, accountId: number | null): ExpenseCategory {
    if (accountId !== null) {
      this.ctx.store.journal.requireAccount(accountId);
    }
    return this.ctx.store.expenseCategories.update(categoryId, { accountId });
  }

  listCategories(): readonly ExpenseCategory[] {
    return this.ctx.store.expenseCategories.all();
  }

  createExpense(input: CreateExpenseInput): Expense {
    const { store } = this.ctx;
    const category = store.expenseCategories.require(input.categoryId);
    const clientId = input.clientId ?? null;
    if (clientId !== null) {
      store.clients.require(clientId);
    }
    const amount = toAmount(input.amount);
    if (!isPositive(amount)) {
      throw new LedgerError("INVALID_AMOUNT", `Expense amount must be positive: ${amount}`);
    }

    return store.expenses.insert((id) => ({
      id,
      clientId,
      categoryId: category.id,
      date: assertIsoDate(input.date),
      amount,
      description: input.description,
      billable: input.billable ?? category.billableByDefault,
      paymentAccountId: null,
      invoiceLineId: null,
    }));
  }

  requireExpense(id: number): Expense {
    return this.ctx.store.expenses.require(id);
  }

  listExpenses(): readonly Expense[] {
    return this.ctx.store.expenses.all();
  }

  // ─── Invoices ────────────────────────────────────────────────────────

  /**
   * Next "YYYY-NNN" number for the given year.
   */
  nextInvoiceNumber(year: number): string {
    const prefix = `${String(year)}-`;
    let max = 0;
    for (const invoice of this.ctx.store.invoices.all()) {
      if (!invoice.invoiceNumber.startsWith(prefix)) continue;
      const seq = Number(invoice.invoiceNumber.slice(prefix.length));
      if (Number.isInteger(seq) && seq > max) max = seq;
    }
    return `${prefix}${String(max + 1).padStart(3, "0")}`;
  }

  /**
   * Open a draft invoice. A client may only have one draft at a time.
   */
  createInvoice(input: CreateInvoiceInput): Invoice {
    const { store } = this.ctx;

    return store.transaction(() => {
      const client = store.clients.require(input.clientId);
      this.assertNoOtherDraft(client.id, null);
      const issueDate = assertIsoDate(input.issueDate, "issueDate");
      const dueDate =
        input.dueDate === undefined
          ? addDays(issueDate, client.paymentTermsDays)
          : assertIsoDate(input.dueDate, "dueDate");

      return store.invoices.insert((id) => ({
        id,
        clientId: client.id,
        invoiceNumber: this.nextInvoiceNumber(Number(issueDate.slice(0, 4))),
        issueDate,
        dueDate,
        status: "draft",
        total: "0.00",
        postingState: "unposted",
        notes: input.notes ?? "",
      }));
    });
  }

  requireInvoice(id: number): Invoice {
    return this.ctx.store.invoices.require(id);
  }

  listInvoices(clientId?: number): readonly Invoice[] {
    return this.ctx.store.invoices.filter(
      (inv) => clientId === undefined || inv.clientId === clientId,
    );
  }

  invoiceLines(invoiceId: number): readonly InvoiceLine[] {
    return this.ctx.store.invoiceLines.filter((l) => l.invoiceId === invoiceId);
  }

  addInvoiceLine(invoiceId: number, input: InvoiceLineInput): InvoiceLine {
    const { store } = this.ctx;

    return store.transaction(() => {
      const invoice = this.requireDraft(invoiceId);
      const quantity = toAmount(input.quantity);
      const unitPrice = toAmount(input.unitPrice);
      const line = store.invoiceLines.insert((id) => ({
        id,
        invoiceId: invoice.id,
        lineType: input.lineType ?? "other",
        description: input.description,
        quantity,
        unitPrice,
        lineTotal: multiplyAmount(unitPrice, quantity),
      }));
      this.recalculateTotal(invoice.id);
      return line;
    });
  }

  removeInvoiceLine(lineId: number): Invoice {
    const { store } = this.ctx;

    return store.transaction(() => {
      const line = store.invoiceLines.require(lineId);
      this.requireDraft(line.invoiceId);
      store.invoiceLines.delete(line.id);
      return this.recalculateTotal(line.invoiceId);
    });
  }

  /**
   * Draft → Issued, then post to the ledger.
   */
  issueInvoice(invoiceId: number, user: string | null = null): Invoice {
    const { store, logger } = this.ctx;

    return store.transaction(() => {
      const invoice = this.requireDraft(invoiceId);
      store.invoices.update(invoice.id, { status: "issued" });
      this.posting.postInvoice(invoice.id, user);
      logger.info({ invoiceId: invoice.id, number: invoice.invoiceNumber }, "invoice issued");
      return store.invoices.require(invoice.id);
    });
  }

  /**
   * Issued → Draft, reversing the posting.
   */
  returnToDraft(invoiceId: number, user: string | null = null): Invoice {
    const { store } = this.ctx;

    return store.transaction(() => {
      const invoice = store.invoices.require(invoiceId);
      if (invoice.status !== "issued") {
        throw this.transitionError(invoice, "draft");
      }
      this.assertNoApplications(invoice);
      this.assertNoOtherDraft(invoice.clientId, invoice.id);

      store.invoices.update(invoice.id, { status: "draft" });
      this.posting.reverseInvoice(invoice.id, user);
      return store.invoices.require(invoice.id);
    });
  }

  /**
   * Draft or Issued → Void. A live posting is reversed.
   */
  voidInvoice(invoiceId: number, user: string | null = null): Invoice {
    const { store } = this.ctx;

    return store.transaction(() => {
      const invoice = store.invoices.require(invoiceId);
      if (invoice.status !== "draft" && invoice.status !== "issued") {
        throw this.transitionError(invoice, "void");
      }
      this.assertNoApplications(invoice);

      store.invoices.update(invoice.id, { status: "void" });
      this.posting.reverseInvoice(invoice.id, user);
      return store.invoices.require(invoice.id);
    });
  }

  appliedTotal(invoiceId: number): string {
    return sumAmounts(
      this.ctx.store.paymentApplications
        .filter((a) => a.invoiceId === invoiceId)
        .map((a) => a.amount),
    );
  }

  /** total − Σ applications */
  outstandingBalance(invoiceId: number): string {
    const invoice = this.ctx.store.invoices.require(invoiceId);
    return formatAmount(parseAmount(invoice.total) - parseAmount(this.appliedTotal(invoiceId)));
  }

  // ─── Payments ────────────────────────────────────────────────────────

  /**
   * Record a payment with its invoice applications and post it.
   *
   * The applications may not exceed the payment, nor any invoice's
   * outstanding balance. What remains is the unapplied amount.
   */
  recordPayment(input: RecordPaymentInput, user: string | null = null): RecordedPayment {
    const { store, logger } = this.ctx;

    return store.transaction(() => {
      const client = store.clients.require(input.clientId);
      const amount = toAmount(input.amount);
      if (!isPositive(amount)) {
        throw new LedgerError("INVALID_AMOUNT", `Payment amount must be positive: ${amount}`);
      }
      const date = assertIsoDate(input.date);
      const requested = input.applications ?? [];

      const appliedCents = requested.reduce((sum, a) => sum + parseAmount(a.amount), 0n);
      if (appliedCents > parseAmount(amount)) {
        throw new BooksError(
          "OVER_APPLIED",
          `Applications total ${formatAmount(appliedCents)} exceeds payment amount ${amount}`,
          { applied: formatAmount(appliedCents), amount },
        );
      }

      const payment = store.payments.insert((id) => ({
        id,
        clientId: client.id,
        date,
        amount,
        method: input.method,
        memo: input.memo ?? "",
        unappliedAmount: amount,
      }));

      const applications = requested.map((a) => this.apply(payment.id, a));
      const posted = this.posting.postPayment(payment.id, user);

      logger.info(
        { paymentId: payment.id, clientId: client.id, amount, applications: applications.length },
        "payment recorded",
      );
      return { payment: store.payments.require(payment.id), applications, posted };
    });
  }

  /**
   * Allocate part of a payment's unapplied amount to an invoice.
   * The payment's entry is not re-posted.
   */
  applyUnapplied(paymentId: number, input: ApplicationInput): PaymentApplication {
    return this.ctx.store.transaction(() => this.apply(paymentId, input));
  }

  requirePayment(id: number): Payment {
    return this.ctx.store.payments.require(id);
  }

  listPayments(clientId?: number): readonly Payment[] {
    return this.ctx.store.payments.filter(
      (p) => clientId === undefined || p.clientId === clientId,
    );
  }

  applicationsFor(paymentId: number): readonly PaymentApplication[] {
    return this.ctx.store.paymentApplications.filter((a) => a.paymentId === paymentId);
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private apply(paymentId: number, input: ApplicationInput): PaymentApplication {
    const { store } = this.ctx;
    const payment = store.payments.require(paymentId);
    const invoice = store.invoices.require(input.invoiceId);
    const amount = toAmount(input.amount);

    if (!isPositive(amount)) {
      throw new LedgerError("INVALID_AMOUNT", `Application amount must be positive: ${amount}`);
    }
    if (invoice.status !== "issued") {
      throw new BooksError(
        "INVALID_TRANSITION",
        `Invoice ${invoice.invoiceNumber} is ${invoice.status}; payments apply to issued invoices`,
        { invoiceId: invoice.id, status: invoice.status },
      );
    }
    if (parseAmount(amount) > parseAmount(payment.unappliedAmount)) {
      throw new BooksError(
        "OVER_APPLIED",
        `Payment ${String(payment.id)} has only ${payment.unappliedAmount} unapplied`,
        { paymentId: payment.id, unapplied: payment.unappliedAmount, amount },
      );
    }
    const outstanding = this.outstandingBalance(invoice.id);
    if (parseAmount(amount) > parseAmount(outstanding)) {
      throw new BooksError(
        "OVER_APPLIED",
        `Invoice ${invoice.invoiceNumber} has only ${outstanding} outstanding`,
        { invoiceId: invoice.id, outstanding, amount },
      );
    }

    const application = store.paymentApplications.insert((id) => ({
      id,
      paymentId: payment.id,
      invoiceId: invoice.id,
      amount,
    }));
    store.payments.update(payment.id, {
      unappliedAmount: formatAmount(parseAmount(payment.unappliedAmount) - parseAmount(amount)),
    });
    this.refreshStatus(invoice.id);
    return application;
  }

  /** Issued → Paid once nothing is outstanding. */
  private refreshStatus(invoiceId: number): void {
    const invoice = this.ctx.store.invoices.require(invoiceId);
    if (invoice.status === "issued" && parseAmount(this.outstandingBalance(invoiceId)) <= 0n) {
      this.ctx.store.invoices.update(invoiceId, { status: "paid" });
    }
  }

  private recalculateTotal(invoiceId: number): Invoice {
    const total = sumAmounts(this.invoiceLines(invoiceId).map((l) => l.lineTotal));
    return this.ctx.store.invoices.update(invoiceId, { total });
  }

  private requireDraft(invoiceId: number): Invoice {
    const invoice = this.ctx.store.invoices.require(invoiceId);
    if (invoice.status !== "draft") {
      throw new BooksError(
        "INVALID_TRANSITION",
        `Invoice ${invoice.invoiceNumber} is ${invoice.status}, not draft`,
        { invoiceId: invoice.id, status: invoice.status },
      );
    }
    return invoice;
  }

  private assertNoOtherDraft(clientId: number, exceptInvoiceId: number | null): void {
    const draft = this.ctx.store.invoices.find(
      (inv) => inv.clientId === clientId && inv.status === "draft" && inv.id !== exceptInvoiceId,
    );
    if (draft !== undefined) {
      throw new BooksError(
        "DRAFT_EXISTS",
        `Client ${String(clientId)} already has draft invoice ${draft.invoiceNumber}`,
        { clientId, invoiceId: draft.id },
      );
    }
  }

  private assertNoApplications(invoice: Invoice): void {
    if (this.ctx.store.paymentApplications.find((a) => a.invoiceId === invoice.id) !== undefined) {
      throw new BooksError(
        "INVALID_TRANSITION",
        `Invoice ${invoice.invoiceNumber} has payments applied`,
        { invoiceId: invoice.id },
      );
    }
  }

  private transitionError(invoice: Invoice, to: string): BooksError {
    return new BooksError(
      "INVALID_TRANSITION",
      `Invoice ${invoice.invoiceNumber} cannot move from ${invoice.status} to ${to}`,
      { invoiceId: invoice.id, from: invoice.status, to },
    );
  }
}
