/**
 * Settling client payments with deposits.
 */
import { describe, it, expect, beforeEach } from "vitest";
import type { Fixture } from "./helpers.js";
import { linesOf, makeFixture } from "./helpers.js";

let fx: Fixture;
let clientId: number;
let invoiceId: number;

beforeEach(() => {
  fx = makeFixture();
  clientId = fx.books.directory.createClient({ name: "Acme Corp" }).id;
  const invoice = fx.books.directory.createInvoice({ clientId, issueDate: "2024-01-05" });
  fx.books.directory.addInvoiceLine(invoice.id, { description: "Work", quantity: "1", unitPrice: "300.00" });
  fx.books.directory.issueInvoice(invoice.id);
  invoiceId = invoice.id;
});

describe("linkExistingPayment", () => {
  function recorded(amount = "300.00") {
    return fx.books.directory.recordPayment({
      clientId,
      date: "2024-01-20",
      amount,
      method: "check",
      applications: [{ invoiceId, amount }],
    });
  }

  it("links the deposit to the payment's entry and takes the statement date", () => {
    const { payment, posted } = recorded();
    const deposit = fx.txn(fx.checking, "2024-01-22", "300.00");

    const linked = fx.reconciler.linkExistingPayment(deposit.id, payment.id);

    expect(linked.date).toBe("2024-01-22");
    const txn = fx.books.banking.requireTransaction(deposit.id);
    expect(txn.paymentId).toBe(payment.id);
    expect(txn.journalEntryId).toBe(posted.entry.id);
    expect(fx.books.store.journal.entriesForSource({ kind: "bank-transaction", id: deposit.id })).toEqual([]);
    expect(fx.books.store.journal.entriesForSource({ kind: "payment", id: payment.id })).toHaveLength(1);
  });

  it("requires identical amounts", () => {
    const { payment } = recorded();
    const deposit = fx.txn(fx.checking, "2024-01-22", "299.99");
    expect(() => fx.reconciler.linkExistingPayment(deposit.id, payment.id)).toThrow(
      expect.objectContaining({ code: "AMOUNT_MISMATCH" }),
    );
    expect(fx.books.directory.requirePayment(payment.id).date).toBe("2024-01-20");
  });

  it("links a payment to one deposit only", () => {
    const { payment } = recorded();
    fx.reconciler.linkExistingPayment(fx.txn(fx.checking, "2024-01-22", "300.00").id, payment.id);
    const second = fx.txn(fx.savings, "2024-01-23", "300.00");
    expect(() => fx.reconciler.linkExistingPayment(second.id, payment.id)).toThrow(
      expect.objectContaining({ code: "ALREADY_MATCHED" }),
    );
  });
});

describe("createPaymentFromTransaction", () => {
  it("records, posts and links a payment sized from the deposit", () => {
    const deposit = fx.txn(fx.checking, "2024-02-02", "450.00");

    const { payment, posted } = fx.reconciler.createPaymentFromTransaction(deposit.id, {
      clientId,
      method: "ach",
      memo: "Feb",
      applications: [{ invoiceId, amount: "300.00" }],
    });

    expect(payment).toMatchObject({
      clientId,
      date: "2024-02-02",
      amount: "450.00",
      method: "ach",
      memo: "Feb",
      unappliedAmount: "150.00",
    });
    expect(linesOf(fx.books, posted.entry.id)).toEqual([
      ["1000", "450.00", "0.00"],
      ["1100", "0.00", "300.00"],
      ["2200", "0.00", "150.00"],
    ]);
    expect(fx.books.banking.requireTransaction(deposit.id)).toMatchObject({
      paymentId: payment.id,
      journalEntryId: posted.entry.id,
    });
    expect(fx.books.directory.requireInvoice(invoiceId).status).toBe("paid");
  });

  it("only takes deposits", () => {
    const withdrawal = fx.txn(fx.checking, "2024-02-02", "-450.00");
    expect(() =>
      fx.reconciler.createPaymentFromTransaction(withdrawal.id, { clientId, method: "ach" }),
    ).toThrow(expect.objectContaining({ code: "AMOUNT_MISMATCH" }));
    expect(fx.books.directory.listPayments()).toEqual([]);
  });
});
