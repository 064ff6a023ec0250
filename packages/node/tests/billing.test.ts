/**
 * Tests for the client, invoice, payment and report routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { AppInstance } from "../src/app.js";
import { createTestApp, idOf, jsonRequest } from "./setup.js";

let instance: AppInstance;
let clientId: number;
let invoiceId: number;

async function post(path: string, body: unknown = {}): Promise<Response> {
  return instance.app.request(jsonRequest(path, "POST", body));
}

async function get(path: string): Promise<unknown> {
  const res = await instance.app.request(path);
  return res.json();
}

beforeEach(async () => {
  instance = createTestApp();
  clientId = await idOf(await post("/api/v1/clients", { name: "Acme Corp" }));
  invoiceId = await idOf(await post("/api/v1/invoices", { clientId, issueDate: "2024-01-10" }));
  const line = await post(`/api/v1/invoices/${String(invoiceId)}/lines`, {
    description: "Consulting",
    quantity: "10",
    unitPrice: "150",
  });
  expect(line.status).toBe(201);
});

describe("invoices", () => {
  it("numbers drafts by year and derives the due date from the client's terms", async () => {
    expect(await get(`/api/v1/invoices/${String(invoiceId)}`)).toMatchObject({
      data: {
        invoiceNumber: "2024-001",
        dueDate: "2024-02-09",
        status: "draft",
        total: "1500.00",
        lines: [{ description: "Consulting", lineTotal: "1500.00" }],
        applied: "0.00",
        outstanding: "1500.00",
      },
    });
  });

  it("allows one draft per client", async () => {
    const res = await post("/api/v1/invoices", { clientId, issueDate: "2024-01-11" });

    expect(res.status).toBe(409);
    expect(await res.json()).toMatchObject({ error: { code: "DRAFT_EXISTS" } });
  });

  it("issues, returns to draft and voids", async () => {
    const issued = await post(`/api/v1/invoices/${String(invoiceId)}/issue`);
    expect(await issued.json()).toMatchObject({ data: { status: "issued", postingState: "posted" } });

    const locked = await post(`/api/v1/invoices/${String(invoiceId)}/lines`, {
      description: "Extra",
      quantity: "1",
      unitPrice: "10",
    });
    expect(locked.status).toBe(409);
    expect(await locked.json()).toMatchObject({ error: { code: "INVALID_TRANSITION" } });

    const draft = await post(`/api/v1/invoices/${String(invoiceId)}/return-to-draft`);
    expect(await draft.json()).toMatchObject({ data: { status: "draft", postingState: "reversed" } });

    const voided = await post(`/api/v1/invoices/${String(invoiceId)}/void`);
    expect(await voided.json()).toMatchObject({ data: { status: "void" } });
  });

  it("removes a line only through its own invoice", async () => {
    const lineId = instance.service.books.directory.invoiceLines(invoiceId)[0]?.id ?? 0;

    const wrong = await instance.app.request(
      jsonRequest(`/api/v1/invoices/999/lines/${String(lineId)}`, "DELETE"),
    );
    expect(wrong.status).toBe(404);

    const removed = await instance.app.request(
      jsonRequest(`/api/v1/invoices/${String(invoiceId)}/lines/${String(lineId)}`, "DELETE"),
    );
    expect(removed.status).toBe(200);
    expect(await removed.json()).toMatchObject({ data: { total: "0.00" } });
  });
});

describe("payments", () => {
  beforeEach(async () => {
    await post(`/api/v1/invoices/${String(invoiceId)}/issue`);
  });

  it("records a payment, applies the rest later and marks the invoice paid", async () => {
    const recorded = await post("/api/v1/payments", {
      clientId,
      date: "2024-02-01",
      amount: "1500.00",
      method: "ach",
      applications: [{ invoiceId, amount: "1000.00" }],
    });
    expect(recorded.status).toBe(201);
    const body: unknown = await recorded.json();
    expect(body).toMatchObject({
      data: { payment: { unappliedAmount: "500.00" }, posted: { entry: { postedBy: "test-user" } } },
    });
    const paymentId = instance.service.books.directory.listPayments(clientId)[0]?.id ?? 0;

    expect(await get("/api/v1/reports/client-balances")).toEqual({
      data: [
        {
          clientId,
          name: "Acme Corp",
          totalInvoiced: "1500.00",
          applied: "1000.00",
          unapplied: "500.00",
          outstanding: "500.00",
          netAr: "0.00",
        },
      ],
    });

    const over = await post(`/api/v1/payments/${String(paymentId)}/apply`, {
      invoiceId,
      amount: "600.00",
    });
    expect(over.status).toBe(422);
    expect(await over.json()).toMatchObject({ error: { code: "OVER_APPLIED" } });

    const applied = await post(`/api/v1/payments/${String(paymentId)}/apply`, {
      invoiceId,
      amount: "500.00",
    });
    expect(applied.status).toBe(201);
    expect(await get(`/api/v1/invoices/${String(invoiceId)}`)).toMatchObject({
      data: { status: "paid", outstanding: "0.00" },
    });
  });

  it("creates a payment from a deposit", async () => {
    const checkingId = await idOf(
      await post("/api/v1/bank-accounts", {
        type: "checking",
        institution: "First Local",
        maskedNumber: "****1234",
      }),
    );
    const depositId = await idOf(
      await post("/api/v1/bank-transactions", {
        bankAccountId: checkingId,
        date: "2024-02-03",
        description: "ACME PAYMENT",
        amount: "1500.00",
        offsetAccountId: instance.service.books.chart.ownerEquity.id,
      }),
    );

    const res = await post(`/api/v1/bank-transactions/${String(depositId)}/create-payment`, {
      clientId,
      method: "ach",
      applications: [{ invoiceId, amount: "1500.00" }],
    });
    expect(res.status).toBe(201);
    expect(await res.json()).toMatchObject({
      data: { payment: { date: "2024-02-03", amount: "1500.00", unappliedAmount: "0.00" } },
    });

    expect(await get(`/api/v1/bank-transactions/${String(depositId)}`)).toMatchObject({
      data: { paymentId: expect.any(Number) },
    });
    expect(await get(`/api/v1/invoices/${String(invoiceId)}`)).toMatchObject({
      data: { status: "paid" },
    });
  });
});

describe("reports", () => {
  beforeEach(async () => {
    await post(`/api/v1/invoices/${String(invoiceId)}/issue`);
  });

  it("balances the trial balance", async () => {
    expect(await get("/api/v1/reports/trial-balance")).toMatchObject({
      data: { totalDebits: "1500.00", totalCredits: "1500.00", balanced: true },
    });
  });

  it("ages receivables as of the given date", async () => {
    expect(await get("/api/v1/reports/ar-aging?asOf=2024-03-20")).toMatchObject({
      data: {
        asOf: "2024-03-20",
        rows: [{ invoiceNumber: "2024-001", daysPastDue: 40, bucket: "days31to60" }],
        total: "1500.00",
      },
    });
  });

  it("ages receivables as of today by default", async () => {
    expect(await get("/api/v1/reports/ar-aging")).toMatchObject({
      data: { asOf: "2024-03-01", rows: [{ daysPastDue: 21, bucket: "current" }] },
    });
  });

  it("rejects an impossible date", async () => {
    const res = await instance.app.request("/api/v1/reports/ar-aging?asOf=2024-13-01");

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: { code: "VALIDATION_ERROR" } });
  });

  it("reports clean books", async () => {
    expect(await get("/api/v1/reports/integrity")).toEqual({
      data: { orphanedEntries: [], missingOpeningEntries: [], unbalancedEntryIds: [], clean: true },
    });
  });
});
