/**
 * Bank transaction routes.
 *
 * POST   /api/v1/bank-transactions                    — Record and post
 * GET    /api/v1/bank-transactions?bankAccountId=     — One account, oldest first
 * GET    /api/v1/bank-transactions/:id                — Get one
 * GET    /api/v1/bank-transactions/:id/candidates     — Expense and transfer suggestions
 * POST   /api/v1/bank-transactions/:id/retag          — New offset account
 * POST   /api/v1/bank-transactions/:id/owner-equity   — Retag to Owner Equity
 * POST   /api/v1/bank-transactions/:id/link-expense   — Settle an expense
 * POST   /api/v1/bank-transactions/:id/link-payment   — Settle a recorded payment
 * POST   /api/v1/bank-transactions/:id/create-payment — Record a payment from a deposit
 * POST   /api/v1/bank-transactions/:id/unmatch        — Undo a match
 * DELETE /api/v1/bank-transactions/:id                — Unmatched only
 * POST   /api/v1/bank-transactions/match-transfer     — Pair two sides of a transfer
 * POST   /api/v1/bank-transactions/match-expenses     — Batch expense matching
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateBankTransactionSchema,
  CreatePaymentFromTransactionSchema,
  LinkExpenseSchema,
  LinkPaymentSchema,
  ListBankTransactionsQuerySchema,
  MatchExpensesBatchSchema,
  MatchTransferSchema,
  OffsetAccountSchema,
} from "../types/dto.js";
import { parseBody, parseId, parseQuery } from "../middleware/validate.js";

export function createBankTransactionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Collection ──────────────────────────────────────────────────
  routes.post("/", async (c) => {
    const { books } = c.get("service");
    const body = await parseBody(c, CreateBankTransactionSchema);
    return c.json({ data: books.banking.postTransaction(body) }, 201);
  });

  routes.get("/", (c) => {
    const { books } = c.get("service");
    const { bankAccountId } = parseQuery(c, ListBankTransactionsQuerySchema);
    const bankAccount = books.banking.requireBankAccount(bankAccountId);
    return c.json({ data: books.banking.transactionsFor(bankAccount.id) });
  });

  routes.post("/match-transfer", async (c) => {
    const { reconciler } = c.get("service");
    const body = await parseBody(c, MatchTransferSchema);
    return c.json({ data: reconciler.matchTransfer(body.fromTransactionId, body.toTransactionId) });
  });

  routes.post("/match-expenses", async (c) => {
    const { reconciler } = c.get("service");
    const body = await parseBody(c, MatchExpensesBatchSchema);
    return c.json({ data: reconciler.matchExpensesBatch(body.rows) });
  });

  // ─── Single Transaction ──────────────────────────────────────────
  routes.get("/:id", (c) => {
    const { books } = c.get("service");
    return c.json({ data: books.banking.requireTransaction(parseId(c.req.param("id"), "id")) });
  });

  routes.get("/:id/candidates", (c) => {
    const { reconciler } = c.get("service");
    const id = parseId(c.req.param("id"), "id");
    return c.json({
      data: {
        expenses: reconciler.expenseCandidates(id),
        transfers: reconciler.transferCandidates(id),
      },
    });
  });

  routes.post("/:id/retag", async (c) => {
    const { books } = c.get("service");
    const id = parseId(c.req.param("id"), "id");
    const { offsetAccountId } = await parseBody(c, OffsetAccountSchema);
    return c.json({ data: books.banking.retagTransaction(id, offsetAccountId) });
  });

  routes.post("/:id/owner-equity", (c) => {
    const { books } = c.get("service");
    return c.json({ data: books.banking.markAsOwnerEquity(parseId(c.req.param("id"), "id")) });
  });

  routes.post("/:id/link-expense", async (c) => {
    const { reconciler } = c.get("service");
    const id = parseId(c.req.param("id"), "id");
    const { expenseId } = await parseBody(c, LinkExpenseSchema);
    return c.json({ data: reconciler.linkExpense(id, expenseId) });
  });

  routes.post("/:id/link-payment", async (c) => {
    const service = c.get("service");
    const id = parseId(c.req.param("id"), "id");
    const { paymentId } = await parseBody(c, LinkPaymentSchema);
    return c.json({ data: service.reconciler.linkExistingPayment(id, paymentId, service.user) });
  });

  routes.post("/:id/create-payment", async (c) => {
    const service = c.get("service");
    const id = parseId(c.req.param("id"), "id");
    const body = await parseBody(c, CreatePaymentFromTransactionSchema);
    return c.json(
      { data: service.reconciler.createPaymentFromTransaction(id, body, service.user) },
      201,
    );
  });

  routes.post("/:id/unmatch", async (c) => {
    const { reconciler } = c.get("service");
    const id = parseId(c.req.param("id"), "id");
    const { offsetAccountId } = await parseBody(c, OffsetAccountSchema);
    return c.json({ data: reconciler.unmatchTransaction(id, offsetAccountId) });
  });

  routes.delete("/:id", (c) => {
    const { books } = c.get("service");
    const id = parseId(c.req.param("id"), "id");
    books.banking.deleteTransaction(id);
    return c.json({ data: { id, deleted: true } });
  });

  return routes;
}
