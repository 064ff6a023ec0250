/**
 * Bank account routes.
 *
 * POST /api/v1/bank-accounts                     — Create (allocates a GL account)
 * GET  /api/v1/bank-accounts                     — List
 * GET  /api/v1/bank-accounts/:id                 — Get one
 * GET  /api/v1/bank-accounts/:id/balance         — Opening balance + transactions
 * GET  /api/v1/bank-accounts/:id/register        — Running balance (?from&to)
 * GET  /api/v1/bank-accounts/:id/import-profile  — Statement column layout
 * PUT  /api/v1/bank-accounts/:id/import-profile  — Create or replace it
 * POST /api/v1/bank-accounts/:id/import          — text/csv statement (?offsetAccountId)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  CreateBankAccountSchema,
  DateRangeQuerySchema,
  ImportProfileSchema,
  ImportQuerySchema,
} from "../types/dto.js";
import { ApiError } from "../types/error.js";
import { parseBody, parseId, parseQuery } from "../middleware/validate.js";

export function createBankAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const { books } = c.get("service");
    const body = await parseBody(c, CreateBankAccountSchema);
    return c.json({ data: books.banking.createBankAccount(body) }, 201);
  });

  routes.get("/", (c) => {
    const { books } = c.get("service");
    return c.json({ data: books.banking.listBankAccounts() });
  });

  routes.get("/:id", (c) => {
    const { books } = c.get("service");
    return c.json({ data: books.banking.requireBankAccount(parseId(c.req.param("id"), "id")) });
  });

  routes.get("/:id/balance", (c) => {
    const { books } = c.get("service");
    const id = parseId(c.req.param("id"), "id");
    return c.json({ data: { bankAccountId: id, balance: books.bankAccountBalance(id) } });
  });

  routes.get("/:id/register", (c) => {
    const { books } = c.get("service");
    const id = parseId(c.req.param("id"), "id");
    const { from, to } = parseQuery(c, DateRangeQuerySchema);
    return c.json({ data: books.runningBalanceForRange(id, from, to) });
  });

  routes.get("/:id/import-profile", (c) => {
    const { importer } = c.get("service");
    return c.json({ data: importer.requireImportProfile(parseId(c.req.param("id"), "id")) });
  });

  routes.put("/:id/import-profile", async (c) => {
    const { importer } = c.get("service");
    const id = parseId(c.req.param("id"), "id");
    const body = await parseBody(c, ImportProfileSchema);
    return c.json({ data: importer.setImportProfile(id, body) });
  });

  routes.post("/:id/import", async (c) => {
    const { importer } = c.get("service");
    const id = parseId(c.req.param("id"), "id");
    const { offsetAccountId } = parseQuery(c, ImportQuerySchema);

    const contentType = c.req.header("Content-Type") ?? "";
    if (!contentType.toLowerCase().startsWith("text/csv")) {
      throw new ApiError(415, "UNSUPPORTED_MEDIA_TYPE", "Statements are uploaded as text/csv", {
        contentType,
      });
    }

    const result = importer.importStatement(id, await c.req.text(), { offsetAccountId });
    return c.json({ data: result }, 201);
  });

  return routes;
}
