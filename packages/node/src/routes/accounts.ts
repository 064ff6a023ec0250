/**
 * Chart of accounts routes.
 *
 * GET  /api/v1/accounts                 — List accounts
 * POST /api/v1/accounts                 — Open an account
 * GET  /api/v1/accounts/:id/balance     — Debit/credit sums (?from&to)
 * POST /api/v1/accounts/:id/deactivate  — Hide from new postings
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { DateRangeQuerySchema, OpenAccountSchema } from "../types/dto.js";
import { parseBody, parseId, parseQuery } from "../middleware/validate.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const { books } = c.get("service");
    return c.json({ data: books.store.journal.getAccounts() });
  });

  routes.post("/", async (c) => {
    const { books } = c.get("service");
    const body = await parseBody(c, OpenAccountSchema);

    const account = books.store.transaction(() => books.store.journal.openAccount(body));
    return c.json({ data: account }, 201);
  });

  routes.get("/:id/balance", (c) => {
    const { books } = c.get("service");
    const range = parseQuery(c, DateRangeQuerySchema);
    return c.json({ data: books.accountBalance(parseId(c.req.param("id"), "id"), range) });
  });

  routes.post("/:id/deactivate", (c) => {
    const { books } = c.get("service");
    const id = parseId(c.req.param("id"), "id");

    const account = books.store.transaction(() => books.store.journal.setAccountActive(id, false));
    return c.json({ data: account });
  });

  return routes;
}
