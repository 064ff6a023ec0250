/**
 * Report routes.
 *
 * GET  /api/v1/reports/trial-balance      — ?from&to
 * GET  /api/v1/reports/income-statement   — ?from&to
 * GET  /api/v1/reports/client-balances    — ?sortBy&descending
 * GET  /api/v1/reports/ar-aging           — ?asOf (default today)
 * GET  /api/v1/reports/integrity          — Orphans, missing openings, unbalanced entries
 * POST /api/v1/reports/integrity/repair   — { dryRun }
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  ArAgingQuerySchema,
  ClientBalancesQuerySchema,
  DateRangeQuerySchema,
  RepairSchema,
} from "../types/dto.js";
import { parseBody, parseQuery } from "../middleware/validate.js";

export function createReportRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/trial-balance", (c) => {
    const { books } = c.get("service");
    return c.json({ data: books.trialBalance(parseQuery(c, DateRangeQuerySchema)) });
  });

  routes.get("/income-statement", (c) => {
    const { books } = c.get("service");
    return c.json({ data: books.incomeStatement(parseQuery(c, DateRangeQuerySchema)) });
  });

  routes.get("/client-balances", (c) => {
    const { books } = c.get("service");
    return c.json({ data: books.clientBalanceSummary(parseQuery(c, ClientBalancesQuerySchema)) });
  });

  routes.get("/ar-aging", (c) => {
    const { books } = c.get("service");
    const { asOf } = parseQuery(c, ArAgingQuerySchema);
    return c.json({ data: books.arAging(asOf) });
  });

  routes.get("/integrity", (c) => {
    const { books } = c.get("service");
    return c.json({ data: books.inspect() });
  });

  routes.post("/integrity/repair", async (c) => {
    const { books } = c.get("service");
    const body = await parseBody(c, RepairSchema);
    return c.json({ data: books.repair(body) });
  });

  return routes;
}
