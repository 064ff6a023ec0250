/**
 * Expense routes.
 *
 * POST /api/v1/expense-categories  — Create (optionally mapped to a GL account)
 * GET  /api/v1/expense-categories  — List
 * POST /api/v1/expenses            — Record an expense
 * GET  /api/v1/expenses            — List
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateCategorySchema, CreateExpenseSchema } from "../types/dto.js";
import { parseBody } from "../middleware/validate.js";

export function createCategoryRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const { books } = c.get("service");
    const body = await parseBody(c, CreateCategorySchema);
    return c.json({ data: books.directory.createCategory(body) }, 201);
  });

  routes.get("/", (c) => {
    const { books } = c.get("service");
    return c.json({ data: books.directory.listCategories() });
  });

  return routes;
}

export function createExpenseRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const { books } = c.get("service");
    const body = await parseBody(c, CreateExpenseSchema);
    return c.json({ data: books.directory.createExpense(body) }, 201);
  });

  routes.get("/", (c) => {
    const { books } = c.get("service");
    return c.json({ data: books.directory.listExpenses() });
  });

  return routes;
}
