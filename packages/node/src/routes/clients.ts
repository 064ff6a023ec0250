/**
 * Client routes.
 *
 * POST /api/v1/clients           — Create
 * GET  /api/v1/clients           — List
 * GET  /api/v1/clients/:id       — Get one, with invoices and payments
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreateClientSchema } from "../types/dto.js";
import { parseBody, parseId } from "../middleware/validate.js";

export function createClientRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const { books } = c.get("service");
    const body = await parseBody(c, CreateClientSchema);
    return c.json({ data: books.directory.createClient(body) }, 201);
  });

  routes.get("/", (c) => {
    const { books } = c.get("service");
    return c.json({ data: books.directory.listClients() });
  });

  routes.get("/:id", (c) => {
    const { directory } = c.get("service").books;
    const client = directory.requireClient(parseId(c.req.param("id"), "id"));
    return c.json({
      data: {
        ...client,
        invoices: directory.listInvoices(client.id),
        payments: directory.listPayments(client.id),
      },
    });
  });

  return routes;
}
