/**
 * Payment routes.
 *
 * POST /api/v1/payments            — Record with applications (posts)
 * GET  /api/v1/payments            — List (?clientId)
 * GET  /api/v1/payments/:id        — Get one, with applications
 * POST /api/v1/payments/:id/post   — Post the payment's entry (returns the existing one)
 * POST /api/v1/payments/:id/apply  — Apply unapplied funds to an invoice
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ApplicationSchema, ClientFilterQuerySchema, RecordPaymentSchema } from "../types/dto.js";
import { parseBody, parseId, parseQuery } from "../middleware/validate.js";

export function createPaymentRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const service = c.get("service");
    const body = await parseBody(c, RecordPaymentSchema);
    return c.json({ data: service.books.directory.recordPayment(body, service.user) }, 201);
  });

  routes.get("/", (c) => {
    const { books } = c.get("service");
    const { clientId } = parseQuery(c, ClientFilterQuerySchema);
    return c.json({ data: books.directory.listPayments(clientId) });
  });

  routes.get("/:id", (c) => {
    const { directory } = c.get("service").books;
    const payment = directory.requirePayment(parseId(c.req.param("id"), "id"));
    return c.json({ data: { ...payment, applications: directory.applicationsFor(payment.id) } });
  });

  routes.post("/:id/post", (c) => {
    const service = c.get("service");
    const id = parseId(c.req.param("id"), "id");
    return c.json({ data: service.books.posting.postPayment(id, service.user) });
  });

  routes.post("/:id/apply", async (c) => {
    const { books } = c.get("service");
    const id = parseId(c.req.param("id"), "id");
    const body = await parseBody(c, ApplicationSchema);
    return c.json({ data: books.directory.applyUnapplied(id, body) }, 201);
  });

  return routes;
}
