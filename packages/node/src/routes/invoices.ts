/**
 * Invoice lifecycle routes.
 *
 * POST   /api/v1/invoices                       — Open a draft
 * GET    /api/v1/invoices                       — List (?clientId)
 * GET    /api/v1/invoices/:id                   — Get one, with lines and balance
 * POST   /api/v1/invoices/:id/lines             — Add a line to a draft
 * DELETE /api/v1/invoices/:id/lines/:lineId     — Remove a line from a draft
 * POST   /api/v1/invoices/:id/issue             — Draft → Issued, posts
 * POST   /api/v1/invoices/:id/return-to-draft   — Issued → Draft, reverses
 * POST   /api/v1/invoices/:id/void              — → Void, reverses when posted
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ClientFilterQuerySchema, CreateInvoiceSchema, InvoiceLineSchema } from "../types/dto.js";
import { ApiError } from "../types/error.js";
import { parseBody, parseId, parseQuery } from "../middleware/validate.js";

export function createInvoiceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", async (c) => {
    const { books } = c.get("service");
    const body = await parseBody(c, CreateInvoiceSchema);
    return c.json({ data: books.directory.createInvoice(body) }, 201);
  });

  routes.get("/", (c) => {
    const { books } = c.get("service");
    const { clientId } = parseQuery(c, ClientFilterQuerySchema);
    return c.json({ data: books.directory.listInvoices(clientId) });
  });

  routes.get("/:id", (c) => {
    const { directory } = c.get("service").books;
    const invoice = directory.requireInvoice(parseId(c.req.param("id"), "id"));
    return c.json({
      data: {
        ...invoice,
        lines: directory.invoiceLines(invoice.id),
        applied: directory.appliedTotal(invoice.id),
        outstanding: directory.outstandingBalance(invoice.id),
      },
    });
  });

  routes.post("/:id/lines", async (c) => {
    const { books } = c.get("service");
    const id = parseId(c.req.param("id"), "id");
    const body = await parseBody(c, InvoiceLineSchema);
    return c.json({ data: books.directory.addInvoiceLine(id, body) }, 201);
  });

  routes.delete("/:id/lines/:lineId", (c) => {
    const { books } = c.get("service");
    const id = parseId(c.req.param("id"), "id");
    const lineId = parseId(c.req.param("lineId"), "lineId");
    const line = books.store.invoiceLines.require(lineId);
    if (line.invoiceId !== id) {
      throw new ApiError(
        404,
        "NOT_FOUND",
        `Line ${String(lineId)} is not on invoice ${String(id)}`,
        { invoiceId: id, lineId },
      );
    }
    return c.json({ data: books.directory.removeInvoiceLine(lineId) });
  });

  routes.post("/:id/issue", (c) => {
    const { books, user } = c.get("service");
    const id = parseId(c.req.param("id"), "id");
    return c.json({ data: books.directory.issueInvoice(id, user) });
  });

  routes.post("/:id/return-to-draft", (c) => {
    const { books, user } = c.get("service");
    const id = parseId(c.req.param("id"), "id");
    return c.json({ data: books.directory.returnToDraft(id, user) });
  });

  routes.post("/:id/void", (c) => {
    const { books, user } = c.get("service");
    const id = parseId(c.req.param("id"), "id");
    return c.json({ data: books.directory.voidInvoice(id, user) });
  });

  return routes;
}
