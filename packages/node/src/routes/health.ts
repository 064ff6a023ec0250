/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (books loaded, journal balanced)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { BooksService } from "../services/books-service.js";

export function createHealthRoutes(service: BooksService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const report = service.books.inspect();
    const ready = report.unbalancedEntryIds.length === 0;

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        persistent: service.persistent,
        lastSavedAt: service.lastSaved?.savedAt ?? null,
        integrity: {
          clean: report.clean,
          orphanedEntries: report.orphanedEntries.length,
          missingOpeningEntries: report.missingOpeningEntries.length,
          unbalancedEntries: report.unbalancedEntryIds.length,
        },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
