/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { BooksService } from "./services/books-service.js";
import type { BooksServiceConfig } from "./services/books-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { persistMiddleware } from "./middleware/persist.js";
import {
  createAccountRoutes,
  createBankAccountRoutes,
  createBankTransactionRoutes,
  createCategoryRoutes,
  createClientRoutes,
  createExpenseRoutes,
  createHealthRoutes,
  createInvoiceRoutes,
  createPaymentRoutes,
  createReportRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig?: BooksServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;

  /** Receives unhandled (500) errors */
  readonly logger?: Logger;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: BooksService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const service = new BooksService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.logger));

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });
  app.use("/api/*", persistMiddleware());

  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1/bank-accounts", createBankAccountRoutes());
  app.route("/api/v1/bank-transactions", createBankTransactionRoutes());
  app.route("/api/v1/clients", createClientRoutes());
  app.route("/api/v1/expense-categories", createCategoryRoutes());
  app.route("/api/v1/expenses", createExpenseRoutes());
  app.route("/api/v1/invoices", createInvoiceRoutes());
  app.route("/api/v1/payments", createPaymentRoutes());
  app.route("/api/v1/reports", createReportRoutes());

  return { app, service };
}
