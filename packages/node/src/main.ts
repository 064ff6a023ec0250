/**
 * @tallybook/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { FileBooksRepository } from "@tallybook/books";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const repository =
    config.BOOKS_FILE === undefined ? undefined : new FileBooksRepository(config.BOOKS_FILE);
  if (repository === undefined) {
    logger.warn("BOOKS_FILE not set — books are kept in memory only");
  }

  const { app, service } = createApp({
    serviceConfig: {
      repository,
      logger: logger.child({ component: "books" }),
      defaultUser: config.DEFAULT_USER,
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${String(entry.status)}`);
    },
    logger,
  });

  logger.info(
    {
      booksFile: config.BOOKS_FILE ?? null,
      loadedFrom: service.lastSaved?.savedAt ?? null,
      accounts: service.books.store.journal.getAccounts().length,
    },
    "Books loaded",
  );

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Tallybook node started");

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      service.persist();
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
