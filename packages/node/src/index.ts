/**
 * @tallybook/node — HTTP JSON surface over the books.
 */

export { BooksService } from "./services/books-service.js";
export type { BooksServiceConfig } from "./services/books-service.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export type { RequestLogEntry } from "./middleware/logger.js";
export * from "./types/index.js";
