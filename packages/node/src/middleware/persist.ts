/**
 * Persistence middleware.
 *
 * After a successful mutating request (anything but GET/HEAD answered
 * below 400) the books are written to the configured repository.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

const READ_ONLY_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);

export function persistMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    await next();

    if (READ_ONLY_METHODS.has(c.req.method) || c.res.status >= 400) {
      return;
    }
    c.get("service").persist();
  };
}
