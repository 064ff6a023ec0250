/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps engine error codes (LedgerError, BooksError, ImportError)
 * to HTTP status codes. Anything without a known code is a 500.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { Logger } from "pino";
import { ApiError, createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Lookups
  NOT_FOUND: 404,
  UNKNOWN_ACCOUNT: 404,
  UNKNOWN_ENTRY: 404,

  // State conflicts
  ALREADY_MATCHED: 409,
  DRAFT_EXISTS: 409,
  DUPLICATE_ACCOUNT_CODE: 409,
  ACCOUNT_IN_USE: 409,
  INVALID_TRANSITION: 409,

  // Well-formed requests the books refuse
  AMOUNT_MISMATCH: 422,
  MISSING_GL_ACCOUNT: 422,
  SAME_ACCOUNT_TRANSFER: 422,
  OVER_APPLIED: 422,
  NOT_MATCHED: 422,
  ROW_FAILED: 422,

  // Bad input
  EMPTY_ENTRY: 400,
  INVALID_AMOUNT: 400,
  INVALID_LINE: 400,
  INVALID_ACCOUNT: 400,
  INVALID_CONFIGURATION: 400,
  INVALID_DATE: 400,
  INVALID_SNAPSHOT: 400,

  // UNBALANCED_ENTRY is a bug in a posting rule, not a client error.
  UNBALANCED_ENTRY: 500,
};

interface DomainFailure {
  readonly status: ContentfulStatusCode;
  readonly code: string;
  readonly details: Readonly<Record<string, unknown>> | undefined;
}

function classify(err: Error): DomainFailure {
  if (err instanceof ApiError) {
    return { status: err.status, code: err.code, details: err.details };
  }

  const code = "code" in err && typeof err.code === "string" ? err.code : undefined;
  if (code === undefined) {
    return { status: 500, code: "INTERNAL_ERROR", details: undefined };
  }

  const details =
    "details" in err && typeof err.details === "object" && err.details !== null
      ? Object.fromEntries(Object.entries(err.details))
      : undefined;
  return { status: STATUS_MAP[code] ?? 500, code, details };
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Build the handler registered as Hono's onError.
 */
export function createErrorHandler(logger?: Logger) {
  return (err: Error, c: Context): Response => {
    const { status, code, details } = classify(err);

    if (status === 500) {
      logger?.error({ err, requestId: c.get("requestId") }, "unhandled error");
      // Don't leak internal details
      return c.json(createErrorEnvelope(code, "Internal server error"), 500);
    }

    return c.json(createErrorEnvelope(code, err.message, details), status);
  };
}
