/**
 * Zod validation helpers.
 *
 * Parse the JSON body or the query string against a schema, or a path
 * parameter as an id. A failure throws an ApiError that the error handler
 * turns into a 400 VALIDATION_ERROR envelope.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { IdSchema } from "../types/dto.js";
import { ApiError } from "../types/error.js";

export async function parseBody<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (err) {
    throw new ApiError(400, "VALIDATION_ERROR", "Invalid JSON in request body", {
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ApiError(400, "VALIDATION_ERROR", "Request body validation failed", {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

export function parseQuery<T>(
  c: Context<AppEnv>,
  schema: ZodType<T, ZodTypeDef, unknown>,
): T {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    throw new ApiError(400, "VALIDATION_ERROR", "Invalid query parameters", {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

/** A positive integer path parameter. */
export function parseId(raw: string | undefined, name: string): number {
  const result = IdSchema.safeParse(raw);
  if (!result.success) {
    throw new ApiError(
      400,
      "VALIDATION_ERROR",
      `Path parameter '${name}' must be a positive integer`,
      { parameter: name, value: raw ?? null },
    );
  }
  return result.data;
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
