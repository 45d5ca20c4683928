/**
 * Zod validation helpers.
 *
 * Parse a request body or query against a schema and return the typed
 * result. Failures throw an ApiError that the error handler renders as
 * 400 VALIDATION_ERROR with the Zod issues.
 */

import type { Context } from "hono";
import type { ZodError, ZodTypeAny, output } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError } from "../types/error.js";

export async function parseBody<S extends ZodTypeAny>(
  c: Context<AppEnv>,
  schema: S,
): Promise<output<S>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ApiError("VALIDATION_ERROR", "Invalid JSON in request body", 400);
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", "Request body validation failed", 400, {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

export function parseQuery<S extends ZodTypeAny>(
  c: Context<AppEnv>,
  schema: S,
): output<S> {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", "Invalid query parameters", 400, {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

export function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
