/**
 * Zod request validation.
 *
 * Parses the JSON body or the query string of a request against a Zod
 * schema. Failures throw ApiError("VALIDATION_ERROR") with the issues
 * attached, which the global error handler renders as a 400.
 */

import type { Context } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { ApiError } from "../types/error.js";

/**
 * Validate the JSON request body. An empty body is read as `{}`.
 */
export async function parseBody<T>(
  c: Context,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<T> {
  const text = await c.req.text();
  let body: unknown = {};
  if (text.trim() !== "") {
    try {
      body = JSON.parse(text);
    } catch {
      throw new ApiError("VALIDATION_ERROR", "Invalid JSON in request body");
    }
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", "Request body validation failed", {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

export function parseQuery<T>(c: Context, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", "Query validation failed", {
      issues: formatZodErrors(result.error),
    });
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
