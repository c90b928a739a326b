/**
 * Zod request parsing.
 *
 * Failures throw a 400 VALIDATION_ERROR carrying the issues; the global
 * error handler renders them.
 */

import type { Context } from "hono";
import type { ZodError, ZodTypeAny, z } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError } from "../types/error.js";

export function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}

/** Parse the JSON body against `schema`. */
export async function readBody<S extends ZodTypeAny>(
  c: Context<AppEnv>,
  schema: S,
): Promise<z.output<S>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ApiError("VALIDATION_ERROR", 400, "Invalid JSON in request body");
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", 400, "Request body validation failed", {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

/** Parse the query string against `schema`. */
export function readQuery<S extends ZodTypeAny>(c: Context<AppEnv>, schema: S): z.output<S> {
  const result = schema.safeParse(c.req.query());
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", 400, "Invalid query parameters", {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

/** A positive integer path parameter. */
export function readIdParam(c: Context<AppEnv>, name: string): number {
  const raw = c.req.param(name);
  const id = Number(raw);
  if (raw === undefined || !/^\d+$/.test(raw) || !Number.isSafeInteger(id) || id < 1) {
    throw new ApiError("VALIDATION_ERROR", 400, `Invalid ${name}: '${raw ?? ""}'`);
  }
  return id;
}
