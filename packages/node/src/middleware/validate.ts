/**
 * Zod request validation.
 *
 * Failures throw VALIDATION_ERROR, which the error handler renders as
 * 400 with the zod issues under `details.issues`.
 */

import type { Context } from "hono";
import type { ZodError, ZodTypeAny, z } from "zod";
import { CoordinationError } from "@meridian/coordinator";
import type { AppEnv } from "../types/api-contract.js";

export async function readBody<S extends ZodTypeAny>(
  c: Context<AppEnv>,
  schema: S,
): Promise<z.infer<S>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new CoordinationError("VALIDATION_ERROR", "Invalid JSON in request body");
  }
  return check(schema, body, "Request body validation failed");
}

export function readQuery<S extends ZodTypeAny>(
  c: Context<AppEnv>,
  schema: S,
): z.infer<S> {
  return check(schema, c.req.query(), "Invalid query parameters");
}

function check<S extends ZodTypeAny>(schema: S, value: unknown, message: string): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new CoordinationError("VALIDATION_ERROR", message, {
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
