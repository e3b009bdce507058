/**
 * Zod validation middleware.
 *
 * Validates the JSON request body against a Zod schema. Handlers read the
 * parsed, typed body with `c.req.valid("json")`.
 * Returns 400 with error envelope on validation failure.
 */

import { validator } from "hono/validator";
import type { z } from "zod";
import { createErrorEnvelope } from "../types/error.js";

export function validateBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return validator("json", (value, c) => {
    const result = schema.safeParse(value);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }
    return result.data;
  });
}

function formatZodErrors(
  error: z.ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
