import type { z } from "zod";
import { ValidationError } from "unfurl-shared";

/**
 * Parse a request body, failing with a ValidationError naming the first
 * offending field.
 */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const result = schema.safeParse(body);
  if (result.success) {
    return result.data;
  }
  const issue = result.error.issues[0];
  const field = issue?.path.join(".") || "body";
  throw new ValidationError(field, issue?.message ?? "Invalid request body", {
    code: issue?.code === "invalid_type" ? "VALIDATION_TYPE" : "VALIDATION_CONSTRAINT",
  });
}
