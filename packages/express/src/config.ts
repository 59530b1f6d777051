/**
 * Environment configuration for the backend.
 */

import { z } from "zod";
import { DEFAULT_MODEL_ID, ValidationError } from "unfurl-shared";

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === "" ? undefined : value))
  .optional();

export const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.string().url().optional(),
  DEFAULT_MODEL: z.string().min(1).default(DEFAULT_MODEL_ID),
  /** express.json body size limit */
  REQUEST_BODY_LIMIT: z.string().min(1).default("10mb"),
  CORS_ORIGIN: optionalString,
  /** Rate limit window for /api requests */
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  /** Requests per client and window; 0 turns limiting off */
  RATE_LIMIT_MAX: z.coerce.number().int().min(0).default(100),
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Parse the environment.
 *
 * @throws ValidationError naming the first invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join(".") || "env";
    throw new ValidationError(field, `Invalid environment variable ${field}: ${issue?.message ?? "invalid"}`, {
      code: "VALIDATION_FORMAT",
    });
  }
  return result.data;
}
