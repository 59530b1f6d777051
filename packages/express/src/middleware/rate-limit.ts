/**
 * Per-client request limiting for the API routes.
 *
 * Over the limit, the request is handed to the error middleware as a
 * `REQUEST_RATE_LIMIT` error, so clients get the usual failure body.
 */

import type { RequestHandler } from "express";
import { rateLimit } from "express-rate-limit";
import { UnfurlError } from "unfurl-shared";

export const DEFAULT_RATE_LIMIT_WINDOW_MS = 15 * 60 * 1000;
export const DEFAULT_RATE_LIMIT = 100;
export const RATE_LIMIT_MESSAGE = "Too many requests from this IP, please try again later.";

export interface RateLimitConfig {
  /** Window length (default 15 minutes) */
  windowMs?: number;
  /** Requests per client and window (default 100) */
  limit?: number;
}

export function apiRateLimit(config: RateLimitConfig = {}): RequestHandler {
  const windowMs = config.windowMs ?? DEFAULT_RATE_LIMIT_WINDOW_MS;

  return rateLimit({
    windowMs,
    limit: config.limit ?? DEFAULT_RATE_LIMIT,
    standardHeaders: "draft-7",
    legacyHeaders: false,
    handler: (_req, _res, next) => {
      next(
        new UnfurlError("REQUEST_RATE_LIMIT", RATE_LIMIT_MESSAGE, {
          retryAfter: Math.ceil(windowMs / 1000),
        }),
      );
    },
  });
}
