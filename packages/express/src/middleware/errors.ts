/**
 * Error responses
 *
 * Converts the shared error hierarchy to `{ success: false, error, code }`
 * bodies with a matching HTTP status.
 */

import type { ErrorRequestHandler, RequestHandler } from "express";
import { Logger, type KernelLogger } from "unfurl-kernel";
import {
  ensureError,
  isUnfurlError,
  type ApiFailure,
  type UnfurlError,
  type UnfurlErrorCode,
} from "unfurl-shared";

const STATUS_BY_CODE: Partial<Record<UnfurlErrorCode, number>> = {
  VALIDATION_REQUIRED: 400,
  VALIDATION_TYPE: 400,
  VALIDATION_FORMAT: 400,
  VALIDATION_CONSTRAINT: 400,
  NOT_FOUND_CONVERSATION: 404,
  NOT_FOUND_MESSAGE: 404,
  NOT_FOUND_MODEL: 404,
  NOT_FOUND_RESOURCE: 404,
  PROVIDER_QUOTA: 402,
  PROVIDER_AUTH: 401,
  PROVIDER_RATE_LIMIT: 429,
  REQUEST_RATE_LIMIT: 429,
  PROVIDER_RESPONSE: 502,
  ABORT_CANCELLED: 499,
  ABORT_SIGNAL: 499,
  ABORT_TIMEOUT: 504,
};

/** Status for body-parser failures (malformed JSON, body too large) */
function httpErrorStatus(error: Error): number | undefined {
  if ("status" in error && typeof error.status === "number" && error.status >= 400 && error.status < 500) {
    return error.status;
  }
  return undefined;
}

export function statusForError(error: unknown): number {
  if (isUnfurlError(error)) {
    return STATUS_BY_CODE[error.code] ?? 500;
  }
  return httpErrorStatus(ensureError(error)) ?? 500;
}

function failureBody(error: UnfurlError): ApiFailure {
  return {
    success: false,
    error: error.message,
    code: error.code,
    ...(error.code.startsWith("VALIDATION_") && { details: error.details }),
  };
}

export interface ErrorHandlerConfig {
  logger?: KernelLogger;
  /** Include the message of unexpected errors in responses (default: false) */
  exposeInternalErrors?: boolean;
}

/**
 * Terminal error middleware. Register after all routes.
 */
export function errorHandler(config: ErrorHandlerConfig = {}): ErrorRequestHandler {
  const log = config.logger ?? Logger.for("HttpErrors");

  return (error: unknown, _req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const status = statusForError(error);
    const err = ensureError(error);

    if (status >= 500) {
      log.error({ err, status }, "Request failed");
    } else {
      log.warn({ err, status }, "Request rejected");
    }

    if (isUnfurlError(error)) {
      res.status(status).json(failureBody(error));
      return;
    }

    const body: ApiFailure = {
      success: false,
      error: status < 500 || config.exposeInternalErrors ? err.message : "Internal server error",
    };
    res.status(status).json(body);
  };
}

/**
 * Catch-all for unknown routes.
 */
export function notFoundHandler(): RequestHandler {
  return (req, res) => {
    const body: ApiFailure = {
      success: false,
      error: `Route not found: ${req.method} ${req.originalUrl}`,
      code: "NOT_FOUND_RESOURCE",
    };
    res.status(404).json(body);
  };
}
