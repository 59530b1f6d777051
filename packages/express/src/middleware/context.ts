/**
 * Express Middleware for Request Context
 *
 * Runs every request inside a kernel context so log lines carry the
 * request id, and exposes an abort signal that fires when the client goes
 * away before the response is finished.
 *
 * @example
 * ```typescript
 * app.use(withRequestContext());
 *
 * // Custom extraction (different header names)
 * app.use(withRequestContext({
 *   extractContext: (headers) => ({
 *     requestId: String(headers['x-correlation-id'] ?? randomUUID()),
 *     userId: String(headers['x-auth-user'] ?? 'anonymous'),
 *   }),
 * }));
 * ```
 */

import type { RequestHandler } from "express";
import { Context } from "unfurl-kernel";
import {
  attachContext,
  buildKernelContext,
  defaultContextExtractor,
  type ContextExtractor,
} from "unfurl-server";

export const REQUEST_ID_HEADER = "x-request-id";

export interface RequestContextConfig {
  extractContext?: ContextExtractor;
}

export function withRequestContext(config: RequestContextConfig = {}): RequestHandler {
  const extractContext = config.extractContext ?? defaultContextExtractor;

  return (req, res, next) => {
    try {
      const requestContext = extractContext(req.headers, req.params);
      attachContext(req, requestContext);
      res.setHeader(REQUEST_ID_HEADER, requestContext.requestId);

      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableFinished) {
          controller.abort();
        }
      });

      Context.run(buildKernelContext(requestContext, controller.signal), () => next());
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Abort signal of the current request, when it runs inside
 * {@link withRequestContext}.
 */
export function requestSignal(): AbortSignal | undefined {
  return Context.tryGet()?.signal;
}
