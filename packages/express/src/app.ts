/**
 * Express application factory.
 *
 * @example
 * ```typescript
 * const { conversationRepo } = createInMemoryRepositories();
 * const provider = createOpenAIProvider();
 * const app = createApp({
 *   chatService: new ChatService({ repository: conversationRepo, provider }),
 *   modelService: new ModelService(provider),
 * });
 * app.listen(3001);
 * ```
 */

import express, { type Express } from "express";
import cors from "cors";
import helmet, { type HelmetOptions } from "helmet";
import type { ChatService, ModelService } from "unfurl-server";
import { withRequestContext, type RequestContextConfig } from "./middleware/context";
import { errorHandler, notFoundHandler, type ErrorHandlerConfig } from "./middleware/errors";
import { apiRateLimit, type RateLimitConfig } from "./middleware/rate-limit";
import { chatRoutes } from "./routes/chat";
import { modelRoutes } from "./routes/models";

export interface CreateAppConfig {
  chatService: ChatService;
  modelService: ModelService;
  /** express.json size limit (default 10mb) */
  bodyLimit?: string;
  /** Allowed CORS origin; every origin when omitted */
  corsOrigin?: string;
  /** Limit for `/api` requests per client; `false` turns limiting off */
  rateLimit?: RateLimitConfig | false;
  /** Security header options passed to helmet */
  securityHeaders?: HelmetOptions;
  extractContext?: RequestContextConfig["extractContext"];
  errors?: ErrorHandlerConfig;
}

export function createApp(config: CreateAppConfig): Express {
  const app = express();

  app.use(helmet(config.securityHeaders));
  if (config.rateLimit !== false) {
    app.use("/api", apiRateLimit(config.rateLimit));
  }
  app.use(cors(config.corsOrigin ? { origin: config.corsOrigin } : undefined));
  app.use(express.json({ limit: config.bodyLimit ?? "10mb" }));
  // After body parsing, so handlers run inside the request context
  app.use(withRequestContext({ extractContext: config.extractContext }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use("/api/chat", chatRoutes(config.chatService));
  app.use("/api/models", modelRoutes(config.modelService));

  app.use(notFoundHandler());
  app.use(errorHandler(config.errors));

  return app;
}
