/**
 * # Unfurl Express
 *
 * Express.js backend for the conversation API: app factory, request
 * context and error middleware, conversation and model routes, and env
 * configuration.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createApp } from 'unfurl-express';
 * import { ChatService, ModelService, createInMemoryRepositories } from 'unfurl-server';
 * import { createOpenAIProvider } from 'unfurl-openai';
 *
 * const provider = createOpenAIProvider();
 * const app = createApp({
 *   chatService: new ChatService({ repository: createInMemoryRepositories().conversationRepo, provider }),
 *   modelService: new ModelService(provider),
 * });
 * app.listen(3001);
 * ```
 *
 * @module unfurl-express
 */

export { createApp, type CreateAppConfig } from "./app";
export { loadConfig, envSchema, type AppConfig } from "./config";

// Middleware
export {
  withRequestContext,
  requestSignal,
  REQUEST_ID_HEADER,
  type RequestContextConfig,
} from "./middleware/context";
export {
  errorHandler,
  notFoundHandler,
  statusForError,
  type ErrorHandlerConfig,
} from "./middleware/errors";
export {
  apiRateLimit,
  DEFAULT_RATE_LIMIT,
  DEFAULT_RATE_LIMIT_WINDOW_MS,
  RATE_LIMIT_MESSAGE,
  type RateLimitConfig,
} from "./middleware/rate-limit";
export { parseBody } from "./middleware/validate";

// Routes
export { chatRoutes, createChatHandlers, type ChatHandlers } from "./routes/chat";
export { modelRoutes, createModelHandlers, type ModelHandlers } from "./routes/models";
export { asyncHandler, type AsyncHandler } from "./routes/async-handler";

export * from "./schemas";

// Re-export from server
export * from "unfurl-server";
