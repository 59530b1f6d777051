/**
 * Backend entry point.
 */

import { Logger } from "unfurl-kernel";
import { ChatService, createInMemoryRepositories, ModelService } from "unfurl-server";
import { createOpenAIProvider } from "unfurl-openai";
import { createApp } from "./app";
import { loadConfig } from "./config";

const config = loadConfig();

Logger.configure({
  level: config.LOG_LEVEL,
  contextFields: (ctx) => ({
    userId: ctx.user?.id,
    chatId: ctx.metadata["chatId"],
  }),
});

const log = Logger.for("Server");

const provider = createOpenAIProvider({
  apiKey: config.OPENAI_API_KEY,
  baseURL: config.OPENAI_BASE_URL,
});
const { conversationRepo } = createInMemoryRepositories();

const app = createApp({
  chatService: new ChatService({
    repository: conversationRepo,
    provider,
    defaultModel: config.DEFAULT_MODEL,
  }),
  modelService: new ModelService(provider),
  bodyLimit: config.REQUEST_BODY_LIMIT,
  corsOrigin: config.CORS_ORIGIN,
  rateLimit:
    config.RATE_LIMIT_MAX === 0
      ? false
      : { windowMs: config.RATE_LIMIT_WINDOW_MS, limit: config.RATE_LIMIT_MAX },
});

const server = app.listen(config.PORT, () => {
  log.info({ port: config.PORT }, "Server started");
  log.info({ url: `http://localhost:${config.PORT}/health` }, "Health check endpoint");
});

// =============================================================================
// Graceful Shutdown
// =============================================================================

function gracefulShutdown(signal: string): void {
  log.info({ signal }, "Shutdown signal received");

  server.close((err) => {
    if (err) {
      log.error({ err }, "Error during shutdown");
      process.exit(1);
    }
    log.info("Server closed");
    process.exit(0);
  });

  // Force close after timeout
  setTimeout(() => {
    log.error("Forced shutdown after timeout");
    process.exit(1);
  }, 5000).unref();
}

process.once("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.once("SIGINT", () => gracefulShutdown("SIGINT"));
