/**
 * # Unfurl OpenAI Provider
 *
 * Completion provider for the conversation backend, backed by the OpenAI
 * chat completions API.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createOpenAIProvider } from 'unfurl-openai';
 * import { ChatService, createInMemoryRepositories } from 'unfurl-server';
 *
 * const provider = createOpenAIProvider(); // reads OPENAI_API_KEY
 * const chat = new ChatService({ repository: createInMemoryRepositories().conversationRepo, provider });
 * ```
 *
 * @module unfurl-openai
 */
export * from "./openai";
export type * from "./types";
