/**
 * # Unfurl Server
 *
 * Framework-agnostic backend pieces. Works with Express or any other
 * Node.js server framework.
 *
 * ## Features
 *
 * - **Persistence** - Conversation repository interface and an in-memory store
 * - **Chat Service** - Send, list, rename and delete conversations
 * - **Model Catalog** - Supported models and availability probes
 * - **Context Utilities** - Extract request context and ID generators
 *
 * ## Quick Start
 *
 * ```typescript
 * import { ChatService, createInMemoryRepositories } from 'unfurl-server';
 *
 * const { conversationRepo } = createInMemoryRepositories();
 * const chat = new ChatService({ repository: conversationRepo, provider });
 *
 * const { chatId, aiMessage } = await chat.sendMessage({ content: 'Hello' });
 * ```
 *
 * @module unfurl-server
 */

export type {
  NewConversation,
  ListConversationsParams,
  ConversationRepository,
  PersistenceRepositories,
  CompletionRequest,
  CompletionResult,
  CompletionProvider,
} from "./types";

export {
  type InMemoryStore,
  createInMemoryStore,
  clearStore,
  DEFAULT_LIST_LIMIT,
  InMemoryConversationRepository,
  createInMemoryRepositories,
} from "./persistence/in-memory";

export {
  type RequestContext,
  type RequestHeaders,
  type IdGenerator,
  type ContextExtractor,
  uuidV4Generator,
  createPrefixedIdGenerator,
  createIdGenerator,
  defaultContextExtractor,
  buildKernelContext,
  attachContext,
  getContext,
  requireContext,
} from "./request-context";

export {
  type SendMessageInput,
  type SendMessageOutput,
  type ChatServiceConfig,
  ChatService,
  FALLBACK_TITLE,
  TITLE_FALLBACK_LENGTH,
  fallbackTitle,
} from "./chat-service";

export { MODEL_CATALOG, findModel, isChatModel, ModelService } from "./models";
