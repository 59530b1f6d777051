/**
 * Shared Server Types
 *
 * Framework-agnostic entity and repository interfaces for conversation
 * persistence, plus the completion provider contract the chat service
 * calls into.
 */

import type { Conversation, ConversationSummary, Message, ProviderModel } from "unfurl-shared";

// =============================================================================
// Repository Interfaces
// =============================================================================

export interface NewConversation {
  id: string;
  title: string;
  model: string;
  messages?: Message[];
  createdAt?: Date;
}

export interface ListConversationsParams {
  /** Default 50 */
  limit?: number;
  offset?: number;
}

/**
 * Conversation storage. Soft-deleted conversations stay stored with
 * `isActive = false`; the `find*` methods that take `activeOnly` skip them.
 */
export interface ConversationRepository {
  create(data: NewConversation): Promise<Conversation>;
  findById(id: string, options?: { activeOnly?: boolean }): Promise<Conversation | null>;
  /** Active conversations, most recently updated first */
  listSummaries(params?: ListConversationsParams): Promise<ConversationSummary[]>;
  update(
    id: string,
    updates: Partial<Pick<Conversation, "title" | "model" | "isActive">>,
  ): Promise<Conversation | null>;
  appendMessages(id: string, messages: Message[]): Promise<Conversation | null>;
  /** Sets `isActive = false`. Returns false when the id is unknown. */
  softDelete(id: string): Promise<boolean>;
}

export interface PersistenceRepositories {
  conversationRepo: ConversationRepository;
}

// =============================================================================
// Completion Provider
// =============================================================================

export interface CompletionRequest {
  model: string;
  /** Whole conversation in order, the new user message last */
  messages: Message[];
  signal?: AbortSignal;
}

export interface CompletionResult {
  content: string;
  /** Model that actually answered */
  model: string;
  tokensUsed: number;
}

/**
 * A language model backend. Implementations map their own failures to
 * `ProviderError`.
 */
export interface CompletionProvider {
  readonly name: string;
  complete(request: CompletionRequest): Promise<CompletionResult>;
  /** Short title for a conversation opened with `content`. */
  generateTitle(content: string): Promise<string>;
  /** Resolves when `modelId` answers a trivial request, rejects otherwise. */
  probe(modelId: string): Promise<void>;
  /** Every model the provider account can use. */
  listModels(): Promise<ProviderModel[]>;
}
