/**
 * In-Memory Store Implementation
 *
 * Simple Map-based storage for development and testing.
 * Stored values are copied on the way in and out so callers never share
 * references with the store.
 */

import { summarize, type Conversation, type ConversationSummary, type Message } from "unfurl-shared";
import type {
  ConversationRepository,
  ListConversationsParams,
  NewConversation,
  PersistenceRepositories,
} from "../types";

// =============================================================================
// Store Interface
// =============================================================================

export interface InMemoryStore {
  conversations: Map<string, Conversation>;
}

/**
 * Create a new in-memory store instance
 */
export function createInMemoryStore(): InMemoryStore {
  return {
    conversations: new Map(),
  };
}

/**
 * Clear all data from a store
 */
export function clearStore(store: InMemoryStore): void {
  store.conversations.clear();
}

function copyMessage(message: Message): Message {
  return { ...message, images: message.images.map((image) => ({ ...image })) };
}

function copyConversation(conversation: Conversation): Conversation {
  return { ...conversation, messages: conversation.messages.map(copyMessage) };
}

// =============================================================================
// Repository Implementations
// =============================================================================

export const DEFAULT_LIST_LIMIT = 50;

export class InMemoryConversationRepository implements ConversationRepository {
  constructor(
    private store: InMemoryStore,
    private now: () => Date = () => new Date(),
  ) {}

  async create(data: NewConversation): Promise<Conversation> {
    const createdAt = data.createdAt ?? this.now();
    const entity: Conversation = {
      id: data.id,
      title: data.title,
      model: data.model,
      messages: (data.messages ?? []).map(copyMessage),
      createdAt,
      updatedAt: createdAt,
      isActive: true,
    };
    this.store.conversations.set(entity.id, entity);
    return copyConversation(entity);
  }

  async findById(id: string, options: { activeOnly?: boolean } = {}): Promise<Conversation | null> {
    const entity = this.store.conversations.get(id);
    if (!entity) return null;
    if (options.activeOnly && !entity.isActive) return null;
    return copyConversation(entity);
  }

  async listSummaries(params: ListConversationsParams = {}): Promise<ConversationSummary[]> {
    const offset = params.offset ?? 0;
    const limit = params.limit ?? DEFAULT_LIST_LIMIT;
    return Array.from(this.store.conversations.values())
      .filter((c) => c.isActive)
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime())
      .slice(offset, offset + limit)
      .map(summarize);
  }

  async update(
    id: string,
    updates: Partial<Pick<Conversation, "title" | "model" | "isActive">>,
  ): Promise<Conversation | null> {
    const existing = this.store.conversations.get(id);
    if (!existing) return null;
    const updated: Conversation = { ...existing, ...updates, updatedAt: this.now() };
    this.store.conversations.set(id, updated);
    return copyConversation(updated);
  }

  async appendMessages(id: string, messages: Message[]): Promise<Conversation | null> {
    const existing = this.store.conversations.get(id);
    if (!existing) return null;
    const updated: Conversation = {
      ...existing,
      messages: [...existing.messages, ...messages.map(copyMessage)],
      updatedAt: this.now(),
    };
    this.store.conversations.set(id, updated);
    return copyConversation(updated);
  }

  async softDelete(id: string): Promise<boolean> {
    const updated = await this.update(id, { isActive: false });
    return updated !== null;
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create all in-memory repositories sharing a single store
 */
export function createInMemoryRepositories(
  store: InMemoryStore = createInMemoryStore(),
): PersistenceRepositories & { store: InMemoryStore } {
  return {
    store,
    conversationRepo: new InMemoryConversationRepository(store),
  };
}
