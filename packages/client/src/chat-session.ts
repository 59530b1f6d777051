/**
 * ChatSession - client-side conversation flow
 *
 * Owns the open conversation, the summary list and the model selection, and
 * drives them through the {@link ChatApiClient}:
 *
 * - a sent message shows up immediately under a temporary id and is swapped
 *   for the server's copy once the reply arrives
 * - a new conversation takes the id the server assigns
 * - assistant replies are appended unanimated, so the UI reveals them once
 * - at most one request is in flight; {@link ChatSession.cancelPending} aborts
 *   it without reporting an error
 *
 * Failures are logged and exposed through `state.error` rather than thrown.
 *
 * @example
 * ```typescript
 * const session = new ChatSession({ api: new ChatApiClient({ baseUrl }) });
 * session.subscribe(() => render(session.state, session.conversation.messages));
 *
 * await session.refreshConversations();
 * await session.send('Explain closures');
 * ```
 */

import {
  ActiveConversation,
  AnimationTracker,
  type AnimationTrackerOptions,
} from "unfurl";
import { Logger, type KernelLogger } from "unfurl-kernel";
import {
  ensureError,
  isAbortError,
  MAX_MESSAGE_LENGTH,
  NotFoundError,
  StateError,
  summarize,
  SUMMARY_PREVIEW_LENGTH,
  ValidationError,
  type ConversationSummary,
  type MessageImage,
  type ModelInfo,
} from "unfurl-shared";
import type { ChatApiClient, SendMessageResponse } from "./api-client";

// =============================================================================
// Types
// =============================================================================

export interface ChatSessionState {
  /** Active conversations, most recently updated first */
  conversations: ConversationSummary[];
  models: ModelInfo[];
  selectedModel: string;
  isSending: boolean;
  isLoading: boolean;
  error: Error | null;
}

export type ChatSessionListener = (state: ChatSessionState) => void;

export interface SendOptions {
  images?: Omit<MessageImage, "id">[];
  /** Overrides the selected model for this message */
  model?: string;
}

export interface ChatSessionConfig {
  api: ChatApiClient;
  /** Defaults to a fresh ActiveConversation */
  conversation?: ActiveConversation;
  tracker?: AnimationTrackerOptions;
  /** Model used until one is selected (default: gpt-3.5-turbo) */
  defaultModel?: string;
  /** Ids for optimistic messages */
  generateTempId?: () => string;
  logger?: KernelLogger;
}

interface Exchange {
  content: string;
  images: Omit<MessageImage, "id">[];
  model: string;
  /** Id of the local user message to swap for the server's, if any */
  optimisticId?: string;
}

export const DEFAULT_CLIENT_MODEL = "gpt-3.5-turbo";

const DRAFT_PREFIX = "draft-";

function createTempIdGenerator(): () => string {
  let counter = 0;
  return () => `temp-${Date.now()}-${++counter}`;
}

// =============================================================================
// Implementation
// =============================================================================

export class ChatSession {
  readonly conversation: ActiveConversation;
  readonly tracker: AnimationTracker;

  private readonly api: ChatApiClient;
  private readonly generateTempId: () => string;
  private readonly log: KernelLogger;
  private readonly listeners = new Set<ChatSessionListener>();
  private pending: AbortController | null = null;
  private current: ChatSessionState;

  constructor(config: ChatSessionConfig) {
    this.api = config.api;
    this.conversation = config.conversation ?? new ActiveConversation();
    this.tracker = new AnimationTracker(this.conversation, config.tracker);
    this.generateTempId = config.generateTempId ?? createTempIdGenerator();
    this.log = config.logger ?? Logger.for("ChatSession");
    this.current = {
      conversations: [],
      models: [],
      selectedModel: config.defaultModel ?? DEFAULT_CLIENT_MODEL,
      isSending: false,
      isLoading: false,
      error: null,
    };
  }

  get state(): ChatSessionState {
    return this.current;
  }

  subscribe(listener: ChatSessionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ===========================================================================
  // Messages
  // ===========================================================================

  /**
   * Send a user message in the open conversation, or start a new one when
   * none is open. Resolves with the server's exchange, or null when the
   * request failed or was cancelled.
   */
  async send(content: string, options: SendOptions = {}): Promise<SendMessageResponse | null> {
    return this.guard("send", async () => {
      this.assertIdle("send");
      const text = this.validateContent(content);
      const model = options.model ?? this.current.selectedModel;
      const images = options.images ?? [];
      const tempId = this.generateTempId();

      if (!this.conversation.current) {
        this.conversation.adopt({ id: `${DRAFT_PREFIX}${tempId}`, title: "New Chat", model });
      }
      this.conversation.appendMessage({
        id: tempId,
        role: "user",
        content: text,
        images: images.map((image, index) => ({ id: `${tempId}-image-${index}`, ...image })),
        timestamp: new Date(),
        hasAnimated: true,
      });

      return this.exchange({ content: text, images, model, optimisticId: tempId });
    });
  }

  /**
   * Drop the last assistant reply and ask again with the user message before it.
   */
  async regenerateLast(model?: string): Promise<SendMessageResponse | null> {
    return this.guard("regenerate", async () => {
      this.assertIdle("regenerate");
      const messages = this.conversation.messages;
      const replyIndex = findLastIndex(messages, (message) => message.role === "assistant");
      const reply = messages[replyIndex];
      const prompt = findLast(messages.slice(0, replyIndex), (message) => message.role === "user");
      if (!reply || !prompt) {
        throw StateError.transition("no-reply", "regenerate");
      }

      this.conversation.removeMessage(reply.id);
      return this.exchange({
        content: prompt.content,
        images: stripImageIds(prompt.images),
        model: model ?? this.current.selectedModel,
      });
    });
  }

  /**
   * Replace a user message and everything after it with `content`, then send.
   */
  async editAndResend(messageId: string, content: string): Promise<SendMessageResponse | null> {
    const message = this.conversation.findMessage(messageId);
    if (!message) {
      return this.fail("edit", new NotFoundError("message", messageId));
    }
    if (message.role !== "user") {
      return this.fail("edit", ValidationError.constraint("messageId", "Only user messages can be edited"));
    }
    if (this.pending) {
      return this.fail("edit", StateError.transition("sending", "edit"));
    }

    this.conversation.truncateAfter(messageId, true);
    return this.send(content, { images: stripImageIds(message.images) });
  }

  /**
   * Abort the in-flight request. The optimistic message it added is removed
   * and no error is reported.
   */
  cancelPending(): boolean {
    if (!this.pending) return false;
    this.pending.abort();
    this.pending = null;
    return true;
  }

  // ===========================================================================
  // Conversations
  // ===========================================================================

  async loadConversation(id: string): Promise<boolean> {
    this.cancelPending();
    const loaded = await this.guard("load", async () => {
      this.setState({ isLoading: true });
      try {
        const conversation = await this.api.getConversation(id);
        this.conversation.load(conversation);
        this.setState({ selectedModel: conversation.model });
        return true;
      } finally {
        this.setState({ isLoading: false });
      }
    });
    return loaded ?? false;
  }

  newConversation(): void {
    this.cancelPending();
    this.conversation.reset();
    this.setState({ error: null });
  }

  async refreshConversations(): Promise<ConversationSummary[]> {
    const conversations = await this.guard("list", () => this.api.listConversations());
    if (conversations) {
      this.setState({ conversations });
    }
    return this.current.conversations;
  }

  async rename(id: string, title: string): Promise<boolean> {
    const summary = await this.guard("rename", () => this.api.renameConversation(id, title));
    if (!summary) return false;

    this.setState({
      conversations: this.current.conversations.map((existing) =>
        existing.id === id ? summary : existing,
      ),
    });
    if (this.conversation.id === id) {
      this.conversation.adopt({ id, title: summary.title, model: summary.model });
    }
    return true;
  }

  async delete(id: string): Promise<boolean> {
    const deleted = await this.guard("delete", async () => {
      await this.api.deleteConversation(id);
      return true;
    });
    if (!deleted) return false;

    this.setState({
      conversations: this.current.conversations.filter((summary) => summary.id !== id),
    });
    if (this.conversation.id === id) {
      this.cancelPending();
      this.conversation.reset();
    }
    return true;
  }

  // ===========================================================================
  // Models
  // ===========================================================================

  async loadModels(): Promise<ModelInfo[]> {
    const models = await this.guard("models", () => this.api.listModels());
    if (models) {
      const keep = models.some((model) => model.id === this.current.selectedModel);
      const fallback = models.find((model) => model.isDefault) ?? models[0];
      this.setState({
        models,
        selectedModel: keep || !fallback ? this.current.selectedModel : fallback.id,
      });
    }
    return this.current.models;
  }

  selectModel(modelId: string): void {
    this.setState({ selectedModel: modelId });
  }

  clearError(): void {
    this.setState({ error: null });
  }

  /**
   * Cancel any request, drop pending animation saves and detach listeners.
   */
  dispose(): void {
    this.cancelPending();
    this.tracker.dispose();
    this.listeners.clear();
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private async exchange(exchange: Exchange): Promise<SendMessageResponse | null> {
    const controller = new AbortController();
    this.pending = controller;
    const draftId = this.conversation.id;
    const chatId = draftId && !draftId.startsWith(DRAFT_PREFIX) ? draftId : undefined;
    this.setState({ isSending: true, error: null });

    try {
      const result = await this.api.sendMessage(
        {
          chatId,
          model: exchange.model,
          message: {
            content: exchange.content,
            ...(exchange.images.length > 0 && { images: exchange.images }),
          },
        },
        controller.signal,
      );

      // The user may have switched conversations while waiting
      if (this.conversation.id !== draftId) {
        this.log.debug({ chatId: result.chatId }, "Reply arrived for a conversation no longer open");
        this.upsertSummary({
          id: result.chatId,
          title: result.title,
          model: result.aiMessage.modelUsed ?? exchange.model,
          lastMessage: result.aiMessage.content.slice(0, SUMMARY_PREVIEW_LENGTH),
          createdAt: result.userMessage.timestamp,
          updatedAt: result.aiMessage.timestamp,
        });
        return result;
      }

      if (exchange.optimisticId) {
        this.conversation.swapMessage(exchange.optimisticId, result.userMessage);
      }
      this.conversation.adopt({
        id: result.chatId,
        title: result.title,
        model: result.aiMessage.modelUsed ?? exchange.model,
      });
      this.conversation.appendGenerated(result.aiMessage);
      const snapshot = this.conversation.current;
      if (snapshot) {
        this.upsertSummary(summarize(snapshot));
      }
      return result;
    } catch (error) {
      if (controller.signal.aborted && isAbortError(error)) {
        this.log.debug({ chatId }, "Send cancelled");
        this.discardOptimistic(exchange.optimisticId);
        return null;
      }
      throw error;
    } finally {
      if (this.pending === controller) {
        this.pending = null;
      }
      if (!this.pending) {
        this.setState({ isSending: false });
      }
    }
  }

  private discardOptimistic(optimisticId: string | undefined): void {
    if (optimisticId) {
      this.conversation.removeMessage(optimisticId);
    }
    const id = this.conversation.id;
    if (id?.startsWith(DRAFT_PREFIX) && this.conversation.messages.length === 0) {
      this.conversation.reset();
    }
  }

  /** Put a summary first, keeping the creation time already known for it. */
  private upsertSummary(summary: ConversationSummary): void {
    const existing = this.current.conversations.find((entry) => entry.id === summary.id);
    this.setState({
      conversations: [
        { ...summary, createdAt: existing?.createdAt ?? summary.createdAt },
        ...this.current.conversations.filter((entry) => entry.id !== summary.id),
      ],
    });
  }

  private assertIdle(operation: string): void {
    if (this.pending) {
      throw StateError.transition("sending", operation);
    }
  }

  private validateContent(content: string): string {
    const text = content.trim();
    if (text === "") {
      throw ValidationError.required("content", "Message cannot be empty");
    }
    if (text.length > MAX_MESSAGE_LENGTH) {
      throw ValidationError.constraint(
        "content",
        `Message is too long (max ${MAX_MESSAGE_LENGTH} characters)`,
      );
    }
    return text;
  }

  /**
   * Run an operation, recording any failure in `state.error`.
   */
  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T | null> {
    try {
      return await fn();
    } catch (error) {
      return this.fail(operation, error);
    }
  }

  private fail(operation: string, error: unknown): null {
    const err = ensureError(error);
    this.log.warn({ err, operation }, "Chat operation failed");
    this.setState({ error: err });
    return null;
  }

  private setState(patch: Partial<ChatSessionState>): void {
    this.current = { ...this.current, ...patch };
    for (const listener of this.listeners) {
      listener(this.current);
    }
  }
}

export function createChatSession(config: ChatSessionConfig): ChatSession {
  return new ChatSession(config);
}

function stripImageIds(images: readonly MessageImage[]): Omit<MessageImage, "id">[] {
  return images.map(({ id: _id, ...rest }) => rest);
}

function findLastIndex<T>(items: readonly T[], predicate: (item: T) => boolean): number {
  for (let i = items.length - 1; i >= 0; i--) {
    if (predicate(items[i])) return i;
  }
  return -1;
}

function findLast<T>(items: readonly T[], predicate: (item: T) => boolean): T | undefined {
  const index = findLastIndex(items, predicate);
  return index >= 0 ? items[index] : undefined;
}
