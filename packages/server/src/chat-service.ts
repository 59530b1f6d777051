/**
 * ChatService - conversation use cases, independent of any HTTP framework
 *
 * A message exchange is persisted only after the provider has answered, so
 * a failed completion leaves no half-written turn behind and never yields
 * an assistant message for the client to reveal.
 */

import {
  DEFAULT_MODEL_ID,
  ensureError,
  NotFoundError,
  ValidationError,
  VISION_MODEL_ID,
  type Conversation,
  type ConversationSummary,
  type Message,
  type MessageImage,
} from "unfurl-shared";
import { Logger, type KernelLogger } from "unfurl-kernel";
import { uuidV4Generator, type IdGenerator } from "./request-context";
import type { CompletionProvider, ConversationRepository } from "./types";

export const FALLBACK_TITLE = "New Chat";
export const TITLE_FALLBACK_LENGTH = 50;

export interface SendMessageInput {
  chatId?: string;
  model?: string;
  content: string;
  images?: Omit<MessageImage, "id">[];
  signal?: AbortSignal;
}

export interface SendMessageOutput {
  chatId: string;
  title: string;
  userMessage: Message;
  aiMessage: Message;
}

export interface ChatServiceConfig {
  repository: ConversationRepository;
  provider: CompletionProvider;
  /** Model used when a request names none (default gpt-3.5-turbo) */
  defaultModel?: string;
  generateId?: IdGenerator;
  now?: () => Date;
  logger?: KernelLogger;
}

/**
 * Title from the start of the message, used when the provider cannot
 * produce one.
 */
export function fallbackTitle(content: string): string {
  const trimmed = content.trim();
  if (trimmed === "") return FALLBACK_TITLE;
  return trimmed.length > TITLE_FALLBACK_LENGTH
    ? `${trimmed.slice(0, TITLE_FALLBACK_LENGTH)}...`
    : trimmed;
}

export class ChatService {
  private readonly repository: ConversationRepository;
  private readonly provider: CompletionProvider;
  private readonly defaultModel: string;
  private readonly generateId: IdGenerator;
  private readonly now: () => Date;
  private readonly log: KernelLogger;

  constructor(config: ChatServiceConfig) {
    this.repository = config.repository;
    this.provider = config.provider;
    this.defaultModel = config.defaultModel ?? DEFAULT_MODEL_ID;
    this.generateId = config.generateId ?? uuidV4Generator;
    this.now = config.now ?? (() => new Date());
    this.log = config.logger ?? Logger.for("ChatService");
  }

  listConversations(limit?: number): Promise<ConversationSummary[]> {
    return this.repository.listSummaries({ limit });
  }

  /**
   * @throws NotFoundError when missing or soft-deleted
   */
  async getConversation(id: string): Promise<Conversation> {
    const conversation = await this.repository.findById(id, { activeOnly: true });
    if (!conversation) throw new NotFoundError("conversation", id);
    return conversation;
  }

  /**
   * Append a user message, ask the provider for a reply and store both.
   * Starts a new conversation when `chatId` is absent.
   */
  async sendMessage(input: SendMessageInput): Promise<SendMessageOutput> {
    const model = input.model ?? this.defaultModel;
    const existing = input.chatId ? await this.getConversation(input.chatId) : null;

    const userMessage: Message = {
      id: this.generateId(),
      role: "user",
      content: input.content,
      images: (input.images ?? []).map((image) => ({ ...image, id: this.generateId() })),
      timestamp: this.now(),
      hasAnimated: true,
    };

    // Images need the vision model regardless of the selection
    const modelToUse = userMessage.images.length > 0 ? VISION_MODEL_ID : model;
    if (modelToUse !== model) {
      this.log.info({ requested: model, model: modelToUse }, "Images attached, switching to vision model");
    }

    const history = existing ? existing.messages : [];
    const started = Date.now();
    const completion = await this.provider.complete({
      model: modelToUse,
      messages: [...history, userMessage],
      signal: input.signal,
    });
    const processingTime = Date.now() - started;

    const aiMessage: Message = {
      id: this.generateId(),
      role: "assistant",
      content: completion.content,
      images: [],
      timestamp: this.now(),
      hasAnimated: false,
      modelUsed: completion.model,
      tokensUsed: completion.tokensUsed,
      processingTime,
    };

    let conversation: Conversation | null;
    if (existing) {
      await this.repository.update(existing.id, { model });
      conversation = await this.repository.appendMessages(existing.id, [userMessage, aiMessage]);
    } else {
      conversation = await this.repository.create({
        id: this.generateId(),
        title: await this.createTitle(input.content),
        model,
        messages: [userMessage, aiMessage],
        createdAt: this.now(),
      });
    }
    if (!conversation) {
      // Deleted while the provider was answering
      throw new NotFoundError("conversation", input.chatId ?? "");
    }

    this.log.info(
      { chatId: conversation.id, model: modelToUse, tokensUsed: completion.tokensUsed, processingTime },
      "Completion stored",
    );

    return { chatId: conversation.id, title: conversation.title, userMessage, aiMessage };
  }

  /**
   * @throws ValidationError for a blank title
   * @throws NotFoundError when the conversation does not exist
   */
  async rename(id: string, title: string): Promise<Conversation> {
    const trimmed = title.trim();
    if (trimmed === "") throw ValidationError.required("title", "Title cannot be empty");
    const updated = await this.repository.update(id, { title: trimmed });
    if (!updated) throw new NotFoundError("conversation", id);
    return updated;
  }

  /**
   * @throws NotFoundError when the conversation does not exist
   */
  async delete(id: string): Promise<void> {
    const deleted = await this.repository.softDelete(id);
    if (!deleted) throw new NotFoundError("conversation", id);
  }

  private async createTitle(content: string): Promise<string> {
    try {
      const generated = (await this.provider.generateTitle(content)).trim();
      return generated === "" ? FALLBACK_TITLE : generated;
    } catch (error) {
      this.log.warn({ err: ensureError(error) }, "Title generation failed, using message prefix");
      return fallbackTitle(content);
    }
  }
}
