/**
 * ChatApiClient - typed client for the conversation backend
 *
 * Wraps the HTTP routes with fetch, a per-request timeout and caller
 * cancellation. Non-2xx responses become {@link TransportError}s carrying the
 * status and the server's error code.
 *
 * @example
 * ```typescript
 * const api = new ChatApiClient({ baseUrl: 'http://localhost:3001' });
 *
 * const { chatId, aiMessage } = await api.sendMessage({ message: { content: 'Hi' } });
 * const summaries = await api.listConversations();
 * ```
 */

import type { z } from "zod";
import {
  AbortError,
  fromWireConversation,
  fromWireMessage,
  fromWireSummary,
  TransportError,
  type Conversation,
  type ConversationSummary,
  type Message,
  type ModelInfo,
  type ModelValidation,
  type ProviderModel,
  type SendMessageRequest,
} from "unfurl-shared";
import {
  deleteResultSchema,
  envelopeSchema,
  modelInfoSchema,
  modelValidationSchema,
  parseFailure,
  providerModelSchema,
  sendMessageResultSchema,
  wireConversationSchema,
  wireSummarySchema,
} from "./wire";

// =============================================================================
// Types
// =============================================================================

export interface ChatRoutes {
  conversations?: () => string;
  conversation?: (id: string) => string;
  rename?: (id: string) => string;
  models?: () => string;
  providerModels?: () => string;
  validateModel?: () => string;
}

const DEFAULT_ROUTES: Required<ChatRoutes> = {
  conversations: () => "/api/chat",
  conversation: (id) => `/api/chat/${encodeURIComponent(id)}`,
  rename: (id) => `/api/chat/${encodeURIComponent(id)}/rename`,
  models: () => "/api/models",
  providerModels: () => "/api/models/openai",
  validateModel: () => "/api/models/validate",
};

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface ChatApiClientConfig {
  /** Base URL for API requests */
  baseUrl?: string;
  /** Custom route builders (optional) */
  routes?: ChatRoutes;
  /** Headers added to every request */
  headers?: Record<string, string>;
  /**
   * Request timeout in milliseconds (default: 60000).
   * Completions can take a while; set to 0 to disable.
   */
  requestTimeout?: number;
  /** fetch implementation (default: global fetch) */
  fetch?: FetchLike;
}

export interface SendMessageResponse {
  chatId: string;
  title: string;
  userMessage: Message;
  aiMessage: Message;
}

interface RequestOptions {
  method?: "GET" | "POST" | "PUT" | "DELETE";
  body?: unknown;
  signal?: AbortSignal;
}

// =============================================================================
// Implementation
// =============================================================================

export class ChatApiClient {
  private readonly baseUrl: string;
  private readonly routes: Required<ChatRoutes>;
  private readonly headers: Record<string, string>;
  private readonly requestTimeout: number;
  private readonly fetchImpl: FetchLike;

  constructor(config: ChatApiClientConfig = {}) {
    this.baseUrl = (config.baseUrl ?? "").replace(/\/+$/, "");
    this.routes = { ...DEFAULT_ROUTES, ...config.routes };
    this.headers = config.headers ?? {};
    this.requestTimeout = config.requestTimeout ?? 60000;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
  }

  async listConversations(signal?: AbortSignal): Promise<ConversationSummary[]> {
    const data = await this.request(this.routes.conversations(), wireSummarySchema.array(), {
      signal,
    });
    return data.map(fromWireSummary);
  }

  async getConversation(id: string, signal?: AbortSignal): Promise<Conversation> {
    const data = await this.request(this.routes.conversation(id), wireConversationSchema, {
      signal,
    });
    return fromWireConversation(data);
  }

  async sendMessage(body: SendMessageRequest, signal?: AbortSignal): Promise<SendMessageResponse> {
    const data = await this.request(this.routes.conversations(), sendMessageResultSchema, {
      method: "POST",
      body,
      signal,
    });
    return {
      chatId: data.chatId,
      title: data.title,
      userMessage: fromWireMessage(data.userMessage),
      aiMessage: fromWireMessage(data.aiMessage),
    };
  }

  async renameConversation(id: string, title: string, signal?: AbortSignal): Promise<ConversationSummary> {
    const data = await this.request(this.routes.rename(id), wireSummarySchema, {
      method: "PUT",
      body: { title },
      signal,
    });
    return fromWireSummary(data);
  }

  async deleteConversation(id: string, signal?: AbortSignal): Promise<void> {
    await this.request(this.routes.conversation(id), deleteResultSchema, {
      method: "DELETE",
      signal,
    });
  }

  listModels(signal?: AbortSignal): Promise<ModelInfo[]> {
    return this.request(this.routes.models(), modelInfoSchema.array(), { signal });
  }

  /** Chat models the backend's provider account reports. */
  listProviderModels(signal?: AbortSignal): Promise<ProviderModel[]> {
    return this.request(this.routes.providerModels(), providerModelSchema.array(), { signal });
  }

  validateModel(modelId: string, signal?: AbortSignal): Promise<ModelValidation> {
    return this.request(this.routes.validateModel(), modelValidationSchema, {
      method: "POST",
      body: { modelId },
      signal,
    });
  }

  // ===========================================================================
  // Request Helpers
  // ===========================================================================

  private async request<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {},
  ): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const method = options.method ?? "GET";
    const response = await this.fetchWithTimeout(url, {
      method,
      headers: {
        Accept: "application/json",
        ...(options.body !== undefined && { "Content-Type": "application/json" }),
        ...this.headers,
      },
      body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
      signal: options.signal,
    });

    const body = await this.readJson(response, url);

    if (!response.ok) {
      const failure = parseFailure(body);
      throw TransportError.http(response.status, url, failure.message, failure.code);
    }

    const envelope = envelopeSchema.safeParse(body);
    const parsed = envelope.success ? schema.safeParse(envelope.data.data) : envelope;
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new TransportError(
        "parse",
        `Unexpected response from ${method} ${path}: ${issue ? `${issue.path.join(".")} ${issue.message}` : "invalid body"}`,
        { statusCode: response.status, url, method },
      );
    }
    return parsed.data;
  }

  private async readJson(response: Response, url: string): Promise<unknown> {
    const text = await response.text();
    if (text === "") return undefined;
    try {
      return JSON.parse(text);
    } catch (error) {
      if (!response.ok) {
        // Plain-text error pages still carry a useful status
        return { error: text.slice(0, 200) };
      }
      throw new TransportError(
        "parse",
        "Response is not valid JSON",
        { statusCode: response.status, url },
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Fetch with timeout support, also honouring the caller's signal.
   * If requestTimeout is 0, no timeout is applied.
   */
  private async fetchWithTimeout(url: string, init: RequestInit & { signal?: AbortSignal }): Promise<Response> {
    const callerSignal = init.signal;
    if (callerSignal?.aborted) {
      throw AbortError.fromSignal(callerSignal);
    }

    const controller = new AbortController();
    const onAbort = () => controller.abort(callerSignal?.reason);
    callerSignal?.addEventListener("abort", onAbort, { once: true });

    let timedOut = false;
    const timeout = this.requestTimeout;
    const timeoutId =
      timeout > 0
        ? setTimeout(() => {
            timedOut = true;
            controller.abort();
          }, timeout)
        : undefined;

    try {
      return await this.fetchImpl(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (timedOut) {
        throw AbortError.timeout(timeout);
      }
      if (callerSignal?.aborted) {
        throw AbortError.fromSignal(callerSignal);
      }
      throw TransportError.connection(
        error instanceof Error ? error.message : "Network request failed",
        url,
        error instanceof Error ? error : undefined,
      );
    } finally {
      clearTimeout(timeoutId);
      callerSignal?.removeEventListener("abort", onAbort);
    }
  }
}

/**
 * Factory function for creating the API client
 */
export function createChatApiClient(config?: ChatApiClientConfig): ChatApiClient {
  return new ChatApiClient(config);
}
