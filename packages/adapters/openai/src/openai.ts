import OpenAI, { type ClientOptions } from "openai";
import type {
  ChatCompletionContentPart,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";

import { Logger } from "unfurl-kernel";
import {
  AbortError,
  DEFAULT_MODEL_ID,
  ProviderError,
  type Message,
  type ProviderModel,
} from "unfurl-shared";
import {
  findModel,
  type CompletionProvider,
  type CompletionRequest,
  type CompletionResult,
} from "unfurl-server";
import type { CompletionResponse, OpenAIClientLike, OpenAIProviderConfig } from "./types";

const PROVIDER = "openai";

const logger = Logger.for("OpenAIProvider");

export const SYSTEM_PROMPT = `You are a helpful assistant. Give detailed, well-structured answers that fully address the question or request.

Formatting:
- Use headings, numbered steps, bullet lists and tables where they help
- Put code in fenced blocks with a language tag
- Use Q: and A: lines for question and answer pairs
- Start warnings, tips and notes with "Warning:", "Tip:" or "Note:"
- When describing an image, be thorough about everything visible in it`;

export const TITLE_PROMPT =
  "Write a short, specific title (max 5 words) for a chat that starts with the user's message below. Reply with the title only.";

export const COMPLETION_DEFAULTS = {
  temperature: 0.8,
  top_p: 0.95,
  frequency_penalty: 0.2,
  presence_penalty: 0.4,
} as const;

/** Output cap for models missing from the catalog */
export const FALLBACK_MAX_TOKENS = 4096;

const LARGE_REQUEST_LENGTH = 500;
const LARGE_REQUEST_KEYWORDS = ["create", "generate", "build", "write", "develop"];

// ============================================================================
// Helper Functions
// ============================================================================

export function buildClientOptions(config: OpenAIProviderConfig): ClientOptions {
  const options: ClientOptions = {
    apiKey: config.apiKey ?? process.env["OPENAI_API_KEY"],
    baseURL: config.baseURL ?? process.env["OPENAI_BASE_URL"],
    organization: config.organization ?? process.env["OPENAI_ORGANIZATION"],
    defaultHeaders: config.headers,
    timeout: config.timeout,
    maxRetries: config.maxRetries,
    ...config.clientOptions,
  };

  // Remove undefined values
  return Object.fromEntries(
    Object.entries(options).filter(([, value]) => value !== undefined),
  ) satisfies ClientOptions;
}

/**
 * Convert conversation messages to OpenAI chat messages, system prompt first.
 *
 * Images are only sent to vision models; other models see the text alone.
 */
export function toOpenAIMessages(
  messages: Message[],
  model: string,
  systemPrompt: string = SYSTEM_PROMPT,
): ChatCompletionMessageParam[] {
  const vision = findModel(model)?.supportsVision ?? false;
  const converted = messages.map((message): ChatCompletionMessageParam => {
    switch (message.role) {
      case "system":
        return { role: "system", content: message.content };
      case "assistant":
        return { role: "assistant", content: message.content };
      case "user": {
        if (!vision || message.images.length === 0) {
          return { role: "user", content: message.content };
        }
        const parts: ChatCompletionContentPart[] = [
          { type: "text", text: message.content },
          ...message.images.map(
            (image): ChatCompletionContentPart => ({
              type: "image_url",
              image_url: { url: image.url, detail: "high" },
            }),
          ),
        ];
        return { role: "user", content: parts };
      }
    }
  });
  return [{ role: "system", content: systemPrompt }, ...converted];
}

/**
 * Long or generative prompts run without an output cap.
 */
export function isLargeRequest(messages: ChatCompletionMessageParam[]): boolean {
  return messages.some((message) => {
    if (message.role === "system" || typeof message.content !== "string") return false;
    const text = message.content.toLowerCase();
    return (
      text.length > LARGE_REQUEST_LENGTH ||
      LARGE_REQUEST_KEYWORDS.some((keyword) => text.includes(keyword))
    );
  });
}

export function buildCompletionParams(
  model: string,
  messages: ChatCompletionMessageParam[],
): ChatCompletionCreateParamsNonStreaming {
  const params: ChatCompletionCreateParamsNonStreaming = {
    model,
    messages,
    ...COMPLETION_DEFAULTS,
    stream: false,
  };
  if (!isLargeRequest(messages)) {
    params.max_tokens = findModel(model)?.maxTokens ?? FALLBACK_MAX_TOKENS;
  }
  return params;
}

function retryAfterSeconds(error: InstanceType<typeof OpenAI.APIError>): number | undefined {
  const header = error.headers?.["retry-after"];
  if (!header) return undefined;
  const seconds = Number(header);
  return Number.isFinite(seconds) ? seconds : undefined;
}

/**
 * Translate OpenAI SDK errors into the shared error hierarchy.
 */
export function mapOpenAIError(error: unknown): Error {
  if (error instanceof OpenAI.APIUserAbortError) {
    return new AbortError("Completion request was cancelled", "ABORT_SIGNAL", {}, error);
  }
  if (error instanceof OpenAI.APIError) {
    if (error.code === "insufficient_quota") return ProviderError.quota(PROVIDER);
    if (error.code === "invalid_api_key" || error.status === 401) return ProviderError.auth(PROVIDER);
    if (error.status === 429) return ProviderError.rateLimit(PROVIDER, retryAfterSeconds(error));
    return new ProviderError(
      PROVIDER,
      error.message,
      "PROVIDER_RESPONSE",
      { status: error.status, providerErrorCode: error.code ?? undefined },
      error,
    );
  }
  if (error instanceof Error) {
    return new ProviderError(PROVIDER, error.message, "PROVIDER_RESPONSE", {}, error);
  }
  return new ProviderError(PROVIDER, String(error));
}

function firstContent(response: CompletionResponse): string {
  const content = response.choices[0]?.message.content;
  if (content === null || content === undefined || content === "") {
    throw new ProviderError(PROVIDER, "No message in OpenAI response");
  }
  return content;
}

function stripQuotes(title: string): string {
  return title.trim().replace(/^["']+|["']+$/g, "").trim();
}

// ============================================================================
// Provider
// ============================================================================

/**
 * Completion provider backed by the OpenAI chat completions API.
 *
 * @example
 * ```typescript
 * const provider = createOpenAIProvider({ apiKey: process.env.OPENAI_API_KEY });
 * const chat = new ChatService({ repository, provider });
 * ```
 */
export class OpenAICompletionProvider implements CompletionProvider {
  readonly name = PROVIDER;
  private readonly client: OpenAIClientLike;
  private readonly titleModel: string;

  constructor(config: OpenAIProviderConfig = {}) {
    this.client = config.client ?? new OpenAI(buildClientOptions(config));
    this.titleModel = config.titleModel ?? DEFAULT_MODEL_ID;
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const params = buildCompletionParams(request.model, toOpenAIMessages(request.messages, request.model));
    logger.debug(
      { model: params.model, messages: params.messages.length, maxTokens: params.max_tokens },
      "Requesting completion",
    );

    const response = await this.call(params, request.signal);
    return {
      content: firstContent(response),
      model: response.model,
      tokensUsed: response.usage?.total_tokens ?? 0,
    };
  }

  async generateTitle(content: string): Promise<string> {
    const response = await this.call({
      model: this.titleModel,
      messages: [
        { role: "system", content: TITLE_PROMPT },
        { role: "user", content },
      ],
      max_tokens: 20,
      temperature: 0.7,
      stream: false,
    });
    return stripQuotes(firstContent(response));
  }

  async probe(modelId: string): Promise<void> {
    await this.call({
      model: modelId,
      messages: [{ role: "user", content: "Hello" }],
      max_tokens: 10,
      stream: false,
    });
  }

  async listModels(): Promise<ProviderModel[]> {
    try {
      const page = await this.client.models.list();
      return page.data.map((model) => ({ id: model.id, ownedBy: model.owned_by, created: model.created }));
    } catch (error) {
      const mapped = mapOpenAIError(error);
      logger.warn({ err: mapped }, "Listing OpenAI models failed");
      throw mapped;
    }
  }

  private async call(
    params: ChatCompletionCreateParamsNonStreaming,
    signal?: AbortSignal,
  ): Promise<CompletionResponse> {
    try {
      return await this.client.chat.completions.create(params, signal ? { signal } : undefined);
    } catch (error) {
      const mapped = mapOpenAIError(error);
      logger.warn({ err: mapped, model: params.model }, "OpenAI request failed");
      throw mapped;
    }
  }
}

/**
 * Factory function for creating the OpenAI provider
 */
export function createOpenAIProvider(config?: OpenAIProviderConfig): OpenAICompletionProvider {
  return new OpenAICompletionProvider(config);
}
