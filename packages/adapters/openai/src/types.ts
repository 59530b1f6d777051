import type { ClientOptions } from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";

/**
 * Subset of the chat completions response the provider reads.
 */
export interface CompletionResponse {
  model: string;
  choices: Array<{ message: { content: string | null } }>;
  usage?: { total_tokens: number };
}

/**
 * Subset of the model list response the provider reads.
 */
export interface ModelListResponse {
  data: Array<{ id: string; created: number; owned_by: string }>;
}

/**
 * The part of the OpenAI client the provider calls. An `OpenAI` instance
 * satisfies it; tests pass a stub.
 */
export interface OpenAIClientLike {
  chat: {
    completions: {
      create(
        params: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal },
      ): Promise<CompletionResponse>;
    };
  };
  models: {
    list(): PromiseLike<ModelListResponse>;
  };
}

/**
 * OpenAI provider configuration.
 */
export interface OpenAIProviderConfig {
  apiKey?: string;
  baseURL?: string;
  organization?: string;
  headers?: Record<string, string>;
  timeout?: number;
  maxRetries?: number;
  /** Prebuilt client; skips client construction */
  client?: OpenAIClientLike;
  /** Passed through to the OpenAI client constructor */
  clientOptions?: ClientOptions;
  /** Model used for conversation titles (default gpt-3.5-turbo) */
  titleModel?: string;
}
