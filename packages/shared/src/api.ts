/**
 * Request and response bodies of the conversation HTTP API.
 */

import type { UnfurlErrorCode } from "./errors";
import type { MessageImage, WireMessage } from "./messages";

export interface ApiSuccess<T> {
  success: true;
  data: T;
}

export interface ApiFailure {
  success: false;
  error: string;
  code?: UnfurlErrorCode;
  details?: Record<string, unknown>;
}

export type ApiResponse<T> = ApiSuccess<T> | ApiFailure;

/** Upper bound on a single message's content length. */
export const MAX_MESSAGE_LENGTH = 4000;

export interface SendMessageRequest {
  /** Omit to start a new conversation */
  chatId?: string;
  model?: string;
  message: {
    content: string;
    images?: Omit<MessageImage, "id">[];
  };
}

export interface SendMessageResult {
  chatId: string;
  title: string;
  userMessage: WireMessage;
  aiMessage: WireMessage;
}

export interface RenameRequest {
  title: string;
}

export interface DeleteResult {
  id: string;
}

export interface ValidateModelRequest {
  modelId: string;
}
