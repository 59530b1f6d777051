/**
 * Response schemas for the conversation API.
 *
 * Bodies are validated before they are turned into domain values, so a
 * misbehaving server surfaces as a parse error instead of bad state.
 */

import { z } from "zod";
import { isUnfurlErrorCode, type UnfurlErrorCode } from "unfurl-shared";

const imageSchema = z.object({
  id: z.string(),
  url: z.string(),
  publicId: z.string().optional(),
  filename: z.string().optional(),
});

export const wireMessageSchema = z.object({
  id: z.string(),
  role: z.enum(["user", "assistant", "system"]),
  content: z.string(),
  images: z.array(imageSchema).default([]),
  timestamp: z.string(),
  hasAnimated: z.boolean().default(false),
  modelUsed: z.string().optional(),
  tokensUsed: z.number().optional(),
  processingTime: z.number().optional(),
});

export const wireSummarySchema = z.object({
  id: z.string(),
  title: z.string(),
  model: z.string(),
  lastMessage: z.string().default(""),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const wireConversationSchema = z.object({
  id: z.string(),
  title: z.string(),
  model: z.string(),
  messages: z.array(wireMessageSchema),
  createdAt: z.string(),
  updatedAt: z.string(),
  isActive: z.boolean().default(true),
});

export const sendMessageResultSchema = z.object({
  chatId: z.string(),
  title: z.string(),
  userMessage: wireMessageSchema,
  aiMessage: wireMessageSchema,
});

export const modelInfoSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  maxTokens: z.number(),
  supportsVision: z.boolean(),
  isDefault: z.boolean().optional(),
});

export const providerModelSchema = z.object({
  id: z.string(),
  ownedBy: z.string(),
  created: z.number(),
});

export const modelValidationSchema = z.object({
  modelId: z.string(),
  isAvailable: z.boolean(),
  message: z.string(),
});

export const deleteResultSchema = z.object({ id: z.string() });

export const envelopeSchema = z.object({ success: z.literal(true), data: z.unknown() });

const failureSchema = z.object({
  success: z.literal(false).optional(),
  error: z.string().optional(),
  message: z.string().optional(),
  code: z.string().optional(),
});

export interface ParsedFailure {
  message?: string;
  code?: UnfurlErrorCode;
}

/**
 * Read what a non-2xx body says about the failure, if anything.
 */
export function parseFailure(body: unknown): ParsedFailure {
  const result = failureSchema.safeParse(body);
  if (!result.success) return {};
  const { error, message, code } = result.data;
  return {
    message: error ?? message,
    code: isUnfurlErrorCode(code) ? code : undefined,
  };
}
