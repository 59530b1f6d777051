/**
 * Request body schemas for the conversation API.
 */

import { z } from "zod";
import { MAX_MESSAGE_LENGTH } from "unfurl-shared";

export const messageImageSchema = z.object({
  url: z.string().url(),
  publicId: z.string().optional(),
  filename: z.string().optional(),
});

export const sendMessageSchema = z.object({
  chatId: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  message: z.object({
    content: z.string().min(1).max(MAX_MESSAGE_LENGTH),
    images: z.array(messageImageSchema).max(5).optional(),
  }),
});

export const renameSchema = z.object({
  title: z.string().trim().min(1, "Title cannot be empty").max(200),
});

export const validateModelSchema = z.object({
  modelId: z.string().min(1),
});

export type SendMessageBody = z.infer<typeof sendMessageSchema>;
export type RenameBody = z.infer<typeof renameSchema>;
export type ValidateModelBody = z.infer<typeof validateModelSchema>;
