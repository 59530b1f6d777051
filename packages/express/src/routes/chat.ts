/**
 * Conversation routes
 *
 * ```
 * GET    /            list summaries
 * GET    /:id         full conversation
 * POST   /            send a message (new conversation without chatId)
 * PUT    /:id/rename  rename
 * DELETE /:id         soft delete
 * ```
 */

import { Router, type Request, type Response } from "express";
import type { ChatService } from "unfurl-server";
import {
  summarize,
  toWireConversation,
  toWireMessage,
  toWireSummary,
  type ApiSuccess,
  type DeleteResult,
  type SendMessageResult,
  type WireConversation,
  type WireConversationSummary,
} from "unfurl-shared";
import { requestSignal } from "../middleware/context";
import { parseBody } from "../middleware/validate";
import { renameSchema, sendMessageSchema } from "../schemas";
import { asyncHandler, type AsyncHandler } from "./async-handler";

export interface ChatHandlers {
  list: AsyncHandler;
  get: AsyncHandler;
  send: AsyncHandler;
  rename: AsyncHandler;
  remove: AsyncHandler;
}

function ok<T>(res: Response, data: T): void {
  const body: ApiSuccess<T> = { success: true, data };
  res.json(body);
}

function idParam(req: Request): string {
  return req.params["id"] ?? "";
}

export function createChatHandlers(service: ChatService): ChatHandlers {
  return {
    async list(_req, res) {
      const summaries = await service.listConversations();
      ok<WireConversationSummary[]>(res, summaries.map(toWireSummary));
    },

    async get(req, res) {
      const conversation = await service.getConversation(idParam(req));
      ok<WireConversation>(res, toWireConversation(conversation));
    },

    async send(req, res) {
      const body = parseBody(sendMessageSchema, req.body);
      const result = await service.sendMessage({
        chatId: body.chatId,
        model: body.model,
        content: body.message.content,
        images: body.message.images,
        signal: requestSignal(),
      });
      ok<SendMessageResult>(res, {
        chatId: result.chatId,
        title: result.title,
        userMessage: toWireMessage(result.userMessage),
        aiMessage: toWireMessage(result.aiMessage),
      });
    },

    async rename(req, res) {
      const { title } = parseBody(renameSchema, req.body);
      const conversation = await service.rename(idParam(req), title);
      ok<WireConversationSummary>(res, toWireSummary(summarize(conversation)));
    },

    async remove(req, res) {
      const id = idParam(req);
      await service.delete(id);
      ok<DeleteResult>(res, { id });
    },
  };
}

export function chatRoutes(service: ChatService): Router {
  const handlers = createChatHandlers(service);
  const router = Router();

  router.get("/", asyncHandler(handlers.list));
  router.get("/:id", asyncHandler(handlers.get));
  router.post("/", asyncHandler(handlers.send));
  router.put("/:id/rename", asyncHandler(handlers.rename));
  router.delete("/:id", asyncHandler(handlers.remove));

  return router;
}
