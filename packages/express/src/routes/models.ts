/**
 * Model catalog routes
 *
 * ```
 * GET  /          catalog
 * GET  /openai    chat models the provider account reports
 * POST /validate  probe a model
 * ```
 */

import { Router } from "express";
import type { ModelService } from "unfurl-server";
import type { ApiSuccess, ModelInfo, ModelValidation, ProviderModel } from "unfurl-shared";
import { parseBody } from "../middleware/validate";
import { validateModelSchema } from "../schemas";
import { asyncHandler, type AsyncHandler } from "./async-handler";

export interface ModelHandlers {
  list: AsyncHandler;
  providerModels: AsyncHandler;
  validate: AsyncHandler;
}

export function createModelHandlers(service: ModelService): ModelHandlers {
  return {
    async list(_req, res) {
      const body: ApiSuccess<ModelInfo[]> = { success: true, data: service.listModels() };
      res.json(body);
    },

    async providerModels(_req, res) {
      const body: ApiSuccess<ProviderModel[]> = { success: true, data: await service.listProviderModels() };
      res.json(body);
    },

    async validate(req, res) {
      const { modelId } = parseBody(validateModelSchema, req.body);
      const body: ApiSuccess<ModelValidation> = {
        success: true,
        data: await service.validateModel(modelId),
      };
      res.json(body);
    },
  };
}

export function modelRoutes(service: ModelService): Router {
  const handlers = createModelHandlers(service);
  const router = Router();

  router.get("/", asyncHandler(handlers.list));
  router.get("/openai", asyncHandler(handlers.providerModels));
  router.post("/validate", asyncHandler(handlers.validate));

  return router;
}
