import {
  DEFAULT_MODEL_ID,
  ensureError,
  NotFoundError,
  type ModelInfo,
  type ModelValidation,
  type ProviderModel,
} from "unfurl-shared";
import { Logger } from "unfurl-kernel";
import type { CompletionProvider } from "./types";

export const MODEL_CATALOG: readonly ModelInfo[] = [
  {
    id: DEFAULT_MODEL_ID,
    name: "GPT-3.5 Turbo",
    description: "Fast and efficient for most conversations",
    maxTokens: 16384,
    supportsVision: false,
    isDefault: true,
  },
  {
    id: "gpt-4",
    name: "GPT-4",
    description: "More capable but slower, best for complex tasks",
    maxTokens: 8192,
    supportsVision: false,
  },
  {
    id: "gpt-4o",
    name: "GPT-4o",
    description: "Multimodal model with vision and text capabilities",
    maxTokens: 16384,
    supportsVision: true,
  },
  {
    id: "gpt-4-turbo",
    name: "GPT-4 Turbo",
    description: "GPT-4 with improved performance",
    maxTokens: 4096,
    supportsVision: false,
  },
];

export function findModel(id: string): ModelInfo | undefined {
  return MODEL_CATALOG.find((model) => model.id === id);
}

/** Chat completion models; instruct and edit variants are left out. */
export function isChatModel(id: string): boolean {
  return id.includes("gpt") && !id.includes("instruct") && !id.includes("edit");
}

/**
 * Read side of the model catalog plus availability checks against the
 * provider.
 */
export class ModelService {
  private readonly log = Logger.for("ModelService");

  constructor(private readonly provider: CompletionProvider) {}

  listModels(): ModelInfo[] {
    return MODEL_CATALOG.map((model) => ({ ...model }));
  }

  /**
   * Chat models the provider account reports, for checking the catalog
   * against what the key can reach.
   */
  async listProviderModels(): Promise<ProviderModel[]> {
    const models = await this.provider.listModels();
    return models.filter((model) => isChatModel(model.id));
  }

  /**
   * @throws NotFoundError for a model outside the catalog
   */
  async validateModel(modelId: string): Promise<ModelValidation> {
    if (!findModel(modelId)) {
      throw new NotFoundError("model", modelId);
    }
    try {
      await this.provider.probe(modelId);
      return { modelId, isAvailable: true, message: "Model is available" };
    } catch (error) {
      const err = ensureError(error);
      this.log.info({ modelId, err }, "Model probe failed");
      return { modelId, isAvailable: false, message: err.message };
    }
  }
}
