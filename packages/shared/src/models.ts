/**
 * Model catalog types.
 *
 * The catalog itself is served by the backend; the client only reads it.
 */

export interface ModelInfo {
  id: string;
  name: string;
  description: string;
  /** Largest completion the backend requests for this model */
  maxTokens: number;
  supportsVision: boolean;
  isDefault?: boolean;
}

/** A model as the completion provider's own model list reports it. */
export interface ProviderModel {
  id: string;
  ownedBy: string;
  /** Unix seconds */
  created: number;
}

export interface ModelValidation {
  modelId: string;
  isAvailable: boolean;
  message: string;
}

export const DEFAULT_MODEL_ID = "gpt-3.5-turbo";

/** Model used whenever a message carries images. */
export const VISION_MODEL_ID = "gpt-4o";

export const SUPPORTED_MODEL_IDS = ["gpt-3.5-turbo", "gpt-4", "gpt-4o", "gpt-4-turbo"] as const;

export type SupportedModelId = (typeof SUPPORTED_MODEL_IDS)[number];

export function isSupportedModel(id: string): id is SupportedModelId {
  return SUPPORTED_MODEL_IDS.some((supported) => supported === id);
}
