import { getOptionalEnv } from "@docqa/shared";

export type ModelProvider = "anthropic" | "openai" | "google";

export const MODEL_CONFIG = {
  expansion: {
    provider: "anthropic",
    model: "claude-3-5-haiku-20241022",
    temperature: 0,
    maxTokens: 512,
  },
  embeddings: {
    model: "text-embedding-3-small",
    dimensions: 1536,
  },
} as const;

export interface ChatModelConfig {
  provider: ModelProvider;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

export interface ModelConfig {
  expansion: ChatModelConfig;
  embeddings: { model: string; dimensions: number };
}

function isModelProvider(value: string): value is ModelProvider {
  return value === "anthropic" || value === "openai" || value === "google";
}

/**
 * Returns the model settings, letting `EXPANSION_PROVIDER`,
 * `EXPANSION_MODEL` and `EMBEDDING_MODEL` replace the defaults.
 */
export function getModelConfig(): ModelConfig {
  const provider = getOptionalEnv(
    "EXPANSION_PROVIDER",
    MODEL_CONFIG.expansion.provider,
  );
  if (!isModelProvider(provider)) {
    throw new Error(
      `Invalid EXPANSION_PROVIDER: "${provider}". Expected anthropic, openai or google.`,
    );
  }

  return {
    expansion: {
      provider,
      model: getOptionalEnv("EXPANSION_MODEL", MODEL_CONFIG.expansion.model),
      temperature: MODEL_CONFIG.expansion.temperature,
      maxTokens: MODEL_CONFIG.expansion.maxTokens,
    },
    embeddings: {
      model: getOptionalEnv("EMBEDDING_MODEL", MODEL_CONFIG.embeddings.model),
      dimensions: MODEL_CONFIG.embeddings.dimensions,
    },
  };
}
