import { z } from "zod";
import {
  ValidationError,
  getOptionalEnv,
  parseEnvBool,
  parseEnvFloat,
  parseEnvInt,
} from "@docqa/shared";

export const RETRIEVAL_CONFIG = {
  /** Alternative phrasings requested from the expander. */
  expansionCount: 3,
  /** Hits requested from the index per variant. */
  searchLimit: 5,
  /** Entries kept after reranking. */
  topK: 5,
  previewChars: 200,
  /** Per external call: expansion, each search, rerank. */
  callTimeoutMs: 10_000,
  rerankEnabled: true,
  /** Variant searches in flight at once. */
  searchConcurrency: 4,
  rrfK: 60,
  vectorWeight: 0.5,
} as const;

const retrievalConfigSchema = z.object({
  expansionCount: z.number().int().min(1),
  searchLimit: z.number().int().min(1),
  topK: z.number().int().min(1),
  previewChars: z.number().int().min(1),
  callTimeoutMs: z.number().int().positive(),
  rerankEnabled: z.boolean(),
  searchConcurrency: z.number().int().min(1),
  rrfK: z.number().positive(),
  vectorWeight: z.number().min(0).max(1),
  rerankerUrl: z.string().url().optional(),
});

export type RetrievalConfig = z.infer<typeof retrievalConfigSchema>;

/**
 * Resolves the retrieval settings from defaults, then environment, then
 * explicit overrides. Throws {@link ValidationError} on out-of-range values.
 */
export function getRetrievalConfig(
  overrides: Partial<RetrievalConfig> = {},
): RetrievalConfig {
  const rerankerUrl = getOptionalEnv("RERANKER_URL");
  const candidate = {
    expansionCount: parseEnvInt(
      "EXPANSION_COUNT",
      RETRIEVAL_CONFIG.expansionCount,
    ),
    searchLimit: parseEnvInt("SEARCH_LIMIT", RETRIEVAL_CONFIG.searchLimit),
    topK: parseEnvInt("RERANK_TOP_K", RETRIEVAL_CONFIG.topK),
    previewChars: parseEnvInt("PREVIEW_CHARS", RETRIEVAL_CONFIG.previewChars),
    callTimeoutMs: parseEnvInt(
      "CALL_TIMEOUT_MS",
      RETRIEVAL_CONFIG.callTimeoutMs,
    ),
    rerankEnabled: parseEnvBool("RERANK_ENABLED", RETRIEVAL_CONFIG.rerankEnabled),
    searchConcurrency: parseEnvInt(
      "SEARCH_CONCURRENCY",
      RETRIEVAL_CONFIG.searchConcurrency,
    ),
    rrfK: parseEnvFloat("RRF_K", RETRIEVAL_CONFIG.rrfK),
    vectorWeight: parseEnvFloat("VECTOR_WEIGHT", RETRIEVAL_CONFIG.vectorWeight),
    ...(rerankerUrl !== undefined && { rerankerUrl }),
    ...overrides,
  };

  const result = retrievalConfigSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ValidationError(
      `Invalid retrieval configuration: ${issues.join("; ")}`,
      { context: { issues } },
    );
  }
  return result.data;
}
