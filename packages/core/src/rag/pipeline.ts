import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { Pool } from "pg";
import { getPool, logger, type CircuitBreakerMetrics } from "@docqa/shared";
import {
  createExpansionModel,
  getRetrievalConfig,
  type RetrievalConfig,
} from "../config/index.js";
import { ProtectedOpenAIEmbeddings } from "../services/embeddingsService.js";
import { CrossEncoderClient } from "../services/rerankerService.js";
import { PgHybridIndex, type VectorIndex } from "./hybridIndex.js";
import { RetrievalOrchestrator } from "./orchestrator.js";
import { QueryExpander } from "./queryExpander.js";
import { EmbeddingSimilarityScorer, Reranker } from "./reranker.js";
import { createVectorStore } from "./vectorStore.js";

const log = logger.child({ service: "retrieval-pipeline" });

export interface RetrievalPipeline {
  orchestrator: RetrievalOrchestrator;
  index: VectorIndex;
  config: RetrievalConfig;
  /** Circuit state per external dependency, keyed by dependency name. */
  circuitMetrics(): Record<string, CircuitBreakerMetrics>;
}

export interface CreatePipelineOptions {
  config?: Partial<RetrievalConfig>;
  pool?: Pool;
  expansionModel?: BaseChatModel;
}

/**
 * Builds the process-wide retrieval clients once. Everything returned is
 * safe to share between concurrent requests.
 */
export async function createRetrievalPipeline(
  options: CreatePipelineOptions = {},
): Promise<RetrievalPipeline> {
  const config = getRetrievalConfig(options.config);
  const pool = options.pool ?? getPool();

  const embeddings = new ProtectedOpenAIEmbeddings({
    requestTimeout: config.callTimeoutMs,
  });
  const vectorStore = await createVectorStore(embeddings, { pool });
  const index = new PgHybridIndex({
    vectorStore,
    pool,
    rrfK: config.rrfK,
    vectorWeight: config.vectorWeight,
    callTimeoutMs: config.callTimeoutMs,
  });

  const expander = new QueryExpander({
    model: options.expansionModel ?? createExpansionModel(),
    callTimeoutMs: config.callTimeoutMs,
  });

  const crossEncoder = config.rerankerUrl
    ? new CrossEncoderClient({
        baseUrl: config.rerankerUrl,
        requestTimeout: config.callTimeoutMs,
      })
    : undefined;
  const reranker = new Reranker(
    crossEncoder ?? new EmbeddingSimilarityScorer(embeddings),
  );

  log.info("Retrieval pipeline ready", {
    reranker: reranker.backend,
    rerankEnabled: config.rerankEnabled,
    expansionCount: config.expansionCount,
    searchLimit: config.searchLimit,
    topK: config.topK,
  });

  return {
    orchestrator: new RetrievalOrchestrator({
      expander,
      index,
      reranker,
      config,
    }),
    index,
    config,
    circuitMetrics: () => ({
      llm: expander.getCircuitMetrics(),
      embeddings: embeddings.getCircuitMetrics(),
      index: index.getCircuitMetrics(),
      ...(crossEncoder && { reranker: crossEncoder.getCircuitMetrics() }),
    }),
  };
}
