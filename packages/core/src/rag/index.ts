export { createVectorStore, CHUNK_TABLE_COLUMNS } from "./vectorStore.js";
export type { VectorStoreConfig } from "./vectorStore.js";
export { bm25Search, asRecord } from "./bm25Search.js";
export type { Bm25SearchOptions, Bm25SearchResult } from "./bm25Search.js";
export { rrfFuse } from "./rrfFuse.js";
export type { RrfCandidate, RankedInput, RrfOptions } from "./rrfFuse.js";
export { PgHybridIndex, toPassage } from "./hybridIndex.js";
export type {
  VectorIndex,
  VectorStoreLike,
  PgHybridIndexOptions,
} from "./hybridIndex.js";
export { QueryExpander, parseVariantLines } from "./queryExpander.js";
export type { QueryExpanderOptions, ExpandOptions } from "./queryExpander.js";
export { fuseAndDedup } from "./fusion.js";
export {
  Reranker,
  EmbeddingSimilarityScorer,
  cosineSimilarity,
  fallbackOrder,
} from "./reranker.js";
export {
  assembleBundle,
  buildContextText,
  formatSourceLabel,
  makePreview,
  toContextEntry,
} from "./contextBundle.js";
export type { AssembleBundleInput } from "./contextBundle.js";
export { RetrievalOrchestrator } from "./orchestrator.js";
export type {
  RetrievalOrchestratorDeps,
  RetrievalState,
} from "./orchestrator.js";
export { createRetrievalPipeline } from "./pipeline.js";
export type { RetrievalPipeline, CreatePipelineOptions } from "./pipeline.js";
