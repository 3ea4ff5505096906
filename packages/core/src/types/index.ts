export type {
  Query,
  QueryVariant,
  Passage,
  SearchHit,
  CandidateResult,
  ContextEntry,
  ContextBundle,
  RetrievalOutcome,
  Degradation,
  StageResult,
  ExpansionStrategy,
  RetrieveOptions,
  RelevanceScorer,
} from "./retrieval.js";
export { stageOk, stageFailed } from "./retrieval.js";
