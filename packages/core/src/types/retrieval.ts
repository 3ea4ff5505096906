import type { RetrievalErrorKind } from "@docqa/shared";

export interface Query {
  readonly text: string;
  /** BCP 47 language hint supplied by the caller, passed through to generation. */
  readonly language?: string | undefined;
}

/**
 * One phrasing of a query. `index` is the submission position and the only
 * thing that orders variants; it carries no ranking meaning.
 */
export interface QueryVariant {
  readonly text: string;
  readonly index: number;
}

export interface Passage {
  readonly id: string;
  readonly content: string;
  readonly documentName: string;
  readonly section: string;
}

/**
 * A single hit from one index search call. `score` is the index's fused
 * dense/sparse score: higher is better within that call, and it is not
 * comparable across calls.
 */
export interface SearchHit {
  readonly id: string;
  readonly content: string;
  readonly documentName: string;
  readonly section: string;
  readonly score: number;
}

/**
 * A deduplicated hit that survived fusion. `originalScore` is fixed at
 * dedup time; `rerankScore` is only present when reranking succeeded.
 */
export interface CandidateResult {
  readonly id: string;
  readonly content: string;
  readonly documentName: string;
  readonly section: string;
  readonly originalScore: number;
  rerankScore?: number | undefined;
}

/**
 * One passage as handed to generation and reporting collaborators. Field
 * names are part of the external contract.
 */
export interface ContextEntry {
  chunk_id: string;
  content: string;
  source_document: string;
  relevance_score: number;
  original_score: number;
  text_preview: string;
}

/** A sub-stage failure that was absorbed rather than surfaced. */
export interface Degradation {
  kind: Exclude<RetrievalErrorKind, "retrieval_unavailable">;
  message: string;
  variant?: string | undefined;
}

export interface ContextBundle {
  /** The user query text, trimmed, never an expanded variant. */
  query: string;
  language?: string | undefined;
  /** Ordered by non-increasing `relevance_score`, ids unique. */
  entries: ContextEntry[];
  /** Passage blocks formatted for the generation prompt. */
  contextText: string;
  /** Variant texts actually searched, in submission order. */
  variants: string[];
}

/**
 * A bundle plus how it was produced. Kept apart from the bundle so that a
 * degraded run and an equivalent clean run yield equal bundles.
 */
export interface RetrievalOutcome {
  bundle: ContextBundle;
  reranked: boolean;
  degradations: Degradation[];
}

/**
 * Explicit outcome of a pipeline stage. Failures carry their kind so the
 * orchestrator can apply one fallback policy per kind.
 */
export type StageResult<T, K extends RetrievalErrorKind = RetrievalErrorKind> =
  | { ok: true; value: T }
  | { ok: false; kind: K; error: Error };

export function stageOk<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function stageFailed<K extends RetrievalErrorKind>(
  kind: K,
  error: Error,
): { ok: false; kind: K; error: Error } {
  return { ok: false, kind, error };
}

export type ExpansionStrategy = "multi" | "rewrite" | "synonyms";

export interface RetrieveOptions {
  strategy?: ExpansionStrategy | undefined;
  language?: string | undefined;
  /** Cancels in-flight expansion, search and rerank calls. */
  signal?: AbortSignal | undefined;
  requestId?: string | undefined;
}

/**
 * Scores each passage against a query, one score per passage in input
 * order. Higher is more relevant.
 */
export interface RelevanceScorer {
  readonly name: string;
  score(
    query: string,
    passages: string[],
    signal?: AbortSignal,
  ): Promise<number[]>;
}
