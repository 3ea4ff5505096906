import {
  RequestAbortedError,
  RerankUnavailableError,
  ValidationError,
  logger,
  toError,
} from "@docqa/shared";
import type { EmbeddingsLike } from "../services/embeddingsService.js";
import {
  stageFailed,
  stageOk,
  type CandidateResult,
  type RelevanceScorer,
  type StageResult,
} from "../types/index.js";

const log = logger.child({ service: "reranker" });

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i++) {
    const x = a[i]!;
    const y = b[i]!;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Scores passages by cosine similarity between the query embedding and
 * each passage embedding. Used when no cross-encoder is deployed.
 */
export class EmbeddingSimilarityScorer implements RelevanceScorer {
  readonly name = "embedding-similarity";

  constructor(private readonly embeddings: EmbeddingsLike) {}

  async score(query: string, passages: string[]): Promise<number[]> {
    if (passages.length === 0) return [];
    const [queryVector, passageVectors] = await Promise.all([
      this.embeddings.embedQuery(query),
      this.embeddings.embedDocuments(passages),
    ]);
    return passageVectors.map((vector) => cosineSimilarity(queryVector, vector));
  }
}

/**
 * The order used whenever rerank scores are unavailable: by original
 * score, truncated to `topK`, with no rerank score set.
 */
export function fallbackOrder(
  candidates: readonly CandidateResult[],
  topK: number,
): CandidateResult[] {
  return [...candidates]
    .sort((a, b) => b.originalScore - a.originalScore)
    .slice(0, topK)
    .map(({ rerankScore: _dropped, ...rest }) => rest);
}

function validateTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK < 1) {
    throw new ValidationError(`topK must be at least 1, got ${topK}`);
  }
}

/**
 * Orders candidates by a {@link RelevanceScorer} judged against the query.
 * The input list is never mutated.
 */
export class Reranker {
  constructor(private readonly scorer: RelevanceScorer) {}

  get backend(): string {
    return this.scorer.name;
  }

  /**
   * Scores every candidate in one batch and keeps the best `topK`.
   *
   * @throws {ValidationError} For a `topK` below one
   * @throws {RequestAbortedError} When `signal` aborts
   */
  async tryRerank(
    query: string,
    candidates: readonly CandidateResult[],
    topK: number,
    signal?: AbortSignal,
  ): Promise<StageResult<CandidateResult[], "rerank_unavailable">> {
    validateTopK(topK);
    if (candidates.length === 0) return stageOk([]);

    let scores: number[];
    try {
      scores = await this.scorer.score(
        query,
        candidates.map((c) => c.content),
        signal,
      );
    } catch (error) {
      const cause = toError(error);
      if (cause instanceof RequestAbortedError) throw cause;
      return stageFailed(
        "rerank_unavailable",
        new RerankUnavailableError(`Reranker '${this.scorer.name}' failed`, {
          cause,
        }),
      );
    }

    if (
      scores.length !== candidates.length ||
      scores.some((score) => !Number.isFinite(score))
    ) {
      return stageFailed(
        "rerank_unavailable",
        new RerankUnavailableError(
          `Reranker '${this.scorer.name}' returned ${scores.length} scores for ${candidates.length} candidates`,
        ),
      );
    }

    const reranked = candidates.map((candidate, i) => ({
      ...candidate,
      rerankScore: scores[i]!,
    }));
    reranked.sort((a, b) => b.rerankScore - a.rerankScore);
    return stageOk(reranked.slice(0, topK));
  }

  /**
   * Like {@link tryRerank}, but falls back to {@link fallbackOrder} when the
   * scorer fails.
   */
  async rerank(
    query: string,
    candidates: readonly CandidateResult[],
    topK: number,
    signal?: AbortSignal,
  ): Promise<CandidateResult[]> {
    const result = await this.tryRerank(query, candidates, topK, signal);
    if (result.ok) return result.value;

    log.warn("Reranking failed, keeping fusion order", {
      backend: this.scorer.name,
      error: result.error.message,
    });
    return fallbackOrder(candidates, topK);
  }
}
