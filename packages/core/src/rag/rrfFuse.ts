/**
 * Weighted Reciprocal Rank Fusion of the dense (vector) and sparse
 * (full-text) result lists of a single search call.
 *
 * Pure function with no side effects.
 */

export interface RankedInput {
  id: string;
  content: string;
  metadata: Record<string, unknown>;
}

export interface RrfCandidate extends RankedInput {
  /** Fused RRF score (higher = better). */
  score: number;
  /** 1-based rank in the vector results, or null if absent. */
  vectorRank: number | null;
  /** 1-based rank in the text results, or null if absent. */
  textRank: number | null;
}

export interface RrfOptions {
  /** Number of results to return. @default 10 */
  k?: number;
  /** RRF smoothing constant. @default 60 */
  rrfK?: number;
  /** Weight for the vector signal (0-1). Text weight = 1 - vectorWeight. @default 0.5 */
  vectorWeight?: number;
}

/**
 * Fuses best-first vector and text result lists.
 *
 * Formula per document:
 *   score = alpha * 1/(rrfK + vectorRank) + (1-alpha) * 1/(rrfK + textRank)
 *
 * A document missing from one list gets 0 for that term. Only ranks are
 * used, so the two lists' raw scores need not share a scale. Equal scores
 * keep first-seen order, vector list first.
 */
export function rrfFuse(
  vectorResults: readonly RankedInput[],
  textResults: readonly RankedInput[],
  options: RrfOptions = {},
): RrfCandidate[] {
  const k = options.k ?? 10;
  const rrfK = options.rrfK ?? 60;
  const alpha = options.vectorWeight ?? 0.5;

  const candidates = new Map<string, Omit<RrfCandidate, "score">>();

  vectorResults.forEach((v, i) => {
    if (candidates.has(v.id)) return;
    candidates.set(v.id, {
      id: v.id,
      content: v.content,
      metadata: v.metadata,
      vectorRank: i + 1,
      textRank: null,
    });
  });

  textResults.forEach((t, i) => {
    const existing = candidates.get(t.id);
    if (existing) {
      existing.textRank ??= i + 1;
      return;
    }
    candidates.set(t.id, {
      id: t.id,
      content: t.content,
      metadata: t.metadata,
      vectorRank: null,
      textRank: i + 1,
    });
  });

  const scored = Array.from(candidates.values(), (c) => {
    const vectorTerm =
      c.vectorRank !== null ? alpha * (1 / (rrfK + c.vectorRank)) : 0;
    const textTerm =
      c.textRank !== null ? (1 - alpha) * (1 / (rrfK + c.textRank)) : 0;
    return { ...c, score: vectorTerm + textTerm };
  });

  // Array.prototype.sort is stable, so ties keep insertion order
  scored.sort((a, b) => b.score - a.score);
  return scored.slice(0, k);
}
