import type { CandidateResult, SearchHit } from "../types/index.js";

/**
 * Merges per-variant hit lists into one candidate list.
 *
 * Lists are walked in variant order and hits in rank order; the first
 * occurrence of an id fixes its `originalScore` and later occurrences are
 * dropped, even when they score higher. The result is stably sorted by
 * `originalScore`, descending.
 */
export function fuseAndDedup(
  hitLists: readonly (readonly SearchHit[])[],
): CandidateResult[] {
  const seen = new Set<string>();
  const candidates: CandidateResult[] = [];

  for (const hits of hitLists) {
    for (const hit of hits) {
      if (seen.has(hit.id)) continue;
      seen.add(hit.id);
      candidates.push({
        id: hit.id,
        content: hit.content,
        documentName: hit.documentName,
        section: hit.section,
        originalScore: hit.score,
      });
    }
  }

  return candidates.sort((a, b) => b.originalScore - a.originalScore);
}
