import type { ExpansionStrategy } from "../types/index.js";

export interface ExpansionPrompt {
  system: string;
  user: string;
}

/**
 * Asks for `count` alternative phrasings, one per line. Acronyms and
 * unfamiliar terms must survive verbatim.
 */
export function buildMultiQueryPrompt(
  query: string,
  count: number,
): ExpansionPrompt {
  return {
    system: `You are a helpful assistant that generates multiple search queries based on a single input query.

Generate exactly ${count} alternative phrasings of the user's question for searching a library of technical documents. Vary the wording, use common synonyms for key words, and approach the question from different angles.

If there are acronyms or words you are not familiar with, do not try to rephrase them; keep them exactly as written.

Return one query per line. Do not number the lines and do not add any other text.`,
    user: query,
  };
}

/** A single reformulation tuned for technical-document search. */
export function buildRewritePrompt(query: string): ExpansionPrompt {
  return {
    system: `You are an expert query rewriter for a technical document search system.

Rewrite the user's query so it is more likely to match relevant passages:
- Make it clear and specific.
- Expand it with relevant synonyms or related terms if it is too narrow or uses jargon.
- Keep acronyms, part numbers and unfamiliar terms exactly as written.

Return only the rewritten query on a single line.`,
    user: query,
  };
}

/** Appends synonyms and related terms to the original wording. */
export function buildSynonymPrompt(query: string): ExpansionPrompt {
  return {
    system: `You expand search queries for a technical document search system.

Take the user's original query and add synonyms, related terms and alternative phrasings that help find relevant passages. Keep the original words, acronyms and unfamiliar terms exactly as written.

Return only the expanded query on a single line.`,
    user: `Expand this query with synonyms and related terms: ${query}`,
  };
}

export function buildExpansionPrompt(
  strategy: ExpansionStrategy,
  query: string,
  count: number,
): ExpansionPrompt {
  switch (strategy) {
    case "rewrite":
      return buildRewritePrompt(query);
    case "synonyms":
      return buildSynonymPrompt(query);
    case "multi":
      return buildMultiQueryPrompt(query, count);
  }
}
