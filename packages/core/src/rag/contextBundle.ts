import type {
  CandidateResult,
  ContextBundle,
  ContextEntry,
} from "../types/index.js";

/**
 * First `maxChars` characters of `content`, with "..." appended only when
 * something was cut. Counts code points so surrogate pairs stay whole.
 */
export function makePreview(content: string, maxChars: number): string {
  const chars = Array.from(content);
  if (chars.length <= maxChars) return content;
  return `${chars.slice(0, maxChars).join("")}...`;
}

export function formatSourceLabel(documentName: string, section: string): string {
  return `book: ${documentName} - chapter: ${section}`;
}

export function toContextEntry(
  candidate: CandidateResult,
  previewChars: number,
): ContextEntry {
  return {
    chunk_id: candidate.id,
    content: candidate.content,
    source_document: formatSourceLabel(candidate.documentName, candidate.section),
    relevance_score: candidate.rerankScore ?? candidate.originalScore,
    original_score: candidate.originalScore,
    text_preview: makePreview(candidate.content, previewChars),
  };
}

/** The passage blocks handed to the generation prompt. */
export function buildContextText(entries: readonly ContextEntry[]): string {
  return entries
    .map((entry) => `Document: ${entry.source_document} \nContent: ${entry.content}`)
    .join("\n");
}

export interface AssembleBundleInput {
  query: string;
  language?: string | undefined;
  /** Final ranked candidates, best first. */
  candidates: readonly CandidateResult[];
  variants: readonly string[];
  previewChars: number;
}

export function assembleBundle(input: AssembleBundleInput): ContextBundle {
  const entries = input.candidates.map((candidate) =>
    toContextEntry(candidate, input.previewChars),
  );

  return {
    query: input.query,
    ...(input.language !== undefined && { language: input.language }),
    entries,
    contextText: buildContextText(entries),
    variants: [...input.variants],
  };
}
