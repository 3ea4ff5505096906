import type { Pool } from "pg";

export interface Bm25SearchOptions {
  query: string;
  /** Number of results to return. @default 20 */
  k?: number;
  /** Restrict matches to these source documents. */
  documentNames?: string[];
  /**
   * Checked before the query is sent. `pg` cannot cancel a statement in
   * flight; the pool's `statement_timeout` bounds it instead.
   */
  signal?: AbortSignal | undefined;
}

export interface Bm25SearchResult {
  id: string;
  content: string;
  metadata: Record<string, unknown>;
  /** ts_rank_cd score (higher = better). */
  textRank: number;
}

export function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
}

/**
 * BM25-style full-text search over the `content_tsv` tsvector column of
 * `document_chunks`.
 *
 * Uses `plainto_tsquery` so user input is never parsed as tsquery syntax.
 */
export async function bm25Search(
  pool: Pool,
  options: Bm25SearchOptions,
): Promise<Bm25SearchResult[]> {
  const { query, k = 20, documentNames, signal } = options;

  if (!query.trim()) return [];

  const params: unknown[] = [query];
  const conditions: string[] = [
    "content_tsv @@ plainto_tsquery('english', $1)",
  ];

  let paramIndex = 2;

  if (documentNames && documentNames.length > 0) {
    conditions.push(`metadata->>'documentName' = ANY($${paramIndex})`);
    params.push(documentNames);
    paramIndex++;
  }

  params.push(k);

  const sql = `
    SELECT id, content, metadata,
           ts_rank_cd(content_tsv, plainto_tsquery('english', $1)) AS rank
    FROM document_chunks
    WHERE ${conditions.join(" AND ")}
    ORDER BY rank DESC, id ASC
    LIMIT $${paramIndex}
  `;

  signal?.throwIfAborted();
  const result = await pool.query(sql, params);

  return result.rows.map((row: Record<string, unknown>) => ({
    id: String(row.id),
    content: String(row.content),
    metadata: asRecord(row.metadata),
    textRank: Number(row.rank),
  }));
}
