import type { DocumentInterface } from "@langchain/core/documents";
import type { Pool } from "pg";
import {
  RequestAbortedError,
  RetrievalUnavailableError,
  ValidationError,
  logger,
  toError,
  type CircuitBreaker,
  type CircuitBreakerMetrics,
} from "@docqa/shared";
import { createIndexReadCircuit } from "../services/vectorStoreService.js";
import type { Passage, SearchHit } from "../types/index.js";
import { bm25Search, asRecord } from "./bm25Search.js";
import { rrfFuse, type RankedInput } from "./rrfFuse.js";

const log = logger.child({ service: "hybrid-index" });

/**
 * Hybrid (dense + sparse) search over the chunk corpus.
 */
export interface VectorIndex {
  /**
   * Returns at most `limit` hits for `text`, best first. Scores are only
   * comparable within one call.
   *
   * @throws {RetrievalUnavailableError} When the index cannot be reached
   */
  search(text: string, limit: number, signal?: AbortSignal): Promise<SearchHit[]>;
  getById(id: string): Promise<Passage | null>;
  /** Passages for `ids` in the given order; unknown ids are skipped. */
  getPassages(ids: string[]): Promise<Passage[]>;
}

/**
 * The subset of `PGVectorStore` used for the dense signal. It takes no
 * signal, so a cancelled search still lets the embedding call and the
 * pgvector query finish in the background.
 */
export interface VectorStoreLike {
  similaritySearchWithScore(
    query: string,
    k: number,
  ): Promise<[DocumentInterface, number][]>;
}

export interface PgHybridIndexOptions {
  vectorStore: VectorStoreLike;
  pool: Pool;
  rrfK: number;
  vectorWeight: number;
  callTimeoutMs: number;
  /** Each signal fetches `limit * candidateMultiplier` before fusion. @default 2 */
  candidateMultiplier?: number;
  circuit?: CircuitBreaker;
}

const UNKNOWN_DOCUMENT = "unknown";

function readLabel(value: unknown): string | undefined {
  if (typeof value === "string" && value.trim() !== "") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

/**
 * Builds a passage from a chunk row or vector store document. Ingestion
 * writes `documentName` and `section`; older rows used `source` and
 * `chapter`.
 */
export function toPassage(
  id: string,
  content: string,
  metadata: Record<string, unknown>,
): Passage {
  return {
    id,
    content,
    documentName:
      readLabel(metadata.documentName) ??
      readLabel(metadata.source) ??
      UNKNOWN_DOCUMENT,
    section: readLabel(metadata.section) ?? readLabel(metadata.chapter) ?? "",
  };
}

function documentId(doc: DocumentInterface): string | undefined {
  return doc.id ?? readLabel(doc.metadata.id);
}

/**
 * Postgres-backed {@link VectorIndex}: pgvector cosine search for the dense
 * signal and `ts_rank_cd` full-text search for the sparse one, merged with
 * weighted Reciprocal Rank Fusion.
 */
export class PgHybridIndex implements VectorIndex {
  private readonly vectorStore: VectorStoreLike;
  private readonly pool: Pool;
  private readonly rrfK: number;
  private readonly vectorWeight: number;
  private readonly candidateMultiplier: number;
  readonly circuit: CircuitBreaker;

  constructor(options: PgHybridIndexOptions) {
    this.vectorStore = options.vectorStore;
    this.pool = options.pool;
    this.rrfK = options.rrfK;
    this.vectorWeight = options.vectorWeight;
    this.candidateMultiplier = options.candidateMultiplier ?? 2;
    this.circuit =
      options.circuit ?? createIndexReadCircuit(options.callTimeoutMs);
  }

  async search(
    text: string,
    limit: number,
    signal?: AbortSignal,
  ): Promise<SearchHit[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError(`Search limit must be at least 1, got ${limit}`);
    }

    const fetchK = limit * this.candidateMultiplier;

    const fused = await this.read(
      "search",
      async (callSignal) => {
        const [vectorResults, textResults] = await Promise.all([
          this.vectorStore.similaritySearchWithScore(text, fetchK),
          bm25Search(this.pool, { query: text, k: fetchK, signal: callSignal }),
        ]);

        // Results are already ordered by ascending cosine distance
        const vectorInputs: RankedInput[] = [];
        for (const [doc] of vectorResults) {
          const id = documentId(doc);
          if (id === undefined) continue;
          vectorInputs.push({
            id,
            content: doc.pageContent,
            metadata: doc.metadata,
          });
        }

        return rrfFuse(vectorInputs, textResults, {
          k: limit,
          rrfK: this.rrfK,
          vectorWeight: this.vectorWeight,
        });
      },
      signal,
    );

    return fused.map((candidate) => ({
      ...toPassage(candidate.id, candidate.content, candidate.metadata),
      score: candidate.score,
    }));
  }

  async getById(id: string): Promise<Passage | null> {
    const [passage] = await this.getPassages([id]);
    return passage ?? null;
  }

  async getPassages(ids: string[]): Promise<Passage[]> {
    if (ids.length === 0) return [];

    const rows = await this.read("getPassages", async () => {
      const result = await this.pool.query(
        "SELECT id, content, metadata FROM document_chunks WHERE id::text = ANY($1)",
        [ids],
      );
      return result.rows;
    });

    const byId = new Map<string, Passage>();
    for (const row of rows) {
      const record = asRecord(row);
      const id = String(record.id);
      byId.set(
        id,
        toPassage(id, String(record.content), asRecord(record.metadata)),
      );
    }

    return ids.flatMap((id) => {
      const passage = byId.get(id);
      return passage ? [passage] : [];
    });
  }

  getCircuitMetrics(): CircuitBreakerMetrics {
    return this.circuit.getMetrics();
  }

  private async read<T>(
    operation: string,
    fn: (callSignal: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    try {
      return await this.circuit.execute(fn, { signal });
    } catch (error) {
      const cause = toError(error);
      if (cause instanceof RequestAbortedError) throw cause;
      log.warn("Index read failed", { operation, error: cause.message });
      throw new RetrievalUnavailableError(`Index ${operation} failed`, {
        cause,
        context: { operation },
      });
    }
  }
}
