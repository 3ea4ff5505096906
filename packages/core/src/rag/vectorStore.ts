import { PGVectorStore } from "@langchain/community/vectorstores/pgvector";
import type { EmbeddingsInterface } from "@langchain/core/embeddings";
import { getDatabaseUrl } from "@docqa/shared";
import type { Pool } from "pg";

export interface VectorStoreConfig {
  connectionString?: string;
  /** Reuse an existing pool instead of opening a new one. */
  pool?: Pool;
  tableName?: string;
}

export const CHUNK_TABLE_COLUMNS = {
  idColumnName: "id",
  vectorColumnName: "embedding",
  contentColumnName: "content",
  metadataColumnName: "metadata",
} as const;

/**
 * Opens the pgvector store over the `document_chunks` table. The table
 * itself is created by the ingestion side.
 */
export async function createVectorStore(
  embeddings: EmbeddingsInterface,
  config: VectorStoreConfig = {},
): Promise<PGVectorStore> {
  const tableName = config.tableName ?? "document_chunks";

  if (config.pool) {
    return PGVectorStore.initialize(embeddings, {
      pool: config.pool,
      tableName,
      columns: CHUNK_TABLE_COLUMNS,
    });
  }

  return PGVectorStore.initialize(embeddings, {
    postgresConnectionOptions: {
      connectionString: config.connectionString ?? getDatabaseUrl(),
    },
    tableName,
    columns: CHUNK_TABLE_COLUMNS,
  });
}
