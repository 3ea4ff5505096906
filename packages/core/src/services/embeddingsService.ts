import { Embeddings } from "@langchain/core/embeddings";
import { OpenAIEmbeddings } from "@langchain/openai";
import {
  CircuitBreaker,
  logger,
  type CircuitBreakerMetrics,
} from "@docqa/shared";
import { getModelConfig } from "../config/index.js";

const log = logger.child({ service: "embeddings-circuit" });

/** The calls the pipeline makes on an embedding model. */
export interface EmbeddingsLike {
  embedQuery(text: string): Promise<number[]>;
  embedDocuments(texts: string[]): Promise<number[][]>;
}

export interface ProtectedEmbeddingsOptions {
  apiKey?: string | undefined;
  /** Per-call timeout (ms). @default 30000 */
  requestTimeout?: number | undefined;
  /** Replaces the OpenAI client, mainly for tests. */
  client?: EmbeddingsLike | undefined;
}

/**
 * Circuit-protected OpenAI embeddings.
 *
 * A drop-in LangChain `Embeddings`, so it can back `PGVectorStore` as well
 * as the similarity reranker. Quota errors do not count towards opening
 * the circuit.
 */
export class ProtectedOpenAIEmbeddings extends Embeddings {
  private readonly client: EmbeddingsLike;
  readonly circuit: CircuitBreaker;

  constructor(options: ProtectedEmbeddingsOptions = {}) {
    super({});
    const config = getModelConfig().embeddings;
    const apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
    this.client =
      options.client ??
      new OpenAIEmbeddings({
        model: config.model,
        dimensions: config.dimensions,
        ...(apiKey !== undefined && { apiKey }),
      });
    this.circuit = new CircuitBreaker({
      name: "openai-embeddings",
      failureThreshold: 3,
      resetTimeout: 60_000,
      requestTimeout: options.requestTimeout ?? 30_000,
      successThreshold: 2,
      logger: log,
      shouldRecordFailure: (error) =>
        !error.message.includes("insufficient_quota"),
    });
  }

  /**
   * Embed multiple documents through the circuit breaker.
   *
   * @throws {CircuitBreakerError} When the circuit is open
   */
  async embedDocuments(texts: string[]): Promise<number[][]> {
    return this.circuit.execute(() => this.client.embedDocuments(texts));
  }

  /**
   * Embed a single query through the circuit breaker.
   *
   * @throws {CircuitBreakerError} When the circuit is open
   */
  async embedQuery(text: string): Promise<number[]> {
    return this.circuit.execute(() => this.client.embedQuery(text));
  }

  getCircuitMetrics(): CircuitBreakerMetrics {
    return this.circuit.getMetrics();
  }
}

export function createProtectedEmbeddings(
  options: ProtectedEmbeddingsOptions = {},
): ProtectedOpenAIEmbeddings {
  return new ProtectedOpenAIEmbeddings(options);
}
