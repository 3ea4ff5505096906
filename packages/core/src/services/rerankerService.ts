import { z } from "zod";
import {
  CircuitBreaker,
  ExternalServiceError,
  logger,
  type CircuitBreakerMetrics,
} from "@docqa/shared";
import type { RelevanceScorer } from "../types/index.js";

const log = logger.child({ service: "reranker-circuit" });

const rerankResponseSchema = z.array(
  z.object({
    index: z.number().int().nonnegative(),
    score: z.number(),
  }),
);

export interface CrossEncoderClientOptions {
  /** Base URL of a text-embeddings-inference style `/rerank` server. */
  baseUrl: string;
  /** Per-call timeout (ms). @default 10000 */
  requestTimeout?: number | undefined;
  fetchImpl?: typeof fetch | undefined;
}

/**
 * Scores query/passage pairs with a hosted cross-encoder.
 *
 * Sends `{ query, texts }` to `POST {baseUrl}/rerank` and expects an array
 * of `{ index, score }` back, in any order. The whole batch goes in one
 * request.
 */
export class CrossEncoderClient implements RelevanceScorer {
  readonly name = "cross-encoder";
  private readonly endpoint: string;
  private readonly fetchImpl: typeof fetch;
  private readonly circuit: CircuitBreaker;

  constructor(options: CrossEncoderClientOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, "")}/rerank`;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.circuit = new CircuitBreaker({
      name: "reranker",
      failureThreshold: 3,
      resetTimeout: 30_000,
      requestTimeout: options.requestTimeout ?? 10_000,
      successThreshold: 2,
      logger: log,
    });
  }

  /**
   * @throws {CircuitBreakerError} When the circuit is open
   * @throws {ExternalServiceError} On a non-2xx status or a malformed body
   */
  async score(
    query: string,
    passages: string[],
    signal?: AbortSignal,
  ): Promise<number[]> {
    if (passages.length === 0) return [];

    return this.circuit.execute(
      async (callSignal) => {
        const response = await this.fetchImpl(this.endpoint, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ query, texts: passages }),
          signal: callSignal,
        });

        if (!response.ok) {
          throw new ExternalServiceError(
            `Reranker returned HTTP ${response.status}`,
            {
              code: "RERANKER_HTTP_ERROR",
              context: { status: response.status },
            },
          );
        }

        const parsed = rerankResponseSchema.safeParse(await response.json());
        if (!parsed.success) {
          throw new ExternalServiceError("Reranker returned a malformed body", {
            code: "RERANKER_BAD_RESPONSE",
          });
        }

        const scores = new Array<number | undefined>(passages.length);
        for (const { index, score } of parsed.data) {
          if (index < passages.length) scores[index] = score;
        }

        const result: number[] = [];
        for (let i = 0; i < scores.length; i++) {
          const score = scores[i];
          if (score === undefined) {
            throw new ExternalServiceError(
              `Reranker returned no score for passage ${i}`,
              { code: "RERANKER_BAD_RESPONSE" },
            );
          }
          result.push(score);
        }
        return result;
      },
      { signal },
    );
  }

  getCircuitMetrics(): CircuitBreakerMetrics {
    return this.circuit.getMetrics();
  }
}
