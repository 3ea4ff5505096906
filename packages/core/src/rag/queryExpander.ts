import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { HumanMessage, SystemMessage } from "@langchain/core/messages";
import {
  ExpansionUnavailableError,
  RequestAbortedError,
  ValidationError,
  logger,
  toError,
  type CircuitBreaker,
  type CircuitBreakerMetrics,
} from "@docqa/shared";
import { buildExpansionPrompt } from "../prompts/index.js";
import {
  createLlmCircuit,
  extractTextFromResponse,
  invokeLlm,
} from "../services/llmService.js";
import {
  stageFailed,
  stageOk,
  type ExpansionStrategy,
  type QueryVariant,
  type StageResult,
} from "../types/index.js";

const log = logger.child({ service: "query-expander" });

/** Lines models emit when they have nothing to offer. */
const SENTINEL_LINES = new Set(["none", "null"]);

/**
 * Splits model output into candidate phrasings: one per line, trimmed,
 * blank and sentinel lines dropped. Duplicates are kept. Every usable line
 * is returned unless `limit` is given.
 */
export function parseVariantLines(text: string, limit?: number): string[] {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !SENTINEL_LINES.has(line.toLowerCase()));
  return limit === undefined ? lines : lines.slice(0, limit);
}

export interface QueryExpanderOptions {
  model: BaseChatModel;
  callTimeoutMs: number;
  circuit?: CircuitBreaker;
}

export interface ExpandOptions {
  strategy?: ExpansionStrategy | undefined;
  signal?: AbortSignal | undefined;
}

function toVariants(texts: string[]): QueryVariant[] {
  return texts.map((text, index) => ({ text, index }));
}

/**
 * Produces alternative phrasings of a query with one text-generation call.
 *
 * `multi` asks for `count` phrasings and keeps every usable line the model
 * returns; `rewrite` and `synonyms` keep a single reformulation. The
 * original query is not among the variants.
 */
export class QueryExpander {
  private readonly model: BaseChatModel;
  readonly circuit: CircuitBreaker;

  constructor(options: QueryExpanderOptions) {
    this.model = options.model;
    this.circuit = options.circuit ?? createLlmCircuit(options.callTimeoutMs);
  }

  /**
   * Runs the expansion call and reports failure explicitly.
   *
   * @throws {ValidationError} For a blank query or a count below one
   * @throws {RequestAbortedError} When `options.signal` aborts
   */
  async tryExpand(
    query: string,
    count: number,
    options: ExpandOptions = {},
  ): Promise<StageResult<QueryVariant[], "expansion_unavailable">> {
    if (!Number.isInteger(count) || count < 1) {
      throw new ValidationError(`Expansion count must be at least 1, got ${count}`);
    }
    if (query.trim() === "") {
      throw new ValidationError("Query must not be empty");
    }

    const strategy = options.strategy ?? "multi";
    const prompt = buildExpansionPrompt(strategy, query, count);
    const limit = strategy === "multi" ? undefined : 1;

    let text: string;
    try {
      const response = await invokeLlm(
        this.circuit,
        this.model,
        [new SystemMessage(prompt.system), new HumanMessage(prompt.user)],
        { signal: options.signal },
      );
      text = extractTextFromResponse(response);
    } catch (error) {
      const cause = toError(error);
      if (cause instanceof RequestAbortedError) throw cause;
      return stageFailed(
        "expansion_unavailable",
        new ExpansionUnavailableError("Query expansion call failed", {
          cause,
          context: { strategy },
        }),
      );
    }

    const lines = parseVariantLines(text, limit);
    if (lines.length === 0) {
      return stageFailed(
        "expansion_unavailable",
        new ExpansionUnavailableError("Query expansion returned no usable lines", {
          context: { strategy, responseText: text.slice(0, 200) },
        }),
      );
    }

    log.debug("Generated query variants", { strategy, count: lines.length });
    return stageOk(toVariants(lines));
  }

  /**
   * Like {@link tryExpand}, but falls back to `[query]` on any expansion
   * failure. Always returns at least one variant.
   */
  async expand(
    query: string,
    count: number,
    options: ExpandOptions = {},
  ): Promise<QueryVariant[]> {
    const result = await this.tryExpand(query, count, options);
    if (result.ok) return result.value;

    log.warn("Query expansion failed, using original query", {
      error: result.error.message,
    });
    return toVariants([query]);
  }

  getCircuitMetrics(): CircuitBreakerMetrics {
    return this.circuit.getMetrics();
  }
}
