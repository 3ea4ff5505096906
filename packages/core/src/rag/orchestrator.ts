import {
  RequestAbortedError,
  RetrievalUnavailableError,
  ValidationError,
  VariantSearchFailedError,
  logger,
  settleWithConcurrency,
  toError,
} from "@docqa/shared";
import type { RetrievalConfig } from "../config/index.js";
import type {
  CandidateResult,
  ContextBundle,
  Degradation,
  Query,
  QueryVariant,
  RetrievalOutcome,
  RetrieveOptions,
  SearchHit,
} from "../types/index.js";
import { assembleBundle } from "./contextBundle.js";
import { fuseAndDedup } from "./fusion.js";
import type { VectorIndex } from "./hybridIndex.js";
import type { QueryExpander } from "./queryExpander.js";
import { fallbackOrder, type Reranker } from "./reranker.js";

const log = logger.child({ service: "retrieval-orchestrator" });

export type RetrievalState =
  | "EXPANDING"
  | "SEARCHING"
  | "FUSING"
  | "RERANKING"
  | "ASSEMBLING"
  | "DONE";

export interface RetrievalOrchestratorDeps {
  expander: Pick<QueryExpander, "tryExpand">;
  index: Pick<VectorIndex, "search">;
  /** Absent means reranking is unavailable; fusion order is used. */
  reranker?: Pick<Reranker, "tryRerank"> | undefined;
  config: Pick<
    RetrievalConfig,
    | "expansionCount"
    | "searchLimit"
    | "topK"
    | "previewChars"
    | "rerankEnabled"
    | "searchConcurrency"
  >;
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (!signal?.aborted) return;
  const reason: unknown = signal.reason;
  throw new RequestAbortedError("retrieval", {
    cause: reason instanceof Error ? reason : undefined,
  });
}

function isCancellation(error: Error, signal: AbortSignal | undefined): boolean {
  return error instanceof RequestAbortedError || signal?.aborted === true;
}

/**
 * Runs one retrieval request: expand, search every variant, fuse, rerank
 * and assemble a {@link ContextBundle}.
 *
 * Sub-stage failures are absorbed and recorded as degradations; only
 * {@link RetrievalUnavailableError} (every search failed), validation
 * errors and cancellation reach the caller. Instances hold no request
 * state and may serve concurrent requests.
 */
export class RetrievalOrchestrator {
  private readonly expander: Pick<QueryExpander, "tryExpand">;
  private readonly index: Pick<VectorIndex, "search">;
  private readonly reranker: Pick<Reranker, "tryRerank"> | undefined;
  private readonly config: RetrievalOrchestratorDeps["config"];

  constructor(deps: RetrievalOrchestratorDeps) {
    this.expander = deps.expander;
    this.index = deps.index;
    this.reranker = deps.reranker;
    this.config = deps.config;
  }

  async retrieve(
    query: Query,
    useExpansion: boolean,
    options: RetrieveOptions = {},
  ): Promise<ContextBundle> {
    const outcome = await this.run(query, useExpansion, options);
    return outcome.bundle;
  }

  /**
   * Same as {@link retrieve}, also reporting whether reranking applied and
   * which stages degraded.
   *
   * @throws {RetrievalUnavailableError} When every variant search failed
   * @throws {ValidationError} For an empty query
   * @throws {RequestAbortedError} When `options.signal` aborts
   */
  async run(
    query: Query,
    useExpansion: boolean,
    options: RetrieveOptions = {},
  ): Promise<RetrievalOutcome> {
    const text = query.text.trim();
    if (text === "") {
      throw new ValidationError("Query must not be empty");
    }

    const { signal } = options;
    const language = options.language ?? query.language;
    const reqLog = options.requestId
      ? log.child({ requestId: options.requestId })
      : log;
    const startedAt = Date.now();
    const degradations: Degradation[] = [];
    const enter = (state: RetrievalState) =>
      reqLog.debug("Retrieval state", { state });

    // EXPANDING
    enter("EXPANDING");
    throwIfAborted(signal);
    let variants: QueryVariant[] = [{ text, index: 0 }];
    if (useExpansion) {
      const expansion = await this.expander.tryExpand(
        text,
        this.config.expansionCount,
        { strategy: options.strategy, signal },
      );
      if (expansion.ok) {
        variants = expansion.value;
      } else {
        reqLog.warn("Expansion unavailable, searching original query only", {
          error: expansion.error.message,
        });
        degradations.push({
          kind: expansion.kind,
          message: expansion.error.message,
        });
      }
    }

    // SEARCHING
    enter("SEARCHING");
    throwIfAborted(signal);
    const settled = await settleWithConcurrency(
      variants,
      this.config.searchConcurrency,
      (variant) => this.index.search(variant.text, this.config.searchLimit, signal),
    );

    const hitLists: SearchHit[][] = [];
    let firstFailure: Error | undefined;
    for (let i = 0; i < settled.length; i++) {
      const slot = settled[i]!;
      if (slot.status === "fulfilled") {
        hitLists.push(slot.value);
        continue;
      }
      const cause = toError(slot.reason);
      if (isCancellation(cause, signal)) continue;
      const variant = variants[i]!.text;
      const failure = new VariantSearchFailedError(variant, { cause });
      firstFailure ??= cause;
      reqLog.warn("Variant search failed", {
        variant,
        error: cause.message,
        errorName: cause.name,
      });
      degradations.push({
        kind: failure.kind,
        message: failure.message,
        variant,
      });
    }
    throwIfAborted(signal);

    if (hitLists.length === 0) {
      throw new RetrievalUnavailableError(
        `All ${variants.length} variant searches failed`,
        {
          ...(firstFailure !== undefined && { cause: firstFailure }),
          context: { variants: variants.map((v) => v.text) },
        },
      );
    }

    // FUSING
    enter("FUSING");
    const candidates = fuseAndDedup(hitLists);

    // RERANKING
    enter("RERANKING");
    throwIfAborted(signal);
    let ranked: CandidateResult[];
    let reranked = false;
    if (this.reranker && this.config.rerankEnabled && candidates.length > 0) {
      const result = await this.reranker.tryRerank(
        text,
        candidates,
        this.config.topK,
        signal,
      );
      if (result.ok) {
        ranked = result.value;
        reranked = true;
      } else {
        reqLog.warn("Reranking unavailable, keeping fusion order", {
          error: result.error.message,
        });
        degradations.push({ kind: result.kind, message: result.error.message });
        ranked = fallbackOrder(candidates, this.config.topK);
      }
    } else {
      ranked = fallbackOrder(candidates, this.config.topK);
    }

    // ASSEMBLING
    enter("ASSEMBLING");
    const bundle = assembleBundle({
      query: text,
      language,
      candidates: ranked,
      variants: variants.map((v) => v.text),
      previewChars: this.config.previewChars,
    });

    enter("DONE");
    reqLog.info("Retrieval complete", {
      variants: variants.length,
      searchedOk: hitLists.length,
      candidates: candidates.length,
      entries: bundle.entries.length,
      reranked,
      degradations: degradations.map((d) => d.kind),
      durationMs: Date.now() - startedAt,
    });

    return { bundle, reranked, degradations };
  }
}
