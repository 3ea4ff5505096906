import type {
  RetrievalOrchestrator,
  VectorIndex,
} from "@docqa/core";
import type { CircuitBreakerMetrics, PoolStatus } from "@docqa/shared";

/**
 * Long-lived collaborators the routers depend on. Built once at startup
 * and shared by every request.
 */
export interface ApiServices {
  retrieval: Pick<RetrievalOrchestrator, "run">;
  passages: Pick<VectorIndex, "getById" | "getPassages">;
  circuitMetrics(): Record<string, CircuitBreakerMetrics>;
  /** Null until the first query opens the pool. */
  poolStatus(): PoolStatus | null;
}
