import { CircuitBreaker, logger, type Logger } from "@docqa/shared";

const log = logger.child({ service: "vectorstore-circuit" });

/**
 * Creates the circuit breaker guarding index reads (dense search, full-text
 * search and passage lookups).
 *
 * Configuration:
 * - failureThreshold: 5 (higher threshold for transient DB issues)
 * - resetTimeout: 15s (faster recovery for reads)
 * - requestTimeout: the per-call timeout
 */
export function createIndexReadCircuit(
  requestTimeout: number,
  circuitLogger: Logger = log,
): CircuitBreaker {
  return new CircuitBreaker({
    name: "pgvector-read",
    failureThreshold: 5,
    resetTimeout: 15_000,
    requestTimeout,
    successThreshold: 2,
    logger: circuitLogger,
  });
}
