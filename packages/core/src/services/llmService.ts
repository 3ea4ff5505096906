import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { BaseMessage } from "@langchain/core/messages";
import {
  CircuitBreaker,
  CircuitBreakerError,
  RequestAbortedError,
  logger,
  type Logger,
} from "@docqa/shared";

const log = logger.child({ service: "llm-circuit" });

/** Delay between retry attempts (ms). */
const RETRY_DELAY_MS = 1_000;

const TRANSIENT_STATUS_CODES = [429, 500, 502, 503, 529];

/**
 * Creates the circuit breaker for expansion LLM calls.
 *
 * Configuration:
 * - failureThreshold: 3 (opens after 3 consecutive failures)
 * - resetTimeout: 60s
 * - requestTimeout: the per-call timeout, retry included
 */
export function createLlmCircuit(
  requestTimeout: number,
  circuitLogger: Logger = log,
): CircuitBreaker {
  return new CircuitBreaker({
    name: "llm",
    failureThreshold: 3,
    resetTimeout: 60_000,
    requestTimeout,
    successThreshold: 2,
    logger: circuitLogger,
  });
}

function readStatusCode(error: Error): unknown {
  if ("status" in error) return error.status;
  if ("statusCode" in error) return error.statusCode;
  return undefined;
}

/**
 * Returns true for errors that are likely transient and worth retrying:
 * network errors, timeouts, and HTTP 429/500/502/503/529.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof CircuitBreakerError) return false;
  if (error instanceof RequestAbortedError) return false;

  if (error instanceof Error) {
    const msg = error.message.toLowerCase();
    if (
      msg.includes("econnreset") ||
      msg.includes("econnrefused") ||
      msg.includes("etimedout") ||
      msg.includes("socket hang up") ||
      msg.includes("network") ||
      msg.includes("timeout")
    ) {
      return true;
    }

    // HTTP status codes in error messages (common with LangChain API errors)
    if (/\b(429|500|502|503|529)\b/.test(msg)) return true;

    const statusCode = readStatusCode(error);
    if (typeof statusCode === "number") {
      return TRANSIENT_STATUS_CODES.includes(statusCode);
    }
  }

  return false;
}

/**
 * Retries a function once after a short delay if it fails with a transient
 * error. Non-transient errors are rethrown immediately, and no retry is
 * attempted once `signal` has fired.
 */
export async function withSingleRetry<T>(
  fn: () => Promise<T>,
  operationName: string,
  signal?: AbortSignal,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (!isTransientError(error) || signal?.aborted) throw error;

    log.warn("Transient error, retrying once", {
      operation: operationName,
      error: error instanceof Error ? error.message : String(error),
    });

    await new Promise((resolve) => setTimeout(resolve, RETRY_DELAY_MS));
    if (signal?.aborted) throw error;
    return await fn();
  }
}

/**
 * Extracts text content from a model response.
 */
export function extractTextFromResponse(response: BaseMessage): string {
  if (typeof response.content === "string") {
    return response.content;
  }

  if (Array.isArray(response.content)) {
    return response.content
      .filter(
        (block): block is { type: "text"; text: string } =>
          typeof block === "object" &&
          block !== null &&
          "type" in block &&
          block.type === "text" &&
          "text" in block &&
          typeof block.text === "string",
      )
      .map((block) => block.text)
      .join("");
  }

  return "";
}

export interface InvokeLlmOptions {
  signal?: AbortSignal | undefined;
}

/**
 * Invokes an LLM through the circuit breaker with a single retry for
 * transient errors. The retry happens *inside* the circuit breaker so the
 * breaker only sees the final outcome.
 *
 * @throws {CircuitBreakerError} When the circuit is open
 * @throws {RequestAbortedError} When `options.signal` aborts
 * @throws The underlying error if the model invocation fails
 */
export async function invokeLlm(
  circuit: CircuitBreaker,
  model: BaseChatModel,
  messages: BaseMessage[],
  options: InvokeLlmOptions = {},
): Promise<BaseMessage> {
  return circuit.execute(
    (signal) =>
      withSingleRetry(
        () => model.invoke(messages, { signal }),
        "invokeLlm",
        signal,
      ),
    { signal: options.signal },
  );
}
