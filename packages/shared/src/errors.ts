export type ApiError = { error: string; code?: string };

interface ErrorOptions {
  code?: string | undefined;
  cause?: Error | undefined;
  context?: Record<string, unknown> | undefined;
}

export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly context?: Record<string, unknown> | undefined;

  constructor(
    message: string,
    options: ErrorOptions & {
      statusCode?: number | undefined;
      isOperational?: boolean | undefined;
    } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code ?? "INTERNAL_ERROR";
    this.statusCode = options.statusCode ?? 500;
    this.isOperational = options.isOperational ?? true;
    this.context = options.context;

    // Maintains proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      isOperational: this.isOperational,
      ...(this.context ? { context: this.context } : {}),
    };
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options: ErrorOptions = {}) {
    super(message, {
      code: options.code ?? "NOT_FOUND",
      statusCode: 404,
      cause: options.cause,
      context: options.context,
    });
  }
}

export class ValidationError extends AppError {
  constructor(message = "Validation failed", options: ErrorOptions = {}) {
    super(message, {
      code: options.code ?? "VALIDATION_ERROR",
      statusCode: 400,
      cause: options.cause,
      context: options.context,
    });
  }
}

export class ExternalServiceError extends AppError {
  constructor(message = "External service failure", options: ErrorOptions = {}) {
    super(message, {
      code: options.code ?? "EXTERNAL_SERVICE_ERROR",
      statusCode: 502,
      cause: options.cause,
      context: options.context,
    });
  }
}

// ---------------------------------------------------------------------------
// Retrieval pipeline errors
// ---------------------------------------------------------------------------

/**
 * Stage-level failure categories. Every kind except `retrieval_unavailable`
 * is absorbed by the pipeline and reported as a degradation on the result.
 */
export type RetrievalErrorKind =
  | "expansion_unavailable"
  | "variant_search_failed"
  | "retrieval_unavailable"
  | "rerank_unavailable";

export abstract class RetrievalError extends AppError {
  abstract readonly kind: RetrievalErrorKind;
}

export class ExpansionUnavailableError extends RetrievalError {
  readonly kind = "expansion_unavailable" as const;

  constructor(message = "Query expansion unavailable", options: ErrorOptions = {}) {
    super(message, {
      code: options.code ?? "EXPANSION_UNAVAILABLE",
      statusCode: 502,
      cause: options.cause,
      context: options.context,
    });
  }
}

export class VariantSearchFailedError extends RetrievalError {
  readonly kind = "variant_search_failed" as const;

  constructor(
    variant: string,
    options: Omit<ErrorOptions, "context"> & {
      context?: Record<string, unknown> | undefined;
    } = {},
  ) {
    super(`Search failed for variant "${variant}"`, {
      code: options.code ?? "VARIANT_SEARCH_FAILED",
      statusCode: 502,
      cause: options.cause,
      context: { variant, ...options.context },
    });
  }
}

/** Message shown to end users when no context could be gathered. */
export const RETRIEVAL_UNAVAILABLE_MESSAGE =
  "I cannot answer right now: the document index is unavailable. Please try again shortly.";

/**
 * The only retrieval error a caller has to handle: every search call for the
 * request failed, so no context could be gathered.
 */
export class RetrievalUnavailableError extends RetrievalError {
  readonly kind = "retrieval_unavailable" as const;

  constructor(message = "Retrieval unavailable", options: ErrorOptions = {}) {
    super(message, {
      code: options.code ?? "RETRIEVAL_UNAVAILABLE",
      statusCode: 503,
      cause: options.cause,
      context: options.context,
    });
  }
}

export class RerankUnavailableError extends RetrievalError {
  readonly kind = "rerank_unavailable" as const;

  constructor(message = "Reranker unavailable", options: ErrorOptions = {}) {
    super(message, {
      code: options.code ?? "RERANK_UNAVAILABLE",
      statusCode: 502,
      cause: options.cause,
      context: options.context,
    });
  }
}

/**
 * Normalises an unknown thrown value into an `Error` instance.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
