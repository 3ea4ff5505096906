export {
  type LogLevel,
  type LogContext,
  type Logger,
  createLogger,
  errorContext,
  logger,
} from "./logger.js";

export {
  CircuitBreaker,
  CircuitBreakerError,
  RequestAbortedError,
  type CircuitBreakerConfig,
  type CircuitBreakerMetrics,
  type CircuitBreakerState,
  type ExecuteOptions,
} from "./circuitBreaker.js";

export {
  type ApiError,
  type RetrievalErrorKind,
  AppError,
  NotFoundError,
  ValidationError,
  ExternalServiceError,
  RetrievalError,
  ExpansionUnavailableError,
  VariantSearchFailedError,
  RetrievalUnavailableError,
  RerankUnavailableError,
  RETRIEVAL_UNAVAILABLE_MESSAGE,
  toError,
} from "./errors.js";

export {
  getOptionalEnv,
  getDatabaseUrl,
  isProduction,
  isDevelopment,
  parseEnvInt,
  parseEnvFloat,
  parseEnvBool,
} from "./env.js";

export {
  buildPoolConfig,
  getPool,
  getPoolStatus,
  closePool,
  type PoolStatus,
} from "./pool.js";

export { settleWithConcurrency, type Settled } from "./concurrency.js";
