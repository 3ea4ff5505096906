export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  service?: string;
  requestId?: string;
  [key: string]: unknown;
}

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

function getConfiguredLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "info";
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[getConfiguredLevel()];
}

function formatEntry(
  level: LogLevel,
  message: string,
  defaultContext?: LogContext,
  callContext?: LogContext,
): LogEntry {
  return {
    level,
    message,
    timestamp: new Date().toISOString(),
    ...defaultContext,
    ...callContext,
  };
}

/**
 * Flattens an unknown thrown value into log-friendly fields. Nested causes
 * are reported one level deep, which is where wrapped client errors keep
 * the transport message.
 */
export function errorContext(error: unknown): LogContext {
  if (!(error instanceof Error)) {
    return { error: String(error) };
  }
  const context: LogContext = { error: error.message, errorName: error.name };
  if (error.cause instanceof Error) {
    context.cause = error.cause.message;
  }
  return context;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

export function createLogger(defaultContext?: LogContext): Logger {
  function log(level: LogLevel, message: string, context?: LogContext): void {
    if (!shouldLog(level)) {
      return;
    }

    const json = JSON.stringify(
      formatEntry(level, message, defaultContext, context),
    );

    if (level === "error") {
      process.stderr.write(json + "\n");
    } else {
      process.stdout.write(json + "\n");
    }
  }

  return {
    debug(message, context) {
      log("debug", message, context);
    },
    info(message, context) {
      log("info", message, context);
    },
    warn(message, context) {
      log("warn", message, context);
    },
    error(message, context) {
      log("error", message, context);
    },
    child(context) {
      return createLogger({ ...defaultContext, ...context });
    },
  };
}

export const logger = createLogger({ service: "docqa" });
