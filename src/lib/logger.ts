// ============================================
// Structured JSON logging
// Always includes: timestamp, level, stage, requestId (when available)
// LOG_LEVEL sets the threshold; debug is off in production by default
// ============================================

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: unknown): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

function threshold(): LogLevel {
  const configured = process.env["LOG_LEVEL"];
  if (isLogLevel(configured)) return configured;
  return process.env["NODE_ENV"] === "production" ? "info" : "debug";
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold()];
}

export type Stage =
  | "startup"
  | "config"
  | "router"
  | "retrieval"
  | "index"
  | "llm"
  | "handler"
  | "cache"
  | "strategy"
  | "pipeline"
  | "api";

export interface LogContext {
  requestId?: string;
  stage?: Stage;
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  stage?: Stage;
  requestId?: string;
  [key: string]: unknown;
}

function formatLog(level: LogLevel, message: string, context: LogContext = {}): string {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...context,
  };
  return JSON.stringify(entry);
}

/** Main logger with context support */
export const logger = {
  debug(message: string, context?: LogContext): void {
    if (enabled("debug")) console.log(formatLog("debug", message, context));
  },

  info(message: string, context?: LogContext): void {
    if (enabled("info")) console.log(formatLog("info", message, context));
  },

  warn(message: string, context?: LogContext): void {
    if (enabled("warn")) console.warn(formatLog("warn", message, context));
  },

  error(message: string, context?: LogContext & { error?: unknown }): void {
    const { error, ...rest } = context || {};
    const errorInfo = error instanceof Error
      ? { errorMessage: error.message, errorStack: error.stack }
      : error
        ? { errorMessage: String(error) }
        : {};
    console.error(formatLog("error", message, { ...rest, ...errorInfo }));
  },
};

/** Fields repeated on every line of one query (userId, ...) */
export type BoundContext = Omit<LogContext, "requestId" | "stage">;

/** Logger bound to one query; every line carries its requestId, stage and bound fields */
export interface RequestLogger {
  debug(message: string, context?: Omit<LogContext, "requestId">): void;
  info(message: string, context?: Omit<LogContext, "requestId">): void;
  warn(message: string, context?: Omit<LogContext, "requestId">): void;
  error(message: string, context?: Omit<LogContext, "requestId"> & { error?: unknown }): void;
  /** Create a child logger for a different stage */
  withStage(newStage: Stage): RequestLogger;
}

/** Create a logger bound to a specific query */
export function createRequestLogger(requestId: string, stage?: Stage, bound: BoundContext = {}): RequestLogger {
  return {
    debug(message, context) {
      logger.debug(message, { ...bound, ...context, requestId, stage });
    },

    info(message, context) {
      logger.info(message, { ...bound, ...context, requestId, stage });
    },

    warn(message, context) {
      logger.warn(message, { ...bound, ...context, requestId, stage });
    },

    error(message, context) {
      logger.error(message, { ...bound, ...context, requestId, stage });
    },

    withStage(newStage) {
      return createRequestLogger(requestId, newStage, bound);
    },
  };
}
