// ============================================
// Structured JSON logging
// One line per entry: timestamp, level, message, stage,
// requestId / conversationId when bound
// ============================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Stage =
  | "startup"
  | "api"
  | "pipeline"
  | "router"
  | "retrieval"
  | "llm"
  | "db";

export interface LogContext {
  requestId?: string;
  conversationId?: string;
  stage?: Stage;
  [key: string]: unknown;
}

type ErrorContext = LogContext & { error?: unknown };

interface LogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  message: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function minimumLevel(): LogLevel {
  const configured = process.env["LOG_LEVEL"];
  if (configured === "debug" || configured === "info" || configured === "warn" || configured === "error") {
    return configured;
  }
  return process.env["NODE_ENV"] === "production" ? "info" : "debug";
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel()];
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

function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
    return { errorMessage: error.message, errorCode: code, errorStack: error.stack };
  }
  return error === undefined ? {} : { errorMessage: String(error) };
}

/** Main logger with context support */
export const logger = {
  debug(message: string, context?: LogContext): void {
    if (enabled("debug")) console.log(formatLog("debug", message, context));
  },

  info(message: string, context?: LogContext): void {
    if (enabled("info")) console.log(formatLog("info", message, context));
  },

  warn(message: string, context?: ErrorContext): void {
    if (!enabled("warn")) return;
    const { error, ...rest } = context ?? {};
    console.warn(formatLog("warn", message, { ...rest, ...describeError(error) }));
  },

  error(message: string, context?: ErrorContext): void {
    const { error, ...rest } = context ?? {};
    console.error(formatLog("error", message, { ...rest, ...describeError(error) }));
  },
};

type BoundContext = Omit<LogContext, "requestId" | "conversationId">;

export interface RequestLogger {
  debug(message: string, context?: BoundContext): void;
  info(message: string, context?: BoundContext): void;
  warn(message: string, context?: BoundContext & { error?: unknown }): void;
  error(message: string, context?: BoundContext & { error?: unknown }): void;
  withStage(newStage: Stage): RequestLogger;
}

/** Create a logger bound to one request (and its conversation, when known) */
export function createRequestLogger(requestId: string, stage?: Stage, conversationId?: string): RequestLogger {
  const bound = { requestId, conversationId, stage };

  return {
    debug(message: string, context?: BoundContext): void {
      logger.debug(message, { ...context, ...bound });
    },

    info(message: string, context?: BoundContext): void {
      logger.info(message, { ...context, ...bound });
    },

    warn(message: string, context?: BoundContext & { error?: unknown }): void {
      logger.warn(message, { ...context, ...bound });
    },

    error(message: string, context?: BoundContext & { error?: unknown }): void {
      logger.error(message, { ...context, ...bound });
    },

    /** Child logger for a different stage */
    withStage(newStage: Stage) {
      return createRequestLogger(requestId, newStage, conversationId);
    },
  };
}
