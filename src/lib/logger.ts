// ============================================
// Structured JSON logging
// Always includes: timestamp, level, stage, requestId (when available)
// ============================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Stage =
  | "startup"
  | "router"
  | "extract"
  | "policy"
  | "customer"
  | "orchestrator"
  | "retrieval"
  | "context"
  | "llm"
  | "chatbot"
  | "api"
  | "mcp"
  | "indexer"
  | "db";

interface LogContext {
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

// stdout belongs to the protocol when serving MCP over stdio
let infoToStderr = false;

/** Send debug and info lines to stderr as well as warnings and errors. */
export function redirectLogsToStderr(): void {
  infoToStderr = true;
}

function writeInfo(line: string): void {
  if (infoToStderr) {
    console.error(line);
  } else {
    console.log(line);
  }
}

/** Main logger with context support */
export const logger = {
  debug(message: string, context?: LogContext): void {
    if (process.env["NODE_ENV"] !== "production") {
      writeInfo(formatLog("debug", message, context));
    }
  },

  info(message: string, context?: LogContext): void {
    writeInfo(formatLog("info", message, context));
  },

  warn(message: string, context?: LogContext & { error?: unknown }): void {
    const { error, ...rest } = context || {};
    console.warn(formatLog("warn", message, { ...rest, ...describeError(error) }));
  },

  error(message: string, context?: LogContext & { error?: unknown }): void {
    const { error, ...rest } = context || {};
    console.error(formatLog("error", message, { ...rest, ...describeError(error) }));
  },
};

function describeError(error: unknown): { errorMessage?: string; errorStack?: string } {
  if (error instanceof Error) {
    return { errorMessage: error.message, errorStack: error.stack };
  }
  return error ? { errorMessage: String(error) } : {};
}

/** Create a logger bound to a specific request */
export function createRequestLogger(requestId: string, stage?: Stage) {
  return {
    debug(message: string, context?: Omit<LogContext, "requestId">): void {
      logger.debug(message, { ...context, requestId, stage });
    },

    info(message: string, context?: Omit<LogContext, "requestId">): void {
      logger.info(message, { ...context, requestId, stage });
    },

    warn(message: string, context?: Omit<LogContext, "requestId"> & { error?: unknown }): void {
      logger.warn(message, { ...context, requestId, stage });
    },

    error(message: string, context?: Omit<LogContext, "requestId"> & { error?: unknown }): void {
      logger.error(message, { ...context, requestId, stage });
    },

    /** Create a child logger for a different stage */
    withStage(newStage: Stage) {
      return createRequestLogger(requestId, newStage);
    },
  };
}

export type RequestLogger = ReturnType<typeof createRequestLogger>;
