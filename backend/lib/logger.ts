import "dotenv/config";

/**
 * Leveled console logger with optional structured context.
 * Production output is one JSON object per line.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  businessId?: string;
  postId?: string;
  requestId?: string;
  route?: string;
  method?: string;
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext, error?: Error): void;
  error(message: string, context?: LogContext, error?: Error): void;
  child(baseContext: LogContext): Logger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVEL_PRIORITY;
}

function resolveMinLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(configured)) return configured;
  if (process.env.NODE_ENV === "test") return "warn";
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

// LOG_LEVEL is read on every call.
function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[resolveMinLevel()];
}

function formatLogEntry(entry: LogEntry): string {
  if (process.env.NODE_ENV === "production") {
    return JSON.stringify(entry);
  }

  const { timestamp, level, message, context, error } = entry;
  const levelStr = level.toUpperCase().padEnd(5);
  const contextStr = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : "";
  const errorStr = error
    ? `\n  Error: ${error.name}: ${error.message}${error.stack ? `\n${error.stack}` : ""}`
    : "";

  return `[${timestamp}] ${levelStr} ${message}${contextStr}${errorStr}`;
}

function log(level: LogLevel, message: string, context?: LogContext, error?: Error) {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    context,
  };

  if (error) {
    entry.error = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  const formatted = formatLogEntry(entry);

  switch (level) {
    case "error":
      console.error(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

function createLogger(baseContext: LogContext = {}): Logger {
  const merge = (context?: LogContext): LogContext => ({ ...baseContext, ...context });

  return {
    debug: (message, context) => log("debug", message, merge(context)),
    info: (message, context) => log("info", message, merge(context)),
    warn: (message, context, error) => log("warn", message, merge(context), error),
    error: (message, context, error) => log("error", message, merge(context), error),
    child: (childContext) => createLogger(merge(childContext)),
  };
}

export const logger: Logger = createLogger();

/**
 * Logger scoped to one HTTP request.
 */
export function createRequestLogger(req: { method: string; path: string; businessId?: string }): Logger {
  return logger.child({
    method: req.method,
    route: req.path,
    businessId: req.businessId,
  });
}
