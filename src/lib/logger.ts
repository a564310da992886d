/**
 * Structured Logger
 *
 * Provides a consistent logging interface that outputs human-readable lines by
 * default and structured JSON when LOG_FORMAT=json.
 *
 * Usage:
 * ```typescript
 * import { logger } from "@/lib/logger";
 *
 * logger.info("Feed fetched", { feed: "example", entries: 12 });
 * logger.error("Failed to fetch feed", { feed: "example", error: error.message });
 * ```
 */

import { logConfig } from "../server/config/env";

/**
 * Log levels in order of severity.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Context data that can be attached to log entries.
 */
export type LogContext = Record<string, unknown>;

/**
 * A structured log entry.
 */
interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

/**
 * Logger configuration options.
 */
interface LoggerConfig {
  /** Minimum log level to output (default: LOG_LEVEL, or "warn") */
  minLevel?: LogLevel;
  /** Whether to output JSON format (default: LOG_FORMAT=json) */
  json?: boolean;
  /** Service name for structured logs */
  service?: string;
}

/**
 * Minimal logger surface accepted by components that allow injection.
 */
export interface ComponentLogger {
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
}

export interface Logger extends ComponentLogger {
  debug: (message: string, context?: LogContext) => void;
  child: (additionalContext: LogContext) => Logger;
  setLevel: (level: LogLevel) => void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

/**
 * Creates a logger instance with the given configuration.
 */
function createLogger(config: LoggerConfig = {}): Logger {
  const {
    minLevel = isLogLevel(logConfig.level) ? logConfig.level : "warn",
    json = logConfig.json,
    service = "feedmail",
  } = config;

  let minLevelPriority = LOG_LEVEL_PRIORITY[minLevel];

  function formatEntry(entry: LogEntry): string {
    if (json) {
      return JSON.stringify({
        ...entry,
        service,
        ...(entry.context && { ...entry.context }),
      });
    }

    const levelColors: Record<LogLevel, string> = {
      debug: "\x1b[36m", // cyan
      info: "\x1b[32m", // green
      warn: "\x1b[33m", // yellow
      error: "\x1b[31m", // red
    };
    const reset = "\x1b[0m";
    const levelStr = `[${entry.level.toUpperCase()}]`.padEnd(7);

    let output = `${levelColors[entry.level]}${levelStr}${reset} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += ` ${JSON.stringify(entry.context)}`;
    }

    return output;
  }

  function log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < minLevelPriority) {
      return;
    }

    const formatted = formatEntry({
      timestamp: new Date().toISOString(),
      level,
      message,
      context,
    });

    // stdout carries command output (list, opmlexport), so logs go to stderr
    switch (level) {
      case "debug":
      case "info":
      case "warn":
        console.warn(formatted);
        break;
      case "error":
        console.error(formatted);
        break;
    }
  }

  function bind(baseContext: LogContext): Logger {
    const merge = (context?: LogContext) =>
      Object.keys(baseContext).length > 0 ? { ...baseContext, ...context } : context;

    return {
      debug: (message, context) => log("debug", message, merge(context)),
      info: (message, context) => log("info", message, merge(context)),
      warn: (message, context) => log("warn", message, merge(context)),
      error: (message, context) => log("error", message, merge(context)),
      /**
       * Creates a child logger with additional context.
       * Useful for adding feed-specific context.
       */
      child: (additionalContext) => bind({ ...baseContext, ...additionalContext }),
      /**
       * Changes the minimum level for this logger and all of its children.
       */
      setLevel: (level) => {
        minLevelPriority = LOG_LEVEL_PRIORITY[level];
      },
    };
  }

  return bind({});
}

/**
 * Default logger instance.
 */
export const logger = createLogger();

export { createLogger };
