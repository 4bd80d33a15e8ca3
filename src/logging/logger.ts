/**
 * Lightweight logging utility.
 * Outputs to the console and, optionally, a log file, with timestamps and
 * the trace ID of the run that produced the entry.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { dirname } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogBindings = Readonly<Record<string, unknown>>;

/** Receives every formatted entry that passes the level filter. */
export type LogSink = (level: LogLevel, entry: string) => void;

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Log file path; no file output when unset */
  file?: string;
  /** Enable console output */
  console?: boolean;
  /** Fields added to every entry; `traceId` is printed in the prefix */
  bindings?: LogBindings;
  /** Extra destination, used by tests to capture output */
  sink?: LogSink;
}

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Logger sharing this one's destinations, with extra bound fields. */
  child(bindings: LogBindings): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Format a log entry with timestamp, level, trace ID, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  bindings: LogBindings,
  context?: Record<string, unknown>,
  timestamp: string = new Date().toISOString()
): string {
  const { traceId, ...fields } = bindings;
  const traceStr = typeof traceId === "string" ? traceId : "no-trace";
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${timestamp}] [${levelStr}] [${traceStr}] ${message}`;

  const merged = { ...fields, ...context };
  if (Object.keys(merged).length > 0) {
    entry += ` ${JSON.stringify(merged)}`;
  }

  return entry;
}

/**
 * Get console method for log level.
 */
function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const toConsole = options.console ?? true;
  const file = options.file;

  // Ensure log directory exists
  if (file) {
    const dir = dirname(file);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  function build(bindings: LogBindings): Logger {
    function log(
      entryLevel: LogLevel,
      message: string,
      context?: Record<string, unknown>
    ): void {
      if (LOG_LEVEL_PRIORITY[entryLevel] < LOG_LEVEL_PRIORITY[level]) {
        return;
      }

      const entry = formatLogEntry(entryLevel, message, bindings, context);

      if (toConsole) {
        getConsoleMethod(entryLevel)(entry);
      }

      options.sink?.(entryLevel, entry);

      if (file) {
        try {
          appendFileSync(file, entry + "\n");
        } catch (err) {
          // Fallback to console if file write fails
          console.error(`Failed to write to log file: ${err}`);
        }
      }
    }

    return {
      level,
      debug: (message, context) => log("debug", message, context),
      info: (message, context) => log("info", message, context),
      warn: (message, context) => log("warn", message, context),
      error: (message, context) => log("error", message, context),
      child: (extra) => build({ ...bindings, ...extra }),
    };
  }

  return build(options.bindings ?? {});
}

/** A logger that drops everything. */
export const silentLogger: Logger = createLogger({ level: "error", console: false });
