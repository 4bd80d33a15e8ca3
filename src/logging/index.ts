/**
 * Logging and observability utilities.
 */

export { generateTraceId, generateSpanId } from "./trace-id.js";
export {
  createLogger,
  formatLogEntry,
  isLogLevel,
  silentLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LoggerOptions,
  type LogBindings,
  type LogSink,
} from "./logger.js";
