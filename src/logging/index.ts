/**
 * Logging utilities.
 */

export { generateRunId, initRunId, getRunId, isRunId } from "./run-id.js";
export {
  createLogger,
  createSilentLogger,
  formatLogEntry,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogContext,
  type LoggerOptions,
} from "./logger.js";
