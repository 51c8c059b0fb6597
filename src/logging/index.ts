/**
 * Logging and observability utilities.
 */

export { generateRunId } from "./run-id.js";
export {
  createLogger,
  createSilentLogger,
  formatLogEntry,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogBindings,
  type LoggerOptions,
} from "./logger.js";
