/**
 * Logging - structured JSON file logger
 */

export {
  Logger,
  LOG_LEVELS,
  DEFAULT_LOGGER_CONFIG,
  isLogLevel,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LoggerConfig,
} from './logger.js';
