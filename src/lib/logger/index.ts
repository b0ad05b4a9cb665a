/**
 * Logger Module
 *
 * Centralized logging for the playlist combiner.
 */

export {
  Logger,
  createLogger,
  formatPrefix,
  getLogLevel,
  type LogLevel,
  type LogContext,
  type LogEntry,
} from './logger';
