/**
 * Observability module exports
 */

export {
  ConsoleLogger,
  NoopLogger,
  createDefaultLogger,
  isLogLevel,
  LOG_LEVEL_ENV,
} from './logging.js';
export type { Logger, LogLevel, LogContext } from './logging.js';
