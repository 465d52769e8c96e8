/**
 * Structured logging utilities for client construction and call execution
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Environment variable that selects the default log level.
 */
export const LOG_LEVEL_ENV = 'MODEL_CLIENT_LOG_LEVEL';

/**
 * Check whether a string names a log level.
 */
export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

/**
 * Console-based logger with structured output
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly name?: string;

  constructor(minLevel: LogLevel = 'info', name?: string) {
    this.minLevel = minLevel;
    this.name = name;
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  /**
   * Render a log line without writing it.
   */
  format(level: LogLevel, message: string, context?: LogContext, now: Date = new Date()): string {
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';
    const nameStr = this.name ? ` [${this.name}]` : '';
    return `[${now.toISOString()}] [${level.toUpperCase()}]${nameStr} ${message}${contextStr}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const logMessage = this.format(level, message, context);

    switch (level) {
      case 'error':
        console.error(logMessage);
        break;
      case 'warn':
        console.warn(logMessage);
        break;
      case 'debug':
      case 'trace':
        console.debug(logMessage);
        break;
      default:
        console.log(logMessage);
    }
  }
}

/**
 * No-op logger for callers that want the framework silent
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: LogContext): void {
    // No-op
  }

  warn(_message: string, _context?: LogContext): void {
    // No-op
  }

  info(_message: string, _context?: LogContext): void {
    // No-op
  }

  debug(_message: string, _context?: LogContext): void {
    // No-op
  }

  trace(_message: string, _context?: LogContext): void {
    // No-op
  }
}

/**
 * Create the default logger, honouring MODEL_CLIENT_LOG_LEVEL.
 */
export function createDefaultLogger(
  env: NodeJS.ProcessEnv = process.env,
  name = 'model-client'
): Logger {
  const configured = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  const level: LogLevel = configured && isLogLevel(configured) ? configured : 'warn';
  return new ConsoleLogger(level, name);
}
