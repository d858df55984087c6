/**
 * Logging Service
 *
 * Structured, leveled logging for the transport, trackers and handle registry.
 * Output goes to stderr so stdout stays free for the host test runner.
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warning', 'error', 'silent']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log entry structure
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  logger: string;
  context?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warning(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
}

/**
 * Logging Service
 *
 * Keeps a bounded buffer of recent entries in addition to writing them out,
 * so a failing test can attach what the client saw just before the failure.
 */
export class LoggingService implements Logger {
  private minLevel: LogLevel;
  private logEntries: LogEntry[] = [];
  private readonly maxEntries: number;
  private readonly loggerName: string;

  private static readonly LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warning: 2,
    error: 3,
    silent: 4,
  };

  constructor(minLevel: LogLevel = 'info', maxEntries = 1000, loggerName = 'cdp-quiesce') {
    this.minLevel = minLevel;
    this.maxEntries = maxEntries;
    this.loggerName = loggerName;
  }

  /**
   * Set minimum log level
   */
  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getMinLevel(): LogLevel {
    return this.minLevel;
  }

  getLoggerName(): string {
    return this.loggerName;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warning(message: string, context?: Record<string, unknown>): void {
    this.log('warning', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Create a logger that shares this service's level and buffer but tags
   * entries with a sub-name, e.g. `cdp-quiesce:transport`.
   */
  child(name: string): Logger {
    return {
      debug: (message, context) => this.log('debug', message, context, undefined, name),
      info: (message, context) => this.log('info', message, context, undefined, name),
      warning: (message, context) => this.log('warning', message, context, undefined, name),
      error: (message, error, context) => this.log('error', message, context, error, name),
    };
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error,
    childName?: string,
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      logger: childName ? `${this.loggerName}:${childName}` : this.loggerName,
      context,
      error,
    };

    this.logEntries.push(entry);
    if (this.logEntries.length > this.maxEntries) {
      this.logEntries.shift();
    }

    this.outputToConsole(entry);
  }

  private shouldLog(level: LogLevel): boolean {
    if (level === 'silent' || this.minLevel === 'silent') {
      return false;
    }
    return LoggingService.LOG_LEVELS[level] >= LoggingService.LOG_LEVELS[this.minLevel];
  }

  private outputToConsole(entry: LogEntry): void {
    const timestamp = new Date(entry.timestamp).toISOString();
    const levelStr = entry.level.toUpperCase().padEnd(7);

    let output = `[${timestamp}] ${levelStr} [${entry.logger}] ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      output += `\n  Context: ${JSON.stringify(entry.context)}`;
    }

    if (entry.error) {
      output += `\n  Error: ${entry.error.message}`;
      if (entry.error.stack) {
        output += `\n  Stack: ${entry.error.stack}`;
      }
    }

    console.error(output);
  }

  /**
   * Get recent log entries
   */
  getRecentLogs(count = 100, minLevel?: LogLevel): LogEntry[] {
    let logs = this.logEntries;

    if (minLevel) {
      const minLevelValue = LoggingService.LOG_LEVELS[minLevel];
      logs = logs.filter((entry) => LoggingService.LOG_LEVELS[entry.level] >= minLevelValue);
    }

    return logs.slice(-count);
  }

  clearLogs(): void {
    this.logEntries = [];
  }
}

let globalLogger: LoggingService | null = null;

/**
 * Read the log level from `CDP_LOG_LEVEL`, falling back to `info` when the
 * variable is unset or not a known level.
 */
export function logLevelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const parsed = LogLevelSchema.safeParse(env.CDP_LOG_LEVEL?.toLowerCase());
  return parsed.success ? parsed.data : 'info';
}

/**
 * Get or create global logger instance
 */
export function getLogger(): LoggingService {
  globalLogger ??= new LoggingService(logLevelFromEnv());
  return globalLogger;
}

/**
 * Set global logger instance
 */
export function setLogger(logger: LoggingService): void {
  globalLogger = logger;
}
