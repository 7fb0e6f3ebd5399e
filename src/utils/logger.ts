/**
 * Logger
 *
 * Leveled logger shared by the cache and search layers.
 *
 * - Levels: debug < info < warn < error (plus `silent`)
 * - Text output with optional colors and timestamps, or one JSON object per line
 * - Bounded in-memory history (inspected by tests and diagnostics)
 * - Child loggers tagged with a `source`
 *
 * Environment:
 * - RETRIEVAL_LOG_LEVEL: debug | info | warn | error | silent
 * - RETRIEVAL_LOG_FORMAT: text | json
 * - DEBUG=true|1 forces debug level
 * - NO_COLOR disables colors
 */

import chalk from 'chalk';

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogFormat = 'text' | 'json';

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  timestamp: string;
  source?: string;
  context?: LogContext;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  source?: string;
  /** Suppress console output (history is still recorded) */
  silent?: boolean;
  enableColors?: boolean;
  enableTimestamps?: boolean;
  maxHistory?: number;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const VALID_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

function isLogContext(value: unknown): value is LogContext {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function levelFromEnv(): LogLevel {
  const debugFlag = process.env.DEBUG;
  if (debugFlag === 'true' || debugFlag === '1') {
    return 'debug';
  }
  const configured = process.env.RETRIEVAL_LOG_LEVEL?.toLowerCase();
  return isLogLevel(configured) ? configured : 'info';
}

function formatFromEnv(): LogFormat {
  return process.env.RETRIEVAL_LOG_FORMAT === 'json' ? 'json' : 'text';
}

// ============================================================================
// Logger
// ============================================================================

export class Logger {
  private level: LogLevel;
  private readonly format: LogFormat;
  private readonly source?: string;
  private readonly silent: boolean;
  private readonly enableColors: boolean;
  private readonly enableTimestamps: boolean;
  private readonly maxHistory: number;
  private history: LogEntry[] = [];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? levelFromEnv();
    this.format = options.format ?? formatFromEnv();
    this.source = options.source;
    this.silent = options.silent ?? false;
    this.enableColors = options.enableColors ?? (!process.env.NO_COLOR && Boolean(process.stderr.isTTY));
    this.enableTimestamps = options.enableTimestamps ?? true;
    this.maxHistory = options.maxHistory ?? 500;
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  /**
   * Log an error; an Error argument is flattened into the context.
   */
  error(message: string, errorOrContext?: unknown, context?: LogContext): void {
    if (errorOrContext instanceof Error) {
      this.log('error', message, {
        errorName: errorOrContext.name,
        errorMessage: errorOrContext.message,
        errorStack: errorOrContext.stack,
        ...context,
      });
      return;
    }
    if (isLogContext(errorOrContext)) {
      this.log('error', message, { ...errorOrContext, ...context });
      return;
    }
    this.log('error', message, context);
  }

  child(source: string): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      source: this.source ? `${this.source}:${source}` : source,
      silent: this.silent,
      enableColors: this.enableColors,
      enableTimestamps: this.enableTimestamps,
      maxHistory: this.maxHistory,
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isDebugEnabled(): boolean {
    return LEVEL_PRIORITY[this.level] <= LEVEL_PRIORITY.debug;
  }

  getHistory(): LogEntry[] {
    return [...this.history];
  }

  clearHistory(): void {
    this.history = [];
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.level]) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      source: this.source,
      context,
    };

    this.history.push(entry);
    if (this.history.length > this.maxHistory) {
      this.history.shift();
    }

    if (this.silent) return;

    // stdout belongs to the host application
    console.error(this.format === 'json' ? this.formatJson(entry) : this.formatText(entry));
  }

  private formatJson(entry: LogEntry): string {
    return JSON.stringify({
      timestamp: entry.timestamp,
      level: entry.level,
      source: entry.source,
      message: entry.message,
      ...entry.context,
    });
  }

  private formatText(entry: LogEntry): string {
    const parts: string[] = [];
    if (this.enableTimestamps) {
      parts.push(this.colorize('gray', entry.timestamp));
    }
    parts.push(this.colorize(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    if (entry.source) {
      parts.push(this.colorize('cyan', `[${entry.source}]`));
    }
    parts.push(entry.message);
    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(this.colorize('gray', JSON.stringify(entry.context)));
    }
    return parts.join(' ');
  }

  private colorize(color: LogColor, text: string): string {
    return this.enableColors ? chalk[color](text) : text;
  }
}

type LogColor = 'gray' | 'blue' | 'yellow' | 'red' | 'cyan';

const LEVEL_COLORS: Record<LogEntry['level'], LogColor> = {
  debug: 'gray',
  info: 'blue',
  warn: 'yellow',
  error: 'red',
};

// ============================================================================
// Default instance
// ============================================================================

let defaultLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = new Logger();
  }
  return defaultLogger;
}

export function resetLogger(): void {
  defaultLogger = null;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

export function isDebugEnabled(): boolean {
  return getLogger().isDebugEnabled();
}

/**
 * Convenience facade over the default logger; resolves the instance on
 * every call so resetLogger() takes effect.
 */
export const logger = {
  debug: (message: string, context?: LogContext): void => getLogger().debug(message, context),
  info: (message: string, context?: LogContext): void => getLogger().info(message, context),
  warn: (message: string, context?: LogContext): void => getLogger().warn(message, context),
  error: (message: string, errorOrContext?: unknown, context?: LogContext): void =>
    getLogger().error(message, errorOrContext, context),
  child: (source: string): Logger => getLogger().child(source),
  isDebugEnabled: (): boolean => getLogger().isDebugEnabled(),
};
