/**
 * Logger interface for type-safe logging
 */
export interface Logger {
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug?(message: string, context?: Record<string, unknown>): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Console-backed logger. Messages below `level` are dropped; every line is
 * prefixed with `[scope]` when a scope is given.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly scope?: string;

  constructor(level: LogLevel = 'warn', scope?: string) {
    this.level = level;
    this.scope = scope;
  }

  /**
   * Logger for a sub-component sharing this logger's level
   */
  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.enabled('warn')) {
      this.write(console.warn, message, context);
    }
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this.enabled('error')) {
      this.write(console.error, message, context);
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.enabled('info')) {
      this.write(console.info, message, context);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.enabled('debug')) {
      this.write(console.debug, message, context);
    }
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private write(
    sink: (...args: unknown[]) => void,
    message: string,
    context?: Record<string, unknown>,
  ): void {
    const line = this.scope ? `[${this.scope}] ${message}` : message;
    if (context !== undefined) {
      sink(line, context);
    } else {
      sink(line);
    }
  }
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = new ConsoleLogger('silent');
