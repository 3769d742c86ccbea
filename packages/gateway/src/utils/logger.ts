/**
 * Structured Logger
 *
 * Minimal logger with network/batch context.
 * One JSON line per entry; bigint values are written as decimal strings.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  network?: number;
  hash?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(context: LogContext, message: string): void;
  warn(context: LogContext, message: string): void;
  error(context: LogContext, message: string): void;
  debug(context: LogContext, message: string): void;
  child(context: LogContext): Logger;
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

// =============================================================================
// JSON LOGGER IMPLEMENTATION
// =============================================================================

export class JsonLogger implements Logger {
  private context: LogContext;
  private level: LogLevel;
  private write: (line: string) => void;

  constructor(
    context: LogContext = {},
    level: LogLevel = 'info',
    write: (line: string) => void = (line) => console.log(line)
  ) {
    this.context = context;
    this.level = level;
    this.write = write;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  private log(level: LogLevel, context: LogContext, message: string): void {
    if (!this.shouldLog(level)) return;

    const entry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...context,
    };

    // Remove undefined values
    const cleaned = Object.fromEntries(
      Object.entries(entry).filter(([_, v]) => v !== undefined)
    );

    // Serialize errors
    const error = cleaned.error;
    if (error instanceof Error) {
      cleaned.error = {
        name: error.name,
        message: error.message,
        code: 'code' in error ? error.code : undefined,
        stack: error.stack,
      };
    }

    this.write(JSON.stringify(cleaned, (_key, value: unknown) =>
      typeof value === 'bigint' ? value.toString() : value
    ));
  }

  info(context: LogContext, message: string): void {
    this.log('info', context, message);
  }

  warn(context: LogContext, message: string): void {
    this.log('warn', context, message);
  }

  error(context: LogContext, message: string): void {
    this.log('error', context, message);
  }

  debug(context: LogContext, message: string): void {
    this.log('debug', context, message);
  }

  child(context: LogContext): Logger {
    return new JsonLogger({ ...this.context, ...context }, this.level, this.write);
  }
}

// =============================================================================
// SILENT LOGGER
// =============================================================================

/**
 * Discards everything. Default for components constructed without a logger.
 */
export class SilentLogger implements Logger {
  info(_context: LogContext, _message: string): void {}
  warn(_context: LogContext, _message: string): void {}
  error(_context: LogContext, _message: string): void {}
  debug(_context: LogContext, _message: string): void {}
  child(_context: LogContext): Logger {
    return this;
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export function createLogger(
  options?: {
    level?: LogLevel;
    service?: string;
  }
): Logger {
  return new JsonLogger(
    { service: options?.service ?? 'crosslink' },
    options?.level ?? 'info'
  );
}
