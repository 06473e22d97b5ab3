/**
 * Observability
 *
 * Structured logging for provider operations. Every protocol step logs its
 * request parameters at debug level; `startOperation` brackets an operation
 * with start and finish entries carrying its duration and outcome.
 */

/**
 * Log levels.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Logger interface.
 */
export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  trace(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/**
 * Sensitive fields that should be redacted in logs.
 */
const SENSITIVE_FIELDS = ['accountKey', 'sasToken', 'connectionString', 'signature', 'authorization'];

/**
 * Sanitize context by redacting sensitive fields.
 */
export function sanitizeContext(context: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(context)) {
    const lowerKey = key.toLowerCase();
    if (SENSITIVE_FIELDS.some((field) => lowerKey.includes(field.toLowerCase()))) {
      sanitized[key] = '[REDACTED]';
    } else if (isPlainRecord(value)) {
      sanitized[key] = sanitizeContext(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

/**
 * Log level priority (lower = more important).
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

/**
 * Console logger implementation.
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private context: Record<string, unknown>;

  constructor(level: LogLevel = 'info', context: Record<string, unknown> = {}) {
    this.level = level;
    this.context = context;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[this.level];
  }

  private formatMessage(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    const merged = sanitizeContext({ ...this.context, ...context });
    const contextStr = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : '';
    return `[${timestamp}] ${level.toUpperCase()} ${message}${contextStr}`;
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      console.error(this.formatMessage('error', message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage('warn', message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.info(this.formatMessage('info', message, context));
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.debug(this.formatMessage('debug', message, context));
    }
  }

  trace(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('trace')) {
      console.log(this.formatMessage('trace', message, context));
    }
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger(this.level, { ...this.context, ...context });
  }
}

/**
 * No-op logger for when logging is disabled.
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  debug(_message: string, _context?: Record<string, unknown>): void {}
  trace(_message: string, _context?: Record<string, unknown>): void {}
  child(_context: Record<string, unknown>): Logger {
    return this;
  }
}

/** A captured log entry */
export interface LogEntry {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
}

/**
 * In-memory logger for testing. Children write into the parent's buffer.
 */
export class InMemoryLogger implements Logger {
  private readonly logs: LogEntry[];
  private readonly contextData: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}, sink: LogEntry[] = []) {
    this.contextData = context;
    this.logs = sink;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.logs.push({ level, message, context: sanitizeContext({ ...this.contextData, ...context }) });
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log('trace', message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new InMemoryLogger({ ...this.contextData, ...context }, this.logs);
  }

  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  getLogsByLevel(level: LogLevel): Array<{ message: string; context: Record<string, unknown> }> {
    return this.logs
      .filter((log) => log.level === level)
      .map(({ message, context }) => ({ message, context }));
  }

  clear(): void {
    this.logs.length = 0;
  }
}

/**
 * A running operation. Call `succeed()` before `end()` on the success path;
 * an operation ended without it is logged as failed.
 */
export interface Operation {
  succeed(): void;
  end(error?: unknown): void;
}

/**
 * Log the start of an operation and return a handle that logs its end.
 */
export function startOperation(
  logger: Logger,
  name: string,
  context: Record<string, unknown> = {}
): Operation {
  const startedAt = Date.now();
  let successful = false;
  let ended = false;

  logger.debug(`${name} started`, context);

  return {
    succeed() {
      successful = true;
    },
    end(error?: unknown) {
      if (ended) {
        return;
      }
      ended = true;
      const durationMs = Date.now() - startedAt;
      if (successful && error === undefined) {
        logger.debug(`${name} finished`, { ...context, durationMs });
      } else {
        logger.warn(`${name} failed`, {
          ...context,
          durationMs,
          error: error instanceof Error ? error.message : error === undefined ? 'unfinished' : String(error),
        });
      }
    },
  };
}

/**
 * Run `fn` as a logged operation.
 */
export async function traced<T>(
  logger: Logger,
  name: string,
  context: Record<string, unknown>,
  fn: () => Promise<T>
): Promise<T> {
  const op = startOperation(logger, name, context);
  try {
    const result = await fn();
    op.succeed();
    op.end();
    return result;
  } catch (error) {
    op.end(error);
    throw error;
  }
}

/**
 * Create a console logger.
 */
export function createConsoleLogger(level: LogLevel = 'info'): Logger {
  return new ConsoleLogger(level);
}

/**
 * Create a no-op logger.
 */
export function createNoopLogger(): Logger {
  return new NoopLogger();
}

/**
 * Create an in-memory logger for testing.
 */
export function createInMemoryLogger(): InMemoryLogger {
  return new InMemoryLogger();
}
