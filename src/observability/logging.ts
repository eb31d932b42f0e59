/**
 * Structured logging.
 *
 * Log lines go to stderr so that standard output carries only command
 * results (the credential bundle in particular).
 *
 * @module observability/logging
 */

/**
 * Log levels in order of severity.
 */
export enum LogLevel {
  Trace = 0,
  Debug = 1,
  Info = 2,
  Warn = 3,
  Error = 4,
  Silent = 5,
}

export type LogLevelName = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
  trace: LogLevel.Trace,
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warn: LogLevel.Warn,
  error: LogLevel.Error,
  silent: LogLevel.Silent,
};

/**
 * Parse a level name, case-insensitively.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  const key = name.trim().toLowerCase();
  return isLevelName(key) ? LEVEL_BY_NAME[key] : undefined;
}

function isLevelName(name: string): name is LogLevelName {
  return Object.prototype.hasOwnProperty.call(LEVEL_BY_NAME, name);
}

/**
 * Logger interface.
 */
export interface Logger {
  trace(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/**
 * Context fields whose values are never written out.
 */
const SENSITIVE_FIELDS = new Set([
  'secret',
  'secretkey',
  'secret_key',
  'apisecret',
  'api_secret',
  'authorization',
  'x-auth-token',
  'token',
  'password',
]);

/**
 * Redacts sensitive fields from an object.
 */
export function redactSensitive(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SENSITIVE_FIELDS.has(key.toLowerCase())) {
      result[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      result[key] = redactSensitive(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    && Object.getPrototypeOf(value) === Object.prototype;
}

/**
 * Line sink; defaults to stderr.
 */
export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Console logger implementation.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly format: 'json' | 'pretty';
  private readonly sink: LogSink;

  constructor(options: {
    level?: LogLevel;
    context?: Record<string, unknown>;
    format?: 'json' | 'pretty';
    sink?: LogSink;
  } = {}) {
    this.level = options.level ?? LogLevel.Info;
    this.context = options.context ?? {};
    this.format = options.format ?? 'pretty';
    this.sink = options.sink ?? stderrSink;
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.Error, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger({
      level: this.level,
      context: { ...this.context, ...context },
      format: this.format,
      sink: this.sink,
    });
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (level < this.level) return;

    const mergedContext = redactSensitive({ ...this.context, ...context });
    const timestamp = new Date().toISOString();
    const levelName = LogLevel[level].toUpperCase();

    if (this.format === 'json') {
      this.sink(JSON.stringify({ timestamp, level: levelName, message, ...mergedContext }));
    } else {
      const contextStr = Object.keys(mergedContext).length > 0
        ? ` ${JSON.stringify(mergedContext)}`
        : '';
      this.sink(`[${timestamp}] ${levelName}: ${message}${contextStr}`);
    }
  }
}

/**
 * No-op logger for testing or disabled logging.
 */
export class NoopLogger implements Logger {
  trace(): void { /* noop */ }
  debug(): void { /* noop */ }
  info(): void { /* noop */ }
  warn(): void { /* noop */ }
  error(): void { /* noop */ }
  child(): Logger { return this; }
}

export interface LogRecord {
  level: LogLevel;
  message: string;
  context: Record<string, unknown>;
}

/**
 * In-memory logger for testing.
 */
export class InMemoryLogger implements Logger {
  private readonly records: LogRecord[];
  private readonly context: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}, records: LogRecord[] = []) {
    this.context = context;
    this.records = records;
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.add(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.add(LogLevel.Debug, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.add(LogLevel.Info, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.add(LogLevel.Warn, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.add(LogLevel.Error, message, context);
  }

  child(context: Record<string, unknown>): Logger {
    // Children share the record list
    return new InMemoryLogger({ ...this.context, ...context }, this.records);
  }

  getLogs(): LogRecord[] {
    return [...this.records];
  }

  getLogsByLevel(level: LogLevel): LogRecord[] {
    return this.records.filter((record) => record.level === level);
  }

  private add(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.records.push({ level, message, context: { ...this.context, ...context } });
  }
}
