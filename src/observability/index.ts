/**
 * Observability components.
 *
 * @module observability
 */

export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  parseLogLevel,
  redactSensitive,
} from './logging.js';
export type { Logger, LogLevelName, LogSink, LogRecord } from './logging.js';
