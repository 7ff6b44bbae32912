export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  DEFAULT_REDACT_KEYS,
  type Logger,
  type LogEntry,
} from './logging.js';
