export { bigintReplacer, createLogger } from './logger.js';
export { createFileSink, createMemorySink } from './sink.js';
export type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogSink,
} from './types.js';
