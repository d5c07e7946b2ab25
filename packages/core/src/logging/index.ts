export {
  JsonLineLogger,
  MemoryLogger,
  noopLogger,
  withMinimumLevel,
  type JsonLineLoggerOptions,
  type LogLevel,
  type StructuredLogEvent,
  type StructuredLogger,
} from './structured-logger.js';
