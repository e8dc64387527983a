export { LogEventSchema, LogLevelSchema, PiiLevelSchema } from './logTypes';
export type { LogEvent, LogLevel, LogSink, PiiLevel } from './logTypes';
export { scrubLogPII, REDACTED } from './piiScrubber';
export { createLogger, createMemoryLogger, consoleSink, isLevelEnabled } from './logger';
export type { Logger, LoggerOptions, LogContext } from './logger';
