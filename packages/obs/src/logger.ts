import { LogEvent, LogLevel, LogLevelSchema, LogSink, PiiLevel } from './logTypes';
import { scrubLogPII } from './piiScrubber';

export type LogContext = Record<string, unknown>;

type LogMethod = (message: string, context?: LogContext, pii?: PiiLevel) => void;

export interface Logger {
  readonly module: string;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

export interface LoggerOptions {
  /** Lowest level that reaches the sink (default: info) */
  level?: LogLevel;
  /** Receives every emitted event (default: JSON lines on stdout/stderr) */
  sink?: LogSink;
  /** Events tagged above this level are redacted before they reach the sink */
  piiMaxLevel?: PiiLevel;
  clock?: () => Date;
}

const LEVELS = LogLevelSchema.options;

export const consoleSink: LogSink = (event) => {
  const line = JSON.stringify(event);
  if (event.level === 'error' || event.level === 'fatal') {
    console.error(line);
  } else {
    console.log(line);
  }
};

export function isLevelEnabled(threshold: LogLevel, level: LogLevel): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(threshold);
}

/**
 * Build a logger that turns each call into a LogEvent for the given module.
 * Loggers are plain values; pass them to the components that need one.
 */
export function createLogger(module: string, options: LoggerOptions = {}): Logger {
  const threshold = options.level ?? 'info';
  const sink = options.sink ?? consoleSink;
  const piiMaxLevel = options.piiMaxLevel ?? 'none';
  const clock = options.clock ?? (() => new Date());

  const emit = (level: LogLevel): LogMethod => (message, context, pii = 'none') => {
    if (!isLevelEnabled(threshold, level)) return;
    const event: LogEvent = {
      timestamp: clock().toISOString(),
      level,
      message,
      module,
      ...(context ? { context } : {}),
      pii
    };
    sink(scrubLogPII(event, piiMaxLevel));
  };

  return {
    module,
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error')
  };
}

/** Logger that keeps its events in memory, for tests and embedding hosts. */
export function createMemoryLogger(module: string, options: Omit<LoggerOptions, 'sink'> = {}): Logger & { events: LogEvent[] } {
  const events: LogEvent[] = [];
  return { ...createLogger(module, { ...options, sink: (e) => events.push(e) }), events };
}
