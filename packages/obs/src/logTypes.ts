import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'fatal']);

export const PiiLevelSchema = z.enum(['none', 'low', 'basic', 'strict']);

export const LogEventSchema = z.object({
  timestamp: z.string().datetime(),
  level: LogLevelSchema,
  message: z.string(),
  module: z.string(),
  context: z.record(z.string(), z.unknown()).optional(),
  pii: PiiLevelSchema.default('none'),
  meta: z.record(z.string(), z.unknown()).optional()
}).strict();

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type PiiLevel = z.infer<typeof PiiLevelSchema>;
export type LogEvent = z.infer<typeof LogEventSchema>;

export type LogSink = (event: LogEvent) => void;
