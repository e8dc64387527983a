import { LogEvent, PiiLevel, PiiLevelSchema } from './logTypes';

// PII levels: none < low < basic < strict
const PII_LEVELS = PiiLevelSchema.options;

export const REDACTED = '[REDACTED]';

/**
 * Scrub a log event according to the max allowed PII level.
 * Events tagged above maxLevel keep their shape but lose their message and context values.
 */
export function scrubLogPII(event: LogEvent, maxLevel: PiiLevel = 'none'): LogEvent {
  if (event.pii === 'none') return event;
  if (PII_LEVELS.indexOf(event.pii) <= PII_LEVELS.indexOf(maxLevel)) return event;
  return {
    ...event,
    message: REDACTED,
    context: event.context
      ? Object.fromEntries(Object.keys(event.context).map(k => [k, REDACTED]))
      : undefined
  };
}
