import { MetricNameError } from './errors';
import type { MetricIdentifier, MetricSegment } from './reporterTypes';

export const NAME_SEPARATOR = '_';

export function segmentToString(segment: MetricSegment): string {
  if (typeof segment === 'symbol') return segment.description ?? '';
  return typeof segment === 'number' ? String(segment) : segment;
}

/** `['cpu', 'load']` → `cpu_load`. */
export function formatMetricName(metric: MetricIdentifier): string {
  if (metric.length === 0) {
    throw new MetricNameError('Metric identifier must have at least one segment', metric);
  }
  return metric.map(segmentToString).join(NAME_SEPARATOR);
}

/** Whole seconds since 1970-01-01T00:00:00Z. */
export function unixTime(at: Date = new Date()): number {
  return Math.floor(at.getTime() / 1000);
}
