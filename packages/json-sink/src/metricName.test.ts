import { describe, test, expect } from '@jest/globals';
import { formatMetricName, segmentToString, unixTime } from './metricName';
import { MetricNameError } from './errors';

describe('formatMetricName', () => {
  test('joins segments with underscores in order', () => {
    expect(formatMetricName(['cpu', 'load'])).toBe('cpu_load');
    expect(formatMetricName(['db', 'pool', 'checkout'])).toBe('db_pool_checkout');
  });

  test('single segment has no separator', () => {
    expect(formatMetricName(['uptime'])).toBe('uptime');
    expect(formatMetricName([7])).toBe('7');
  });

  test('mixes symbolic, numeric and string segments', () => {
    expect(formatMetricName([Symbol('runtime'), 'vm', 3, Symbol.for('memory')])).toBe('runtime_vm_3_memory');
  });

  test('keeps underscores inside segments', () => {
    expect(formatMetricName(['http_server', 'requests'])).toBe('http_server_requests');
  });

  test('rejects an empty identifier', () => {
    expect(() => formatMetricName([])).toThrow(MetricNameError);
  });
});

describe('segmentToString', () => {
  test('renders numbers as decimal text', () => {
    expect(segmentToString(95)).toBe('95');
    expect(segmentToString(-1)).toBe('-1');
  });

  test('uses a symbol description', () => {
    expect(segmentToString(Symbol('mean'))).toBe('mean');
    expect(segmentToString(Symbol())).toBe('');
  });
});

describe('unixTime', () => {
  test('matches the epoch seconds of a fixed instant', () => {
    expect(unixTime(new Date('2015-06-01T12:00:00Z'))).toBe(1433160000);
    expect(unixTime(new Date('1970-01-01T00:00:00Z'))).toBe(0);
  });

  test('drops sub-second precision', () => {
    expect(unixTime(new Date('2015-06-01T12:00:00.999Z'))).toBe(1433160000);
  });

  test('defaults to the current time', () => {
    const before = Math.floor(Date.now() / 1000);
    const now = unixTime();
    expect(now).toBeGreaterThanOrEqual(before);
    expect(now).toBeLessThanOrEqual(before + 1);
  });
});
