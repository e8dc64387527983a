import { METRIC_ENVELOPE_TYPE, SinkReportEnvelope } from '@metricsink/contracts';
import { formatMetricName, segmentToString } from './metricName';
import type { Datapoint, MetricIdentifier } from './reporterTypes';

export interface EnvelopeInput {
  metric: MetricIdentifier;
  datapoint: Datapoint;
  value: unknown;
  timestamp: number;
  hostname: string;
}

export function buildEnvelope({ metric, datapoint, value, timestamp, hostname }: EnvelopeInput): SinkReportEnvelope {
  return {
    type: METRIC_ENVELOPE_TYPE,
    body: {
      name: formatMetricName(metric),
      value,
      timestamp,
      host: hostname,
      instance: segmentToString(datapoint)
    }
  };
}
