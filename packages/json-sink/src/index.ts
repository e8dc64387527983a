export { JsonSinkReporter } from './jsonSinkReporter';
export type { JsonSinkReporterDeps } from './jsonSinkReporter';
export {
  AUTO_HOSTNAME,
  DEFAULT_REQUEST_METHOD,
  DEFAULT_SINK_URL,
  JSON_CONTENT_TYPE,
  ReporterOptionsSchema,
  checkHostname,
  requestHeaders,
  resolveReporterState,
  staticHeaders,
  validateRequestType
} from './options';
export type { AdapterState } from './options';
export { formatMetricName, segmentToString, unixTime, NAME_SEPARATOR } from './metricName';
export { buildEnvelope } from './envelope';
export type { EnvelopeInput } from './envelope';
export { createAxiosTransport, toTransportError } from './transport';
export type { SinkRequest, SinkResponse, SinkTransport } from './transport';
export { MetricNameError, SinkTransportError } from './errors';
export {
  JSON_SINK_MODULE,
  JsonSinkFileConfigSchema,
  bootstrapJsonSink,
  loadReporterOptions
} from './config';
export type { BootstrapOptions, JsonSinkFileConfig, JsonSinkLoadOptions, JsonSinkSession } from './config';
export type {
  Datapoint,
  Handled,
  MetricIdentifier,
  MetricSegment,
  Reporter,
  ReporterOptions,
  ReportResult,
  RequestMethod,
  TerminateSignal
} from './reporterTypes';
