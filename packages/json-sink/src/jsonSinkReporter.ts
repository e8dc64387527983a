import { inspect } from 'util';
import { createLogger, Logger } from '@metricsink/obs';
import { buildEnvelope } from './envelope';
import { SinkTransportError } from './errors';
import { unixTime } from './metricName';
import { AdapterState, requestHeaders, resolveReporterState } from './options';
import type {
  Datapoint,
  Handled,
  MetricIdentifier,
  Reporter,
  ReporterOptions,
  ReportResult,
  TerminateSignal
} from './reporterTypes';
import { createAxiosTransport, SinkTransport, toTransportError } from './transport';

export interface JsonSinkReporterDeps {
  logger?: Logger;
  transport?: SinkTransport;
  clock?: () => Date;
  lookupHostname?: () => string;
}

const describeTerm = (value: unknown) => inspect(value, { depth: 4, breakLength: Infinity });

/**
 * Reporter that forwards every sample to an HTTP sink as a JSON document.
 *
 * One request per `report`, no retries, no buffering. Only a missing response
 * counts as a failure; the sink's status code is logged and otherwise ignored.
 */
export class JsonSinkReporter implements Reporter<AdapterState> {
  private readonly logger: Logger;
  private readonly transport: SinkTransport;
  private readonly clock: () => Date;
  private readonly lookupHostname?: () => string;

  constructor(deps: JsonSinkReporterDeps = {}) {
    this.logger = deps.logger ?? createLogger('json-sink', { piiMaxLevel: 'low' });
    this.transport = deps.transport ?? createAxiosTransport();
    this.clock = deps.clock ?? (() => new Date());
    this.lookupHostname = deps.lookupHostname;
  }

  init(options: ReporterOptions = {}): AdapterState {
    const state = resolveReporterState(options, this.lookupHostname);
    this.logger.info('JSON sink reporter initialized', {
      sinkUrl: state.sinkUrl,
      requestMethod: state.requestMethod,
      hostname: state.hostname
    }, 'low');
    return state;
  }

  async report(
    metric: MetricIdentifier,
    datapoint: Datapoint,
    _extra: unknown,
    value: unknown,
    state: AdapterState
  ): Promise<ReportResult<AdapterState, SinkTransportError>> {
    const envelope = buildEnvelope({
      metric,
      datapoint,
      value,
      timestamp: unixTime(this.clock()),
      hostname: state.hostname
    });
    const body = JSON.stringify(envelope);

    try {
      const { status } = await this.transport({
        method: state.requestMethod,
        url: state.sinkUrl,
        headers: requestHeaders(state),
        body
      });
      this.logger.info(`Sink return status code: ${status}`, { status, metric: envelope.body.name });
      return { success: true, state };
    } catch (error) {
      const failure = toTransportError(error, state.sinkUrl);
      this.logger.error(`Sink returned error: ${failure.message}`, {
        url: state.sinkUrl,
        code: failure.code,
        metric: envelope.body.name
      }, 'low');
      return { success: false, error: failure };
    }
  }

  subscribe(_metric: MetricIdentifier, _datapoint: Datapoint, _extra: unknown, _interval: number, state: AdapterState): Handled<AdapterState> {
    return { success: true, state };
  }

  unsubscribe(_metric: MetricIdentifier, _datapoint: Datapoint, _extra: unknown, state: AdapterState): Handled<AdapterState> {
    return { success: true, state };
  }

  call(message: unknown, from: unknown, state: AdapterState): Handled<AdapterState> {
    this.logger.info(`Unknown call ${describeTerm(message)} from ${describeTerm(from)}`);
    return { success: true, state };
  }

  cast(message: unknown, state: AdapterState): Handled<AdapterState> {
    this.logger.info(`Unknown cast: ${describeTerm(message)}`);
    return { success: true, state };
  }

  info(message: unknown, state: AdapterState): Handled<AdapterState> {
    this.logger.info(`Unknown info: ${describeTerm(message)}`);
    return { success: true, state };
  }

  newEntry(_entry: unknown, state: AdapterState): Handled<AdapterState> {
    return { success: true, state };
  }

  setOpts(_metric: MetricIdentifier, _options: ReporterOptions, _status: string, state: AdapterState): Handled<AdapterState> {
    return { success: true, state };
  }

  terminate(_reason: unknown, _state: AdapterState): TerminateSignal {
    return 'ignore';
  }
}
