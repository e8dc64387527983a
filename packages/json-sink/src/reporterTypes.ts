/**
 * Callback surface a host reporting framework drives.
 *
 * The host owns subscriptions and scheduling. It calls `init` once, then
 * `report` for every subscribed sample, and serializes all calls to one
 * reporter instance. Everything except `report` is a pass-through.
 */

export type MetricSegment = string | number | symbol;

/** Hierarchical metric path, e.g. `['cpu', 'load']`. Never empty. */
export type MetricIdentifier = readonly MetricSegment[];

/** Statistic label of a report, e.g. `mean`, `count` or `95`. */
export type Datapoint = MetricSegment;

export type RequestMethod = 'PUT' | 'POST';

export type ReporterOptions = Readonly<Record<string, unknown>>;

export type Handled<S> = { success: true; state: S };

export type ReportResult<S, E extends Error = Error> = Handled<S> | { success: false; error: E };

export type TerminateSignal = 'ignore';

export interface Reporter<S> {
  init(options: ReporterOptions): S;
  report(metric: MetricIdentifier, datapoint: Datapoint, extra: unknown, value: unknown, state: S): Promise<ReportResult<S>>;
  subscribe(metric: MetricIdentifier, datapoint: Datapoint, extra: unknown, interval: number, state: S): Handled<S>;
  unsubscribe(metric: MetricIdentifier, datapoint: Datapoint, extra: unknown, state: S): Handled<S>;
  call(message: unknown, from: unknown, state: S): Handled<S>;
  cast(message: unknown, state: S): Handled<S>;
  info(message: unknown, state: S): Handled<S>;
  newEntry(entry: unknown, state: S): Handled<S>;
  setOpts(metric: MetricIdentifier, options: ReporterOptions, status: string, state: S): Handled<S>;
  terminate(reason: unknown, state: S): TerminateSignal;
}
