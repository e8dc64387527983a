export class MetricNameError extends Error {
  constructor(message: string, public readonly segments: readonly unknown[]) {
    super(message);
    this.name = 'MetricNameError';
  }
}

/** The request never produced an HTTP response. */
export class SinkTransportError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly code?: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'SinkTransportError';
  }
}
