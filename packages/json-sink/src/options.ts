import os from 'os';
import { z } from 'zod';
import { deepFreeze } from '@metricsink/config';
import type { ReporterOptions, RequestMethod } from './reporterTypes';

export const DEFAULT_SINK_URL = 'http://localhost:8000';
export const DEFAULT_REQUEST_METHOD: RequestMethod = 'PUT';
export const AUTO_HOSTNAME = 'auto';
export const JSON_CONTENT_TYPE = 'application/json';

export interface AdapterState {
  readonly sinkUrl: string;
  readonly requestMethod: RequestMethod;
  readonly hostname: string;
  readonly headers: Readonly<Record<string, string>>;
}

// Every field falls back instead of failing: init never rejects a configuration.
const lenient = <T extends z.ZodTypeAny>(schema: T) => schema.optional().catch(undefined);

export const ReporterOptionsSchema = z.object({
  sink_url: lenient(z.string().min(1)),
  json_sink_url: lenient(z.string().min(1)),
  request_type: z.unknown(),
  json_http_request_type: z.unknown(),
  hostname: lenient(z.string()),
  headers: lenient(z.record(z.string(), z.string()))
}).catch({});

/** Only `post` selects POST; anything else, including nothing, is PUT. */
export function validateRequestType(value: unknown): RequestMethod {
  const text = typeof value === 'symbol' ? value.description : value;
  return typeof text === 'string' && text.toLowerCase() === 'post' ? 'POST' : DEFAULT_REQUEST_METHOD;
}

export function checkHostname(hostname: string, lookupHostname: () => string = os.hostname): string {
  return hostname === AUTO_HOSTNAME ? lookupHostname() : hostname;
}

/** Static headers minus any content-type, which the transport always sets. */
export function staticHeaders(headers: Record<string, string> = {}): Record<string, string> {
  return Object.fromEntries(
    Object.entries(headers).filter(([name]) => name.toLowerCase() !== 'content-type')
  );
}

export function requestHeaders(state: AdapterState): Record<string, string> {
  return { ...state.headers, 'content-type': JSON_CONTENT_TYPE };
}

export function resolveReporterState(options: ReporterOptions, lookupHostname?: () => string): AdapterState {
  const opts = ReporterOptionsSchema.parse(options);
  const state: AdapterState = {
    sinkUrl: opts.sink_url ?? opts.json_sink_url ?? DEFAULT_SINK_URL,
    requestMethod: validateRequestType(opts.request_type ?? opts.json_http_request_type),
    hostname: checkHostname(opts.hostname ?? AUTO_HOSTNAME, lookupHostname),
    headers: staticHeaders(opts.headers)
  };
  return deepFreeze(state);
}
