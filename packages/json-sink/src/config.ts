import { z } from 'zod';
import { BaseModuleConfigSchema, loadConfig } from '@metricsink/config';
import { createLogger, LogSink } from '@metricsink/obs';
import { JsonSinkReporter, JsonSinkReporterDeps } from './jsonSinkReporter';
import type { AdapterState } from './options';

export const JSON_SINK_MODULE = 'json_sink';

export const JsonSinkFileConfigSchema = BaseModuleConfigSchema.extend({
  sink_url: z.coerce.string().min(1).optional(),
  json_sink_url: z.coerce.string().min(1).optional(),
  request_type: z.coerce.string().optional(),
  json_http_request_type: z.coerce.string().optional(),
  hostname: z.coerce.string().optional(),
  headers: z.record(z.string(), z.coerce.string()).optional()
}).strict();

export type JsonSinkFileConfig = z.infer<typeof JsonSinkFileConfigSchema>;

export interface JsonSinkLoadOptions {
  cfgDir?: string;
  env?: NodeJS.ProcessEnv;
}

/** Reads `<cfgDir>/json_sink.yaml` plus METRICSINK_JSON_SINK__* overrides. */
export function loadReporterOptions(opts: JsonSinkLoadOptions = {}): JsonSinkFileConfig {
  return loadConfig({ moduleName: JSON_SINK_MODULE, ...opts }, JsonSinkFileConfigSchema);
}

export interface JsonSinkSession {
  reporter: JsonSinkReporter;
  state: AdapterState;
}

export type BootstrapOptions = JsonSinkLoadOptions & Omit<JsonSinkReporterDeps, 'logger'> & {
  logSink?: LogSink;
};

/**
 * Load the file configuration, build a reporter logging at the configured
 * level and run `init`. Returns undefined when the reporter is disabled.
 */
export function bootstrapJsonSink(options: BootstrapOptions = {}): JsonSinkSession | undefined {
  const { cfgDir, env, logSink, ...deps } = options;
  const config = loadReporterOptions({ cfgDir, env });
  if (!config.enabled) return undefined;

  const logger = createLogger('json-sink', { level: config.logLevel, sink: logSink, piiMaxLevel: 'low' });
  const reporter = new JsonSinkReporter({ ...deps, logger });
  return { reporter, state: reporter.init(config) };
}
