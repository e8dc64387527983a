import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';

export interface LoadOptions {
  moduleName: string;
  cfgDir?: string; // default ./cfg
  env?: NodeJS.ProcessEnv; // default process.env
}

export const ENV_PREFIX = 'METRICSINK';

// Reporter schemas extend this one
export const BaseModuleConfigSchema = z.object({
  enabled: z.boolean().default(true),
  logLevel: z.enum(['debug','info','warn','error']).default('info')
}).strict();

export type BaseModuleConfig = z.infer<typeof BaseModuleConfigSchema>;

type ConfigTree = Record<string, unknown>;

export function envPrefix(moduleName: string): string {
  return `${ENV_PREFIX}_${moduleName.toUpperCase()}__`;
}

export function loadConfig<T extends z.ZodTypeAny>(opts: LoadOptions, schema: T): z.infer<T> {
  const dir = path.resolve(opts.cfgDir || path.resolve(process.cwd(), 'cfg'));
  const file = path.join(dir, `${opts.moduleName}.yaml`);

  let raw: ConfigTree = {};
  if (fs.existsSync(file)) {
    const doc = yaml.load(fs.readFileSync(file, 'utf8'));
    if (isTree(doc)) raw = doc;
  }

  // ENV overrides: METRICSINK_<MODULE>__KEY=VALUE (double underscore for nested)
  const prefix = envPrefix(opts.moduleName);
  for (const [k, v] of Object.entries(opts.env ?? process.env)) {
    if (!k.startsWith(prefix) || v === undefined) continue;
    const pathKeys = k.substring(prefix.length).split('__').filter(Boolean);
    if (pathKeys.length === 0) continue;
    setDeep(raw, pathKeys, v);
  }

  const parsed: z.infer<T> = schema.parse(raw);
  return deepFreeze(parsed);
}

function isTree(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setDeep(obj: ConfigTree, keys: string[], value: string): void {
  let cur = obj;
  for (const segment of keys.slice(0, -1)) {
    const k = findExistingKey(cur, segment) ?? segment.toLowerCase();
    const next = cur[k];
    if (isTree(next)) {
      cur = next;
    } else {
      const created: ConfigTree = {};
      cur[k] = created;
      cur = created;
    }
  }
  const leaf = keys[keys.length - 1];
  const leafKey = findExistingKey(cur, leaf) ?? leaf.toLowerCase();
  // a string in the file stays a string, whatever the override looks like
  cur[leafKey] = typeof cur[leafKey] === 'string' ? value : coerceEnv(value);
}

// SINK_URL matches sink_url and sinkUrl; X_TOKEN matches x-token
function findExistingKey(obj: ConfigTree, envSegment: string): string | undefined {
  const norm = (s: string) => s.replace(/[_-]/g, '').toLowerCase();
  const wanted = norm(envSegment);
  return Object.keys(obj).find(kk => norm(kk) === wanted);
}

export function coerceEnv(v: string): string | number | boolean {
  if (v === 'true') return true;
  if (v === 'false') return false;
  if (v.trim() === '') return v;
  const num = Number(v);
  if (!Number.isNaN(num)) return num;
  return v;
}

export function deepFreeze<T>(o: T): T {
  if (typeof o !== 'object' || o === null) return o;
  Object.freeze(o);
  for (const value of Object.values(o)) {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return o;
}
