/**
 * Layered Configuration
 *
 * Every process builds its config from four layers, later ones winning:
 * schema defaults, a JSON file (`--config`), COLDMESH_* environment
 * variables, then command-line flags. Layers are plain nested objects; the
 * merged result is validated once with the process's zod schema.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { DEFAULT_BACKOFF } from './backoff.js';
import { describeError } from './errors.js';

/** Backoff policy with every field defaulted, so a layer may set just one */
export const RetryConfigSchema = z
  .object({
    baseDelayMs: z.number().int().positive().default(DEFAULT_BACKOFF.baseDelayMs),
    factor: z.number().min(1).default(DEFAULT_BACKOFF.factor),
    jitterRatio: z.number().min(0).max(1).default(DEFAULT_BACKOFF.jitterRatio),
    maxDelayMs: z.number().int().positive().default(DEFAULT_BACKOFF.maxDelayMs),
    maxAttempts: z.number().int().min(1).default(DEFAULT_BACKOFF.maxAttempts),
  })
  .default({});

/** Transmission settings shared by both ends of the link */
export const EndpointConfigSchema = z.object({
  /** Largest transport packet, in bytes */
  mtu: z.number().int().min(32).default(465),
  reassemblyTimeoutMs: z.number().int().positive().default(600_000),
  retry: RetryConfigSchema,
  replayTtlMs: z.number().int().positive().default(86_400_000),
  replayMaxEntries: z.number().int().positive().default(10_000),
});

export type EndpointConfig = z.infer<typeof EndpointConfigSchema>;

export type ConfigLayer = { [key: string]: unknown };

export type ValueKind = 'string' | 'int' | 'number' | 'bool';

/** Config path (dotted) and how to read the raw string */
export type Binding = readonly [path: string, kind: ValueKind];

function isLayer(value: unknown): value is ConfigLayer {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function mergeLayers(...layers: ConfigLayer[]): ConfigLayer {
  const result: ConfigLayer = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      const current = result[key];
      result[key] = isLayer(current) && isLayer(value) ? mergeLayers(current, value) : value;
    }
  }
  return result;
}

export function setPath(layer: ConfigLayer, path: string, value: unknown): void {
  const parts = path.split('.');
  let node = layer;
  for (const part of parts.slice(0, -1)) {
    const next = node[part];
    if (isLayer(next)) {
      node = next;
    } else {
      const created: ConfigLayer = {};
      node[part] = created;
      node = created;
    }
  }
  node[parts[parts.length - 1] ?? path] = value;
}

export function convertValue(name: string, raw: string, kind: ValueKind): string | number | boolean {
  switch (kind) {
    case 'string':
      return raw;
    case 'int': {
      if (!/^-?\d+$/.test(raw)) {
        throw new Error(`${name} must be an integer, got "${raw}"`);
      }
      return parseInt(raw, 10);
    }
    case 'number': {
      const value = Number(raw);
      if (raw.trim() === '' || !Number.isFinite(value)) {
        throw new Error(`${name} must be a number, got "${raw}"`);
      }
      return value;
    }
    case 'bool': {
      if (raw === 'true' || raw === '1') return true;
      if (raw === 'false' || raw === '0') return false;
      throw new Error(`${name} must be true or false, got "${raw}"`);
    }
  }
}

/** Build a layer from the environment variables named in `bindings` */
export function envLayer(env: NodeJS.ProcessEnv, bindings: Record<string, Binding>): ConfigLayer {
  const layer: ConfigLayer = {};
  for (const [name, [path, kind]] of Object.entries(bindings)) {
    const raw = env[name];
    if (raw === undefined || raw === '') continue;
    setPath(layer, path, convertValue(name, raw, kind));
  }
  return layer;
}

export async function readConfigFile(path: string): Promise<ConfigLayer> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new Error(`Cannot read config file ${path}: ${describeError(err)}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new Error(`Config file ${path} is not valid JSON: ${describeError(err)}`);
  }
  if (!isLayer(parsed)) {
    throw new Error(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

/** Environment bindings for the transmission settings */
export const ENDPOINT_ENV: Record<string, Binding> = {
  COLDMESH_MTU: ['mtu', 'int'],
  COLDMESH_REASSEMBLY_TIMEOUT_MS: ['reassemblyTimeoutMs', 'int'],
  COLDMESH_RETRY_BASE_MS: ['retry.baseDelayMs', 'int'],
  COLDMESH_RETRY_FACTOR: ['retry.factor', 'number'],
  COLDMESH_RETRY_JITTER: ['retry.jitterRatio', 'number'],
  COLDMESH_RETRY_MAX_MS: ['retry.maxDelayMs', 'int'],
  COLDMESH_RETRY_ATTEMPTS: ['retry.maxAttempts', 'int'],
  COLDMESH_REPLAY_TTL_MS: ['replayTtlMs', 'int'],
  COLDMESH_REPLAY_MAX_ENTRIES: ['replayMaxEntries', 'int'],
};

/** Flag bindings for the transmission settings */
export const ENDPOINT_FLAGS: Record<string, Binding> = {
  '--mtu': ['mtu', 'int'],
  '--reassembly-timeout-ms': ['reassemblyTimeoutMs', 'int'],
  '--retry-base-ms': ['retry.baseDelayMs', 'int'],
  '--retry-attempts': ['retry.maxAttempts', 'int'],
  '--replay-ttl-ms': ['replayTtlMs', 'int'],
};

export interface FlagParse {
  layer: ConfigLayer;
  /** Arguments no binding consumed, in order */
  rest: string[];
}

/**
 * Turn `--flag value` pairs named in `bindings` into a layer. Boolean
 * bindings take no value.
 */
export function flagLayer(args: string[], bindings: Record<string, Binding>): FlagParse {
  const layer: ConfigLayer = {};
  const rest: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    const binding = bindings[arg];
    if (!binding) {
      rest.push(arg);
      continue;
    }
    const [path, kind] = binding;
    if (kind === 'bool') {
      setPath(layer, path, true);
      continue;
    }
    const next = args[i + 1];
    if (next === undefined) {
      throw new Error(`${arg} needs a value`);
    }
    setPath(layer, path, convertValue(arg, next, kind));
    i++;
  }

  return { layer, rest };
}

/**
 * Describe the first issue of a failed config parse as `path: message`.
 */
export function describeConfigIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid configuration';
  return `${issue.path.join('.') || '(root)'}: ${issue.message}`;
}
