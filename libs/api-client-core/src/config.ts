import { access, readFile } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';

const nonNegative = z.number().finite().nonnegative();
const retries = z.number().int().nonnegative();

/** Serialisable client settings, as found in config files and the environment. */
export const clientConfigSchema = z
  .object({
    baseUrl: z.string().url(),
    authIdent: z.string().min(1),
    debugLevel: z.number().int().min(1).max(5),
    timeoutSeconds: nonNegative.nullable(),
    requestWaitSeconds: nonNegative,
    requestWaitWithResponseTime: z.boolean(),
    requestWarnElapsedSeconds: nonNegative,
    ratelimitRetries: retries,
    ratelimitWaitSeconds: nonNegative,
    transientErrorRetries: retries,
    transientErrorWaitSeconds: nonNegative,
    proxyUrl: z.string().url(),
    tlsVerify: z.boolean(),
    allowRedirects: z.boolean(),
    autoAuthenticate: z.boolean(),
    decodeContentTypes: z.array(z.string().min(1)),
    defaultHeaders: z.record(z.string()),
  })
  .partial()
  .strict();

export type ClientSettings = z.infer<typeof clientConfigSchema>;

export const DEFAULT_CLIENT_SETTINGS = {
  debugLevel: 4,
  timeoutSeconds: 30,
  requestWaitSeconds: 0,
  requestWaitWithResponseTime: false,
  requestWarnElapsedSeconds: 5,
  ratelimitRetries: 0,
  ratelimitWaitSeconds: 0,
  transientErrorRetries: 1,
  transientErrorWaitSeconds: 0,
  tlsVerify: true,
  allowRedirects: false,
  autoAuthenticate: true,
  decodeContentTypes: ['application/json'],
} satisfies ClientSettings;

export class ClientConfigError extends Error {
  constructor(
    message: string,
    readonly source?: string,
    options?: { cause?: unknown },
  ) {
    super(source ? `${source}: ${message}` : message, options);
    this.name = 'ClientConfigError';
  }
}

function parseSettings(value: unknown, source: string): ClientSettings {
  const result = clientConfigSchema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ClientConfigError(`invalid client config (${details.join('; ')})`, source, { cause: result.error });
  }
  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a JSON config file. A file holding several clients is keyed by
 * config name; a flat object applies to any client.
 */
export async function readClientConfigFile(path: string, name?: string): Promise<ClientSettings> {
  let data: unknown;
  try {
    data = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    throw new ClientConfigError('could not read config file', path, { cause: error });
  }
  if (!isRecord(data)) {
    throw new ClientConfigError('expected a JSON object', path);
  }
  const section = name !== undefined ? data[name] : undefined;
  return parseSettings(isRecord(section) ? section : data, path);
}

type EnvKind = 'string' | 'number' | 'boolean' | 'nullable-number' | 'list' | 'json';

const ENV_KEYS: Record<keyof ClientSettings, EnvKind> = {
  baseUrl: 'string',
  authIdent: 'string',
  debugLevel: 'number',
  timeoutSeconds: 'nullable-number',
  requestWaitSeconds: 'number',
  requestWaitWithResponseTime: 'boolean',
  requestWarnElapsedSeconds: 'number',
  ratelimitRetries: 'number',
  ratelimitWaitSeconds: 'number',
  transientErrorRetries: 'number',
  transientErrorWaitSeconds: 'number',
  proxyUrl: 'string',
  tlsVerify: 'boolean',
  allowRedirects: 'boolean',
  autoAuthenticate: 'boolean',
  decodeContentTypes: 'list',
  defaultHeaders: 'json',
};

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

// Unparseable values are passed through unchanged so the schema reports them.
function convertEnvValue(raw: string, kind: EnvKind): unknown {
  const value = raw.trim();
  switch (kind) {
    case 'string':
      return value;
    case 'number': {
      const parsed = Number(value);
      return value !== '' && !Number.isNaN(parsed) ? parsed : value;
    }
    case 'nullable-number':
      return value === '' || value.toLowerCase() === 'none' ? null : convertEnvValue(value, 'number');
    case 'boolean': {
      const lowered = value.toLowerCase();
      if (TRUE_VALUES.has(lowered)) return true;
      if (FALSE_VALUES.has(lowered)) return false;
      return value;
    }
    case 'list':
      return value
        .split(',')
        .map((entry) => entry.trim())
        .filter(Boolean);
    case 'json':
      try {
        return JSON.parse(value);
      } catch {
        return value;
      }
  }
}

export function envKeyFor(prefix: string, key: string): string {
  return `${prefix}_${key.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toUpperCase()}`;
}

/** Reads `PREFIX_BASE_URL`, `PREFIX_RATELIMIT_RETRIES`, ... from `env`. */
export function clientConfigFromEnv(prefix: string, env: NodeJS.ProcessEnv = process.env): ClientSettings {
  const raw: Record<string, unknown> = {};
  for (const [key, kind] of Object.entries(ENV_KEYS)) {
    const value = env[envKeyFor(prefix, key)];
    if (value !== undefined) {
      raw[key] = convertEnvValue(value, kind);
    }
  }
  return parseSettings(raw, `env:${prefix}_*`);
}

export interface ResolveClientConfigOptions {
  /** Config name; used for file lookup, the file section and the env prefix. */
  name: string;
  /** Explicit file (or files, tried in order). Missing explicit files are an error. */
  path?: string | readonly string[];
  env?: NodeJS.ProcessEnv;
  /** Defaults to the upper-cased name. */
  envPrefix?: string;
  overrides?: ClientSettings;
}

export interface ResolvedClientConfig {
  /** File the settings were read from, if any. */
  source?: string;
  settings: ClientSettings;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function expandHome(path: string): string {
  return path === '~' || path.startsWith('~/') ? join(homedir(), path.slice(1)) : path;
}

export function defaultEnvPrefix(name: string): string {
  return name.replace(/[^A-Za-z0-9]+/g, '_').toUpperCase();
}

/**
 * Layers settings from the first config file found, then the environment,
 * then explicit overrides. Without an explicit path `<name>.json` and
 * `~/<name>.json` are searched and may both be absent.
 */
export async function resolveClientConfig(options: ResolveClientConfigOptions): Promise<ResolvedClientConfig> {
  const explicit = options.path !== undefined;
  const candidates =
    typeof options.path === 'string'
      ? [options.path]
      : options.path ?? [`${options.name}.json`, `~/${options.name}.json`];

  let source: string | undefined;
  let fileSettings: ClientSettings = {};
  for (const candidate of candidates.map(expandHome)) {
    if (await exists(candidate)) {
      source = candidate;
      fileSettings = await readClientConfigFile(candidate, options.name);
      break;
    }
  }
  if (explicit && source === undefined) {
    throw new ClientConfigError(`config not found in ${candidates.join(', ')}`);
  }

  const envSettings = clientConfigFromEnv(options.envPrefix ?? defaultEnvPrefix(options.name), options.env);
  return {
    source,
    settings: { ...fileSettings, ...envSettings, ...options.overrides },
  };
}
