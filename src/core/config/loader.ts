import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import type { Credential, LogLevel, RawSettings, ServerConfig, TransportMode } from '../types/config.js';
import { ConfigurationError } from '../helpers/errors.js';
import { isLogLevel } from '../helpers/logger.js';
import { DEFAULT_SETTINGS, ENV_VARS, MCP_HTTP_PATH, MIN_MAX_CHARS } from './defaults.js';

const numberish = z.union([z.number(), z.string()]);

const FileSettingsSchema = z
  .object({
    baseUrl: z.string(),
    org: z.string(),
    email: z.string(),
    password: z.string(),
    accessKey: z.string(),
    timeout: numberish,
    transport: z.string(),
    host: z.string(),
    port: numberish,
    statelessHttp: z.boolean(),
    authToken: z.string(),
    authDisabled: z.boolean(),
    maxRows: numberish,
    maxChars: numberish,
    defaultStream: z.string(),
    logLevel: z.string(),
  })
  .partial()
  .strict();

export interface LoadConfigOptions {
  /** Highest-precedence values (CLI flags, plugin host config). */
  overrides?: RawSettings;
  env?: NodeJS.ProcessEnv;
}

function compact(settings: RawSettings): RawSettings {
  const result: RawSettings = {};
  for (const [key, value] of Object.entries(settings)) {
    if (value !== undefined && value !== '') Object.assign(result, { [key]: value });
  }
  return result;
}

function settingsFromEnv(env: NodeJS.ProcessEnv): RawSettings {
  const settings: RawSettings = {};
  for (const [name, key] of ENV_VARS) {
    const value = env[name];
    if (value !== undefined && value !== '') Object.assign(settings, { [key]: value });
  }
  return settings;
}

function loadJsonFile(path: string): RawSettings {
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    throw new ConfigurationError(`Config file not found: ${fullPath}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (e) {
    throw new ConfigurationError(`Failed to parse ${fullPath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseSettings(parsed, `config file ${fullPath}`);
}

/** Checks a settings object from an untyped source (JSON file, plugin host). */
export function parseSettings(value: unknown, source: string): RawSettings {
  const result = FileSettingsSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid ${source}: ${issues}`);
  }
  return result.data;
}

/* ─── Validators ──────────────────────────────────────── */

export function validateUrl(url: string, name: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ConfigurationError(`Invalid ${name}: '${url}'. Must include scheme and host (e.g., http://localhost:5080)`);
  }
  if (!['http:', 'https:'].includes(parsed.protocol) || !parsed.host) {
    throw new ConfigurationError(`Invalid ${name}: '${url}'. Must include scheme and host (e.g., http://localhost:5080)`);
  }
  return url.replace(/\/+$/, '');
}

export function parseInteger(value: number | string, name: string, minVal: number, maxVal = Number.MAX_SAFE_INTEGER): number {
  const n = typeof value === 'number' ? value : /^-?\d+$/.test(value.trim()) ? Number(value.trim()) : Number.NaN;
  if (!Number.isInteger(n)) {
    throw new ConfigurationError(`Invalid ${name}: '${value}'. Must be an integer`);
  }
  if (n < minVal || n > maxVal) {
    const range = maxVal === Number.MAX_SAFE_INTEGER ? `>= ${minVal}` : `between ${minVal} and ${maxVal}`;
    throw new ConfigurationError(`Invalid ${name}: ${n}. Must be ${range}`);
  }
  return n;
}

function resolveCredential(settings: RawSettings): Credential {
  if (settings.accessKey) return { mode: 'access_key', accessKey: settings.accessKey };
  if (settings.email && settings.password) {
    return { mode: 'basic', email: settings.email, password: settings.password };
  }
  if (settings.email || settings.password) {
    const missing = settings.email ? 'ZO_ROOT_USER_PASSWORD' : 'ZO_ROOT_USER_EMAIL';
    throw new ConfigurationError(`${missing} is required when using email/password auth`);
  }
  throw new ConfigurationError(
    'Authentication required. Provide either ZO_ACCESS_KEY (recommended), ' +
      'or both ZO_ROOT_USER_EMAIL and ZO_ROOT_USER_PASSWORD',
  );
}

function resolveTransport(value: string): TransportMode {
  if (value === 'stdio' || value === 'http') return value;
  throw new ConfigurationError(`Invalid transport: '${value}'. Must be 'stdio' or 'http'`);
}

function resolveLogLevel(value: string): LogLevel {
  const level = value.toLowerCase();
  if (isLogLevel(level)) return level;
  throw new ConfigurationError(`Invalid log level: '${value}'. Must be one of debug, info, warn, error`);
}

/* ─── Loader ──────────────────────────────────────────── */

/**
 * Builds the server configuration from defaults, an optional JSON file,
 * the environment and explicit overrides (in that order of precedence).
 * Throws `ConfigurationError` on the first invalid setting.
 */
export function loadConfig(options: LoadConfigOptions = {}): ServerConfig {
  const fromEnv = settingsFromEnv(options.env ?? process.env);
  const overrides = compact(options.overrides ?? {});

  const configPath = overrides.configPath ?? fromEnv.configPath;
  const fromFile = configPath ? compact(loadJsonFile(configPath)) : {};

  const settings = { ...DEFAULT_SETTINGS, ...fromFile, ...fromEnv, ...overrides };

  const baseUrl = validateUrl(settings.baseUrl, 'ZO_BASE_URL');
  const org = settings.org.trim();
  if (!org) {
    throw new ConfigurationError('Organization name is required. Set ZO_ORG or use --org');
  }
  const credential = resolveCredential(settings);
  const timeoutSeconds = parseInteger(settings.timeout, 'timeout', 1);
  const maxRows = parseInteger(settings.maxRows, 'max-rows', 1);
  const maxChars = parseInteger(settings.maxChars, 'max-chars', MIN_MAX_CHARS);
  const transport = resolveTransport(settings.transport);
  const port = transport === 'http' ? parseInteger(settings.port, 'port', 1, 65535) : parseInteger(settings.port, 'port', 0);

  const authToken = settings.authToken ?? null;
  const authDisabled = settings.authDisabled;
  if (transport === 'http' && !authDisabled && !authToken) {
    throw new ConfigurationError(
      'HTTP transport requires authentication. Set OPENOBSERVE_MCP_AUTH_TOKEN or use --auth-disabled (local/dev only)',
    );
  }

  const defaultStream = settings.defaultStream.trim();
  if (!defaultStream) {
    throw new ConfigurationError('Default stream name cannot be empty');
  }

  const config: ServerConfig = {
    connection: Object.freeze({ baseUrl, org, credential: Object.freeze(credential), timeoutSeconds }),
    limits: Object.freeze({ maxRows, maxChars }),
    defaultStream,
    transport,
    http: Object.freeze({
      host: settings.host,
      port,
      path: MCP_HTTP_PATH,
      stateless: settings.statelessHttp,
      authToken,
      authDisabled,
    }),
    logLevel: resolveLogLevel(settings.logLevel),
  };
  return Object.freeze(config);
}

/** Describes the credential mode without revealing it. */
export function describeCredential(credential: Credential): string {
  return credential.mode === 'access_key' ? 'access_key' : 'email/password';
}
