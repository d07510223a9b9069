import type { RawSettings } from '../types/config.js';

export const DEFAULT_SETTINGS = {
  baseUrl: 'http://127.0.0.1:5080',
  org: 'default',
  timeout: 30,
  transport: 'stdio',
  host: '127.0.0.1',
  port: 8001,
  statelessHttp: false,
  authDisabled: false,
  maxRows: 1000,
  maxChars: 50_000,
  defaultStream: 'default',
  logLevel: 'info',
} satisfies RawSettings;

export const MCP_HTTP_PATH = '/mcp';

export const MIN_MAX_CHARS = 1000;

/** Environment variable → setting. */
export const ENV_VARS: ReadonlyArray<readonly [string, keyof RawSettings]> = [
  ['OO_MCP_CONFIG_PATH', 'configPath'],
  ['ZO_BASE_URL', 'baseUrl'],
  ['ZO_ORG', 'org'],
  ['ZO_ROOT_USER_EMAIL', 'email'],
  ['ZO_ROOT_USER_PASSWORD', 'password'],
  ['ZO_ACCESS_KEY', 'accessKey'],
  ['ZO_TIMEOUT', 'timeout'],
  ['MCP_TRANSPORT', 'transport'],
  ['MCP_HOST', 'host'],
  ['MCP_PORT', 'port'],
  ['OPENOBSERVE_MCP_AUTH_TOKEN', 'authToken'],
  ['MCP_MAX_ROWS', 'maxRows'],
  ['MCP_MAX_CHARS', 'maxChars'],
  ['MCP_DEFAULT_STREAM', 'defaultStream'],
  ['MCP_LOG_LEVEL', 'logLevel'],
];
