import { Command, Option } from 'commander'
import type { RawSettings } from './core/types/config.js'
import { PLUGIN_NAME, PLUGIN_VERSION } from './core/plugin-id.js'

type CliOptions = {
  config?: string
  baseUrl?: string
  org?: string
  email?: string
  password?: string
  accessKey?: string
  timeout?: string
  transport?: string
  host?: string
  port?: string
  statelessHttp?: boolean
  authToken?: string
  authDisabled?: boolean
  maxRows?: string
  maxChars?: string
  defaultStream?: string
  logLevel?: string
}

export function buildProgram(): Command {
  return new Command()
    .name(PLUGIN_NAME)
    .description('MCP server for bounded, read-only access to OpenObserve')
    .version(PLUGIN_VERSION)
    .option('--config <path>', 'JSON settings file (env: OO_MCP_CONFIG_PATH)')
    .option('--base-url <url>', 'OpenObserve base URL (env: ZO_BASE_URL)')
    .option('--org <name>', 'organization (env: ZO_ORG)')
    .option('--email <email>', 'root user email (env: ZO_ROOT_USER_EMAIL)')
    .option('--password <password>', 'root user password (env: ZO_ROOT_USER_PASSWORD)')
    .option('--access-key <key>', 'base64 access key, sent as Basic auth (env: ZO_ACCESS_KEY)')
    .option('--timeout <seconds>', 'request timeout in seconds (env: ZO_TIMEOUT)')
    .addOption(new Option('--transport <mode>', 'transport (env: MCP_TRANSPORT)').choices(['stdio', 'http']))
    .option('--host <host>', 'HTTP bind host (env: MCP_HOST)')
    .option('--port <port>', 'HTTP port (env: MCP_PORT)')
    .option('--stateless-http', 'one server per HTTP request, no sessions')
    .option('--auth-token <token>', 'bearer token required on HTTP (env: OPENOBSERVE_MCP_AUTH_TOKEN)')
    .option('--auth-disabled', 'accept unauthenticated HTTP requests (local/dev only)')
    .option('--max-rows <n>', 'maximum rows per result (env: MCP_MAX_ROWS)')
    .option('--max-chars <n>', 'maximum serialized characters per result (env: MCP_MAX_CHARS)')
    .option('--default-stream <name>', 'stream used when a tool omits one (env: MCP_DEFAULT_STREAM)')
    .option('--log-level <level>', 'debug | info | warn | error (env: MCP_LOG_LEVEL)')
    .allowExcessArguments(false)
}

/** Parses argv into setting overrides; unset flags stay undefined. */
export function parseCliArgs(argv: readonly string[]): RawSettings {
  const program = buildProgram().exitOverride()
  program.parse([...argv])
  const opts = program.opts<CliOptions>()
  return {
    configPath: opts.config,
    baseUrl: opts.baseUrl,
    org: opts.org,
    email: opts.email,
    password: opts.password,
    accessKey: opts.accessKey,
    timeout: opts.timeout,
    transport: opts.transport,
    host: opts.host,
    port: opts.port,
    statelessHttp: opts.statelessHttp,
    authToken: opts.authToken,
    authDisabled: opts.authDisabled,
    maxRows: opts.maxRows,
    maxChars: opts.maxChars,
    defaultStream: opts.defaultStream,
    logLevel: opts.logLevel,
  }
}
