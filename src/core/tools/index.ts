import type { ServerConfig } from '../types/config.js';
import { TOOL_NAMES, type ToolArgs, type ToolDefinition, type ToolDependencies, type ToolRegistry, type ToolResponse } from './types.js';
import { OpenObserveClient, type FetchLike } from '../helpers/openobserve.js';
import { ConfigurationError, OpenObserveError } from '../helpers/errors.js';
import { createLogger, type Logger } from '../helpers/logger.js';
import { err, ok } from '../helpers/response.js';
import { createSearchSqlTool, createSearchLogsTool, createLogVolumeTool } from './search.js';
import { createStreamSchemaTool, createListStreamsTool } from './streams.js';
import { createGetApiTool } from './api.js';

export function createToolDependencies(
  config: ServerConfig,
  opts: { fetch?: FetchLike; logger?: Logger } = {},
): ToolDependencies {
  const logger = opts.logger ?? createLogger('openobserve-mcp', config.logLevel);
  const client = new OpenObserveClient(config.connection, { fetch: opts.fetch, logger: logger.child('client') });
  return { config, client, logger };
}

export function createAllTools(deps: ToolDependencies): ToolRegistry {
  const registry: ToolRegistry = {
    search_sql: createSearchSqlTool(deps),
    search_logs: createSearchLogsTool(deps),
    get_log_volume: createLogVolumeTool(deps),
    get_stream_schema: createStreamSchemaTool(deps),
    list_streams: createListStreamsTool(deps),
    get_api: createGetApiTool(deps),
  };

  for (const name of TOOL_NAMES) {
    if (registry[name].name !== name) {
      throw new ConfigurationError(`Tool registered as '${name}' declares name '${registry[name].name}'`);
    }
  }
  return Object.freeze(registry);
}

export function listTools(registry: ToolRegistry): ToolDefinition[] {
  return TOOL_NAMES.map((name) => registry[name]);
}

/**
 * Executes a tool and folds any failure into a structured error response.
 * Typed errors pass through as-is; anything else is reported as internal.
 */
export async function runTool(tool: ToolDefinition, args: ToolArgs, logger: Logger): Promise<ToolResponse> {
  const started = Date.now();
  try {
    const body = await tool.execute(args);
    logger.info(`${tool.name} completed`, { durationMs: Date.now() - started });
    return ok(body);
  } catch (e) {
    if (e instanceof OpenObserveError) {
      logger.warn(`${tool.name} failed`, { kind: e.kind, error: e.message });
    } else {
      logger.error(`${tool.name} unexpected error`, {
        error: e instanceof Error ? e.message : String(e),
        stack: e instanceof Error ? e.stack : undefined,
      });
    }
    return err(e);
  }
}

export type { ToolDefinition, ToolParamDef, ToolName, ToolRegistry, ToolArgs, ToolResponse, ToolDependencies } from './types.js';
export { TOOL_NAMES } from './types.js';
