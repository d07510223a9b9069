import type { ServerConfig } from '../types/config.js';
import type { OpenObserveClient } from '../helpers/openobserve.js';
import type { Logger } from '../helpers/logger.js';

export type ParamType = 'string' | 'number' | 'integer' | 'array';

export interface ToolParamDef {
  type: ParamType;
  required?: boolean;
  description?: string;
  /** Applied by the tool itself; adapters only advertise it. */
  default?: string | number;
  items?: ToolParamDef;
}

export const TOOL_NAMES = [
  'search_sql',
  'search_logs',
  'get_log_volume',
  'get_stream_schema',
  'list_streams',
  'get_api',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

/** Arguments as received from a host; each tool validates its own. */
export type ToolArgs = Readonly<Record<string, unknown>>;

export type ToolPayload = Record<string, unknown>;

export interface ToolDefinition {
  name: ToolName;
  title: string;
  description: string;
  params: Record<string, ToolParamDef>;
  execute: (args: ToolArgs) => Promise<ToolPayload>;
}

export type ToolRegistry = { readonly [K in ToolName]: ToolDefinition };

export interface ToolDependencies {
  config: ServerConfig;
  client: OpenObserveClient;
  logger: Logger;
}

export interface ToolResponse {
  isError: boolean;
  body: ToolPayload;
}
