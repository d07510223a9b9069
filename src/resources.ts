/**
 * MCP Resources — read-only view of the running configuration.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import type { ServerConfig } from './core/types/config.js'
import type { ToolRegistry } from './core/tools/index.js'
import { listTools } from './core/tools/index.js'
import { describeCredential } from './core/config/loader.js'
import { ALLOWED_ENDPOINTS } from './core/config/endpoints.js'

export const CONFIG_RESOURCE_URI = 'openobserve://config'

/** Everything a client may see about the server; no secrets. */
export function describeConfig(config: ServerConfig, tools: ToolRegistry) {
  return {
    openobserve: {
      baseUrl: config.connection.baseUrl,
      org: config.connection.org,
      auth: describeCredential(config.connection.credential),
      timeoutSeconds: config.connection.timeoutSeconds,
    },
    limits: { maxRows: config.limits.maxRows, maxChars: config.limits.maxChars },
    defaultStream: config.defaultStream,
    transport: config.transport,
    tools: listTools(tools).map((t) => t.name),
    allowedApiPaths: [...ALLOWED_ENDPOINTS],
  }
}

export function registerResources(server: McpServer, config: ServerConfig, tools: ToolRegistry) {
  server.resource(
    'config',
    CONFIG_RESOURCE_URI,
    { mimeType: 'application/json', description: 'OpenObserve connection, result limits and the get_api allow-list (no secrets)' },
    async () => ({
      contents: [{
        uri: CONFIG_RESOURCE_URI,
        mimeType: 'application/json',
        text: JSON.stringify(describeConfig(config, tools), null, 2),
      }],
    }),
  )
}
