/**
 * OpenObserve MCP Server
 *
 * Exposes bounded, read-only access to an OpenObserve organization: SQL and
 * full-text search, log volume histograms, stream listing and schemas, and a
 * restricted GET over an allow-listed set of API paths.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js'
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js'
import type { ServerConfig } from './core/types/config.js'
import type { Logger } from './core/helpers/logger.js'
import { listTools, runTool, type ToolRegistry } from './core/tools/index.js'
import { json } from './core/helpers/response.js'
import { toZodShape } from './adapters/zod-schema.js'
import { registerResources } from './resources.js'
import { PLUGIN_NAME, PLUGIN_VERSION } from './core/plugin-id.js'

export interface ServerDependencies {
  config: ServerConfig
  tools: ToolRegistry
  logger: Logger
}

export function createOpenObserveServer(deps: ServerDependencies): McpServer {
  const { config, tools, logger } = deps
  const toolLogger = logger.child('tools')

  const server = new McpServer({
    name: PLUGIN_NAME,
    version: PLUGIN_VERSION,
  })

  for (const tool of listTools(tools)) {
    server.registerTool(
      tool.name,
      {
        title: tool.title,
        description: tool.description,
        inputSchema: toZodShape(tool.params),
        annotations: { readOnlyHint: true, openWorldHint: true },
      },
      async (args): Promise<CallToolResult> => {
        const response = await runTool(tool, args, toolLogger)
        return {
          content: [{ type: 'text', text: json(response.body) }],
          isError: response.isError,
        }
      },
    )
  }

  registerResources(server, config, tools)

  return server
}
