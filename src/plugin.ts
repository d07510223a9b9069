import type { PluginApi } from './core/types/plugin.js';
import { loadConfig, parseSettings } from './core/config/loader.js';
import { createAllTools, createToolDependencies, listTools, runTool } from './core/tools/index.js';
import { registerAllCommands } from './core/commands/index.js';
import { createLogger } from './core/helpers/logger.js';
import { json } from './core/helpers/response.js';
import { toTypeBoxSchema } from './adapters/typebox-schema.js';
import { PLUGIN_NAME } from './core/plugin-id.js';

/**
 * Plugin entry for agent hosts that load tools in-process. The host's raw
 * config object takes precedence over the environment.
 */
export default function register(api: PluginApi): void {
  const overrides = api.config === undefined ? {} : parseSettings(api.config, 'plugin config');
  const config = loadConfig({ overrides });
  const logger = createLogger(PLUGIN_NAME, config.logLevel);

  const tools = createAllTools(createToolDependencies(config, { logger }));
  const toolLogger = logger.child('tools');

  for (const tool of listTools(tools)) {
    api.registerTool(tool.name, {
      description: tool.description,
      parameters: toTypeBoxSchema(tool.params),
      execute: async (args) => json((await runTool(tool, args, toolLogger)).body),
    });
  }

  registerAllCommands(api, { config, tools, logger: toolLogger });

  logger.info(`Registered ${listTools(tools).length} tools`);
}
