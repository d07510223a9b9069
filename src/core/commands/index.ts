import type { ServerConfig } from '../types/config.js';
import type { PluginApi } from '../types/plugin.js';
import type { ToolRegistry } from '../tools/types.js';
import type { Logger } from '../helpers/logger.js';
import { createStatusHandler } from './oo-status.js';
import { createCheckHandler } from './oo-check.js';

export interface CommandDependencies {
  config: ServerConfig;
  tools: ToolRegistry;
  logger: Logger;
}

export function registerAllCommands(api: PluginApi, deps: CommandDependencies): void {
  api.registerCommand({
    name: 'oo-status',
    description: 'Show OpenObserve connection and result limits (no secrets)',
    handler: createStatusHandler({ config: deps.config }),
  });

  api.registerCommand({
    name: 'oo-check',
    description: 'Probe OpenObserve health and list streams',
    handler: createCheckHandler({ tools: deps.tools, logger: deps.logger }),
  });
}
