import type { TObject } from '@sinclair/typebox';

/** The subset of an agent-host plugin API this package registers against. */
export interface PluginApi {
  config?: unknown;
  registerTool(name: string, tool: PluginTool): void;
  registerCommand(command: PluginCommand): void;
}

export interface PluginTool {
  description: string;
  parameters: TObject;
  execute: (args: Record<string, unknown>) => Promise<string>;
}

export interface PluginCommand {
  name: string;
  description: string;
  handler: () => Promise<string>;
}
