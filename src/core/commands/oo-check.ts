import type { ToolArgs, ToolName, ToolRegistry } from '../tools/types.js';
import type { Logger } from '../helpers/logger.js';
import { runTool } from '../tools/index.js';
import { prettyJson } from '../helpers/response.js';

const CHECKS: ReadonlyArray<{ label: string; tool: ToolName; args: ToolArgs }> = [
  { label: 'healthz', tool: 'get_api', args: { path: 'healthz' } },
  { label: 'streams', tool: 'list_streams', args: {} },
];

export function createCheckHandler(deps: { tools: ToolRegistry; logger: Logger }) {
  return async (): Promise<string> => {
    const results: string[] = ['## OpenObserve Health Check\n'];

    for (const check of CHECKS) {
      const response = await runTool(deps.tools[check.tool], check.args, deps.logger);
      const status = response.isError ? 'FAILED' : 'ok';
      results.push(`### ${check.label}: ${status}\n\`\`\`json\n${prettyJson(response.body)}\n\`\`\`\n`);
    }

    return results.join('\n');
  };
}
