import type { ServerConfig } from '../types/config.js';
import { describeCredential } from '../config/loader.js';
import { PLUGIN_VERSION } from '../plugin-id.js';

export function createStatusHandler(deps: { config: ServerConfig }) {
  return async (): Promise<string> => {
    const { connection, limits, defaultStream } = deps.config;
    const lines: string[] = [
      '## OpenObserve MCP Status',
      '',
      `**Version:** ${PLUGIN_VERSION}`,
      `**Base URL:** ${connection.baseUrl}`,
      `**Organization:** ${connection.org}`,
      `**Auth:** ${describeCredential(connection.credential)}`,
      `**Timeout:** ${connection.timeoutSeconds}s`,
      `**Limits:** ${limits.maxRows} rows, ${limits.maxChars} chars`,
      `**Default Stream:** ${defaultStream}`,
    ];
    return lines.join('\n');
  };
}
