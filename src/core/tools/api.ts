/**
 * get_api -- restricted raw GET against an allow-listed OpenObserve path.
 */

import type { ToolDefinition, ToolDependencies } from './types.js';
import { boundPayload } from '../helpers/bounding.js';
import { ALLOWED_ENDPOINTS, parseQueryParams, resolveAllowedPath } from '../config/endpoints.js';
import { optionalStringList, requireText } from './validation.js';

export function createGetApiTool(deps: ToolDependencies): ToolDefinition {
  const { client, config, logger } = deps;

  return {
    name: 'get_api',
    title: 'GET API',
    description:
      'GET a limited OpenObserve API path. Allowed paths ({org} is the configured organization): ' +
      `${ALLOWED_ENDPOINTS.join(', ')}. Any other path is refused.`,
    params: {
      path: { type: 'string', description: `Relative API path, e.g. api/${config.connection.org}/streams` },
      params: {
        type: 'array',
        required: false,
        items: { type: 'string' },
        description: 'Query parameters as key=value strings',
      },
    },
    execute: async (args) => {
      const rawPath = requireText(args, 'path');
      const path = resolveAllowedPath(rawPath, client.org);
      const params = parseQueryParams(optionalStringList(args, 'params'));
      logger.debug('get_api resolved', { path, params: params.map(([k]) => k) });

      const value = await client.rawGet(path, params);
      return boundPayload({ kind: 'document', value }, config.limits, { path, params: Object.fromEntries(params) });
    },
  };
}
