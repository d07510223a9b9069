/**
 * Stream tools -- stream listing and per-stream schema lookup.
 */

import type { ToolDefinition, ToolDependencies } from './types.js';
import { boundPayload } from '../helpers/bounding.js';
import { optionalText, streamName } from './validation.js';

/* ------------------------------------------------------------------ */
/*  1. get_stream_schema                                              */
/* ------------------------------------------------------------------ */

export function createStreamSchemaTool(deps: ToolDependencies): ToolDefinition {
  const { client, config } = deps;

  return {
    name: 'get_stream_schema',
    title: 'Stream Schema',
    description: 'Get the field names and types of a stream. Use before writing SQL against an unfamiliar stream.',
    params: {
      stream: { type: 'string', description: 'Stream name' },
    },
    execute: async (args) => {
      const stream = streamName(optionalText(args, 'stream'));
      const schema = await client.getStreamSchema(stream);
      return boundPayload({ kind: 'schema', stream: schema.stream, streamType: schema.streamType, fields: schema.fields }, config.limits, {});
    },
  };
}

/* ------------------------------------------------------------------ */
/*  2. list_streams                                                   */
/* ------------------------------------------------------------------ */

export function createListStreamsTool(deps: ToolDependencies): ToolDefinition {
  const { client, config } = deps;

  return {
    name: 'list_streams',
    title: 'List Streams',
    description: 'List streams for the configured OpenObserve organization, with type, document count and time range.',
    params: {},
    execute: async () => {
      const streams = await client.listStreams();
      return boundPayload({ kind: 'tabular', rows: streams }, config.limits, { org: client.org });
    },
  };
}
