import { describe, it, expect } from 'vitest';
import { createAllTools, createToolDependencies, runTool } from './index.js';
import { silentLogger } from '../helpers/logger.js';
import { TEST_BASE_URL, fakeFetch, jsonResponse, testConfig } from '../../__tests__/fakes.js';

function setup(handler: Parameters<typeof fakeFetch>[0], limits: { maxRows?: number; maxChars?: number } = {}) {
  const fake = fakeFetch(handler);
  const deps = createToolDependencies(testConfig(limits), { fetch: fake.fetch, logger: silentLogger });
  return { tools: createAllTools(deps), calls: fake.calls };
}

describe('list_streams', () => {
  it('returns streams in backend order with the org', async () => {
    const { tools } = setup(() => jsonResponse({ list: [{ name: 'a' }, { name: 'b' }, { name: 'c' }] }));

    const response = await runTool(tools.list_streams, {}, silentLogger);

    expect(response.isError).toBe(false);
    expect(response.body).toMatchObject({ kind: 'tabular', org: 'default', total: 3, returned: 3, truncated: false });
    expect(response.body.rows).toEqual([
      { name: 'a', streamType: null, storageType: null, docCount: null, storageSizeMb: null, docTimeMin: null, docTimeMax: null },
      { name: 'b', streamType: null, storageType: null, docCount: null, storageSizeMb: null, docTimeMin: null, docTimeMax: null },
      { name: 'c', streamType: null, storageType: null, docCount: null, storageSizeMb: null, docTimeMin: null, docTimeMax: null },
    ]);
  });

  it('truncates a long stream list', async () => {
    const list = Array.from({ length: 20 }, (_, i) => ({ name: `stream_${i}` }));
    const { tools } = setup(() => jsonResponse({ list }), { maxRows: 5 });

    const response = await runTool(tools.list_streams, {}, silentLogger);

    expect(response.body).toMatchObject({ total: 20, returned: 5, truncated: true });
  });
});

describe('get_stream_schema', () => {
  it('returns the stream fields', async () => {
    const { tools, calls } = setup(() =>
      jsonResponse({ name: 'app', stream_type: 'logs', schema: [{ name: 'level', type: 'Utf8' }] }),
    );

    const response = await runTool(tools.get_stream_schema, { stream: 'app' }, silentLogger);

    expect(calls[0].url).toBe(`${TEST_BASE_URL}/api/default/streams/app/schema`);
    expect(response.body).toMatchObject({
      kind: 'schema',
      stream: 'app',
      streamType: 'logs',
      fields: [{ name: 'level', type: 'Utf8' }],
      truncated: false,
    });
  });

  it('reports an unknown stream as an API error', async () => {
    const { tools } = setup(() => jsonResponse({ message: 'stream not found' }, 404));

    const response = await runTool(tools.get_stream_schema, { stream: 'missing' }, silentLogger);

    expect(response.body).toEqual({
      error: {
        kind: 'api',
        statusCode: 404,
        message: 'Resource not found: api/default/streams/missing/schema. Verify organization name and resource path.',
        body: '{"message":"stream not found"}',
      },
    });
  });

  it('requires a stream', async () => {
    const { tools, calls } = setup(() => jsonResponse({}));

    const response = await runTool(tools.get_stream_schema, {}, silentLogger);

    expect(response.body).toEqual({ error: { kind: 'validation', code: 'invalid_input', message: 'stream is required' } });
    expect(calls).toHaveLength(0);
  });
});
