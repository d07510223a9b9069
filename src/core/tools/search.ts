/**
 * Search tools -- SQL search, full-text log search, and log volume histograms.
 */

import type { ToolDefinition, ToolDependencies } from './types.js';
import { boundPayload, type BoundOptions } from '../helpers/bounding.js';
import { ValidationError } from '../helpers/errors.js';
import { resolveTimeWindow, type TimeWindow } from '../helpers/time-window.js';
import { buildHistogramSql, buildTextSearchSql } from '../helpers/openobserve.js';
import { nonNegativeInteger, optionalInteger, optionalNumber, optionalText, requireText, streamName } from './validation.js';

export const DEFAULT_SIZE = 100;
export const DEFAULT_INTERVAL = '1 hour';

function describeWindow(window: TimeWindow) {
  return { startMicros: window.startMicros, endMicros: window.endMicros, source: window.source };
}

/**
 * A `size` above max_rows fetches max_rows + 1 rows. The backend total,
 * capped at `size`, then counts the rows that were never fetched.
 */
function pageRequest(size: number, offset: number, maxRows: number) {
  const clamped = size > maxRows;
  return {
    fetchSize: clamped ? maxRows + 1 : size,
    bounding: (backendTotal: number | undefined): BoundOptions =>
      clamped && backendTotal !== undefined ? { knownTotal: Math.min(size, Math.max(0, backendTotal - offset)) } : {},
  };
}

/* ------------------------------------------------------------------ */
/*  1. search_sql                                                     */
/* ------------------------------------------------------------------ */

export function createSearchSqlTool(deps: ToolDependencies): ToolDefinition {
  const { client, config } = deps;
  const { limits } = config;

  return {
    name: 'search_sql',
    title: 'Search SQL',
    description:
      'Run an OpenObserve SQL query via /api/{org}/_search. Time range: pass start_micros/end_micros, ' +
      'or hours for a relative window (explicit start/end wins when both are given; default is the last 24 hours). ' +
      `Results are capped at ${limits.maxRows} rows and ${limits.maxChars} characters; check "truncated".`,
    params: {
      sql: { type: 'string', description: 'SQL query, e.g. SELECT * FROM "default" LIMIT 10' },
      hours: { type: 'number', required: false, description: 'Relative window: the last N hours' },
      start_micros: { type: 'integer', required: false, description: 'Window start, microseconds since epoch' },
      end_micros: { type: 'integer', required: false, description: 'Window end, microseconds since epoch' },
      size: { type: 'integer', required: false, default: DEFAULT_SIZE, description: 'Rows to return' },
      offset: { type: 'integer', required: false, default: 0, description: 'Rows to skip' },
    },
    execute: async (args) => {
      const sql = requireText(args, 'sql', 'SQL query');
      const size = nonNegativeInteger(args, 'size', DEFAULT_SIZE);
      const offset = nonNegativeInteger(args, 'offset', 0);
      const window = resolveTimeWindow(
        {
          hours: optionalNumber(args, 'hours'),
          startMicros: optionalInteger(args, 'start_micros'),
          endMicros: optionalInteger(args, 'end_micros'),
        },
        24,
      );
      const page = pageRequest(size, offset, limits.maxRows);

      const data = await client.search({
        sql,
        startMicros: window.startMicros,
        endMicros: window.endMicros,
        size: page.fetchSize,
        offset,
      });
      return boundPayload(
        { kind: 'tabular', rows: data.hits },
        limits,
        {
          query: { sql, size, offset, window: describeWindow(window) },
          backend: { total: data.total ?? null, took: data.took ?? null },
        },
        page.bounding(data.total),
      );
    },
  };
}

/* ------------------------------------------------------------------ */
/*  2. search_logs                                                    */
/* ------------------------------------------------------------------ */

export function createSearchLogsTool(deps: ToolDependencies): ToolDefinition {
  const { client, config } = deps;
  const { limits } = config;

  return {
    name: 'search_logs',
    title: 'Search Logs',
    description:
      'Full-text search across all fields of a stream (match_all), newest first. ' +
      `Stream defaults to "${config.defaultStream}", window to the last hour.`,
    params: {
      query: { type: 'string', description: 'Text to search for' },
      stream: { type: 'string', required: false, default: config.defaultStream, description: 'Stream name' },
      hours: { type: 'number', required: false, default: 1, description: 'Relative window: the last N hours' },
      size: { type: 'integer', required: false, default: DEFAULT_SIZE, description: 'Rows to return' },
      offset: { type: 'integer', required: false, default: 0, description: 'Rows to skip' },
    },
    execute: async (args) => {
      const query = requireText(args, 'query');
      const stream = streamName(optionalText(args, 'stream'), config.defaultStream);
      const size = nonNegativeInteger(args, 'size', DEFAULT_SIZE);
      const offset = nonNegativeInteger(args, 'offset', 0);
      const window = resolveTimeWindow({ hours: optionalNumber(args, 'hours') }, 1);
      const page = pageRequest(size, offset, limits.maxRows);

      const data = await client.searchText({
        query,
        stream,
        startMicros: window.startMicros,
        endMicros: window.endMicros,
        size: page.fetchSize,
        offset,
      });
      return boundPayload(
        { kind: 'tabular', rows: data.hits },
        limits,
        {
          query: {
            text: query,
            stream,
            sql: buildTextSearchSql(stream, query),
            size,
            offset,
            window: describeWindow(window),
          },
          backend: { total: data.total ?? null, took: data.took ?? null },
        },
        page.bounding(data.total),
      );
    },
  };
}

/* ------------------------------------------------------------------ */
/*  3. get_log_volume                                                 */
/* ------------------------------------------------------------------ */

export function createLogVolumeTool(deps: ToolDependencies): ToolDefinition {
  const { client, config } = deps;
  const { limits } = config;

  return {
    name: 'get_log_volume',
    title: 'Log Volume',
    description:
      'Count records per time bucket for a stream (histogram over _timestamp). ' +
      `Stream defaults to "${config.defaultStream}", window to the last 24 hours, interval to "${DEFAULT_INTERVAL}".`,
    params: {
      stream: { type: 'string', required: false, default: config.defaultStream, description: 'Stream name' },
      hours: { type: 'number', required: false, default: 24, description: 'Relative window: the last N hours' },
      interval: {
        type: 'string',
        required: false,
        default: DEFAULT_INTERVAL,
        description: 'Bucket width, e.g. "5 minute", "1 hour", "1 day"',
      },
    },
    execute: async (args) => {
      const stream = streamName(optionalText(args, 'stream'), config.defaultStream);
      const interval = (optionalText(args, 'interval') ?? DEFAULT_INTERVAL).trim();
      if (!interval) throw new ValidationError('interval cannot be empty');
      const window = resolveTimeWindow({ hours: optionalNumber(args, 'hours') }, 24);

      // One bucket past max_rows so a longer series shows up as truncated.
      const series = await client.histogram({
        stream,
        interval,
        startMicros: window.startMicros,
        endMicros: window.endMicros,
        size: limits.maxRows + 1,
      });
      return boundPayload(
        { kind: 'series', interval, buckets: series.buckets },
        limits,
        { stream, query: { sql: buildHistogramSql(stream, interval), window: describeWindow(window) } },
        series.total === null ? {} : { knownTotal: series.total },
      );
    },
  };
}
