/**
 * OpenObserve HTTP client.
 *
 * Owns authentication, timeouts and failure classification for every backend
 * call. Callers get parsed, shape-checked JSON or one of the typed errors in
 * ./errors.ts; nothing is retried.
 */

import { z } from 'zod';
import type { ConnectionProfile, Credential } from '../types/config.js';
import type { SeriesBucket } from '../types/results.js';
import { ApiError, AuthenticationError, ConnectionError, OpenObserveError, excerpt } from './errors.js';
import { silentLogger, type Logger } from './logger.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface ClientDeps {
  fetch?: FetchLike;
  logger?: Logger;
}

/* ─── Wire shapes ─────────────────────────────────────── */

const SearchResponseSchema = z
  .object({
    hits: z.array(z.record(z.unknown())),
    total: z.number().optional(),
    took: z.number().optional(),
    from: z.number().optional(),
    size: z.number().optional(),
  })
  .passthrough();

const HistogramHitSchema = z.object({
  key: z.union([z.string(), z.number()]),
  num: z.number(),
});

const StreamEntrySchema = z
  .object({
    name: z.string(),
    stream_type: z.string().optional(),
    storage_type: z.string().optional(),
    stats: z
      .object({
        doc_num: z.number().optional(),
        storage_size: z.number().optional(),
        doc_time_min: z.number().optional(),
        doc_time_max: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const StreamListSchema = z.object({ list: z.array(StreamEntrySchema) }).passthrough();

const StreamSchemaResponseSchema = z
  .object({
    name: z.string().optional(),
    stream_type: z.string().optional(),
    schema: z.array(z.object({ name: z.string(), type: z.string() }).passthrough()).default([]),
  })
  .passthrough();

export type SearchResponse = z.infer<typeof SearchResponseSchema>;

export type StreamDescriptor = {
  name: string;
  streamType: string | null;
  storageType: string | null;
  docCount: number | null;
  storageSizeMb: number | null;
  docTimeMin: number | null;
  docTimeMax: number | null;
};

export interface StreamSchema {
  stream: string;
  streamType: string | null;
  fields: Array<{ name: string; type: string }>;
}

export interface SearchRequest {
  sql: string;
  startMicros: number;
  endMicros: number;
  size: number;
  offset: number;
}

export interface TextSearchRequest {
  query: string;
  stream: string;
  startMicros: number;
  endMicros: number;
  size: number;
  offset: number;
}

export interface HistogramRequest {
  stream: string;
  interval: string;
  startMicros: number;
  endMicros: number;
  /** Maximum buckets to fetch. */
  size: number;
}

/* ─── SQL builders ────────────────────────────────────── */

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function buildTextSearchSql(stream: string, query: string): string {
  return `SELECT * FROM ${quoteIdentifier(stream)} WHERE match_all(${quoteLiteral(query)}) ORDER BY _timestamp DESC`;
}

export function buildHistogramSql(stream: string, interval: string): string {
  return `SELECT histogram(_timestamp, ${quoteLiteral(interval)}) AS key, COUNT(*) AS num FROM ${quoteIdentifier(stream)} GROUP BY key ORDER BY key`;
}

/* ─── Failure classification ──────────────────────────── */

const UNREACHABLE_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'EAI_AGAIN', 'ECONNRESET', 'EHOSTUNREACH', 'ENETUNREACH']);

function causeCode(e: unknown): string | null {
  if (e instanceof Error && typeof e.cause === 'object' && e.cause !== null && 'code' in e.cause && typeof e.cause.code === 'string') {
    return e.cause.code;
  }
  return null;
}

export function classifyFetchFailure(e: unknown, profile: ConnectionProfile): ConnectionError {
  if (e instanceof Error && (e.name === 'TimeoutError' || e.name === 'AbortError')) {
    return new ConnectionError(
      `Request to OpenObserve timed out after ${profile.timeoutSeconds}s. ` +
        'Consider increasing ZO_TIMEOUT or check network connectivity.',
      'timeout',
      { cause: e },
    );
  }
  const code = causeCode(e);
  if ((code && UNREACHABLE_CODES.has(code)) || e instanceof TypeError) {
    return new ConnectionError(
      `Failed to connect to OpenObserve at ${profile.baseUrl}${code ? ` (${code})` : ''}. ` +
        'Verify the URL and that OpenObserve is running.',
      'unreachable',
      { cause: e },
    );
  }
  return new ConnectionError(`Request failed: ${e instanceof Error ? e.message : String(e)}`, 'request_failed', { cause: e });
}

export function classifyHttpFailure(status: number, path: string, body: string, org: string): OpenObserveError {
  if (status === 401) {
    return new AuthenticationError(
      'Authentication failed. Verify ZO_ACCESS_KEY or ZO_ROOT_USER_EMAIL/PASSWORD credentials.',
      'unauthorized',
      status,
    );
  }
  if (status === 403) {
    return new AuthenticationError(
      `Access forbidden. User may not have permissions for organization '${org}'.`,
      'forbidden',
      status,
    );
  }
  if (status === 404) {
    return new ApiError(`Resource not found: ${path}. Verify organization name and resource path.`, status, body);
  }
  if (status >= 500) {
    return new ApiError(`OpenObserve server error (HTTP ${status}). Check OpenObserve server logs for details.`, status, body);
  }
  return new ApiError(`API request failed (HTTP ${status}): ${excerpt(body, 200)}`, status, body);
}

export function authorizationHeader(credential: Credential): string {
  if (credential.mode === 'access_key') return `Basic ${credential.accessKey}`;
  return `Basic ${Buffer.from(`${credential.email}:${credential.password}`).toString('base64')}`;
}

/* ─── Client ──────────────────────────────────────────── */

interface RequestOptions<T> {
  params?: ReadonlyArray<readonly [string, string]>;
  body?: unknown;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  summarize?: (data: T) => Record<string, unknown>;
}

export class OpenObserveClient {
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(readonly profile: ConnectionProfile, deps: ClientDeps = {}) {
    this.fetchImpl = deps.fetch ?? ((url, init) => fetch(url, init));
    this.logger = deps.logger ?? silentLogger;
  }

  get org(): string {
    return this.profile.org;
  }

  private orgPath(suffix: string): string {
    return `api/${encodeURIComponent(this.profile.org)}/${suffix}`;
  }

  private async send(url: string, method: string, body: unknown): Promise<{ status: number; text: string }> {
    try {
      const res = await this.fetchImpl(url, {
        method,
        headers: {
          Authorization: authorizationHeader(this.profile.credential),
          'Content-Type': 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.profile.timeoutSeconds * 1000),
      });
      return { status: res.status, text: await res.text() };
    } catch (e) {
      throw classifyFetchFailure(e, this.profile);
    }
  }

  private async request<T>(method: 'GET' | 'POST', path: string, opts: RequestOptions<T>): Promise<T> {
    const cleanPath = path.replace(/^\/+/, '');
    const query = opts.params && opts.params.length > 0 ? `?${new URLSearchParams(opts.params.map(([k, v]): [string, string] => [k, v])).toString()}` : '';
    const url = `${this.profile.baseUrl}/${cleanPath}${query}`;
    const started = Date.now();
    let status: number | null = null;

    try {
      const { status: code, text } = await this.send(url, method, opts.body);
      status = code;

      if (code < 200 || code > 299) {
        throw classifyHttpFailure(code, cleanPath, text, this.profile.org);
      }

      let raw: unknown;
      try {
        raw = JSON.parse(text);
      } catch {
        throw new ApiError(`OpenObserve returned a non-JSON response for ${cleanPath}`, code, text);
      }

      const parsed = opts.schema.safeParse(raw);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        throw new ApiError(`Unexpected response shape from ${cleanPath}${where}: ${issue?.message ?? 'invalid'}`, code, text);
      }

      this.logger.info('OpenObserve request succeeded', {
        method,
        path: cleanPath,
        ...(opts.summarize ? opts.summarize(parsed.data) : {}),
      });
      return parsed.data;
    } catch (e) {
      this.logger.info('OpenObserve request failed', {
        method,
        path: cleanPath,
        status,
        kind: e instanceof OpenObserveError ? e.kind : 'internal',
        error: e instanceof Error ? e.message : String(e),
      });
      throw e;
    } finally {
      this.logger.debug('OpenObserve request', { method, path: cleanPath, status, durationMs: Date.now() - started });
    }
  }

  search(req: SearchRequest): Promise<SearchResponse> {
    return this.request('POST', this.orgPath('_search'), {
      body: {
        query: {
          sql: req.sql,
          from: req.offset,
          size: req.size,
          start_time: req.startMicros,
          end_time: req.endMicros,
        },
      },
      schema: SearchResponseSchema,
      summarize: (data) => ({ rows: data.hits.length, total: data.total ?? null, took: data.took ?? null }),
    });
  }

  searchText(req: TextSearchRequest): Promise<SearchResponse> {
    return this.search({
      sql: buildTextSearchSql(req.stream, req.query),
      startMicros: req.startMicros,
      endMicros: req.endMicros,
      size: req.size,
      offset: req.offset,
    });
  }

  /** Buckets in key order; `total` is the backend's row count when it reports one. */
  async histogram(req: HistogramRequest): Promise<{ buckets: SeriesBucket[]; total: number | null }> {
    const sql = buildHistogramSql(req.stream, req.interval);
    const data = await this.search({ sql, startMicros: req.startMicros, endMicros: req.endMicros, size: req.size, offset: 0 });
    const buckets: SeriesBucket[] = [];
    for (const hit of data.hits) {
      const parsed = HistogramHitSchema.safeParse(hit);
      if (!parsed.success) {
        throw new ApiError('Unexpected histogram row from OpenObserve (expected key and num columns)', 200, JSON.stringify(hit));
      }
      buckets.push({ start: String(parsed.data.key), count: parsed.data.num });
    }
    return { buckets, total: data.total ?? null };
  }

  async listStreams(): Promise<StreamDescriptor[]> {
    const data = await this.request('GET', this.orgPath('streams'), {
      schema: StreamListSchema,
      summarize: (d) => ({ rows: d.list.length }),
    });
    return data.list.map((s) => ({
      name: s.name,
      streamType: s.stream_type ?? null,
      storageType: s.storage_type ?? null,
      docCount: s.stats?.doc_num ?? null,
      storageSizeMb: s.stats?.storage_size ?? null,
      docTimeMin: s.stats?.doc_time_min ?? null,
      docTimeMax: s.stats?.doc_time_max ?? null,
    }));
  }

  async getStreamSchema(stream: string): Promise<StreamSchema> {
    const data = await this.request('GET', this.orgPath(`streams/${encodeURIComponent(stream)}/schema`), {
      schema: StreamSchemaResponseSchema,
      summarize: (d) => ({ rows: d.schema.length }),
    });
    return {
      stream: data.name ?? stream,
      streamType: data.stream_type ?? null,
      fields: data.schema.map((f) => ({ name: f.name, type: f.type })),
    };
  }

  rawGet(path: string, params: ReadonlyArray<readonly [string, string]> = []): Promise<unknown> {
    return this.request('GET', path, { params, schema: z.unknown() });
  }
}
