/**
 * Result bounding: caps a result by unit count and by serialized length, so
 * tool output stays within an agent's context budget.
 *
 * Each shape truncates on its own unit (rows, schema fields, histogram
 * buckets, document entries). Units are dropped whole from the end; values
 * are never split, edited or reordered. The character budget covers the
 * whole compact JSON payload the caller sends, metadata and echo fields
 * included. Bounding an already-bounded result with the same limits returns
 * an equal result.
 */

import type { ResultLimits } from '../types/config.js';
import type {
  Bounded,
  BoundedResult,
  BoundingMeta,
  DocumentResult,
  JsonRecord,
  ResultShape,
  SchemaResult,
  SeriesResult,
  TabularResult,
} from '../types/results.js';

export interface BoundOptions {
  /** Units that exist upstream but were never received, e.g. past a backend size cap. */
  knownTotal?: number;
}

interface Fit {
  kept: number;
  chars: number;
  cut: boolean;
}

interface Context extends BoundOptions {
  limits: ResultLimits;
  measure: (result: BoundedResult) => number;
}

/* Kept units serialize as "[" + units joined by "," + "]" (or "{...}" for entries). */
function fit(unitLengths: readonly number[], maxRows: number, budget: number): Fit {
  const byRows = Math.min(unitLengths.length, maxRows);
  let chars = 2;
  let kept = 0;
  for (let i = 0; i < byRows; i++) {
    const next = chars + unitLengths[i] + (i > 0 ? 1 : 0);
    if (next > budget) break;
    chars = next;
    kept = i + 1;
  }
  return { kept, chars, cut: kept < unitLengths.length };
}

/**
 * Shrinks the unit budget by whatever the full payload overshoots until it
 * fits or no units are left. Every round keeps strictly fewer units.
 */
function settle<R extends BoundedResult>(lengths: readonly number[], ctx: Context, build: (f: Fit) => R): R {
  let budget = ctx.limits.maxChars;
  for (;;) {
    const f = fit(lengths, ctx.limits.maxRows, budget);
    const result = build(f);
    const over = ctx.measure(result) - ctx.limits.maxChars;
    if (over <= 0 || f.kept === 0) return result;
    budget = f.chars - over;
  }
}

export function jsonLength(value: unknown): number {
  return (JSON.stringify(value) ?? 'null').length;
}

function priorMeta(shape: ResultShape): { total: number; truncated: boolean } | null {
  if ('total' in shape && 'truncated' in shape && typeof shape.total === 'number' && typeof shape.truncated === 'boolean') {
    return { total: shape.total, truncated: shape.truncated };
  }
  return null;
}

function truncationNote(unit: string, meta: Omit<BoundingMeta, 'note'>): string | undefined {
  if (!meta.truncated) return undefined;
  const { maxRows, maxChars } = meta.limits;
  if (meta.returned === 0) {
    return `Result truncated: none of the ${meta.total} ${unit} fit within max_chars=${maxChars}. ` +
      'This does not mean there is no data; narrow the request (fewer columns, smaller window) or raise the limit.';
  }
  return `Result truncated: showing ${meta.returned} of ${meta.total} ${unit} (max_rows=${maxRows}, max_chars=${maxChars}). ` +
    'Use size/offset or a narrower query to page through the rest.';
}

function buildMeta(unit: string, shape: ResultShape, unitCount: number, result: Fit, ctx: Context): BoundingMeta {
  const prior = priorMeta(shape);
  const total = prior ? prior.total : Math.max(unitCount, ctx.knownTotal ?? 0);
  const meta = {
    total,
    returned: result.kept,
    truncated: (prior?.truncated ?? false) || result.cut || total > unitCount,
    chars: result.chars,
    limits: { maxRows: ctx.limits.maxRows, maxChars: ctx.limits.maxChars },
  };
  const note = truncationNote(unit, meta);
  return note ? { ...meta, note } : meta;
}

interface DocumentPlan {
  unit: string;
  lengths: number[];
  rebuild: (kept: number) => unknown;
}

function isRecord(value: unknown): value is JsonRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/*
 * List endpoints wrap their items in one array property ({"list": [...]}).
 * Such a document is cut by element inside that array, with the other
 * properties kept as they are; top-level properties are the fallback unit.
 */
function documentPlans(value: unknown): { list?: DocumentPlan; entries: DocumentPlan } {
  if (Array.isArray(value)) {
    return { entries: { unit: 'entries', lengths: value.map(jsonLength), rebuild: (kept) => value.slice(0, kept) } };
  }
  if (isRecord(value)) {
    const entries = Object.entries(value);
    const byEntry: DocumentPlan = {
      unit: 'entries',
      lengths: entries.map(([k, v]) => jsonLength(k) + 1 + jsonLength(v)),
      rebuild: (kept) => Object.fromEntries(entries.slice(0, kept)),
    };
    const arrays = entries.filter(([, v]) => Array.isArray(v));
    const listKey = arrays.length === 1 ? arrays[0][0] : undefined;
    const list = listKey === undefined ? undefined : value[listKey];
    if (listKey === undefined || !Array.isArray(list)) return { entries: byEntry };
    return {
      list: {
        unit: `${listKey} items`,
        lengths: list.map(jsonLength),
        rebuild: (kept) => Object.fromEntries(entries.map(([k, v]) => [k, k === listKey ? list.slice(0, kept) : v])),
      },
      entries: byEntry,
    };
  }
  if (value === null || value === undefined) {
    return { entries: { unit: 'entries', lengths: [], rebuild: () => null } };
  }
  return { entries: { unit: 'entries', lengths: [jsonLength(value)], rebuild: (kept) => (kept > 0 ? value : null) } };
}

function boundTabular(shape: TabularResult, ctx: Context): Bounded<TabularResult> {
  return settle<Bounded<TabularResult>>(shape.rows.map(jsonLength), ctx, (f) => ({
    kind: 'tabular',
    rows: shape.rows.slice(0, f.kept),
    ...buildMeta('rows', shape, shape.rows.length, f, ctx),
  }));
}

function boundSchema(shape: SchemaResult, ctx: Context): Bounded<SchemaResult> {
  return settle<Bounded<SchemaResult>>(shape.fields.map(jsonLength), ctx, (f) => ({
    kind: 'schema',
    stream: shape.stream,
    streamType: shape.streamType,
    fields: shape.fields.slice(0, f.kept),
    ...buildMeta('fields', shape, shape.fields.length, f, ctx),
  }));
}

function boundSeries(shape: SeriesResult, ctx: Context): Bounded<SeriesResult> {
  return settle<Bounded<SeriesResult>>(shape.buckets.map(jsonLength), ctx, (f) => ({
    kind: 'series',
    interval: shape.interval,
    buckets: shape.buckets.slice(0, f.kept),
    ...buildMeta('buckets', shape, shape.buckets.length, f, ctx),
  }));
}

function boundDocument(shape: DocumentResult, ctx: Context): Bounded<DocumentResult> {
  const plans = documentPlans(shape.value);
  const settleWith = (plan: DocumentPlan) =>
    settle<Bounded<DocumentResult>>(plan.lengths, ctx, (f) => ({
      kind: 'document',
      value: f.cut ? plan.rebuild(f.kept) : shape.value,
      ...buildMeta(plan.unit, shape, plan.lengths.length, f, ctx),
    }));
  if (plans.list) {
    const result = settleWith(plans.list);
    if (ctx.measure(result) <= ctx.limits.maxChars) return result;
  }
  return settleWith(plans.entries);
}

function boundShape(shape: ResultShape, ctx: Context): BoundedResult {
  switch (shape.kind) {
    case 'tabular':
      return boundTabular(shape, ctx);
    case 'schema':
      return boundSchema(shape, ctx);
    case 'series':
      return boundSeries(shape, ctx);
    case 'document':
      return boundDocument(shape, ctx);
  }
}

export function bound(shape: TabularResult, limits: ResultLimits, opts?: BoundOptions): Bounded<TabularResult>;
export function bound(shape: SchemaResult, limits: ResultLimits, opts?: BoundOptions): Bounded<SchemaResult>;
export function bound(shape: SeriesResult, limits: ResultLimits, opts?: BoundOptions): Bounded<SeriesResult>;
export function bound(shape: DocumentResult, limits: ResultLimits, opts?: BoundOptions): Bounded<DocumentResult>;
export function bound(shape: ResultShape, limits: ResultLimits, opts?: BoundOptions): BoundedResult;
export function bound(shape: ResultShape, limits: ResultLimits, opts: BoundOptions = {}): BoundedResult {
  return boundShape(shape, { ...opts, limits, measure: jsonLength });
}

/**
 * Bounds `shape` and merges `envelope` (query echo, stream, path) after it.
 * The compact JSON of the returned payload is at most `maxChars` long
 * whenever a payload without units fits; if the envelope alone would break
 * the budget it is left out.
 */
export function boundPayload(shape: ResultShape, limits: ResultLimits, envelope: JsonRecord, opts: BoundOptions = {}): JsonRecord {
  const result = boundShape(shape, { ...opts, limits, measure: (r) => jsonLength({ ...r, ...envelope }) });
  const payload = { ...result, ...envelope };
  if (jsonLength(payload) <= limits.maxChars) return payload;
  return { ...boundShape(shape, { ...opts, limits, measure: jsonLength }) };
}
