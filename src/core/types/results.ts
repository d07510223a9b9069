import type { ResultLimits } from './config.js';

export type JsonRecord = Record<string, unknown>;

export interface SchemaField {
  name: string;
  type: string;
}

export interface SeriesBucket {
  start: string;
  count: number;
}

export interface TabularResult {
  kind: 'tabular';
  rows: JsonRecord[];
}

export interface SchemaResult {
  kind: 'schema';
  stream: string;
  streamType: string | null;
  fields: SchemaField[];
}

export interface SeriesResult {
  kind: 'series';
  interval: string;
  buckets: SeriesBucket[];
}

/** Arbitrary JSON from a raw GET. Units are array elements or top-level properties. */
export interface DocumentResult {
  kind: 'document';
  value: unknown;
}

export type ResultShape = TabularResult | SchemaResult | SeriesResult | DocumentResult;

export interface BoundingMeta {
  /** Units before bounding. */
  total: number;
  /** Units kept. */
  returned: number;
  truncated: boolean;
  /** Length of the kept units' serialized form. */
  chars: number;
  limits: ResultLimits;
  note?: string;
}

export type Bounded<S extends ResultShape> = S & BoundingMeta;

export type BoundedResult = Bounded<TabularResult> | Bounded<SchemaResult> | Bounded<SeriesResult> | Bounded<DocumentResult>;
