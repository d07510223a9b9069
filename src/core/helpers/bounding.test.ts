import { describe, it, expect } from 'vitest';
import { bound, boundPayload } from './bounding.js';
import type { JsonRecord } from '../types/results.js';

function makeRows(count: number): JsonRecord[] {
  return Array.from({ length: count }, (_, i) => ({ _timestamp: 1_700_000_000_000_000 + i, level: 'info', msg: `request ${i} served` }));
}

describe('bound (tabular)', () => {
  it('returns everything when within both limits', () => {
    const rows = [{ a: 1 }, { a: 2 }];
    const result = bound({ kind: 'tabular', rows }, { maxRows: 10, maxChars: 1000 });

    expect(result.rows).toEqual(rows);
    expect(result.total).toBe(2);
    expect(result.returned).toBe(2);
    expect(result.truncated).toBe(false);
    expect(result.chars).toBe(17);
    expect(result.note).toBeUndefined();
  });

  it('caps 5000 rows to a prefix within max_rows and max_chars', () => {
    const rows = makeRows(5000);
    const limits = { maxRows: 1000, maxChars: 50_000 };
    const result = bound({ kind: 'tabular', rows }, limits);

    expect(result.total).toBe(5000);
    expect(result.truncated).toBe(true);
    expect(result.returned).toBeGreaterThan(0);
    expect(result.returned).toBeLessThanOrEqual(1000);
    expect(result.rows).toEqual(rows.slice(0, result.returned));
    expect(JSON.stringify(result.rows).length).toBe(result.chars);
    expect(JSON.stringify(result).length).toBeLessThanOrEqual(50_000);
    expect(result.note).toBe(
      `Result truncated: showing ${result.returned} of 5000 rows (max_rows=1000, max_chars=50000). ` +
        'Use size/offset or a narrower query to page through the rest.',
    );
  });

  it('stops at max_rows when characters are not the constraint', () => {
    const result = bound({ kind: 'tabular', rows: makeRows(5) }, { maxRows: 3, maxChars: 1_000_000 });

    expect(result.returned).toBe(3);
    expect(result.total).toBe(5);
    expect(result.truncated).toBe(true);
  });

  it('keeps the serialized result within max_chars for every limit pair', () => {
    const rows = makeRows(200);
    for (const maxRows of [1, 7, 50, 500]) {
      for (const maxChars of [1_000, 4_321, 9_999]) {
        const result = bound({ kind: 'tabular', rows }, { maxRows, maxChars });
        expect(result.returned).toBeLessThanOrEqual(maxRows);
        expect(JSON.stringify(result).length).toBeLessThanOrEqual(maxChars);
        expect(result.rows).toEqual(rows.slice(0, result.returned));
      }
    }
  });

  it('reports an oversized first row as truncated, not as empty', () => {
    const result = bound({ kind: 'tabular', rows: [{ msg: 'x'.repeat(2000) }] }, { maxRows: 10, maxChars: 1000 });

    expect(result.rows).toEqual([]);
    expect(result.returned).toBe(0);
    expect(result.total).toBe(1);
    expect(result.truncated).toBe(true);
    expect(result.note).toBe(
      'Result truncated: none of the 1 rows fit within max_chars=1000. ' +
        'This does not mean there is no data; narrow the request (fewer columns, smaller window) or raise the limit.',
    );
  });

  it('handles an empty result', () => {
    const result = bound({ kind: 'tabular', rows: [] }, { maxRows: 10, maxChars: 1000 });

    expect(result).toMatchObject({ rows: [], total: 0, returned: 0, truncated: false, chars: 2 });
    expect(result.note).toBeUndefined();
  });

  it('is idempotent for the same limits', () => {
    const limits = { maxRows: 1000, maxChars: 50_000 };
    const once = bound({ kind: 'tabular', rows: makeRows(5000) }, limits);
    const twice = bound(once, limits);

    expect(twice).toEqual(once);
  });

  it('is idempotent when nothing was cut', () => {
    const limits = { maxRows: 10, maxChars: 1000 };
    const once = bound({ kind: 'tabular', rows: [{ a: 1 }] }, limits);

    expect(bound(once, limits)).toEqual(once);
  });
});

describe('bound (other shapes)', () => {
  it('truncates schema fields and keeps stream metadata', () => {
    const fields = Array.from({ length: 10 }, (_, i) => ({ name: `field_${i}`, type: 'Utf8' }));
    const result = bound({ kind: 'schema', stream: 'app', streamType: 'logs', fields }, { maxRows: 4, maxChars: 10_000 });

    expect(result.stream).toBe('app');
    expect(result.streamType).toBe('logs');
    expect(result.fields).toEqual(fields.slice(0, 4));
    expect(result.note).toBe(
      'Result truncated: showing 4 of 10 fields (max_rows=4, max_chars=10000). ' +
        'Use size/offset or a narrower query to page through the rest.',
    );
  });

  it('truncates series buckets in order', () => {
    const buckets = [
      { start: '2024-01-01T00:00:00', count: 5 },
      { start: '2024-01-01T01:00:00', count: 7 },
      { start: '2024-01-01T02:00:00', count: 2 },
    ];
    const result = bound({ kind: 'series', interval: '1 hour', buckets }, { maxRows: 2, maxChars: 10_000 });

    expect(result.interval).toBe('1 hour');
    expect(result.buckets).toEqual(buckets.slice(0, 2));
    expect(result.total).toBe(3);
    expect(result.truncated).toBe(true);
  });

  it('returns a document untouched when it fits', () => {
    const value = { status: 'ok', version: '0.10.0' };
    const result = bound({ kind: 'document', value }, { maxRows: 10, maxChars: 1000 });

    expect(result.value).toBe(value);
    expect(result.total).toBe(2);
    expect(result.truncated).toBe(false);
  });

  it('drops trailing document entries that overflow max_chars', () => {
    const value = { a: 'x'.repeat(400), b: 'y'.repeat(600) };
    const result = bound({ kind: 'document', value }, { maxRows: 10, maxChars: 1000 });

    expect(result.value).toEqual({ a: 'x'.repeat(400) });
    expect(result.returned).toBe(1);
    expect(result.chars).toBe(408);
    expect(result.note).toBe(
      'Result truncated: showing 1 of 2 entries (max_rows=10, max_chars=1000). ' +
        'Use size/offset or a narrower query to page through the rest.',
    );
  });

  it('slices array documents by element', () => {
    const result = bound({ kind: 'document', value: [1, 2, 3] }, { maxRows: 2, maxChars: 1000 });

    expect(result.value).toEqual([1, 2]);
    expect(result.total).toBe(3);
  });

  it('replaces an oversized scalar document with null', () => {
    const result = bound({ kind: 'document', value: 'z'.repeat(2000) }, { maxRows: 10, maxChars: 1000 });

    expect(result.value).toBeNull();
    expect(result.returned).toBe(0);
    expect(result.truncated).toBe(true);
  });
});

describe('bound (wrapped lists and upstream totals)', () => {
  it('cuts the single array property of a document and keeps its siblings', () => {
    const value = { total: 3, list: [{ name: 'a' }, { name: 'b' }, { name: 'c' }] };
    const result = bound({ kind: 'document', value }, { maxRows: 2, maxChars: 1000 });

    expect(result.value).toEqual({ total: 3, list: [{ name: 'a' }, { name: 'b' }] });
    expect(result.total).toBe(3);
    expect(result.returned).toBe(2);
    expect(result.note).toBe(
      'Result truncated: showing 2 of 3 list items (max_rows=2, max_chars=1000). ' +
        'Use size/offset or a narrower query to page through the rest.',
    );
  });

  it('counts units the backend withheld', () => {
    const buckets = [
      { start: '2024-01-01T00:00:00', count: 5 },
      { start: '2024-01-01T01:00:00', count: 7 },
    ];
    const result = bound({ kind: 'series', interval: '1 hour', buckets }, { maxRows: 10, maxChars: 1000 }, { knownTotal: 24 });

    expect(result.buckets).toEqual(buckets);
    expect(result.total).toBe(24);
    expect(result.truncated).toBe(true);
  });
});

describe('boundPayload', () => {
  const limits = { maxRows: 1000, maxChars: 1000 };

  it('counts the envelope against max_chars', () => {
    const envelope = { query: { sql: `SELECT * FROM "app" WHERE msg = '${'q'.repeat(300)}'` } };
    const payload = boundPayload({ kind: 'tabular', rows: makeRows(100) }, limits, envelope);

    expect(payload.query).toEqual(envelope.query);
    expect(payload.truncated).toBe(true);
    expect(Number(payload.returned)).toBeGreaterThan(0);
    expect(JSON.stringify(payload).length).toBeLessThanOrEqual(1000);
  });

  it('leaves out an envelope that cannot fit on its own', () => {
    const payload = boundPayload({ kind: 'tabular', rows: makeRows(3) }, limits, { query: { sql: 'q'.repeat(2000) } });

    expect(payload).not.toHaveProperty('query');
    expect(payload.total).toBe(3);
    expect(JSON.stringify(payload).length).toBeLessThanOrEqual(1000);
  });
});
