import type { ToolPayload, ToolResponse } from '../tools/types.js';
import { toErrorBody } from './errors.js';

export function ok(body: ToolPayload): ToolResponse {
  return { isError: false, body };
}

export function err(e: unknown): ToolResponse {
  return { isError: true, body: { error: toErrorBody(e) } };
}

/** Compact form; this is the text bounding measures against max_chars. */
export function json(data: unknown): string {
  return JSON.stringify(data);
}

export function prettyJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}
