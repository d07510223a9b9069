/**
 * Argument readers for tool inputs. Hosts may or may not have checked types
 * against the declared params, so every reader checks again and throws
 * `ValidationError` before any backend call is made.
 */

import { ValidationError } from '../helpers/errors.js';
import { STREAM_NAME_PATTERN } from '../config/endpoints.js';
import type { ToolArgs } from './types.js';

function isAbsent(value: unknown): value is undefined | null {
  return value === undefined || value === null;
}

/** A string that is non-empty after trimming; returned as given. */
export function requireText(args: ToolArgs, key: string, label = key): string {
  const value = args[key];
  if (isAbsent(value)) throw new ValidationError(`${label} is required`);
  if (typeof value !== 'string') throw new ValidationError(`${label} must be a string`);
  if (!value.trim()) throw new ValidationError(`${label} cannot be empty`);
  return value;
}

export function optionalText(args: ToolArgs, key: string): string | undefined {
  const value = args[key];
  if (isAbsent(value)) return undefined;
  if (typeof value !== 'string') throw new ValidationError(`${key} must be a string`);
  return value;
}

export function optionalNumber(args: ToolArgs, key: string): number | undefined {
  const value = args[key];
  if (isAbsent(value)) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`${key} must be a number`);
  }
  return value;
}

export function optionalInteger(args: ToolArgs, key: string): number | undefined {
  const value = optionalNumber(args, key);
  if (value !== undefined && !Number.isInteger(value)) {
    throw new ValidationError(`${key} must be an integer, got ${value}`);
  }
  return value;
}

export function nonNegativeInteger(args: ToolArgs, key: string, fallback: number): number {
  const value = optionalInteger(args, key) ?? fallback;
  if (value < 0) throw new ValidationError(`${key} must be non-negative, got ${value}`);
  return value;
}

export function optionalStringList(args: ToolArgs, key: string): string[] {
  const value = args[key];
  if (isAbsent(value)) return [];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === 'string')) {
    throw new ValidationError(`${key} must be a list of strings`);
  }
  return value;
}

export function streamName(value: string | undefined, fallback?: string): string {
  const name = (value ?? fallback ?? '').trim();
  if (!name) throw new ValidationError('stream is required');
  if (!STREAM_NAME_PATTERN.test(name)) {
    throw new ValidationError(`Invalid stream name: '${name}'. Use letters, digits, '_', '-' or '.'`);
  }
  return name;
}
