import { EndpointNotAllowedError, ValidationError } from '../helpers/errors.js';

/**
 * Read-only backend GET paths the `get_api` tool may reach. `{org}` must be
 * the configured organization; `{stream}` is a single stream-name segment.
 */
export const ALLOWED_ENDPOINTS: readonly string[] = Object.freeze([
  'healthz',
  'config',
  'api/{org}/streams',
  'api/{org}/streams/{stream}/schema',
  'api/{org}/summary',
  'api/{org}/functions',
  'api/{org}/alerts',
  'api/{org}/alerts/destinations',
  'api/{org}/alerts/templates',
  'api/{org}/dashboards',
  'api/{org}/folders',
  'api/{org}/savedviews',
  'api/{org}/settings',
]);

export const STREAM_NAME_PATTERN = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;

const PARAM_KEY_PATTERN = /^[A-Za-z0-9_.[\]-]+$/;

function refuse(path: string, detail: string): never {
  throw new EndpointNotAllowedError(path, detail);
}

/**
 * Checks a caller-supplied path against the allow-list and returns it without
 * leading or trailing slashes. Traversal attempts and off-list paths are
 * refused with the same error type.
 */
export function resolveAllowedPath(path: string, org: string): string {
  const trimmed = path.trim();
  if (!trimmed) refuse(path, 'Path cannot be empty.');
  if (/^[a-z][a-z0-9+.-]*:/i.test(trimmed) || trimmed.startsWith('//')) {
    refuse(path, 'Only relative API paths are allowed (no scheme/host).');
  }
  if (trimmed.includes('\\') || /%2e|%2f|%5c/i.test(trimmed)) {
    refuse(path, 'Encoded or backslash path separators are not allowed.');
  }
  if (/[?#]/.test(trimmed)) {
    refuse(path, 'Pass query parameters through `params`, not in the path.');
  }

  const cleaned = trimmed.replace(/^\/+/, '').replace(/\/+$/, '');
  const segments = cleaned.split('/');
  if (segments.some((s) => s === '..' || s === '.')) {
    refuse(path, 'Path traversal is not allowed.');
  }
  if (segments.some((s) => s === '')) {
    refuse(path, 'Empty path segments are not allowed.');
  }

  const matched = ALLOWED_ENDPOINTS.some((pattern) => matchesPattern(pattern.split('/'), segments, org));
  if (!matched) {
    refuse(path, `Allowed paths: ${ALLOWED_ENDPOINTS.join(', ')}.`);
  }
  return cleaned;
}

function matchesPattern(pattern: string[], segments: string[], org: string): boolean {
  if (pattern.length !== segments.length) return false;
  return pattern.every((p, i) => {
    const segment = segments[i];
    if (p === '{org}') return segment === org;
    if (p === '{stream}') return STREAM_NAME_PATTERN.test(segment);
    return segment === p;
  });
}

/** Parses `key=value` strings; the value may itself contain `=`. */
export function parseQueryParams(pairs: readonly string[]): Array<[string, string]> {
  return pairs.map((item) => {
    const eq = item.indexOf('=');
    if (eq === -1) {
      throw new ValidationError(`Expected key=value pair, got: '${item}'`);
    }
    const key = item.slice(0, eq).trim();
    if (!PARAM_KEY_PATTERN.test(key)) {
      throw new ValidationError(`Invalid query parameter name in '${item}'`);
    }
    return [key, item.slice(eq + 1)];
  });
}
