/**
 * Error taxonomy shared by the client, the tools and the entry points.
 *
 * Every failure that leaves the backend client is one of these; tools
 * serialize them with `toErrorBody` instead of letting a stack trace escape.
 */

export type ErrorKind = 'configuration' | 'authentication' | 'connection' | 'api' | 'validation';

export abstract class OpenObserveError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends OpenObserveError {
  readonly kind = 'configuration';
}

export class AuthenticationError extends OpenObserveError {
  readonly kind = 'authentication';

  constructor(
    message: string,
    readonly reason: 'unauthorized' | 'forbidden',
    readonly statusCode: number,
  ) {
    super(message);
  }
}

export class ConnectionError extends OpenObserveError {
  readonly kind = 'connection';

  constructor(
    message: string,
    readonly reason: 'unreachable' | 'timeout' | 'request_failed',
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ApiError extends OpenObserveError {
  readonly kind = 'api';

  constructor(
    message: string,
    readonly statusCode: number,
    readonly body: string,
  ) {
    super(message);
  }
}

export class ValidationError extends OpenObserveError {
  readonly kind = 'validation';
  readonly code: string = 'invalid_input';
}

/** `get_api` refusal: off the allow-list, or a path that tries to escape it. */
export class EndpointNotAllowedError extends ValidationError {
  override readonly code = 'endpoint_not_allowed';

  constructor(readonly path: string, detail: string) {
    super(`API path not allowed: '${path}'. ${detail}`);
  }
}

export interface ErrorBody {
  kind: ErrorKind | 'internal';
  message: string;
  code?: string;
  reason?: string;
  statusCode?: number;
  body?: string;
}

const BODY_EXCERPT_CHARS = 500;

export function excerpt(text: string, max = BODY_EXCERPT_CHARS): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export function toErrorBody(e: unknown): ErrorBody {
  if (e instanceof ValidationError) {
    return { kind: e.kind, code: e.code, message: e.message };
  }
  if (e instanceof AuthenticationError) {
    return { kind: e.kind, reason: e.reason, statusCode: e.statusCode, message: e.message };
  }
  if (e instanceof ConnectionError) {
    return { kind: e.kind, reason: e.reason, message: e.message };
  }
  if (e instanceof ApiError) {
    return { kind: e.kind, statusCode: e.statusCode, message: e.message, body: excerpt(e.body) };
  }
  if (e instanceof OpenObserveError) {
    return { kind: e.kind, message: e.message };
  }
  return { kind: 'internal', message: e instanceof Error ? e.message : String(e) };
}
