/**
 * Error taxonomy for the request core.
 *
 * A closed set of kinds, each a class carrying a `kind` discriminant so callers
 * can branch without string matching. The proximate cause is kept as the
 * standard `cause` property (an object, never a pre-rendered string) so a caller
 * several layers removed can still walk to the root failure.
 *
 * Messages are sanitized when the error is constructed.
 */

import { sanitize } from '../sanitize.js';

export type ErrorKind = 'configuration' | 'auth' | 'http' | 'api' | 'stream' | 'sdk_dependency';

export interface SdkErrorOptions {
  cause?: unknown;
  context?: Record<string, unknown> | undefined;
}

/**
 * Base class for every failure surfaced by the core.
 */
export abstract class SdkError extends Error {
  abstract readonly kind: ErrorKind;

  readonly timestamp: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, options: SdkErrorOptions = {}) {
    super(sanitize(message), options.cause === undefined ? undefined : { cause: options.cause });
    this.timestamp = new Date().toISOString();
    this.context = options.context;
    this.name = new.target.name;
  }

  toJSON() {
    return {
      cause: describeCause(this.cause),
      context: this.context,
      kind: this.kind,
      message: this.message,
      name: this.name,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Invalid policy, endpoint or environment. Always fatal, never retried.
 */
export class ConfigurationError extends SdkError {
  readonly kind = 'configuration' as const;

  constructor(message: string, options?: SdkErrorOptions) {
    super(`Configuration error: ${message}`, options);
  }
}

/**
 * Credential resolution failed.
 */
export class AuthError extends SdkError {
  readonly kind = 'auth' as const;

  constructor(message: string, options?: SdkErrorOptions) {
    super(`Authentication failed: ${message}`, options);
  }
}

export interface HttpErrorOptions extends SdkErrorOptions {
  /** Absent when the transport failed before a status was observed. */
  status?: number | undefined;
  retryAfterSeconds?: number | undefined;
}

/**
 * Transport-level failure, or a non-success response without a structured error body.
 */
export class HttpError extends SdkError {
  readonly kind = 'http' as const;
  readonly status?: number | undefined;
  readonly retryAfterSeconds?: number | undefined;

  constructor(message: string, options: HttpErrorOptions = {}) {
    super(options.status === undefined ? `HTTP error: ${message}` : `HTTP error: ${options.status} - ${message}`, options);
    this.status = options.status;
    this.retryAfterSeconds = options.retryAfterSeconds;
  }
}

export interface ApiErrorOptions extends SdkErrorOptions {
  status: number;
  code: string;
  retryAfterSeconds?: number | undefined;
}

/**
 * Structured error returned by the remote service.
 */
export class ApiError extends SdkError {
  readonly kind = 'api' as const;
  readonly status: number;
  readonly code: string;
  readonly retryAfterSeconds?: number | undefined;

  constructor(message: string, options: ApiErrorOptions) {
    super(`API error (${options.code}): ${message}`, options);
    this.status = options.status;
    this.code = sanitize(options.code);
    this.retryAfterSeconds = options.retryAfterSeconds;
  }
}

/**
 * Failure while framing or decoding the streaming protocol. Never retried.
 */
export class StreamError extends SdkError {
  readonly kind = 'stream' as const;

  constructor(message: string, options?: SdkErrorOptions) {
    super(`Stream error: ${message}`, options);
  }
}

/**
 * Failure surfaced by an underlying library, wrapped with its original cause.
 */
export class SdkDependencyError extends SdkError {
  readonly kind = 'sdk_dependency' as const;

  constructor(message: string, options?: SdkErrorOptions) {
    super(`Dependency error: ${message}`, options);
  }

  static from(error: unknown, context?: Record<string, unknown>): SdkDependencyError {
    return new SdkDependencyError(getErrorMessage(error), { cause: error, context });
  }
}

export type AnySdkError = ConfigurationError | AuthError | HttpError | ApiError | StreamError | SdkDependencyError;

export function isSdkError(value: unknown): value is AnySdkError {
  return (
    value instanceof ConfigurationError ||
    value instanceof AuthError ||
    value instanceof HttpError ||
    value instanceof ApiError ||
    value instanceof StreamError ||
    value instanceof SdkDependencyError
  );
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * The error followed by each of its causes, outermost first. Stops on cycles.
 */
export function errorChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && !seen.has(current)) {
    chain.push(current);
    seen.add(current);
    current = current instanceof Error ? current.cause : undefined;
  }

  return chain;
}

export function rootCause(error: unknown): unknown {
  const chain = errorChain(error);
  return chain[chain.length - 1];
}

function describeCause(cause: unknown): { message: string; name: string } | undefined {
  if (cause === undefined) {
    return undefined;
  }
  if (cause instanceof Error) {
    return { message: sanitize(cause.message), name: cause.name };
  }
  return { message: sanitize(String(cause)), name: typeof cause };
}
