import type { Credential } from '@cloudcall/auth';
import type { BackoffEvent, RetryPolicy } from '@cloudcall/resilience';
import type { ZodType } from 'zod';

import type { HttpMethod } from './core/types.js';
import type { InstrumentationCollector } from './instrumentation.js';

export const DEFAULT_API_VERSION = '2025-01-01-preview';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_AUTH_HEADER = 'Authorization';

export interface ApiClientConfig {
  /** Absolute http(s) base URL every path is joined to. */
  endpoint: string;
  credential: Credential;
  /** Sent as the `api-version` header. */
  apiVersion?: string | undefined;
  authHeaderName?: string | undefined;
  defaultHeaders?: Record<string, string> | undefined;
  hooks?: ApiClientHooks | undefined;
  instrumentation?: InstrumentationCollector | undefined;
  maxStreamBufferBytes?: number | undefined;
  retryPolicy?: RetryPolicy | undefined;
  /** Per attempt. For streams it covers only establishing the stream. */
  timeoutMs?: number | undefined;
}

export interface RequestOptions {
  body?: unknown;
  headers?: Record<string, string> | undefined;
  method?: HttpMethod | undefined;
  signal?: AbortSignal | undefined;
  timeoutMs?: number | undefined;
}

export interface SchemaRequestOptions<T> extends RequestOptions {
  schema: ZodType<T>;
}

export interface StreamRequestOptions extends RequestOptions {
  maxBufferBytes?: number | undefined;
}

export interface ApiClientHooks {
  /**
   * Called once when a logical request starts (before any retry attempts).
   * Paired with exactly one terminal event (onRequestSuccess or onRequestFailure).
   */
  onRequestStart?: ((event: { endpoint: string; method: string; timestamp: number }) => void) | undefined;

  /**
   * Called once when a logical request succeeds. For streams this is when the
   * stream is established, not when it ends.
   */
  onRequestSuccess?:
    | ((event: { durationMs: number; endpoint: string; method: string; status: number }) => void)
    | undefined;

  /**
   * Called once when a logical request fails for good. Intermediate failures
   * that were retried are not reported here.
   */
  onRequestFailure?:
    | ((event: {
        durationMs: number;
        endpoint: string;
        error: string;
        method: string;
        status?: number | undefined;
      }) => void)
    | undefined;

  /** Called before each retry wait. */
  onBackoff?: ((event: BackoffEvent) => void) | undefined;
}
