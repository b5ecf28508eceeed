import type { AnySdkError } from '@cloudcall/core';
import type { Result } from 'neverthrow';

/**
 * One attempt of a retried operation. Invoked again for every attempt, so it
 * must rebuild anything that can go stale between attempts (credentials,
 * request bodies).
 */
export type AttemptFn<T> = (attempt: number, signal?: AbortSignal) => Promise<Result<T, AnySdkError>>;

/**
 * Side effects interface for dependency injection
 */
export interface RetryEffects {
  /** Resolves after `ms`, or early once `signal` aborts. Never rejects. */
  delay: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Uniform in [0, 1). */
  random: () => number;
  now: () => number;
}

export interface BackoffEvent {
  /** Zero-based index of the attempt that just failed. */
  attempt: number;
  delayMs: number;
  error: AnySdkError;
  source: 'retry-after' | 'backoff';
}

export interface GiveUpEvent {
  attempts: number;
  durationMs: number;
  error: AnySdkError;
  reason: 'aborted' | 'exhausted' | 'terminal';
}

export interface RetryHooks {
  /** Called before each wait, once per retry. */
  onBackoff?: ((event: BackoffEvent) => void) | undefined;
  /** Called once when the loop ends without a success. */
  onGiveUp?: ((event: GiveUpEvent) => void) | undefined;
}

export interface RetryOptions {
  hooks?: RetryHooks | undefined;
  /** Used in log lines to tell loops apart. */
  label?: string | undefined;
  signal?: AbortSignal | undefined;
}
