// Pure backoff helpers. Randomness is passed in so callers can pin it.

import { ApiError, HttpError, type SdkError } from '@cloudcall/core';

import { MAX_BACKOFF_MS } from './policy.js';

export const JITTER_MIN = 0.75;
export const JITTER_MAX = 1.25;

/** Statuses that signal a transient condition on the server side. */
export const RETRIABLE_STATUSES: ReadonlySet<number> = new Set([429, 502, 503, 504]);

/**
 * Parse a Retry-After header. Only non-negative integer seconds are honored;
 * anything else (HTTP dates included) yields no hint.
 */
export const parseRetryAfter = (value: string | null | undefined): number | undefined => {
  if (value === null || value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  const seconds = parseInt(trimmed, 10);
  return Number.isSafeInteger(seconds) ? seconds : undefined;
};

/**
 * `initialBackoffMs * 2^attempt`, capped. `attempt` is zero-based.
 */
export const calculateExponentialBackoff = (
  attempt: number,
  initialBackoffMs: number,
  maxDelayMs = MAX_BACKOFF_MS
): number => {
  return Math.min(initialBackoffMs * Math.pow(2, attempt), maxDelayMs);
};

/**
 * Scale by a factor in [JITTER_MIN, JITTER_MAX] drawn from `random` (expected in [0, 1)).
 */
export const applyJitter = (delayMs: number, random: () => number): number => {
  const factor = JITTER_MIN + random() * (JITTER_MAX - JITTER_MIN);
  return Math.round(delayMs * factor);
};

/**
 * True for transport failures (no status observed) and for the transient statuses.
 * Every other kind of error is terminal.
 */
export const isRetriable = (error: SdkError): boolean => {
  if (error instanceof HttpError) {
    return error.status === undefined || RETRIABLE_STATUSES.has(error.status);
  }
  if (error instanceof ApiError) {
    return RETRIABLE_STATUSES.has(error.status);
  }
  return false;
};

export const retryHintSeconds = (error: SdkError): number | undefined => {
  if (error instanceof HttpError || error instanceof ApiError) {
    return error.retryAfterSeconds;
  }
  return undefined;
};

export interface RetryDelay {
  delayMs: number;
  source: 'retry-after' | 'backoff';
}

/**
 * Delay before the attempt after `attempt`. A server hint wins and is used
 * as-is (capped, no jitter); otherwise exponential backoff with jitter.
 */
export const calculateRetryDelay = (
  attempt: number,
  initialBackoffMs: number,
  hintSeconds: number | undefined,
  random: () => number
): RetryDelay => {
  if (hintSeconds !== undefined) {
    return { delayMs: Math.min(hintSeconds * 1000, MAX_BACKOFF_MS), source: 'retry-after' };
  }
  const base = calculateExponentialBackoff(attempt, initialBackoffMs);
  return { delayMs: Math.min(applyJitter(base, random), MAX_BACKOFF_MS), source: 'backoff' };
};
