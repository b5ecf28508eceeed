import { ConfigurationError } from '@cloudcall/core';
import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

/** No single wait, computed or server-requested, exceeds this. */
export const MAX_BACKOFF_MS = 60_000;
export const MAX_RETRIES = 10;

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_INITIAL_BACKOFF_MS = 500;

const retryPolicySchema = z.object({
  maxRetries: z
    .number()
    .int({ message: 'must be an integer' })
    .min(0, { message: 'must be at least 0' })
    .max(MAX_RETRIES, { message: `must be at most ${MAX_RETRIES}` }),
  initialBackoffMs: z
    .number()
    .gt(0, { message: 'must be greater than 0' })
    .max(MAX_BACKOFF_MS, { message: `must be at most ${MAX_BACKOFF_MS}` }),
});

/**
 * Immutable retry bounds. Only constructible through `create`, so every
 * instance in circulation is within range.
 */
export class RetryPolicy {
  private constructor(
    readonly maxRetries: number,
    readonly initialBackoffMs: number
  ) {}

  static create(maxRetries: number, initialBackoffMs: number): Result<RetryPolicy, ConfigurationError> {
    const parsed = retryPolicySchema.safeParse({ initialBackoffMs, maxRetries });
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      return err(new ConfigurationError(`Invalid retry policy: ${issues}`));
    }
    return ok(new RetryPolicy(parsed.data.maxRetries, parsed.data.initialBackoffMs));
  }

  static default(): RetryPolicy {
    return new RetryPolicy(DEFAULT_MAX_RETRIES, DEFAULT_INITIAL_BACKOFF_MS);
  }

  /** Total attempts including the first. */
  get maxAttempts(): number {
    return this.maxRetries + 1;
  }
}
