import { HttpError, SdkDependencyError, type AnySdkError } from '@cloudcall/core';
import { getLogger, type Logger } from '@cloudcall/logger';
import { err, type Result } from 'neverthrow';

import { calculateRetryDelay, isRetriable, retryHintSeconds } from './backoff.js';
import { RetryPolicy } from './policy.js';
import type { AttemptFn, GiveUpEvent, RetryEffects, RetryOptions } from './types.js';

/**
 * Wait `ms`, resolving early when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function abortedError(signal: AbortSignal): HttpError {
  return new HttpError('Request aborted', { cause: signal.reason });
}

/**
 * Attempt loop shared by every call shape.
 *
 * Attempts run sequentially. After a failure the error decides what happens:
 * terminal kinds surface at once, transient ones wait (server hint first,
 * jittered exponential backoff otherwise) and try again until the policy's
 * retries are spent. An abort stops the loop before the next attempt and cuts
 * a pending wait short.
 */
export class RetryEngine {
  private readonly effects: RetryEffects;
  private readonly logger: Logger;

  constructor(
    readonly policy: RetryPolicy = RetryPolicy.default(),
    effects?: Partial<RetryEffects>
  ) {
    this.effects = {
      delay: sleep,
      now: () => Date.now(),
      random: Math.random,
      ...effects,
    };
    this.logger = getLogger('RetryEngine');
  }

  async executeWithRetry<T>(makeAttempt: AttemptFn<T>, options: RetryOptions = {}): Promise<Result<T, AnySdkError>> {
    const { hooks, label = 'request', signal } = options;
    const { maxRetries, initialBackoffMs } = this.policy;
    const startTime = this.effects.now();

    const giveUp = (event: Omit<GiveUpEvent, 'durationMs'>): Result<T, AnySdkError> => {
      hooks?.onGiveUp?.({ ...event, durationMs: this.effects.now() - startTime });
      return err(event.error);
    };

    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) {
        return giveUp({ attempts: attempt, error: abortedError(signal), reason: 'aborted' });
      }

      let result: Result<T, AnySdkError>;
      try {
        result = await makeAttempt(attempt, signal);
      } catch (error) {
        result = err(SdkDependencyError.from(error, { attempt, label }));
      }

      if (result.isOk()) {
        if (attempt > 0) {
          this.logger.debug({ attempts: attempt + 1, label }, 'Succeeded after retry');
        }
        return result;
      }

      const error = result.error;
      if (signal?.aborted) {
        return giveUp({ attempts: attempt + 1, error: abortedError(signal), reason: 'aborted' });
      }
      if (!isRetriable(error)) {
        return giveUp({ attempts: attempt + 1, error, reason: 'terminal' });
      }
      if (attempt >= maxRetries) {
        this.logger.warn(
          { attempts: attempt + 1, error: error.message, label },
          `Giving up after ${attempt + 1} attempts`
        );
        return giveUp({ attempts: attempt + 1, error, reason: 'exhausted' });
      }

      const { delayMs, source } = calculateRetryDelay(
        attempt,
        initialBackoffMs,
        retryHintSeconds(error),
        this.effects.random
      );
      this.logger.warn(
        { delayMs, error: error.message, label, source },
        `Attempt ${attempt + 1}/${maxRetries + 1} failed, retrying`
      );
      hooks?.onBackoff?.({ attempt, delayMs, error, source });
      await this.effects.delay(delayMs, signal);
    }
  }
}
