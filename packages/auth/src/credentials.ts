import { inspect } from 'node:util';

import { AuthError, ConfigurationError, getErrorMessage } from '@cloudcall/core';
import { getEnv, type CloudcallEnv } from '@cloudcall/env';
import { getLogger } from '@cloudcall/logger';
import { err, ok, type Result } from 'neverthrow';

import { AsyncLock } from './lock.js';

/** Scope requested when a dynamic credential is not given its own. */
export const DEFAULT_TOKEN_SCOPE = 'https://cognitiveservices.azure.com/.default';

/** A cached token is refreshed this long before it actually expires. */
export const REFRESH_BUFFER_MS = 60_000;

export interface AccessToken {
  token: string;
  expiresOn: Date;
}

/**
 * Token-issuing capability supplied by the caller. It may reject; the
 * rejection is kept as the cause of the resulting AuthError.
 */
export interface TokenProvider {
  getToken(scopes: readonly string[]): Promise<AccessToken>;
}

export interface CachedToken {
  readonly value: string;
  /** Epoch milliseconds. */
  readonly expiresAt: number;
}

export function isTokenValid(token: CachedToken, now: number, refreshBufferMs = REFRESH_BUFFER_MS): boolean {
  return now < token.expiresAt - refreshBufferMs;
}

function toAuthorizationValue(secret: string): string {
  return `Bearer ${secret}`;
}

/**
 * A fixed API key. Never expires and is never cached.
 */
export class StaticCredential {
  readonly kind = 'static' as const;

  private constructor(private readonly apiKey: string) {}

  static create(apiKey: string): Result<StaticCredential, ConfigurationError> {
    if (apiKey.trim() === '') {
      return err(new ConfigurationError('API key must not be empty'));
    }
    return ok(new StaticCredential(apiKey));
  }

  resolve(): Promise<Result<string, AuthError>> {
    return Promise.resolve(ok(toAuthorizationValue(this.apiKey)));
  }

  forceRefresh(): Promise<Result<string, AuthError>> {
    return this.resolve();
  }

  toString(): string {
    return 'StaticCredential(****)';
  }

  toJSON(): string {
    return this.toString();
  }

  [inspect.custom](): string {
    return this.toString();
  }
}

export interface DynamicCredentialOptions {
  scopes?: readonly string[] | undefined;
  /** Clock in epoch milliseconds. */
  now?: (() => number) | undefined;
}

/**
 * Token obtained from a provider and cached until shortly before expiry.
 *
 * Concurrent callers share one cache slot behind an async lock that is held
 * across the provider call, so an expired slot triggers exactly one fetch no
 * matter how many callers are waiting on it.
 */
export class DynamicCredential {
  readonly kind = 'dynamic' as const;

  private readonly lock = new AsyncLock();
  private readonly logger = getLogger('DynamicCredential');
  private readonly scopes: readonly string[];
  private readonly now: () => number;
  private cached: CachedToken | undefined;

  constructor(
    private readonly provider: TokenProvider,
    options: DynamicCredentialOptions = {}
  ) {
    this.scopes = options.scopes ?? [DEFAULT_TOKEN_SCOPE];
    this.now = options.now ?? (() => Date.now());
  }

  resolve(): Promise<Result<string, AuthError>> {
    return this.lock.runExclusive(async (): Promise<Result<string, AuthError>> => {
      if (this.cached && isTokenValid(this.cached, this.now())) {
        this.logger.trace('Using cached token');
        return ok(toAuthorizationValue(this.cached.value));
      }
      return this.fetchToken(this.cached ? 'expiring' : 'empty');
    });
  }

  /** Fetch a new token even if the cached one is still valid. */
  forceRefresh(): Promise<Result<string, AuthError>> {
    return this.lock.runExclusive(() => this.fetchToken('forced'));
  }

  /** Drop the cached token. Waits for an in-flight fetch to finish first. */
  invalidate(): Promise<void> {
    return this.lock.runExclusive(() => {
      this.cached = undefined;
      return Promise.resolve();
    });
  }

  toString(): string {
    return 'DynamicCredential(...)';
  }

  toJSON(): string {
    return this.toString();
  }

  [inspect.custom](): string {
    return this.toString();
  }

  private async fetchToken(reason: 'empty' | 'expiring' | 'forced'): Promise<Result<string, AuthError>> {
    this.logger.debug({ reason, scopes: this.scopes }, 'Fetching token');

    let accessToken: AccessToken;
    try {
      accessToken = await this.provider.getToken(this.scopes);
    } catch (error) {
      this.logger.warn({ error }, 'Token provider failed');
      return err(new AuthError(`token provider failed: ${getErrorMessage(error)}`, { cause: error }));
    }

    const expiresAt = accessToken.expiresOn.getTime();
    if (accessToken.token === '') {
      return err(new AuthError('token provider returned an empty token'));
    }
    if (Number.isNaN(expiresAt)) {
      return err(new AuthError('token provider returned an invalid expiry'));
    }

    this.cached = { expiresAt, value: accessToken.token };
    this.logger.debug({ expiresAt: new Date(expiresAt).toISOString() }, 'Token refreshed');
    return ok(toAuthorizationValue(accessToken.token));
  }
}

export type Credential = StaticCredential | DynamicCredential;

/**
 * Static credential from CLOUDCALL_API_KEY.
 */
export function credentialFromEnv(env?: CloudcallEnv): Result<StaticCredential, ConfigurationError> {
  const source: Result<CloudcallEnv, ConfigurationError> = env === undefined ? getEnv() : ok(env);
  return source.andThen((values): Result<StaticCredential, ConfigurationError> => {
    if (values.CLOUDCALL_API_KEY === undefined) {
      return err(new ConfigurationError('CLOUDCALL_API_KEY is not set'));
    }
    return StaticCredential.create(values.CLOUDCALL_API_KEY);
  });
}
