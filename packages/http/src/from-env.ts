import { credentialFromEnv, type Credential } from '@cloudcall/auth';
import { ConfigurationError } from '@cloudcall/core';
import { getEnv, type CloudcallEnv } from '@cloudcall/env';
import { DEFAULT_INITIAL_BACKOFF_MS, RetryPolicy } from '@cloudcall/resilience';
import { err, ok, type Result } from 'neverthrow';

import { ApiClient } from './client.js';
import type { HttpEffects } from './core/types.js';
import type { ApiClientConfig } from './types.js';

export interface ClientFromEnvOptions extends Partial<ApiClientConfig> {
  /** Already validated environment; process.env is read when omitted. */
  env?: CloudcallEnv | undefined;
  effects?: Partial<HttpEffects> | undefined;
}

/**
 * Build a client from CLOUDCALL_* variables. Explicit options win over the environment.
 */
export function createClientFromEnv(options: ClientFromEnvOptions = {}): Result<ApiClient, ConfigurationError> {
  const { env: providedEnv, effects, ...overrides } = options;
  const source: Result<CloudcallEnv, ConfigurationError> = providedEnv === undefined ? getEnv() : ok(providedEnv);

  return source.andThen((env): Result<ApiClient, ConfigurationError> => {
    const endpoint = overrides.endpoint ?? env.CLOUDCALL_ENDPOINT;
    if (endpoint === undefined) {
      return err(new ConfigurationError('endpoint is required: set CLOUDCALL_ENDPOINT or pass endpoint'));
    }

    const credential: Result<Credential, ConfigurationError> =
      overrides.credential === undefined ? credentialFromEnv(env) : ok(overrides.credential);
    const retryPolicy: Result<RetryPolicy, ConfigurationError> =
      overrides.retryPolicy !== undefined
        ? ok(overrides.retryPolicy)
        : env.CLOUDCALL_MAX_RETRIES !== undefined
          ? RetryPolicy.create(env.CLOUDCALL_MAX_RETRIES, DEFAULT_INITIAL_BACKOFF_MS)
          : ok(RetryPolicy.default());

    return credential.andThen((resolvedCredential) =>
      retryPolicy.andThen((resolvedPolicy) =>
        ApiClient.create(
          {
            ...overrides,
            apiVersion: overrides.apiVersion ?? env.CLOUDCALL_API_VERSION,
            credential: resolvedCredential,
            endpoint,
            retryPolicy: resolvedPolicy,
          },
          effects
        )
      )
    );
  });
}
