import type { ConfigurationError } from '@cloudcall/core';
import { getEnv, type CloudcallEnv } from '@cloudcall/env';
import type { Result } from 'neverthrow';

import { initLogger, type LoggerConfig } from './logger.js';
import { ConsoleSink } from './sinks/console.js';

/**
 * Logger settings for an environment. Tests stay silent, development gets
 * colored text and production one JSON object per line.
 */
export function loggerConfigFromEnv(env: Pick<CloudcallEnv, 'CLOUDCALL_LOG_LEVEL' | 'NODE_ENV'>): LoggerConfig {
  if (env.NODE_ENV === 'test') {
    return { level: env.CLOUDCALL_LOG_LEVEL, sinks: [] };
  }

  const production = env.NODE_ENV === 'production';
  return {
    level: env.CLOUDCALL_LOG_LEVEL,
    sinks: [new ConsoleSink({ color: !production, format: production ? 'json' : 'text' })],
  };
}

/**
 * Initialize logging from CLOUDCALL_LOG_LEVEL and NODE_ENV.
 */
export function initLoggerFromEnv(): Result<LoggerConfig, ConfigurationError> {
  return getEnv().map((env) => {
    const config = loggerConfigFromEnv(env);
    initLogger(config);
    return config;
  });
}
