import { ConfigurationError } from '@cloudcall/core';
import { assertErr, assertOk } from '@cloudcall/core/test-utils';
import { resetEnv } from '@cloudcall/env';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { initLoggerFromEnv, loggerConfigFromEnv } from '../from-env.js';
import { getLogger, initLogger } from '../logger.js';
import { ConsoleSink } from '../sinks/console.js';

describe('loggerConfigFromEnv', () => {
  it('stays silent under test', () => {
    expect(loggerConfigFromEnv({ CLOUDCALL_LOG_LEVEL: 'debug', NODE_ENV: 'test' })).toEqual({
      level: 'debug',
      sinks: [],
    });
  });

  it('logs to the console outside of tests', () => {
    const config = loggerConfigFromEnv({ CLOUDCALL_LOG_LEVEL: 'warn', NODE_ENV: 'production' });

    expect(config.level).toBe('warn');
    expect(config.sinks).toHaveLength(1);
    expect(config.sinks?.[0]).toBeInstanceOf(ConsoleSink);
  });

  it('writes one JSON object per line in production', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const sink = loggerConfigFromEnv({ CLOUDCALL_LOG_LEVEL: 'info', NODE_ENV: 'production' }).sinks?.[0];

    sink?.write({ level: 'info', category: 'env', timestamp: new Date('2024-01-01T00:00:00.000Z'), msg: 'ready' });
    sink?.flush();

    expect(logSpy).toHaveBeenCalledWith(
      '{"timestamp":"2024-01-01T00:00:00.000Z","level":"info","category":"env","msg":"ready"}'
    );
    logSpy.mockRestore();
  });
});

describe('initLoggerFromEnv', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetEnv();
    initLogger({ sinks: [] });
  });

  it('applies the configured level', () => {
    vi.stubEnv('CLOUDCALL_LOG_LEVEL', 'error');
    vi.stubEnv('NODE_ENV', 'development');
    resetEnv();

    const config = assertOk(initLoggerFromEnv());

    expect(config.level).toBe('error');
    expect(getLogger('env').isLevelEnabled('warn')).toBe(false);
    expect(getLogger('env').isLevelEnabled('error')).toBe(true);
  });

  it('reports an invalid level', () => {
    vi.stubEnv('CLOUDCALL_LOG_LEVEL', 'loud');
    resetEnv();

    const error = assertErr(initLoggerFromEnv());

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error.message).toContain('CLOUDCALL_LOG_LEVEL');
  });
});
