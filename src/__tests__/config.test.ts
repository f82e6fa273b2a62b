import { describe, it, expect } from 'vitest';

import { buildServiceConfig, ConfigValidationError, DEFAULT_DATA_DIR } from '../config.js';

describe('buildServiceConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(buildServiceConfig({})).toEqual({
      port: 8000,
      host: '0.0.0.0',
      logLevel: 'info',
      dataDir: DEFAULT_DATA_DIR,
      corsOrigin: '*',
      rateLimit: {
        maxRequests: 5,
        windowSeconds: 60,
        evictionCron: '* * * * *',
      },
    });
  });

  it('reads overrides', () => {
    const config = buildServiceConfig({
      PORT: '3000',
      HOST: '127.0.0.1',
      LOG_LEVEL: 'DEBUG',
      DATA_DIR: '/srv/directory',
      CORS_ORIGIN: 'https://directory.example.com',
      RATE_LIMIT_MAX_REQUESTS: '10',
      RATE_LIMIT_WINDOW_SECONDS: '30',
      RATE_LIMIT_EVICTION_CRON: '*/5 * * * *',
    });

    expect(config).toEqual({
      port: 3000,
      host: '127.0.0.1',
      logLevel: 'debug',
      dataDir: '/srv/directory',
      corsOrigin: 'https://directory.example.com',
      rateLimit: { maxRequests: 10, windowSeconds: 30, evictionCron: '*/5 * * * *' },
    });
  });

  it('treats blank values as unset', () => {
    const config = buildServiceConfig({ PORT: '', LOG_LEVEL: '  ', RATE_LIMIT_MAX_REQUESTS: '' });
    expect(config.port).toBe(8000);
    expect(config.logLevel).toBe('info');
    expect(config.rateLimit.maxRequests).toBe(5);
  });

  it('collects every problem into one error', () => {
    let error: unknown;
    try {
      buildServiceConfig({
        PORT: 'abc',
        LOG_LEVEL: 'verbose',
        RATE_LIMIT_EVICTION_CRON: '61 * * * *',
        RATE_LIMIT_WINDOW_SECONDS: '0',
      });
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(ConfigValidationError);
    expect(error instanceof ConfigValidationError && error.problems).toEqual([
      'PORT must be a positive integer (got "abc")',
      'LOG_LEVEL must be one of debug, info, warn, error (got "verbose")',
      'RATE_LIMIT_EVICTION_CRON is not a valid cron expression (got "61 * * * *")',
      'RATE_LIMIT_WINDOW_SECONDS must be a positive integer (got "0")',
    ]);
  });

  it('rejects fractional and out-of-range ports', () => {
    expect(() => buildServiceConfig({ PORT: '1.5' })).toThrow(
      'PORT must be a positive integer (got "1.5")',
    );
    expect(() => buildServiceConfig({ PORT: '70000' })).toThrow(
      'PORT must be at most 65535 (got "70000")',
    );
  });
});
