import { describe, expect, it } from 'vitest';
import { ConfigError, DEV_INSECURE_SECRET, MIN_UPSTREAM_TIMEOUT_MS, loadConfig } from '../src/config/env.js';

describe('loadConfig', () => {
  it('applies defaults around a provided secret', () => {
    const config = loadConfig({ JWT_SECRET: 'test-secret' });

    expect(config).toEqual({
      nodeEnv: 'production',
      jwtSecret: 'test-secret',
      insecureSecret: false,
      orderServiceUrl: 'http://localhost:8002',
      host: '0.0.0.0',
      port: 8000,
      accessTokenExpireMinutes: 30,
      upstream: { timeoutMs: 30_000, maxAttempts: 3, retryDelayMs: 1_000 },
      logLevel: 'info',
      allowedOrigins: [],
    });
  });

  it('fails fast without a secret outside development', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({ NODE_ENV: 'staging', JWT_SECRET: '  ' })).toThrow(
      'Invalid configuration: JWT_SECRET: required outside development mode'
    );
  });

  it('falls back to the development secret only in development mode', () => {
    const config = loadConfig({ NODE_ENV: 'development' });

    expect(config.jwtSecret).toBe(DEV_INSECURE_SECRET);
    expect(config.insecureSecret).toBe(true);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      JWT_SECRET: 'test-secret',
      ORDER_SERVICE_URL: 'http://orders.internal:9000/',
      PORT: '9100',
      ACCESS_TOKEN_EXPIRE_MINUTES: '5',
      UPSTREAM_MAX_ATTEMPTS: '5',
      UPSTREAM_RETRY_DELAY_MS: '200',
      LOG_LEVEL: 'debug',
      ALLOWED_ORIGINS: 'https://a.test, https://b.test,',
    });

    expect(config.orderServiceUrl).toBe('http://orders.internal:9000');
    expect(config.port).toBe(9100);
    expect(config.accessTokenExpireMinutes).toBe(5);
    expect(config.upstream).toEqual({ timeoutMs: 30_000, maxAttempts: 5, retryDelayMs: 200 });
    expect(config.logLevel).toBe('debug');
    expect(config.allowedOrigins).toEqual(['https://a.test', 'https://b.test']);
  });

  it('lists every invalid variable', () => {
    let thrown: unknown;
    try {
      loadConfig({ JWT_SECRET: 'test-secret', PORT: 'eighty', ORDER_SERVICE_URL: 'not a url' });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigError);
    if (thrown instanceof ConfigError) {
      expect(thrown.problems.map((problem) => problem.split(':')[0]).sort()).toEqual([
        'ORDER_SERVICE_URL',
        'PORT',
      ]);
    }
  });

  it('rejects an upstream timeout shorter than the connect timeout', () => {
    let thrown: unknown;
    try {
      loadConfig({ JWT_SECRET: 'test-secret', UPSTREAM_TIMEOUT_MS: '5000' });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigError);
    if (thrown instanceof ConfigError) {
      expect(thrown.problems).toHaveLength(1);
      expect(thrown.problems[0].startsWith('UPSTREAM_TIMEOUT_MS:')).toBe(true);
    }
    expect(
      loadConfig({ JWT_SECRET: 'test-secret', UPSTREAM_TIMEOUT_MS: String(MIN_UPSTREAM_TIMEOUT_MS) }).upstream.timeoutMs
    ).toBe(10_000);
  });
});
