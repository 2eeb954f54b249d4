/**
 * Tests for configuration loading
 */

import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../../errors/index.js';
import {
  DEFAULT_AZURE_AUTHORITY,
  DEFAULT_GCS_ENDPOINT,
  DEFAULT_MAX_CONCURRENCY,
  DEFAULT_TIMEOUT_MS,
  loadConfig,
  withOverrides,
} from '../index.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      logLevel: 'info',
      maxConcurrency: DEFAULT_MAX_CONCURRENCY,
      timeoutMs: DEFAULT_TIMEOUT_MS,
      azure: { authority: DEFAULT_AZURE_AUTHORITY },
      gcs: { endpoint: DEFAULT_GCS_ENDPOINT },
      s3: { region: 'us-east-1' },
      http: {},
    });
  });

  it('reads provider settings', () => {
    const config = loadConfig({
      MODEL_FETCHER_LOG_LEVEL: 'debug',
      MODEL_FETCHER_CONCURRENCY: '8',
      MODEL_FETCHER_TIMEOUT_MS: '1000',
      AZ_TENANT_ID: 'tenant',
      AZ_CLIENT_ID: 'client',
      AZ_CLIENT_SECRET: 'test-secret',
      AZ_AUTHORITY_HOST: 'https://login.example.com/',
      GCS_ACCESS_TOKEN: 'test-token',
      AWS_REGION: 'eu-west-1',
      S3_ENDPOINT: 'http://localhost:9000/',
      HTTP_BEARER_TOKEN: 'test-bearer',
    });

    expect(config.logLevel).toBe('debug');
    expect(config.maxConcurrency).toBe(8);
    expect(config.timeoutMs).toBe(1000);
    expect(config.azure).toEqual({
      tenantId: 'tenant',
      clientId: 'client',
      clientSecret: 'test-secret',
      authority: 'https://login.example.com',
    });
    expect(config.gcs.accessToken).toBe('test-token');
    expect(config.s3.region).toBe('eu-west-1');
    expect(config.s3.endpoint).toBe('http://localhost:9000');
    expect(config.http.bearerToken).toBe('test-bearer');
  });

  it('treats empty values as unset', () => {
    const config = loadConfig({ AZ_CLIENT_SECRET: '  ', MODEL_FETCHER_CONCURRENCY: '' });

    expect(config.azure.clientSecret).toBeUndefined();
    expect(config.maxConcurrency).toBe(1);
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ MODEL_FETCHER_LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ MODEL_FETCHER_CONCURRENCY: '0' })).toThrow(/MODEL_FETCHER_CONCURRENCY/);
    expect(() => loadConfig({ MODEL_FETCHER_CONCURRENCY: 'many' })).toThrow(ConfigurationError);
    expect(() => loadConfig({ S3_ENDPOINT: 'not a url' })).toThrow(/^Invalid configuration: S3_ENDPOINT/);
  });
});

describe('withOverrides', () => {
  const base = loadConfig({});

  it('replaces log level and concurrency', () => {
    const config = withOverrides(base, { logLevel: 'warn', maxConcurrency: 4 });

    expect(config.logLevel).toBe('warn');
    expect(config.maxConcurrency).toBe(4);
    expect(config.gcs).toBe(base.gcs);
  });

  it('keeps values that are not overridden', () => {
    expect(withOverrides(base, {})).toEqual(base);
  });

  it('rejects unknown levels and out-of-range concurrency', () => {
    expect(() => withOverrides(base, { logLevel: 'loud' })).toThrow(
      "Unknown log level 'loud', expected one of error, warn, info, debug, trace"
    );
    expect(() => withOverrides(base, { maxConcurrency: 65 })).toThrow('Concurrency must be an integer between 1 and 64');
    expect(() => withOverrides(base, { maxConcurrency: 1.5 })).toThrow(ConfigurationError);
  });
});
