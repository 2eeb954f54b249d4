/**
 * Configuration for the model fetcher.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { LOG_LEVELS, type LogLevel } from '../observability/index.js';

/**
 * Default request timeout in milliseconds (5 minutes).
 */
export const DEFAULT_TIMEOUT_MS = 300000;

/**
 * Objects downloaded at once unless configured otherwise.
 */
export const DEFAULT_MAX_CONCURRENCY = 1;

export const MAX_CONCURRENCY_LIMIT = 64;

export const DEFAULT_AZURE_AUTHORITY = 'https://login.microsoftonline.com';

export const DEFAULT_GCS_ENDPOINT = 'https://storage.googleapis.com';

export const DEFAULT_S3_REGION = 'us-east-1';

/**
 * Service principal used for the Azure AD token fallback.
 */
export interface AzureConfig {
  readonly tenantId?: string;
  readonly clientId?: string;
  readonly clientSecret?: string;
  readonly authority: string;
}

export interface GcsConfig {
  readonly endpoint: string;
  /** Pre-issued OAuth2 access token */
  readonly accessToken?: string;
  /** Metadata server host, e.g. `metadata.google.internal` */
  readonly metadataHost?: string;
}

export interface S3Config {
  readonly region: string;
  /** Custom endpoint (MinIO, Ceph, ...); switches to path-style addressing */
  readonly endpoint?: string;
  readonly accessKeyId?: string;
  readonly secretAccessKey?: string;
  readonly sessionToken?: string;
}

export interface HttpConfig {
  readonly bearerToken?: string;
}

/**
 * Fetcher configuration.
 */
export interface FetcherConfig {
  readonly logLevel: LogLevel;
  readonly maxConcurrency: number;
  readonly timeoutMs: number;
  readonly azure: AzureConfig;
  readonly gcs: GcsConfig;
  readonly s3: S3Config;
  readonly http: HttpConfig;
}

/** Environment-style input; unset and empty values are treated alike */
export type EnvSource = Readonly<Record<string, string | undefined>>;

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value.trim()));

const envSchema = z.object({
  MODEL_FETCHER_LOG_LEVEL: optionalString.pipe(z.enum(['error', 'warn', 'info', 'debug', 'trace']).default('info')),
  MODEL_FETCHER_CONCURRENCY: optionalString.pipe(
    z.coerce.number().int().min(1).max(MAX_CONCURRENCY_LIMIT).default(DEFAULT_MAX_CONCURRENCY)
  ),
  MODEL_FETCHER_TIMEOUT_MS: optionalString.pipe(z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS)),
  AZ_TENANT_ID: optionalString,
  AZ_CLIENT_ID: optionalString,
  AZ_CLIENT_SECRET: optionalString,
  AZ_AUTHORITY_HOST: optionalString.pipe(z.string().url().default(DEFAULT_AZURE_AUTHORITY)),
  GCS_ENDPOINT: optionalString.pipe(z.string().url().default(DEFAULT_GCS_ENDPOINT)),
  GCS_ACCESS_TOKEN: optionalString,
  GCE_METADATA_HOST: optionalString,
  AWS_REGION: optionalString.pipe(z.string().default(DEFAULT_S3_REGION)),
  S3_ENDPOINT: optionalString.pipe(z.string().url().optional()),
  AWS_ACCESS_KEY_ID: optionalString,
  AWS_SECRET_ACCESS_KEY: optionalString,
  AWS_SESSION_TOKEN: optionalString,
  HTTP_BEARER_TOKEN: optionalString,
});

/**
 * Read configuration from environment variables.
 *
 * @throws {ConfigurationError} when a value fails validation
 */
export function loadConfig(env: EnvSource = process.env): FetcherConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError({
      message: `Invalid configuration: ${issues.join('; ')}`,
    });
  }

  const values = result.data;
  return {
    logLevel: values.MODEL_FETCHER_LOG_LEVEL,
    maxConcurrency: values.MODEL_FETCHER_CONCURRENCY,
    timeoutMs: values.MODEL_FETCHER_TIMEOUT_MS,
    azure: {
      tenantId: values.AZ_TENANT_ID,
      clientId: values.AZ_CLIENT_ID,
      clientSecret: values.AZ_CLIENT_SECRET,
      authority: values.AZ_AUTHORITY_HOST.replace(/\/+$/, ''),
    },
    gcs: {
      endpoint: values.GCS_ENDPOINT.replace(/\/+$/, ''),
      accessToken: values.GCS_ACCESS_TOKEN,
      metadataHost: values.GCE_METADATA_HOST,
    },
    s3: {
      region: values.AWS_REGION,
      endpoint: values.S3_ENDPOINT?.replace(/\/+$/, ''),
      accessKeyId: values.AWS_ACCESS_KEY_ID,
      secretAccessKey: values.AWS_SECRET_ACCESS_KEY,
      sessionToken: values.AWS_SESSION_TOKEN,
    },
    http: {
      bearerToken: values.HTTP_BEARER_TOKEN,
    },
  };
}

/**
 * Apply overrides (e.g. from CLI flags) on top of a loaded configuration.
 */
export function withOverrides(
  config: FetcherConfig,
  overrides: { logLevel?: string; maxConcurrency?: number }
): FetcherConfig {
  let { logLevel, maxConcurrency } = config;

  if (overrides.logLevel !== undefined) {
    const level = LOG_LEVELS.find((candidate) => candidate === overrides.logLevel);
    if (!level) {
      throw new ConfigurationError({
        message: `Unknown log level '${overrides.logLevel}', expected one of ${LOG_LEVELS.join(', ')}`,
      });
    }
    logLevel = level;
  }

  if (overrides.maxConcurrency !== undefined) {
    const value = overrides.maxConcurrency;
    if (!Number.isInteger(value) || value < 1 || value > MAX_CONCURRENCY_LIMIT) {
      throw new ConfigurationError({
        message: `Concurrency must be an integer between 1 and ${MAX_CONCURRENCY_LIMIT}`,
      });
    }
    maxConcurrency = value;
  }

  return { ...config, logLevel, maxConcurrency };
}
