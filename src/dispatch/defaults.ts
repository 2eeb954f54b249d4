/**
 * Default pipeline set: Azure Blob, GCS, S3, local, HTTP(S).
 *
 * Azure is registered ahead of HTTP(S) so blob URLs are listed as
 * containers rather than fetched as single files.
 */

import { existsSync } from 'node:fs';
import * as path from 'node:path';
import type { FetcherConfig } from '../config/index.js';
import { NodeFileSystemSink } from '../download/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import { AzureAdCredentialProvider, AzureBlobClientFactory, type AzureCredential } from '../providers/azure/index.js';
import { GcsClientFactory, GcsCredentialProvider, type GcsCredential } from '../providers/gcs/index.js';
import { HttpBearerCredentialProvider, HttpClientFactory, type HttpCredential } from '../providers/http/index.js';
import { LocalClientFactory, NoCredentialProvider, type LocalCredential } from '../providers/local/index.js';
import { EnvS3CredentialProvider, S3ClientFactory, awsEndpoint, type S3Credential } from '../providers/s3/index.js';
import { createTransport, type HttpTransport } from '../transport/index.js';
import type { FileSystemSink } from '../types/index.js';
import { isBlobUri, parseBlobUri, parseBucketUri, parseHttpUri, parseLocalUri } from '../uri/index.js';
import { StorageDispatcher } from './dispatcher.js';
import { ProviderPipeline, type StoragePipeline } from './pipeline.js';

export interface DispatcherDependencies {
  transport?: HttpTransport;
  sink?: FileSystemSink;
  logger?: Logger;
  /** Base directory for relative local paths */
  cwd?: string;
}

/**
 * Whether `uri` is a local path: `file://`, absolute, or `./` / `../` relative.
 */
export function isLocalUri(uri: string): boolean {
  return uri.startsWith('file://') || uri.startsWith('/') || uri.startsWith('./') || uri.startsWith('../');
}

const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Whether `uri` is a bare relative path such as `models/bert` that names an
 * existing file or directory under `cwd`. Anything with a `scheme://` is not.
 */
export function isExistingRelativePath(uri: string, cwd: string = process.cwd()): boolean {
  return uri !== '' && !SCHEME_PATTERN.test(uri) && existsSync(path.resolve(cwd, uri));
}

export function createDefaultPipelines(config: FetcherConfig, deps: DispatcherDependencies = {}): StoragePipeline[] {
  const transport = deps.transport ?? createTransport(config.timeoutMs);
  const sink = deps.sink ?? new NodeFileSystemSink();
  const logger = deps.logger ?? new NoopLogger();
  const common = { sink, logger, maxConcurrency: config.maxConcurrency };
  const timeoutMs = config.timeoutMs;

  const azure = new ProviderPipeline<AzureCredential>({
    ...common,
    name: 'azure-blob',
    matches: isBlobUri,
    parse: parseBlobUri,
    factory: () => new AzureBlobClientFactory(transport, { timeoutMs }),
    credentialProvider: new AzureAdCredentialProvider(config.azure, transport, logger),
  });

  const gcs = new ProviderPipeline<GcsCredential>({
    ...common,
    name: 'gcs',
    matches: (uri) => uri.startsWith('gs://'),
    parse: (uri) => parseBucketUri(uri, config.gcs.endpoint),
    factory: () => new GcsClientFactory(transport, { timeoutMs }),
    credentialProvider: new GcsCredentialProvider(config.gcs, transport, logger),
  });

  const s3 = new ProviderPipeline<S3Credential>({
    ...common,
    name: 's3',
    matches: (uri) => uri.startsWith('s3://'),
    parse: (uri) => parseBucketUri(uri, config.s3.endpoint ?? awsEndpoint(config.s3.region)),
    factory: () =>
      new S3ClientFactory(transport, {
        region: config.s3.region,
        pathStyle: config.s3.endpoint !== undefined,
        timeoutMs,
      }),
    credentialProvider: new EnvS3CredentialProvider(config.s3),
  });

  const local = new ProviderPipeline<LocalCredential>({
    ...common,
    name: 'local',
    matches: (uri) => isLocalUri(uri) || isExistingRelativePath(uri, deps.cwd),
    parse: (uri) => parseLocalUri(uri, deps.cwd),
    factory: () => new LocalClientFactory(),
    credentialProvider: new NoCredentialProvider(),
  });

  const http = new ProviderPipeline<HttpCredential, ReturnType<typeof parseHttpUri>>({
    ...common,
    name: 'http',
    matches: (uri) => uri.startsWith('http://') || uri.startsWith('https://'),
    parse: parseHttpUri,
    factory: (location) => new HttpClientFactory(transport, { query: location.query, timeoutMs }),
    credentialProvider: new HttpBearerCredentialProvider(config.http),
  });

  return [azure, gcs, s3, local, http];
}

export function createDefaultDispatcher(config: FetcherConfig, deps: DispatcherDependencies = {}): StorageDispatcher {
  return new StorageDispatcher(createDefaultPipelines(config, deps));
}
