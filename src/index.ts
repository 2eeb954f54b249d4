/**
 * Model Fetcher
 *
 * Resolves a storage URI to a provider, lists every object under it and
 * writes them below a local directory, keeping their relative layout.
 *
 * Supported sources:
 * - Azure Blob Storage: `https://<account>.blob.core.windows.net/<container>/<prefix>`
 * - Google Cloud Storage: `gs://<bucket>/<prefix>`
 * - Amazon S3 and compatible stores: `s3://<bucket>/<prefix>`
 * - Local files: `file:///path`, `/path`, `./path`
 * - Single files over HTTP(S)
 *
 * @example
 * ```typescript
 * import { createDefaultDispatcher, loadConfig } from 'model-fetcher';
 *
 * const dispatcher = createDefaultDispatcher(loadConfig());
 * const result = await dispatcher.download(
 *   'https://myaccount.blob.core.windows.net/models/resnet/',
 *   '/mnt/models'
 * );
 * console.log(result.objects.map((o) => o.destinationPath));
 * ```
 *
 * @packageDocumentation
 */

// Types
export type {
  StorageScheme,
  Location,
  RemoteObject,
  MappedObject,
  DownloadResult,
  ContainerHandle,
  StorageClient,
  ClientFactory,
  CredentialProvider,
  FileSystemSink,
} from './types/index.js';

// Errors
export {
  ModelFetchError,
  MalformedUriError,
  AuthenticationError,
  NotFoundError,
  UnsupportedSchemeError,
  ConfigurationError,
  CredentialError,
  NetworkError,
  StorageRequestError,
  createErrorFromResponse,
  isAuthenticationError,
} from './errors/index.js';
export type { ModelFetchErrorOptions, ResponseErrorContext } from './errors/index.js';

// Configuration
export {
  loadConfig,
  withOverrides,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_MAX_CONCURRENCY,
  MAX_CONCURRENCY_LIMIT,
} from './config/index.js';
export type { FetcherConfig, AzureConfig, GcsConfig, S3Config, HttpConfig, EnvSource } from './config/index.js';

// Observability
export { ConsoleLogger, NoopLogger, createLogger, sanitizeContext, LOG_LEVELS } from './observability/index.js';
export type { Logger, LogLevel, LogWriter } from './observability/index.js';

// Transport
export { FetchTransport, createTransport, isSuccess, getHeader, bodyText } from './transport/index.js';
export type { HttpTransport, HttpRequest, HttpResponse } from './transport/index.js';

// Core
export {
  parseContainerUri,
  parseBlobUri,
  parseBucketUri,
  parseHttpUri,
  parseLocalUri,
  isBlobUri,
} from './uri/index.js';
export { CredentialResolver } from './auth/index.js';
export type { AccessAttempt, AuthMode, ResolvedAccess } from './auth/index.js';
export { listObjectKeys, collect } from './listing/index.js';
export { mapObjectPath, mapObjects } from './mapping/index.js';
export { Downloader, NodeFileSystemSink } from './download/index.js';
export type { DownloaderOptions } from './download/index.js';
export {
  StorageDispatcher,
  ProviderPipeline,
  createDefaultPipelines,
  createDefaultDispatcher,
  isExistingRelativePath,
  isLocalUri,
} from './dispatch/index.js';
export type { StoragePipeline, ProviderPipelineOptions, DispatcherDependencies } from './dispatch/index.js';

// Providers
export { AzureBlobClientFactory, AzureAdCredentialProvider } from './providers/azure/index.js';
export type { AzureCredential } from './providers/azure/index.js';
export { GcsClientFactory, GcsCredentialProvider } from './providers/gcs/index.js';
export type { GcsCredential } from './providers/gcs/index.js';
export { S3ClientFactory, EnvS3CredentialProvider, AwsSignerV4 } from './providers/s3/index.js';
export type { S3Credential } from './providers/s3/index.js';
export { HttpClientFactory, HttpBearerCredentialProvider } from './providers/http/index.js';
export type { HttpCredential } from './providers/http/index.js';
export { LocalClientFactory, NoCredentialProvider } from './providers/local/index.js';

// Simulation layer (for testing)
export {
  MockStorage,
  StaticCredentialProvider,
  MemoryFileSystemSink,
  RecordingTransport,
  httpResponse,
} from './simulation/index.js';
export type { StorageCall, MockStorageOptions, SinkEvent, RequestHandler } from './simulation/index.js';

// CLI
export { createProgram } from './cli/index.js';
export type { CliDependencies } from './cli/index.js';
