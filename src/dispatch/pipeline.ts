/**
 * Provider pipelines: URI matcher, parser, client factory and credential
 * provider, run through the shared Downloader.
 */

import { Downloader } from '../download/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import type {
  ClientFactory,
  CredentialProvider,
  DownloadResult,
  FileSystemSink,
  Location,
} from '../types/index.js';

export interface StoragePipeline {
  readonly name: string;
  matches(uri: string): boolean;
  download(uri: string, destination: string): Promise<DownloadResult>;
}

export interface ProviderPipelineOptions<TCredential, TLocation extends Location = Location> {
  name: string;
  matches: (uri: string) => boolean;
  parse: (uri: string) => TLocation;
  /** Client factory for one parsed location */
  factory: (location: TLocation) => ClientFactory<TCredential>;
  credentialProvider: CredentialProvider<TCredential>;
  sink: FileSystemSink;
  logger?: Logger;
  maxConcurrency?: number;
}

export class ProviderPipeline<TCredential, TLocation extends Location = Location> implements StoragePipeline {
  readonly name: string;
  private readonly logger: Logger;

  constructor(private readonly options: ProviderPipelineOptions<TCredential, TLocation>) {
    this.name = options.name;
    this.logger = options.logger ?? new NoopLogger();
  }

  matches(uri: string): boolean {
    return this.options.matches(uri);
  }

  async download(uri: string, destination: string): Promise<DownloadResult> {
    const location = this.options.parse(uri);
    const downloader = new Downloader<TCredential>({
      factory: this.options.factory(location),
      credentialProvider: this.options.credentialProvider,
      sink: this.options.sink,
      logger: this.logger.child({ pipeline: this.name }),
      maxConcurrency: this.options.maxConcurrency,
    });
    return downloader.download(location, destination);
  }
}
