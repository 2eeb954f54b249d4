/**
 * Downloader
 *
 * Lists everything under a location and writes each object below the
 * destination root, in listing order.
 */

import * as path from 'node:path';
import { CredentialResolver } from '../auth/index.js';
import { NotFoundError } from '../errors/index.js';
import { collect, listObjectKeys } from '../listing/index.js';
import { mapObjects } from '../mapping/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import type {
  ClientFactory,
  ContainerHandle,
  CredentialProvider,
  DownloadResult,
  FileSystemSink,
  Location,
  MappedObject,
} from '../types/index.js';

export interface DownloaderOptions<TCredential> {
  factory: ClientFactory<TCredential>;
  credentialProvider: CredentialProvider<TCredential>;
  sink: FileSystemSink;
  logger?: Logger;
  /** Objects transferred at once (default: 1) */
  maxConcurrency?: number;
}

/**
 * Download executor shared by every pipeline
 */
export class Downloader<TCredential> {
  private readonly resolver: CredentialResolver<TCredential>;
  private readonly sink: FileSystemSink;
  private readonly logger: Logger;
  private readonly maxConcurrency: number;

  constructor(options: DownloaderOptions<TCredential>) {
    this.logger = options.logger ?? new NoopLogger();
    this.resolver = new CredentialResolver(options.factory, options.credentialProvider, this.logger);
    this.sink = options.sink;
    this.maxConcurrency = Math.max(1, options.maxConcurrency ?? 1);
  }

  /**
   * Materialize every object under `location` below `destRoot`.
   *
   * Listing completes before the first write, so an access failure leaves
   * the filesystem untouched. A failed fetch or write aborts the run;
   * files written before it stay in place.
   *
   * @throws {NotFoundError} when nothing is listed under the location
   */
  async download(location: Location, destRoot: string): Promise<DownloadResult> {
    this.logger.info('Connecting to storage', {
      endpoint: location.endpoint,
      container: location.container,
      prefix: location.prefix,
    });

    const { value: listing } = await this.resolver.resolve(location, async (client) => {
      const container = client.getContainer(location.container);
      const keys = await collect(listObjectKeys(container, location.prefix));
      return { container, keys };
    });

    if (listing.keys.length === 0) {
      throw new NotFoundError({
        message: `Failed to fetch model: no objects found under '${location.uri}'`,
        uri: location.uri,
      });
    }

    const objects = mapObjects(location.prefix, listing.keys, destRoot);
    await this.transferAll(listing.container, objects);

    this.logger.info('Download complete', { uri: location.uri, destination: destRoot, count: objects.length });
    return { uri: location.uri, destination: destRoot, objects };
  }

  private async transferAll(container: ContainerHandle, objects: readonly MappedObject[]): Promise<void> {
    if (this.maxConcurrency === 1) {
      for (const object of objects) {
        await this.transfer(container, object);
      }
      return;
    }

    // Workers finish their current object before the run rejects, so the
    // files on disk are final once download() settles.
    let next = 0;
    const failures: unknown[] = [];
    const worker = async (): Promise<void> => {
      while (failures.length === 0) {
        const object = objects[next];
        if (object === undefined) {
          return;
        }
        next += 1;
        try {
          await this.transfer(container, object);
        } catch (error) {
          failures.push(error);
        }
      }
    };

    const workers = Array.from({ length: Math.min(this.maxConcurrency, objects.length) }, () => worker());
    await Promise.allSettled(workers);
    if (failures.length > 0) {
      throw failures[0];
    }
  }

  private async transfer(container: ContainerHandle, object: MappedObject): Promise<void> {
    // Zero-byte "folder/" placeholders become directories.
    if (object.key.endsWith('/')) {
      this.logger.debug('Creating directory placeholder', { key: object.key, destination: object.destinationPath });
      await this.sink.makeDirs(object.destinationPath);
      return;
    }

    await this.sink.makeDirs(path.dirname(object.destinationPath));
    this.logger.info(`Downloading ${object.key} to ${object.destinationPath}`);
    const data = await container.fetch(object.key);
    await this.sink.writeFile(object.destinationPath, data);
  }
}
