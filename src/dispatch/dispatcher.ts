/**
 * Storage Dispatcher
 *
 * Routes a URI to the first registered pipeline that accepts it.
 */

import { UnsupportedSchemeError } from '../errors/index.js';
import type { DownloadResult } from '../types/index.js';
import type { StoragePipeline } from './pipeline.js';

export class StorageDispatcher {
  private readonly pipelines: StoragePipeline[];

  constructor(pipelines: readonly StoragePipeline[] = []) {
    this.pipelines = [...pipelines];
  }

  /**
   * Add a pipeline after the existing ones.
   */
  register(pipeline: StoragePipeline): this {
    this.pipelines.push(pipeline);
    return this;
  }

  /** Names of registered pipelines, in routing order */
  get pipelineNames(): string[] {
    return this.pipelines.map((pipeline) => pipeline.name);
  }

  /**
   * @throws {UnsupportedSchemeError} when no pipeline matches
   */
  resolve(uri: string): StoragePipeline {
    const pipeline = this.pipelines.find((candidate) => candidate.matches(uri));
    if (!pipeline) {
      throw new UnsupportedSchemeError({
        message: `Cannot recognize storage type for '${uri}'; supported: ${this.pipelineNames.join(', ')}`,
        uri,
      });
    }
    return pipeline;
  }

  async download(uri: string, destination: string): Promise<DownloadResult> {
    return this.resolve(uri).download(uri, destination);
  }
}
