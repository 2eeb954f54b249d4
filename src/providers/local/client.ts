/**
 * Local filesystem source.
 *
 * The container is a directory (the filesystem root for parsed URIs) and
 * keys are `/`-separated paths below it.
 */

import type { Stats } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import * as path from 'node:path';
import { NotFoundError } from '../../errors/index.js';
import type {
  ClientFactory,
  ContainerHandle,
  CredentialProvider,
  RemoteObject,
  StorageClient,
} from '../../types/index.js';

/** Local reads never need a credential */
export type LocalCredential = never;

export class LocalClientFactory implements ClientFactory<LocalCredential> {
  async construct(): Promise<StorageClient> {
    return {
      getContainer: (root: string): ContainerHandle => new LocalDirectoryHandle(root),
    };
  }
}

export class NoCredentialProvider implements CredentialProvider<LocalCredential> {
  readonly name = 'none';

  async acquire(): Promise<undefined> {
    return undefined;
  }
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

export class LocalDirectoryHandle implements ContainerHandle {
  constructor(private readonly root: string) {}

  /**
   * The prefix itself when it is a file, else every regular file below it
   * in name order. A missing path lists nothing.
   */
  async *list(prefix: string): AsyncGenerator<RemoteObject> {
    const target = path.join(this.root, prefix);
    let info: Stats;
    try {
      info = await stat(target);
    } catch (error) {
      if (isMissing(error)) {
        return;
      }
      throw error;
    }

    if (info.isFile()) {
      yield { name: prefix };
      return;
    }
    if (info.isDirectory()) {
      const base = prefix.replace(/\/+$/, '');
      yield* this.walk(target, base);
    }
  }

  private async *walk(dir: string, keyPrefix: string): AsyncGenerator<RemoteObject> {
    const entries = await readdir(dir, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const key = keyPrefix ? `${keyPrefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        yield* this.walk(path.join(dir, entry.name), key);
      } else if (entry.isFile()) {
        yield { name: key };
      }
    }
  }

  async fetch(key: string): Promise<Uint8Array> {
    const filePath = path.join(this.root, key);
    try {
      return await readFile(filePath);
    } catch (error) {
      if (isMissing(error)) {
        throw new NotFoundError({
          message: `File '${filePath}' does not exist`,
          key,
          cause: error instanceof Error ? error : undefined,
        });
      }
      throw error;
    }
  }
}
