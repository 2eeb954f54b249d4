/**
 * Capability contracts between the download core and its collaborators.
 *
 * Provider clients, credential sources and the filesystem are reached only
 * through these interfaces, so tests substitute fakes without patching.
 */

import type { RemoteObject } from './location.js';

/** Handle to one container or bucket */
export interface ContainerHandle {
  /** Objects whose names start with `prefix`, in the order the store reports them */
  list(prefix: string): AsyncIterable<RemoteObject>;
  /** Full contents of the object named `key` */
  fetch(key: string): Promise<Uint8Array>;
}

/** Authenticated (or anonymous) connection to a storage endpoint */
export interface StorageClient {
  getContainer(name: string): ContainerHandle;
}

/**
 * Builds clients for an endpoint
 *
 * `construct` may reject with `AuthenticationError`.
 */
export interface ClientFactory<TCredential> {
  construct(endpoint: string, credential?: TCredential): Promise<StorageClient>;
}

/**
 * Source of the fallback credential
 *
 * Resolves `undefined` when no credential is configured.
 */
export interface CredentialProvider<TCredential> {
  readonly name: string;
  acquire(): Promise<TCredential | undefined>;
}

/** Local destination for downloaded bytes */
export interface FileSystemSink {
  /** Create `path` and its parents; no error if it exists */
  makeDirs(path: string): Promise<void>;
  /** Create or truncate `path` and write `data` */
  writeFile(path: string, data: Uint8Array): Promise<void>;
}
