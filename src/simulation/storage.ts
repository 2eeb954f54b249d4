/**
 * In-memory storage for tests and dry runs.
 *
 * Every call is recorded in order so tests can assert on what the core
 * asked of its collaborators.
 */

import { AuthenticationError, NotFoundError } from '../errors/index.js';
import type {
  ClientFactory,
  ContainerHandle,
  CredentialProvider,
  FileSystemSink,
  RemoteObject,
  StorageClient,
} from '../types/index.js';

export type StorageCall =
  | { readonly type: 'construct'; readonly endpoint: string; readonly credential?: string }
  | { readonly type: 'getContainer'; readonly container: string }
  | { readonly type: 'list'; readonly container: string; readonly prefix: string }
  | { readonly type: 'fetch'; readonly container: string; readonly key: string };

export interface MockStorageOptions {
  /**
   * Credentials that grant access. When set, any other credential (and
   * anonymous access) fails listing with `AuthenticationError`.
   */
  acceptedCredentials?: readonly string[];
  /**
   * Report these names from every listing instead of filtering stored
   * objects by prefix, mimicking a store with its own matching rules.
   */
  listingOverride?: readonly string[];
}

/**
 * Containers of named objects held in memory, listed in insertion order.
 */
export class MockStorage implements ClientFactory<string> {
  readonly calls: StorageCall[] = [];
  private readonly containers = new Map<string, Map<string, Uint8Array>>();

  constructor(private readonly options: MockStorageOptions = {}) {}

  /**
   * Store an object, creating the container if needed.
   */
  put(container: string, key: string, data: Uint8Array | string = key): this {
    let objects = this.containers.get(container);
    if (!objects) {
      objects = new Map();
      this.containers.set(container, objects);
    }
    objects.set(key, typeof data === 'string' ? new TextEncoder().encode(data) : data);
    return this;
  }

  /**
   * Remove an object, e.g. to simulate deletion between listing and fetch.
   */
  remove(container: string, key: string): boolean {
    return this.containers.get(container)?.delete(key) ?? false;
  }

  async construct(endpoint: string, credential?: string): Promise<StorageClient> {
    this.calls.push(credential === undefined ? { type: 'construct', endpoint } : { type: 'construct', endpoint, credential });
    const authorized =
      this.options.acceptedCredentials === undefined ||
      (credential !== undefined && this.options.acceptedCredentials.includes(credential));

    return {
      getContainer: (name: string): ContainerHandle => {
        this.calls.push({ type: 'getContainer', container: name });
        return new MockContainerHandle(this, name, authorized);
      },
    };
  }

  /** Calls of one type, in order */
  callsOf<T extends StorageCall['type']>(type: T): Extract<StorageCall, { type: T }>[] {
    return this.calls.filter((call): call is Extract<StorageCall, { type: T }> => call.type === type);
  }

  /** @internal */
  listNames(container: string, prefix: string): string[] {
    if (this.options.listingOverride) {
      return [...this.options.listingOverride];
    }
    const objects = this.containers.get(container);
    return objects ? [...objects.keys()].filter((key) => key.startsWith(prefix)) : [];
  }

  /** @internal */
  read(container: string, key: string): Uint8Array | undefined {
    return this.containers.get(container)?.get(key);
  }
}

class MockContainerHandle implements ContainerHandle {
  constructor(
    private readonly storage: MockStorage,
    private readonly container: string,
    private readonly authorized: boolean
  ) {}

  async *list(prefix: string): AsyncGenerator<RemoteObject> {
    this.storage.calls.push({ type: 'list', container: this.container, prefix });
    if (!this.authorized) {
      throw new AuthenticationError({
        message: `Access to container '${this.container}' denied`,
        statusCode: 401,
      });
    }
    for (const name of this.storage.listNames(this.container, prefix)) {
      yield { name };
    }
  }

  async fetch(key: string): Promise<Uint8Array> {
    this.storage.calls.push({ type: 'fetch', container: this.container, key });
    if (!this.authorized) {
      throw new AuthenticationError({ message: `Access to '${key}' denied`, key, statusCode: 401 });
    }
    const data = this.storage.read(this.container, key);
    if (!data) {
      throw new NotFoundError({ message: `Object '${key}' not found`, key, statusCode: 404 });
    }
    return data;
  }
}

/**
 * Credential provider returning a fixed value and counting calls.
 */
export class StaticCredentialProvider implements CredentialProvider<string> {
  readonly name = 'static';
  acquireCount = 0;

  constructor(private readonly credential: string | undefined) {}

  async acquire(): Promise<string | undefined> {
    this.acquireCount += 1;
    return this.credential;
  }
}

export type SinkEvent =
  | { readonly type: 'makeDirs'; readonly path: string }
  | { readonly type: 'writeFile'; readonly path: string; readonly data: Uint8Array };

/**
 * Filesystem sink that keeps written files in memory.
 */
export class MemoryFileSystemSink implements FileSystemSink {
  readonly events: SinkEvent[] = [];
  readonly directories = new Set<string>();
  readonly files = new Map<string, Uint8Array>();

  /** Paths whose write should fail */
  private readonly failingPaths = new Set<string>();

  failWritesTo(path: string): this {
    this.failingPaths.add(path);
    return this;
  }

  async makeDirs(path: string): Promise<void> {
    this.events.push({ type: 'makeDirs', path });
    this.directories.add(path);
  }

  async writeFile(path: string, data: Uint8Array): Promise<void> {
    this.events.push({ type: 'writeFile', path, data });
    if (this.failingPaths.has(path)) {
      throw new Error(`EACCES: permission denied, open '${path}'`);
    }
    this.files.set(path, data);
  }

  /** Paths passed to `writeFile`, in order */
  get writtenPaths(): string[] {
    return this.events.flatMap((event) => (event.type === 'writeFile' ? [event.path] : []));
  }

  /** Text content of a written file */
  text(path: string): string | undefined {
    const data = this.files.get(path);
    return data === undefined ? undefined : new TextDecoder().decode(data);
  }
}
