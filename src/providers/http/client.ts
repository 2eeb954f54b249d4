/**
 * Plain HTTP(S) file source.
 *
 * The host is the container and the URL path a single key. Listing sends
 * HEAD for the file, so access failures surface before any download, and
 * reports exactly the requested path.
 */

import type { HttpConfig } from '../../config/index.js';
import { createErrorFromResponse } from '../../errors/index.js';
import { bodyText, isSuccess, type HttpResponse, type HttpTransport } from '../../transport/index.js';
import type {
  ClientFactory,
  ContainerHandle,
  CredentialProvider,
  RemoteObject,
  StorageClient,
} from '../../types/index.js';
import { encodeKeyPath } from '../xml.js';

export interface HttpCredential {
  readonly bearerToken: string;
}

export interface HttpClientOptions {
  /** Query string appended to every fetch, including the leading `?` */
  query?: string;
  timeoutMs?: number;
}

/** Statuses meaning the server does not implement HEAD */
const HEAD_UNSUPPORTED = new Set([405, 501]);

export class HttpClientFactory implements ClientFactory<HttpCredential> {
  constructor(
    private readonly transport: HttpTransport,
    private readonly options: HttpClientOptions = {}
  ) {}

  async construct(endpoint: string, credential?: HttpCredential): Promise<StorageClient> {
    const { transport, options } = this;
    return {
      getContainer: (host: string): ContainerHandle => new HttpFileHandle(`${endpoint}${host}`, transport, credential, options),
    };
  }
}

class HttpFileHandle implements ContainerHandle {
  constructor(
    private readonly baseUrl: string,
    private readonly transport: HttpTransport,
    private readonly credential: HttpCredential | undefined,
    private readonly options: HttpClientOptions
  ) {}

  async *list(prefix: string): AsyncGenerator<RemoteObject> {
    const response = await this.send('HEAD', prefix);
    // Servers without HEAD support still get a GET attempt.
    if (!isSuccess(response) && !HEAD_UNSUPPORTED.has(response.status)) {
      throw createErrorFromResponse(response.status, bodyText(response), { uri: this.url(prefix), key: prefix });
    }
    yield { name: prefix };
  }

  async fetch(key: string): Promise<Uint8Array> {
    const response = await this.send('GET', key);
    if (!isSuccess(response)) {
      throw createErrorFromResponse(response.status, bodyText(response), { uri: this.url(key), key });
    }
    return response.body;
  }

  private url(key: string): string {
    return `${this.baseUrl}/${encodeKeyPath(key)}${this.options.query ?? ''}`;
  }

  private send(method: 'GET' | 'HEAD', key: string): Promise<HttpResponse> {
    const headers: Record<string, string> = {};
    if (this.credential) {
      headers['Authorization'] = `Bearer ${this.credential.bearerToken}`;
    }
    return this.transport.send({
      method,
      url: this.url(key),
      headers,
      timeout: this.options.timeoutMs,
    });
  }
}

export class HttpBearerCredentialProvider implements CredentialProvider<HttpCredential> {
  readonly name = 'http-bearer';

  constructor(private readonly config: HttpConfig) {}

  async acquire(): Promise<HttpCredential | undefined> {
    return this.config.bearerToken ? { bearerToken: this.config.bearerToken } : undefined;
  }
}
