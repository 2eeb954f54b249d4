/**
 * Google Cloud Storage Client
 *
 * JSON API listing with page tokens and media downloads.
 */

import { z } from 'zod';
import { StorageRequestError, createErrorFromResponse } from '../../errors/index.js';
import {
  bodyText,
  getHeader,
  isSuccess,
  parseJsonText,
  type HttpResponse,
  type HttpTransport,
} from '../../transport/index.js';
import type { ClientFactory, ContainerHandle, RemoteObject, StorageClient } from '../../types/index.js';

/** OAuth2 access token for the storage API */
export interface GcsCredential {
  readonly token: string;
}

export interface GcsClientOptions {
  timeoutMs?: number;
}

const listObjectsSchema = z.object({
  items: z.array(z.object({ name: z.string() })).optional(),
  nextPageToken: z.string().optional(),
});

export class GcsClientFactory implements ClientFactory<GcsCredential> {
  constructor(
    private readonly transport: HttpTransport,
    private readonly options: GcsClientOptions = {}
  ) {}

  async construct(endpoint: string, credential?: GcsCredential): Promise<StorageClient> {
    return new GcsClient(endpoint.replace(/\/+$/, ''), this.transport, credential, this.options);
  }
}

export class GcsClient implements StorageClient {
  constructor(
    readonly endpoint: string,
    private readonly transport: HttpTransport,
    private readonly credential: GcsCredential | undefined,
    private readonly options: GcsClientOptions = {}
  ) {}

  getContainer(name: string): ContainerHandle {
    return new GcsBucketHandle(this, name);
  }

  /** @internal */
  async get(url: string, key?: string): Promise<HttpResponse> {
    const headers: Record<string, string> = {};
    if (this.credential) {
      headers['Authorization'] = `Bearer ${this.credential.token}`;
    }

    const response = await this.transport.send({
      method: 'GET',
      url,
      headers,
      timeout: this.options.timeoutMs,
    });

    if (!isSuccess(response)) {
      throw createErrorFromResponse(response.status, bodyText(response), {
        uri: url,
        key,
        requestId: getHeader(response, 'x-guploader-uploadid'),
      });
    }
    return response;
  }
}

class GcsBucketHandle implements ContainerHandle {
  constructor(
    private readonly client: GcsClient,
    private readonly bucket: string
  ) {}

  async *list(prefix: string): AsyncGenerator<RemoteObject> {
    let pageToken: string | undefined;

    do {
      const params = new URLSearchParams();
      if (prefix) {
        params.set('prefix', prefix);
      }
      if (pageToken) {
        params.set('pageToken', pageToken);
      }
      const query = params.toString();
      const url = `${this.client.endpoint}/storage/v1/b/${encodeURIComponent(this.bucket)}/o${query ? `?${query}` : ''}`;

      const response = await this.client.get(url);
      const parsed = listObjectsSchema.safeParse(parseJsonText(bodyText(response)));
      if (!parsed.success) {
        throw new StorageRequestError({
          message: `Unexpected list response from ${url}`,
          uri: url,
          statusCode: response.status,
        });
      }

      for (const item of parsed.data.items ?? []) {
        yield { name: item.name };
      }
      pageToken = parsed.data.nextPageToken;
    } while (pageToken);
  }

  async fetch(key: string): Promise<Uint8Array> {
    const url = `${this.client.endpoint}/storage/v1/b/${encodeURIComponent(this.bucket)}/o/${encodeURIComponent(key)}?alt=media`;
    const response = await this.client.get(url, key);
    return response.body;
  }
}
