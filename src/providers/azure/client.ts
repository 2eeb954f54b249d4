/**
 * Azure Blob Storage Client
 *
 * REST client covering the two calls a download needs: List Blobs and
 * Get Blob. Anonymous unless constructed with a bearer token.
 */

import { AuthenticationError, createErrorFromResponse } from '../../errors/index.js';
import { bodyText, getHeader, isSuccess, type HttpResponse, type HttpTransport } from '../../transport/index.js';
import type { ClientFactory, ContainerHandle, RemoteObject, StorageClient } from '../../types/index.js';
import { encodeKeyPath, encodeRfc3986 } from '../xml.js';
import { parseListBlobsXml } from './list-xml.js';

/** Service version sent with every request; bearer auth needs 2017-11-09 or later */
export const AZURE_STORAGE_API_VERSION = '2023-11-03';

/** Azure AD access token for the storage resource */
export interface AzureCredential {
  readonly token: string;
}

export interface AzureBlobClientOptions {
  timeoutMs?: number;
}

export class AzureBlobClientFactory implements ClientFactory<AzureCredential> {
  constructor(
    private readonly transport: HttpTransport,
    private readonly options: AzureBlobClientOptions = {}
  ) {}

  async construct(endpoint: string, credential?: AzureCredential): Promise<StorageClient> {
    return new AzureBlobClient(endpoint.replace(/\/+$/, ''), this.transport, credential, this.options);
  }
}

export class AzureBlobClient implements StorageClient {
  constructor(
    readonly endpoint: string,
    private readonly transport: HttpTransport,
    private readonly credential: AzureCredential | undefined,
    private readonly options: AzureBlobClientOptions = {}
  ) {}

  getContainer(name: string): ContainerHandle {
    return new AzureContainerHandle(this, name);
  }

  /** @internal */
  async get(url: string, errorContext: { key?: string; listing?: boolean }): Promise<HttpResponse> {
    const headers: Record<string, string> = {
      'x-ms-version': AZURE_STORAGE_API_VERSION,
    };
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
      const text = bodyText(response);
      const context = { uri: url, key: errorContext.key, requestId: getHeader(response, 'x-ms-request-id') };
      // Accounts with public access disabled answer anonymous calls with 409.
      if (response.status === 409 && text.includes('<Code>PublicAccessNotPermitted</Code>')) {
        throw new AuthenticationError({
          message: `${response.status} PublicAccessNotPermitted: anonymous access is disabled for this account`,
          statusCode: response.status,
          ...context,
        });
      }
      // Private containers are reported as missing to anonymous listings.
      if (
        !this.credential &&
        errorContext.listing &&
        response.status === 404 &&
        text.includes('<Code>ResourceNotFound</Code>')
      ) {
        throw new AuthenticationError({
          message: `${response.status} ResourceNotFound: container is missing or not readable anonymously`,
          statusCode: response.status,
          ...context,
        });
      }
      throw createErrorFromResponse(response.status, text, context);
    }
    return response;
  }
}

class AzureContainerHandle implements ContainerHandle {
  constructor(
    private readonly client: AzureBlobClient,
    private readonly container: string
  ) {}

  async *list(prefix: string): AsyncGenerator<RemoteObject> {
    let marker: string | undefined;

    do {
      const params = ['restype=container', 'comp=list'];
      if (prefix) {
        params.push(`prefix=${encodeRfc3986(prefix)}`);
      }
      if (marker) {
        params.push(`marker=${encodeRfc3986(marker)}`);
      }
      const url = `${this.client.endpoint}/${encodeRfc3986(this.container)}?${params.join('&')}`;

      const response = await this.client.get(url, { listing: true });
      const page = parseListBlobsXml(bodyText(response));
      for (const name of page.names) {
        yield { name };
      }
      marker = page.nextMarker;
    } while (marker);
  }

  async fetch(key: string): Promise<Uint8Array> {
    const url = `${this.client.endpoint}/${encodeRfc3986(this.container)}/${encodeKeyPath(key)}`;
    const response = await this.client.get(url, { key });
    return response.body;
  }
}
