/**
 * Amazon S3 Client
 *
 * ListObjectsV2 and GetObject against AWS or an S3-compatible endpoint.
 * Requests are unsigned unless the client holds an access key pair.
 */

import { createErrorFromResponse } from '../../errors/index.js';
import { bodyText, getHeader, isSuccess, type HttpResponse, type HttpTransport } from '../../transport/index.js';
import type { ClientFactory, ContainerHandle, RemoteObject, StorageClient } from '../../types/index.js';
import { encodeKeyPath, encodeRfc3986 } from '../xml.js';
import type { S3Credential } from './credentials.js';
import { parseListObjectsV2 } from './list-xml.js';
import { AwsSignerV4 } from './signing.js';

export interface S3ClientOptions {
  region: string;
  /** Address buckets as `<endpoint>/<bucket>` instead of `<bucket>.<host>` */
  pathStyle: boolean;
  timeoutMs?: number;
}

/**
 * Default AWS endpoint for a region.
 */
export function awsEndpoint(region: string): string {
  return `https://s3.${region}.amazonaws.com`;
}

export class S3ClientFactory implements ClientFactory<S3Credential> {
  constructor(
    private readonly transport: HttpTransport,
    private readonly options: S3ClientOptions
  ) {}

  async construct(endpoint: string, credential?: S3Credential): Promise<StorageClient> {
    return new S3Client(endpoint.replace(/\/+$/, ''), this.transport, credential, this.options);
  }
}

export class S3Client implements StorageClient {
  private readonly signer?: AwsSignerV4;

  constructor(
    readonly endpoint: string,
    private readonly transport: HttpTransport,
    credential: S3Credential | undefined,
    private readonly options: S3ClientOptions
  ) {
    if (credential) {
      this.signer = new AwsSignerV4(credential, options.region);
    }
  }

  getContainer(name: string): ContainerHandle {
    return new S3BucketHandle(this, name);
  }

  /**
   * Base URL of `bucket`, without trailing slash.
   */
  bucketUrl(bucket: string): string {
    if (this.options.pathStyle) {
      return `${this.endpoint}/${encodeRfc3986(bucket)}`;
    }
    const url = new URL(this.endpoint);
    return `${url.protocol}//${bucket}.${url.host}`;
  }

  /** @internal */
  async get(url: string, key?: string): Promise<HttpResponse> {
    const headers = this.signer ? this.signer.sign('GET', new URL(url), {}) : {};

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
        requestId: getHeader(response, 'x-amz-request-id'),
      });
    }
    return response;
  }
}

class S3BucketHandle implements ContainerHandle {
  constructor(
    private readonly client: S3Client,
    private readonly bucket: string
  ) {}

  async *list(prefix: string): AsyncGenerator<RemoteObject> {
    let continuationToken: string | undefined;

    do {
      // Sorted and encoded as the signer's canonical query expects.
      const params: string[] = [];
      if (continuationToken) {
        params.push(`continuation-token=${encodeRfc3986(continuationToken)}`);
      }
      params.push('list-type=2');
      if (prefix) {
        params.push(`prefix=${encodeRfc3986(prefix)}`);
      }
      const url = `${this.client.bucketUrl(this.bucket)}/?${params.join('&')}`;

      const response = await this.client.get(url);
      const page = parseListObjectsV2(bodyText(response));
      for (const key of page.keys) {
        yield { name: key };
      }
      continuationToken = page.isTruncated ? page.nextContinuationToken : undefined;
    } while (continuationToken);
  }

  async fetch(key: string): Promise<Uint8Array> {
    const url = `${this.client.bucketUrl(this.bucket)}/${encodeKeyPath(key)}`;
    const response = await this.client.get(url, key);
    return response.body;
  }
}
