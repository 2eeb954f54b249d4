/**
 * Storage URI parsing.
 *
 * Every parser yields a `Location` whose container is non-empty; the prefix
 * keeps any trailing `/` so folder requests stay distinguishable.
 */

import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { MalformedUriError } from '../errors/index.js';
import type { Location, StorageScheme } from '../types/index.js';

/** Host suffixes of Azure Blob endpoints across public and sovereign clouds */
export const BLOB_HOST_SUFFIXES = [
  '.blob.core.windows.net',
  '.blob.core.chinacloudapi.cn',
  '.blob.core.usgovcloudapi.net',
] as const;

function parseUrl(uri: string): URL {
  try {
    return new URL(uri);
  } catch (error) {
    throw new MalformedUriError({
      message: `Cannot parse URI '${uri}'`,
      uri,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

function decodePath(rawPath: string, uri: string): string {
  try {
    return rawPath.split('/').map(decodeURIComponent).join('/');
  } catch (error) {
    throw new MalformedUriError({
      message: `URI '${uri}' contains an invalid percent-encoding`,
      uri,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

function splitContainer(objectPath: string, uri: string): { container: string; prefix: string } {
  const slash = objectPath.indexOf('/');
  const container = slash === -1 ? objectPath : objectPath.slice(0, slash);
  const prefix = slash === -1 ? '' : objectPath.slice(slash + 1);

  if (!container) {
    throw new MalformedUriError({
      message: `URI '${uri}' does not name a container`,
      uri,
    });
  }
  return { container, prefix };
}

function toScheme(protocol: string, uri: string): StorageScheme {
  switch (protocol) {
    case 'https:':
      return 'https';
    case 'http:':
      return 'http';
    case 'gs:':
      return 'gs';
    case 's3:':
      return 's3';
    case 'file:':
      return 'file';
    default:
      throw new MalformedUriError({ message: `Unknown scheme '${protocol}' in '${uri}'`, uri });
  }
}

/**
 * Parse `scheme://host/container[/prefix...]`.
 *
 * The first path segment is the container, everything after it the prefix.
 */
export function parseContainerUri(uri: string): Location {
  const url = parseUrl(uri);
  const scheme = toScheme(url.protocol, uri);
  const { container, prefix } = splitContainer(decodePath(url.pathname.replace(/^\/+/, ''), uri), uri);

  return {
    scheme,
    endpoint: url.origin,
    container,
    prefix,
    uri,
  };
}

/**
 * Whether `uri` points at an Azure Blob Storage account.
 */
export function isBlobUri(uri: string): boolean {
  if (!uri.startsWith('https://')) {
    return false;
  }
  try {
    const host = new URL(uri).hostname.toLowerCase();
    return BLOB_HOST_SUFFIXES.some((suffix) => host.endsWith(suffix) && host.length > suffix.length);
  } catch {
    return false;
  }
}

/**
 * Parse `https://<account>.blob.core.windows.net/<container>[/<prefix>]`.
 */
export function parseBlobUri(uri: string): Location {
  if (!isBlobUri(uri)) {
    throw new MalformedUriError({
      message: `'${uri}' is not an Azure Blob Storage URI`,
      uri,
    });
  }
  const location = parseContainerUri(uri);
  const host = new URL(location.endpoint).hostname;
  const account = host.slice(0, host.indexOf('.'));

  return { ...location, account };
}

/**
 * Parse `gs://bucket[/prefix]` or `s3://bucket[/prefix]`.
 *
 * The URI host is the bucket; `endpoint` is the service endpoint the
 * client will address the bucket through.
 */
export function parseBucketUri(uri: string, endpoint: string): Location {
  const match = /^(gs|s3):\/\/(.*)$/.exec(uri);
  if (!match) {
    throw new MalformedUriError({
      message: `'${uri}' is not a gs:// or s3:// URI`,
      uri,
    });
  }
  const scheme = match[1] === 'gs' ? 'gs' : 's3';
  const { container, prefix } = splitContainer(match[2] ?? '', uri);

  return {
    scheme,
    endpoint,
    container,
    prefix,
    uri,
  };
}

/**
 * Parse a plain `http(s)://host/path` download URL.
 *
 * The host plays the container role and the path is a single object key;
 * query parameters (e.g. signed URL tokens) are kept in `query`.
 */
export function parseHttpUri(uri: string): Location & { query: string } {
  const url = parseUrl(uri);
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new MalformedUriError({ message: `'${uri}' is not an HTTP(S) URI`, uri });
  }
  const prefix = decodePath(url.pathname.replace(/^\/+/, ''), uri);
  if (!prefix || prefix.endsWith('/')) {
    throw new MalformedUriError({
      message: `URI '${uri}' does not name a file`,
      uri,
    });
  }

  return {
    scheme: toScheme(url.protocol, uri),
    endpoint: `${url.protocol}//`,
    container: url.host,
    prefix,
    uri,
    query: url.search,
  };
}

/**
 * Parse `file:///abs/path` or a bare filesystem path.
 *
 * Relative paths resolve against `cwd`. The filesystem root is the
 * container and the absolute path, without its leading `/`, the prefix.
 */
export function parseLocalUri(uri: string, cwd: string = process.cwd()): Location {
  let filePath: string;
  if (uri.startsWith('file://')) {
    try {
      filePath = fileURLToPath(uri);
    } catch (error) {
      throw new MalformedUriError({
        message: `Cannot parse file URI '${uri}'`,
        uri,
        cause: error instanceof Error ? error : undefined,
      });
    }
  } else {
    filePath = uri;
  }

  const absolute = path.posix.resolve(cwd, filePath);
  return {
    scheme: 'file',
    endpoint: 'file://',
    container: '/',
    prefix: absolute.slice(1),
    uri,
  };
}
