/**
 * AWS Signature V4 for S3 GET requests.
 */

import * as crypto from 'node:crypto';
import type { S3Credential } from './credentials.js';

const ALGORITHM = 'AWS4-HMAC-SHA256';

/** SHA-256 of the empty payload every GET carries */
export const EMPTY_PAYLOAD_HASH = crypto.createHash('sha256').update('').digest('hex');

export class AwsSignerV4 {
  constructor(
    private readonly credentials: S3Credential,
    private readonly region: string,
    private readonly service: string = 's3'
  ) {}

  /**
   * Headers to send with a bodiless request to `url`.
   *
   * The URL path and query must already be RFC 3986 encoded; they are used
   * verbatim in the canonical request. `host` is signed but not returned,
   * since fetch derives it from the URL.
   */
  sign(method: string, url: URL, headers: Record<string, string>, timestamp: Date = new Date()): Record<string, string> {
    const dateStr = formatDate(timestamp);
    const dateTimeStr = formatDateTime(timestamp);

    const signed: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      signed[key.toLowerCase()] = value;
    }
    signed['host'] = url.host;
    signed['x-amz-date'] = dateTimeStr;
    signed['x-amz-content-sha256'] = EMPTY_PAYLOAD_HASH;
    if (this.credentials.sessionToken) {
      signed['x-amz-security-token'] = this.credentials.sessionToken;
    }

    const sortedHeaders = Object.entries(signed).sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
    const canonicalHeaders = sortedHeaders.map(([k, v]) => `${k}:${v.trim()}\n`).join('');
    const signedHeaderNames = sortedHeaders.map(([k]) => k).join(';');

    const canonicalRequest = [
      method.toUpperCase(),
      url.pathname || '/',
      canonicalQueryString(url.search),
      canonicalHeaders,
      signedHeaderNames,
      EMPTY_PAYLOAD_HASH,
    ].join('\n');

    const credentialScope = `${dateStr}/${this.region}/${this.service}/aws4_request`;
    const stringToSign = [ALGORITHM, dateTimeStr, credentialScope, sha256Hex(canonicalRequest)].join('\n');

    const kDate = hmac(`AWS4${this.credentials.secretAccessKey}`, dateStr);
    const kRegion = hmac(kDate, this.region);
    const kService = hmac(kRegion, this.service);
    const kSigning = hmac(kService, 'aws4_request');
    const signature = hmac(kSigning, stringToSign).toString('hex');

    const { host: _host, ...outgoing } = signed;
    outgoing['authorization'] = [
      `${ALGORITHM} Credential=${this.credentials.accessKeyId}/${credentialScope}`,
      `SignedHeaders=${signedHeaderNames}`,
      `Signature=${signature}`,
    ].join(', ');
    return outgoing;
  }
}

/**
 * Sort already-encoded `k=v` pairs by key, then value.
 */
function canonicalQueryString(search: string): string {
  if (!search || search === '?') {
    return '';
  }
  return search
    .slice(1)
    .split('&')
    .map((pair) => (pair.includes('=') ? pair : `${pair}=`))
    .sort()
    .join('&');
}

function sha256Hex(data: string): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}

function hmac(key: string | Buffer, data: string): Buffer {
  return crypto.createHmac('sha256', key).update(data).digest();
}

/**
 * Format date as YYYYMMDD.
 */
function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, '');
}

/**
 * Format date as YYYYMMDDTHHMMSSZ.
 */
function formatDateTime(date: Date): string {
  return `${date.toISOString().replace(/[:-]/g, '').split('.')[0] ?? ''}Z`;
}
