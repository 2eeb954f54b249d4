/**
 * Tests for Signature V4 signing
 */

import { describe, it, expect } from 'vitest';
import { AwsSignerV4, EMPTY_PAYLOAD_HASH } from '../signing.js';

const credentials = { accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' };
const timestamp = new Date('2024-01-15T10:30:00.000Z');
const url = new URL('https://models.s3.eu-west-1.amazonaws.com/?list-type=2&prefix=bert%2F');

describe('AwsSignerV4', () => {
  it('produces date, payload hash and authorization headers', () => {
    const headers = new AwsSignerV4(credentials, 'eu-west-1').sign('GET', url, {}, timestamp);

    expect(Object.keys(headers).sort()).toEqual(['authorization', 'x-amz-content-sha256', 'x-amz-date']);
    expect(headers['x-amz-date']).toBe('20240115T103000Z');
    expect(headers['x-amz-content-sha256']).toBe(EMPTY_PAYLOAD_HASH);
    expect(headers['authorization']).toMatch(
      /^AWS4-HMAC-SHA256 Credential=test-access-key\/20240115\/eu-west-1\/s3\/aws4_request, SignedHeaders=host;x-amz-content-sha256;x-amz-date, Signature=[0-9a-f]{64}$/
    );
  });

  it('hashes the empty payload', () => {
    expect(EMPTY_PAYLOAD_HASH).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });

  it('is deterministic for the same input', () => {
    const signer = new AwsSignerV4(credentials, 'eu-west-1');

    expect(signer.sign('GET', url, {}, timestamp)).toEqual(signer.sign('GET', url, {}, timestamp));
  });

  it('changes the signature with the secret, path and query order', () => {
    const signature = (headers: Record<string, string>) => headers['authorization']?.split('Signature=')[1];
    const base = signature(new AwsSignerV4(credentials, 'eu-west-1').sign('GET', url, {}, timestamp));
    const otherSecret = signature(
      new AwsSignerV4({ ...credentials, secretAccessKey: 'other-secret' }, 'eu-west-1').sign('GET', url, {}, timestamp)
    );
    const otherPath = signature(
      new AwsSignerV4(credentials, 'eu-west-1').sign('GET', new URL('https://models.s3.eu-west-1.amazonaws.com/a.bin'), {}, timestamp)
    );
    const reordered = signature(
      new AwsSignerV4(credentials, 'eu-west-1').sign(
        'GET',
        new URL('https://models.s3.eu-west-1.amazonaws.com/?prefix=bert%2F&list-type=2'),
        {},
        timestamp
      )
    );

    expect(otherSecret).not.toBe(base);
    expect(otherPath).not.toBe(base);
    expect(reordered).toBe(base);
  });

  it('signs the session token and extra headers', () => {
    const headers = new AwsSignerV4({ ...credentials, sessionToken: 'test-session' }, 'us-east-1').sign(
      'GET',
      url,
      { Range: 'bytes=0-9' },
      timestamp
    );

    expect(headers['x-amz-security-token']).toBe('test-session');
    expect(headers['range']).toBe('bytes=0-9');
    expect(headers['authorization']).toContain(
      'SignedHeaders=host;range;x-amz-content-sha256;x-amz-date;x-amz-security-token,'
    );
  });
});
