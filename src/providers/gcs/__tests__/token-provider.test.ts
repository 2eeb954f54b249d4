/**
 * Tests for GCS access token sources
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../../config/index.js';
import { CredentialError } from '../../../errors/index.js';
import { RecordingTransport, httpResponse } from '../../../simulation/index.js';
import { GcsCredentialProvider } from '../token-provider.js';

describe('GcsCredentialProvider', () => {
  it('prefers a configured access token', async () => {
    const transport = new RecordingTransport(() => httpResponse(500));
    const config = loadConfig({ GCS_ACCESS_TOKEN: 'test-token', GCE_METADATA_HOST: 'metadata.google.internal' }).gcs;

    expect(await new GcsCredentialProvider(config, transport).acquire()).toEqual({ token: 'test-token' });
    expect(transport.requests).toEqual([]);
  });

  it('asks the metadata server', async () => {
    const transport = new RecordingTransport(() =>
      httpResponse(200, JSON.stringify({ access_token: 'metadata-token', expires_in: 3599, token_type: 'Bearer' }))
    );
    const config = loadConfig({ GCE_METADATA_HOST: 'metadata.google.internal' }).gcs;

    expect(await new GcsCredentialProvider(config, transport).acquire()).toEqual({ token: 'metadata-token' });
    expect(transport.requests).toEqual([
      {
        method: 'GET',
        url: 'http://metadata.google.internal/computeMetadata/v1/instance/service-accounts/default/token',
        headers: { 'Metadata-Flavor': 'Google' },
      },
    ]);
  });

  it('is unavailable without token or metadata host', async () => {
    const transport = new RecordingTransport(() => httpResponse(500));

    expect(await new GcsCredentialProvider(loadConfig({}).gcs, transport).acquire()).toBeUndefined();
  });

  it('reports metadata server failures', async () => {
    const transport = new RecordingTransport(() => httpResponse(404, 'Not Found\n'));
    const config = loadConfig({ GCE_METADATA_HOST: 'metadata.google.internal' }).gcs;

    await expect(new GcsCredentialProvider(config, transport).acquire()).rejects.toThrow(
      new CredentialError({ message: 'Metadata server refused token request: 404 Not Found' })
    );
  });
});
