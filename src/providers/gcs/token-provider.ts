/**
 * GCS access token sources: a pre-issued token, then the metadata server.
 */

import { z } from 'zod';
import type { GcsConfig } from '../../config/index.js';
import { CredentialError } from '../../errors/index.js';
import { NoopLogger, type Logger } from '../../observability/index.js';
import { bodyText, isSuccess, parseJsonText, type HttpTransport } from '../../transport/index.js';
import type { CredentialProvider } from '../../types/index.js';
import type { GcsCredential } from './client.js';

const metadataTokenSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
  token_type: z.string().optional(),
});

export class GcsCredentialProvider implements CredentialProvider<GcsCredential> {
  readonly name = 'gcs';
  private readonly logger: Logger;

  constructor(
    private readonly config: GcsConfig,
    private readonly transport: HttpTransport,
    logger: Logger = new NoopLogger()
  ) {
    this.logger = logger;
  }

  async acquire(): Promise<GcsCredential | undefined> {
    if (this.config.accessToken) {
      return { token: this.config.accessToken };
    }
    if (!this.config.metadataHost) {
      return undefined;
    }

    const url = `http://${this.config.metadataHost}/computeMetadata/v1/instance/service-accounts/default/token`;
    const response = await this.transport.send({
      method: 'GET',
      url,
      headers: { 'Metadata-Flavor': 'Google' },
    });

    if (!isSuccess(response)) {
      throw new CredentialError({
        message: `Metadata server refused token request: ${response.status} ${bodyText(response).trim()}`,
        statusCode: response.status,
      });
    }

    const parsed = metadataTokenSchema.safeParse(parseJsonText(bodyText(response)));
    if (!parsed.success) {
      throw new CredentialError({
        message: 'Metadata server response did not contain an access token',
        statusCode: response.status,
      });
    }

    this.logger.info('Retrieved metadata server token', { host: this.config.metadataHost });
    return { token: parsed.data.access_token };
  }
}
