/**
 * Azure AD token acquisition for Blob Storage.
 *
 * Client credentials flow for a service principal. The principal needs a
 * data-plane role such as "Storage Blob Data Reader" on the account.
 */

import { z } from 'zod';
import type { AzureConfig } from '../../config/index.js';
import { CredentialError } from '../../errors/index.js';
import { NoopLogger, type Logger } from '../../observability/index.js';
import { bodyText, isSuccess, parseJsonText, type HttpTransport } from '../../transport/index.js';
import type { CredentialProvider } from '../../types/index.js';
import type { AzureCredential } from './client.js';

export const AZURE_STORAGE_SCOPE = 'https://storage.azure.com/.default';

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.coerce.number().optional(),
});

const tokenErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

export class AzureAdCredentialProvider implements CredentialProvider<AzureCredential> {
  readonly name = 'azure-ad';
  private readonly logger: Logger;

  constructor(
    private readonly config: AzureConfig,
    private readonly transport: HttpTransport,
    logger: Logger = new NoopLogger()
  ) {
    this.logger = logger;
  }

  /**
   * Resolves `undefined` unless tenant, client ID and secret are all set.
   *
   * @throws {CredentialError} when the token endpoint rejects the request
   */
  async acquire(): Promise<AzureCredential | undefined> {
    const { tenantId, clientId, clientSecret } = this.config;
    if (!tenantId || !clientId || !clientSecret) {
      return undefined;
    }

    const tokenUrl = `${this.config.authority}/${encodeURIComponent(tenantId)}/oauth2/v2.0/token`;
    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: clientId,
      client_secret: clientSecret,
      scope: AZURE_STORAGE_SCOPE,
    });

    const response = await this.transport.send({
      method: 'POST',
      url: tokenUrl,
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: body.toString(),
    });

    const text = bodyText(response);
    if (!isSuccess(response)) {
      throw new CredentialError({
        message: `Failed to acquire Azure AD token: ${response.status} ${describeTokenError(text)}`,
        statusCode: response.status,
      });
    }

    const parsed = tokenResponseSchema.safeParse(parseJsonText(text));
    if (!parsed.success) {
      throw new CredentialError({
        message: 'Azure AD token response did not contain an access token',
        statusCode: response.status,
      });
    }

    this.logger.info('Retrieved service principal token', { clientId });
    return { token: parsed.data.access_token };
  }
}

function describeTokenError(text: string): string {
  const parsed = tokenErrorSchema.safeParse(parseJsonText(text));
  if (parsed.success) {
    return parsed.data.error_description ?? parsed.data.error;
  }
  return text;
}
