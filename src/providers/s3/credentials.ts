/**
 * S3 credentials from configuration.
 */

import type { S3Config } from '../../config/index.js';
import type { CredentialProvider } from '../../types/index.js';

export interface S3Credential {
  readonly accessKeyId: string;
  readonly secretAccessKey: string;
  readonly sessionToken?: string;
}

/**
 * Static access key pair, usually from `AWS_ACCESS_KEY_ID` and
 * `AWS_SECRET_ACCESS_KEY`.
 */
export class EnvS3CredentialProvider implements CredentialProvider<S3Credential> {
  readonly name = 'aws-environment';

  constructor(private readonly config: S3Config) {}

  async acquire(): Promise<S3Credential | undefined> {
    const { accessKeyId, secretAccessKey, sessionToken } = this.config;
    if (!accessKeyId || !secretAccessKey) {
      return undefined;
    }
    return { accessKeyId, secretAccessKey, sessionToken };
  }
}
