/**
 * Credential Resolver
 *
 * Anonymous access first; on an authentication failure, one credential
 * acquisition and one more attempt. The second failure is final.
 */

import { isAuthenticationError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import type { ClientFactory, CredentialProvider, Location, StorageClient } from '../types/index.js';

/** Work performed against a freshly constructed client */
export type AccessAttempt<T> = (client: StorageClient) => Promise<T>;

/** Which attempt produced the resolved client */
export type AuthMode = 'anonymous' | 'credential' | 'anonymous-retry';

export interface ResolvedAccess<T> {
  readonly client: StorageClient;
  readonly value: T;
  readonly mode: AuthMode;
}

export class CredentialResolver<TCredential> {
  private readonly logger: Logger;

  constructor(
    private readonly factory: ClientFactory<TCredential>,
    private readonly credentialProvider: CredentialProvider<TCredential>,
    logger: Logger = new NoopLogger()
  ) {
    this.logger = logger;
  }

  /**
   * Construct a client for `location` and run `access` with it.
   *
   * @throws {AuthenticationError} when the credential attempt is denied too
   */
  async resolve<T>(location: Location, access: AccessAttempt<T>): Promise<ResolvedAccess<T>> {
    try {
      const client = await this.factory.construct(location.endpoint);
      const value = await access(client);
      return { client, value, mode: 'anonymous' };
    } catch (error) {
      if (!isAuthenticationError(error)) {
        throw error;
      }
      this.logger.debug('Anonymous access denied, acquiring credential', {
        endpoint: location.endpoint,
        container: location.container,
        provider: this.credentialProvider.name,
      });
    }

    const credential = await this.credentialProvider.acquire();
    if (credential === undefined) {
      this.logger.warn('No credential available, retrying anonymous access', {
        provider: this.credentialProvider.name,
      });
    } else {
      this.logger.info('Retrying with acquired credential', {
        provider: this.credentialProvider.name,
      });
    }

    const client = await this.factory.construct(location.endpoint, credential);
    const value = await access(client);
    return { client, value, mode: credential === undefined ? 'anonymous-retry' : 'credential' };
  }
}
