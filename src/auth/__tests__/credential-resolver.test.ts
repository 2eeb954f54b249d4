/**
 * Tests for anonymous-first credential resolution
 */

import { describe, it, expect, vi } from 'vitest';
import { AuthenticationError, CredentialError, NetworkError, NotFoundError } from '../../errors/index.js';
import { collect, listObjectKeys } from '../../listing/index.js';
import { NoopLogger } from '../../observability/index.js';
import { MockStorage, StaticCredentialProvider } from '../../simulation/index.js';
import type { ClientFactory, Location, StorageClient } from '../../types/index.js';
import { CredentialResolver, type AccessAttempt } from '../credential-resolver.js';

const location: Location = {
  scheme: 'https',
  endpoint: 'https://acct.blob.core.windows.net',
  account: 'acct',
  container: 'models',
  prefix: 'bert/',
  uri: 'https://acct.blob.core.windows.net/models/bert/',
};

const listAll: AccessAttempt<string[]> = (client) =>
  collect(listObjectKeys(client.getContainer(location.container), location.prefix));

function storage(acceptedCredentials?: readonly string[]): MockStorage {
  return new MockStorage({ acceptedCredentials }).put('models', 'bert/config.json');
}

describe('CredentialResolver', () => {
  it('uses anonymous access when it succeeds', async () => {
    const mock = storage();
    const provider = new StaticCredentialProvider('test-token');
    const resolver = new CredentialResolver(mock, provider);

    const result = await resolver.resolve(location, listAll);

    expect(result.mode).toBe('anonymous');
    expect(result.value).toEqual(['bert/config.json']);
    expect(provider.acquireCount).toBe(0);
    expect(mock.callsOf('construct')).toEqual([{ type: 'construct', endpoint: location.endpoint }]);
  });

  it('acquires a credential once after an authentication failure', async () => {
    const mock = storage(['test-token']);
    const provider = new StaticCredentialProvider('test-token');
    const resolver = new CredentialResolver(mock, provider);

    const result = await resolver.resolve(location, listAll);

    expect(result.mode).toBe('credential');
    expect(result.value).toEqual(['bert/config.json']);
    expect(provider.acquireCount).toBe(1);
    expect(mock.callsOf('construct')).toEqual([
      { type: 'construct', endpoint: location.endpoint },
      { type: 'construct', endpoint: location.endpoint, credential: 'test-token' },
    ]);
  });

  it('propagates the second authentication failure', async () => {
    const mock = storage(['test-token']);
    const provider = new StaticCredentialProvider('wrong-token');
    const resolver = new CredentialResolver(mock, provider);

    await expect(resolver.resolve(location, listAll)).rejects.toBeInstanceOf(AuthenticationError);
    expect(provider.acquireCount).toBe(1);
    expect(mock.callsOf('construct')).toHaveLength(2);
  });

  it('retries anonymously when no credential is available', async () => {
    const mock = storage();
    const attempts = vi.fn<AccessAttempt<string>>();
    attempts
      .mockRejectedValueOnce(new AuthenticationError({ message: 'denied', statusCode: 403 }))
      .mockResolvedValueOnce('ok');
    const provider = new StaticCredentialProvider(undefined);
    const logger = new NoopLogger();
    const warn = vi.spyOn(logger, 'warn');
    const resolver = new CredentialResolver(mock, provider, logger);

    const result = await resolver.resolve(location, attempts);

    expect(result).toMatchObject({ mode: 'anonymous-retry', value: 'ok' });
    expect(attempts).toHaveBeenCalledTimes(2);
    expect(mock.callsOf('construct')).toEqual([
      { type: 'construct', endpoint: location.endpoint },
      { type: 'construct', endpoint: location.endpoint },
    ]);
    expect(warn).toHaveBeenCalledWith('No credential available, retrying anonymous access', { provider: 'static' });
  });

  it('does not consult the provider for non-authentication errors', async () => {
    const provider = new StaticCredentialProvider('test-token');
    const resolver = new CredentialResolver(storage(), provider);
    const failure = new NetworkError({ message: 'connection reset' });

    await expect(resolver.resolve(location, () => Promise.reject(failure))).rejects.toBe(failure);
    expect(provider.acquireCount).toBe(0);
  });

  it('propagates errors from the credential attempt unchanged', async () => {
    const provider = new StaticCredentialProvider('test-token');
    const resolver = new CredentialResolver(storage(), provider);
    const missing = new NotFoundError({ message: 'container gone', statusCode: 404 });
    const attempts = vi.fn<AccessAttempt<string>>();
    attempts
      .mockRejectedValueOnce(new AuthenticationError({ message: 'denied', statusCode: 401 }))
      .mockRejectedValueOnce(missing);

    await expect(resolver.resolve(location, attempts)).rejects.toBe(missing);
    expect(provider.acquireCount).toBe(1);
  });

  it('propagates provider failures', async () => {
    const failure = new CredentialError({ message: 'token endpoint refused', statusCode: 400 });
    const resolver = new CredentialResolver(storage(['test-token']), {
      name: 'failing',
      acquire: () => Promise.reject(failure),
    });

    await expect(resolver.resolve(location, listAll)).rejects.toBe(failure);
  });

  it('treats a rejected anonymous construction as an authentication failure', async () => {
    const client: StorageClient = { getContainer: vi.fn() };
    const construct = vi.fn<ClientFactory<string>['construct']>();
    construct
      .mockRejectedValueOnce(new AuthenticationError({ message: 'anonymous disabled', statusCode: 401 }))
      .mockResolvedValueOnce(client);
    const provider = new StaticCredentialProvider('test-token');
    const resolver = new CredentialResolver({ construct }, provider);

    const result = await resolver.resolve(location, async (c) => (c === client ? 'same' : 'other'));

    expect(result).toMatchObject({ mode: 'credential', value: 'same' });
    expect(construct).toHaveBeenNthCalledWith(2, location.endpoint, 'test-token');
  });
});
