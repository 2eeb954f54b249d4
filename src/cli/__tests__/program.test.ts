/**
 * Tests for the command-line program
 */

import { afterEach, describe, it, expect } from 'vitest';
import { CommanderError } from 'commander';
import type { FetcherConfig } from '../../config/index.js';
import { ProviderPipeline, StorageDispatcher } from '../../dispatch/index.js';
import { AuthenticationError } from '../../errors/index.js';
import type { Logger, LogLevel } from '../../observability/index.js';
import { MemoryFileSystemSink, MockStorage, StaticCredentialProvider } from '../../simulation/index.js';
import { parseBucketUri } from '../../uri/index.js';
import { createProgram, formatError, type CliDependencies } from '../program.js';

function harness(storage: MockStorage, env: CliDependencies['env'] = {}) {
  const sink = new MemoryFileSystemSink();
  const lines: Array<{ level: LogLevel; line: string }> = [];
  const errors: string[] = [];
  const configs: FetcherConfig[] = [];

  const program = createProgram({
    env,
    writer: (level, line) => lines.push({ level, line }),
    printError: (message) => errors.push(message),
    createDispatcher: (config: FetcherConfig, logger: Logger) => {
      configs.push(config);
      return new StorageDispatcher([
        new ProviderPipeline<string>({
          name: 'gcs',
          matches: (uri) => uri.startsWith('gs://'),
          parse: (uri) => parseBucketUri(uri, 'https://storage.example.com'),
          factory: () => storage,
          credentialProvider: new StaticCredentialProvider(undefined),
          sink,
          logger,
          maxConcurrency: config.maxConcurrency,
        }),
      ]);
    },
  });
  program.exitOverride().configureOutput({ writeOut: () => {}, writeErr: () => {} });

  return { program, sink, lines, errors, configs };
}

const argv = (...args: string[]) => ['node', 'model-fetcher', ...args];

describe('createProgram', () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  it('downloads into the destination and reports the count', async () => {
    const storage = new MockStorage().put('bucket', 'bert/config.json').put('bucket', 'bert/vocab.txt');
    const { program, sink, lines, errors } = harness(storage);

    await program.parseAsync(argv('gs://bucket/bert/', '/out'));

    expect(sink.writtenPaths).toEqual(['/out/config.json', '/out/vocab.txt']);
    expect(errors).toEqual([]);
    expect(process.exitCode).toBeUndefined();
    expect(lines.at(-1)?.line).toMatch(/ INFO Fetched 2 object\(s\) into \/out$/);
  });

  it('applies command-line overrides on top of the environment', async () => {
    const storage = new MockStorage().put('bucket', 'm/a');
    const { program, configs, lines } = harness(storage, { MODEL_FETCHER_LOG_LEVEL: 'debug' });

    await program.parseAsync(argv('gs://bucket/m/', '/out', '--concurrency', '4', '--log-level', 'error'));

    expect(configs[0]?.maxConcurrency).toBe(4);
    expect(configs[0]?.logLevel).toBe('error');
    expect(lines).toEqual([]);
  });

  it('prints the error and sets a failing exit code', async () => {
    const storage = new MockStorage({ acceptedCredentials: ['test-token'] }).put('bucket', 'm/a');
    const { program, errors, sink } = harness(storage);

    await program.parseAsync(argv('gs://bucket/m/', '/out'));

    expect(errors).toEqual(["AuthenticationFailed: Access to container 'bucket' denied"]);
    expect(process.exitCode).toBe(1);
    expect(sink.events).toEqual([]);
  });

  it('reports unsupported URIs', async () => {
    const { program, errors } = harness(new MockStorage());

    await program.parseAsync(argv('s3://bucket/m', '/out'));

    expect(errors).toEqual(["UnsupportedScheme: Cannot recognize storage type for 's3://bucket/m'; supported: gcs"]);
  });

  it('reports invalid configuration', async () => {
    const { program, errors } = harness(new MockStorage(), { MODEL_FETCHER_TIMEOUT_MS: 'soon' });

    await program.parseAsync(argv('gs://bucket/m', '/out'));

    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatch(/^ConfigurationError: Invalid configuration: MODEL_FETCHER_TIMEOUT_MS: /);
  });

  it('rejects a non-numeric concurrency', async () => {
    const { program } = harness(new MockStorage());

    const error = await program.parseAsync(argv('gs://bucket/m', '/out', '-c', 'many')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CommanderError);
    expect(error).toMatchObject({ code: 'commander.invalidArgument' });
  });

  it('requires both arguments', async () => {
    const { program } = harness(new MockStorage());

    await expect(program.parseAsync(argv('gs://bucket/m'))).rejects.toMatchObject({
      code: 'commander.missingArgument',
    });
  });
});

describe('formatError', () => {
  it('prefixes fetch errors with their code', () => {
    expect(formatError(new AuthenticationError({ message: 'denied' }))).toBe('AuthenticationFailed: denied');
    expect(formatError(new Error('disk full'))).toBe('disk full');
    expect(formatError('odd')).toBe('odd');
  });
});
