/**
 * `model-fetcher <uri> <dest>` command.
 */

import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, withOverrides, type EnvSource, type FetcherConfig } from '../config/index.js';
import { createDefaultDispatcher, type StorageDispatcher } from '../dispatch/index.js';
import { ModelFetchError } from '../errors/index.js';
import { ConsoleLogger, type Logger, type LogWriter } from '../observability/index.js';

export const CLI_VERSION = '0.1.0';

export interface CliDependencies {
  env?: EnvSource;
  /** Receives formatted log lines; defaults to the console */
  writer?: LogWriter;
  /** Receives the final error message on failure; defaults to stderr */
  printError?: (message: string) => void;
  createDispatcher?: (config: FetcherConfig, logger: Logger) => StorageDispatcher;
}

interface FetchOptions {
  concurrency?: number;
  logLevel?: string;
}

function parseConcurrency(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Concurrency must be a positive integer.');
  }
  return parsed;
}

/**
 * Describe an error for the terminal.
 */
export function formatError(error: unknown): string {
  if (error instanceof ModelFetchError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Build the CLI program. The action sets `process.exitCode` to 1 on failure.
 */
export function createProgram(deps: CliDependencies = {}): Command {
  const printError = deps.printError ?? ((message: string) => console.error(message));

  return new Command()
    .name('model-fetcher')
    .description('Download model artifacts from blob, bucket, HTTP or local storage into a directory')
    .version(CLI_VERSION)
    .argument('<uri>', 'source URI (https://<account>.blob.core.windows.net/..., gs://, s3://, http(s)://, file:// or a path)')
    .argument('<dest>', 'destination directory')
    .option('-c, --concurrency <n>', 'objects downloaded at once', parseConcurrency)
    .option('-l, --log-level <level>', 'error, warn, info, debug or trace')
    .action(async (uri: string, dest: string, options: FetchOptions) => {
      try {
        const config = withOverrides(loadConfig(deps.env ?? process.env), {
          logLevel: options.logLevel,
          maxConcurrency: options.concurrency,
        });
        const logger = new ConsoleLogger(config.logLevel, {}, deps.writer);
        const dispatcher = deps.createDispatcher
          ? deps.createDispatcher(config, logger)
          : createDefaultDispatcher(config, { logger });

        const result = await dispatcher.download(uri, dest);
        logger.info(`Fetched ${result.objects.length} object(s) into ${result.destination}`);
      } catch (error) {
        printError(formatError(error));
        process.exitCode = 1;
      }
    });
}
