/**
 * Model Fetcher Error Types
 *
 * Every failure surfaced to a caller is a `ModelFetchError` subclass with a
 * fixed `code`. Collaborator errors pass through unchanged.
 */

/** Base error options */
export interface ModelFetchErrorOptions {
  message: string;
  /** URI of the download request, when known */
  uri?: string;
  /** Object key the failure relates to */
  key?: string;
  statusCode?: number;
  requestId?: string;
  cause?: Error;
}

/**
 * Base class for all model fetcher errors
 */
export abstract class ModelFetchError extends Error {
  public abstract readonly code: string;
  public readonly uri?: string;
  public readonly key?: string;
  public readonly statusCode?: number;
  public readonly requestId?: string;
  public override readonly cause?: Error;

  constructor(options: ModelFetchErrorOptions) {
    super(options.message);
    this.name = this.constructor.name;
    this.uri = options.uri;
    this.key = options.key;
    this.statusCode = options.statusCode;
    this.requestId = options.requestId;
    this.cause = options.cause;

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      uri: this.uri,
      key: this.key,
      statusCode: this.statusCode,
      requestId: this.requestId,
    };
  }
}

/**
 * URI could not be parsed into a container and prefix
 */
export class MalformedUriError extends ModelFetchError {
  public readonly code = 'MalformedUri';
}

/**
 * Access was denied (401/403), including after the credential fallback
 */
export class AuthenticationError extends ModelFetchError {
  public readonly code = 'AuthenticationFailed';
}

/**
 * Object or listing result does not exist (404, empty listing)
 */
export class NotFoundError extends ModelFetchError {
  public readonly code = 'NotFound';
}

/**
 * No pipeline accepts the URI
 */
export class UnsupportedSchemeError extends ModelFetchError {
  public readonly code = 'UnsupportedScheme';
}

/**
 * Invalid configuration or options
 */
export class ConfigurationError extends ModelFetchError {
  public readonly code = 'ConfigurationError';
}

/**
 * Credential endpoint refused to issue a token
 */
export class CredentialError extends ModelFetchError {
  public readonly code = 'CredentialUnavailable';
}

/**
 * Transport failure (DNS, connection reset, timeout)
 */
export class NetworkError extends ModelFetchError {
  public readonly code = 'NetworkError';
}

/**
 * Any other non-success response from a storage service
 */
export class StorageRequestError extends ModelFetchError {
  public readonly code = 'StorageRequestFailed';
}

/** Context attached to errors built from HTTP responses */
export interface ResponseErrorContext {
  uri?: string;
  key?: string;
  requestId?: string;
}

/**
 * Create error from HTTP response
 */
export function createErrorFromResponse(
  statusCode: number,
  body: string,
  context: ResponseErrorContext = {}
): ModelFetchError {
  // Azure and S3 report <Code>/<Message> in XML, GCS uses JSON.
  const xmlCode = body.match(/<Code>([^<]+)<\/Code>/)?.[1];
  const xmlMessage = body.match(/<Message>([^<]+)<\/Message>/)?.[1];
  const detail = xmlMessage ?? extractJsonMessage(body) ?? body.trim();
  const prefix = xmlCode ? `${statusCode} ${xmlCode}` : `${statusCode}`;
  const message = detail ? `${prefix}: ${detail}` : `Request failed with status ${statusCode}`;

  const options: ModelFetchErrorOptions = { message, statusCode, ...context };

  switch (statusCode) {
    case 401:
    case 403:
      return new AuthenticationError(options);
    case 404:
      return new NotFoundError(options);
    default:
      return new StorageRequestError(options);
  }
}

function extractJsonMessage(body: string): string | undefined {
  if (!body.trimStart().startsWith('{')) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
      const error: unknown = parsed.error;
      if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
        return error.message;
      }
    }
    return undefined;
  } catch {
    return undefined;
  }
}

/**
 * Narrow an unknown rejection to an authentication failure
 */
export function isAuthenticationError(error: unknown): error is AuthenticationError {
  return error instanceof AuthenticationError;
}
