/**
 * Model Fetcher Errors
 *
 * Re-exports all error types.
 */

export {
  ModelFetchError,
  MalformedUriError,
  AuthenticationError,
  NotFoundError,
  UnsupportedSchemeError,
  ConfigurationError,
  CredentialError,
  NetworkError,
  StorageRequestError,
  createErrorFromResponse,
  isAuthenticationError,
} from './error.js';

export type { ModelFetchErrorOptions, ResponseErrorContext } from './error.js';
