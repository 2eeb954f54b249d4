/**
 * Tests for error types and response mapping
 */

import { describe, it, expect } from 'vitest';
import {
  AuthenticationError,
  MalformedUriError,
  ModelFetchError,
  NotFoundError,
  StorageRequestError,
  createErrorFromResponse,
  isAuthenticationError,
} from '../index.js';

describe('ModelFetchError', () => {
  it('carries name, code and context', () => {
    const cause = new Error('boom');
    const error = new NotFoundError({ message: 'gone', uri: 'gs://b/k', key: 'k', statusCode: 404, cause });

    expect(error).toBeInstanceOf(ModelFetchError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('NotFoundError');
    expect(error.code).toBe('NotFound');
    expect(error.cause).toBe(cause);
    expect(error.toJSON()).toEqual({
      name: 'NotFoundError',
      code: 'NotFound',
      message: 'gone',
      uri: 'gs://b/k',
      key: 'k',
      statusCode: 404,
      requestId: undefined,
    });
  });
});

describe('createErrorFromResponse', () => {
  it('maps 401 and 403 to authentication errors', () => {
    expect(createErrorFromResponse(401, '')).toBeInstanceOf(AuthenticationError);
    expect(createErrorFromResponse(403, '')).toBeInstanceOf(AuthenticationError);
  });

  it('maps 404 to not found', () => {
    expect(createErrorFromResponse(404, '')).toBeInstanceOf(NotFoundError);
  });

  it('maps other statuses to storage request errors', () => {
    const error = createErrorFromResponse(503, '');
    expect(error).toBeInstanceOf(StorageRequestError);
    expect(error.message).toBe('Request failed with status 503');
  });

  it('reads XML error codes and messages', () => {
    const body =
      '<?xml version="1.0"?><Error><Code>NoAuthenticationInformation</Code><Message>Server failed to authenticate the request.</Message></Error>';
    const error = createErrorFromResponse(401, body, { uri: 'https://a/b', requestId: 'req-1' });

    expect(error.message).toBe('401 NoAuthenticationInformation: Server failed to authenticate the request.');
    expect(error.statusCode).toBe(401);
    expect(error.uri).toBe('https://a/b');
    expect(error.requestId).toBe('req-1');
  });

  it('reads JSON error messages', () => {
    const body = JSON.stringify({ error: { code: 403, message: 'Anonymous caller does not have access.' } });
    expect(createErrorFromResponse(403, body).message).toBe('403: Anonymous caller does not have access.');
  });

  it('falls back to the trimmed body', () => {
    expect(createErrorFromResponse(500, '  upstream failure\n').message).toBe('500: upstream failure');
  });
});

describe('isAuthenticationError', () => {
  it('narrows only authentication errors', () => {
    expect(isAuthenticationError(new AuthenticationError({ message: 'no' }))).toBe(true);
    expect(isAuthenticationError(new MalformedUriError({ message: 'bad' }))).toBe(false);
    expect(isAuthenticationError(new Error('other'))).toBe(false);
    expect(isAuthenticationError(undefined)).toBe(false);
  });
});
