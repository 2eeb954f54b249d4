/**
 * HTTP Transport Layer
 *
 * Request/response plumbing shared by the REST-backed providers.
 */

import { NetworkError } from '../errors/index.js';

/**
 * HTTP request.
 */
export interface HttpRequest {
  method: 'GET' | 'HEAD' | 'POST';
  url: string;
  headers: Record<string, string>;
  body?: string;
  timeout?: number;
}

/**
 * HTTP response. Header names are lower-cased.
 */
export interface HttpResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: Uint8Array;
}

/**
 * Transport interface.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Check if response indicates success.
 */
export function isSuccess(response: HttpResponse): boolean {
  return response.status >= 200 && response.status < 300;
}

/**
 * Get a header value (case-insensitive).
 */
export function getHeader(response: HttpResponse, name: string): string | undefined {
  const lowerName = name.toLowerCase();
  for (const [key, value] of Object.entries(response.headers)) {
    if (key.toLowerCase() === lowerName) {
      return value;
    }
  }
  return undefined;
}

/**
 * Decode a response body as UTF-8 text.
 */
export function bodyText(response: HttpResponse): string {
  return new TextDecoder().decode(response.body);
}

/**
 * Parse a JSON body; malformed JSON yields `undefined` for the caller's
 * schema to reject.
 */
export function parseJsonText(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Fetch-based HTTP transport.
 */
export class FetchTransport implements HttpTransport {
  private readonly defaultTimeout: number;

  constructor(defaultTimeout: number = 300000) {
    this.defaultTimeout = defaultTimeout;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const timeout = request.timeout ?? this.defaultTimeout;

    let response: Response;
    try {
      response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: AbortSignal.timeout(timeout),
      });
    } catch (error) {
      throw toNetworkError(error, request.url, timeout);
    }

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });

    let body: Uint8Array;
    try {
      body = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw toNetworkError(error, request.url, timeout);
    }

    return {
      status: response.status,
      statusText: response.statusText,
      headers,
      body,
    };
  }
}

function toNetworkError(error: unknown, url: string, timeout: number): NetworkError {
  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return new NetworkError({ message: `Request to ${url} timed out after ${timeout}ms`, cause: error });
    }
    return new NetworkError({ message: `Request to ${url} failed: ${error.message}`, cause: error });
  }
  return new NetworkError({ message: `Request to ${url} failed: ${String(error)}` });
}

/**
 * Create a fetch-based transport.
 */
export function createTransport(timeout?: number): HttpTransport {
  return new FetchTransport(timeout);
}
