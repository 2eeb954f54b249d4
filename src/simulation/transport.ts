/**
 * Scripted HTTP transport.
 */

import type { HttpRequest, HttpResponse, HttpTransport } from '../transport/index.js';

export type RequestHandler = (request: HttpRequest) => HttpResponse | Promise<HttpResponse>;

/**
 * Build a response with a text or binary body.
 */
export function httpResponse(
  status: number,
  body: string | Uint8Array = '',
  headers: Record<string, string> = {}
): HttpResponse {
  return {
    status,
    statusText: '',
    headers,
    body: typeof body === 'string' ? new TextEncoder().encode(body) : body,
  };
}

/**
 * Transport answering from a handler and recording every request.
 */
export class RecordingTransport implements HttpTransport {
  readonly requests: HttpRequest[] = [];

  constructor(private readonly handler: RequestHandler) {}

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);
    return this.handler(request);
  }

  /** URLs requested, in order */
  get urls(): string[] {
    return this.requests.map((request) => request.url);
  }
}
