/**
 * HTTP Transport Layer
 *
 * Sends provider API requests. The default implementation uses the Fetch API;
 * tests substitute an in-process transport.
 *
 * @module transport
 */

import { TransportError } from '../error/index.js';

/**
 * HTTP request.
 */
export interface HttpRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * HTTP response. Header names are lower-cased.
 */
export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Transport interface.
 */
export interface HttpTransport {
  /**
   * Send an HTTP request.
   *
   * @throws {TransportError} if no response could be obtained
   */
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Default request timeout in milliseconds.
 */
export const DEFAULT_TIMEOUT_MS = 30_000;

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
 * Fetch-based HTTP transport.
 */
export class FetchTransport implements HttpTransport {
  private readonly timeout: number;

  constructor(timeout: number = DEFAULT_TIMEOUT_MS) {
    this.timeout = timeout;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: AbortSignal.timeout(this.timeout),
      });

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        headers,
        body: await response.text(),
      };
    } catch (error) {
      throw toTransportError(error, request.url, this.timeout);
    }
  }
}

function toTransportError(error: unknown, url: string, timeout: number): TransportError {
  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return new TransportError(`Request timeout after ${timeout}ms`, {
        url,
        timeout: true,
        cause: error,
      });
    }
    // undici reports the network cause (ENOTFOUND, ECONNREFUSED, ...) on `cause`
    const detail = error.cause instanceof Error ? `${error.message}: ${error.cause.message}` : error.message;
    return new TransportError(`HTTP request failed: ${detail}`, { url, cause: error });
  }
  return new TransportError(`HTTP request failed: ${String(error)}`, { url, cause: error });
}

/**
 * Create a fetch-based transport.
 */
export function createTransport(timeout?: number): HttpTransport {
  return new FetchTransport(timeout);
}
