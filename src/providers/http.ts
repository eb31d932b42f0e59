/**
 * JSON API Client
 *
 * Shared request path of both provider clients: serialize, sign, send, check
 * the status and validate the response shape.
 *
 * @module providers/http
 */

import type { z } from 'zod';
import { ApiError, ProtocolError, errorMessage } from '../error/index.js';
import type { Logger } from '../observability/index.js';
import type { RequestSigner } from '../signing/index.js';
import { isSuccess, type HttpResponse, type HttpTransport } from '../transport/index.js';

export interface JsonApiClientOptions {
  /** Base URL; request paths are appended to it. */
  baseUrl: string;
  signer: RequestSigner;
  transport: HttpTransport;
  logger: Logger;
}

export interface RequestOptions {
  body?: unknown;
  query?: Record<string, string | undefined>;
}

/**
 * Extract an error message from a non-2xx body: the JSON `message` field when
 * there is one, the raw body otherwise.
 */
export function extractErrorMessage(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return body;
  }
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'message' in parsed &&
    typeof parsed.message === 'string'
  ) {
    return parsed.message;
  }
  return body;
}

export class JsonApiClient {
  private readonly baseUrl: string;
  private readonly signer: RequestSigner;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(options: JsonApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.signer = options.signer;
    this.transport = options.transport;
    this.logger = options.logger;
  }

  /**
   * Send a request and validate the JSON response against `schema`.
   *
   * @throws {TransportError} if the request could not be sent
   * @throws {ApiError} on a non-2xx status
   * @throws {ProtocolError} if the body is not JSON or does not match
   */
  async request<S extends z.ZodTypeAny>(
    method: string,
    path: string,
    schema: S,
    options: RequestOptions = {}
  ): Promise<z.output<S>> {
    const response = await this.send(method, path, options);
    const label = `${method} ${path}`;

    let raw: unknown;
    try {
      raw = JSON.parse(response.body);
    } catch (error) {
      throw new ProtocolError(`Invalid JSON in response to ${label}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at '${issue.path.join('.')}'` : '';
      throw new ProtocolError(
        `Unexpected response to ${label}${where}: ${issue?.message ?? 'invalid shape'}`
      );
    }
    return result.data;
  }

  /**
   * Send a request whose response body is ignored (deletions).
   */
  async requestVoid(method: string, path: string, options: RequestOptions = {}): Promise<void> {
    await this.send(method, path, options);
  }

  private async send(method: string, path: string, options: RequestOptions): Promise<HttpResponse> {
    const url = new URL(this.baseUrl + path);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, value);
      }
    }

    const body = options.body === undefined ? undefined : JSON.stringify(options.body);
    const headers: Record<string, string> = {
      Accept: 'application/json',
      [this.signer.header]: this.signer.sign({ method, path: url.pathname, body }),
    };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const started = Date.now();
    const response = await this.transport.send({ method, url: url.toString(), headers, body });
    this.logger.debug('API request completed', {
      method,
      path: url.pathname,
      status: response.status,
      durationMs: Date.now() - started,
    });

    if (!isSuccess(response)) {
      throw new ApiError(response.status, extractErrorMessage(response.body));
    }
    return response;
  }
}
