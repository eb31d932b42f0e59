/**
 * HMAC Request Signer
 *
 * Implements the EXO2-HMAC-SHA256 scheme. The signed message is five lines:
 *
 * ```text
 * {METHOD} {path}
 * {body}
 * {query parameters}      (always empty here)
 * {signed headers}        (always empty here)
 * {expires}
 * ```
 *
 * The signature is the base64 HMAC-SHA256 of that message keyed with the API
 * secret. A signature is valid until `expires`, 600 seconds after signing.
 *
 * @module signing/hmac
 */

import { createHmac } from 'node:crypto';
import { SecretString } from '../config/secret.js';
import { SigningError, errorMessage } from '../error/index.js';
import type { Clock, RequestSigner, SignableRequest } from './types.js';

/**
 * Scheme identifier placed at the start of the Authorization header.
 */
export const HMAC_SCHEME = 'EXO2-HMAC-SHA256';

/**
 * Validity window of a signature, in seconds.
 */
export const SIGNATURE_TTL_SECONDS = 600;

/**
 * Build the canonical message for a request.
 */
export function buildSigningMessage(request: SignableRequest, expires: number): string {
  return [
    `${request.method.toUpperCase()} ${request.path}`,
    request.body ?? '',
    '',
    '',
    String(expires),
  ].join('\n');
}

/**
 * Signer for the signed-request provider.
 */
export class HmacRequestSigner implements RequestSigner {
  readonly header = 'Authorization';

  private readonly apiKey: string;
  private readonly apiSecret: SecretString;
  private readonly clock: Clock;

  constructor(apiKey: string, apiSecret: SecretString, clock: Clock = Date.now) {
    this.apiKey = apiKey;
    this.apiSecret = apiSecret;
    this.clock = clock;
  }

  sign(request: SignableRequest): string {
    const expires = this.expiresAt();
    const signature = this.signature(buildSigningMessage(request, expires));
    return `${HMAC_SCHEME} credential=${this.apiKey},expires=${expires},signature=${signature}`;
  }

  /**
   * Unix timestamp (seconds) at which a signature produced now expires.
   */
  expiresAt(): number {
    return Math.floor(this.clock() / 1000) + SIGNATURE_TTL_SECONDS;
  }

  private signature(message: string): string {
    if (!this.apiKey || this.apiSecret.isEmpty()) {
      throw new SigningError('API key and secret must not be empty');
    }

    try {
      return createHmac('sha256', this.apiSecret.expose()).update(message).digest('base64');
    } catch (error) {
      throw new SigningError(`Failed to compute request signature: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
