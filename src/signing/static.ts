/**
 * Static Key Signer
 *
 * Sends the provider secret key verbatim on every request.
 *
 * @module signing/static
 */

import { SecretString } from '../config/secret.js';
import type { RequestSigner } from './types.js';

/**
 * Header carrying the static token.
 */
export const STATIC_KEY_HEADER = 'X-Auth-Token';

/**
 * Bearer-style signer: no expiry, no per-request computation.
 */
export class StaticKeySigner implements RequestSigner {
  readonly header = STATIC_KEY_HEADER;
  private readonly secretKey: SecretString;

  constructor(secretKey: SecretString) {
    this.secretKey = secretKey;
  }

  sign(): string {
    return this.secretKey.expose();
  }
}
