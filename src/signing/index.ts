/**
 * Request Signing Module
 *
 * Two schemes, selected by provider:
 *
 * - {@link StaticKeySigner}: `X-Auth-Token: {secretKey}` (Scaleway)
 * - {@link HmacRequestSigner}: `Authorization: EXO2-HMAC-SHA256 ...` (Exoscale)
 *
 * @module signing
 */

export { StaticKeySigner, STATIC_KEY_HEADER } from './static.js';
export {
  HmacRequestSigner,
  buildSigningMessage,
  HMAC_SCHEME,
  SIGNATURE_TTL_SECONDS,
} from './hmac.js';
export type { RequestSigner, SignableRequest, Clock } from './types.js';
