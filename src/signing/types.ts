/**
 * Request Signing Types
 *
 * @module signing/types
 */

/**
 * The parts of an outbound request that a signer may cover.
 */
export interface SignableRequest {
  /** HTTP method (e.g., "POST") */
  method: string;
  /** URL path without host or query (e.g., "/v2/iam-role") */
  path: string;
  /** Raw request body, if any */
  body?: string;
}

/**
 * Produces the authorization credential for a single outbound request.
 *
 * The value returned by {@link RequestSigner.sign} is placed into the header
 * named by {@link RequestSigner.header}.
 */
export interface RequestSigner {
  /** Header that carries the credential */
  readonly header: string;

  /**
   * Compute the credential for a request.
   *
   * @throws {SigningError} if the key material cannot be used
   */
  sign(request: SignableRequest): string;
}

/**
 * Clock returning the current time in milliseconds since the Unix epoch.
 */
export type Clock = () => number;
