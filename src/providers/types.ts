/**
 * Provider Client Types
 *
 * The capability set shared by both IAM backends. The orchestrator depends on
 * these types only, never on a concrete client.
 *
 * @module providers/types
 */

import type { SecretString } from '../config/secret.js';
import type { ProviderKind } from '../types/common.js';

/**
 * Application identity in a provider's IAM system.
 */
export interface Principal {
  id: string;
  name: string;
  description?: string;
}

/**
 * Policy binding a principal to object operations on one bucket prefix.
 */
export interface ScopedPolicy {
  id: string;
  name: string;
  principalId: string;
  /**
   * True when the policy lives inside the principal itself (a role with an
   * inline policy) rather than as a separate object.
   */
  embedded: boolean;
}

/**
 * Freshly created API key. The secret is only ever available here.
 */
export interface ApiKeyCredential {
  accessKey: string;
  secretKey: SecretString;
  principalId: string;
}

/**
 * API key as returned by a listing (never carries a secret).
 */
export interface ApiKeySummary {
  accessKey: string;
  name?: string;
  principalId?: string;
  description?: string;
}

/**
 * Input for {@link ProviderClient.createPrincipal}.
 */
export interface CreatePrincipalInput {
  name: string;
  description: string;
  /** Bucket the principal is scoped to (inline-policy providers). */
  bucket: string;
  /** Key prefix the principal is scoped to (inline-policy providers). */
  prefix: string;
}

/**
 * Input for {@link ProviderClient.createScopedPolicy}.
 */
export interface CreateScopedPolicyInput {
  name: string;
}

/**
 * Input for {@link ProviderClient.createApiKey}.
 */
export interface CreateApiKeyInput {
  /** Key name (providers that name keys). */
  name: string;
  /** Key description (providers that describe keys). */
  description: string;
}

/**
 * IAM operations needed to provision and tear down scoped credentials.
 */
export interface ProviderClient {
  readonly kind: ProviderKind;

  /**
   * Whether a separate policy object must be created after the principal.
   */
  readonly requiresScopedPolicy: boolean;

  createPrincipal(input: CreatePrincipalInput): Promise<Principal>;
  createScopedPolicy(principal: Principal, input: CreateScopedPolicyInput): Promise<ScopedPolicy>;

  /**
   * @throws {ProtocolError} if the response carries no secret
   */
  createApiKey(principal: Principal, input: CreateApiKeyInput): Promise<ApiKeyCredential>;

  listPrincipals(): Promise<Principal[]>;

  /**
   * List API keys, optionally only those bound to one principal.
   */
  listApiKeys(principalId?: string): Promise<ApiKeySummary[]>;

  deletePrincipal(principalId: string): Promise<void>;
  deleteApiKey(accessKey: string): Promise<void>;
}
