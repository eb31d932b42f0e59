/**
 * IAM provider clients.
 *
 * @module providers
 */

export { ScalewayClient } from './scaleway/index.js';
export type { ScalewayClientOptions } from './scaleway/index.js';
export { ExoscaleClient } from './exoscale/index.js';
export type { ExoscaleClientOptions } from './exoscale/index.js';
export { JsonApiClient, extractErrorMessage } from './http.js';
export type { JsonApiClientOptions, RequestOptions } from './http.js';
export type {
  ApiKeyCredential,
  ApiKeySummary,
  CreateApiKeyInput,
  CreatePrincipalInput,
  CreateScopedPolicyInput,
  Principal,
  ProviderClient,
  ScopedPolicy,
} from './types.js';
