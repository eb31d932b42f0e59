/**
 * bucketward
 *
 * Provisions least-privilege S3 credentials for named applications on
 * Scaleway and Exoscale. Each application gets an IAM identity and an API
 * key whose access is confined to one prefix of a shared bucket.
 *
 * @example Provisioning an app
 * ```typescript
 * import {
 *   ProvisioningOrchestrator,
 *   S3ObjectStorage,
 *   ConsoleLogger,
 *   createTransport,
 *   resolveProfile,
 *   settingsBuilder,
 * } from 'bucketward';
 *
 * const settings = settingsBuilder().fromEnv().build();
 * const logger = new ConsoleLogger({ level: settings.logLevel });
 * const profile = resolveProfile(
 *   { type: 'exoscale', apiKey, apiSecret, zone: 'de-fra-1', bucket: 'media' },
 *   { settings, transport: createTransport(settings.timeoutMs), logger }
 * );
 *
 * const orchestrator = new ProvisioningOrchestrator(profile, {
 *   logger,
 *   objectStorage: new S3ObjectStorage(logger),
 * });
 * const { credentials } = await orchestrator.provision({ name: 'svc-b', description: 'Service B' });
 * ```
 *
 * @module bucketward
 */

// =============================================================================
// Orchestration
// =============================================================================

export {
  ProvisioningOrchestrator,
  formatCredentialBundle,
  resolveProfile,
  validateAppName,
  APP_NAME_PATTERN,
  MANAGED_NAME_PREFIX,
  type AppSummary,
  type BundleLocation,
  type CredentialBundle,
  type DeletionReport,
  type OrchestratorOptions,
  type ProfileDependencies,
  type ProfileNaming,
  type ProvisioningObserver,
  type ProvisioningProfile,
  type ProvisionRequest,
  type ProvisionResult,
  type Sleep,
  type StepEvent,
} from './orchestrator/index.js';

// =============================================================================
// Providers
// =============================================================================

export {
  ScalewayClient,
  ExoscaleClient,
  JsonApiClient,
  extractErrorMessage,
  type ApiKeyCredential,
  type ApiKeySummary,
  type CreateApiKeyInput,
  type CreatePrincipalInput,
  type CreateScopedPolicyInput,
  type ExoscaleClientOptions,
  type JsonApiClientOptions,
  type Principal,
  type ProviderClient,
  type RequestOptions,
  type ScalewayClientOptions,
  type ScopedPolicy,
} from './providers/index.js';

// =============================================================================
// Policies
// =============================================================================

export * from './policy/index.js';

// =============================================================================
// Signing and transport
// =============================================================================

export * from './signing/index.js';
export {
  FetchTransport,
  createTransport,
  isSuccess,
  getHeader,
  DEFAULT_TIMEOUT_MS,
  type HttpRequest,
  type HttpResponse,
  type HttpTransport,
} from './transport/index.js';

// =============================================================================
// Storage
// =============================================================================

export * from './storage/index.js';

// =============================================================================
// Configuration
// =============================================================================

export * from './config/index.js';

// =============================================================================
// Errors and logging
// =============================================================================

export * from './error/index.js';
export * from './observability/index.js';
export { PROVIDER_KINDS, STEP_LABELS, type ProviderKind, type ProvisioningStep } from './types/common.js';
