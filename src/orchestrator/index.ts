/**
 * Provisioning flows.
 *
 * @module orchestrator
 */

export { ProvisioningOrchestrator, formatCredentialBundle } from './orchestrator.js';
export type {
  AppSummary,
  CredentialBundle,
  DeletionReport,
  OrchestratorOptions,
  ProvisioningObserver,
  ProvisionRequest,
  ProvisionResult,
  Sleep,
  StepEvent,
} from './orchestrator.js';
export { resolveProfile } from './profile.js';
export type {
  BundleLocation,
  ProfileDependencies,
  ProfileNaming,
  ProvisioningProfile,
} from './profile.js';
export { validateAppName, APP_NAME_PATTERN, MANAGED_NAME_PREFIX } from './naming.js';
