/**
 * Shared Types
 *
 * Identifiers used across the provider, policy and orchestration layers.
 *
 * @module types/common
 */

/**
 * Supported IAM backends.
 *
 * - `scaleway`: static-key provider (application + policy + API key)
 * - `exoscale`: signed-request provider (role with inline policy + API key)
 */
export type ProviderKind = 'scaleway' | 'exoscale';

/**
 * All provider kinds, in display order.
 */
export const PROVIDER_KINDS: readonly ProviderKind[] = ['scaleway', 'exoscale'];

/**
 * Steps of the provisioning and teardown flows.
 *
 * Used to attribute failures and to report progress.
 */
export type ProvisioningStep =
  | 'ensure-bucket'
  | 'create-principal'
  | 'create-scoped-policy'
  | 'wait-propagation'
  | 'create-api-key'
  | 'apply-bucket-policy'
  | 'emit-credentials'
  | 'list-principals'
  | 'list-api-keys'
  | 'delete-api-key'
  | 'delete-principal';

/**
 * Human-readable labels for each step.
 */
export const STEP_LABELS: Record<ProvisioningStep, string> = {
  'ensure-bucket': 'Checking/creating bucket',
  'create-principal': 'Creating IAM principal',
  'create-scoped-policy': 'Creating scoped policy',
  'wait-propagation': 'Waiting for role to propagate',
  'create-api-key': 'Creating API key',
  'apply-bucket-policy': 'Applying bucket policy',
  'emit-credentials': 'Emitting credentials',
  'list-principals': 'Listing principals',
  'list-api-keys': 'Listing API keys',
  'delete-api-key': 'Deleting API key',
  'delete-principal': 'Deleting principal',
};
