/**
 * Configuration Module
 *
 * @module config
 */

export { SecretString } from './secret.js';
export {
  scalewayCredentialsSchema,
  exoscaleCredentialsSchema,
  providerCredentialsSchema,
  parseCredentials,
  storageEndpoint,
  storageLocation,
  describeCredentials,
} from './credentials.js';
export type {
  ScalewayCredentials,
  ExoscaleCredentials,
  ProviderCredentials,
} from './credentials.js';
export { ProviderRegistry } from './registry.js';
export type { ConfigFile } from './registry.js';
export { ConfigStore, resolveConfigPath, parseConfig } from './store.js';
export {
  settingsBuilder,
  SettingsBuilder,
  DEFAULT_SETTINGS,
  DEFAULT_PROPAGATION_DELAY_MS,
  SCALEWAY_IAM_API_BASE,
  EXOSCALE_API_BASE,
  exoscaleApiBase,
} from './settings.js';
export type { RuntimeSettings } from './settings.js';
