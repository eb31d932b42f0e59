/**
 * Provisioning Profiles
 *
 * Everything that differs between the two providers, resolved once from the
 * credential set. The orchestrator never inspects the provider kind itself.
 *
 * @module orchestrator/profile
 */

import type {
  ExoscaleCredentials,
  ProviderCredentials,
  ScalewayCredentials,
} from '../config/credentials.js';
import { storageEndpoint } from '../config/credentials.js';
import { SecretString } from '../config/secret.js';
import { exoscaleApiBase, type RuntimeSettings } from '../config/settings.js';
import type { Logger } from '../observability/index.js';
import { ExoscaleClient } from '../providers/exoscale/index.js';
import { ScalewayClient } from '../providers/scaleway/index.js';
import type { ProviderClient } from '../providers/types.js';
import type { Clock } from '../signing/index.js';
import { S3BucketPolicyStore } from '../storage/s3.js';
import type { BucketPolicyStore, S3Connection } from '../storage/types.js';
import type { HttpTransport } from '../transport/index.js';
import type { ProviderKind } from '../types/common.js';
import { MANAGED_NAME_PREFIX } from './naming.js';

/**
 * Location field of a credential bundle.
 */
export type BundleLocation = { region: string } | { zone: string };

/**
 * Names derived from an app name.
 */
export interface ProfileNaming {
  /** Key prefix the app is confined to. */
  prefix(appName: string): string;
  principal(appName: string): string;
  scopedPolicy(appName: string): string;
  apiKeyName(appName: string): string;
  apiKeyDescription(appName: string): string;
  /**
   * App name of a listed principal, or undefined when the principal is not
   * one this tool manages.
   */
  appNameOf(principalName: string): string | undefined;
}

export interface ProvisioningProfile {
  kind: ProviderKind;
  client: ProviderClient;
  bucket: string;
  /** S3 endpoint handed out with the credentials. */
  endpoint: string;
  location: BundleLocation;
  /** Operator connection used to ensure the bucket exists. */
  connection: S3Connection;
  naming: ProfileNaming;
  /** Wait between principal creation and key creation. */
  propagationDelayMs: number;
  /**
   * Store of the shared bucket policy, when access must also be granted on
   * the bucket side.
   */
  bucketPolicyStore?: BucketPolicyStore;
  /**
   * Whether deleting a principal removes its API keys upstream. When false
   * the keys are deleted first.
   */
  cascadesKeyDeletion: boolean;
}

export interface ProfileDependencies {
  settings: RuntimeSettings;
  transport: HttpTransport;
  logger: Logger;
  /** Signing clock of the signed-request provider. */
  clock?: Clock;
  policyStoreFactory?: (connection: S3Connection) => BucketPolicyStore;
}

const defaultPolicyStoreFactory = (connection: S3Connection): BucketPolicyStore =>
  new S3BucketPolicyStore(connection);

function scalewayProfile(
  credentials: ScalewayCredentials,
  deps: ProfileDependencies
): ProvisioningProfile {
  const endpoint = storageEndpoint(credentials);
  const connection: S3Connection = {
    endpoint,
    region: credentials.region,
    accessKey: credentials.accessKey,
    secretKey: new SecretString(credentials.secretKey),
  };

  return {
    kind: 'scaleway',
    client: new ScalewayClient({
      credentials,
      transport: deps.transport,
      logger: deps.logger,
      baseUrl: deps.settings.scalewayApiBase,
    }),
    bucket: credentials.bucket,
    endpoint,
    location: { region: credentials.region },
    connection,
    naming: {
      prefix: (app) => `apps/${app}`,
      principal: (app) => app,
      scopedPolicy: (app) => `${app}-policy`,
      apiKeyName: (app) => `${app}-key`,
      apiKeyDescription: (app) => `API key for ${app}`,
      appNameOf: (name) => name,
    },
    propagationDelayMs: 0,
    bucketPolicyStore: (deps.policyStoreFactory ?? defaultPolicyStoreFactory)(connection),
    cascadesKeyDeletion: true,
  };
}

function exoscaleProfile(
  credentials: ExoscaleCredentials,
  deps: ProfileDependencies
): ProvisioningProfile {
  const endpoint = storageEndpoint(credentials);

  return {
    kind: 'exoscale',
    client: new ExoscaleClient({
      credentials,
      transport: deps.transport,
      logger: deps.logger,
      baseUrl: exoscaleApiBase(deps.settings, credentials.zone),
      clock: deps.clock,
    }),
    bucket: credentials.bucket,
    endpoint,
    location: { zone: credentials.zone },
    connection: {
      endpoint,
      region: credentials.zone,
      accessKey: credentials.apiKey,
      secretKey: new SecretString(credentials.apiSecret),
    },
    naming: {
      prefix: (app) => `apps/${app}/`,
      principal: (app) => `${MANAGED_NAME_PREFIX}${app}`,
      scopedPolicy: (app) => `${MANAGED_NAME_PREFIX}${app}`,
      apiKeyName: (app) => `${MANAGED_NAME_PREFIX}${app}-key`,
      apiKeyDescription: (app) => `API key for ${app}`,
      appNameOf: (name) =>
        name.startsWith(MANAGED_NAME_PREFIX) ? name.slice(MANAGED_NAME_PREFIX.length) : undefined,
    },
    propagationDelayMs: deps.settings.propagationDelayMs,
    cascadesKeyDeletion: false,
  };
}

/**
 * Resolve the profile of a credential set.
 */
export function resolveProfile(
  credentials: ProviderCredentials,
  deps: ProfileDependencies
): ProvisioningProfile {
  switch (credentials.type) {
    case 'scaleway':
      return scalewayProfile(credentials, deps);
    case 'exoscale':
      return exoscaleProfile(credentials, deps);
  }
}
