/**
 * Provisioning Orchestrator
 *
 * Runs the provisioning sequence against one provider profile:
 *
 * 1. ensure-bucket
 * 2. create-principal
 * 3. create-scoped-policy (providers with separate policy objects)
 * 4. wait-propagation (providers with a propagation delay)
 * 5. create-api-key
 * 6. apply-bucket-policy (providers granting access on the bucket side)
 * 7. emit-credentials
 *
 * Every step is awaited before the next one starts. A failing step aborts
 * the run with a {@link StepError}; resources created by earlier steps are
 * left in place.
 *
 * @module orchestrator/orchestrator
 */

import { setTimeout as delay } from 'node:timers/promises';
import { StepError, errorMessage } from '../error/index.js';
import type { Logger } from '../observability/index.js';
import { BucketPolicyApplier } from '../policy/applier.js';
import { sharedPolicyLocks, type KeyedMutex } from '../policy/mutex.js';
import { buildBucketPolicyStatement } from '../policy/builder.js';
import type { BucketPolicyDocument } from '../policy/types.js';
import type { Principal, ScopedPolicy } from '../providers/types.js';
import type { ObjectStorage } from '../storage/types.js';
import type { ProvisioningStep } from '../types/common.js';
import { validateAppName } from './naming.js';
import type { BundleLocation, ProvisioningProfile } from './profile.js';

/**
 * Credentials handed to an application. Emitted once; the secret cannot be
 * retrieved again.
 */
export type CredentialBundle = {
  accessKey: string;
  secretKey: string;
  endpoint: string;
  bucket: string;
  prefix: string;
} & BundleLocation;

export interface ProvisionRequest {
  name: string;
  description: string;
}

export interface ProvisionResult {
  appName: string;
  principal: Principal;
  /** Absent when the provider has no separate policy object. */
  policy?: ScopedPolicy;
  credentials: CredentialBundle;
  /** Bucket policy as written, when one was applied. */
  bucketPolicy?: BucketPolicyDocument;
}

export interface AppSummary {
  /** Principal id; pass it to {@link ProvisioningOrchestrator.deleteApp}. */
  id: string;
  name: string;
  description?: string;
}

export interface DeletionReport {
  principalId: string;
  deletedKeys: string[];
  failedKeys: Array<{ accessKey: string; error: string }>;
  /**
   * Bucket whose policy may still hold a statement for the deleted app.
   */
  staleBucketPolicy?: string;
}

/**
 * Progress of one step. `index` is 1-based within the flow's plan.
 */
export interface StepEvent {
  step: ProvisioningStep;
  index: number;
  total: number;
  detail?: string;
}

export interface ProvisioningObserver {
  stepStarted?(event: StepEvent): void;
  stepCompleted?(event: StepEvent): void;
}

export type Sleep = (ms: number) => Promise<void>;

export interface OrchestratorOptions {
  logger: Logger;
  objectStorage: ObjectStorage;
  observer?: ProvisioningObserver;
  /** Defaults to a timer-based sleep. */
  sleep?: Sleep;
  /**
   * Locks serializing bucket policy updates. Defaults to the process-wide
   * set, so orchestrators on the same endpoint and bucket never interleave.
   */
  policyLocks?: KeyedMutex;
}

const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

/**
 * Render a credential bundle as the JSON document given to an application.
 */
export function formatCredentialBundle(bundle: CredentialBundle): string {
  const location = 'region' in bundle ? { region: bundle.region } : { zone: bundle.zone };
  return JSON.stringify(
    {
      access_key: bundle.accessKey,
      secret_key: bundle.secretKey,
      endpoint: bundle.endpoint,
      ...location,
      bucket: bundle.bucket,
      prefix: bundle.prefix,
    },
    null,
    2
  );
}

export class ProvisioningOrchestrator {
  private readonly logger: Logger;
  private readonly objectStorage: ObjectStorage;
  private readonly observer: ProvisioningObserver;
  private readonly sleep: Sleep;
  private readonly applier?: BucketPolicyApplier;

  constructor(
    private readonly profile: ProvisioningProfile,
    options: OrchestratorOptions
  ) {
    this.logger = options.logger.child({ provider: profile.kind, bucket: profile.bucket });
    this.objectStorage = options.objectStorage;
    this.observer = options.observer ?? {};
    this.sleep = options.sleep ?? defaultSleep;
    if (profile.bucketPolicyStore) {
      this.applier = new BucketPolicyApplier(profile.bucketPolicyStore, this.logger, {
        locks: options.policyLocks ?? sharedPolicyLocks,
        scope: profile.endpoint,
      });
    }
  }

  /**
   * Steps {@link provision} runs for this profile, in order.
   */
  plan(): ProvisioningStep[] {
    const steps: ProvisioningStep[] = ['ensure-bucket', 'create-principal'];
    if (this.profile.client.requiresScopedPolicy) {
      steps.push('create-scoped-policy');
    }
    if (this.profile.propagationDelayMs > 0) {
      steps.push('wait-propagation');
    }
    steps.push('create-api-key');
    if (this.applier) {
      steps.push('apply-bucket-policy');
    }
    steps.push('emit-credentials');
    return steps;
  }

  /**
   * Provision scoped credentials for a new app.
   *
   * @throws {ConfigurationError} if the app name is invalid (before any remote call)
   * @throws {StepError} if a step fails
   */
  async provision(request: ProvisionRequest): Promise<ProvisionResult> {
    const appName = validateAppName(request.name);
    const { client, naming, bucket } = this.profile;
    const prefix = naming.prefix(appName);
    const run = this.runner(this.plan());

    this.logger.info('Provisioning app', { app: appName, prefix });

    await run('ensure-bucket', `bucket '${bucket}'`, () =>
      this.objectStorage.ensureBucket(this.profile.connection, bucket)
    );

    const principal = await run(
      'create-principal',
      undefined,
      () =>
        client.createPrincipal({
          name: naming.principal(appName),
          description: request.description,
          bucket,
          prefix,
        }),
      (p) => `id ${p.id}`
    );

    let policy: ScopedPolicy | undefined;
    if (client.requiresScopedPolicy) {
      policy = await run(
        'create-scoped-policy',
        undefined,
        () => client.createScopedPolicy(principal, { name: naming.scopedPolicy(appName) }),
        (p) => `id ${p.id}`
      );
    }

    const wait = this.profile.propagationDelayMs;
    if (wait > 0) {
      await run('wait-propagation', `${wait}ms`, () => this.sleep(wait));
    }

    const apiKey = await run(
      'create-api-key',
      undefined,
      () =>
        client.createApiKey(principal, {
          name: naming.apiKeyName(appName),
          description: naming.apiKeyDescription(appName),
        }),
      (k) => `access key ${k.accessKey}`
    );

    let bucketPolicy: BucketPolicyDocument | undefined;
    const applier = this.applier;
    if (applier) {
      bucketPolicy = await run('apply-bucket-policy', `prefix '${prefix}'`, () =>
        applier.apply(
          bucket,
          buildBucketPolicyStatement({ appName, principalId: principal.id, bucket, prefix })
        )
      );
    }

    const credentials = await run('emit-credentials', undefined, async () => {
      const bundle: CredentialBundle = {
        accessKey: apiKey.accessKey,
        secretKey: apiKey.secretKey.expose(),
        endpoint: this.profile.endpoint,
        ...this.profile.location,
        bucket,
        prefix,
      };
      return bundle;
    });

    this.logger.info('App provisioned', {
      app: appName,
      principalId: principal.id,
      accessKey: apiKey.accessKey,
    });

    return { appName, principal, policy, credentials, bucketPolicy };
  }

  /**
   * List the apps this tool manages on the provider.
   */
  async listApps(): Promise<AppSummary[]> {
    const run = this.runner(['list-principals']);
    const principals = await run('list-principals', undefined, () =>
      this.profile.client.listPrincipals()
    );

    const apps: AppSummary[] = [];
    for (const principal of principals) {
      const name = this.profile.naming.appNameOf(principal.name);
      if (name !== undefined) {
        apps.push({ id: principal.id, name, description: principal.description });
      }
    }
    return apps;
  }

  /**
   * Delete an app's principal, and first its API keys where the provider
   * does not remove them with it. Failures to delete individual keys are
   * reported, not thrown.
   *
   * @throws {StepError} if listing keys or deleting the principal fails
   */
  async deleteApp(principalId: string): Promise<DeletionReport> {
    const { client } = this.profile;
    const cascades = this.profile.cascadesKeyDeletion;
    const run = this.runner(
      cascades ? ['delete-principal'] : ['list-api-keys', 'delete-api-key', 'delete-principal']
    );

    const report: DeletionReport = { principalId, deletedKeys: [], failedKeys: [] };

    if (!cascades) {
      const keys = await run(
        'list-api-keys',
        undefined,
        () => client.listApiKeys(principalId),
        (k) => `${k.length} key(s)`
      );

      await run(
        'delete-api-key',
        undefined,
        async () => {
          for (const key of keys) {
            try {
              await client.deleteApiKey(key.accessKey);
              report.deletedKeys.push(key.accessKey);
            } catch (error) {
              this.logger.warn('Failed to delete API key', {
                principalId,
                accessKey: key.accessKey,
                error: errorMessage(error),
              });
              report.failedKeys.push({ accessKey: key.accessKey, error: errorMessage(error) });
            }
          }
        },
        () => `${report.deletedKeys.length} deleted, ${report.failedKeys.length} failed`
      );
    }

    await run('delete-principal', principalId, () => client.deletePrincipal(principalId));

    if (this.applier) {
      report.staleBucketPolicy = this.profile.bucket;
    }

    this.logger.info('App deleted', {
      principalId,
      deletedKeys: report.deletedKeys.length,
      failedKeys: report.failedKeys.length,
    });
    return report;
  }

  /**
   * Step runner for one flow: reports progress and wraps failures.
   */
  private runner(plan: ProvisioningStep[]) {
    const total = plan.length;
    return async <T>(
      step: ProvisioningStep,
      detail: string | undefined,
      task: () => Promise<T>,
      describe?: (result: T) => string
    ): Promise<T> => {
      const index = plan.indexOf(step) + 1;
      this.observer.stepStarted?.({ step, index, total, detail });
      this.logger.debug('Step started', { step });

      let result: T;
      try {
        result = await task();
      } catch (error) {
        this.logger.error('Step failed', { step, error: errorMessage(error) });
        throw new StepError(step, this.profile.kind, error);
      }

      this.observer.stepCompleted?.({ step, index, total, detail: describe?.(result) });
      this.logger.debug('Step completed', { step });
      return result;
    };
  }
}
