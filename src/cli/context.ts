/**
 * CLI Context
 *
 * Resolves configuration, settings and collaborators for one invocation.
 *
 * @module cli/context
 */

import { ConfigStore, resolveConfigPath } from '../config/store.js';
import { settingsBuilder, type RuntimeSettings } from '../config/settings.js';
import { ConfigurationError } from '../error/index.js';
import { ConsoleLogger, type Logger } from '../observability/index.js';
import {
  ProvisioningOrchestrator,
  resolveProfile,
  type ProvisioningObserver,
  type Sleep,
} from '../orchestrator/index.js';
import { S3ObjectStorage } from '../storage/s3.js';
import type { BucketPolicyStore, ObjectStorage, S3Connection } from '../storage/types.js';
import { createTransport, type HttpTransport } from '../transport/index.js';
import type { CliOutput } from './output.js';

/**
 * Collaborators of the CLI. Everything but `env` and `output` defaults to
 * the real implementation.
 */
export interface CliDependencies {
  env: NodeJS.ProcessEnv;
  output: CliOutput;
  transport?: HttpTransport;
  objectStorage?: ObjectStorage;
  policyStoreFactory?: (connection: S3Connection) => BucketPolicyStore;
  sleep?: Sleep;
  logger?: Logger;
}

export interface GlobalOptions {
  config?: string;
}

export class CliContext {
  readonly output: CliOutput;
  readonly store: ConfigStore;
  private cachedSettings?: RuntimeSettings;
  private cachedLogger?: Logger;

  constructor(
    private readonly deps: CliDependencies,
    options: GlobalOptions
  ) {
    this.output = deps.output;
    this.store = new ConfigStore(resolveConfigPath(options.config, deps.env));
  }

  get settings(): RuntimeSettings {
    this.cachedSettings ??= settingsBuilder().fromEnv(this.deps.env).build();
    return this.cachedSettings;
  }

  get logger(): Logger {
    this.cachedLogger ??=
      this.deps.logger ??
      new ConsoleLogger({
        level: this.settings.logLevel,
        format: this.settings.logFormat,
        context: { service: 'bucketward' },
      });
    return this.cachedLogger;
  }

  /**
   * Build an orchestrator for a configured provider.
   *
   * @throws {ConfigurationError} if no provider has that name
   */
  async orchestrator(
    providerName: string,
    observer?: ProvisioningObserver
  ): Promise<ProvisioningOrchestrator> {
    const registry = await this.store.load();
    const credentials = registry.get(providerName);
    if (!credentials) {
      throw new ConfigurationError(
        `Provider '${providerName}' not found. Run 'bucketward list-providers' to see configured providers.`
      );
    }

    const profile = resolveProfile(credentials, {
      settings: this.settings,
      transport: this.deps.transport ?? createTransport(this.settings.timeoutMs),
      logger: this.logger,
      policyStoreFactory: this.deps.policyStoreFactory,
    });
    return new ProvisioningOrchestrator(profile, {
      logger: this.logger,
      objectStorage: this.deps.objectStorage ?? new S3ObjectStorage(this.logger),
      observer,
      sleep: this.deps.sleep,
    });
  }
}
