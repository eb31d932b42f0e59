/**
 * Provider Registry
 *
 * In-memory set of named provider credentials, as read from and written to
 * the configuration file by {@link ConfigStore}.
 *
 * @module config/registry
 */

import type { ProviderCredentials } from './credentials.js';

/**
 * Serialized form of the registry.
 */
export interface ConfigFile {
  providers: Record<string, ProviderCredentials>;
}

export class ProviderRegistry {
  private readonly providers: Map<string, ProviderCredentials>;

  constructor(entries: Iterable<[string, ProviderCredentials]> = []) {
    this.providers = new Map(entries);
  }

  get(name: string): ProviderCredentials | undefined {
    return this.providers.get(name);
  }

  /**
   * Provider names, sorted.
   */
  list(): string[] {
    return [...this.providers.keys()].sort();
  }

  /**
   * Add or replace a provider.
   */
  put(name: string, credentials: ProviderCredentials): void {
    this.providers.set(name, credentials);
  }

  /**
   * Remove a provider, returning what was removed.
   */
  remove(name: string): ProviderCredentials | undefined {
    const existing = this.providers.get(name);
    this.providers.delete(name);
    return existing;
  }

  get size(): number {
    return this.providers.size;
  }

  toJSON(): ConfigFile {
    const providers: Record<string, ProviderCredentials> = {};
    for (const name of this.list()) {
      const credentials = this.providers.get(name);
      if (credentials) {
        providers[name] = credentials;
      }
    }
    return { providers };
  }
}
