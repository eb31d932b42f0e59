/**
 * Configuration File Store
 *
 * Reads and writes the provider registry as JSON. Location, in order:
 *
 * 1. explicit path (`--config`)
 * 2. `BUCKETWARD_CONFIG`
 * 3. `$XDG_CONFIG_HOME/bucketward/config.json`
 * 4. `~/.config/bucketward/config.json`
 *
 * @module config/store
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../error/index.js';
import { providerCredentialsSchema } from './credentials.js';
import { ProviderRegistry } from './registry.js';

const configFileSchema = z.object({
  providers: z.record(providerCredentialsSchema).default({}),
});

/**
 * Resolve the configuration file path.
 */
export function resolveConfigPath(
  customPath?: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  if (customPath) {
    return path.resolve(customPath);
  }
  if (env.BUCKETWARD_CONFIG) {
    return path.resolve(env.BUCKETWARD_CONFIG);
  }
  const base = env.XDG_CONFIG_HOME || path.join(homedir(), '.config');
  return path.join(base, 'bucketward', 'config.json');
}

/**
 * Parse configuration file contents.
 *
 * @throws {ConfigurationError} on invalid JSON or invalid provider entries
 */
export function parseConfig(content: string, source: string): ProviderRegistry {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse config file ${source}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.join('.') : '';
    throw new ConfigurationError(
      `Invalid config file ${source}: ${where ? `${where}: ` : ''}${issue?.message ?? 'invalid'}`
    );
  }

  return new ProviderRegistry(Object.entries(result.data.providers));
}

export class ConfigStore {
  readonly path: string;

  constructor(filePath: string) {
    this.path = filePath;
  }

  /**
   * Load the registry; a missing file yields an empty registry.
   */
  async load(): Promise<ProviderRegistry> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        return new ProviderRegistry();
      }
      throw new ConfigurationError(`Failed to read config file ${this.path}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    return parseConfig(content, this.path);
  }

  /**
   * Write the registry, creating parent directories. The file holds secrets
   * and is written owner-readable only.
   */
  async save(registry: ProviderRegistry): Promise<void> {
    try {
      await mkdir(path.dirname(this.path), { recursive: true });
      await writeFile(this.path, `${JSON.stringify(registry, null, 2)}\n`, { mode: 0o600 });
    } catch (error) {
      throw new ConfigurationError(`Failed to write config file ${this.path}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
