/**
 * Runtime Settings
 *
 * Process-wide knobs that are not provider credentials: HTTP timeout, the
 * propagation delay after role creation, logging and API base URLs.
 *
 * @module config/settings
 */

import { z } from 'zod';
import { ConfigurationError } from '../error/index.js';
import { LogLevel, parseLogLevel } from '../observability/index.js';

/**
 * Runtime settings.
 */
export interface RuntimeSettings {
  /** HTTP request timeout in milliseconds. */
  timeoutMs: number;
  /** Fixed wait between role creation and API key creation (signed-request provider). */
  propagationDelayMs: number;
  /** Minimum log level. */
  logLevel: LogLevel;
  /** Log line format. */
  logFormat: 'pretty' | 'json';
  /** Scaleway IAM API base URL. */
  scalewayApiBase: string;
  /** Exoscale API base URL template; `{zone}` is replaced by the zone. */
  exoscaleApiBase: string;
}

/** Scaleway IAM API base. */
export const SCALEWAY_IAM_API_BASE = 'https://api.scaleway.com/iam/v1alpha1';

/** Exoscale API base template. Paths carry the `/v2` version segment. */
export const EXOSCALE_API_BASE = 'https://api-{zone}.exoscale.com';

/** Default propagation delay (3 seconds). */
export const DEFAULT_PROPAGATION_DELAY_MS = 3_000;

/**
 * Default settings.
 */
export const DEFAULT_SETTINGS: RuntimeSettings = {
  timeoutMs: 30_000,
  propagationDelayMs: DEFAULT_PROPAGATION_DELAY_MS,
  logLevel: LogLevel.Warn,
  logFormat: 'pretty',
  scalewayApiBase: SCALEWAY_IAM_API_BASE,
  exoscaleApiBase: EXOSCALE_API_BASE,
};

const settingsSchema = z.object({
  timeoutMs: z.number().int().min(1),
  propagationDelayMs: z.number().int().min(0),
  logLevel: z.nativeEnum(LogLevel),
  logFormat: z.enum(['pretty', 'json']),
  scalewayApiBase: z.string().url(),
  exoscaleApiBase: z.string().refine((value) => value.includes('{zone}'), {
    message: 'must contain {zone}',
  }),
});

/**
 * Runtime settings builder.
 */
export class SettingsBuilder {
  private settings: Partial<RuntimeSettings> = {};

  timeout(ms: number): this {
    this.settings.timeoutMs = ms;
    return this;
  }

  propagationDelay(ms: number): this {
    this.settings.propagationDelayMs = ms;
    return this;
  }

  logLevel(level: LogLevel): this {
    this.settings.logLevel = level;
    return this;
  }

  logFormat(format: 'pretty' | 'json'): this {
    this.settings.logFormat = format;
    return this;
  }

  scalewayApiBase(url: string): this {
    this.settings.scalewayApiBase = url;
    return this;
  }

  exoscaleApiBase(template: string): this {
    this.settings.exoscaleApiBase = template;
    return this;
  }

  /**
   * Load settings from environment variables.
   *
   * - `BUCKETWARD_TIMEOUT_MS`
   * - `BUCKETWARD_PROPAGATION_DELAY_MS`
   * - `BUCKETWARD_LOG_LEVEL` (trace, debug, info, warn, error, silent)
   * - `BUCKETWARD_LOG_FORMAT` (pretty, json)
   * - `BUCKETWARD_SCALEWAY_API_BASE`
   * - `BUCKETWARD_EXOSCALE_API_BASE`
   */
  fromEnv(env: NodeJS.ProcessEnv = process.env): this {
    const timeout = env.BUCKETWARD_TIMEOUT_MS;
    if (timeout) {
      this.settings.timeoutMs = parseInteger('BUCKETWARD_TIMEOUT_MS', timeout);
    }

    const delay = env.BUCKETWARD_PROPAGATION_DELAY_MS;
    if (delay) {
      this.settings.propagationDelayMs = parseInteger('BUCKETWARD_PROPAGATION_DELAY_MS', delay);
    }

    const level = env.BUCKETWARD_LOG_LEVEL;
    if (level) {
      const parsed = parseLogLevel(level);
      if (parsed === undefined) {
        throw new ConfigurationError(`Invalid BUCKETWARD_LOG_LEVEL: ${level}`);
      }
      this.settings.logLevel = parsed;
    }

    const format = env.BUCKETWARD_LOG_FORMAT;
    if (format === 'pretty' || format === 'json') {
      this.settings.logFormat = format;
    } else if (format) {
      throw new ConfigurationError(`Invalid BUCKETWARD_LOG_FORMAT: ${format}`);
    }

    if (env.BUCKETWARD_SCALEWAY_API_BASE) {
      this.settings.scalewayApiBase = env.BUCKETWARD_SCALEWAY_API_BASE;
    }
    if (env.BUCKETWARD_EXOSCALE_API_BASE) {
      this.settings.exoscaleApiBase = env.BUCKETWARD_EXOSCALE_API_BASE;
    }

    return this;
  }

  /**
   * Build and validate the settings.
   *
   * @throws {ConfigurationError} if a value is out of range
   */
  build(): RuntimeSettings {
    const merged = { ...DEFAULT_SETTINGS, ...this.settings };
    const result = settingsSchema.safeParse(merged);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new ConfigurationError(
        `Invalid setting ${issue?.path.join('.') ?? ''}: ${issue?.message ?? 'invalid value'}`
      );
    }
    return merged;
  }
}

function parseInteger(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${name} must be an integer, got '${value}'`);
  }
  return parsed;
}

/**
 * Create a new settings builder.
 */
export function settingsBuilder(): SettingsBuilder {
  return new SettingsBuilder();
}

/**
 * Resolve the Exoscale API base for a zone.
 */
export function exoscaleApiBase(settings: RuntimeSettings, zone: string): string {
  return settings.exoscaleApiBase.replace('{zone}', zone);
}
