/**
 * Tests for runtime settings
 */

import { describe, it, expect } from 'vitest';
import { settingsBuilder, exoscaleApiBase, DEFAULT_SETTINGS } from '../settings.js';
import { ConfigurationError } from '../../error/index.js';
import { LogLevel } from '../../observability/index.js';

describe('SettingsBuilder', () => {
  it('should build defaults', () => {
    const settings = settingsBuilder().build();

    expect(settings).toEqual(DEFAULT_SETTINGS);
    expect(settings.propagationDelayMs).toBe(3000);
    expect(settings.logLevel).toBe(LogLevel.Warn);
  });

  it('should load values from the environment', () => {
    const settings = settingsBuilder()
      .fromEnv({
        BUCKETWARD_TIMEOUT_MS: '5000',
        BUCKETWARD_PROPAGATION_DELAY_MS: '0',
        BUCKETWARD_LOG_LEVEL: 'debug',
        BUCKETWARD_LOG_FORMAT: 'json',
        BUCKETWARD_EXOSCALE_API_BASE: 'http://localhost:8080/{zone}',
      })
      .build();

    expect(settings.timeoutMs).toBe(5000);
    expect(settings.propagationDelayMs).toBe(0);
    expect(settings.logLevel).toBe(LogLevel.Debug);
    expect(settings.logFormat).toBe('json');
    expect(exoscaleApiBase(settings, 'ch-gva-2')).toBe('http://localhost:8080/ch-gva-2');
  });

  it('should reject non-integer numbers', () => {
    expect(() => settingsBuilder().fromEnv({ BUCKETWARD_TIMEOUT_MS: 'soon' })).toThrow(
      "BUCKETWARD_TIMEOUT_MS must be an integer, got 'soon'"
    );
  });

  it('should reject unknown log levels', () => {
    expect(() => settingsBuilder().fromEnv({ BUCKETWARD_LOG_LEVEL: 'loud' })).toThrow(
      ConfigurationError
    );
  });

  it('should validate ranges on build', () => {
    expect(() => settingsBuilder().timeout(0).build()).toThrow(ConfigurationError);
    expect(() => settingsBuilder().propagationDelay(-1).build()).toThrow(ConfigurationError);
  });

  it('should require the zone placeholder in the Exoscale base', () => {
    expect(() => settingsBuilder().exoscaleApiBase('https://api.example.test').build()).toThrow(
      'Invalid setting exoscaleApiBase: must contain {zone}'
    );
  });

  it('should resolve the default Exoscale base per zone', () => {
    expect(exoscaleApiBase(DEFAULT_SETTINGS, 'de-fra-1')).toBe('https://api-de-fra-1.exoscale.com');
  });
});
