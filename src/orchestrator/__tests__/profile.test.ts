/**
 * Tests for provider profile resolution and app naming
 */

import { describe, it, expect } from 'vitest';
import { resolveProfile } from '../profile.js';
import { validateAppName } from '../naming.js';
import { settingsBuilder } from '../../config/settings.js';
import { ConfigurationError } from '../../error/index.js';
import { NoopLogger } from '../../observability/index.js';
import { ExoscaleClient } from '../../providers/exoscale/index.js';
import { ScalewayClient } from '../../providers/scaleway/index.js';
import { MockTransport } from '../../testing/index.js';

const deps = {
  settings: settingsBuilder().propagationDelay(1500).build(),
  transport: new MockTransport(),
  logger: new NoopLogger(),
};

describe('resolveProfile', () => {
  it('should resolve the static-key profile', () => {
    const profile = resolveProfile(
      {
        type: 'scaleway',
        accessKey: 'SCWTESTACCESSKEY',
        secretKey: 'test-secret',
        organizationId: 'org-1',
        projectId: 'proj-1',
        region: 'nl-ams',
        bucket: 'data',
      },
      deps
    );

    expect(profile.kind).toBe('scaleway');
    expect(profile.client).toBeInstanceOf(ScalewayClient);
    expect(profile.endpoint).toBe('https://s3.nl-ams.scw.cloud');
    expect(profile.location).toEqual({ region: 'nl-ams' });
    expect(profile.connection.secretKey.expose()).toBe('test-secret');
    expect(profile.propagationDelayMs).toBe(0);
    expect(profile.bucketPolicyStore).toBeDefined();
    expect(profile.cascadesKeyDeletion).toBe(true);
    expect(profile.naming.prefix('svc-a')).toBe('apps/svc-a');
    expect(profile.naming.principal('svc-a')).toBe('svc-a');
    expect(profile.naming.scopedPolicy('svc-a')).toBe('svc-a-policy');
    expect(profile.naming.apiKeyDescription('svc-a')).toBe('API key for svc-a');
  });

  it('should resolve the signed-request profile', () => {
    const profile = resolveProfile(
      {
        type: 'exoscale',
        apiKey: 'test-key',
        apiSecret: 'test-secret',
        zone: 'ch-gva-2',
        bucket: 'media',
      },
      deps
    );

    expect(profile.kind).toBe('exoscale');
    expect(profile.client).toBeInstanceOf(ExoscaleClient);
    expect(profile.endpoint).toBe('https://sos-ch-gva-2.exo.io');
    expect(profile.location).toEqual({ zone: 'ch-gva-2' });
    expect(profile.connection.region).toBe('ch-gva-2');
    expect(profile.propagationDelayMs).toBe(1500);
    expect(profile.bucketPolicyStore).toBeUndefined();
    expect(profile.cascadesKeyDeletion).toBe(false);
    expect(profile.naming.prefix('svc-b')).toBe('apps/svc-b/');
    expect(profile.naming.principal('svc-b')).toBe('bucketward-svc-b');
    expect(profile.naming.apiKeyName('svc-b')).toBe('bucketward-svc-b-key');
    expect(profile.naming.appNameOf('bucketward-svc-b')).toBe('svc-b');
    expect(profile.naming.appNameOf('other')).toBeUndefined();
  });
});

describe('validateAppName', () => {
  it.each(['a', 'svc-a', '0day', 'a'.repeat(63)])('should accept %s', (name) => {
    expect(validateAppName(name)).toBe(name);
  });

  it.each(['', '-svc', 'Svc', 'svc_a', "svc'a", 'svc/a', 'a'.repeat(64)])(
    'should reject %j',
    (name) => {
      expect(() => validateAppName(name)).toThrow(ConfigurationError);
    }
  );
});
