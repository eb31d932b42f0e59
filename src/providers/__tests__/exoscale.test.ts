/**
 * Tests for the Exoscale IAM client
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ExoscaleClient } from '../exoscale/index.js';
import type { ExoscaleCredentials } from '../../config/credentials.js';
import { SecretString } from '../../config/secret.js';
import { ProtocolError } from '../../error/index.js';
import { NoopLogger } from '../../observability/index.js';
import { HmacRequestSigner } from '../../signing/index.js';
import { MockTransport } from '../../testing/index.js';

const FIXED_NOW = 1_700_000_000_000;

const credentials: ExoscaleCredentials = {
  type: 'exoscale',
  apiKey: 'test-key',
  apiSecret: 'test-secret',
  zone: 'de-fra-1',
  bucket: 'media',
};

const operation = (referenceId?: string) => ({
  id: 'op-1',
  state: 'success',
  ...(referenceId === undefined
    ? {}
    : { reference: { id: referenceId, link: `/v2/iam-role/${referenceId}`, command: 'get-iam-role' } }),
});

describe('ExoscaleClient', () => {
  let transport: MockTransport;
  let client: ExoscaleClient;

  beforeEach(() => {
    transport = new MockTransport();
    client = new ExoscaleClient({
      credentials,
      transport,
      logger: new NoopLogger(),
      clock: () => FIXED_NOW,
    });
  });

  describe('createPrincipal', () => {
    it('should create a role and take its id from the operation reference', async () => {
      transport.reply('POST', '/v2/iam-role', 200, operation('role-x'));

      const principal = await client.createPrincipal({
        name: 'bucketward-svc-b',
        description: 'Service B',
        bucket: 'media',
        prefix: 'apps/svc-b/',
      });

      expect(principal).toEqual({ id: 'role-x', name: 'bucketward-svc-b', description: 'Service B' });
    });

    it('should send a non-editable role with the inline policy', async () => {
      transport.reply('POST', '/v2/iam-role', 200, operation('role-x'));

      await client.createPrincipal({
        name: 'bucketward-svc-b',
        description: 'Service B',
        bucket: 'media',
        prefix: 'apps/svc-b/',
      });

      expect(transport.requests[0]?.body).toEqual({
        name: 'bucketward-svc-b',
        description: 'Service B',
        editable: false,
        policy: {
          'default-service-strategy': 'deny',
          services: {
            sos: {
              type: 'rules',
              rules: [
                {
                  action: 'allow',
                  expression: "operation == 'list-objects' && resources.bucket == 'media'",
                },
                {
                  action: 'allow',
                  expression:
                    "operation in ['get-object', 'put-object', 'delete-object', 'head-object'] " +
                    "&& resources.bucket == 'media' && parameters.key.startsWith('apps/svc-b/')",
                },
              ],
            },
          },
        },
      });
    });

    it('should raise ProtocolError when the operation has no reference', async () => {
      transport.reply('POST', '/v2/iam-role', 200, operation());

      const error = await client
        .createPrincipal({ name: 'r', description: '', bucket: 'media', prefix: 'apps/r/' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toMatchObject({
        message: 'Operation op-1 (success) is missing reference to the created role',
      });
    });
  });

  it('should sign the exact request sent', async () => {
    transport.reply('POST', '/v2/iam-role', 200, operation('role-x'));

    await client.createPrincipal({
      name: 'bucketward-svc-b',
      description: '',
      bucket: 'media',
      prefix: 'apps/svc-b/',
    });

    const [request] = transport.requests;
    const expected = new HmacRequestSigner(
      'test-key',
      new SecretString('test-secret'),
      () => FIXED_NOW
    ).sign({ method: 'POST', path: '/v2/iam-role', body: request?.rawBody });
    expect(request?.headers['Authorization']).toBe(expected);
    expect(expected.startsWith('EXO2-HMAC-SHA256 credential=test-key,expires=1700000600,signature=')).toBe(
      true
    );
  });

  it('should return the role itself as its scoped policy', async () => {
    const policy = await client.createScopedPolicy({ id: 'role-x', name: 'bucketward-svc-b' });

    expect(policy).toEqual({
      id: 'role-x',
      name: 'bucketward-svc-b',
      principalId: 'role-x',
      embedded: true,
    });
    expect(transport.requests).toHaveLength(0);
  });

  describe('createApiKey', () => {
    it('should create a key bound to the role', async () => {
      transport.reply('POST', '/v2/api-key', 200, {
        name: 'bucketward-svc-b-key',
        key: 'EXOnewkey',
        secret: 'new-secret',
        'role-id': 'role-x',
      });

      const key = await client.createApiKey(
        { id: 'role-x', name: 'bucketward-svc-b' },
        { name: 'bucketward-svc-b-key', description: 'ignored' }
      );

      expect(key.accessKey).toBe('EXOnewkey');
      expect(key.secretKey.expose()).toBe('new-secret');
      expect(transport.requests[0]?.body).toEqual({
        name: 'bucketward-svc-b-key',
        'role-id': 'role-x',
      });
    });

    it('should raise ProtocolError when the secret is missing', async () => {
      transport.reply('POST', '/v2/api-key', 200, { name: 'k', key: 'EXOnewkey' });

      await expect(
        client.createApiKey({ id: 'role-x', name: 'r' }, { name: 'k', description: '' })
      ).rejects.toThrow('API key EXOnewkey was created without a secret');
    });
  });

  describe('listings', () => {
    it('should list roles', async () => {
      transport.reply('GET', '/v2/iam-role', 200, {
        'iam-roles': [
          { id: 'role-1', name: 'bucketward-svc-b', description: 'Service B' },
          { id: 'role-2' },
        ],
      });

      const principals = await client.listPrincipals();

      expect(principals).toEqual([
        { id: 'role-1', name: 'bucketward-svc-b', description: 'Service B' },
        { id: 'role-2', name: '', description: undefined },
      ]);
    });

    it('should filter API keys by role locally', async () => {
      transport.reply('GET', '/v2/api-key', 200, {
        'api-keys': [
          { name: 'a', key: 'EXO1', 'role-id': 'role-x' },
          { name: 'b', key: 'EXO2', 'role-id': 'role-y' },
          { name: 'c', key: 'EXO3' },
        ],
      });

      const keys = await client.listApiKeys('role-x');

      expect(keys).toEqual([{ accessKey: 'EXO1', name: 'a', principalId: 'role-x' }]);
      expect(transport.requests[0]?.query).toEqual({});
    });

    it('should list every key without a filter', async () => {
      transport.reply('GET', '/v2/api-key', 200, {
        'api-keys': [
          { name: 'a', key: 'EXO1', 'role-id': 'role-x' },
          { name: 'c', key: 'EXO3' },
        ],
      });

      const keys = await client.listApiKeys();

      expect(keys.map((k) => k.accessKey)).toEqual(['EXO1', 'EXO3']);
    });
  });

  it('should delete roles and keys by id', async () => {
    transport
      .reply('DELETE', '/v2/iam-role/role-x', 200, operation('role-x'))
      .reply('DELETE', '/v2/api-key/EXO1', 200, operation('EXO1'));

    await client.deleteApiKey('EXO1');
    await client.deletePrincipal('role-x');

    expect(transport.calls).toEqual(['DELETE /v2/api-key/EXO1', 'DELETE /v2/iam-role/role-x']);
  });

  it('should use the zone endpoint by default', async () => {
    transport.reply('GET', '/v2/iam-role', 200, { 'iam-roles': [] });
    const urls: string[] = [];
    const recording = {
      send: (request: Parameters<MockTransport['send']>[0]) => {
        urls.push(request.url);
        return transport.send(request);
      },
    };
    const zoned = new ExoscaleClient({ credentials, transport: recording, logger: new NoopLogger() });

    await zoned.listPrincipals();

    expect(urls).toEqual(['https://api-de-fra-1.exoscale.com/v2/iam-role']);
  });
});
