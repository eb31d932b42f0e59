/**
 * Tests for the S3 storage collaborators
 */

import { describe, it, expect } from 'vitest';
import { S3BucketPolicyStore, S3ObjectStorage, type S3Operations } from '../s3.js';
import type { S3Connection } from '../types.js';
import { SecretString } from '../../config/secret.js';
import { ProtocolError, StorageError } from '../../error/index.js';
import { NoopLogger } from '../../observability/index.js';

const connection: S3Connection = {
  endpoint: 'https://s3.fr-par.scw.cloud',
  region: 'fr-par',
  accessKey: 'SCWTESTACCESSKEY',
  secretKey: new SecretString('test-secret'),
};

function namedError(name: string, message = name): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

class FakeS3 implements S3Operations {
  readonly calls: string[] = [];
  listError?: Error;
  createError?: Error;
  getError?: Error;
  putError?: Error;
  policy?: string;
  destroyed = 0;

  async listObjects(bucket: string): Promise<void> {
    this.calls.push(`list ${bucket}`);
    if (this.listError) throw this.listError;
  }

  async createBucket(bucket: string): Promise<void> {
    this.calls.push(`create ${bucket}`);
    if (this.createError) throw this.createError;
  }

  async getBucketPolicy(bucket: string): Promise<string | undefined> {
    this.calls.push(`get-policy ${bucket}`);
    if (this.getError) throw this.getError;
    return this.policy;
  }

  async putBucketPolicy(bucket: string, policy: string): Promise<void> {
    this.calls.push(`put-policy ${bucket}`);
    if (this.putError) throw this.putError;
    this.policy = policy;
  }

  destroy(): void {
    this.destroyed++;
  }
}

describe('S3ObjectStorage', () => {
  it('should not create a bucket that can be listed', async () => {
    const s3 = new FakeS3();
    const storage = new S3ObjectStorage(new NoopLogger(), () => s3);

    await storage.ensureBucket(connection, 'data');

    expect(s3.calls).toEqual(['list data']);
  });

  it('should create the bucket when listing fails', async () => {
    const s3 = new FakeS3();
    s3.listError = namedError('NoSuchBucket');
    const storage = new S3ObjectStorage(new NoopLogger(), () => s3);

    await storage.ensureBucket(connection, 'data');

    expect(s3.calls).toEqual(['list data', 'create data']);
  });

  it('should raise StorageError when creation fails', async () => {
    const s3 = new FakeS3();
    s3.listError = namedError('AccessDenied');
    s3.createError = namedError('BucketAlreadyExists', 'The requested bucket name is not available');
    const storage = new S3ObjectStorage(new NoopLogger(), () => s3);

    const error = await storage.ensureBucket(connection, 'data').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StorageError);
    expect(error).toMatchObject({
      bucket: 'data',
      message: 'Failed to create bucket data: The requested bucket name is not available',
    });
    expect(s3.destroyed).toBe(1);
  });

  it('should destroy the client once the bucket exists', async () => {
    const s3 = new FakeS3();
    const storage = new S3ObjectStorage(new NoopLogger(), () => s3);

    await storage.ensureBucket(connection, 'data');

    expect(s3.destroyed).toBe(1);
  });

  it('should pass the connection to the factory', async () => {
    const seen: S3Connection[] = [];
    const storage = new S3ObjectStorage(new NoopLogger(), (c) => {
      seen.push(c);
      return new FakeS3();
    });

    await storage.ensureBucket(connection, 'data');

    expect(seen).toEqual([connection]);
  });
});

describe('S3BucketPolicyStore', () => {
  it('should read undefined when the bucket has no policy', async () => {
    const s3 = new FakeS3();
    s3.getError = namedError('NoSuchBucketPolicy');
    const store = new S3BucketPolicyStore(connection, () => s3);

    await expect(store.read('data')).resolves.toBeUndefined();
  });

  it('should read undefined for an empty policy text', async () => {
    const s3 = new FakeS3();
    s3.policy = '';
    const store = new S3BucketPolicyStore(connection, () => s3);

    await expect(store.read('data')).resolves.toBeUndefined();
  });

  it('should parse the stored policy', async () => {
    const s3 = new FakeS3();
    s3.policy = JSON.stringify({
      Version: '2023-04-17',
      Statement: [
        { Sid: 'app-a', Effect: 'Allow', Principal: '*', Action: 's3:GetObject', Resource: 'data/*' },
      ],
    });
    const store = new S3BucketPolicyStore(connection, () => s3);

    const doc = await store.read('data');

    expect(doc?.Statement.map((s) => s.Sid)).toEqual(['app-a']);
  });

  it('should raise ProtocolError for an unparseable policy', async () => {
    const s3 = new FakeS3();
    s3.policy = 'not json';
    const store = new S3BucketPolicyStore(connection, () => s3);

    await expect(store.read('data')).rejects.toBeInstanceOf(ProtocolError);
  });

  it('should wrap other read failures', async () => {
    const s3 = new FakeS3();
    s3.getError = namedError('AccessDenied', 'Access Denied');
    const store = new S3BucketPolicyStore(connection, () => s3);

    await expect(store.read('data')).rejects.toThrow(
      'Failed to read bucket policy of data: Access Denied'
    );
    expect(s3.destroyed).toBe(1);
  });

  it('should destroy the client after each read and write', async () => {
    const s3 = new FakeS3();
    const store = new S3BucketPolicyStore(connection, () => s3);

    await store.write('data', { Version: '2023-04-17', Statement: [] });
    await store.read('data');

    expect(s3.calls).toEqual(['put-policy data', 'get-policy data']);
    expect(s3.destroyed).toBe(2);
  });

  it('should write the document as JSON', async () => {
    const s3 = new FakeS3();
    const store = new S3BucketPolicyStore(connection, () => s3);
    const doc = { Version: '2023-04-17', Statement: [] };

    await store.write('data', doc);

    expect(s3.policy).toBe('{"Version":"2023-04-17","Statement":[]}');
  });

  it('should wrap write failures', async () => {
    const s3 = new FakeS3();
    s3.putError = namedError('MalformedPolicy', 'Policy has invalid resource');
    const store = new S3BucketPolicyStore(connection, () => s3);

    const error = await store
      .write('data', { Version: '2023-04-17', Statement: [] })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StorageError);
    expect(error).toMatchObject({
      code: 'STORAGE',
      message: 'Failed to write bucket policy of data: Policy has invalid resource',
    });
  });
});
