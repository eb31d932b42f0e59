/**
 * S3 Storage Collaborators
 *
 * `ensureBucket` and bucket policy transport over the S3 API of either
 * provider, through `@aws-sdk/client-s3` with path-style addressing.
 *
 * @module storage/s3
 */

import {
  CreateBucketCommand,
  GetBucketPolicyCommand,
  ListObjectsV2Command,
  PutBucketPolicyCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { StorageError, errorMessage } from '../error/index.js';
import type { Logger } from '../observability/index.js';
import { parseBucketPolicy } from '../policy/merge.js';
import type { BucketPolicyDocument } from '../policy/types.js';
import type { BucketPolicyStore, ObjectStorage, S3Connection } from './types.js';

/**
 * The S3 calls the collaborators make. `getBucketPolicy` resolves to
 * undefined when the response carries no policy text; SDK errors propagate
 * unchanged. `destroy` releases the underlying connections.
 */
export interface S3Operations {
  listObjects(bucket: string): Promise<void>;
  createBucket(bucket: string): Promise<void>;
  getBucketPolicy(bucket: string): Promise<string | undefined>;
  putBucketPolicy(bucket: string, policy: string): Promise<void>;
  destroy(): void;
}

export type S3OperationsFactory = (connection: S3Connection) => S3Operations;

/**
 * Error names S3 services return for a bucket without a policy.
 */
const NO_POLICY_ERRORS = new Set(['NoSuchBucketPolicy', 'NoSuchPolicy']);

/**
 * {@link S3Operations} over an `S3Client`.
 */
export class SdkS3Operations implements S3Operations {
  private readonly client: S3Client;

  constructor(connection: S3Connection) {
    this.client = new S3Client({
      endpoint: connection.endpoint,
      region: connection.region,
      forcePathStyle: true,
      credentials: {
        accessKeyId: connection.accessKey,
        secretAccessKey: connection.secretKey.expose(),
      },
    });
  }

  async listObjects(bucket: string): Promise<void> {
    await this.client.send(new ListObjectsV2Command({ Bucket: bucket, MaxKeys: 1 }));
  }

  async createBucket(bucket: string): Promise<void> {
    await this.client.send(new CreateBucketCommand({ Bucket: bucket }));
  }

  async getBucketPolicy(bucket: string): Promise<string | undefined> {
    const output = await this.client.send(new GetBucketPolicyCommand({ Bucket: bucket }));
    return output.Policy;
  }

  async putBucketPolicy(bucket: string, policy: string): Promise<void> {
    await this.client.send(new PutBucketPolicyCommand({ Bucket: bucket, Policy: policy }));
  }

  destroy(): void {
    this.client.destroy();
  }
}

/**
 * Run `task` against operations for `connection`, destroying them afterwards.
 */
async function withOperations<T>(
  factory: S3OperationsFactory,
  connection: S3Connection,
  task: (s3: S3Operations) => Promise<T>
): Promise<T> {
  const s3 = factory(connection);
  try {
    return await task(s3);
  } finally {
    s3.destroy();
  }
}

export const sdkS3Operations: S3OperationsFactory = (connection) => new SdkS3Operations(connection);

export class S3ObjectStorage implements ObjectStorage {
  constructor(
    private readonly logger: Logger,
    private readonly factory: S3OperationsFactory = sdkS3Operations
  ) {}

  async ensureBucket(connection: S3Connection, bucket: string): Promise<void> {
    await withOperations(this.factory, connection, async (s3) => {
      try {
        await s3.listObjects(bucket);
        this.logger.debug('Bucket exists', { bucket, endpoint: connection.endpoint });
        return;
      } catch (error) {
        this.logger.info('Bucket not listable, creating it', {
          bucket,
          endpoint: connection.endpoint,
          reason: errorMessage(error),
        });
      }

      try {
        await s3.createBucket(bucket);
      } catch (error) {
        throw new StorageError(`Failed to create bucket ${bucket}: ${errorMessage(error)}`, bucket, {
          cause: error,
        });
      }
    });
  }
}

/**
 * Bucket policy store bound to one S3 connection.
 */
export class S3BucketPolicyStore implements BucketPolicyStore {
  constructor(
    private readonly connection: S3Connection,
    private readonly factory: S3OperationsFactory = sdkS3Operations
  ) {}

  async read(bucket: string): Promise<BucketPolicyDocument | undefined> {
    let text: string | undefined;
    try {
      text = await withOperations(this.factory, this.connection, (s3) => s3.getBucketPolicy(bucket));
    } catch (error) {
      if (error instanceof Error && NO_POLICY_ERRORS.has(error.name)) {
        return undefined;
      }
      throw new StorageError(
        `Failed to read bucket policy of ${bucket}: ${errorMessage(error)}`,
        bucket,
        { cause: error }
      );
    }

    if (text === undefined || text.trim() === '') {
      return undefined;
    }
    return parseBucketPolicy(text);
  }

  async write(bucket: string, document: BucketPolicyDocument): Promise<void> {
    try {
      const policy = JSON.stringify(document);
      await withOperations(this.factory, this.connection, (s3) => s3.putBucketPolicy(bucket, policy));
    } catch (error) {
      throw new StorageError(
        `Failed to write bucket policy of ${bucket}: ${errorMessage(error)}`,
        bucket,
        { cause: error }
      );
    }
  }
}
