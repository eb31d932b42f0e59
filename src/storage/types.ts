/**
 * Object Storage Types
 *
 * @module storage/types
 */

import type { SecretString } from '../config/secret.js';
import type { BucketPolicyDocument } from '../policy/types.js';

/**
 * S3-compatible endpoint and the key pair used against it.
 */
export interface S3Connection {
  /** e.g. `https://s3.fr-par.scw.cloud` */
  endpoint: string;
  /** Region (Scaleway) or zone (Exoscale). */
  region: string;
  accessKey: string;
  secretKey: SecretString;
}

/**
 * Bucket management needed before provisioning.
 */
export interface ObjectStorage {
  /**
   * Make sure `bucket` exists: no-op when it can be listed, created otherwise.
   *
   * @throws {StorageError} if the bucket can neither be listed nor created
   */
  ensureBucket(connection: S3Connection, bucket: string): Promise<void>;
}

/**
 * Transport of a bucket's policy document.
 */
export interface BucketPolicyStore {
  /**
   * @returns the current document, or undefined when the bucket has none
   * @throws {ProtocolError} if the stored document cannot be parsed
   * @throws {StorageError} on any other failure
   */
  read(bucket: string): Promise<BucketPolicyDocument | undefined>;

  /**
   * @throws {StorageError}
   */
  write(bucket: string, document: BucketPolicyDocument): Promise<void>;
}
