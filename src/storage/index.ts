/**
 * Object storage collaborators.
 *
 * @module storage
 */

export {
  S3ObjectStorage,
  S3BucketPolicyStore,
  SdkS3Operations,
  sdkS3Operations,
} from './s3.js';
export type { S3Operations, S3OperationsFactory } from './s3.js';
export type { BucketPolicyStore, ObjectStorage, S3Connection } from './types.js';
