/**
 * Policy construction, merge and application.
 *
 * @module policy
 */

export {
  buildScalewayPolicyRules,
  buildExoscaleRolePolicy,
  buildBucketPolicyStatement,
  statementSid,
  SCALEWAY_PERMISSION_SETS,
  EXOSCALE_OBJECT_OPERATIONS,
  BUCKET_POLICY_ACTIONS,
  STATEMENT_SID_PREFIX,
} from './builder.js';
export type { BucketStatementInput } from './builder.js';
export {
  mergeStatement,
  parseBucketPolicy,
  emptyBucketPolicy,
  BUCKET_POLICY_VERSION,
} from './merge.js';
export { BucketPolicyApplier } from './applier.js';
export type { BucketPolicyApplierOptions } from './applier.js';
export { KeyedMutex, sharedPolicyLocks } from './mutex.js';
export type {
  BucketPolicyDocument,
  BucketPolicyStatement,
  ExoscalePolicyRule,
  ExoscaleRolePolicy,
  IdentifiedStatement,
  ScalewayPolicyRule,
} from './types.js';
