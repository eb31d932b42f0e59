/**
 * Policy Document Types
 *
 * @module policy/types
 */

/**
 * Rule of a Scaleway IAM policy.
 */
export interface ScalewayPolicyRule {
  project_ids: string[];
  permission_set_names: string[];
}

/**
 * Rule of an Exoscale role policy. `expression` is evaluated server-side.
 */
export interface ExoscalePolicyRule {
  action: 'allow' | 'deny';
  expression: string;
}

/**
 * Inline policy carried by an Exoscale IAM role.
 */
export interface ExoscaleRolePolicy {
  'default-service-strategy': 'allow' | 'deny';
  services: {
    sos: {
      type: 'rules';
      rules: ExoscalePolicyRule[];
    };
  };
}

/**
 * Statement of an S3 bucket policy as read from storage. Only `Sid`, the
 * merge key, is interpreted; `NotAction`, `NotResource`, `NotPrincipal`,
 * `Condition` and the rest are carried as they were read.
 */
export interface BucketPolicyStatement {
  Sid?: string;
  [field: string]: unknown;
}

/**
 * Statement written by this package, identified by its Sid.
 */
export interface IdentifiedStatement extends BucketPolicyStatement {
  Sid: string;
  Effect: 'Allow' | 'Deny';
  Principal: Record<string, string>;
  Action: string[];
  Resource: string;
}

/**
 * S3 bucket policy. Fields other than `Version` and `Statement` are kept as
 * they were read.
 */
export interface BucketPolicyDocument {
  Version: string;
  Statement: BucketPolicyStatement[];
  [field: string]: unknown;
}
