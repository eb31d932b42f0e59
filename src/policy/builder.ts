/**
 * Policy Builder
 *
 * Pure constructors of least-privilege policy documents. Bucket and prefix
 * values are substituted verbatim: callers pass names that already passed
 * validation (see `config/credentials` and `orchestrator/naming`), since the
 * Exoscale expressions are not escaped against quote characters.
 *
 * @module policy/builder
 */

import type {
  ExoscaleRolePolicy,
  IdentifiedStatement,
  ScalewayPolicyRule,
} from './types.js';

/**
 * Object-level permission sets granted to Scaleway applications. Bucket
 * management and `ObjectStorageFullAccess` are never granted.
 */
export const SCALEWAY_PERMISSION_SETS = [
  'ObjectStorageObjectsRead',
  'ObjectStorageObjectsWrite',
  'ObjectStorageObjectsDelete',
] as const;

/**
 * Object operations allowed under an application's prefix on Exoscale SOS.
 */
export const EXOSCALE_OBJECT_OPERATIONS = [
  'get-object',
  'put-object',
  'delete-object',
  'head-object',
] as const;

/**
 * S3 actions granted by the bucket policy statement.
 */
export const BUCKET_POLICY_ACTIONS = ['s3:GetObject', 's3:PutObject', 's3:DeleteObject'] as const;

/**
 * Prefix of bucket policy statement identifiers.
 */
export const STATEMENT_SID_PREFIX = 'app-';

/**
 * Scaleway policy rules for one project.
 */
export function buildScalewayPolicyRules(projectId: string): ScalewayPolicyRule[] {
  return [
    {
      project_ids: [projectId],
      permission_set_names: [...SCALEWAY_PERMISSION_SETS],
    },
  ];
}

/**
 * Exoscale inline role policy: deny by default, allow listing the bucket and
 * object operations on keys starting with `prefix`.
 */
export function buildExoscaleRolePolicy(bucket: string, prefix: string): ExoscaleRolePolicy {
  const operations = EXOSCALE_OBJECT_OPERATIONS.map((op) => `'${op}'`).join(', ');
  return {
    'default-service-strategy': 'deny',
    services: {
      sos: {
        type: 'rules',
        rules: [
          {
            action: 'allow',
            expression: `operation == 'list-objects' && resources.bucket == '${bucket}'`,
          },
          {
            action: 'allow',
            expression:
              `operation in [${operations}] && resources.bucket == '${bucket}' ` +
              `&& parameters.key.startsWith('${prefix}')`,
          },
        ],
      },
    },
  };
}

/**
 * Statement identifier for an application.
 */
export function statementSid(appName: string): string {
  return `${STATEMENT_SID_PREFIX}${appName}`;
}

export interface BucketStatementInput {
  appName: string;
  /** Scaleway application id. */
  principalId: string;
  bucket: string;
  /** Prefix without trailing slash, e.g. `apps/svc-a`. */
  prefix: string;
}

/**
 * Bucket policy statement granting one Scaleway application object access
 * under its prefix.
 */
export function buildBucketPolicyStatement(input: BucketStatementInput): IdentifiedStatement {
  return {
    Sid: statementSid(input.appName),
    Effect: 'Allow',
    Principal: { SCW: `application_id:${input.principalId}` },
    Action: [...BUCKET_POLICY_ACTIONS],
    Resource: `${input.bucket}/${input.prefix}/*`,
  };
}
