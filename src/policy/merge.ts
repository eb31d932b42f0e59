/**
 * Bucket Policy Merger
 *
 * Replace-by-Sid merge of one statement into a shared bucket policy. The
 * updated statement always ends up last; statement order has no meaning in a
 * bucket policy, only Sid uniqueness does.
 *
 * @module policy/merge
 */

import { z } from 'zod';
import { ProtocolError, errorMessage } from '../error/index.js';
import type { BucketPolicyDocument, IdentifiedStatement } from './types.js';

/**
 * Version marker of a freshly created document.
 */
export const BUCKET_POLICY_VERSION = '2023-04-17';

/**
 * Empty document used when a bucket has no policy yet.
 */
export function emptyBucketPolicy(): BucketPolicyDocument {
  return { Version: BUCKET_POLICY_VERSION, Statement: [] };
}

/**
 * Return a new document in which `statement` replaces every statement with
 * the same Sid, or is appended when there was none. `existing` is not
 * modified.
 */
export function mergeStatement(
  existing: BucketPolicyDocument | undefined,
  statement: IdentifiedStatement
): BucketPolicyDocument {
  const base = existing ?? emptyBucketPolicy();
  return {
    ...base,
    Statement: [...base.Statement.filter((s) => s.Sid !== statement.Sid), statement],
  };
}

const statementSchema = z.object({ Sid: z.string().optional() }).passthrough();

const documentSchema = z
  .object({
    Version: z.string().default(BUCKET_POLICY_VERSION),
    Statement: z.preprocess(
      (value) => (value === undefined ? [] : Array.isArray(value) ? value : [value]),
      z.array(statementSchema)
    ),
  })
  .passthrough();

/**
 * Parse and validate a bucket policy read from storage. A single statement
 * object is normalised to a one-element list and a missing `Statement` to
 * an empty one.
 *
 * @throws {ProtocolError} if the text is not a policy document
 */
export function parseBucketPolicy(text: string): BucketPolicyDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ProtocolError(`Bucket policy is not valid JSON: ${errorMessage(error)}`, { cause: error });
  }

  const result = documentSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ProtocolError(
      `Bucket policy has an unexpected shape at '${issue?.path.join('.') ?? ''}': ${issue?.message ?? 'invalid'}`
    );
  }
  return result.data;
}
