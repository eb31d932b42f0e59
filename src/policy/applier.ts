/**
 * Bucket Policy Applier
 *
 * @module policy/applier
 */

import type { Logger } from '../observability/index.js';
import type { BucketPolicyStore } from '../storage/types.js';
import { mergeStatement } from './merge.js';
import { KeyedMutex } from './mutex.js';
import type { BucketPolicyDocument, IdentifiedStatement } from './types.js';

export interface BucketPolicyApplierOptions {
  /**
   * Locks shared with other appliers writing to the same buckets. Defaults to
   * a lock set private to this applier.
   */
  locks?: KeyedMutex;
  /** Lock key prefix, typically the storage endpoint. */
  scope?: string;
}

/**
 * Read-modify-write of shared bucket policies. Updates of the same bucket are
 * serialized across every applier holding the same lock set.
 */
export class BucketPolicyApplier {
  private readonly locks: KeyedMutex;
  private readonly scope: string;

  constructor(
    private readonly store: BucketPolicyStore,
    private readonly logger: Logger,
    options: BucketPolicyApplierOptions = {}
  ) {
    this.locks = options.locks ?? new KeyedMutex();
    this.scope = options.scope ?? '';
  }

  /**
   * Merge `statement` into the policy of `bucket` and write it back.
   *
   * @returns the document that was written
   */
  async apply(bucket: string, statement: IdentifiedStatement): Promise<BucketPolicyDocument> {
    return this.locks.runExclusive(`${this.scope}/${bucket}`, async () => {
      const existing = await this.store.read(bucket);
      const merged = mergeStatement(existing, statement);
      await this.store.write(bucket, merged);
      this.logger.info('Bucket policy updated', {
        bucket,
        sid: statement.Sid,
        statements: merged.Statement.length,
        replaced: existing?.Statement.some((s) => s.Sid === statement.Sid) ?? false,
      });
      return merged;
    });
  }
}
