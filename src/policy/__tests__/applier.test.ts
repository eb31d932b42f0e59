/**
 * Tests for serialized bucket policy updates
 */

import { describe, it, expect } from 'vitest';
import { BucketPolicyApplier } from '../applier.js';
import { buildBucketPolicyStatement } from '../builder.js';
import { KeyedMutex } from '../mutex.js';
import { InMemoryBucketPolicyStore } from '../../testing/index.js';
import { InMemoryLogger, LogLevel } from '../../observability/index.js';

function statement(appName: string) {
  return buildBucketPolicyStatement({
    appName,
    principalId: `id-${appName}`,
    bucket: 'data',
    prefix: `apps/${appName}`,
  });
}

describe('BucketPolicyApplier', () => {
  it('should write the merged document', async () => {
    const store = new InMemoryBucketPolicyStore();
    const applier = new BucketPolicyApplier(store, new InMemoryLogger());

    const written = await applier.apply('data', statement('svc-a'));

    expect(store.get('data')).toEqual(written);
    expect(written.Statement.map((s) => s.Sid)).toEqual(['app-svc-a']);
  });

  it('should keep existing statements', async () => {
    const store = new InMemoryBucketPolicyStore();
    store.set('data', { Version: '2023-04-17', Statement: [statement('old')] });
    const applier = new BucketPolicyApplier(store, new InMemoryLogger());

    await applier.apply('data', statement('new'));

    expect(store.get('data')?.Statement.map((s) => s.Sid)).toEqual(['app-old', 'app-new']);
  });

  it('should not lose statements applied concurrently to one bucket', async () => {
    const store = new InMemoryBucketPolicyStore({ readDelayMs: 5 });
    const applier = new BucketPolicyApplier(store, new InMemoryLogger());

    await Promise.all(['a', 'b', 'c'].map((name) => applier.apply('data', statement(name))));

    expect(store.get('data')?.Statement.map((s) => s.Sid)).toEqual(['app-a', 'app-b', 'app-c']);
    expect(store.writes).toBe(3);
  });

  it('should serialize appliers that share a lock set', async () => {
    const store = new InMemoryBucketPolicyStore({ readDelayMs: 5 });
    const locks = new KeyedMutex();
    const first = new BucketPolicyApplier(store, new InMemoryLogger(), { locks, scope: 'https://s3.test' });
    const second = new BucketPolicyApplier(store, new InMemoryLogger(), { locks, scope: 'https://s3.test' });

    await Promise.all([first.apply('data', statement('a')), second.apply('data', statement('b'))]);

    expect(store.get('data')?.Statement.map((s) => s.Sid)).toEqual(['app-a', 'app-b']);
    expect(locks.size).toBe(0);
  });

  it('should log the update', async () => {
    const logger = new InMemoryLogger();
    const applier = new BucketPolicyApplier(new InMemoryBucketPolicyStore(), logger);

    await applier.apply('data', statement('svc-a'));

    const [record] = logger.getLogsByLevel(LogLevel.Info);
    expect(record?.message).toBe('Bucket policy updated');
    expect(record?.context).toMatchObject({ bucket: 'data', sid: 'app-svc-a', replaced: false });
  });
});

describe('KeyedMutex', () => {
  it('should run tasks for one key one at a time, in order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    const task = (name: string) => async () => {
      events.push(`start ${name}`);
      await new Promise((resolve) => setTimeout(resolve, 1));
      events.push(`end ${name}`);
      return name;
    };

    const results = await Promise.all([
      mutex.runExclusive('k', task('1')),
      mutex.runExclusive('k', task('2')),
    ]);

    expect(results).toEqual(['1', '2']);
    expect(events).toEqual(['start 1', 'end 1', 'start 2', 'end 2']);
  });

  it('should not block distinct keys', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = mutex.runExclusive('a', async () => {
      events.push('a started');
      await gate;
      events.push('a done');
    });
    await mutex.runExclusive('b', async () => {
      events.push('b ran');
    });
    release();
    await first;

    expect(events).toEqual(['a started', 'b ran', 'a done']);
  });

  it('should release the lock when the task fails', async () => {
    const mutex = new KeyedMutex();

    await expect(
      mutex.runExclusive('k', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive('k', async () => 'ok')).resolves.toBe('ok');
    expect(mutex.size).toBe(0);
  });
});
