/**
 * Tests for the native worker pool.
 */

import { describe, expect, test } from 'vitest';
import { NativeException, NativeRuntimeError } from '../../../src/native/exceptions.js';
import { NativeWorkerPool } from '../../../src/native/worker-pool.js';
import { currentThread } from '../../../src/threading/thread.js';
import { flushLanes, settleNative } from '../../support/common.js';

describe('NativeWorkerPool', () => {
  test('should default to four workers', () => {
    expect(new NativeWorkerPool().size).toBe(4);
  });

  test('should reject an invalid size', () => {
    expect(() => new NativeWorkerPool({ size: 0 })).toThrow(RangeError);
    expect(() => new NativeWorkerPool({ size: 1.5 })).toThrow(
      'Worker pool size must be a positive integer, got 1.5'
    );
  });

  test('should run work off the host lane, round-robin', async () => {
    const pool = new NativeWorkerPool({ size: 2, namePrefix: 'io' });
    const lane = (): string => currentThread().name;

    const names = await Promise.all([
      settleNative(pool.submit(lane)),
      settleNative(pool.submit(lane)),
      settleNative(pool.submit(lane)),
    ]);

    expect(names).toEqual(['io-0', 'io-1', 'io-0']);
  });

  test('should not run work synchronously', async () => {
    const pool = new NativeWorkerPool({ size: 1 });
    const future = pool.submit(() => 42);

    expect(future.isReady()).toBe(false);
    await flushLanes();
    expect(future.get()).toBe(42);
  });

  test('should fail the future when work throws', async () => {
    const pool = new NativeWorkerPool({ size: 1 });
    const error = new NativeException('checksum mismatch', 'io_error');

    await expect(
      settleNative(
        pool.submit(() => {
          throw error;
        })
      )
    ).rejects.toBe(error);
  });

  test('should expose worker lanes by index', () => {
    const pool = new NativeWorkerPool({ size: 2 });
    expect(pool.worker(1).name).toBe('native-worker-1');
    expect(() => pool.worker(2)).toThrow('No worker at index 2 (pool size 2)');
  });

  test('should refuse new work after shutdown', () => {
    const pool = new NativeWorkerPool({ size: 1 });
    pool.shutdown();
    pool.shutdown();

    expect(pool.isShutdown()).toBe(true);
    const future = pool.submit(() => 1);
    expect(future.isReady()).toBe(true);
    expect(() => future.get()).toThrow(NativeRuntimeError);
  });

  test('should still run work queued before shutdown', async () => {
    const pool = new NativeWorkerPool({ size: 1 });
    const future = pool.submit(() => 'queued');
    pool.shutdown();

    expect(await settleNative(future)).toBe('queued');
  });
});
