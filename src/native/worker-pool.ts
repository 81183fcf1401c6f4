/**
 * Native worker pool.
 *
 * Runs native work on worker lanes, off the host lane, and hands back a
 * NativeFuture that completes on the worker that ran the work. This is the
 * situation the Native→Host bridge exists for: its continuation fires on a
 * worker and must not touch host objects there.
 */

import { logDebug } from '../logging/index.js';
import { LogicalThread } from '../threading/thread.js';
import { NativeRuntimeError, toNativeException } from './exceptions.js';
import { type NativeFuture, NativePromise } from './future.js';

export interface NativeWorkerPoolConfig {
  /** Number of worker lanes (default: 4) */
  size?: number;

  /** Lane name prefix (default: "native-worker") */
  namePrefix?: string;
}

export class NativeWorkerPool {
  private readonly workers: LogicalThread[];
  private nextWorker = 0;
  private closed = false;

  constructor(config: NativeWorkerPoolConfig = {}) {
    const size = config.size ?? 4;
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
    }
    const prefix = config.namePrefix ?? 'native-worker';
    this.workers = Array.from({ length: size }, (_, i) => new LogicalThread(`${prefix}-${i}`));
  }

  get size(): number {
    return this.workers.length;
  }

  /**
   * Worker lane by index.
   */
  worker(index: number): LogicalThread {
    const worker = this.workers[index];
    if (!worker) {
      throw new RangeError(`No worker at index ${index} (pool size ${this.workers.length})`);
    }
    return worker;
  }

  /**
   * Run native work on the next worker lane.
   *
   * A throw inside `work` fails the returned future; it never escapes.
   */
  submit<T>(work: () => T): NativeFuture<T> {
    if (this.closed) {
      return NativePromise.reject<T>(new NativeRuntimeError('Native worker pool is shut down'));
    }

    const worker = this.pickWorker();
    const promise = new NativePromise<T>();
    const future = promise.getFuture();

    worker.post(() => {
      let value: T;
      try {
        value = work();
      } catch (error) {
        promise.setException(toNativeException(error));
        return;
      }
      promise.setValue(value);
    });

    return future;
  }

  /**
   * Stop accepting work. Already queued work still runs.
   */
  shutdown(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    logDebug('Native worker pool shut down', {
      component: 'worker-pool',
      workers: this.workers.length,
    });
  }

  isShutdown(): boolean {
    return this.closed;
  }

  private pickWorker(): LogicalThread {
    const worker = this.worker(this.nextWorker);
    this.nextWorker = (this.nextWorker + 1) % this.workers.length;
    return worker;
  }
}
