/**
 * Thread marshalling for host-touching work.
 *
 * The host runtime may only be touched from its designated lane. Anything
 * that resolves a host promise goes through ThreadMarshaller.dispatch(),
 * which either posts the task to the host lane or, in a single-threaded
 * deployment, runs it on the calling lane.
 */

import { logTrace } from '../logging/index.js';
import { currentThread, type LogicalThread, MAIN_THREAD, runTask, type ThreadTask } from './thread.js';

/**
 * - `main-thread`: post to the host lane (native work may run elsewhere)
 * - `inline`: run on the calling lane (everything shares one lane); no
 *   affinity assertion is made
 */
export type ThreadingMode = 'inline' | 'main-thread';

export interface ThreadMarshallerStats {
  mode: ThreadingMode;
  dispatched: number;
  /** Dispatches that came from a lane other than the host lane */
  crossThread: number;
}

export class ThreadMarshaller {
  private dispatchedCount = 0;
  private crossThreadCount = 0;

  constructor(
    readonly mode: ThreadingMode,
    readonly hostThread: LogicalThread = MAIN_THREAD
  ) {}

  /**
   * Run a task on the host lane.
   */
  dispatch(task: ThreadTask): void {
    const origin = currentThread();
    this.dispatchedCount++;
    if (origin !== this.hostThread) {
      this.crossThreadCount++;
    }

    logTrace('Dispatching host task', {
      component: 'thread-marshaller',
      mode: this.mode,
      thread: origin.name,
    });

    if (this.mode === 'inline') {
      runTask(origin, task);
      return;
    }
    this.hostThread.post(task);
  }

  /**
   * Whether the calling code may touch host objects directly.
   *
   * Always true in `inline` mode: that mode switches off the host affinity
   * assertion, and settlement runs on whichever lane completed the future.
   */
  isHostThread(): boolean {
    return this.mode === 'inline' || this.hostThread.isCurrent();
  }

  stats(): ThreadMarshallerStats {
    return {
      mode: this.mode,
      dispatched: this.dispatchedCount,
      crossThread: this.crossThreadCount,
    };
  }
}

/**
 * Thrown when host objects are touched from a lane other than the host lane.
 */
export class ThreadAffinityError extends Error {
  readonly operation: string;
  readonly thread: string;

  constructor(operation: string, thread: string) {
    super(`Host operation "${operation}" called from thread "${thread}"`);
    this.name = 'ThreadAffinityError';
    this.operation = operation;
    this.thread = thread;
  }
}
