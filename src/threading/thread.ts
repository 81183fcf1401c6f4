/**
 * Logical threads.
 *
 * A LogicalThread is an executor lane with its own FIFO task queue. Queued
 * tasks drain on a later macrotask with currentThread() reporting the lane,
 * which is what lets the bridge assert and observe thread affinity.
 * MAIN_THREAD is the host runtime's designated lane and the ambient one
 * whenever no other lane is running.
 */

import { errorMessage, logError } from '../logging/index.js';

export type ThreadTask = () => void;

let activeThread: LogicalThread | null = null;

/**
 * The lane the calling code runs on.
 */
export function currentThread(): LogicalThread {
  return activeThread ?? MAIN_THREAD;
}

export class LogicalThread {
  private static nextId = 1;

  readonly id: number;
  private readonly queue: ThreadTask[] = [];
  private drainScheduled = false;
  private executedCount = 0;

  constructor(readonly name: string) {
    this.id = LogicalThread.nextId++;
  }

  /**
   * Whether the calling code runs on this lane.
   */
  isCurrent(): boolean {
    return currentThread() === this;
  }

  /**
   * Queue a task to run on this lane.
   */
  post(task: ThreadTask): void {
    this.queue.push(task);
    if (!this.drainScheduled) {
      this.drainScheduled = true;
      setImmediate(() => this.drain());
    }
  }

  /**
   * Run a function synchronously with this lane as the current thread.
   */
  runNow<T>(fn: () => T): T {
    const previous = activeThread;
    activeThread = this;
    try {
      return fn();
    } finally {
      activeThread = previous;
    }
  }

  /**
   * Number of tasks waiting in the queue.
   */
  get pendingTasks(): number {
    return this.queue.length;
  }

  /**
   * Number of queued tasks this lane has run.
   */
  get executedTasks(): number {
    return this.executedCount;
  }

  // Tasks posted while draining run on the next turn.
  private drain(): void {
    this.drainScheduled = false;
    const batch = this.queue.splice(0, this.queue.length);

    for (const task of batch) {
      this.executedCount++;
      this.runNow(() => runTask(this, task));
    }
  }
}

/**
 * Run a task, logging instead of rethrowing: a failing task must not take
 * the event loop down with it.
 */
export function runTask(thread: LogicalThread, task: ThreadTask): void {
  try {
    task();
  } catch (error) {
    logError('Task failed on logical thread', {
      component: 'threading',
      thread: thread.name,
      error_message: errorMessage(error),
    });
  }
}

export const MAIN_THREAD = new LogicalThread('main');
