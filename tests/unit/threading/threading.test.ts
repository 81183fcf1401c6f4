/**
 * Tests for logical lanes and the thread marshaller.
 */

import { describe, expect, test } from 'vitest';
import { ThreadAffinityError, ThreadMarshaller } from '../../../src/threading/marshaller.js';
import { currentThread, LogicalThread, MAIN_THREAD } from '../../../src/threading/thread.js';
import { captureLogs, flushLanes } from '../../support/common.js';

// =============================================================================
// LogicalThread
// =============================================================================

describe('LogicalThread', () => {
  test('should report the main lane outside any task', () => {
    expect(currentThread()).toBe(MAIN_THREAD);
    expect(MAIN_THREAD.isCurrent()).toBe(true);
  });

  test('should run posted tasks on a later turn, in order, on the lane', async () => {
    const lane = new LogicalThread('lane-a');
    const seen: string[] = [];

    lane.post(() => seen.push(`first:${currentThread().name}`));
    lane.post(() => seen.push(`second:${currentThread().name}`));

    expect(seen).toEqual([]);
    expect(lane.pendingTasks).toBe(2);

    await flushLanes();

    expect(seen).toEqual(['first:lane-a', 'second:lane-a']);
    expect(lane.executedTasks).toBe(2);
    expect(currentThread()).toBe(MAIN_THREAD);
  });

  test('should run tasks posted during a drain on the next turn', async () => {
    const lane = new LogicalThread('lane-b');
    const seen: string[] = [];

    lane.post(() => {
      seen.push('outer');
      lane.post(() => seen.push('inner'));
    });

    await flushLanes();
    expect(seen).toEqual(['outer']);

    await flushLanes();
    expect(seen).toEqual(['outer', 'inner']);
  });

  test('should restore the previous lane after runNow', () => {
    const outer = new LogicalThread('outer');
    const inner = new LogicalThread('inner');

    const names = outer.runNow(() => {
      const during = inner.runNow(() => currentThread().name);
      return [during, currentThread().name];
    });

    expect(names).toEqual(['inner', 'outer']);
    expect(currentThread()).toBe(MAIN_THREAD);
  });

  test('should restore the previous lane when runNow throws', () => {
    const lane = new LogicalThread('throws');
    expect(() =>
      lane.runNow(() => {
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(currentThread()).toBe(MAIN_THREAD);
  });

  test('should log a failing task and keep draining', async () => {
    const records = captureLogs('error');
    const lane = new LogicalThread('lane-c');
    const seen: string[] = [];

    lane.post(() => {
      throw new Error('task exploded');
    });
    lane.post(() => seen.push('after'));
    await flushLanes();

    expect(seen).toEqual(['after']);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      level: 50,
      msg: 'Task failed on logical thread',
      component: 'threading',
      thread: 'lane-c',
      error_message: 'task exploded',
    });
  });
});

// =============================================================================
// ThreadMarshaller
// =============================================================================

describe('ThreadMarshaller', () => {
  test('should post to the host lane in main-thread mode', async () => {
    const marshaller = new ThreadMarshaller('main-thread');
    const worker = new LogicalThread('worker');
    let ranOn = '';

    worker.runNow(() =>
      marshaller.dispatch(() => {
        ranOn = currentThread().name;
      })
    );
    expect(ranOn).toBe('');

    await flushLanes();

    expect(ranOn).toBe('main');
    expect(marshaller.stats()).toEqual({ mode: 'main-thread', dispatched: 1, crossThread: 1 });
  });

  test('should defer even same-lane dispatches in main-thread mode', async () => {
    const marshaller = new ThreadMarshaller('main-thread');
    let ran = false;

    marshaller.dispatch(() => {
      ran = true;
    });
    expect(ran).toBe(false);

    await flushLanes();
    expect(ran).toBe(true);
    expect(marshaller.stats().crossThread).toBe(0);
  });

  test('should run the task on the calling lane in inline mode', () => {
    const marshaller = new ThreadMarshaller('inline');
    const worker = new LogicalThread('worker');
    let ranOn = '';

    worker.runNow(() =>
      marshaller.dispatch(() => {
        ranOn = currentThread().name;
      })
    );

    expect(ranOn).toBe('worker');
    expect(marshaller.stats()).toEqual({ mode: 'inline', dispatched: 1, crossThread: 1 });
  });

  test('should report host affinity per mode', () => {
    const worker = new LogicalThread('worker');
    const mainThread = new ThreadMarshaller('main-thread');
    const inline = new ThreadMarshaller('inline');

    expect(mainThread.isHostThread()).toBe(true);
    expect(worker.runNow(() => mainThread.isHostThread())).toBe(false);
    expect(worker.runNow(() => inline.isHostThread())).toBe(true);
  });

  test('should accept a custom host lane', async () => {
    const hostLane = new LogicalThread('ui');
    const marshaller = new ThreadMarshaller('main-thread', hostLane);
    let ranOn = '';

    expect(marshaller.isHostThread()).toBe(false);
    marshaller.dispatch(() => {
      ranOn = currentThread().name;
    });
    await flushLanes();

    expect(ranOn).toBe('ui');
  });
});

describe('ThreadAffinityError', () => {
  test('should name the operation and the offending lane', () => {
    const error = new ThreadAffinityError('resolve', 'native-worker-0');
    expect(error.message).toBe('Host operation "resolve" called from thread "native-worker-0"');
    expect(error.operation).toBe('resolve');
    expect(error.thread).toBe('native-worker-0');
  });
});
